// Engine
export { buildEvaluationContext, extractDateExamen, extractDateCloture, extractDepartement } from "./engine/context.js";
export type { EvaluationContext, ClassificationFacts } from "./engine/context.js";
export { normalizeDetectionInput, parseRecord } from "./engine/input.js";
export {
  EVALBOX,
  EXAM_DATE_LOCKING_STATUSES,
  SELECTION_TEST_MANDATORY_AFTER,
  UBER_VERIFICATION_DELAY_DAYS,
  canModifyExamDate,
  determineExamDateCase,
  determineUberCase,
  isUberCaseD,
  isUberCaseE,
} from "./engine/cases.js";
export { collectAlerts } from "./engine/alerts.js";
export { evaluateRule, evaluateCondition, describeRule, hasIntent, readField } from "./engine/rule-evaluator.js";
export type { ConditionResult, ContextValue } from "./engine/rule-evaluator.js";
export { StateDetector, BUILTIN_GENERAL_STATE, GENERAL_STATE_NAME } from "./engine/state-detector.js";
export type { StateDetectorOptions } from "./engine/state-detector.js";
export type { DetectedState, DetectedStates, DetectOptions } from "./engine/types.js";

// Catalog
export { StateCatalog, findUnsupportedMethods } from "./catalog/state-catalog.js";
export type { CatalogEntry } from "./catalog/state-catalog.js";
export { loadCatalog, parseCatalog, DEFAULT_CATALOG_PATH } from "./catalog/loader.js";

// Templates
export {
  OVERRIDE_TEMPLATES,
  OVERRIDE_TEMPLATE_NAMES,
  OVERRIDE_INTENTS,
  OVERRIDE_INTENT_NAMES,
  RESCHEDULE_INTENTS,
  isOverrideTemplate,
  shouldSkipRequiredBlocks,
} from "./templates/overrides.js";
export type { OverrideTemplate, OverrideIntent } from "./templates/overrides.js";
export { selectTemplate } from "./templates/select-template.js";
export type { TemplateSelection, TemplateSource } from "./templates/select-template.js";

// CRM
export { CrmUpdater, formatUpdatesForNote } from "./crm/crm-updater.js";
export type { CrmDealWriter, CrmUpdaterOptions, ApplyUpdatesOutcome } from "./crm/crm-updater.js";
export {
  SESSION_CHOICE_PATTERNS,
  extractSessionPreference,
  extractDates,
  resolveDateChoice,
} from "./crm/extractors.js";
export type { SessionPreferenceMatch, DateChoiceMatch } from "./crm/extractors.js";

// Validation
export {
  ResponseValidator,
  FORBIDDEN_TERMS,
  FORBIDDEN_AMOUNT,
  DEFAULT_ALLOWED_AMOUNTS,
} from "./validation/response-validator.js";
export type { ResponseValidatorOptions, ValidateOptions } from "./validation/response-validator.js";
export { REQUIRED_BLOCK_PATTERNS, FORBIDDEN_BLOCK_PATTERNS } from "./validation/blocks.js";

// Runtime
export { createStateEngine } from "./bootstrap.js";
export type { StateEngine, CreateStateEngineOptions } from "./bootstrap.js";
export { loadEngineConfig, EngineEnvSchema } from "./config.js";
export type { EngineConfig } from "./config.js";
export { createLogger } from "./logger.js";
export type { Logger, LoggerOptions, LogLevel } from "./logger.js";
export { CatalogError, ConfigError } from "./errors.js";
export type { CatalogIssue } from "./errors.js";

// Utils
export { normalizeDate, isoToFrench, daysBetween, addDays, resolveToday, findDateMentions } from "./utils/dates.js";
export type { DateMention } from "./utils/dates.js";
export { withRetry } from "./utils/retry.js";
export type { RetryOptions } from "./utils/retry.js";
