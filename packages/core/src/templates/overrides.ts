import type { DetectedState } from "../engine/types.js";

/**
 * Templates substituted for a state's own template when the candidate's
 * intent changes what the reply must say. Shared by template selection and
 * by the validator's required-block skip rule.
 */
export const OVERRIDE_TEMPLATES = {
  rescheduleBlocked: "report_bloque",
  rescheduleBlockedForceMajeure: "report_bloque_force_majeure",
  credentialsRefused: "credentials_refused",
  credentialsRefusedSecurity: "credentials_refused_security",
} as const;

export type OverrideTemplate = (typeof OVERRIDE_TEMPLATES)[keyof typeof OVERRIDE_TEMPLATES];

export const OVERRIDE_TEMPLATE_NAMES: readonly OverrideTemplate[] = Object.values(OVERRIDE_TEMPLATES);

export const OVERRIDE_INTENTS = {
  reportDate: "REPORT_DATE",
  forceMajeureReport: "FORCE_MAJEURE_REPORT",
  refusPartageCredentials: "REFUS_PARTAGE_CREDENTIALS",
} as const;

export type OverrideIntent = (typeof OVERRIDE_INTENTS)[keyof typeof OVERRIDE_INTENTS];

export const OVERRIDE_INTENT_NAMES: readonly string[] = Object.values(OVERRIDE_INTENTS);

/** Reschedule requests handled by the blocked-reschedule templates. */
export const RESCHEDULE_INTENTS: readonly string[] = [
  OVERRIDE_INTENTS.reportDate,
  OVERRIDE_INTENTS.forceMajeureReport,
];

export function isOverrideTemplate(templateUsed: string): boolean {
  const name = templateUsed.toLowerCase();
  return OVERRIDE_TEMPLATE_NAMES.some((fragment) => name.includes(fragment));
}

/**
 * True when the reply was rendered from a template other than the state's
 * own because of an override, so the state's required blocks no longer apply.
 */
export function shouldSkipRequiredBlocks(state: DetectedState, templateUsed?: string | null): boolean {
  if (!templateUsed) return false;
  if (isOverrideTemplate(templateUsed)) return true;

  const intent = state.detectedIntent;
  if (intent === null || !OVERRIDE_INTENT_NAMES.includes(intent)) return false;

  const defaultTemplate = state.responseConfig.template;
  return defaultTemplate !== "" && defaultTemplate !== templateUsed;
}
