import type {
  ConsistencyData,
  DealRecord,
  DetectionInput,
  LinkingResult,
  PortalRecord,
  SessionData,
  TriageResult,
} from "@exam-desk/schemas";
import { parseCatalog } from "../catalog/loader.js";
import type { StateCatalog } from "../catalog/state-catalog.js";
import { buildEvaluationContext, type EvaluationContext } from "../engine/context.js";
import { createLogger, type Logger } from "../logger.js";

export const TODAY = "2026-03-10";

export const silentLogger = createLogger({ name: "test", level: "silent" });

export interface LogEntry {
  level: "debug" | "info" | "warn" | "error";
  fields: Record<string, unknown>;
  msg: string | undefined;
}

/** Logger that keeps every entry in memory. */
export function makeRecordingLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const record =
    (level: LogEntry["level"]) =>
    (fieldsOrMsg: Record<string, unknown> | string, msg?: string): void => {
      if (typeof fieldsOrMsg === "string") entries.push({ level, fields: {}, msg: fieldsOrMsg });
      else entries.push({ level, fields: fieldsOrMsg, msg });
    };
  return {
    entries,
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
  };
}

export interface InputOverrides {
  deal?: DealRecord;
  portal?: PortalRecord;
  triage?: TriageResult;
  linking?: LinkingResult;
  session?: SessionData;
  consistency?: ConsistencyData;
}

/** A plain, non-Uber candidate with a working portal account and no intent. */
export function makeInput(overrides: InputOverrides = {}): DetectionInput {
  return {
    deal: { Evalbox: "Dossier Synchronisé", Amount: 241, Stage: "GAGNÉ", ...overrides.deal },
    portal: {
      compte_existe: true,
      connection_test_success: true,
      should_respond_to_candidate: true,
      ...overrides.portal,
    },
    triage: { action: "GO", ...overrides.triage },
    linking: { deal_id: "deal-001", ...overrides.linking },
    threads: [],
    session: overrides.session,
    consistency: overrides.consistency,
  };
}

export function makeContext(overrides: InputOverrides = {}, today = TODAY): Readonly<EvaluationContext> {
  return buildEvaluationContext(makeInput(overrides), today);
}

const response = (template: string, extra: Record<string, unknown> = {}) => ({ template, ...extra });

/** Small catalog exercising every severity and rule kind. */
export function makeTestCatalog(): StateCatalog {
  return parseCatalog({
    version: "test",
    config: { forbidden_terms: ["Zoho"], required_blocks_global: [] },
    states: {
      SPAM: {
        id: "T1",
        priority: 1,
        category: "triage",
        severity: "BLOCKING",
        detection: { method: "triage_action", action: "SPAM" },
        workflow: { action: "STOP" },
        response: response("no_reply"),
      },
      DOUBLE_ACCOUNT: {
        id: "A3",
        priority: 12,
        category: "credentials",
        severity: "BLOCKING",
        detection: { method: "field", condition: { field: "duplicatePaymentAlert", operator: "truthy" } },
        workflow: { action: "ESCALATE" },
        response: response("double_account"),
      },
      PERSONAL_ACCOUNT_WARNING: {
        id: "A4",
        priority: 13,
        category: "credentials",
        severity: "WARNING",
        detection: { method: "field", condition: { field: "personalAccountWarning", operator: "truthy" } },
        response: response("partials/warnings/personal_account_warning"),
      },
      UBER_DOCUMENTS_MISSING: {
        id: "U-A",
        priority: 21,
        category: "uber",
        severity: "INFO",
        detection: { method: "uber_case", case: "A" },
        response: response("uber_documents_missing"),
      },
      CONVOCATION_RECEIVED: {
        id: "D-9",
        priority: 38,
        category: "convocation",
        severity: "INFO",
        detection: { method: "exam_date_case", case: 9 },
        response: response("convocation_received", { blocks_required: ["salutation", "lien_plateforme"] }),
      },
      EXAM_DATE_EMPTY: {
        id: "D-1",
        priority: 30,
        category: "exam_date",
        severity: "INFO",
        detection: { method: "exam_date_case", case: 1 },
        response: response("exam_date_empty"),
        crm_updates: { method: "extract_date_choice" },
      },
      LEGACY_HELPER: {
        id: "X1",
        priority: 40,
        category: "legacy",
        severity: "BLOCKING",
        detection: { method: "examt3p_agent" },
        response: response("legacy"),
      },
      DATE_MODIFICATION_BLOCKED: {
        id: "B1",
        priority: 45,
        category: "blocking_rule",
        severity: "WARNING",
        detection: {
          method: "all_of",
          rules: [
            { method: "field", condition: { field: "canModifyExamDate", operator: "falsy" } },
            { method: "intent", intent: "REPORT_DATE" },
          ],
        },
        response: response("report_bloque"),
      },
      CONFIRMATION_SESSION: {
        id: "I3",
        priority: 52,
        category: "intent",
        severity: "INFO",
        detection: { method: "intent", intent: "CONFIRMATION_SESSION" },
        workflow: { action: "RESPOND_AND_UPDATE" },
        response: response("confirmation_session"),
        crm_updates: { method: "extract_session_choice" },
      },
      DOSSIER_NOT_RECEIVED: {
        id: "C3",
        priority: 62,
        category: "consistency",
        severity: "BLOCKING",
        detection: { method: "field", condition: { field: "dossierNotReceived", operator: "truthy" } },
        workflow: { action: "ESCALATE" },
        response: response("dossier_not_received"),
      },
      GENERAL: {
        id: "GENERAL",
        priority: 999,
        category: "general",
        severity: "INFO",
        detection: { method: "fallback" },
        response: response("general"),
      },
    },
  });
}
