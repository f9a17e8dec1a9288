import {
  CRM_FIELDS,
  type CrmField,
  type CrmUpdateMethod,
  type CrmUpdateResult,
  type ProposedExamDate,
  type ProposedSession,
} from "@exam-desk/schemas";
import type { EvaluationContext } from "../engine/context.js";
import type { DetectedState } from "../engine/types.js";
import { createLogger, type Logger } from "../logger.js";
import { isoToFrench } from "../utils/dates.js";
import { withRetry, type RetryOptions } from "../utils/retry.js";
import {
  extractSessionPreference,
  findSessionByType,
  proposedDateIso,
  resolveDateChoice,
} from "./extractors.js";

/** Writes approved field values to a CRM deal. Implemented by the CRM client. */
export interface CrmDealWriter {
  updateDeal(dealId: string, fields: Record<string, string>): Promise<void>;
}

export interface ApplyUpdatesOutcome {
  success: boolean;
  updatesApplied: Record<string, string>;
  error?: string;
}

export interface CrmUpdaterOptions {
  logger?: Logger;
  /**
   * Also extract the exam date when the deal has none and dates were
   * proposed, and the session when the deal has none and sessions were
   * proposed, whatever the state declares.
   */
  autoExtract?: boolean;
  /** Backoff for CRM writes in `applyUpdates`. */
  retry?: RetryOptions;
}

function emptyResult(): CrmUpdateResult {
  return { updatesApplied: {}, updatesBlocked: {}, updatesSkipped: {}, errors: [] };
}

function isDecided(result: CrmUpdateResult, field: CrmField): boolean {
  return field in result.updatesApplied || field in result.updatesBlocked || field in result.updatesSkipped;
}

export class CrmUpdater {
  private readonly logger: Logger;
  private readonly autoExtract: boolean;
  private readonly retry: RetryOptions;

  constructor(options: CrmUpdaterOptions = {}) {
    this.logger = options.logger ?? createLogger({ name: "crm-updater" });
    this.autoExtract = options.autoExtract ?? false;
    this.retry = options.retry ?? {};
  }

  /**
   * Extracts the candidate's confirmed choice from their reply and decides,
   * field by field, whether it may be written. Every field touched ends up
   * in exactly one of applied, blocked or skipped.
   */
  determineUpdates(
    state: DetectedState,
    candidateMessage: string,
    proposedSessions: readonly ProposedSession[] = [],
    proposedDates: readonly ProposedExamDate[] = [],
  ): CrmUpdateResult {
    const result = emptyResult();
    const { context } = state;
    const methods: CrmUpdateMethod[] = [];

    if (this.autoExtract) {
      if (!context.dateExamen && proposedDates.length > 0) methods.push("extract_date_choice");
      if (!context.sessionAssigned && proposedSessions.length > 0) methods.push("extract_session_choice");
    }
    if (state.crmUpdates) methods.push(state.crmUpdates.method);

    for (const method of methods) {
      switch (method) {
        case "extract_session_choice":
          if (isDecided(result, CRM_FIELDS.preferenceHoraire)) break;
          this.extractSessionChoice(result, candidateMessage, proposedSessions);
          break;
        case "extract_date_choice":
          if (isDecided(result, CRM_FIELDS.examDate)) break;
          this.extractDateChoice(result, candidateMessage, proposedDates);
          break;
      }
    }

    this.applyBlockingRules(result, context);

    this.logger.info(
      {
        state: state.name,
        applied: Object.keys(result.updatesApplied),
        blocked: Object.keys(result.updatesBlocked),
        skipped: Object.keys(result.updatesSkipped),
      },
      "CRM updates determined",
    );

    return result;
  }

  private extractSessionChoice(
    result: CrmUpdateResult,
    message: string,
    proposedSessions: readonly ProposedSession[],
  ): void {
    const match = extractSessionPreference(message);

    if (match.kind === "ambiguous") {
      result.updatesSkipped[CRM_FIELDS.preferenceHoraire] =
        "Ambiguous choice: both day and evening sessions mentioned";
      result.updatesSkipped[CRM_FIELDS.session] = "No time-slot preference to match a session";
      return;
    }
    if (match.kind === "none") {
      result.updatesSkipped[CRM_FIELDS.preferenceHoraire] = "No time-slot preference found in message";
      result.updatesSkipped[CRM_FIELDS.session] = "No time-slot preference to match a session";
      return;
    }

    const { preference } = match;
    result.updatesApplied[CRM_FIELDS.preferenceHoraire] = preference;

    if (proposedSessions.length === 0) {
      result.updatesSkipped[CRM_FIELDS.session] = "No sessions were proposed";
      return;
    }
    const session = findSessionByType(proposedSessions, preference);
    if (!session) {
      result.updatesSkipped[CRM_FIELDS.session] = `No ${preference} session among proposed sessions`;
      return;
    }
    result.updatesApplied[CRM_FIELDS.session] = session.id;
  }

  private extractDateChoice(
    result: CrmUpdateResult,
    message: string,
    proposedDates: readonly ProposedExamDate[],
  ): void {
    for (const proposed of proposedDates) {
      if (!proposedDateIso(proposed)) {
        result.errors.push(`Proposed exam date ${proposed.id} has an unreadable date: ${proposed.dateExamen}`);
      }
    }

    const field = CRM_FIELDS.examDate;
    if (proposedDates.length === 0) {
      result.updatesSkipped[field] = "No exam dates were proposed";
      return;
    }

    const match = resolveDateChoice(message, proposedDates);
    switch (match.kind) {
      case "none":
        result.updatesSkipped[field] = "No date found in message";
        break;
      case "ambiguous":
        result.updatesSkipped[field] = `Ambiguous choice: ${match.dates.length} dates mentioned (${match.dates.join(", ")})`;
        break;
      case "not_proposed":
        result.updatesSkipped[field] = `Date ${match.date} is not among proposed dates`;
        break;
      case "resolved":
        result.updatesApplied[field] = match.proposed.id;
        break;
    }
  }

  /** Rule B1, applied after extraction whatever produced the update. */
  private applyBlockingRules(result: CrmUpdateResult, context: Readonly<EvaluationContext>): void {
    const field = CRM_FIELDS.examDate;
    const value = result.updatesApplied[field];
    if (value === undefined || context.canModifyExamDate) return;

    delete result.updatesApplied[field];
    const closedOn = context.dateCloture ? isoToFrench(context.dateCloture) : "unknown date";
    result.updatesBlocked[field] =
      `Dossier validated (Evalbox=${context.evalbox}) and registration closed on ${closedOn}: ` +
      "exam date cannot change without force majeure";
    this.logger.warn({ field, value, evalbox: context.evalbox }, "Exam date update blocked by rule B1");
  }

  /**
   * Hands approved updates to the CRM, retrying failed writes. A write that
   * still fails is reported in the outcome, not thrown.
   */
  async applyUpdates(
    dealId: string,
    updates: Record<string, string>,
    writer: CrmDealWriter,
  ): Promise<ApplyUpdatesOutcome> {
    if (Object.keys(updates).length === 0) {
      return { success: true, updatesApplied: {} };
    }

    try {
      await withRetry(() => writer.updateDeal(dealId, updates), {
        ...this.retry,
        onRetry: (err, attempt, delayMs) => {
          const message = err instanceof Error ? err.message : String(err);
          this.logger.warn({ dealId, attempt, delayMs, err: message }, "CRM deal update failed, retrying");
          this.retry.onRetry?.(err, attempt, delayMs);
        },
      });
      this.logger.info({ dealId, fields: Object.keys(updates) }, "CRM deal updated");
      return { success: true, updatesApplied: { ...updates } };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error({ dealId, err: message }, "CRM deal update failed");
      return { success: false, updatesApplied: {}, error: message };
    }
  }
}

/** Plain-text summary of an update result for a CRM note. */
export function formatUpdatesForNote(result: CrmUpdateResult): string {
  const blocks: string[] = [];
  const section = (title: string, lines: string[]): void => {
    if (lines.length > 0) blocks.push([title, ...lines].join("\n"));
  };
  const fieldLines = (entries: Record<string, string>): string[] =>
    Object.entries(entries).map(([field, value]) => `- ${field}: ${value}`);

  section("Updates applied:", fieldLines(result.updatesApplied));
  section("Updates blocked:", fieldLines(result.updatesBlocked));
  section("Updates skipped:", fieldLines(result.updatesSkipped));
  section("Errors:", result.errors.map((error) => `- ${error}`));

  return blocks.length > 0 ? blocks.join("\n\n") : "No CRM update";
}
