import type {
  ProposedExamDate,
  ValidationCheck,
  ValidationIssue,
  ValidationIssueType,
  ValidationResult,
} from "@exam-desk/schemas";
import type { StateCatalog } from "../catalog/state-catalog.js";
import { proposedDateIso } from "../crm/extractors.js";
import type { DetectedState } from "../engine/types.js";
import { createLogger, type Logger } from "../logger.js";
import { shouldSkipRequiredBlocks } from "../templates/overrides.js";
import { findDateMentions } from "../utils/dates.js";
import { escapeRegExp, excerpt, wholeWord } from "../utils/text.js";
import {
  FORBIDDEN_BLOCK_PATTERNS,
  REQUIRED_BLOCK_PATTERNS,
  blockPatterns,
  findBlock,
} from "./blocks.js";

/** Internal jargon, the offer price and internal places never shown to candidates. */
export const FORBIDDEN_TERMS: readonly string[] = [
  "BFS",
  "Evalbox",
  "CDJ",
  "CDS",
  "20€",
  "Montreuil",
  "lookup",
  "CRM",
  "deal",
  "API",
  "ticket_id",
  "deal_id",
  "module",
  "field",
];

/** The promotional offer price, never quoted to a candidate. */
export const FORBIDDEN_AMOUNT = 20;

/** Exam registration fee and file fee. */
export const DEFAULT_ALLOWED_AMOUNTS: readonly number[] = [241, 60];

/** Amounts at or below this are not worth a warning. */
const UNUSUAL_AMOUNT_THRESHOLD = 10;

const AMOUNT_RE = /(\d+(?:[.,]\d{1,2})?)\s*(?:€|euros?\b|eur\b)|€\s*(\d+(?:[.,]\d{1,2})?)/gi;
const EMAIL_RE = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;
const CREDENTIAL_LINE_RE = /(identifiant|login|adresse de connexion)[^:\n]*:/i;
const GREETING_RE = /^\s*(bonjour|cher|chère|madame|monsieur)/iu;
const CLOSING_RE = /(cordialement|bien à vous|salutations)/iu;
const PLACEHOLDER_RE = /\{\{[^}]+\}\}/g;

export interface ResponseValidatorOptions {
  /** Source of catalog-wide forbidden terms and globally required blocks. */
  catalog?: StateCatalog;
  extraForbiddenTerms?: readonly string[];
  minLength?: number;
  maxLength?: number;
  logger?: Logger;
}

export interface ValidateOptions {
  /** Exam dates actually offered to the candidate. */
  proposedDates?: readonly ProposedExamDate[];
  /** Amounts the reply may quote on top of the defaults. */
  allowedAmounts?: readonly number[];
  /** Template the reply was rendered from. */
  templateUsed?: string | null;
}

class ResultBuilder {
  readonly errors: ValidationIssue[] = [];
  readonly warnings: ValidationIssue[] = [];
  readonly checksPassed: ValidationCheck[] = [];

  error(type: ValidationIssueType, message: string, location?: string): void {
    this.errors.push(issue(type, "error", message, location));
  }

  warning(type: ValidationIssueType, message: string, location?: string): void {
    this.warnings.push(issue(type, "warning", message, location));
  }

  /** Records `check` as passed when it added no issue since `mark`. */
  passIfClean(check: ValidationCheck, mark: number): void {
    if (this.count() === mark) this.checksPassed.push(check);
  }

  count(): number {
    return this.errors.length + this.warnings.length;
  }

  build(): ValidationResult {
    return {
      valid: this.errors.length === 0,
      errors: this.errors,
      warnings: this.warnings,
      checksPassed: this.checksPassed,
    };
  }
}

function issue(
  type: ValidationIssueType,
  severity: ValidationIssue["severity"],
  message: string,
  location?: string,
): ValidationIssue {
  return location ? { type, severity, message, location } : { type, severity, message };
}

function dedupeTerms(terms: readonly string[]): string[] {
  const seen = new Map<string, string>();
  for (const term of terms) {
    const trimmed = term.trim();
    if (trimmed && !seen.has(trimmed.toLowerCase())) seen.set(trimmed.toLowerCase(), trimmed);
  }
  return [...seen.values()];
}

function parseAmount(raw: string): number {
  return Number(raw.replace(",", "."));
}

/**
 * Static checks on a rendered reply before it is sent. Errors make the reply
 * invalid; warnings are reported and never change validity.
 */
export class ResponseValidator {
  readonly forbiddenTerms: readonly string[];
  private readonly forbiddenTermPatterns: ReadonlyArray<{ term: string; pattern: RegExp }>;
  private readonly requiredBlocksGlobal: readonly string[];
  private readonly minLength: number;
  private readonly maxLength: number;
  private readonly logger: Logger;

  constructor(options: ResponseValidatorOptions = {}) {
    this.forbiddenTerms = dedupeTerms([
      ...FORBIDDEN_TERMS,
      ...(options.catalog?.forbiddenTerms ?? []),
      ...(options.extraForbiddenTerms ?? []),
    ]);
    this.forbiddenTermPatterns = this.forbiddenTerms.map((term) => ({
      term,
      pattern: wholeWord(escapeRegExp(term)),
    }));
    this.requiredBlocksGlobal = options.catalog?.requiredBlocksGlobal ?? [];
    this.minLength = options.minLength ?? 50;
    this.maxLength = options.maxLength ?? 5000;
    this.logger = options.logger ?? createLogger({ name: "response-validator" });
  }

  validate(responseText: string, state: DetectedState, options: ValidateOptions = {}): ValidationResult {
    const result = new ResultBuilder();

    this.checkForbiddenTerms(responseText, result);

    if (shouldSkipRequiredBlocks(state, options.templateUsed)) {
      this.logger.debug(
        { state: state.name, templateUsed: options.templateUsed },
        "Required block check skipped for override template",
      );
    } else {
      this.checkRequiredBlocks(responseText, state, result);
    }

    this.checkForbiddenBlocks(responseText, state, result);
    this.checkDates(responseText, state, options.proposedDates ?? [], result);
    this.checkIdentifiers(responseText, state, result);
    this.checkAmounts(responseText, options.allowedAmounts ?? [], result);
    this.checkFormat(responseText, result);

    const validation = result.build();
    this.logger.info(
      {
        state: state.name,
        valid: validation.valid,
        errors: validation.errors.map((e) => e.type),
        warnings: validation.warnings.map((w) => w.type),
      },
      "Response validated",
    );
    return validation;
  }

  private checkForbiddenTerms(text: string, result: ResultBuilder): void {
    const mark = result.count();
    for (const { term, pattern } of this.forbiddenTermPatterns) {
      const match = pattern.exec(text);
      if (match) {
        result.error("forbidden_term", `Forbidden term found: '${term}'`, excerpt(text, match.index, match[0].length));
      }
    }
    result.passIfClean("forbidden_terms", mark);
  }

  private checkRequiredBlocks(text: string, state: DetectedState, result: ResultBuilder): void {
    const mark = result.count();
    const blocks = [...new Set([...state.responseConfig.blocks_required, ...this.requiredBlocksGlobal])];
    for (const block of blocks) {
      if (!findBlock(text, blockPatterns(REQUIRED_BLOCK_PATTERNS, block))) {
        result.error("missing_block", `Required block missing: '${block}'`);
      }
    }
    result.passIfClean("required_blocks", mark);
  }

  private checkForbiddenBlocks(text: string, state: DetectedState, result: ResultBuilder): void {
    const mark = result.count();
    for (const block of state.responseConfig.blocks_forbidden) {
      const found = findBlock(text, blockPatterns(FORBIDDEN_BLOCK_PATTERNS, block));
      if (found) {
        result.error(
          "forbidden_block",
          `Forbidden block present: '${block}'`,
          excerpt(text, found.index, found.text.length),
        );
      }
    }
    result.passIfClean("forbidden_blocks", mark);
  }

  /**
   * Dates must come from what was offered or from the dossier itself.
   * Unknown and past dates are warnings: a reply may legitimately cite them.
   */
  private checkDates(
    text: string,
    state: DetectedState,
    proposedDates: readonly ProposedExamDate[],
    result: ResultBuilder,
  ): void {
    const mark = result.count();
    const { context } = state;

    const sanctioned = new Set<string>();
    for (const proposed of proposedDates) {
      const iso = proposedDateIso(proposed);
      if (iso) sanctioned.add(iso);
    }
    if (context.dateExamen) sanctioned.add(context.dateExamen);
    if (context.dateCloture) sanctioned.add(context.dateCloture);

    const reported = new Set<string>();
    for (const mention of findDateMentions(text)) {
      if (reported.has(mention.iso)) continue;
      reported.add(mention.iso);

      const location = excerpt(text, mention.index, mention.raw.length);
      if (!sanctioned.has(mention.iso)) {
        result.warning("invented_date", `Possibly invented date: '${mention.raw}'`, location);
      }
      if (mention.iso < context.today) {
        result.warning("past_date", `Past date mentioned: '${mention.raw}'`, location);
      }
    }
    result.passIfClean("dates_coherence", mark);
  }

  /** Emails on a login line must be the portal identifier or the candidate's own. */
  private checkIdentifiers(text: string, state: DetectedState, result: ResultBuilder): void {
    const mark = result.count();
    const { context } = state;
    const known = new Set(
      [context.portal.identifiant, context.deal.Email]
        .filter((value): value is string => typeof value === "string" && value.trim() !== "")
        .map((value) => value.trim().toLowerCase()),
    );

    if (known.size > 0) {
      for (const line of text.split("\n")) {
        if (!CREDENTIAL_LINE_RE.test(line)) continue;
        for (const [email] of line.matchAll(EMAIL_RE)) {
          if (!known.has(email.toLowerCase())) {
            result.warning("wrong_identifier", `Possibly wrong identifier: '${email}'`, line.trim());
          }
        }
      }
    }
    result.passIfClean("identifiers_check", mark);
  }

  private checkAmounts(text: string, extraAllowed: readonly number[], result: ResultBuilder): void {
    const mark = result.count();
    const allowed = new Set([...DEFAULT_ALLOWED_AMOUNTS, ...extraAllowed]);

    for (const match of text.matchAll(AMOUNT_RE)) {
      const raw = match[1] ?? match[2];
      if (raw === undefined) continue;
      const amount = parseAmount(raw);
      const location = excerpt(text, match.index ?? -1, match[0].length);

      if (amount === FORBIDDEN_AMOUNT) {
        result.error("forbidden_amount", `Amount ${FORBIDDEN_AMOUNT}€ must not be quoted (offer price)`, location);
      } else if (!allowed.has(amount) && amount > UNUSUAL_AMOUNT_THRESHOLD) {
        result.warning("unusual_amount", `Unusual amount: ${raw}€`, location);
      }
    }
    result.passIfClean("amounts_check", mark);
  }

  private checkFormat(text: string, result: ResultBuilder): void {
    const mark = result.count();

    if (text.length < this.minLength) {
      result.warning("too_short", `Response shorter than ${this.minLength} characters (${text.length})`);
    }
    if (text.length > this.maxLength) {
      result.warning("too_long", `Response longer than ${this.maxLength} characters (${text.length})`);
    }
    if (!GREETING_RE.test(text)) {
      result.warning("missing_greeting", "Response does not open with a greeting");
    }
    if (!CLOSING_RE.test(text.trimEnd().slice(-200))) {
      result.warning("missing_closing", "Response does not end with a sign-off");
    }

    const placeholders = [...text.matchAll(PLACEHOLDER_RE)].map((m) => m[0]);
    if (placeholders.length > 0) {
      result.error("unresolved_placeholder", `Unresolved placeholders: ${placeholders.join(", ")}`);
    }
    result.passIfClean("format_check", mark);
  }
}
