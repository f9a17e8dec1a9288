import type { ExamDateCase, UberCase } from "@exam-desk/schemas";
import { addDays } from "../utils/dates.js";
import type { ClassificationFacts } from "./context.js";

export const EVALBOX = {
  created: "Dossier crée",
  readyToPay: "Pret a payer",
  readyToPayByCheque: "Pret a payer par cheque",
  synchronized: "Dossier Synchronisé",
  validated: "VALIDE CMA",
  convocationReceived: "Convoc CMA reçue",
  refused: "Refusé CMA",
} as const;

/** Statuses under which rule B1 can lock the exam date. */
export const EXAM_DATE_LOCKING_STATUSES: ReadonlySet<string> = new Set([
  EVALBOX.validated,
  EVALBOX.convocationReceived,
]);

/** Dossiers received after this day must also pass the selection test. */
export const SELECTION_TEST_MANDATORY_AFTER = "2025-05-19";

/** Uber verifies the account the day after the dossier is received. */
export const UBER_VERIFICATION_DELAY_DAYS = 1;

/**
 * Rule B1: the exam date is frozen once the dossier is validated (or the
 * convocation issued) and registration for that session has closed.
 */
export function canModifyExamDate(facts: Pick<ClassificationFacts, "evalbox" | "cloturePassed">): boolean {
  if (!EXAM_DATE_LOCKING_STATUSES.has(facts.evalbox)) return true;
  return !facts.cloturePassed;
}

function uberVerificationElapsed(facts: ClassificationFacts): boolean {
  if (!facts.dateDossierRecu) return false;
  return addDays(facts.dateDossierRecu, UBER_VERIFICATION_DELAY_DAYS) <= facts.today;
}

/** CAS D: account still unverified once the verification delay has passed. */
export function isUberCaseD(facts: ClassificationFacts): boolean {
  if (!facts.isUber20Deal) return false;
  if (!uberVerificationElapsed(facts)) return false;
  return !facts.compteUber;
}

/** CAS E: declared ineligible. D takes precedence when both hold. */
export function isUberCaseE(facts: ClassificationFacts): boolean {
  if (!facts.isUber20Deal) return false;
  if (isUberCaseD(facts)) return false;
  if (!uberVerificationElapsed(facts)) return false;
  return !facts.eligibleUber;
}

export function determineUberCase(facts: ClassificationFacts): UberCase {
  if (facts.isUberProspect) return "PROSPECT";
  if (!facts.isUber20Deal) return "NOT_UBER";
  if (!facts.dateDossierRecu) return "A";
  if (isUberCaseD(facts)) return "D";
  if (isUberCaseE(facts)) return "E";
  if (!facts.dateTestSelection && facts.dateDossierRecu > SELECTION_TEST_MANDATORY_AFTER) return "B";
  return "ELIGIBLE";
}

/**
 * Ten-way exam date classification. Order matters: status-only cases
 * (refused, convocation, ready to pay) win over the date-window cases.
 *
 *  1 no date            6 future, other status
 *  2 past, not valid    7 past, validated
 *  3 refused            8 future, registration closed, not validated
 *  4 validated, future  9 convocation received
 *  5 synced, future    10 ready to pay
 */
export function determineExamDateCase(facts: ClassificationFacts): ExamDateCase {
  const { evalbox, dateExamenPassed: passed, dateExamenFuture: future } = facts;

  if (!facts.dateExamen) return 1;
  if (evalbox === EVALBOX.refused) return 3;
  if (evalbox === EVALBOX.convocationReceived) return 9;
  if (evalbox === EVALBOX.readyToPay || evalbox === EVALBOX.readyToPayByCheque) return 10;
  if (evalbox === EVALBOX.validated && future) return 4;
  if (evalbox === EVALBOX.synchronized && future) return 5;
  if (passed && (evalbox === EVALBOX.validated || evalbox === EVALBOX.synchronized)) return 7;
  if (future && facts.cloturePassed) return 8;
  if (passed) return 2;
  if (future) return 6;
  return 1;
}
