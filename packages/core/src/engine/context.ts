import type {
  ConsistencyData,
  CrmLookup,
  DealRecord,
  DetectionInput,
  ExamDateCase,
  ForceMajeureType,
  IntentContext,
  LinkingResult,
  PortalErrorType,
  PortalRecord,
  SessionData,
  ThreadMessage,
  TriageResult,
  UberCase,
} from "@exam-desk/schemas";
import { daysBetween, toIsoDate } from "../utils/dates.js";
import { canModifyExamDate, determineExamDateCase, determineUberCase } from "./cases.js";
import { normalizeDetectionInput } from "./input.js";

/**
 * Flat, typed snapshot every matcher reads from. Built once per detection
 * call and frozen: derived classifications are never recomputed mid-pass.
 */
export interface EvaluationContext {
  // Raw inputs
  deal: DealRecord;
  portal: PortalRecord;
  triage: TriageResult;
  linking: LinkingResult;
  threads: ThreadMessage[];
  session: SessionData;
  consistency: ConsistencyData;

  // CRM fields
  evalbox: string;
  dateExamen: string | null;
  dateCloture: string | null;
  departement: string | null;
  amount: number;
  stage: string;
  dealId: string | null;
  numDossier: string;

  // Temporal facts
  today: string;
  daysUntilExam: number | null;
  cloturePassed: boolean;
  dateExamenPassed: boolean;
  dateExamenFuture: boolean;
  hasExamDate: boolean;

  // Triage
  triageAction: string;
  primaryIntent: string | null;
  secondaryIntents: string[];
  intentContext: IntentContext;
  mentionsForceMajeure: boolean;
  forceMajeureType: ForceMajeureType | null;
  forceMajeureDetails: string;
  isForceMajeureDeath: boolean;
  isForceMajeureMedical: boolean;
  isForceMajeureAccident: boolean;
  isForceMajeureChildcare: boolean;
  isForceMajeureOther: boolean;

  // Deal linking
  hasDuplicateUberOffer: boolean;
  needsClarification: boolean;

  // Exam portal
  compteExiste: boolean;
  connectionTestSuccess: boolean;
  shouldRespondToCandidate: boolean;
  duplicatePaymentAlert: boolean;
  personalAccountWarning: boolean;
  potentialPersonalAccount: boolean;
  personalAccountEmail: string;
  cabAccountEmail: string;
  portalDossierStatus: string;
  extractionFailed: boolean;
  portalErrorType: PortalErrorType | null;

  // Uber offer
  isUber20Deal: boolean;
  isUberProspect: boolean;
  dateDossierRecu: string | null;
  dateTestSelection: string | null;
  compteUber: boolean;
  eligibleUber: boolean;
  uberEligibleAccount: boolean;

  // Session and training/exam consistency
  sessionAssigned: boolean;
  preferenceHoraire: string | null;
  refreshSessionAvailable: boolean;
  trainingMissedExamImminent: boolean;
  dossierNotReceived: boolean;

  // Derived once
  uberCase: UberCase;
  examDateCase: ExamDateCase;
  canModifyExamDate: boolean;
}

/** Facts the case classifiers depend on. */
export type ClassificationFacts = Pick<
  EvaluationContext,
  | "today"
  | "evalbox"
  | "dateExamen"
  | "dateExamenPassed"
  | "dateExamenFuture"
  | "cloturePassed"
  | "isUber20Deal"
  | "isUberProspect"
  | "dateDossierRecu"
  | "dateTestSelection"
  | "compteUber"
  | "eligibleUber"
>;

const EXAM_DATE_LOOKUP_RE = /(\d{4}-\d{2}-\d{2})/;
const DEPARTEMENT_PREFIX_RE = /^(\d+)_/;

function isLookup(value: DealRecord["Date_examen_VTC"]): value is CrmLookup {
  return typeof value === "object" && value !== null;
}

/** Lookup names look like `93_2026-02-24`. */
export function extractDateExamen(deal: DealRecord): string | null {
  const raw = deal.Date_examen_VTC;
  if (!raw) return null;
  if (isLookup(raw)) {
    const match = EXAM_DATE_LOOKUP_RE.exec(raw.name ?? "");
    return match ? toIsoDate(match[1]) : null;
  }
  return toIsoDate(raw);
}

export function extractDateCloture(deal: DealRecord): string | null {
  const direct = toIsoDate(deal.Date_Cloture_Inscription);
  if (direct) return direct;
  const lookup = deal.Date_examen_VTC;
  if (isLookup(lookup)) return toIsoDate(lookup.Date_Cloture_Inscription);
  return null;
}

export function extractDepartement(deal: DealRecord): string | null {
  const depot = deal.CMA_de_depot;
  if (depot) {
    if (isLookup(depot)) return depot.name ?? null;
    return depot;
  }
  const lookup = deal.Date_examen_VTC;
  if (isLookup(lookup)) {
    const match = DEPARTEMENT_PREFIX_RE.exec(lookup.name ?? "");
    if (match?.[1]) return match[1];
  }
  return null;
}

function flag(value: boolean | string | null | undefined): boolean {
  return value === true;
}

/** Reads its own copy of the input: later changes by the caller do not reach the snapshot. */
export function buildEvaluationContext(rawInput: DetectionInput, today: string): Readonly<EvaluationContext> {
  const input = normalizeDetectionInput(rawInput);
  const { deal, portal, triage, linking } = input;
  const intentContext: IntentContext = triage.intent_context ?? {};

  const evalbox = deal.Evalbox ?? "";
  const dateExamen = extractDateExamen(deal);
  const dateCloture = extractDateCloture(deal);
  const amount = typeof deal.Amount === "number" ? deal.Amount : 0;
  const stage = deal.Stage ?? "";
  const stageUpper = stage.toUpperCase();

  const daysUntilExam = dateExamen ? daysBetween(today, dateExamen) : null;
  const cloturePassed = dateCloture !== null && dateCloture < today;
  const forceMajeureType = intentContext.force_majeure_type ?? null;

  const isUber20Deal = amount === 20 && stageUpper.includes("GAGN");
  const compteUber = flag(deal.Compte_Uber);
  const eligibleUber = flag(deal.ELIGIBLE);

  const base = {
    deal,
    portal,
    triage,
    linking,
    threads: input.threads ?? [],
    session: input.session ?? {},
    consistency: input.consistency ?? {},

    evalbox,
    dateExamen,
    dateCloture,
    departement: extractDepartement(deal),
    amount,
    stage,
    dealId: linking.deal_id ?? null,
    numDossier: portal.num_dossier ?? "",

    today,
    daysUntilExam,
    cloturePassed,
    dateExamenPassed: daysUntilExam !== null && daysUntilExam < 0,
    dateExamenFuture: daysUntilExam !== null && daysUntilExam >= 0,
    hasExamDate: dateExamen !== null,

    triageAction: triage.action ?? "GO",
    primaryIntent: triage.primary_intent ?? triage.detected_intent ?? null,
    secondaryIntents: triage.secondary_intents ?? [],
    intentContext,
    mentionsForceMajeure: flag(intentContext.mentions_force_majeure),
    forceMajeureType,
    forceMajeureDetails: intentContext.force_majeure_details ?? "",
    isForceMajeureDeath: forceMajeureType === "death",
    isForceMajeureMedical: forceMajeureType === "medical",
    isForceMajeureAccident: forceMajeureType === "accident",
    isForceMajeureChildcare: forceMajeureType === "childcare",
    isForceMajeureOther: forceMajeureType === "other",

    hasDuplicateUberOffer: flag(linking.has_duplicate_uber_offer),
    needsClarification: flag(linking.needs_clarification),

    compteExiste: flag(portal.compte_existe),
    connectionTestSuccess: flag(portal.connection_test_success),
    shouldRespondToCandidate: flag(portal.should_respond_to_candidate),
    duplicatePaymentAlert: flag(portal.duplicate_payment_alert),
    // A descriptive string here means "maybe", which is not a warning.
    personalAccountWarning: flag(portal.personal_account_warning),
    potentialPersonalAccount: Boolean(portal.potential_personal_account),
    personalAccountEmail: portal.personal_account_email ?? "",
    cabAccountEmail: portal.cab_account_email ?? "",
    portalDossierStatus: portal.statut_dossier ?? "",
    extractionFailed: flag(portal.extraction_failed),
    portalErrorType: portal.error_type ?? null,

    isUber20Deal,
    isUberProspect: amount === 20 && stageUpper.includes("ATTENTE"),
    dateDossierRecu: toIsoDate(deal.Date_Dossier_re_u),
    dateTestSelection: toIsoDate(deal.Date_test_selection),
    compteUber,
    eligibleUber,
    uberEligibleAccount: isUber20Deal && compteUber && eligibleUber,

    sessionAssigned: deal.Session !== undefined && deal.Session !== null && deal.Session !== "",
    preferenceHoraire: deal.Preference_horaire ?? null,
    refreshSessionAvailable: flag(input.session?.refresh_session_available),
    trainingMissedExamImminent: flag(input.consistency?.training_missed_exam_imminent),
    dossierNotReceived: flag(input.consistency?.dossier_not_received),
  };

  return Object.freeze({
    ...base,
    uberCase: determineUberCase(base),
    examDateCase: determineExamDateCase(base),
    canModifyExamDate: canModifyExamDate(base),
  });
}
