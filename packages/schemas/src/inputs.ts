import { z } from "zod";

// Inputs gathered by the ticket pipeline before detection. Every field is
// optional and unknown keys are kept: incomplete records must never stop
// detection, they only make the matching predicates false.

export const CrmLookupSchema = z
  .object({
    id: z.string().optional(),
    name: z.string().optional(),
    Date_Cloture_Inscription: z.string().nullish(),
  })
  .passthrough();
export type CrmLookup = z.infer<typeof CrmLookupSchema>;

const LookupOrStringSchema = z.union([z.string(), CrmLookupSchema]).nullish();

export const DealRecordSchema = z
  .object({
    Evalbox: z.string().nullish(),
    Amount: z.number().nullish(),
    Stage: z.string().nullish(),
    Date_examen_VTC: LookupOrStringSchema,
    Date_Cloture_Inscription: z.string().nullish(),
    CMA_de_depot: LookupOrStringSchema,
    Date_Dossier_re_u: z.string().nullish(),
    Date_test_selection: z.string().nullish(),
    Compte_Uber: z.boolean().nullish(),
    ELIGIBLE: z.boolean().nullish(),
    Session: LookupOrStringSchema,
    Preference_horaire: z.string().nullish(),
    Email: z.string().nullish(),
    Deal_Name: z.string().nullish(),
    First_Name: z.string().nullish(),
    Last_Name: z.string().nullish(),
  })
  .passthrough();
export type DealRecord = z.infer<typeof DealRecordSchema>;

export const PortalErrorTypeSchema = z.enum(["technical", "credentials"]);
export type PortalErrorType = z.infer<typeof PortalErrorTypeSchema>;

export const PortalRecordSchema = z
  .object({
    compte_existe: z.boolean().nullish(),
    connection_test_success: z.boolean().nullish(),
    should_respond_to_candidate: z.boolean().nullish(),
    extraction_failed: z.boolean().nullish(),
    error_type: PortalErrorTypeSchema.nullish(),
    statut_dossier: z.string().nullish(),
    num_dossier: z.string().nullish(),
    identifiant: z.string().nullish(),
    duplicate_payment_alert: z.boolean().nullish(),
    // The extractor sometimes stores a description here instead of a boolean.
    personal_account_warning: z.union([z.boolean(), z.string()]).nullish(),
    potential_personal_account: z.union([z.boolean(), z.string()]).nullish(),
    personal_account_email: z.string().nullish(),
    cab_account_email: z.string().nullish(),
  })
  .passthrough();
export type PortalRecord = z.infer<typeof PortalRecordSchema>;

export const ForceMajeureTypeSchema = z.enum(["death", "medical", "accident", "childcare", "other"]);
export type ForceMajeureType = z.infer<typeof ForceMajeureTypeSchema>;

export const IntentContextSchema = z
  .object({
    mentions_force_majeure: z.boolean().nullish(),
    force_majeure_type: ForceMajeureTypeSchema.nullish(),
    force_majeure_details: z.string().nullish(),
  })
  .passthrough();
export type IntentContext = z.infer<typeof IntentContextSchema>;

export const TriageResultSchema = z
  .object({
    action: z.string().nullish(),
    primary_intent: z.string().nullish(),
    /** Legacy alias of primary_intent, still emitted by older triage runs. */
    detected_intent: z.string().nullish(),
    secondary_intents: z.array(z.string()).nullish(),
    intent_context: IntentContextSchema.nullish(),
  })
  .passthrough();
export type TriageResult = z.infer<typeof TriageResultSchema>;

export const LinkingResultSchema = z
  .object({
    deal_id: z.string().nullish(),
    has_duplicate_uber_offer: z.boolean().nullish(),
    needs_clarification: z.boolean().nullish(),
  })
  .passthrough();
export type LinkingResult = z.infer<typeof LinkingResultSchema>;

export const ThreadMessageSchema = z.object({
  direction: z.enum(["in", "out"]),
  text: z.string(),
});
export type ThreadMessage = z.infer<typeof ThreadMessageSchema>;

export const SessionDataSchema = z
  .object({
    refresh_session_available: z.boolean().nullish(),
  })
  .passthrough();
export type SessionData = z.infer<typeof SessionDataSchema>;

export const ConsistencyDataSchema = z
  .object({
    training_missed_exam_imminent: z.boolean().nullish(),
    dossier_not_received: z.boolean().nullish(),
  })
  .passthrough();
export type ConsistencyData = z.infer<typeof ConsistencyDataSchema>;

export const DetectionInputSchema = z.object({
  deal: DealRecordSchema,
  portal: PortalRecordSchema,
  triage: TriageResultSchema,
  linking: LinkingResultSchema,
  threads: z.array(ThreadMessageSchema).optional(),
  session: SessionDataSchema.optional(),
  consistency: ConsistencyDataSchema.optional(),
});
export type DetectionInput = z.infer<typeof DetectionInputSchema>;
