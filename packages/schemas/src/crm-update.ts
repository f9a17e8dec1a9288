import { z } from "zod";

/** CRM field API names the engine is allowed to write. */
export const CRM_FIELDS = {
  preferenceHoraire: "Preference_horaire",
  session: "Session",
  examDate: "Date_examen_VTC",
} as const;
export type CrmField = (typeof CRM_FIELDS)[keyof typeof CRM_FIELDS];

export const SessionTypeSchema = z.enum(["jour", "soir"]);
export type SessionType = z.infer<typeof SessionTypeSchema>;

/** A training session that was actually offered to the candidate. */
export const ProposedSessionSchema = z.object({
  id: z.string().min(1),
  sessionType: SessionTypeSchema,
  name: z.string().optional(),
  dateDebut: z.string().optional(),
  dateFin: z.string().optional(),
});
export type ProposedSession = z.infer<typeof ProposedSessionSchema>;

/** An exam date record that was actually offered to the candidate. */
export const ProposedExamDateSchema = z.object({
  id: z.string().min(1),
  dateExamen: z.string(),
  dateClotureInscription: z.string().optional(),
  departement: z.string().optional(),
});
export type ProposedExamDate = z.infer<typeof ProposedExamDateSchema>;

export const CrmUpdateResultSchema = z.object({
  updatesApplied: z.record(z.string(), z.string()),
  updatesBlocked: z.record(z.string(), z.string()),
  updatesSkipped: z.record(z.string(), z.string()),
  errors: z.array(z.string()),
});
export type CrmUpdateResult = z.infer<typeof CrmUpdateResultSchema>;
