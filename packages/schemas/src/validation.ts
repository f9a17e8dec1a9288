import { z } from "zod";

export const ValidationIssueTypeSchema = z.enum([
  "forbidden_term",
  "missing_block",
  "forbidden_block",
  "invented_date",
  "past_date",
  "wrong_identifier",
  "forbidden_amount",
  "unusual_amount",
  "too_short",
  "too_long",
  "missing_greeting",
  "missing_closing",
  "unresolved_placeholder",
]);
export type ValidationIssueType = z.infer<typeof ValidationIssueTypeSchema>;

export const ValidationSeveritySchema = z.enum(["error", "warning"]);
export type ValidationSeverity = z.infer<typeof ValidationSeveritySchema>;

export const ValidationIssueSchema = z.object({
  type: ValidationIssueTypeSchema,
  severity: ValidationSeveritySchema,
  message: z.string(),
  location: z.string().optional(),
});
export type ValidationIssue = z.infer<typeof ValidationIssueSchema>;

export const ValidationCheckSchema = z.enum([
  "forbidden_terms",
  "required_blocks",
  "forbidden_blocks",
  "dates_coherence",
  "identifiers_check",
  "amounts_check",
  "format_check",
]);
export type ValidationCheck = z.infer<typeof ValidationCheckSchema>;

export const ValidationResultSchema = z.object({
  valid: z.boolean(),
  errors: z.array(ValidationIssueSchema),
  warnings: z.array(ValidationIssueSchema),
  checksPassed: z.array(ValidationCheckSchema),
});
export type ValidationResult = z.infer<typeof ValidationResultSchema>;
