import { z } from "zod";

export const AlertTypeSchema = z.enum([
  "uber_case_d",
  "uber_case_e",
  "personal_account",
  "personal_account_warning",
]);
export type AlertType = z.infer<typeof AlertTypeSchema>;

export const AlertPositionSchema = z.enum(["after_main", "before_signature"]);
export type AlertPosition = z.infer<typeof AlertPositionSchema>;

export const AlertSchema = z.object({
  type: AlertTypeSchema,
  id: z.string().optional(),
  title: z.string(),
  template: z.string().optional(),
  position: AlertPositionSchema,
  priority: z.enum(["warning", "info"]),
  personalAccountEmail: z.string().optional(),
  cabAccountEmail: z.string().optional(),
});
export type Alert = z.infer<typeof AlertSchema>;
