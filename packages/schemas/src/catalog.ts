import { z } from "zod";

export const SeveritySchema = z.enum(["BLOCKING", "WARNING", "INFO"]);
export type Severity = z.infer<typeof SeveritySchema>;

export const UberCaseSchema = z.enum(["PROSPECT", "NOT_UBER", "A", "B", "D", "E", "ELIGIBLE"]);
export type UberCase = z.infer<typeof UberCaseSchema>;

export const ExamDateCaseSchema = z.union([
  z.literal(1), z.literal(2), z.literal(3), z.literal(4), z.literal(5),
  z.literal(6), z.literal(7), z.literal(8), z.literal(9), z.literal(10),
]);
export type ExamDateCase = z.infer<typeof ExamDateCaseSchema>;

export const WorkflowActionSchema = z.enum([
  "RESPOND",
  "RESPOND_AND_UPDATE",
  "STOP",
  "ROUTE",
  "ESCALATE",
  "REQUEST_CLARIFICATION",
]);
export type WorkflowAction = z.infer<typeof WorkflowActionSchema>;

/**
 * Scalar facts of the evaluation context that a catalog `field` rule may
 * reference. Kept closed so a typo in the catalog fails at load time.
 */
export const ContextFieldSchema = z.enum([
  "evalbox",
  "dateExamen",
  "dateCloture",
  "departement",
  "amount",
  "stage",
  "dealId",
  "numDossier",
  "today",
  "daysUntilExam",
  "cloturePassed",
  "dateExamenPassed",
  "dateExamenFuture",
  "triageAction",
  "primaryIntent",
  "secondaryIntents",
  "mentionsForceMajeure",
  "forceMajeureType",
  "isForceMajeureDeath",
  "isForceMajeureMedical",
  "isForceMajeureAccident",
  "isForceMajeureChildcare",
  "isForceMajeureOther",
  "hasDuplicateUberOffer",
  "needsClarification",
  "compteExiste",
  "connectionTestSuccess",
  "shouldRespondToCandidate",
  "duplicatePaymentAlert",
  "personalAccountWarning",
  "extractionFailed",
  "portalErrorType",
  "portalDossierStatus",
  "isUber20Deal",
  "isUberProspect",
  "dateDossierRecu",
  "dateTestSelection",
  "compteUber",
  "eligibleUber",
  "sessionAssigned",
  "preferenceHoraire",
  "refreshSessionAvailable",
  "trainingMissedExamImminent",
  "dossierNotReceived",
  "uberCase",
  "examDateCase",
  "canModifyExamDate",
  "uberEligibleAccount",
  "hasExamDate",
]);
export type ContextField = z.infer<typeof ContextFieldSchema>;

export const ConditionOperatorSchema = z.enum([
  "eq", "neq", "in", "not_in", "truthy", "falsy",
  "gt", "gte", "lt", "lte", "contains",
]);
export type ConditionOperator = z.infer<typeof ConditionOperatorSchema>;

const ScalarValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const FieldConditionSchema = z.object({
  field: ContextFieldSchema,
  operator: ConditionOperatorSchema,
  value: z.union([ScalarValueSchema, z.array(z.union([z.string(), z.number()]))]).optional(),
});
export type FieldCondition = z.infer<typeof FieldConditionSchema>;

export type DetectionRule =
  | { method: "field"; condition: FieldCondition }
  | { method: "all_of"; rules: DetectionRule[] }
  | { method: "any_of"; rules: DetectionRule[] }
  | { method: "not"; rule: DetectionRule }
  | { method: "uber_case"; case: UberCase }
  | { method: "exam_date_case"; case: ExamDateCase }
  | { method: "intent"; intent: string }
  | { method: "triage_action"; action: string }
  | { method: "fallback" }
  | { method: "unsupported"; declaredMethod: string };

export type DetectionMethod = DetectionRule["method"];

const KNOWN_METHODS: ReadonlySet<string> = new Set<DetectionMethod>([
  "field", "all_of", "any_of", "not", "uber_case", "exam_date_case",
  "intent", "triage_action", "fallback", "unsupported",
]);

// An entry whose method this engine does not know is kept as `unsupported`
// (never matches) instead of failing the whole catalog.
function markUnsupported(raw: unknown): unknown {
  if (typeof raw !== "object" || raw === null || !("method" in raw)) return raw;
  const method = raw.method;
  if (typeof method === "string" && !KNOWN_METHODS.has(method)) {
    return { method: "unsupported", declaredMethod: method };
  }
  return raw;
}

export const DetectionRuleSchema: z.ZodType<DetectionRule, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.preprocess(
    markUnsupported,
    z.discriminatedUnion("method", [
      z.object({ method: z.literal("field"), condition: FieldConditionSchema }),
      z.object({ method: z.literal("all_of"), rules: z.array(DetectionRuleSchema).min(1) }),
      z.object({ method: z.literal("any_of"), rules: z.array(DetectionRuleSchema).min(1) }),
      z.object({ method: z.literal("not"), rule: DetectionRuleSchema }),
      z.object({ method: z.literal("uber_case"), case: UberCaseSchema }),
      z.object({ method: z.literal("exam_date_case"), case: ExamDateCaseSchema }),
      z.object({ method: z.literal("intent"), intent: z.string().min(1) }),
      z.object({ method: z.literal("triage_action"), action: z.string().min(1) }),
      z.object({ method: z.literal("fallback") }),
      z.object({ method: z.literal("unsupported"), declaredMethod: z.string() }),
    ]),
  ),
);

export const TemplateVariantSchema = z.object({
  when: DetectionRuleSchema,
  template: z.string().min(1),
});
export type TemplateVariant = z.infer<typeof TemplateVariantSchema>;

export const ResponseConfigSchema = z.object({
  template: z.string().min(1),
  template_variants: z.array(TemplateVariantSchema).default([]),
  blocks_required: z.array(z.string()).default([]),
  blocks_forbidden: z.array(z.string()).default([]),
  ai_section: z.string().optional(),
  ai_instructions: z.string().optional(),
});
export type ResponseConfig = z.infer<typeof ResponseConfigSchema>;

export const CrmUpdateMethodSchema = z.enum(["extract_session_choice", "extract_date_choice"]);
export type CrmUpdateMethod = z.infer<typeof CrmUpdateMethodSchema>;

export const CrmUpdateRuleSchema = z.object({
  method: CrmUpdateMethodSchema,
});
export type CrmUpdateRule = z.infer<typeof CrmUpdateRuleSchema>;

export const StateDefinitionSchema = z.object({
  id: z.string().min(1),
  priority: z.number().int(),
  category: z.string().min(1),
  severity: SeveritySchema,
  description: z.string().default(""),
  detection: DetectionRuleSchema,
  workflow: z.object({ action: WorkflowActionSchema }).default({ action: "RESPOND" }),
  response: ResponseConfigSchema,
  crm_updates: CrmUpdateRuleSchema.optional(),
});
export type StateDefinition = z.infer<typeof StateDefinitionSchema>;

export const CatalogConfigSchema = z.object({
  forbidden_terms: z.array(z.string().min(1)).default([]),
  required_blocks_global: z.array(z.string().min(1)).default([]),
});
export type CatalogConfig = z.infer<typeof CatalogConfigSchema>;

export const CatalogDocumentSchema = z
  .object({
    version: z.string().min(1),
    config: CatalogConfigSchema.default({}),
    states: z.record(z.string().min(1), StateDefinitionSchema),
  })
  .superRefine((doc, ctx) => {
    const names = Object.keys(doc.states);
    if (names.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["states"],
        message: "catalog must define at least one state",
      });
    }
    const seen = new Map<string, string>();
    for (const name of names) {
      const state = doc.states[name];
      if (!state) continue;
      const previous = seen.get(state.id);
      if (previous) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["states", name, "id"],
          message: `duplicate state id "${state.id}" (also used by ${previous})`,
        });
      }
      seen.set(state.id, name);
    }
  });
export type CatalogDocument = z.infer<typeof CatalogDocumentSchema>;
