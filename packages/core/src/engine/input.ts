import type { z } from "zod";
import {
  ConsistencyDataSchema,
  DealRecordSchema,
  IntentContextSchema,
  LinkingResultSchema,
  PortalRecordSchema,
  SessionDataSchema,
  ThreadMessageSchema,
  TriageResultSchema,
  type DetectionInput,
  type ThreadMessage,
} from "@exam-desk/schemas";

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parses one input record field by field: a field that fails its schema is
 * dropped and the rest is kept. A value that is not an object at all becomes
 * an empty record.
 */
export function parseRecord<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const fields: Record<string, unknown> = isPlainObject(value) ? { ...value } : {};

  for (;;) {
    const result = schema.safeParse(fields);
    if (result.success) return result.data;

    const invalid = new Set<string>();
    for (const issue of result.error.issues) {
      const key = issue.path[0];
      if (typeof key === "string" && key in fields) invalid.add(key);
    }
    // Every record schema accepts `{}`.
    if (invalid.size === 0) return schema.parse({});
    for (const key of invalid) delete fields[key];
  }
}

function parseThreads(value: unknown): ThreadMessage[] {
  if (!Array.isArray(value)) return [];
  const threads: ThreadMessage[] = [];
  for (const message of value) {
    const result = ThreadMessageSchema.safeParse(message);
    if (result.success) threads.push(result.data);
  }
  return threads;
}

/**
 * Copies the collaborators' records into well-typed values. Records arrive
 * from the CRM and the portal extractor as loose JSON, so their declared type
 * is not trusted: malformed fields read as missing.
 */
export function normalizeDetectionInput(input: DetectionInput): DetectionInput {
  const raw: Record<string, unknown> = isPlainObject(input) ? input : {};
  const rawTriage = isPlainObject(raw["triage"]) ? raw["triage"] : {};

  return {
    deal: parseRecord(DealRecordSchema, raw["deal"]),
    portal: parseRecord(PortalRecordSchema, raw["portal"]),
    triage: parseRecord(TriageResultSchema, {
      ...rawTriage,
      intent_context:
        rawTriage["intent_context"] == null
          ? rawTriage["intent_context"]
          : parseRecord(IntentContextSchema, rawTriage["intent_context"]),
    }),
    linking: parseRecord(LinkingResultSchema, raw["linking"]),
    threads: parseThreads(raw["threads"]),
    session: parseRecord(SessionDataSchema, raw["session"]),
    consistency: parseRecord(ConsistencyDataSchema, raw["consistency"]),
  };
}
