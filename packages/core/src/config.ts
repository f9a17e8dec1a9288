import { z } from "zod";
import { DEFAULT_CATALOG_PATH } from "./catalog/loader.js";
import { ConfigError } from "./errors.js";

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

export const EngineEnvSchema = z
  .object({
    STATE_CATALOG_PATH: z.string().min(1).default(DEFAULT_CATALOG_PATH),
    LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
    VALIDATOR_MIN_LENGTH: positiveInt(50),
    VALIDATOR_MAX_LENGTH: positiveInt(5000),
    VALIDATOR_EXTRA_FORBIDDEN_TERMS: z
      .string()
      .default("")
      .transform((raw) => raw.split(",").map((term) => term.trim()).filter((term) => term.length > 0)),
    CRM_AUTO_EXTRACT: z
      .enum(["true", "false"])
      .default("false")
      .transform((raw) => raw === "true"),
  })
  .refine((env) => env.VALIDATOR_MIN_LENGTH < env.VALIDATOR_MAX_LENGTH, {
    message: "VALIDATOR_MIN_LENGTH must be lower than VALIDATOR_MAX_LENGTH",
    path: ["VALIDATOR_MIN_LENGTH"],
  });

export interface EngineConfig {
  catalogPath: string;
  logLevel: z.infer<typeof EngineEnvSchema>["LOG_LEVEL"];
  validator: {
    minLength: number;
    maxLength: number;
    extraForbiddenTerms: string[];
  };
  crm: {
    autoExtract: boolean;
  };
}

/** Reads engine settings from the environment, failing with every problem listed. */
export function loadEngineConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
  const result = EngineEnvSchema.safeParse(env);
  if (!result.success) {
    const formatted = result.error.issues
      .map((i) => `  ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new ConfigError(`Invalid engine environment:\n${formatted}`);
  }

  const parsed = result.data;
  return {
    catalogPath: parsed.STATE_CATALOG_PATH,
    logLevel: parsed.LOG_LEVEL,
    validator: {
      minLength: parsed.VALIDATOR_MIN_LENGTH,
      maxLength: parsed.VALIDATOR_MAX_LENGTH,
      extraForbiddenTerms: parsed.VALIDATOR_EXTRA_FORBIDDEN_TERMS,
    },
    crm: { autoExtract: parsed.CRM_AUTO_EXTRACT },
  };
}
