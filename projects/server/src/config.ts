import { config as loadDotenv } from "dotenv";
import { z } from "zod";

import {
  ConfigurationError,
  DEFAULT_BULLET_COUNT,
  DEFAULT_PIPELINE_CONFIG,
  LOG_LEVELS,
  type PipelineConfig,
} from "@lingua-digest/core";

const booleanFlag = z.enum(["true", "false"]).transform((value) => value === "true");

const port = z
  .string()
  .regex(/^\d+$/, "must be a number")
  .transform(Number)
  .pipe(z.number().int().max(65535));

export const envSchema = z.object({
  PORT: port.default("3000"),
  HOST: z.string().min(1).default("0.0.0.0"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),

  TRANSFORMERS_CACHE_DIR: z.string().min(1).optional(),
  MODEL_QUANTIZED: booleanFlag.default("true"),
  TRANSLATION_MODEL_ID: z.string().min(1).optional(),

  GENERATOR_BACKEND: z.enum(["transformers", "llama-server"]).default("transformers"),
  GENERATION_MODEL_ID: z.string().min(1).optional(),
  LLAMA_SERVER_URL: z.string().url().default("http://localhost:8080"),
  LLAMA_SERVER_MODEL: z.string().min(1).optional(),

  SOURCE_LANGUAGE: z.string().min(1).default(DEFAULT_PIPELINE_CONFIG.sourceLanguage),
  PIVOT_LANGUAGE: z.string().min(1).default(DEFAULT_PIPELINE_CONFIG.pivotLanguage),
  STOP_MARKER: z.string().min(1).default(DEFAULT_PIPELINE_CONFIG.stopMarker),
  SUMMARY_BULLET_COUNT: z
    .string()
    .regex(/^\d+$/, "must be a number")
    .transform(Number)
    .pipe(z.number().int().min(1).max(20))
    .default(String(DEFAULT_BULLET_COUNT)),
  STREAM_GENERATION: booleanFlag.default("true"),
});

export type Env = z.infer<typeof envSchema>;

export type GeneratorBackend = Env["GENERATOR_BACKEND"];

/**
 * Validates raw environment variables. Empty values count as unset.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function parseEnv(source: Readonly<Record<string, string | undefined>>): Env {
  const present = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== "")
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const errors = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError("environment", errors.join("\n"));
  }
  return parsed.data;
}

/**
 * Loads `.env` (if present) into process.env and validates it.
 */
export function loadEnv(): Env {
  loadDotenv();
  return parseEnv(process.env);
}

export function pipelineConfigFromEnv(env: Readonly<Env>): PipelineConfig {
  return {
    sourceLanguage: env.SOURCE_LANGUAGE,
    pivotLanguage: env.PIVOT_LANGUAGE,
    stopMarker: env.STOP_MARKER,
    streamGeneration: env.STREAM_GENERATION,
  };
}
