/**
 * Generation parameters: range validation and unset-field handling.
 *
 * A field that was not provided stays `undefined` all the way down and is
 * never forwarded, so the backend's own default applies.
 */

import { z } from "zod";

import { ConfigurationError } from "../../errors/PipelineError.js";

export const MAX_TOKENS_RANGE = { min: 32, max: 1024 } as const;
export const DEFAULT_MAX_TOKENS = 200;

/**
 * Values backends fall back to when a field is unset. Informational: the
 * pipeline never fills these in itself.
 */
export const BACKEND_SAMPLING_DEFAULTS = {
  temperature: 0.3,
  topP: 0.9,
  topK: 40,
  repeatPenalty: 1.1,
} as const;

export const samplingParametersSchema = z
  .object({
    temperature: z.number().min(0).max(2),
    topP: z.number().min(0).max(1),
    topK: z.number().int().min(1).max(200),
    repeatPenalty: z.number().min(0.5).max(2),
  })
  .partial()
  .strict();

export type SamplingParameters = Readonly<z.infer<typeof samplingParametersSchema>>;

export const generationParametersSchema = samplingParametersSchema.extend({
  maxTokens: z
    .number()
    .int()
    .min(MAX_TOKENS_RANGE.min)
    .max(MAX_TOKENS_RANGE.max)
    .default(DEFAULT_MAX_TOKENS),
});

export type GenerationParametersInput = z.input<typeof generationParametersSchema>;

export interface GenerationParameters {
  readonly maxTokens: number;
  readonly sampling: SamplingParameters;
}

/**
 * Validates raw parameters against the fixed ranges.
 *
 * @throws ConfigurationError naming the first offending field
 */
export function parseGenerationParameters(
  input: Readonly<GenerationParametersInput> = {}
): GenerationParameters {
  const parsed = generationParametersSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join(".") || "generation parameters";
    throw new ConfigurationError(field, issue?.message ?? "invalid value");
  }

  const { maxTokens, ...sampling } = parsed.data;
  return { maxTokens, sampling: stripUnset(sampling) };
}

/**
 * Drops keys whose value is undefined so spreading the result into a backend
 * request never overrides a backend default.
 */
export function stripUnset(sampling: SamplingParameters): SamplingParameters {
  const result: {
    temperature?: number;
    topP?: number;
    topK?: number;
    repeatPenalty?: number;
  } = {};

  if (sampling.temperature !== undefined) result.temperature = sampling.temperature;
  if (sampling.topP !== undefined) result.topP = sampling.topP;
  if (sampling.topK !== undefined) result.topK = sampling.topK;
  if (sampling.repeatPenalty !== undefined) result.repeatPenalty = sampling.repeatPenalty;

  return result;
}

/**
 * Whether any sampling field was set. Backends decode greedily otherwise.
 */
export function hasSampling(sampling: SamplingParameters): boolean {
  return Object.keys(stripUnset(sampling)).length > 0;
}
