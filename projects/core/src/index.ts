/**
 * Public surface of the core package.
 */

// Interfaces
export type {
  ITranslator,
  LanguagePair,
  TranslationOptions,
  TranslationResult,
} from "./interfaces/ITranslator.js";
export type { ITextGenerator, GenerateOptions } from "./interfaces/ITextGenerator.js";

// Errors
export * from "./errors/TranslationError.js";
export * from "./errors/GenerationError.js";
export * from "./errors/PipelineError.js";

// Logging
export {
  LOG_LEVELS,
  createLogger,
  describeError,
  isLogLevel,
  silentLogger,
  type Logger,
  type LoggerOptions,
  type LogLevel,
  type LogSink,
} from "./logging/logger.js";

// Translation
export {
  NLLBTranslator,
  createNLLBTranslator,
  resolveLanguage,
  type NLLBTranslatorOptions,
} from "./services/translation/NLLBTranslator.js";

// Generation
export {
  TransformersTextGenerator,
  createTransformersTextGenerator,
  toTextGenerationKwargs,
  type TransformersTextGeneratorOptions,
} from "./services/generation/TransformersTextGenerator.js";
export {
  LlamaServerTextGenerator,
  createLlamaServerTextGenerator,
  parseCompletionEvent,
  toCompletionRequestBody,
  type LlamaServerTextGeneratorOptions,
  type CompletionRequestBody,
} from "./services/generation/LlamaServerTextGenerator.js";
export {
  StopMarkerAccumulator,
  accumulateFragments,
  endOfStreamChunk,
  type AccumulatorStep,
} from "./services/generation/StopMarkerAccumulator.js";
export {
  BACKEND_SAMPLING_DEFAULTS,
  DEFAULT_MAX_TOKENS,
  MAX_TOKENS_RANGE,
  generationParametersSchema,
  samplingParametersSchema,
  parseGenerationParameters,
  stripUnset,
  hasSampling,
  type GenerationParameters,
  type GenerationParametersInput,
  type SamplingParameters,
} from "./services/generation/GenerationParameters.js";

// Segmentation
export { segmentSentences } from "./services/segmentation/SentenceSegmenter.js";
export {
  BULLET_GLYPH,
  DEFAULT_UNIT_DELIMITERS,
  UnitSegmenter,
  segmentUnits,
  type UnitSegmenterOptions,
} from "./services/segmentation/UnitSegmenter.js";

// Prompts
export {
  DEFAULT_BULLET_COUNT,
  createSummaryPromptBuilder,
  type PromptBuilder,
  type SummaryPromptOptions,
} from "./services/prompts/SummaryPromptBuilder.js";

// Pipeline
export * from "./services/pipeline/index.js";
