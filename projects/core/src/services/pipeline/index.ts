/**
 * Pipeline service exports.
 */

// Main pipeline
export {
  SummarizationPipeline,
  createSummarizationPipeline,
  type SummarizationPipelineDependencies,
  type SummarizationPipelineOptions,
  type RunOptions,
} from "./SummarizationPipeline.js";

// Session
export {
  StreamSession,
  createStreamSession,
  InvalidTransitionError,
  type StreamSessionOptions,
  type SessionInfo,
  type SessionStateChange,
  type SessionStateListener,
} from "./StreamSession.js";

// Stages
export { transformEach, fromArray, type UnitTransform, type TransformedUnit } from "./transformEach.js";
export { AsyncQueue } from "./AsyncQueue.js";

// Types
export {
  PIPELINE_PHASES,
  type PipelinePhase,
  type SessionState,
  type OutputSegment,
  type OutputSegmentKind,
  type SummarizeRequest,
  type PipelineConfig,
  DEFAULT_PIPELINE_CONFIG,
  TRANSLATION_LABEL,
  GENERATION_SEPARATOR,
  formatTranslatedSentence,
  formatUnit,
  generateId,
  getTimestamp,
} from "./PipelineTypes.js";
