/**
 * Error codes for pipeline orchestration errors.
 * Using unique string codes for programmatic identification.
 */
export const PipelineErrorCode = {
  INVALID_INPUT: "PIPELINE_001",
  CONFIGURATION: "PIPELINE_002",
  STAGE_FAILED: "PIPELINE_003",
  CANCELLED: "PIPELINE_004",
} as const;

export type PipelineErrorCodeType =
  (typeof PipelineErrorCode)[keyof typeof PipelineErrorCode];

/**
 * Base error class for pipeline errors.
 */
export class PipelineError extends Error {
  readonly code: PipelineErrorCodeType;

  constructor(
    code: PipelineErrorCodeType,
    message: string,
    public readonly context?: Readonly<Record<string, unknown>>,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.code = code;
    this.name = "PipelineError";
  }
}

/**
 * Error thrown when a request field is missing or malformed.
 * Raised before any output is produced.
 */
export class ValidationError extends PipelineError {
  constructor(
    public readonly field: string,
    reason: string
  ) {
    super(PipelineErrorCode.INVALID_INPUT, reason, { field, reason });
    this.name = "ValidationError";
  }
}

/**
 * Error thrown for invalid static configuration: parameter ranges,
 * an empty stop marker, unknown backends.
 */
export class ConfigurationError extends PipelineError {
  constructor(
    public readonly setting: string,
    reason: string
  ) {
    super(
      PipelineErrorCode.CONFIGURATION,
      `Invalid ${setting}: ${reason}`,
      { setting, reason }
    );
    this.name = "ConfigurationError";
  }
}

/**
 * Pipeline stage identifiers used in failure reports.
 */
export type FailedStage = "input-translation" | "generation" | "back-translation";

/**
 * Error thrown when a pipeline phase fails. Segments emitted before the
 * failure are not retracted.
 */
export class StageFailedError extends PipelineError {
  constructor(
    public readonly stage: FailedStage,
    reason: string,
    cause?: unknown
  ) {
    super(
      PipelineErrorCode.STAGE_FAILED,
      `Pipeline stage '${stage}' failed: ${reason}`,
      { stage, reason },
      cause === undefined ? undefined : { cause }
    );
    this.name = "StageFailedError";
  }
}

/**
 * Recorded on a session whose consumer stopped pulling before completion.
 */
export class PipelineCancelledError extends PipelineError {
  constructor(sessionId: string) {
    super(
      PipelineErrorCode.CANCELLED,
      `Session ${sessionId} was cancelled by its consumer`,
      { sessionId }
    );
    this.name = "PipelineCancelledError";
  }
}
