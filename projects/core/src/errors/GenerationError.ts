/**
 * Error codes for text generation errors.
 */
export const GenerationErrorCode = {
  NOT_INITIALIZED: "GENERATION_001",
  SOURCE_FAILED: "GENERATION_002",
} as const;

export type GenerationErrorCodeType =
  (typeof GenerationErrorCode)[keyof typeof GenerationErrorCode];

/**
 * Base error class for generation source errors.
 */
export class GenerationError extends Error {
  readonly code: GenerationErrorCodeType;

  constructor(
    code: GenerationErrorCodeType,
    message: string,
    public readonly context?: Readonly<Record<string, unknown>>,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.code = code;
    this.name = "GenerationError";
  }
}

/**
 * Error thrown when a generator is used before initialization.
 */
export class GeneratorNotInitializedError extends GenerationError {
  constructor(serviceName: string) {
    super(
      GenerationErrorCode.NOT_INITIALIZED,
      `${serviceName} not initialized. Call initialize() first.`,
      { serviceName }
    );
    this.name = "GeneratorNotInitializedError";
  }
}

/**
 * Error thrown when the underlying generation call fails, either before the
 * first fragment or mid-stream.
 */
export class GenerationSourceError extends GenerationError {
  constructor(
    public readonly backend: string,
    reason: string,
    cause?: unknown
  ) {
    super(
      GenerationErrorCode.SOURCE_FAILED,
      `Generation via ${backend} failed: ${reason}`,
      { backend, reason },
      cause === undefined ? undefined : { cause }
    );
    this.name = "GenerationSourceError";
  }
}
