import type { LanguagePair } from "../interfaces/ITranslator.js";

/**
 * Error codes for translation errors.
 */
export const TranslationErrorCode = {
  NOT_INITIALIZED: "TRANSLATION_001",
  TRANSLATION_FAILED: "TRANSLATION_002",
  UNSUPPORTED_LANGUAGE: "TRANSLATION_003",
} as const;

export type TranslationErrorCodeType =
  (typeof TranslationErrorCode)[keyof typeof TranslationErrorCode];

/** Which side of a translation a language tag was given for. */
export type LanguageRole = "source" | "target";

export class TranslationError extends Error {
  readonly code: TranslationErrorCodeType;

  constructor(
    code: TranslationErrorCodeType,
    message: string,
    public readonly context?: Readonly<Record<string, unknown>>,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.code = code;
    this.name = "TranslationError";
  }
}

export function isTranslationError(value: unknown): value is TranslationError {
  return value instanceof TranslationError;
}

export class TranslatorNotInitializedError extends TranslationError {
  constructor(serviceName: string) {
    super(
      TranslationErrorCode.NOT_INITIALIZED,
      `${serviceName} not initialized. Call initialize() first.`,
      { serviceName }
    );
    this.name = "TranslatorNotInitializedError";
  }
}

/**
 * The model ran but produced nothing usable, or threw. The source text is
 * not recorded.
 */
export class TranslationFailedError extends TranslationError {
  constructor(
    reason: string,
    public readonly pair?: LanguagePair,
    cause?: unknown
  ) {
    super(
      TranslationErrorCode.TRANSLATION_FAILED,
      `Translation failed: ${reason}`,
      { reason, ...pair },
      cause === undefined ? undefined : { cause }
    );
    this.name = "TranslationFailedError";
  }
}

export class UnsupportedLanguageError extends TranslationError {
  constructor(
    public readonly language: string,
    public readonly role: LanguageRole,
    public readonly supportedLanguages: readonly string[]
  ) {
    super(
      TranslationErrorCode.UNSUPPORTED_LANGUAGE,
      `Unsupported ${role} language: ${language}. Supported languages: ${supportedLanguages.join(", ")}`,
      { language, role }
    );
    this.name = "UnsupportedLanguageError";
  }
}
