/** Language tags as the caller gave them, e.g. `he` -> `en`. */
export interface LanguagePair {
  readonly sourceLanguage: string;
  readonly targetLanguage: string;
}

export type TranslationOptions = LanguagePair;

export interface TranslationResult extends LanguagePair {
  readonly text: string;
}

export interface ITranslator {
  initialize(): Promise<void>;
  /**
   * Translates one sentence or summary unit. Whitespace-only input resolves
   * to an empty result without touching the model.
   *
   * @throws UnsupportedLanguageError for language tags the model does not know
   * @throws TranslationFailedError when the model call itself fails
   */
  translate(text: string, options: Readonly<TranslationOptions>): Promise<TranslationResult>;
  /** Short tags accepted; a backend may take its native codes as well. */
  getSupportedLanguages(): readonly string[];
  dispose(): Promise<void>;
  readonly isReady: boolean;
}
