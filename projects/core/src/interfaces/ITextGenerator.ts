import type { SamplingParameters } from "../services/generation/GenerationParameters.js";

export interface GenerateOptions {
  /** Upper bound on newly generated tokens */
  readonly maxTokens: number;
  /** Only the fields that were explicitly set; never filled with defaults */
  readonly sampling: SamplingParameters;
  /** Aborting ends the fragment stream and stops inference where possible */
  readonly signal?: AbortSignal;
}

export interface ITextGenerator {
  initialize(): Promise<void>;
  /**
   * Streams generated text fragment by fragment.
   *
   * Breaking out of the iteration stops inference where the backend allows it.
   * Fragments may be empty.
   */
  generate(prompt: string, options: Readonly<GenerateOptions>): AsyncIterable<string>;
  /** Non-streaming variant returning the whole completion at once. */
  complete(prompt: string, options: Readonly<GenerateOptions>): Promise<string>;
  dispose(): Promise<void>;
  readonly isReady: boolean;
  /** Short backend identifier for logs and errors */
  readonly backend: string;
}
