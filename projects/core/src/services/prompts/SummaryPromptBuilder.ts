/**
 * Builds the generation prompt from the translated input text.
 */
export type PromptBuilder = (text: string) => string;

export interface SummaryPromptOptions {
  /** Number of bullets to ask for. Default: 5 */
  readonly bulletCount?: number;
  /** Phrase the model must print after the last bullet. Default: "END SUMMARY" */
  readonly stopPhrase?: string;
  /** Language the bullets will be translated into, named in the style guidance. Default: "Hebrew" */
  readonly downstreamLanguageName?: string;
}

export const DEFAULT_BULLET_COUNT = 5;

/**
 * Summarization prompt: exactly N bullets starting with U+2022, one per line,
 * then the stop phrase.
 */
export function createSummaryPromptBuilder(
  options?: Readonly<SummaryPromptOptions>
): PromptBuilder {
  const bulletCount = options?.bulletCount ?? DEFAULT_BULLET_COUNT;
  const stopPhrase = options?.stopPhrase ?? "END SUMMARY";
  const languageName = options?.downstreamLanguageName ?? "Hebrew";

  return (text: string): string =>
    [
      "You are a professional English writer and summarizer.",
      `Summarize the following text into exactly ${bulletCount} concise, natural bullet points.`,
      "- Focus on meaning and intention rather than literal phrasing.",
      `- Use clear, complete sentences suitable for direct translation to ${languageName}. Avoid idioms or complex phrasing.`,
      "- Each bullet should stand alone as a complete, human-readable sentence.",
      "- Use simple, fluent English and vary structure.",
      "- Start each bullet with '•' (U+2022) and place each bullet on a new line.",
      `- Output ONLY the ${bulletCount} bullets, then the phrase '${stopPhrase}'.`,
      "- Do not repeat or restate information.",
      "",
      "Text:",
      text,
      "",
      "Output:",
      "",
    ].join("\n");
}
