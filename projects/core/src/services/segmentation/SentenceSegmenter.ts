/**
 * Sentence splitting: sentence-final punctuation followed by whitespace,
 * or a run of newlines. Includes the full-width CJK terminators.
 */
const SENTENCE_SPLITTER = /(?<=[.!?。！？])\s+|\n+/;

/**
 * Splits text into trimmed, non-empty sentences in their original order.
 * Never throws; empty or whitespace-only input gives an empty array.
 */
export function segmentSentences(text: string): string[] {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return [];
  }

  return trimmed
    .split(SENTENCE_SPLITTER)
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}
