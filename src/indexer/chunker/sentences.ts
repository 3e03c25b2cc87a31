/**
 * Sentence splitting for lesson text.
 *
 * A boundary is `.`, `!` or `?` followed by whitespace and an uppercase
 * letter. Initialisms such as "e.g." and titles such as "Dr." are not
 * boundaries.
 */

const SENTENCE_BOUNDARY =
  /(?<=[.!?])(?<!\b[A-Za-z]\.[A-Za-z]\.)(?<!\b(?:Mr|Mrs|Ms|Dr|Prof|Sr|Jr|St|vs)\.)\s+(?=[A-Z])/;

/**
 * Split text into trimmed, non-empty sentences. Whitespace runs (newlines
 * included) collapse to single spaces first.
 */
export function splitSentences(text: string): string[] {
  const normalized = text.replace(/\s+/g, ' ').trim();
  if (!normalized) {
    return [];
  }
  return normalized
    .split(SENTENCE_BOUNDARY)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}
