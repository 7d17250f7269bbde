/**
 * FILE PURPOSE: Sentence and word splitting for the chunker
 * WHY: Chunks break on sentence ends first and on words only as a fallback.
 *      The splitter is punctuation-based and does not know about
 *      abbreviations, so "Sec. 4" splits like any other sentence end.
 */

const SENTENCE_BOUNDARY_RE = /(?<=[.!?])\s+/;

/** Split at `.`, `!` or `?` followed by whitespace. Empty pieces are dropped. */
export function splitIntoSentences(text: string): string[] {
  const trimmed = text.trim();
  if (!trimmed) return [];
  return trimmed
    .split(SENTENCE_BOUNDARY_RE)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function splitIntoWords(text: string): string[] {
  return text.split(/\s+/).filter(Boolean);
}

/** Last `count` words of a chunk, used to seed the next one in overlap mode. */
export function trailingWords(text: string, count: number): string {
  if (count <= 0) return '';
  return splitIntoWords(text).slice(-count).join(' ');
}
