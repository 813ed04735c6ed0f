/**
 * Sentence segmentation
 */

export type SplitMethod = 'regex' | 'simple';

/**
 * Split after . ! or ? when whitespace and an uppercase letter follow.
 * The lookbehinds keep initialisms (U.S.) and title abbreviations (Mr.) intact.
 */
const SENTENCE_BOUNDARY = /(?<!\w\.\w.)(?<![A-Z][a-z]\.)(?<=[.?!])\s+(?=[A-Z])/;

const SIMPLE_BOUNDARY = /[.!?]+/;

export function isSplitMethod(value: unknown): value is SplitMethod {
  return value === 'regex' || value === 'simple';
}

/**
 * Collapse whitespace runs to single spaces
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function splitIntoSentences(text: string, method: SplitMethod = 'regex'): string[] {
  if (method === 'simple') {
    return text
      .split(SIMPLE_BOUNDARY)
      .map((part) => normalizeWhitespace(part))
      .filter((part) => part.length > 0);
  }

  const normalized = normalizeWhitespace(text);
  if (!normalized) {
    return [];
  }

  const sentences = normalized
    .split(SENTENCE_BOUNDARY)
    .map((part) => part.trim())
    .filter((part) => part.length > 0);

  return sentences.length > 0 ? sentences : [normalized];
}
