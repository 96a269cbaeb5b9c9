/**
 * Plain-text helpers shared by retrievers and processors
 */

const HAS_LETTER = /[A-Za-z]/;

/**
 * Collapse all runs of whitespace into single spaces and trim
 */
export function cleanText(text: string): string {
  return text.split(/\s+/).filter((token) => token.length > 0).join(' ');
}

/**
 * Whitespace-separated tokens of a text
 */
export function tokenize(text: string): string[] {
  return text.split(/\s+/).filter((token) => token.length > 0);
}

/**
 * Count words: whitespace-separated tokens that contain at least one letter
 *
 * @example
 * ```typescript
 * wordCount('The quick brown fox jumped over the 1 lazy dog.') // 9
 * ```
 */
export function wordCount(text: string): number {
  let count = 0;
  for (const token of tokenize(text)) {
    if (HAS_LETTER.test(token)) {
      count++;
    }
  }
  return count;
}

/**
 * Last `n` whitespace-separated tokens of a text, in order
 */
export function getLastNWords(text: string, n: number): string[] {
  if (n <= 0) return [];
  const tokens = tokenize(text);
  return tokens.slice(Math.max(0, tokens.length - n));
}
