/**
 * WordCountSplitter - Split document text into parts bounded by word count
 *
 * Splits by paragraph (blank line) first and merges adjacent paragraphs greedily while the
 * part stays within the word budget. Each part after the first is prefixed with the tail of
 * the previous part, so that context carries over between parts.
 */

import { getLastNWords, wordCount } from '../utils/text.js';

/**
 * Splitter configuration
 */
export interface SplitterConfig {
  /** Maximum words per part, not counting the overlap prefix */
  maxWords: number;
  /** Words of the previous part repeated at the start of the next one */
  overlap: number;
  /** Paragraphs matching this pattern always start a new part (annexures, appendices, ...) */
  splitPattern?: RegExp;
}

/**
 * Collapse whitespace-only lines so that blank-line paragraph breaks are uniform
 */
export function normalizeParagraphBreaks(text: string): string {
  return text.replace(/\r\n?/g, '\n').replace(/\n[^\S\n]*\n\s*/g, '\n\n');
}

export function splitParagraphs(text: string): string[] {
  return normalizeParagraphBreaks(text)
    .split(/\n{2,}/)
    .map((paragraph) => paragraph.trim())
    .filter((paragraph) => paragraph.length > 0);
}

/**
 * Split text into part texts
 *
 * A paragraph larger than `maxWords` becomes a part of its own, so the word count of a part is
 * bounded by `maxWords + overlap + longest paragraph`.
 */
export function splitByWordCount(text: string, config: SplitterConfig): string[] {
  const bodies: string[][] = [];
  let current: string[] = [];
  let currentWords = 0;

  for (const paragraph of splitParagraphs(text)) {
    const paragraphWords = wordCount(paragraph);
    const forcedBreak = config.splitPattern !== undefined && config.splitPattern.test(paragraph);

    if (current.length > 0 && (forcedBreak || currentWords + paragraphWords > config.maxWords)) {
      bodies.push(current);
      current = [];
      currentWords = 0;
    }
    current.push(paragraph);
    currentWords += paragraphWords;
  }
  if (current.length > 0) {
    bodies.push(current);
  }

  const parts: string[] = [];
  for (const body of bodies) {
    const bodyText = body.join('\n\n');
    const previous = parts[parts.length - 1];
    if (previous === undefined || config.overlap <= 0) {
      parts.push(bodyText);
      continue;
    }

    const k = Math.min(config.overlap, wordCount(previous));
    const tail = getLastNWords(previous, k);
    parts.push(tail.length > 0 ? `${tail.join(' ')}\n\n${bodyText}` : bodyText);
  }
  return parts;
}
