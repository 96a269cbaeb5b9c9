/**
 * split_text - breaks `text` into `text_parts` bounded by word count
 */

import { z } from 'zod';
import { splitByWordCount } from '../../chunking/WordCountSplitter.js';
import type { NewsDocument, TextPart } from '../../models/Document.js';
import type { StageContext } from '../../pipeline/types.js';
import { BaseProcessor } from './BaseProcessor.js';

export const splitTextOptionsSchema = z
  .object({
    min_word_limit_to_split: z.number().int().positive().default(600),
    previous_part_overlap: z.number().int().nonnegative().default(50),
    overwrite: z.boolean().default(false),
    /** Paragraphs matching this expression always begin a new part */
    split_pattern: z.string().optional(),
  })
  .passthrough();

/**
 * Split a document's text into parts, unless it already has parts and `overwrite` is false
 *
 * @returns true if `text_parts` was (re)built
 */
export function splitDocumentText(
  doc: NewsDocument,
  maxWords: number,
  overlap: number,
  overwrite: boolean,
  splitPattern?: RegExp
): boolean {
  if (doc.text_parts.length > 0 && !overwrite) {
    return false;
  }
  if (doc.text.trim().length === 0) {
    return false;
  }

  const parts: TextPart[] = [];
  for (const partText of splitByWordCount(doc.text, { maxWords, overlap, splitPattern })) {
    if (partText.trim().length > 0) {
      parts.push({ id: String(parts.length + 1), text: partText, insights: [] });
    }
  }
  doc.text_parts = parts;
  return true;
}

export class SplitTextProcessor extends BaseProcessor<typeof splitTextOptionsSchema> {
  private readonly splitPattern?: RegExp;

  constructor(ctx: StageContext) {
    super(ctx, splitTextOptionsSchema);
    if (this.options.split_pattern) {
      this.splitPattern = new RegExp(this.options.split_pattern, 'i');
    }
  }

  protected async processDocument(doc: NewsDocument): Promise<void> {
    const split = splitDocumentText(
      doc,
      this.options.min_word_limit_to_split,
      this.options.previous_part_overlap,
      this.options.overwrite,
      this.splitPattern
    );
    if (split) {
      this.logger.debug({ url: doc.url, parts: doc.text_parts.length }, 'Split document text');
    }
  }
}
