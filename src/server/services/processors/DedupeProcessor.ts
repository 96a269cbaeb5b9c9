/**
 * mod_dedupe - reports documents whose content repeats within a run
 */

import { z } from 'zod';
import type { NewsDocument } from '../../models/Document.js';
import type { StageContext } from '../../pipeline/types.js';
import { computeContentHash } from '../../utils/contentHash.js';
import { BaseProcessor } from './BaseProcessor.js';

const dedupeOptionsSchema = z.object({}).passthrough();

export class DedupeProcessor extends BaseProcessor<typeof dedupeOptionsSchema> {
  /** content hash -> URL of the first document seen with it */
  private readonly seen = new Map<string, string>();
  private duplicates = 0;

  constructor(ctx: StageContext) {
    super(ctx, dedupeOptionsSchema);
  }

  get duplicateCount(): number {
    return this.duplicates;
  }

  protected async processDocument(doc: NewsDocument): Promise<void> {
    if (doc.text.trim().length === 0) {
      return;
    }
    const hash = computeContentHash(doc.title, doc.text);
    const firstUrl = this.seen.get(hash);
    if (firstUrl === undefined) {
      this.seen.set(hash, doc.url);
      return;
    }
    this.duplicates++;
    this.logger.info({ url: doc.url, duplicateOf: firstUrl }, 'Duplicate document content');
  }

  protected async finish(): Promise<void> {
    this.logger.info({ duplicates: this.duplicates, unique: this.seen.size }, 'Duplicate check summary');
  }
}
