/**
 * Processors that forward documents unchanged (vector store, search index submission, data prep)
 */

import { z } from 'zod';
import type { NewsDocument } from '../../models/Document.js';
import type { StageContext } from '../../pipeline/types.js';
import { BaseProcessor } from './BaseProcessor.js';

const passThroughOptionsSchema = z.object({}).passthrough();

export class PassThroughProcessor extends BaseProcessor<typeof passThroughOptionsSchema> {
  constructor(ctx: StageContext) {
    super(ctx, passThroughOptionsSchema);
  }

  protected async processDocument(doc: NewsDocument): Promise<void> {
    this.logger.trace({ url: doc.url }, 'Forwarding document unchanged');
  }
}
