/**
 * mod_classify - ensures the standard classification keys are present
 */

import { z } from 'zod';
import { CLASSIFY_FLAGS, hasDataProcFlag } from '../../models/Document.js';
import type { NewsDocument } from '../../models/Document.js';
import type { StageContext } from '../../pipeline/types.js';
import { BaseProcessor } from './BaseProcessor.js';

export const DEFAULT_CLASSIFICATION_KEYS = [
  'channel',
  'customer_type',
  'function',
  'market_type',
  'occupation',
  'product_type',
] as const;

export const UNCLASSIFIED = 'other';

const classifyOptionsSchema = z.object({}).passthrough();

export class ClassifyProcessor extends BaseProcessor<typeof classifyOptionsSchema> {
  constructor(ctx: StageContext) {
    super(ctx, classifyOptionsSchema);
  }

  protected async processDocument(doc: NewsDocument): Promise<void> {
    if (!hasDataProcFlag(doc, CLASSIFY_FLAGS)) {
      return;
    }
    for (const key of DEFAULT_CLASSIFICATION_KEYS) {
      if (!doc.classification[key]) {
        doc.classification[key] = UNCLASSIFIED;
      }
    }
  }
}
