/**
 * Base Processor Class
 *
 * Common loop for all data processing stages: receive, transform, forward. Every document
 * received is forwarded exactly once, whether or not its transformation succeeded.
 */

import type { Logger } from 'pino';
import type { z } from 'zod';
import { parseStageOptions } from '../../config/appConfig.js';
import type { AppConfig } from '../../config/appConfig.js';
import type { NewsDocument } from '../../models/Document.js';
import type { Receiver, Sender } from '../../pipeline/Channel.js';
import type { ProcessorStage, StageContext } from '../../pipeline/types.js';
import { ChannelClosedError, errorMessage } from '../../types/errors.js';

export abstract class BaseProcessor<S extends z.ZodTypeAny> implements ProcessorStage {
  readonly kind = 'processor' as const;
  readonly name: string;
  protected readonly config: AppConfig;
  protected readonly logger: Logger;
  protected readonly options: z.output<S>;

  /**
   * @throws ConfigurationError if the plugin options do not match the schema
   */
  constructor(ctx: StageContext, optionsSchema: S) {
    this.name = ctx.descriptor.name;
    this.config = ctx.config;
    this.logger = ctx.logger;
    this.options = parseStageOptions(ctx.descriptor.name, optionsSchema, ctx.descriptor.options);
  }

  /**
   * Transform one document in place. Errors are logged by the caller and the document is
   * forwarded with whatever enrichment was applied before the failure.
   */
  protected abstract processDocument(doc: NewsDocument): Promise<void>;

  /**
   * Called once after the input stream ends
   */
  protected finish(): Promise<void> {
    return Promise.resolve();
  }

  async run(rx: Receiver<NewsDocument>, tx: Sender<NewsDocument>): Promise<void> {
    this.logger.info('Processor started');
    let received = 0;
    let forwarded = 0;
    try {
      for await (const doc of rx) {
        received++;
        try {
          await this.processDocument(doc);
        } catch (error) {
          this.logger.error({ url: doc.url, error: errorMessage(error) }, 'Failed to process document');
        }
        if (this.forward(tx, doc)) {
          forwarded++;
        }
      }
      await this.finish();
    } finally {
      tx.close();
    }
    this.logger.info({ received, forwarded }, 'Processor completed');
  }

  /**
   * Send downstream. A closed downstream only happens while the pipeline is being torn down.
   */
  protected forward(tx: Sender<NewsDocument>, doc: NewsDocument): boolean {
    try {
      tx.send(doc);
      return true;
    } catch (error) {
      if (error instanceof ChannelClosedError) {
        this.logger.warn({ url: doc.url, channel: tx.channel }, 'Downstream closed, document dropped');
        return false;
      }
      throw error;
    }
  }
}
