/**
 * Base Retriever Class
 *
 * Provides common functionality for all retrievers: options validation, the already-retrieved
 * URL set and sending into the intake channel.
 */

import type { Logger } from 'pino';
import type { z } from 'zod';
import { parseStageOptions } from '../../config/appConfig.js';
import type { AppConfig } from '../../config/appConfig.js';
import type { NewsDocument } from '../../models/Document.js';
import type { Sender } from '../../pipeline/Channel.js';
import type { CompletionLookup, RetrieverStage, StageContext } from '../../pipeline/types.js';
import { ChannelClosedError } from '../../types/errors.js';

export abstract class BaseRetriever<S extends z.ZodTypeAny> implements RetrieverStage {
    readonly kind = 'retriever' as const;
    readonly name: string;
    protected readonly config: AppConfig;
    protected readonly logger: Logger;
    protected readonly options: z.output<S>;
    private readonly completionStore: CompletionLookup;
    private retrieved: Set<string> = new Set();
    private sentCount = 0;

    constructor(ctx: StageContext, optionsSchema: S) {
        this.name = ctx.descriptor.name;
        this.config = ctx.config;
        this.logger = ctx.logger;
        this.completionStore = ctx.completionStore;
        this.options = parseStageOptions(ctx.descriptor.name, optionsSchema, ctx.descriptor.options);
    }

    /**
     * Discover documents and send each one with `send`
     */
    protected abstract retrieve(tx: Sender<NewsDocument>): Promise<void>;

    async run(tx: Sender<NewsDocument>): Promise<void> {
        this.retrieved = this.completionStore.loadFor(this.name);
        this.sentCount = 0;
        this.logger.info({ alreadyRetrieved: this.retrieved.size }, 'Retriever started');
        try {
            await this.retrieve(tx);
        } finally {
            tx.close();
        }
        this.logger.info({ sent: this.sentCount }, 'Retriever completed');
    }

    protected isAlreadyRetrieved(url: string): boolean {
        return this.retrieved.has(url);
    }

    protected markRetrieved(url: string): void {
        this.retrieved.add(url);
    }

    /**
     * Send a document downstream and mark its URL as retrieved.
     *
     * @returns false when the document was not sent
     */
    protected send(tx: Sender<NewsDocument>, doc: NewsDocument): boolean {
        if (!doc.url) {
            this.logger.warn({ title: doc.title }, 'Document without url not sent');
            return false;
        }
        try {
            tx.send(doc);
        } catch (error) {
            if (error instanceof ChannelClosedError) {
                this.logger.warn({ url: doc.url, channel: tx.channel }, 'Intake closed, document dropped');
                return false;
            }
            throw error;
        }
        this.markRetrieved(doc.url);
        this.sentCount++;
        this.logger.debug({ url: doc.url, count: this.sentCount }, 'Sent document for processing');
        return true;
    }
}
