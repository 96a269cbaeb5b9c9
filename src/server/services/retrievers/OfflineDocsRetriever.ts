/**
 * Offline documents retriever (mod_offline_docs)
 *
 * Sends documents from files on disk: JSON files written by an earlier run, or PDF and text
 * files whose text becomes the document text.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { z } from 'zod';
import { deserializeDocument, newDocument } from '../../models/Document.js';
import type { NewsDocument } from '../../models/Document.js';
import type { Sender } from '../../pipeline/Channel.js';
import type { StageContext } from '../../pipeline/types.js';
import { errorMessage } from '../../types/errors.js';
import { daysBefore } from '../../utils/dateUtils.js';
import { BaseRetriever } from './BaseRetriever.js';
import type { PdfTextExtractor } from './HtmlListingRetriever.js';
import { PdfExtractor } from '../../extraction/pdf/PdfExtractor.js';

export const offlineDocsOptionsSchema = z
    .object({
        folder_name: z.string().optional(),
        file_extension: z
            .string()
            .transform((value) => value.replace(/^\./, '').toLowerCase())
            .pipe(z.enum(['json', 'pdf', 'txt']))
            .default('json'),
        published_in_past_days: z.number().int().positive().optional(),
    })
    .passthrough();

export type OfflineFileExtension = 'json' | 'pdf' | 'txt';

/**
 * Files directly inside `folder` with the given extension, sorted by name
 */
export async function listFilesWithExtension(folder: string, extension: OfflineFileExtension): Promise<string[]> {
    const entries = await fs.readdir(folder, { withFileTypes: true });
    const suffix = `.${extension}`;
    return entries
        .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith(suffix))
        .map((entry) => path.join(folder, entry.name))
        .sort();
}

export class OfflineDocsRetriever extends BaseRetriever<typeof offlineDocsOptionsSchema> {
    private readonly pdfExtractor: PdfTextExtractor;
    private readonly now: () => number;

    constructor(ctx: StageContext, deps: { pdfExtractor?: PdfTextExtractor; now?: () => number } = {}) {
        super(ctx, offlineDocsOptionsSchema);
        this.pdfExtractor = deps.pdfExtractor ?? new PdfExtractor();
        this.now = deps.now ?? Date.now;
    }

    private get folder(): string {
        return path.resolve(this.config.dataDir, this.options.folder_name ?? '.');
    }

    protected async retrieve(tx: Sender<NewsDocument>): Promise<void> {
        const folder = this.folder;
        const extension = this.options.file_extension;
        const files = await listFilesWithExtension(folder, extension);
        const notBefore =
            this.options.published_in_past_days !== undefined
                ? daysBefore(this.options.published_in_past_days, this.now())
                : undefined;
        this.logger.info({ folder, extension, files: files.length }, 'Reading documents from folder');

        for (const filePath of files) {
            let doc: NewsDocument;
            try {
                doc = await this.readDocument(filePath, extension);
            } catch (error) {
                this.logger.error({ filePath, error: errorMessage(error) }, 'Unable to read document file');
                continue;
            }

            if (notBefore !== undefined && doc.publish_date_ms < notBefore) {
                this.logger.debug({ filePath, publishDate: doc.publish_date }, 'Skipping document published earlier');
                continue;
            }
            if (this.isAlreadyRetrieved(doc.url)) {
                this.logger.info({ url: doc.url }, 'Ignoring already retrieved url');
                continue;
            }
            this.logger.info({ title: doc.title, filePath }, 'Processing offline document');
            this.send(tx, doc);
        }
    }

    private async readDocument(filePath: string, extension: OfflineFileExtension): Promise<NewsDocument> {
        if (extension === 'json') {
            const doc = deserializeDocument(await fs.readFile(filePath, 'utf8'), filePath);
            doc.filename = filePath;
            return doc;
        }

        const stats = await fs.stat(filePath);
        let text: string;
        let title = path.basename(filePath, path.extname(filePath));
        if (extension === 'pdf') {
            const extracted = await this.pdfExtractor.extract(await fs.readFile(filePath));
            text = extracted.fullText;
            title = extracted.metadata?.title ?? title;
        } else {
            text = await fs.readFile(filePath, 'utf8');
        }

        return newDocument(
            {
                module: this.name,
                plugin_name: this.name,
                section_name: extension,
                url: pathToFileURL(filePath).href,
                title,
                text,
            },
            Math.floor(stats.mtimeMs)
        );
    }
}
