/**
 * HTML Listing Retriever
 *
 * Walks the paginated listing pages of a site, turns each listing row into a document, fetches
 * the document page (and its PDF, when linked) and sends the document into the pipeline.
 * Site specifics live in a ListingSite: selectors, the row extractor and the defaults stamped
 * on every document.
 */

import * as cheerio from 'cheerio';
import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { newDocument } from '../../models/Document.js';
import type { NewsDocument } from '../../models/Document.js';
import type { Sender } from '../../pipeline/Channel.js';
import type { StageContext } from '../../pipeline/types.js';
import { extractHtmlContent } from '../../extraction/html/HtmlExtractor.js';
import { PdfExtractor } from '../../extraction/pdf/PdfExtractor.js';
import { errorMessage } from '../../types/errors.js';
import { makeUniqueFilename } from '../../utils/filename.js';
import { checkAndFixUrl } from '../../utils/urlValidator.js';
import { BaseRetriever } from './BaseRetriever.js';
import type { PageFetcher } from './PageFetcher.js';

// Type alias for CheerioAPI (return type of cheerio.load)
export type CheerioAPI = ReturnType<typeof cheerio.load>;

export interface StarterUrl {
    url: string;
    section: string;
}

/**
 * Fields read from one listing row. `url` may be relative to the site's base URL.
 */
export type ListingRow = Partial<NewsDocument> & { url: string };

export interface ListingSite {
    baseUrl: string;
    publisher: string;
    starterUrls: StarterUrl[];
    /** Selects one element per listed document */
    rowSelector: string;
    /** Part of the document page kept as html_content; the whole page when absent */
    contentSelector?: string;
    dataProcFlags: number;
    classification?: Record<string, string>;
    /**
     * @param row - the row element loaded as a fragment
     * @param listingUrl - page the row was found on
     */
    extractRow(row: CheerioAPI, listingUrl: string): ListingRow | undefined;
    /** Site-specific clean-up applied after content and text are in place */
    finalizeDocument?(doc: NewsDocument): void;
}

export const listingOptionsSchema = z
    .object({
        maxpages: z.number().int().positive().optional(),
        max_pages: z.number().int().positive().optional(),
        items_per_page: z.number().int().positive().default(1),
    })
    .passthrough();

export interface PdfTextExtractor {
    extract(buffer: Buffer): Promise<{ fullText: string; metadata?: { title?: string } }>;
}

export interface ListingRetrieverDeps {
    fetcher: PageFetcher;
    pdfExtractor?: PdfTextExtractor;
}

/**
 * Listing page URL for one page of results
 *
 * @example
 * ```typescript
 * listingPageUrl('https://w.example/list', 10, 2) // 'https://w.example/list?delta=10&start=2'
 * ```
 */
export function listingPageUrl(starterUrl: string, itemsPerPage: number, page: number): string {
    const url = new URL(starterUrl);
    url.searchParams.set('delta', String(itemsPerPage));
    url.searchParams.set('start', String(page));
    return url.toString();
}

export class HtmlListingRetriever extends BaseRetriever<typeof listingOptionsSchema> {
    protected readonly site: ListingSite;
    protected readonly fetcher: PageFetcher;
    private readonly pdfExtractor: PdfTextExtractor;

    constructor(ctx: StageContext, site: ListingSite, deps: ListingRetrieverDeps) {
        super(ctx, listingOptionsSchema);
        this.site = site;
        this.fetcher = deps.fetcher;
        this.pdfExtractor = deps.pdfExtractor ?? new PdfExtractor();
    }

    protected get maxPages(): number {
        return this.options.maxpages ?? this.options.max_pages ?? 1;
    }

    protected async retrieve(tx: Sender<NewsDocument>): Promise<void> {
        const itemsPerPage = this.options.items_per_page;
        this.logger.info({ itemsPerPage, maxPages: this.maxPages }, 'Using listing parameters');

        for (const starter of this.site.starterUrls) {
            for (let page = 1; page <= this.maxPages; page++) {
                const listingUrl = listingPageUrl(starter.url, itemsPerPage, page);
                let html: string;
                try {
                    html = await this.fetcher.fetchText(listingUrl);
                } catch (error) {
                    this.logger.error({ listingUrl, error: errorMessage(error) }, 'Unable to fetch listing page');
                    continue;
                }
                await this.processListingPage(html, listingUrl, starter.section, tx);
            }
        }
    }

    /**
     * @returns number of documents sent from this page
     */
    async processListingPage(html: string, listingUrl: string, section: string, tx: Sender<NewsDocument>): Promise<number> {
        this.logger.info({ listingUrl }, 'Retrieving url listing');
        const $ = cheerio.load(html);
        const rows = $(this.site.rowSelector)
            .toArray()
            .map((element) => $.html(element));

        let sent = 0;
        for (const rowHtml of rows) {
            const row = this.site.extractRow(cheerio.load(rowHtml, null, false), listingUrl);
            if (!row || !row.url) {
                continue;
            }
            if (this.isAlreadyRetrieved(row.url)) {
                this.logger.info({ url: row.url }, 'Ignoring already retrieved url');
                continue;
            }
            const url = checkAndFixUrl(row.url, this.site.baseUrl);
            if (!url) {
                this.logger.info({ url: row.url }, 'Ignoring invalid url');
                continue;
            }
            if (url !== row.url && this.isAlreadyRetrieved(url)) {
                this.logger.info({ url }, 'Ignoring already retrieved url');
                continue;
            }

            const doc = this.newListingDocument({ ...row, url }, section);
            await this.buildDocument(doc);
            if (this.send(tx, doc)) {
                sent++;
            }
        }
        return sent;
    }

    protected newListingDocument(row: ListingRow, section: string): NewsDocument {
        return newDocument({
            ...row,
            module: this.name,
            plugin_name: this.site.publisher,
            section_name: section,
            source_author: this.site.publisher,
            data_proc_flags: this.site.dataProcFlags,
            classification: { ...this.site.classification, ...row.classification },
        });
    }

    /**
     * Fill content, filename and text of a document found on a listing page
     */
    protected async buildDocument(doc: NewsDocument): Promise<void> {
        await this.populateContent(doc);
        doc.filename = path.resolve(this.config.dataDir, makeUniqueFilename(doc, 'json'));
        await this.loadPdfContent(doc);

        if (doc.html_content.length > 0) {
            const { text, links } = extractHtmlContent(doc.html_content, doc.url);
            doc.links_outwards = links;
            if (doc.text.length === 0) {
                this.logger.debug({ url: doc.url }, 'Extracting text from HTML content');
                doc.text = text;
            }
        }
        this.site.finalizeDocument?.(doc);
    }

    private async populateContent(doc: NewsDocument): Promise<void> {
        let page: string;
        try {
            page = await this.fetcher.fetchText(doc.url);
        } catch (error) {
            this.logger.warn({ url: doc.url, error: errorMessage(error) }, 'Unable to fetch document page');
            return;
        }
        if (!this.site.contentSelector) {
            doc.html_content = page;
            return;
        }
        const $ = cheerio.load(page);
        const content = $(this.site.contentSelector).last();
        doc.html_content = content.length > 0 ? $.html(content) : '';
    }

    private async loadPdfContent(doc: NewsDocument): Promise<void> {
        if (!doc.pdf_url) {
            return;
        }
        const pdfUrl = checkAndFixUrl(doc.pdf_url, this.site.baseUrl);
        if (!pdfUrl) {
            this.logger.info({ url: doc.url, pdfUrl: doc.pdf_url }, 'Ignoring invalid pdf url');
            return;
        }
        doc.pdf_url = pdfUrl;

        try {
            const content = await this.fetcher.fetchBinary(pdfUrl);
            const pdfPath = path.resolve(this.config.dataDir, makeUniqueFilename(doc, 'pdf'));
            await fs.writeFile(pdfPath, content);
            this.logger.debug({ url: doc.url, pdfPath, bytes: content.length }, 'Saved pdf file');
            const extracted = await this.pdfExtractor.extract(content);
            doc.text = extracted.fullText;
        } catch (error) {
            this.logger.warn({ url: doc.url, pdfUrl, error: errorMessage(error) }, 'Unable to load pdf content');
        }
    }
}
