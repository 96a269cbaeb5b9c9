/**
 * Generic listing retriever (mod_generic_retriever)
 *
 * HTML listing retriever whose site description comes entirely from plugin options.
 */

import { z } from 'zod';
import { parseStageOptions } from '../../config/appConfig.js';
import type { StageContext } from '../../pipeline/types.js';
import { parseIsoDate, parseMonthDayYear } from '../../utils/dateUtils.js';
import { cleanText } from '../../utils/text.js';
import { HtmlListingRetriever } from './HtmlListingRetriever.js';
import type { CheerioAPI, ListingRetrieverDeps, ListingRow, ListingSite } from './HtmlListingRetriever.js';

export const genericSiteOptionsSchema = z.object({
    base_url: z.string().url(),
    publisher: z.string().default(''),
    starter_urls: z.array(z.object({ url: z.string().url(), section: z.string().default('') })).min(1),
    row_selector: z.string().min(1),
    link_selector: z.string().default('a'),
    title_selector: z.string().optional(),
    date_selector: z.string().optional(),
    pdf_selector: z.string().optional(),
    content_selector: z.string().optional(),
    data_proc_flags: z.number().int().nonnegative().default(0),
});

export type GenericSiteOptions = z.infer<typeof genericSiteOptionsSchema>;

function parseListingDate(text: string): number | undefined {
    return parseMonthDayYear(text) ?? parseIsoDate(text);
}

/**
 * Build a listing site from the plugin options
 */
export function genericSite(options: GenericSiteOptions): ListingSite {
    const extractRow = ($: CheerioAPI, listingUrl: string): ListingRow | undefined => {
        const link = $(options.link_selector).first();
        const href = link.attr('href');
        if (!href) {
            return undefined;
        }

        const titleText = options.title_selector ? $(options.title_selector).first().text() : link.text();
        const row: ListingRow = { url: href, title: cleanText(titleText), links_inward: [listingUrl] };

        if (options.date_selector) {
            const publishDateMs = parseListingDate(cleanText($(options.date_selector).first().text()));
            if (publishDateMs !== undefined) {
                row.publish_date_ms = publishDateMs;
            }
        }
        if (options.pdf_selector) {
            const pdfHref = $(options.pdf_selector).first().attr('href');
            if (pdfHref) {
                row.pdf_url = pdfHref;
            }
        }
        return row;
    };

    return {
        baseUrl: options.base_url,
        publisher: options.publisher,
        starterUrls: options.starter_urls,
        rowSelector: options.row_selector,
        contentSelector: options.content_selector,
        dataProcFlags: options.data_proc_flags,
        extractRow,
    };
}

export class GenericRetriever extends HtmlListingRetriever {
    constructor(ctx: StageContext, deps: ListingRetrieverDeps) {
        const options = parseStageOptions(ctx.descriptor.name, genericSiteOptionsSchema, ctx.descriptor.options);
        super(ctx, genericSite(options), deps);
    }
}
