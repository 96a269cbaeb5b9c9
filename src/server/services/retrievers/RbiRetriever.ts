/**
 * Reserve Bank of India retriever (mod_en_in_rbi)
 *
 * Circulars, notifications, press releases and publications listed on the RBI website.
 * Listing rows use Liferay portal markup.
 */

import { DataProcFlag } from '../../models/Document.js';
import type { NewsDocument } from '../../models/Document.js';
import type { StageContext } from '../../pipeline/types.js';
import { parseMonthDayYear } from '../../utils/dateUtils.js';
import { logger } from '../../utils/logger.js';
import { cleanText } from '../../utils/text.js';
import { HtmlListingRetriever } from './HtmlListingRetriever.js';
import type { CheerioAPI, ListingRetrieverDeps, ListingRow, ListingSite, StarterUrl } from './HtmlListingRetriever.js';

export const RBI_PUBLISHER = 'Reserve Bank of India';
export const RBI_BASE_URL = 'https://website.rbi.org.in/';

const RBI_STARTER_URLS: StarterUrl[] = [
    { url: 'https://website.rbi.org.in/web/rbi/notifications/rbi-circulars', section: 'Circular' },
    { url: 'https://website.rbi.org.in/web/rbi/press-releases', section: 'Press Release' },
    { url: 'https://website.rbi.org.in/web/rbi/notifications/draft-notifications', section: 'Draft Notifications' },
    { url: 'https://website.rbi.org.in/web/rbi/notifications/master-directions', section: 'Master Directions' },
    { url: 'https://website.rbi.org.in/en/web/rbi/notifications/master-circulars', section: 'Master Circulars' },
    { url: 'https://website.rbi.org.in/web/rbi/notifications', section: 'Notifications' },
    { url: 'https://website.rbi.org.in/web/rbi/about-us/legal-framework/act', section: 'Acts' },
    { url: 'https://website.rbi.org.in/web/rbi/about-us/legal-framework/rules', section: 'Rules' },
    { url: 'https://website.rbi.org.in/web/rbi/about-us/legal-framework/regulations', section: 'Regulations' },
    { url: 'https://website.rbi.org.in/web/rbi/about-us/legal-framework/schemes', section: 'Schemes' },
    { url: 'https://website.rbi.org.in/web/rbi/speeches', section: 'Speeches' },
    { url: 'https://website.rbi.org.in/web/rbi/interviews', section: 'Interviews and Media Interactions' },
    { url: 'https://website.rbi.org.in/web/rbi/publications/reports/reports_list', section: 'Reports' },
    { url: 'https://website.rbi.org.in/web/rbi/publications/rbi-bulletin', section: 'Bulletin' },
    { url: 'https://website.rbi.org.in/web/rbi/publications/reports/financial_stability_reports', section: 'Reports' },
    { url: 'https://website.rbi.org.in/web/rbi/publications/chapters?category=24927745', section: 'Report on Currency and Finance' },
    { url: 'https://website.rbi.org.in/web/rbi/publications/articles?category=24927873', section: 'Monetary Policy Report' },
];

export const RBI_DEFAULT_CLASSIFICATION: Record<string, string> = {
    channel: 'other',
    customer_type: 'other',
    function: 'other',
    market_type: 'other',
    occupation: 'other',
    product_type: 'other',
    doc_type: 'regulatory-notification',
};

const SELECTORS = {
    row: 'div.notifications-row-wrapper>div>div',
    link: 'a.mtm_list_item_heading',
    date: 'div.notification-date>span',
    title: 'span.mtm_list_item_heading',
    pdfLink: 'a.matomo_download',
    description: 'div.notifications-description p',
    content: 'div.Notification-content-wrap',
} as const;

/**
 * Circular reference, long-form date and addressees inside a listing description:
 * group 2 is the reference number, group 5 the recipients
 */
const SNIPPET_REGEX =
    /(RBI[/A-Z]+\d{4}-\d{2,4}\/\d*)(.+\d{4}-\d{2,4}[ ]*)((January|February|March|April|May|June|July|August|September|October|November|December)[\d ]+,[\d ]+)(.+)(Madam|Madam[ ]*\/[ ]*Dear Sir|Dear Sir\/|Dear Sir \/|Madam \/ Dear Sir|Madam \/ Sir|$)/;

const LETTER_GREETING_REGEX = /([Dear ]*Madam[ ]*\/[Dear ]*Sir|Dear Sir\/|Dear Sir \/|Madam \/ Dear Sir|Madam \/ Sir|Madam|Sir)/;

/**
 * Cut the letter greeting, and whatever follows it, from the addressee text
 *
 * @example
 * ```typescript
 * cleanRecipients('All SCBs ALL AIFs   Dear Madam/Sir,') // 'All SCBs ALL AIFs'
 * ```
 */
export function cleanRecipients(recipients: string): string {
    const [beforeGreeting] = recipients.split(LETTER_GREETING_REGEX);
    return (beforeGreeting ?? recipients).trim();
}

/**
 * Read one notification row of a listing page
 */
export function extractRbiRow($: CheerioAPI, listingUrl: string): ListingRow | undefined {
    const href = $(SELECTORS.link).last().attr('href');
    if (!href) {
        return undefined;
    }
    const row: ListingRow = { url: href };

    const dateText = cleanText($(SELECTORS.date).last().text());
    if (dateText) {
        const publishDateMs = parseMonthDayYear(dateText);
        if (publishDateMs === undefined) {
            logger.error({ url: href, date: dateText }, 'Could not parse date');
        } else {
            row.publish_date_ms = publishDateMs;
        }
    }

    const titleElement = $(SELECTORS.title).last();
    if (titleElement.length > 0) {
        row.title = cleanText(titleElement.text());
        row.links_inward = [listingUrl];
    }

    let snippet = ' ';
    $(SELECTORS.description).each((_, element) => {
        snippet += ' ' + cleanText($(element).text()).replace(/\r?\n/g, ' ');
        const captures = SNIPPET_REGEX.exec(snippet);
        if (captures) {
            row.unique_id = cleanText(captures[2]);
            row.recipients = captures[5];
        }
    });

    const pdfHref = $(SELECTORS.pdfLink).last().attr('href');
    if (pdfHref) {
        row.pdf_url = pdfHref;
    }
    return row;
}

function finalizeRbiDocument(doc: NewsDocument): void {
    if (doc.recipients.length > 2) {
        doc.recipients = cleanRecipients(doc.recipients);
    }
}

export const RBI_SITE: ListingSite = {
    baseUrl: RBI_BASE_URL,
    publisher: RBI_PUBLISHER,
    starterUrls: RBI_STARTER_URLS,
    rowSelector: SELECTORS.row,
    contentSelector: SELECTORS.content,
    dataProcFlags:
        DataProcFlag.CLASSIFY_INDUSTRY |
        DataProcFlag.CLASSIFY_MARKET |
        DataProcFlag.CLASSIFY_PRODUCT |
        DataProcFlag.EXTRACT_NAME_ENTITY |
        DataProcFlag.SUMMARIZE |
        DataProcFlag.EXTRACT_ACTIONS,
    classification: RBI_DEFAULT_CLASSIFICATION,
    extractRow: extractRbiRow,
    finalizeDocument: finalizeRbiDocument,
};

export class RbiRetriever extends HtmlListingRetriever {
    constructor(ctx: StageContext, deps: ListingRetrieverDeps, site: ListingSite = RBI_SITE) {
        super(ctx, site, deps);
    }
}
