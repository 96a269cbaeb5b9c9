/**
 * HtmlExtractor - Extract text from HTML documents
 *
 * Text extraction from HTML with boilerplate removal, used by retrievers for pages that carry
 * the document body in HTML.
 */

import * as cheerio from 'cheerio';
import { ExtractionError } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';
import { checkAndFixUrl } from '../../utils/urlValidator.js';

/**
 * HTML extraction result
 */
export interface HtmlExtractionResult {
  fullText: string;
  title?: string;
  diagnostics: {
    extractionMethod: 'cheerio';
    textLength: number;
    linksDiscovered: number;
  };
  discoveredLinks: string[];
}

export interface HtmlExtractorConfig {
  minTextLength?: number;
  boilerplateSelectors?: string[];
}

const DEFAULT_BOILERPLATE_SELECTORS = [
  'nav',
  'header',
  'footer',
  '.navigation',
  '.sidebar',
  '.menu',
  '.cookie-banner',
  '[role="navigation"]',
  '[role="banner"]',
  '[role="contentinfo"]',
  'script',
  'style',
  'noscript',
];

/**
 * Normalise whitespace of extracted text while keeping paragraph breaks
 */
export function normalizeExtractedText(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .replace(/[ \t\u00a0]+/g, ' ')
    .replace(/\n[ \t]+/g, '\n')
    .replace(/[ \t]+\n/g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * HtmlExtractor - Extract text from HTML
 */
export class HtmlExtractor {
  private readonly minTextLength: number;
  private readonly boilerplateSelectors: string[];

  constructor(config: HtmlExtractorConfig = {}) {
    this.minTextLength = config.minTextLength ?? 1;
    this.boilerplateSelectors = config.boilerplateSelectors || DEFAULT_BOILERPLATE_SELECTORS;
  }

  /**
   * Extract text from HTML string
   *
   * @param htmlContent - HTML content as string
   * @param baseUrl - Base URL for resolving relative links
   * @throws ExtractionError if the text is below the minimum length
   */
  extract(htmlContent: string, baseUrl?: string): HtmlExtractionResult {
    const $ = cheerio.load(htmlContent);

    const title = $('title').text().trim() || $('h1').first().text().trim();

    for (const selector of this.boilerplateSelectors) {
      $(selector).remove();
    }

    let contentElement = $('article').first();
    if (contentElement.length === 0) {
      contentElement = $('main').first();
    }
    if (contentElement.length === 0) {
      contentElement = $('body');
    }

    // Block elements end a paragraph
    contentElement.find('p, div, li, h1, h2, h3, h4, h5, h6, tr, br').each((_, el) => {
      $(el).after('\n\n');
    });
    const fullText = normalizeExtractedText(contentElement.text() || $.text());

    const discoveredLinks: string[] = [];
    contentElement.find('a[href]').each((_, el) => {
      const link = baseUrl ? checkAndFixUrl($(el).attr('href'), baseUrl) : $(el).attr('href');
      if (link) {
        discoveredLinks.push(link);
      }
    });

    if (fullText.length < this.minTextLength) {
      throw new ExtractionError(
        'html',
        `text below minimum threshold (${fullText.length} < ${this.minTextLength} characters)`,
        { baseUrl }
      );
    }

    logger.debug({ textLength: fullText.length, linksDiscovered: discoveredLinks.length }, 'HTML extraction completed');

    return {
      fullText,
      title: title || undefined,
      diagnostics: {
        extractionMethod: 'cheerio',
        textLength: fullText.length,
        linksDiscovered: discoveredLinks.length,
      },
      discoveredLinks: Array.from(new Set(discoveredLinks)),
    };
  }
}

/**
 * Text and outgoing links of an HTML fragment or page; empty when nothing can be extracted
 */
export function extractHtmlContent(htmlContent: string, baseUrl?: string): { text: string; links: string[] } {
  if (htmlContent.trim().length === 0) {
    return { text: '', links: [] };
  }
  try {
    const result = new HtmlExtractor({ minTextLength: 0 }).extract(htmlContent, baseUrl);
    return { text: result.fullText, links: result.discoveredLinks };
  } catch (error) {
    logger.warn({ error, baseUrl }, 'HTML extraction failed');
    return { text: '', links: [] };
  }
}
