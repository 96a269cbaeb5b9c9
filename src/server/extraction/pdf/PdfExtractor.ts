/**
 * PdfExtractor - Extract text from PDF documents
 *
 * Text extraction from PDF files with a quality threshold and diagnostics.
 */

import { createRequire } from 'module';
import { ExtractionError, errorMessage } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';

type PdfParse = typeof import('pdf-parse');

let pdfParse: PdfParse | undefined;

/**
 * pdf-parse is CommonJS; its index module reads a test file when imported as the main ESM
 * entry, so it is required lazily
 */
function loadPdfParse(): PdfParse {
  if (!pdfParse) {
    const require = createRequire(import.meta.url);
    const loaded: PdfParse = require('pdf-parse/lib/pdf-parse.js');
    pdfParse = loaded;
    return loaded;
  }
  return pdfParse;
}

/**
 * PDF extraction result
 */
export interface PdfExtractionResult {
  fullText: string;
  pageCount: number;
  metadata?: {
    title?: string;
    author?: string;
    subject?: string;
  };
  diagnostics: {
    extractionMethod: 'pdf-parse';
    textLength: number;
    pageCount: number;
    /** Heuristic: very little text relative to the page count */
    isScanned: boolean;
  };
}

function infoString(info: unknown, key: string): string | undefined {
  if (info && typeof info === 'object' && key in info) {
    const value: unknown = Reflect.get(info, key);
    return typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
  }
  return undefined;
}

/**
 * PdfExtractor - Extract text from PDF
 */
export class PdfExtractor {
  private readonly minTextLength: number;
  private readonly minTextPerPage: number;

  constructor(config: { minTextLength?: number; minTextPerPage?: number } = {}) {
    this.minTextLength = config.minTextLength ?? 1;
    this.minTextPerPage = config.minTextPerPage ?? 50;
  }

  /**
   * Extract text from PDF buffer
   *
   * @throws ExtractionError if parsing fails or the text is below the minimum length
   */
  async extract(pdfBuffer: Buffer): Promise<PdfExtractionResult> {
    let text: string;
    let pageCount: number;
    let info: unknown;
    try {
      const data = await loadPdfParse()(pdfBuffer, { max: 0 });
      text = (data.text || '').trim();
      pageCount = data.numpages || 0;
      info = data.info;
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'PDF extraction failed');
      throw new ExtractionError('pdf', errorMessage(error));
    }

    if (text.length < this.minTextLength) {
      throw new ExtractionError(
        'pdf',
        `text below minimum threshold (${text.length} < ${this.minTextLength} characters), may be a scanned PDF`,
        { pageCount }
      );
    }

    const isScanned = pageCount > 0 && text.length / pageCount < this.minTextPerPage;
    const metadata: NonNullable<PdfExtractionResult['metadata']> = {
      title: infoString(info, 'Title'),
      author: infoString(info, 'Author'),
      subject: infoString(info, 'Subject'),
    };

    logger.debug({ pageCount, textLength: text.length, isScanned }, 'PDF extraction completed');

    return {
      fullText: text,
      pageCount,
      metadata: metadata.title || metadata.author || metadata.subject ? metadata : undefined,
      diagnostics: {
        extractionMethod: 'pdf-parse',
        textLength: text.length,
        pageCount,
        isScanned,
      },
    };
  }
}
