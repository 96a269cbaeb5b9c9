/**
 * Document - the unit of work that travels through the pipeline.
 *
 * Field names follow the on-disk JSON format, so documents persisted by one run can be read
 * back by the offline documents retriever in a later run.
 */

import { z } from 'zod';
import { ExtractionError } from '../types/errors.js';
import { toIsoDate } from '../utils/dateUtils.js';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

/**
 * One split of a document's text. `id` and `text` are always present; LLM stages add
 * `summary` and `insights`, and other stages may add further attributes.
 */
export type TextPart = { id: string; text: string } & { [key: string]: JsonValue };

/**
 * Enrichment flags carried in `data_proc_flags`
 */
export const DataProcFlag = {
  SENTIMENT_ANALYSIS: 1,
  CLASSIFY_INDUSTRY: 1 << 1,
  CLASSIFY_MARKET: 1 << 2,
  CLASSIFY_PRODUCT: 1 << 3,
  EXTRACT_NAME_ENTITY: 1 << 4,
  EXTRACT_KEYWORDS: 1 << 5,
  SIMILAR_DOCS: 1 << 6,
  SUMMARIZE: 1 << 7,
  EXTRACT_ACTIONS: 1 << 8,
  COMPARE_PREVIOUS_VERSION: 1 << 9,
} as const;

export const CLASSIFY_FLAGS = DataProcFlag.CLASSIFY_INDUSTRY | DataProcFlag.CLASSIFY_MARKET | DataProcFlag.CLASSIFY_PRODUCT;

export interface NewsDocument {
  module: string;
  plugin_name: string;
  section_name: string;
  url: string;
  pdf_url: string;
  filename: string;
  html_content: string;
  title: string;
  unique_id: string;
  referrer_text: string;
  text: string;
  source_author: string;
  recipients: string;
  /** Signed epoch milliseconds */
  publish_date_ms: number;
  /** YYYY-MM-DD of publish_date_ms */
  publish_date: string;
  revision_dates: string[];
  links_inward: string[];
  links_outwards: string[];
  text_parts: TextPart[];
  classification: Record<string, string>;
  generated_content: Record<string, string>;
  data_proc_flags: number;
}

/**
 * Summary projection of a document, used in listings and logs
 */
export type DocInfo = Pick<
  NewsDocument,
  'plugin_name' | 'section_name' | 'url' | 'pdf_url' | 'title' | 'unique_id' | 'publish_date_ms' | 'filename'
>;

const textPartSchema = z
  .object({ id: z.string(), text: z.string() })
  .catchall(jsonValueSchema);

export const newsDocumentSchema = z.object({
  module: z.string().default(''),
  plugin_name: z.string().default(''),
  section_name: z.string().default(''),
  url: z.string().default(''),
  pdf_url: z.string().default(''),
  filename: z.string().default(''),
  html_content: z.string().default(''),
  title: z.string().default(''),
  unique_id: z.string().default(''),
  referrer_text: z.string().default(''),
  text: z.string().default(''),
  source_author: z.string().default(''),
  recipients: z.string().default(''),
  publish_date_ms: z.number().int(),
  publish_date: z.string(),
  revision_dates: z.array(z.string()).default([]),
  links_inward: z.array(z.string()).default([]),
  links_outwards: z.array(z.string()).default([]),
  text_parts: z.array(textPartSchema).default([]),
  classification: z.record(z.string()).default({}),
  generated_content: z.record(z.string()).default({}),
  data_proc_flags: z.number().int().nonnegative().default(0),
});

/**
 * Create an empty document stamped with the given (default: current) publish time
 */
export function newDocument(fields: Partial<NewsDocument> = {}, now: number = Date.now()): NewsDocument {
  const publishDateMs = fields.publish_date_ms ?? now;
  return {
    module: '',
    plugin_name: '',
    section_name: '',
    url: '',
    pdf_url: '',
    filename: '',
    html_content: '',
    title: '',
    unique_id: '',
    referrer_text: '',
    text: '',
    source_author: '',
    recipients: '',
    revision_dates: [],
    links_inward: [],
    links_outwards: [],
    text_parts: [],
    classification: {},
    generated_content: {},
    data_proc_flags: 0,
    ...fields,
    publish_date_ms: publishDateMs,
    publish_date: fields.publish_date ?? toIsoDate(publishDateMs),
  };
}

/**
 * Set both publish date fields from one instant
 */
export function setPublishDate(doc: NewsDocument, epochMs: number): void {
  doc.publish_date_ms = epochMs;
  doc.publish_date = toIsoDate(epochMs);
}

export function hasDataProcFlag(doc: NewsDocument, flags: number): boolean {
  return (doc.data_proc_flags & flags) !== 0;
}

export function serializeDocument(doc: NewsDocument, pretty: boolean = true): string {
  return JSON.stringify(doc, null, pretty ? 2 : undefined);
}

/**
 * Parse a JSON document. Missing optional fields take their defaults.
 *
 * @throws ExtractionError when the text is not JSON or does not describe a document
 */
export function deserializeDocument(json: string, source?: string): NewsDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new ExtractionError('json', error instanceof Error ? error.message : String(error), { source });
  }

  const parsed = newsDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ExtractionError(
      'json',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
      { source }
    );
  }
  return parsed.data;
}

export function toDocInfo(doc: NewsDocument): DocInfo {
  return {
    plugin_name: doc.plugin_name,
    section_name: doc.section_name,
    url: doc.url,
    pdf_url: doc.pdf_url,
    title: doc.title,
    unique_id: doc.unique_id,
    publish_date_ms: doc.publish_date_ms,
    filename: doc.filename,
  };
}
