/**
 * Deterministic file names for persisted documents:
 * `{module}_{section}_{last 64 chars of sanitised url resource}_{fnv1a64(url)}_{publish_date}.{ext}`
 */

import type { NewsDocument } from '../models/Document.js';

const WEB_SUFFIXES = /\.(html|htm|php|aspx|asp|jsp)$/i;
const MAX_RESOURCE_CHARS = 64;

const FNV_OFFSET_BASIS = 0xcbf29ce484222325n;
const FNV_PRIME = 0x100000001b3n;
const MASK_64 = 0xffffffffffffffffn;

/**
 * FNV-1a 64-bit hash of the UTF-8 bytes of a string, as an unsigned decimal string
 */
export function fnv1a64(value: string): string {
  let hash = FNV_OFFSET_BASIS;
  for (const byte of Buffer.from(value, 'utf8')) {
    hash ^= BigInt(byte);
    hash = (hash * FNV_PRIME) & MASK_64;
  }
  return hash.toString(10);
}

/**
 * Replace anything outside [A-Za-z0-9_-] with '_'
 */
export function sanitizeForFilename(value: string): string {
  return value.replace(/[^A-Za-z0-9_-]/g, '_');
}

function pathAndQuery(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.pathname}${parsed.search}`;
  } catch {
    return url;
  }
}

/**
 * Resource part of a URL (path and query, without scheme and host), minus common web suffixes
 */
export function urlResourceName(url: string): string {
  const resource = pathAndQuery(url).replace(/\/+$/, '').replace(WEB_SUFFIXES, '');
  const sanitized = sanitizeForFilename(resource).replace(/^_+/, '');
  return sanitized.length > MAX_RESOURCE_CHARS ? sanitized.slice(-MAX_RESOURCE_CHARS) : sanitized;
}

/**
 * Build the unique file name for a document
 *
 * @example
 * ```typescript
 * makeUniqueFilename({ module: 'mod_x', section_name: 's', url: 'https://a.example/path/file.html', publish_date: '1970-01-01', ... }, 'json')
 * // 'mod_x_s_path_file_<hash>_1970-01-01.json'
 * ```
 */
export function makeUniqueFilename(
  doc: Pick<NewsDocument, 'module' | 'section_name' | 'url' | 'publish_date'>,
  extension: string
): string {
  const resource = urlResourceName(doc.url) || 'index';
  return [
    sanitizeForFilename(doc.module),
    sanitizeForFilename(doc.section_name),
    resource,
    fnv1a64(doc.url),
    doc.publish_date,
  ].join('_') + `.${extension}`;
}
