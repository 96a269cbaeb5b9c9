/**
 * URL Validation and Normalization Utilities
 *
 * Validates links found on listing pages before they are fetched.
 */

import { logger } from './logger.js';

/**
 * Non-navigable protocols to exclude from extracted links
 */
const EXCLUDED_PROTOCOLS = [
  'mailto:',
  'tel:',
  'javascript:',
  'data:',
  'blob:',
  'file:',
  '#', // Fragment-only links
];

/**
 * Check if a link has an excluded protocol
 */
export function isExcludedProtocol(href: string): boolean {
  const hrefLower = href.toLowerCase().trim();
  return EXCLUDED_PROTOCOLS.some((protocol) => hrefLower.startsWith(protocol));
}

/**
 * Validates if a string is a valid http(s) URL
 *
 * @example
 * ```typescript
 * isValidUrl('https://example.com') // true
 * isValidUrl('not-a-url') // false
 * ```
 */
export function isValidUrl(url: string): boolean {
  if (!url || url.trim().length === 0) {
    return false;
  }

  try {
    const parsed = new URL(url);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Validate a link and make it absolute
 *
 * Rules:
 * - Rejects empty links and non-navigable protocols
 * - Returns absolute http(s) URLs unchanged
 * - Resolves relative links against the base URL
 *
 * @param url - Link as found in the page
 * @param baseUrl - URL of the site the link belongs to
 * @returns Absolute URL, or undefined if the link must be skipped
 *
 * @example
 * ```typescript
 * checkAndFixUrl('/x/y', 'https://w.example/') // 'https://w.example/x/y'
 * checkAndFixUrl('javascript:foo()', 'https://w.example/') // undefined
 * ```
 */
export function checkAndFixUrl(url: string | undefined | null, baseUrl: string): string | undefined {
  if (!url || url.trim().length === 0) {
    return undefined;
  }

  const trimmed = url.trim();
  if (isExcludedProtocol(trimmed)) {
    return undefined;
  }

  if (isValidUrl(trimmed)) {
    return trimmed;
  }

  try {
    const resolved = new URL(trimmed, baseUrl).toString();
    return isValidUrl(resolved) ? resolved : undefined;
  } catch (error) {
    logger.debug({ url, baseUrl, error }, 'Failed to resolve URL against base');
    return undefined;
  }
}
