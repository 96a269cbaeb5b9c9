import crypto from 'crypto';

/**
 * Compute a content hash for a document based on its text
 * Used for duplicate detection - documents with equal normalized text hash equally
 *
 * @param title Document title
 * @param text Document text
 * @returns SHA-256 hash of the document content
 */
export function computeContentHash(title: string, text: string): string {
  // Normalize whitespace to avoid false negatives from formatting changes
  const normalizedTitle = (title || '').trim().toLowerCase();
  const normalizedText = (text || '').replace(/\s+/g, ' ').trim().toLowerCase();

  return crypto.createHash('sha256').update(`${normalizedTitle}|${normalizedText}`, 'utf8').digest('hex');
}
