/**
 * JSON files of documents in the data directory
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { NewsDocument } from '../../models/Document.js';
import { serializeDocument } from '../../models/Document.js';
import { PersistenceError, errorMessage } from '../../types/errors.js';
import { makeUniqueFilename } from '../../utils/filename.js';

/**
 * Absolute path the document is written to inside `dataDir`
 */
export function documentFilePath(doc: NewsDocument, dataDir: string, extension: string = 'json'): string {
  return path.resolve(dataDir, makeUniqueFilename(doc, extension));
}

/**
 * Write the document as pretty-printed JSON, with `filename` set to the path written.
 * `filename` keeps its previous value when the write fails.
 *
 * @returns absolute path written
 * @throws PersistenceError if the file cannot be written
 */
export async function writeDocumentFile(doc: NewsDocument, dataDir: string): Promise<string> {
  const filePath = documentFilePath(doc, dataDir);
  const previous = doc.filename;
  doc.filename = filePath;
  try {
    await fs.writeFile(filePath, serializeDocument(doc), 'utf8');
  } catch (error) {
    doc.filename = previous;
    throw new PersistenceError(`Unable to write document file: ${errorMessage(error)}`, {
      url: doc.url,
      filePath,
    });
  }
  return filePath;
}
