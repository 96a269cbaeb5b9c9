/**
 * mod_persist_data - writes each document to the data directory or to a SQLite table
 */

import * as path from 'path';
import { z } from 'zod';
import type { NewsDocument } from '../../models/Document.js';
import type { StageContext } from '../../pipeline/types.js';
import { DocumentDatabase } from '../persistence/DocumentDatabase.js';
import { writeDocumentFile } from '../persistence/documentFiles.js';
import { BaseProcessor } from './BaseProcessor.js';

export const persistDataOptionsSchema = z
  .object({
    destination: z.string().default('file'),
    file_format: z.string().default('json'),
    /** SQLite file for destination "database"; defaults to completed_urls_datafile */
    database_file: z.string().optional(),
  })
  .passthrough();

export class PersistDataProcessor extends BaseProcessor<typeof persistDataOptionsSchema> {
  private database?: DocumentDatabase;

  constructor(ctx: StageContext) {
    super(ctx, persistDataOptionsSchema);
    if (this.options.file_format !== 'json') {
      this.logger.warn({ fileFormat: this.options.file_format }, 'Unsupported file format, writing JSON');
    }
  }

  private getDatabase(): DocumentDatabase {
    if (!this.database) {
      const dbPath = this.options.database_file
        ? path.resolve(this.options.database_file)
        : this.config.completedUrlsDatafile;
      this.database = new DocumentDatabase(dbPath);
    }
    return this.database;
  }

  protected async processDocument(doc: NewsDocument): Promise<void> {
    switch (this.options.destination) {
      case 'file': {
        const filePath = await writeDocumentFile(doc, this.config.dataDir);
        this.logger.debug({ url: doc.url, filePath }, 'Saved document');
        break;
      }
      case 'database':
        this.getDatabase().upsert(doc);
        this.logger.debug({ url: doc.url }, 'Stored document in database');
        break;
      default:
        this.logger.error({ destination: this.options.destination, url: doc.url }, 'Unknown persistence destination');
    }
  }

  protected async finish(): Promise<void> {
    this.database?.close();
  }
}
