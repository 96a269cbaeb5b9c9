/**
 * Completion Store
 *
 * SQLite record of URLs already carried through the pipeline, partitioned by plugin name.
 * Retrievers load their set once at startup; the orchestrator appends batches while draining
 * the terminal channel.
 */

import Database from 'better-sqlite3';
import type { NewsDocument } from '../models/Document.js';
import { PersistenceError, errorMessage } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import type { CompletionLookup } from './types.js';

export interface CompletionRecord {
    url: string;
    plugin: string;
    pubdate: string;
    section_name: string;
    title: string;
    unique_id: string;
    filename: string;
}

/**
 * Project a document onto the row written to completed_urls
 */
export function toCompletionRecord(doc: NewsDocument): CompletionRecord {
    return {
        url: doc.url,
        plugin: doc.module,
        pubdate: doc.publish_date,
        section_name: doc.section_name,
        title: doc.title,
        unique_id: doc.unique_id,
        filename: doc.filename,
    };
}

function isConstraintViolation(error: unknown): boolean {
    return error instanceof Database.SqliteError && error.code.startsWith('SQLITE_CONSTRAINT');
}

export class CompletionStore implements CompletionLookup {
    private db: Database.Database | null = null;
    private readonly dbPath: string;

    constructor(dbPath: string) {
        this.dbPath = dbPath;
    }

    get path(): string {
        return this.dbPath;
    }

    /**
     * Open the database (once) and create the table if missing
     *
     * @throws PersistenceError when the file cannot be opened
     */
    private connection(): Database.Database {
        if (this.db) {
            return this.db;
        }
        try {
            const db = new Database(this.dbPath);
            db.exec(`
                CREATE TABLE IF NOT EXISTS completed_urls (
                    url TEXT PRIMARY KEY,
                    plugin TEXT,
                    pubdate TEXT,
                    section_name TEXT,
                    title TEXT,
                    unique_id TEXT,
                    filename TEXT
                );

                CREATE INDEX IF NOT EXISTS idx_completed_plugin ON completed_urls(plugin);
            `);
            this.db = db;
            return db;
        } catch (error) {
            throw new PersistenceError(`Unable to open completed URLs database: ${errorMessage(error)}`, {
                dbPath: this.dbPath,
            });
        }
    }

    /**
     * URLs previously recorded for a plugin. Returns an empty set if the database is unavailable.
     */
    loadFor(plugin: string): Set<string> {
        try {
            const rows = this.connection()
                .prepare<[string], { url: string }>('SELECT DISTINCT url FROM completed_urls WHERE plugin = ?')
                .all(plugin);
            const urls = new Set(rows.map((row) => row.url));
            logger.debug({ plugin, count: urls.size }, 'Loaded completed URLs');
            return urls;
        } catch (error) {
            logger.error({ plugin, dbPath: this.dbPath, error: errorMessage(error) }, 'Unable to load completed URLs');
            return new Set();
        }
    }

    /**
     * Insert a batch of records in one transaction.
     * Rows that violate the url primary key are logged and skipped; the rest commit.
     *
     * @returns number of rows committed
     */
    appendBatch(records: CompletionRecord[]): number {
        if (records.length === 0) {
            return 0;
        }

        let db: Database.Database;
        try {
            db = this.connection();
        } catch (error) {
            logger.error(
                { expected: records.length, committed: 0, error: errorMessage(error) },
                'Unable to write completed URLs'
            );
            return 0;
        }

        const insertStmt = db.prepare<[string, string, string, string, string, string, string]>(`
            INSERT INTO completed_urls (url, plugin, pubdate, section_name, title, unique_id, filename)
            VALUES (?, ?, ?, ?, ?, ?, ?)
        `);

        const insertMany = db.transaction((batch: CompletionRecord[]): number => {
            let inserted = 0;
            for (const record of batch) {
                try {
                    inserted += insertStmt.run(
                        record.url,
                        record.plugin,
                        record.pubdate,
                        record.section_name,
                        record.title,
                        record.unique_id,
                        record.filename
                    ).changes;
                } catch (error) {
                    if (!isConstraintViolation(error)) {
                        throw error;
                    }
                    logger.warn({ url: record.url, plugin: record.plugin }, 'URL already recorded as completed');
                }
            }
            return inserted;
        });

        try {
            const committed = insertMany(records);
            if (committed < records.length) {
                logger.warn({ expected: records.length, committed }, 'Fewer completed URLs committed than submitted');
            } else {
                logger.debug({ committed }, 'Completed URLs committed');
            }
            return committed;
        } catch (error) {
            logger.error(
                { expected: records.length, committed: 0, error: errorMessage(error) },
                'Unable to write completed URLs'
            );
            return 0;
        }
    }

    /**
     * Count of rows recorded for a plugin
     */
    countFor(plugin: string): number {
        const row = this.connection()
            .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM completed_urls WHERE plugin = ?')
            .get(plugin);
        return row?.count ?? 0;
    }

    close(): void {
        if (this.db) {
            this.db.close();
            this.db = null;
        }
    }
}
