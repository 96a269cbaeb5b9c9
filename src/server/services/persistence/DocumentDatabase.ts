/**
 * Document Database
 *
 * SQLite sink for documents when a persistence stage is configured with destination "database".
 * Each document is stored as JSON alongside a few indexed columns.
 */

import Database from 'better-sqlite3';
import type { NewsDocument } from '../../models/Document.js';
import { serializeDocument } from '../../models/Document.js';
import { PersistenceError, errorMessage } from '../../types/errors.js';

export class DocumentDatabase {
    private db: Database.Database | null = null;
    private readonly dbPath: string;

    constructor(dbPath: string) {
        this.dbPath = dbPath;
    }

    /**
     * Open the database and create the documents table
     */
    initialize(): void {
        if (this.db) {
            return;
        }
        try {
            const db = new Database(this.dbPath);
            db.exec(`
                CREATE TABLE IF NOT EXISTS documents (
                    url TEXT PRIMARY KEY,
                    module TEXT,
                    section_name TEXT,
                    title TEXT,
                    publish_date TEXT,
                    content TEXT NOT NULL,
                    updated_at DATETIME DEFAULT CURRENT_TIMESTAMP
                );

                CREATE INDEX IF NOT EXISTS idx_documents_module ON documents(module);
            `);
            this.db = db;
        } catch (error) {
            throw new PersistenceError(`Unable to open documents database: ${errorMessage(error)}`, {
                dbPath: this.dbPath,
            });
        }
    }

    /**
     * Insert or replace the row for the document's URL
     */
    upsert(doc: NewsDocument): void {
        this.initialize();
        if (!this.db) {
            return;
        }
        try {
            this.db
                .prepare<[string, string, string, string, string, string]>(`
                    INSERT INTO documents (url, module, section_name, title, publish_date, content)
                    VALUES (?, ?, ?, ?, ?, ?)
                    ON CONFLICT(url) DO UPDATE SET
                        module = excluded.module,
                        section_name = excluded.section_name,
                        title = excluded.title,
                        publish_date = excluded.publish_date,
                        content = excluded.content,
                        updated_at = CURRENT_TIMESTAMP
                `)
                .run(doc.url, doc.module, doc.section_name, doc.title, doc.publish_date, serializeDocument(doc, false));
        } catch (error) {
            throw new PersistenceError(`Unable to store document: ${errorMessage(error)}`, { url: doc.url });
        }
    }

    /**
     * Stored JSON of a document, if present
     */
    getContent(url: string): string | undefined {
        this.initialize();
        const row = this.db
            ?.prepare<[string], { content: string }>('SELECT content FROM documents WHERE url = ?')
            .get(url);
        return row?.content;
    }

    count(): number {
        this.initialize();
        const row = this.db?.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM documents').get();
        return row?.count ?? 0;
    }

    close(): void {
        if (this.db) {
            this.db.close();
            this.db = null;
        }
    }
}
