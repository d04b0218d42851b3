import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import { type LoggerPort } from '../../../shared/logger/logger.port.js';

const IN_MEMORY = ':memory:';

const SCHEMA = `
CREATE TABLE IF NOT EXISTS news_items (
    identity TEXT PRIMARY KEY,
    title TEXT NOT NULL,
    link TEXT NOT NULL,
    summary TEXT,
    published_at TEXT,
    first_seen_at TEXT NOT NULL,
    raw_payload TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS news_items_first_seen_at_idx
    ON news_items (first_seen_at DESC, identity ASC);
`;

export class SqliteDatabase {
    private readonly client: Database.Database;

    constructor(
        private readonly logger: LoggerPort,
        databasePath: string,
    ) {
        this.logger.info('Opening SQLite database', { databasePath });

        if (databasePath !== IN_MEMORY) {
            mkdirSync(dirname(databasePath), { recursive: true });
        }

        this.client = new Database(databasePath);
        // WAL lets a dump process read while a run writes
        this.client.pragma('journal_mode = WAL');
        this.client.exec(SCHEMA);
    }

    close(): void {
        if (this.client.open) {
            this.client.close();
            this.logger.debug('SQLite database closed');
        }
    }

    getClient(): Database.Database {
        return this.client;
    }
}
