import Database from 'better-sqlite3';

// Application
import {
    ArchiveUnavailableError,
    type NewsArchivePort,
} from '../../../../application/ports/outbound/persistence/news-archive.port.js';

// Domain
import { type ArchivedNewsItem } from '../../../../domain/entities/archived-news-item.entity.js';
import { type NewsItem } from '../../../../domain/entities/news-item.entity.js';

import { type LoggerPort } from '../../../../shared/logger/logger.port.js';
import { type SqliteDatabase } from '../sqlite.database.js';

import { NewsItemMapper } from './sqlite-news.mapper.js';

/**
 * SQLite result codes meaning the database as a whole cannot be used
 */
const UNAVAILABLE_CODES = [
    'SQLITE_CANTOPEN',
    'SQLITE_CORRUPT',
    'SQLITE_FULL',
    'SQLITE_IOERR',
    'SQLITE_NOTADB',
    'SQLITE_READONLY',
];

const isUnavailable = (error: unknown): boolean =>
    (error instanceof Database.SqliteError &&
        UNAVAILABLE_CODES.some((code) => error.code.startsWith(code))) ||
    (error instanceof TypeError && error.message.includes('database connection is not open'));

export class SqliteNewsArchiveRepository implements NewsArchivePort {
    private readonly mapper: NewsItemMapper;

    constructor(
        private readonly database: SqliteDatabase,
        private readonly logger: LoggerPort,
    ) {
        this.mapper = new NewsItemMapper();
    }

    async exists(identity: string): Promise<boolean> {
        const row = this.guard('exists', () =>
            this.database
                .getClient()
                .prepare('SELECT 1 FROM news_items WHERE identity = ? LIMIT 1')
                .get(identity),
        );
        return row !== undefined;
    }

    async insertIfAbsent(item: NewsItem, firstSeenAt: Date): Promise<boolean> {
        const row = this.mapper.toRow(item, firstSeenAt);

        // A single statement is its own transaction: the row is written whole or not at all
        const result = this.guard('insertIfAbsent', () =>
            this.database
                .getClient()
                .prepare(
                    `INSERT INTO news_items
                        (identity, title, link, summary, published_at, first_seen_at, raw_payload)
                     VALUES
                        (@identity, @title, @link, @summary, @published_at, @first_seen_at, @raw_payload)
                     ON CONFLICT (identity) DO NOTHING`,
                )
                .run(row),
        );

        return result.changes > 0;
    }

    async listAll(limit?: number): Promise<ArchivedNewsItem[]> {
        const query = `SELECT identity, title, link, summary, published_at, first_seen_at, raw_payload
             FROM news_items
             ORDER BY first_seen_at DESC, identity ASC`;

        const rows = this.guard('listAll', () =>
            limit === undefined
                ? this.database.getClient().prepare(query).all()
                : this.database.getClient().prepare(`${query} LIMIT ?`).all(limit),
        );

        const items: ArchivedNewsItem[] = [];
        for (const row of rows) {
            try {
                items.push(this.mapper.toDomain(row));
            } catch (error) {
                this.logger.warn('Skipping malformed archive row', {
                    error,
                    identity: SqliteNewsArchiveRepository.identityOf(row),
                });
            }
        }

        return items;
    }

    private static identityOf(row: unknown): unknown {
        return typeof row === 'object' && row !== null && 'identity' in row ? row.identity : undefined;
    }

    /**
     * Runs a statement, turning storage-level failures into `ArchiveUnavailableError`
     */
    private guard<T>(operation: string, statement: () => T): T {
        try {
            return statement();
        } catch (error) {
            if (isUnavailable(error)) {
                throw new ArchiveUnavailableError(`News archive is unavailable during ${operation}`, {
                    cause: error,
                });
            }
            throw error;
        }
    }
}
