import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { type MockProxy, mock } from 'vitest-mock-extended';

// Application
import { ArchiveUnavailableError } from '../../../../../application/ports/outbound/persistence/news-archive.port.js';

// Domain
import { getMockNewsItem } from '../../../../../domain/entities/__mocks__/news-items.mock.js';

import { type LoggerPort } from '../../../../../shared/logger/logger.port.js';
import { SqliteDatabase } from '../../sqlite.database.js';
import { SqliteNewsArchiveRepository } from '../sqlite-news-archive.repository.js';

describe('SqliteNewsArchiveRepository', () => {
    const FIRST_SEEN = new Date('2024-06-01T10:00:00.000Z');
    const LATER = new Date('2024-06-01T11:00:00.000Z');

    let mockLogger: MockProxy<LoggerPort>;
    let database: SqliteDatabase;
    let repository: SqliteNewsArchiveRepository;

    beforeEach(() => {
        mockLogger = mock<LoggerPort>();
        database = new SqliteDatabase(mockLogger, ':memory:');
        repository = new SqliteNewsArchiveRepository(database, mockLogger);
    });

    afterEach(() => {
        database.close();
    });

    describe('insertIfAbsent', () => {
        test('should insert an unknown item and report it as inserted', async () => {
            // Given - an empty archive
            const item = getMockNewsItem(1);

            // When - inserting the item
            const inserted = await repository.insertIfAbsent(item, FIRST_SEEN);

            // Then - it is stored
            expect(inserted).toBe(true);
            expect(await repository.exists('site:1')).toBe(true);
        });

        test('should keep the first copy when the identity is already stored', async () => {
            // Given - an archived item
            await repository.insertIfAbsent(getMockNewsItem(1, { summary: 'first' }), FIRST_SEEN);

            // When - inserting a copy with the same identity
            const inserted = await repository.insertIfAbsent(
                getMockNewsItem(1, { summary: 'second', title: 'Changed title' }),
                LATER,
            );

            // Then - the duplicate is ignored without error
            expect(inserted).toBe(false);
            const [stored] = await repository.listAll();
            expect(stored.summary).toBe('first');
            expect(stored.title).toBe('Article 1');
            expect(stored.firstSeenAt).toEqual(FIRST_SEEN);
        });

        test('should not leave a partial row when the write fails', async () => {
            // Given - a trigger rejecting one identity
            database
                .getClient()
                .exec(
                    `CREATE TRIGGER reject_two BEFORE INSERT ON news_items
                     WHEN NEW.identity = 'site:2'
                     BEGIN SELECT RAISE(ABORT, 'simulated failure'); END;`,
                );

            // When - inserting the rejected item
            const insert = repository.insertIfAbsent(getMockNewsItem(2), FIRST_SEEN);

            // Then - the error is a record-level one and nothing is retrievable
            await expect(insert).rejects.toThrow('simulated failure');
            await expect(insert).rejects.not.toBeInstanceOf(ArchiveUnavailableError);
            expect(await repository.exists('site:2')).toBe(false);
        });

        test('should raise ArchiveUnavailableError when the database is closed', async () => {
            // Given - a closed database
            database.close();

            // When / Then - the store is reported unavailable
            await expect(
                repository.insertIfAbsent(getMockNewsItem(1), FIRST_SEEN),
            ).rejects.toBeInstanceOf(ArchiveUnavailableError);
        });
    });

    describe('exists', () => {
        test('should return false for an unknown identity', async () => {
            expect(await repository.exists('site:404')).toBe(false);
        });
    });

    describe('listAll', () => {
        test('should order by first sighting, most recent first, then by identity', async () => {
            // Given - items seen at two different times, two of them at the same instant
            await repository.insertIfAbsent(getMockNewsItem('b'), FIRST_SEEN);
            await repository.insertIfAbsent(getMockNewsItem('c'), LATER);
            await repository.insertIfAbsent(getMockNewsItem('a'), LATER);

            // When - listing the archive
            const items = await repository.listAll();

            // Then - newest first, ties ordered by identity
            expect(items.map((item) => item.identity)).toEqual(['site:a', 'site:c', 'site:b']);
        });

        test('should honour the limit', async () => {
            await repository.insertIfAbsent(getMockNewsItem(1), FIRST_SEEN);
            await repository.insertIfAbsent(getMockNewsItem(2), LATER);

            const items = await repository.listAll(1);

            expect(items.map((item) => item.identity)).toEqual(['site:2']);
        });

        test('should return every stored field, raw payload included', async () => {
            // Given - an item with a nested payload and no publication date
            const rawPayload = { id: 9, meta: { tags: ['golf', 'dp world'], score: -4.5 }, x: null };
            await repository.insertIfAbsent(
                getMockNewsItem(9, { publishedAt: null, rawPayload, summary: null }),
                FIRST_SEEN,
            );

            // When - reading it back
            const [item] = await repository.listAll();

            // Then - the payload comes back unchanged
            expect(item.rawPayload).toEqual(rawPayload);
            expect(item.publishedAt).toBeNull();
            expect(item.summary).toBeNull();
            expect(item.link).toBe('https://news.example.test/news/article-9');
            expect(item.firstSeenAt).toEqual(FIRST_SEEN);
        });

        test('should skip malformed rows and report them', async () => {
            // Given - a valid item and a row with a broken payload and date
            await repository.insertIfAbsent(getMockNewsItem(1), FIRST_SEEN);
            database
                .getClient()
                .prepare(
                    `INSERT INTO news_items (identity, title, link, summary, published_at, first_seen_at, raw_payload)
                     VALUES ('site:broken', 'Broken', 'https://news.example.test/b', NULL, NULL, 'yesterday', '{oops')`,
                )
                .run();

            // When - listing the archive
            const items = await repository.listAll();

            // Then - only the valid row is returned and the broken one is reported
            expect(items.map((item) => item.identity)).toEqual(['site:1']);
            expect(mockLogger.warn).toHaveBeenCalledWith('Skipping malformed archive row', {
                error: expect.any(Error),
                identity: 'site:broken',
            });
        });
    });
});
