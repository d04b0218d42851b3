import { describe, expect, test } from 'vitest';

import { ArchivedNewsItem } from '../archived-news-item.entity.js';
import { NewsItem } from '../news-item.entity.js';

describe('NewsItem', () => {
    const validData = {
        identity: 'site:1',
        link: 'https://news.example.test/news/1',
        publishedAt: new Date('2024-05-01T08:00:00.000Z'),
        rawPayload: { id: 1, nested: { tags: ['golf', null] } },
        summary: 'Summary',
        title: '  Round one report ',
    };

    test('should create a news item from valid data', () => {
        // Given - valid data with a padded title
        // When - creating the entity
        const item = new NewsItem(validData);

        // Then - fields are kept and the title is trimmed
        expect(item.identity).toBe('site:1');
        expect(item.title).toBe('Round one report');
        expect(item.rawPayload).toEqual({ id: 1, nested: { tags: ['golf', null] } });
    });

    test('should accept missing publication date and summary', () => {
        const item = new NewsItem({ ...validData, publishedAt: null, summary: null });

        expect(item.publishedAt).toBeNull();
        expect(item.summary).toBeNull();
    });

    test('should reject an empty title', () => {
        expect(() => new NewsItem({ ...validData, title: '   ' })).toThrow('Invalid news item data');
    });

    test('should reject a malformed identity', () => {
        expect(() => new NewsItem({ ...validData, identity: 'no-prefix' })).toThrow(
            'Invalid news item data',
        );
    });

    test('should reject a relative link', () => {
        expect(() => new NewsItem({ ...validData, link: '/news/1' })).toThrow(
            'Invalid news item data',
        );
    });
});

describe('ArchivedNewsItem', () => {
    test('should copy a news item and stamp its first sighting', () => {
        // Given - a news item
        const item = new NewsItem({
            identity: 'site:2',
            link: 'https://news.example.test/news/2',
            publishedAt: null,
            rawPayload: { id: 2 },
            summary: null,
            title: 'Second',
        });
        const firstSeenAt = new Date('2024-06-01T10:00:00.000Z');

        // When - archiving it
        const archived = ArchivedNewsItem.from(item, firstSeenAt);

        // Then - every field is carried over
        expect(archived).toBeInstanceOf(NewsItem);
        expect(archived.identity).toBe('site:2');
        expect(archived.firstSeenAt).toEqual(firstSeenAt);
        expect(archived.rawPayload).toEqual({ id: 2 });
    });

    test('should reject an invalid first sighting date', () => {
        expect(
            () =>
                new ArchivedNewsItem({
                    firstSeenAt: new Date('not a date'),
                    identity: 'site:3',
                    link: 'https://news.example.test/news/3',
                    publishedAt: null,
                    rawPayload: null,
                    summary: null,
                    title: 'Third',
                }),
        ).toThrow('Invalid archived news item data');
    });
});
