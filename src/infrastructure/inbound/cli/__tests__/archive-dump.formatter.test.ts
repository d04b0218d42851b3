import { describe, expect, test } from 'vitest';

import { ArchivedNewsItem } from '../../../../domain/entities/archived-news-item.entity.js';
import { getMockNewsItem } from '../../../../domain/entities/__mocks__/news-items.mock.js';

import { formatArchiveLine } from '../archive-dump.formatter.js';

describe('formatArchiveLine', () => {
    const firstSeenAt = new Date('2024-05-02T10:00:00.000Z');

    test('should print the publication date, title and link', () => {
        // Given - an archived item with a publication date
        const item = ArchivedNewsItem.from(getMockNewsItem(7), firstSeenAt);

        // When / Then
        expect(formatArchiveLine(item)).toBe(
            '2024-05-01T08:00:00.000Z | Article 7 -> https://news.example.test/news/article-7',
        );
    });

    test('should print a dash when the publication date is unknown', () => {
        const item = ArchivedNewsItem.from(getMockNewsItem(8, { publishedAt: null }), firstSeenAt);

        expect(formatArchiveLine(item)).toBe(
            '- | Article 8 -> https://news.example.test/news/article-8',
        );
    });
});
