import { type JsonValue } from '../../../shared/json/json-value.js';
import { NewsItem } from '../news-item.entity.js';

/**
 * Generates a single mock `NewsItem` with a site identity of `site:<id>`.
 */
export function getMockNewsItem(
    id: number | string,
    options?: {
        link?: string;
        publishedAt?: Date | null;
        rawPayload?: JsonValue;
        summary?: null | string;
        title?: string;
    },
): NewsItem {
    return new NewsItem({
        identity: `site:${id}`,
        link: options?.link ?? `https://news.example.test/news/article-${id}`,
        publishedAt:
            options?.publishedAt !== undefined
                ? options.publishedAt
                : new Date('2024-05-01T08:00:00.000Z'),
        rawPayload: options?.rawPayload ?? { id, title: `Article ${id}` },
        summary: options?.summary !== undefined ? options.summary : `Summary of article ${id}`,
        title: options?.title ?? `Article ${id}`,
    });
}

/**
 * Generates `count` mock news items with ids 1..count.
 */
export function getMockNewsItems(count: number): NewsItem[] {
    return Array.from({ length: count }, (_, index) => getMockNewsItem(index + 1));
}
