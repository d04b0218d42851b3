import { type ArchivedNewsItem } from '../../../domain/entities/archived-news-item.entity.js';

/**
 * One line per record: `<publishedAt ISO | "-"> | <title> -> <link>`
 */
export function formatArchiveLine(item: ArchivedNewsItem): string {
    const publishedAt = item.publishedAt ? item.publishedAt.toISOString() : '-';
    return `${publishedAt} | ${item.title} -> ${item.link}`;
}
