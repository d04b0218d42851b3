import { z } from 'zod/v4';

import { NewsItem, newsItemSchema } from './news-item.entity.js';

export const firstSeenAtSchema = z
    .date()
    .describe('When the archive first stored the article. Never taken from the site.');

export const archivedNewsItemSchema = newsItemSchema.extend({
    firstSeenAt: firstSeenAtSchema,
});

export type ArchivedNewsItemProps = z.input<typeof archivedNewsItemSchema>;

/**
 * @description An article as held by the archive, stamped with its first sighting
 */
export class ArchivedNewsItem extends NewsItem {
    public readonly firstSeenAt: Date;

    public constructor(data: ArchivedNewsItemProps) {
        super(data);

        const result = firstSeenAtSchema.safeParse(data.firstSeenAt);
        if (!result.success) {
            throw new Error(`Invalid archived news item data: ${result.error.message}`);
        }

        this.firstSeenAt = result.data;
    }

    public static from(item: NewsItem, firstSeenAt: Date): ArchivedNewsItem {
        return new ArchivedNewsItem({
            firstSeenAt,
            identity: item.identity,
            link: item.link,
            publishedAt: item.publishedAt,
            rawPayload: item.rawPayload,
            summary: item.summary,
            title: item.title,
        });
    }
}
