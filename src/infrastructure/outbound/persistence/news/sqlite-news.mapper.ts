import { z } from 'zod/v4';

// Domain
import { ArchivedNewsItem } from '../../../../domain/entities/archived-news-item.entity.js';
import { type NewsItem } from '../../../../domain/entities/news-item.entity.js';

import { jsonValueSchema } from '../../../../shared/json/json-value.js';

const isoDateSchema = z.iso.datetime().transform((date) => new Date(date));

const rawPayloadColumnSchema = z.string().transform((text, ctx) => {
    try {
        return jsonValueSchema.parse(JSON.parse(text));
    } catch {
        ctx.issues.push({ code: 'custom', input: text, message: 'raw_payload is not valid JSON' });
        return z.NEVER;
    }
});

export const newsItemRowSchema = z.object({
    first_seen_at: isoDateSchema,
    identity: z.string(),
    link: z.string(),
    published_at: isoDateSchema.nullable(),
    raw_payload: rawPayloadColumnSchema,
    summary: z.string().nullable(),
    title: z.string(),
});

/**
 * Row shape of the `news_items` table
 */
export interface NewsItemRow {
    first_seen_at: string;
    identity: string;
    link: string;
    published_at: null | string;
    raw_payload: string;
    summary: null | string;
    title: string;
}

export class NewsItemMapper {
    /**
     * Builds the domain object from an untrusted row. Throws on malformed data.
     */
    toDomain(row: unknown): ArchivedNewsItem {
        const parsed = newsItemRowSchema.parse(row);

        return new ArchivedNewsItem({
            firstSeenAt: parsed.first_seen_at,
            identity: parsed.identity,
            link: parsed.link,
            publishedAt: parsed.published_at,
            rawPayload: parsed.raw_payload,
            summary: parsed.summary,
            title: parsed.title,
        });
    }

    toRow(item: NewsItem, firstSeenAt: Date): NewsItemRow {
        return {
            first_seen_at: firstSeenAt.toISOString(),
            identity: item.identity,
            link: item.link,
            published_at: item.publishedAt?.toISOString() ?? null,
            raw_payload: JSON.stringify(item.rawPayload),
            summary: item.summary,
            title: item.title,
        };
    }
}
