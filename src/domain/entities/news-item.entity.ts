import { z } from 'zod/v4';

import { type JsonValue, jsonValueSchema } from '../../shared/json/json-value.js';
import { newsIdentitySchema } from '../value-objects/news-identity.vo.js';

export const identitySchema = newsIdentitySchema;

export const titleSchema = z.string().trim().min(1).describe('The headline of the article.');

export const linkSchema = z.url().describe('Absolute URL of the article.');

export const publishedAtSchema = z
    .date()
    .nullable()
    .describe('Publication date announced by the site, when it could be parsed.');

export const summarySchema = z.string().nullable().describe('Standfirst or summary of the article.');

export const rawPayloadSchema = jsonValueSchema.describe(
    'The source object the article was extracted from, kept verbatim.',
);

export const newsItemSchema = z.object({
    identity: identitySchema,
    link: linkSchema,
    publishedAt: publishedAtSchema,
    rawPayload: rawPayloadSchema,
    summary: summarySchema,
    title: titleSchema,
});

export type NewsItemProps = z.input<typeof newsItemSchema>;

/**
 * @description One article as extracted from the news source
 */
export class NewsItem {
    public readonly identity: string;
    public readonly link: string;
    public readonly publishedAt: Date | null;
    public readonly rawPayload: JsonValue;
    public readonly summary: null | string;
    public readonly title: string;

    public constructor(data: NewsItemProps) {
        const result = newsItemSchema.safeParse(data);

        if (!result.success) {
            throw new Error(`Invalid news item data: ${result.error.message}`);
        }

        const validatedData = result.data;
        this.identity = validatedData.identity;
        this.title = validatedData.title;
        this.link = validatedData.link;
        this.publishedAt = validatedData.publishedAt;
        this.summary = validatedData.summary;
        this.rawPayload = validatedData.rawPayload;
    }
}
