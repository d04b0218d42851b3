import * as cheerio from 'cheerio';

// Application
import { NewsFetchError } from '../../../application/ports/outbound/providers/news.port.js';

// Domain
import { NewsItem } from '../../../domain/entities/news-item.entity.js';
import { deriveNewsIdentity } from '../../../domain/value-objects/news-identity.vo.js';

import { isJsonObject, type JsonObject, type JsonValue } from '../../../shared/json/json-value.js';
import { type LoggerPort } from '../../../shared/logger/logger.port.js';

const NEXT_DATA_SELECTOR = 'script#__NEXT_DATA__';

// Lower-cased key families that mark an object as a news entry
const TITLE_KEYS = ['title', 'headline', 'name'];
const URL_KEYS = ['url', 'slug', 'permalink', 'path'];
const DATE_KEYS = ['date', 'published', 'publishdate', 'publishdatetime'];

// Field lookups, in order of preference
const TITLE_FIELDS = ['title', 'headline', 'name'];
const LINK_FIELDS = ['url', 'permalink', 'path', 'slug'];
const DATE_FIELDS = ['publishDateTime', 'publishDate', 'published', 'date'];
const SUMMARY_FIELDS = ['summary', 'description', 'standfirst'];

export interface ExtractOptions {
    baseUrl: string;
    logger: LoggerPort;
}

const isNewsCandidate = (node: JsonObject): boolean => {
    const keys = new Set(Object.keys(node).map((key) => key.toLowerCase()));
    const hasAny = (family: string[]) => family.some((key) => keys.has(key));
    return hasAny(TITLE_KEYS) && hasAny(URL_KEYS) && hasAny(DATE_KEYS);
};

const extractFirst = (node: JsonObject, fields: string[]): null | string => {
    for (const field of fields) {
        const value = node[field];
        if (typeof value === 'string' && value.trim()) {
            return value;
        }
        if (typeof value === 'number' && value !== 0) {
            return String(value);
        }
    }
    return null;
};

// Date-time without `Z` or an offset; read as UTC instead of host-local time
const NAIVE_DATE_TIME = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

const parsePublishedAt = (value: string): Date | null => {
    const trimmed = value.trim();
    const date = new Date(
        NAIVE_DATE_TIME.test(trimmed) ? `${trimmed.replace(' ', 'T')}Z` : trimmed,
    );
    return Number.isNaN(date.getTime()) ? null : date;
};

const toNewsItem = (node: JsonObject, baseUrl: string): NewsItem | null => {
    const title = extractFirst(node, TITLE_FIELDS);
    const rawLink = extractFirst(node, LINK_FIELDS);
    const rawDate = extractFirst(node, DATE_FIELDS);

    if (!title || !rawLink || !rawDate) {
        return null;
    }

    const link = new URL(rawLink.trim(), baseUrl).toString();
    const summary = extractFirst(node, SUMMARY_FIELDS)?.trim() ?? null;

    return new NewsItem({
        identity: deriveNewsIdentity({ fields: node, link, title }),
        link,
        publishedAt: parsePublishedAt(rawDate),
        rawPayload: node,
        summary,
        title: title.trim(),
    });
};

/**
 * Reads the Next.js data payload embedded in the page
 */
export function readNextData(html: string): JsonValue {
    const $ = cheerio.load(html);
    const script = $(NEXT_DATA_SELECTOR).first().text();

    if (!script.trim()) {
        throw new NewsFetchError('Could not locate Next.js data payload (__NEXT_DATA__).');
    }

    try {
        return JSON.parse(script);
    } catch (error) {
        throw new NewsFetchError('Next.js data payload is not valid JSON.', { cause: error });
    }
}

/**
 * Walks the whole payload depth-first and returns every news entry, in document order
 */
export function extractNewsFromHtml(html: string, options: ExtractOptions): NewsItem[] {
    const payload = readNextData(html);
    const items: NewsItem[] = [];

    const walk = (node: JsonValue): void => {
        if (Array.isArray(node)) {
            node.forEach(walk);
            return;
        }

        if (!isJsonObject(node)) {
            return;
        }

        if (isNewsCandidate(node)) {
            try {
                const item = toNewsItem(node, options.baseUrl);
                if (item) {
                    items.push(item);
                }
            } catch (error) {
                options.logger.debug('Failed to parse news entry', { error, node });
            }
        }

        Object.values(node).forEach(walk);
    };

    walk(payload);

    if (items.length === 0) {
        options.logger.warn('No news entries were parsed from the payload');
    }

    return items;
}
