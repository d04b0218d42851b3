import { createHash } from 'node:crypto';
import { z } from 'zod/v4';

/**
 * Keys probed, in order, for an identifier provided by the source site
 */
export const SITE_IDENTIFIER_KEYS = ['id', 'identifier', 'slug', 'urlSlug', 'canonicalSlug'] as const;

const SITE_PREFIX = 'site:';
const HASH_PREFIX = 'hash:';

export const newsIdentitySchema = z
    .string()
    .regex(/^(site:.+|hash:[0-9a-f]{64})$/)
    .describe('Deduplication key of an article, either site-provided or a title+link hash.');

export interface NewsIdentitySource {
    fields: Record<string, unknown>;
    link: string;
    title: string;
}

const normalizeTitle = (title: string): string => title.trim().replace(/\s+/g, ' ');

const pickSiteIdentifier = (fields: Record<string, unknown>): null | string => {
    for (const key of SITE_IDENTIFIER_KEYS) {
        const value = fields[key];
        if (typeof value === 'string' && value.trim()) {
            return value.trim();
        }
        if (typeof value === 'number' && value !== 0 && Number.isFinite(value)) {
            return String(value);
        }
    }
    return null;
};

/**
 * Derives the identity of an article.
 *
 * A site-provided identifier wins (`site:<id>`). Without one, the identity is
 * the SHA-256 of the normalized title and the link (`hash:<hex>`). The two
 * prefixes keep the namespaces apart.
 */
export function deriveNewsIdentity(source: NewsIdentitySource): string {
    const siteIdentifier = pickSiteIdentifier(source.fields);
    if (siteIdentifier) {
        return `${SITE_PREFIX}${siteIdentifier}`;
    }

    const digest = createHash('sha256')
        .update(`${normalizeTitle(source.title)}\n${source.link.trim()}`)
        .digest('hex');

    return `${HASH_PREFIX}${digest}`;
}
