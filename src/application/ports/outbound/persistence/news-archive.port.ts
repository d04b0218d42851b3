import { type ArchivedNewsItem } from '../../../../domain/entities/archived-news-item.entity.js';
import { type NewsItem } from '../../../../domain/entities/news-item.entity.js';

/**
 * Raised when the archive storage itself cannot be used (cannot open, read-only, disk full, ...).
 * Unlike a per-record failure, it ends the current run.
 */
export class ArchiveUnavailableError extends Error {
    public override readonly name = 'ArchiveUnavailableError';

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
    }
}

/**
 * News archive port - the authoritative, insert-only store of every article ever seen
 */
export interface NewsArchivePort {
    /**
     * Whether an article with this identity has been committed
     */
    exists(identity: string): Promise<boolean>;

    /**
     * Atomically stores the item unless its identity is already present.
     * Resolves to `true` when this call performed the insert, `false` on a duplicate.
     */
    insertIfAbsent(item: NewsItem, firstSeenAt: Date): Promise<boolean>;

    /**
     * Archived items, most recently first seen first (ties ordered by identity)
     */
    listAll(limit?: number): Promise<ArchivedNewsItem[]>;
}
