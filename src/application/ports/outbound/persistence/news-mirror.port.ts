import { type ArchivedNewsItem } from '../../../../domain/entities/archived-news-item.entity.js';

/**
 * News mirror port - a human-readable copy of the whole archive
 */
export interface NewsMirrorPort {
    /**
     * Replaces the mirror contents with the given snapshot
     */
    sync(snapshot: ArchivedNewsItem[]): Promise<void>;
}
