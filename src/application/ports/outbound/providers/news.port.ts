import { type NewsItem } from '../../../../domain/entities/news-item.entity.js';

/**
 * Raised when the news listing cannot be retrieved or its payload cannot be read
 */
export class NewsFetchError extends Error {
    public override readonly name = 'NewsFetchError';

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
    }
}

/**
 * News provider port - fetches the listing and extracts candidate articles
 */
export interface NewsProviderPort {
    /**
     * Candidate articles in the order they appear on the source
     */
    fetchNews(): Promise<NewsItem[]>;
}
