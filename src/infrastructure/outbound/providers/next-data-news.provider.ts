// Application
import {
    NewsFetchError,
    type NewsProviderPort,
} from '../../../application/ports/outbound/providers/news.port.js';

// Domain
import { type NewsItem } from '../../../domain/entities/news-item.entity.js';

import { type LoggerPort } from '../../../shared/logger/logger.port.js';

import { extractNewsFromHtml } from './next-data.extractor.js';

// Types
export interface NextDataNewsConfiguration {
    baseUrl: string;
    timeoutMs: number;
    url: string;
    userAgent: string;
}

const REQUEST_HEADERS = {
    Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.9',
    'Cache-Control': 'no-cache',
    Pragma: 'no-cache',
};

/**
 * Fetches a Next.js rendered news listing and extracts its articles
 */
export class NextDataNews implements NewsProviderPort {
    constructor(
        private readonly configuration: NextDataNewsConfiguration,
        private readonly logger: LoggerPort,
    ) {}

    public async fetchNews(): Promise<NewsItem[]> {
        this.logger.debug('Fetching news listing', { url: this.configuration.url });

        const html = await this.fetchHtml();
        const items = extractNewsFromHtml(html, {
            baseUrl: this.configuration.baseUrl,
            logger: this.logger,
        });

        this.logger.info('Fetched news listing', {
            itemCount: items.length,
            url: this.configuration.url,
        });

        return items;
    }

    private async fetchHtml(): Promise<string> {
        let response: Response;

        try {
            response = await fetch(this.configuration.url, {
                headers: { ...REQUEST_HEADERS, 'User-Agent': this.configuration.userAgent },
                signal: AbortSignal.timeout(this.configuration.timeoutMs),
            });
        } catch (error) {
            throw new NewsFetchError(`Failed to reach ${this.configuration.url}`, { cause: error });
        }

        if (response.status >= 400) {
            this.logger.error('News listing returned an error response', {
                status: response.status,
                statusText: response.statusText,
                url: this.configuration.url,
            });
            throw new NewsFetchError(
                `Failed to retrieve news (status ${response.status}) from ${this.configuration.url}`,
            );
        }

        return response.text();
    }
}
