import { type LoggerPort } from '../../../shared/logger/logger.port.js';

// Ports
import { type NewsNotifierPort } from '../../ports/outbound/notifications/news-notifier.port.js';
import { type NewsProviderPort } from '../../ports/outbound/providers/news.port.js';

import { type ArchiveNewsUseCase } from './archive-news.use-case.js';

export interface MonitorRunOptions {
    /** Archive as usual but do not notify */
    dryRun: boolean;
}

export interface MonitorRunSummary {
    archived: number;
    delivered: number;
    dryRun: boolean;
    failed: number;
    fetched: number;
    undelivered: number;
}

/**
 * Use case for one monitoring run: fetch the listing, archive it, announce what is new
 */
export class MonitorNewsUseCase {
    constructor(
        private readonly archiveNews: ArchiveNewsUseCase,
        private readonly logger: LoggerPort,
        private readonly newsProvider: NewsProviderPort,
        private readonly newsNotifier: NewsNotifierPort,
    ) {}

    public async execute(options: MonitorRunOptions): Promise<MonitorRunSummary> {
        // Step 1: Fetch candidates; a failure here leaves the archive untouched
        const candidates = await this.newsProvider.fetchNews();

        // Step 2: Archive and isolate the new items
        const { failures, newItems } = await this.archiveNews.execute(candidates);

        const summary: MonitorRunSummary = {
            archived: newItems.length,
            delivered: 0,
            dryRun: options.dryRun,
            failed: failures.length,
            fetched: candidates.length,
            undelivered: 0,
        };

        // Step 3: Announce new items
        if (newItems.length > 0 && options.dryRun) {
            this.logger.info('Dry run enabled - skipping notification', {
                count: newItems.length,
            });
        } else if (newItems.length > 0) {
            const report = await this.newsNotifier.notify(newItems);
            summary.delivered = report.delivered.length;
            summary.undelivered = report.undelivered.length;

            if (report.undelivered.length > 0) {
                this.logger.warn('Some archived news items were not delivered', {
                    identities: report.undelivered.map((item) => item.identity),
                });
            }
        }

        this.logger.info('Monitoring run finished', { ...summary });

        return summary;
    }
}
