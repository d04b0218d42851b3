// Domain
import { type NewsItem } from '../../../domain/entities/news-item.entity.js';

import { type LoggerPort } from '../../../shared/logger/logger.port.js';

// Ports
import {
    ArchiveUnavailableError,
    type NewsArchivePort,
} from '../../ports/outbound/persistence/news-archive.port.js';
import { type NewsMirrorPort } from '../../ports/outbound/persistence/news-mirror.port.js';

export interface ArchiveFailure {
    error: unknown;
    item: NewsItem;
}

export interface ArchiveResult {
    /** Candidates that could not be stored this time; a later run retries them */
    failures: ArchiveFailure[];
    /** Candidates stored for the first time, in the order received */
    newItems: NewsItem[];
}

/**
 * Use case for archiving a fetched batch and isolating the articles never seen before
 */
export class ArchiveNewsUseCase {
    constructor(
        private readonly logger: LoggerPort,
        private readonly newsArchive: NewsArchivePort,
        private readonly newsMirror: NewsMirrorPort,
    ) {}

    public async execute(candidates: NewsItem[]): Promise<ArchiveResult> {
        this.logger.info('Archiving news batch', { candidateCount: candidates.length });

        const newItems: NewsItem[] = [];
        const failures: ArchiveFailure[] = [];

        // Step 1: Insert each candidate; the archive decides what is new
        for (const item of candidates) {
            try {
                const inserted = await this.newsArchive.insertIfAbsent(item, new Date());
                if (inserted) {
                    newItems.push(item);
                }
            } catch (error) {
                if (error instanceof ArchiveUnavailableError) {
                    this.logger.error('News archive unavailable, aborting batch', {
                        error,
                        identity: item.identity,
                    });
                    throw error;
                }

                this.logger.error('Failed to archive news item', {
                    error,
                    identity: item.identity,
                });
                failures.push({ error, item });
            }
        }

        if (newItems.length > 0) {
            this.logger.info('Identified new news items', { count: newItems.length });
        } else {
            this.logger.info('No new news items detected');
        }

        // Step 2: Bring the mirror in line with the archive, even when nothing was new
        await this.syncMirror();

        return { failures, newItems };
    }

    private async syncMirror(): Promise<void> {
        try {
            const snapshot = await this.newsArchive.listAll();
            await this.newsMirror.sync(snapshot);
        } catch (error) {
            this.logger.warn('Failed to sync news mirror', { error });
        }
    }
}
