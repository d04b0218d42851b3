// Configuration
import { type MonitorConfigurationPort } from '../../../../application/ports/inbound/configuration.port.js';

// Application
import { type TaskPort } from '../../../../application/ports/inbound/worker.port.js';
import {
    type MonitorNewsUseCase,
    type MonitorRunSummary,
} from '../../../../application/use-cases/news/monitor-news.use-case.js';

import { type LoggerPort } from '../../../../shared/logger/logger.port.js';

export class NewsMonitorTask implements TaskPort {
    public readonly executeOnStartup = true;
    public readonly intervalMs: number;
    public readonly name = 'news-monitor';

    constructor(
        private readonly monitorNews: MonitorNewsUseCase,
        private readonly monitorConfig: MonitorConfigurationPort,
        private readonly logger: LoggerPort,
    ) {
        this.intervalMs = monitorConfig.intervalSeconds * 1000;
    }

    async execute(): Promise<void> {
        await this.run();
    }

    /**
     * Same as `execute`, but hands back the run summary
     */
    async run(): Promise<MonitorRunSummary> {
        this.logger.info('News monitor task started', { dryRun: this.monitorConfig.dryRun });

        try {
            return await this.monitorNews.execute({ dryRun: this.monitorConfig.dryRun });
        } catch (error) {
            this.logger.error('News monitor task encountered an error', { error });
            throw error;
        }
    }
}
