import { Container, Injectable } from '@snap/ts-inject';
import { default as nodeConfiguration } from 'config';

// Configuration
import type { ConfigurationPort } from '../application/ports/inbound/configuration.port.js';
import {
    type ConfigurationOverrides,
    NodeConfig,
} from '../infrastructure/inbound/configuration/node-config.js';

// Application
import type { TaskPort, WorkerPort } from '../application/ports/inbound/worker.port.js';
import type { NewsNotifierPort } from '../application/ports/outbound/notifications/news-notifier.port.js';
import type { NewsArchivePort } from '../application/ports/outbound/persistence/news-archive.port.js';
import type { NewsMirrorPort } from '../application/ports/outbound/persistence/news-mirror.port.js';
import type { NewsProviderPort } from '../application/ports/outbound/providers/news.port.js';
import { ArchiveNewsUseCase } from '../application/use-cases/news/archive-news.use-case.js';
import { DumpArchiveUseCase } from '../application/use-cases/news/dump-archive.use-case.js';
import { MonitorNewsUseCase } from '../application/use-cases/news/monitor-news.use-case.js';

// Infrastructure
import { IntervalWorker } from '../infrastructure/inbound/worker/interval.worker.js';
import { NewsMonitorTask } from '../infrastructure/inbound/worker/news/news-monitor.task.js';
import { PinoLoggerAdapter } from '../infrastructure/outbound/logging/pino.logger.js';
import { DiscordWebhookNotifier } from '../infrastructure/outbound/notifications/discord-webhook.notifier.js';
import {
    JsonlNewsMirrorAdapter,
    NoopNewsMirrorAdapter,
} from '../infrastructure/outbound/persistence/news/jsonl-news-mirror.adapter.js';
import { SqliteNewsArchiveRepository } from '../infrastructure/outbound/persistence/news/sqlite-news-archive.repository.js';
import { SqliteDatabase } from '../infrastructure/outbound/persistence/sqlite.database.js';
import { NextDataNews } from '../infrastructure/outbound/providers/next-data-news.provider.js';

import type { LoggerPort } from '../shared/logger/logger.port.js';

/**
 * Outbound adapters
 */
const databaseFactory = Injectable(
    'Database',
    ['Logger', 'Configuration'] as const,
    (logger: LoggerPort, config: ConfigurationPort) =>
        new SqliteDatabase(logger, config.getOutboundConfiguration().archive.databasePath),
);

const loggerFactory = Injectable(
    'Logger',
    ['Configuration'] as const,
    (config: ConfigurationPort): LoggerPort =>
        new PinoLoggerAdapter({
            level: config.getInboundConfiguration().logger.level,
            prettyPrint: config.getInboundConfiguration().logger.prettyPrint,
        }),
);

const newsFactory = Injectable(
    'News',
    ['Configuration', 'Logger'] as const,
    (config: ConfigurationPort, logger: LoggerPort): NewsProviderPort => {
        const source = config.getOutboundConfiguration().source;
        logger.info('Initializing news provider', { provider: 'NextDataNews', url: source.url });
        return new NextDataNews(source, logger);
    },
);

const notifierFactory = Injectable(
    'Notifier',
    ['Configuration', 'Logger'] as const,
    (config: ConfigurationPort, logger: LoggerPort): NewsNotifierPort =>
        new DiscordWebhookNotifier(config.getOutboundConfiguration().discord, logger),
);

/**
 * Repository adapters
 */
const newsArchiveFactory = Injectable(
    'NewsArchive',
    ['Database', 'Logger'] as const,
    (db: SqliteDatabase, logger: LoggerPort): NewsArchivePort => {
        logger.info('Initializing news archive', { repository: 'SqliteNewsArchive' });
        return new SqliteNewsArchiveRepository(db, logger);
    },
);

const newsMirrorFactory = Injectable(
    'NewsMirror',
    ['Configuration', 'Logger'] as const,
    (config: ConfigurationPort, logger: LoggerPort): NewsMirrorPort => {
        const { ledgerPath } = config.getOutboundConfiguration().mirror;

        if (!ledgerPath) {
            logger.info('News mirror disabled');
            return new NoopNewsMirrorAdapter();
        }

        logger.info('Initializing news mirror', { ledgerPath });
        return new JsonlNewsMirrorAdapter(ledgerPath, logger);
    },
);

/**
 * Use case factories
 */
const archiveNewsUseCaseFactory = Injectable(
    'ArchiveNews',
    ['Logger', 'NewsArchive', 'NewsMirror'] as const,
    (logger: LoggerPort, newsArchive: NewsArchivePort, newsMirror: NewsMirrorPort) =>
        new ArchiveNewsUseCase(logger, newsArchive, newsMirror),
);

const monitorNewsUseCaseFactory = Injectable(
    'MonitorNews',
    ['ArchiveNews', 'Logger', 'News', 'Notifier'] as const,
    (
        archiveNews: ArchiveNewsUseCase,
        logger: LoggerPort,
        newsProvider: NewsProviderPort,
        newsNotifier: NewsNotifierPort,
    ) => new MonitorNewsUseCase(archiveNews, logger, newsProvider, newsNotifier),
);

const dumpArchiveUseCaseFactory = Injectable(
    'DumpArchive',
    ['NewsArchive'] as const,
    (newsArchive: NewsArchivePort) => new DumpArchiveUseCase(newsArchive),
);

/**
 * Task factories
 */
const newsMonitorTaskFactory = Injectable(
    'NewsMonitorTask',
    ['MonitorNews', 'Configuration', 'Logger'] as const,
    (monitorNews: MonitorNewsUseCase, configuration: ConfigurationPort, logger: LoggerPort) =>
        new NewsMonitorTask(monitorNews, configuration.getInboundConfiguration().monitor, logger),
);

const tasksFactory = Injectable(
    'Tasks',
    ['NewsMonitorTask'] as const,
    (newsMonitorTask: NewsMonitorTask): TaskPort[] => [newsMonitorTask],
);

/**
 * Inbound adapters
 */
const configurationFactory = (overrides?: ContainerOverrides) =>
    Injectable('Configuration', () => new NodeConfig(nodeConfiguration, overrides));

const workerFactory = Injectable(
    'Worker',
    ['Logger', 'Tasks'] as const,
    (logger: LoggerPort, tasks: TaskPort[]): WorkerPort => {
        logger.info('Initializing Worker', { implementation: 'IntervalWorker' });
        return new IntervalWorker(logger, tasks);
    },
);

/**
 * Container configuration
 */
export type ContainerOverrides = ConfigurationOverrides;

export const createContainer = (overrides?: ContainerOverrides) =>
    Container
        // Outbound adapters
        .provides(configurationFactory(overrides))
        .provides(loggerFactory)
        .provides(databaseFactory)
        .provides(newsFactory)
        .provides(notifierFactory)
        // Repositories
        .provides(newsArchiveFactory)
        .provides(newsMirrorFactory)
        // Use cases
        .provides(archiveNewsUseCaseFactory)
        .provides(monitorNewsUseCaseFactory)
        .provides(dumpArchiveUseCaseFactory)
        // Tasks
        .provides(newsMonitorTaskFactory)
        .provides(tasksFactory)
        // Inbound adapters
        .provides(workerFactory);
