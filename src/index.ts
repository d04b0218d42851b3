#!/usr/bin/env node
import 'dotenv/config';

import { createContainer } from './di/container.js';
import { formatArchiveLine } from './infrastructure/inbound/cli/archive-dump.formatter.js';
import {
    type CliArguments,
    CliUsageError,
    parseCliArguments,
    USAGE,
} from './infrastructure/inbound/cli/cli-arguments.js';

const EXIT_SUCCESS = 0;
const EXIT_FAILURE = 1;
const EXIT_USAGE = 2;

const waitForShutdownSignal = () =>
    new Promise<NodeJS.Signals>((resolve) => {
        process.once('SIGINT', resolve);
        process.once('SIGTERM', resolve);
    });

const run = async (cli: CliArguments): Promise<number> => {
    const container = createContainer(cli.overrides);
    const logger = container.get('Logger');
    const config = container.get('Configuration');
    const database = container.get('Database');
    const monitor = config.getInboundConfiguration().monitor;

    try {
        logger.info('app:start', { env: config.getInboundConfiguration().env });

        if (cli.dumpArchive) {
            const items = await container.get('DumpArchive').execute(cli.limit);
            for (const item of items) {
                process.stdout.write(`${formatArchiveLine(item)}\n`);
            }
            return EXIT_SUCCESS;
        }

        if (!config.getOutboundConfiguration().discord.webhookUrl && !monitor.dryRun) {
            logger.error('app:error', {
                error: new Error(
                    'A webhook URL is required (--webhook-url or NEWSFEED_WEBHOOK_URL) unless --dry-run is set',
                ),
            });
            return EXIT_FAILURE;
        }

        if (monitor.once) {
            await container.get('NewsMonitorTask').run();
            return EXIT_SUCCESS;
        }

        const worker = container.get('Worker');
        await worker.initialize();
        logger.info('app:ready', { intervalSeconds: monitor.intervalSeconds });

        const signal = await waitForShutdownSignal();
        logger.info('app:shutdown', { signal });
        await worker.stop();

        return EXIT_SUCCESS;
    } catch (error) {
        logger.error('app:error', { error });
        return EXIT_FAILURE;
    } finally {
        database.close();
    }
};

const start = async (argv: string[]): Promise<number> => {
    try {
        const cli = parseCliArguments(argv);
        if (cli.help) {
            process.stdout.write(`${USAGE}\n`);
            return EXIT_SUCCESS;
        }
        return await run(cli);
    } catch (error) {
        // No logger exists yet: bad flags or an invalid configuration
        const message = error instanceof Error ? error.message : String(error);
        process.stderr.write(`${message}\n`);
        if (error instanceof CliUsageError) {
            process.stderr.write(`\n${USAGE}\n`);
            return EXIT_USAGE;
        }
        return EXIT_FAILURE;
    }
};

start(process.argv.slice(2)).then(
    (code) => {
        process.exitCode = code;
    },
    (error: unknown) => {
        process.stderr.write(`${String(error)}\n`);
        process.exitCode = EXIT_FAILURE;
    },
);
