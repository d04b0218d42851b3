import { parseArgs } from 'node:util';

import {
    type ConfigurationOverrides,
    MAX_INTERVAL_SECONDS,
} from '../configuration/node-config.js';

export class CliUsageError extends Error {
    override readonly name = 'CliUsageError';
}

export interface CliArguments {
    dumpArchive: boolean;
    help: boolean;
    limit?: number;
    overrides: ConfigurationOverrides;
}

export const USAGE = `Usage: news-archive-monitor [options]

Options:
  --webhook-url <url>   Discord webhook receiving new articles
  --database <path>     SQLite archive location
  --ledger <path>       JSONL mirror location (empty disables it)
  --interval <seconds>  Seconds between two runs
  --once                Run a single time and exit
  --dry-run             Archive without sending notifications
  --dump-archive        Print the archive and exit
  --limit <count>       Maximum records printed by --dump-archive
  --log-level <level>   trace, debug, info, warn, error, fatal or silent
  -h, --help            Show this message`;

const parsePositiveInteger = (
    flag: string,
    value: string | undefined,
    max = Number.MAX_SAFE_INTEGER,
): number | undefined => {
    if (value === undefined) {
        return undefined;
    }

    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new CliUsageError(`--${flag} expects a positive integer, received "${value}"`);
    }
    if (parsed > max) {
        throw new CliUsageError(`--${flag} must be at most ${max}, received "${value}"`);
    }

    return parsed;
};

const readFlags = (argv: string[]) => {
    try {
        return parseArgs({
            allowPositionals: false,
            args: argv,
            options: {
                database: { type: 'string' },
                'dry-run': { type: 'boolean' },
                'dump-archive': { type: 'boolean' },
                help: { short: 'h', type: 'boolean' },
                interval: { type: 'string' },
                ledger: { type: 'string' },
                limit: { type: 'string' },
                'log-level': { type: 'string' },
                once: { type: 'boolean' },
                'webhook-url': { type: 'string' },
            },
            strict: true,
        }).values;
    } catch (error) {
        throw new CliUsageError(error instanceof Error ? error.message : String(error), {
            cause: error,
        });
    }
};

/**
 * Reads command line flags into configuration overrides.
 * Flags left out stay `undefined` so the file configuration applies.
 */
export function parseCliArguments(argv: string[]): CliArguments {
    const values = readFlags(argv);

    return {
        dumpArchive: values['dump-archive'] ?? false,
        help: values.help ?? false,
        limit: parsePositiveInteger('limit', values.limit),
        overrides: {
            databasePath: values.database,
            dryRun: values['dry-run'],
            intervalSeconds: parsePositiveInteger(
                'interval',
                values.interval,
                MAX_INTERVAL_SECONDS,
            ),
            ledgerPath: values.ledger,
            logLevel: values['log-level'],
            once: values.once,
            webhookUrl: values['webhook-url'],
        },
    };
}
