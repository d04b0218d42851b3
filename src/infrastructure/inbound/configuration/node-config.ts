import { z } from 'zod/v4';

// Configuration
import {
    type ConfigurationPort,
    type InboundConfigurationPort,
    type OutboundConfigurationPort,
} from '../../../application/ports/inbound/configuration.port.js';

import { loggerLevelSchema } from '../../../shared/logger/logger.port.js';

/**
 * Longest interval a Node.js timer can wait (2^31 - 1 ms, rounded down to seconds)
 */
export const MAX_INTERVAL_SECONDS = 2_147_483;

const booleanFlagSchema = z.union([
    z.boolean(),
    z.enum(['true', 'false']).transform((value) => value === 'true'),
]);

const configurationSchema = z.object({
    inbound: z.object({
        env: z.enum(['development', 'production', 'test']),
        logger: z.object({
            level: z.string().toLowerCase().pipe(loggerLevelSchema),
            prettyPrint: booleanFlagSchema,
        }),
        monitor: z.object({
            dryRun: booleanFlagSchema.optional().default(false),
            intervalSeconds: z.coerce.number().int().positive().max(MAX_INTERVAL_SECONDS),
            once: booleanFlagSchema.optional().default(false),
        }),
    }),
    outbound: z.object({
        archive: z.object({
            databasePath: z.string().min(1),
        }),
        discord: z.object({
            footer: z.string(),
            username: z.string().min(1),
            webhookUrl: z.union([z.literal(''), z.url()]),
        }),
        mirror: z.object({
            ledgerPath: z.string(),
        }),
        source: z.object({
            baseUrl: z.url(),
            timeoutMs: z.coerce.number().int().positive(),
            url: z.url(),
            userAgent: z.string().min(1),
        }),
    }),
});

type Configuration = z.infer<typeof configurationSchema>;
type ConfigurationInput = z.input<typeof configurationSchema>;

/**
 * Values given on the command line, applied over the file configuration
 */
export interface ConfigurationOverrides {
    databasePath?: string;
    dryRun?: boolean;
    intervalSeconds?: number;
    ledgerPath?: string;
    logLevel?: string;
    once?: boolean;
    webhookUrl?: string;
}

/**
 * Node.js configuration loader backed by node-config
 */
export class NodeConfig implements ConfigurationPort {
    private readonly configuration: Configuration;

    constructor(configurationInput: unknown, overrides?: ConfigurationOverrides) {
        // Overrides go through the same validation as the files
        this.configuration = configurationSchema.parse(
            NodeConfig.applyOverrides(configurationSchema.parse(configurationInput), overrides),
        );
    }

    private static applyOverrides(
        parsed: Configuration,
        overrides?: ConfigurationOverrides,
    ): ConfigurationInput {
        if (!overrides) {
            return parsed;
        }

        const { inbound, outbound } = parsed;

        return {
            inbound: {
                ...inbound,
                logger: {
                    ...inbound.logger,
                    level: overrides.logLevel ?? inbound.logger.level,
                },
                monitor: {
                    dryRun: overrides.dryRun ?? inbound.monitor.dryRun,
                    intervalSeconds: overrides.intervalSeconds ?? inbound.monitor.intervalSeconds,
                    once: overrides.once ?? inbound.monitor.once,
                },
            },
            outbound: {
                ...outbound,
                archive: {
                    databasePath: overrides.databasePath ?? outbound.archive.databasePath,
                },
                discord: {
                    ...outbound.discord,
                    webhookUrl: overrides.webhookUrl ?? outbound.discord.webhookUrl,
                },
                mirror: {
                    ledgerPath: overrides.ledgerPath ?? outbound.mirror.ledgerPath,
                },
            },
        };
    }

    public getInboundConfiguration(): InboundConfigurationPort {
        return this.configuration.inbound;
    }

    public getOutboundConfiguration(): OutboundConfigurationPort {
        return this.configuration.outbound;
    }
}
