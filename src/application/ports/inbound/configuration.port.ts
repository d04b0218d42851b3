import { type LoggerLevel } from '../../../shared/logger/logger.port.js';

/**
 * Configuration port providing access to application settings
 */
export interface ConfigurationPort {
    /**
     * Get the inbound configuration
     */
    getInboundConfiguration(): InboundConfigurationPort;

    /**
     * Get the outbound configuration
     */
    getOutboundConfiguration(): OutboundConfigurationPort;
}

/**
 * Inbound configuration (defined by the user)
 */
export interface InboundConfigurationPort {
    env: 'development' | 'production' | 'test';
    logger: {
        level: LoggerLevel;
        prettyPrint: boolean;
    };
    monitor: MonitorConfigurationPort;
}

/**
 * How the monitor runs: once, or every `intervalSeconds`
 */
export interface MonitorConfigurationPort {
    dryRun: boolean;
    intervalSeconds: number;
    once: boolean;
}

/**
 * Outbound configuration (defined by external services)
 */
export interface OutboundConfigurationPort {
    archive: {
        databasePath: string;
    };
    discord: {
        footer: string;
        username: string;
        webhookUrl: string;
    };
    mirror: {
        /** Empty disables the mirror */
        ledgerPath: string;
    };
    source: {
        baseUrl: string;
        timeoutMs: number;
        url: string;
        userAgent: string;
    };
}
