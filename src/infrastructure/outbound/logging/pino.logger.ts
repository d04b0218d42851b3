import { type DestinationStream, pino, type Logger, type LoggerOptions } from 'pino';

import {
    type LoggerLevel,
    type LoggerMetadata,
    type LoggerPort,
} from '../../../shared/logger/logger.port.js';

export interface PinoLoggerOptions {
    level: LoggerLevel;
    prettyPrint: boolean;
}

const STDERR = 2;

/**
 * Pino-backed logger. Writes to stderr unless a destination is given,
 * so that stdout stays free for command output.
 */
export class PinoLoggerAdapter implements LoggerPort {
    private readonly logger: Logger;

    constructor(options: PinoLoggerOptions, destination?: DestinationStream) {
        const baseOptions: LoggerOptions = {
            level: options.level,
            serializers: {
                error: pino.stdSerializers.err,
            },
        };

        if (options.prettyPrint && !destination) {
            this.logger = pino({
                ...baseOptions,
                transport: {
                    options: { colorize: true, destination: STDERR },
                    target: 'pino-pretty',
                },
            });
            return;
        }

        this.logger = pino(baseOptions, destination ?? pino.destination(STDERR));
    }

    public debug(message: string, metadata?: LoggerMetadata): void {
        this.logger.debug(metadata ?? {}, message);
    }

    public error(message: string, metadata?: LoggerMetadata): void {
        this.logger.error(metadata ?? {}, message);
    }

    public info(message: string, metadata?: LoggerMetadata): void {
        this.logger.info(metadata ?? {}, message);
    }

    public warn(message: string, metadata?: LoggerMetadata): void {
        this.logger.warn(metadata ?? {}, message);
    }
}
