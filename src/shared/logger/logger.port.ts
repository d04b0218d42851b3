import { z } from 'zod/v4';

export const loggerLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

export type LoggerLevel = z.infer<typeof loggerLevelSchema>;

/**
 * Structured context attached to a log line
 */
export type LoggerMetadata = Record<string, unknown>;

/**
 * Logger port for structured application logging
 * @description Messages are short event names, details go into the metadata object
 */
export interface LoggerPort {
    debug(message: string, metadata?: LoggerMetadata): void;
    error(message: string, metadata?: LoggerMetadata): void;
    info(message: string, metadata?: LoggerMetadata): void;
    warn(message: string, metadata?: LoggerMetadata): void;
}
