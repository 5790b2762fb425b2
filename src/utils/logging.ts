/**
 * Logging utilities for the fluent image URL builder
 *
 * Centralized logger interface with structured data and breadcrumbs. The
 * implementation delegates to Pino.
 */

import type { DestinationStream } from 'pino';
import type { FluentImageConfig } from '../config';
import { createCompatiblePinoLogger } from './pino-compat';

// Type for log data with flexible structure but known types
export type LogData = Record<string, string | number | boolean | null | undefined | string[] | number[] | Record<string, string | number | boolean | null | undefined>>;

export interface Logger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
  breadcrumb(step: string, duration?: number, data?: LogData): void;
}

/**
 * Configuration slice the logger needs
 */
export type LoggerConfig = Pick<FluentImageConfig, 'logging'>;

/**
 * Create a logger instance backed by Pino
 *
 * @param config Configuration holding the logging options
 * @param context Optional context name for the logger (e.g., 'ImageUrlBuilder')
 * @param destination Optional stream the log lines are written to
 */
export function createLogger(
  config: LoggerConfig,
  context?: string,
  destination?: DestinationStream
): Logger {
  return createCompatiblePinoLogger(config, context, destination);
}

// Logger used before configuration is loaded
export const defaultLogger: Logger = createCompatiblePinoLogger({
  logging: {
    level: 'WARN',
    includeTimestamp: true,
    enableStructuredLogs: true,
    enableBreadcrumbs: false,
    prettyPrint: false,
    colorize: false
  }
}, 'default');
