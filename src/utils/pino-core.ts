/**
 * Core Pino logger setup
 *
 * Maps the package's logging options onto Pino options.
 */

import pino from 'pino';
import type { DestinationStream, Logger as PinoLogger, LoggerOptions } from 'pino';
import type { LogData, LoggerConfig } from './logging';

// Map our log levels to Pino levels
const LOG_LEVEL_MAP: Record<string, string> = {
  DEBUG: 'debug',
  INFO: 'info',
  WARN: 'warn',
  ERROR: 'error'
};

// Fields that should be redacted for security/privacy
const SENSITIVE_FIELDS = [
  'password',
  'token',
  'secret',
  'authorization',
  'key',
  'apiKey',
  'auth',
  'credentials',
  'signature'
];

/**
 * Creates a configured Pino logger instance
 *
 * @param config Configuration holding the logging options
 * @param context Optional context name for the logger
 * @param destination Optional stream to write to instead of stdout
 */
export function createPinoInstance(
  config: LoggerConfig,
  context?: string,
  destination?: DestinationStream
): PinoLogger {
  const loggingConfig = config.logging;

  const configuredLevel = loggingConfig?.level ?? 'INFO';
  const pinoLevel = LOG_LEVEL_MAP[configuredLevel] ?? 'info';

  const pinoOptions: LoggerOptions = {
    level: pinoLevel,
    timestamp: loggingConfig?.includeTimestamp !== false,
    messageKey: 'message',
    base: context ? { context } : {},
    redact: {
      paths: SENSITIVE_FIELDS,
      censor: '[REDACTED]'
    }
  };

  // A transport runs in a worker thread and cannot share an explicit destination
  if (loggingConfig?.prettyPrint === true && !destination) {
    pinoOptions.transport = {
      target: 'pino-pretty',
      options: {
        colorize: loggingConfig.colorize === true,
        translateTime: true,
        ignore: 'pid,hostname',
        messageKey: 'message',
        messageFormat: '{if context}[{context}] {end}{message}'
      }
    };
  }

  return destination ? pino(pinoOptions, destination) : pino(pinoOptions);
}

/**
 * Convert our LogData to the object Pino merges into the log line
 */
export function prepareLogData(data?: LogData): Record<string, unknown> {
  return data ? { ...data } : {};
}
