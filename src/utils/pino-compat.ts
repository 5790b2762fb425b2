/**
 * Adapter implementing our Logger interface on top of Pino
 */

import type { DestinationStream } from 'pino';
import type { Logger, LogData, LoggerConfig } from './logging';
import { createPinoInstance, prepareLogData } from './pino-core';

/**
 * Create a logger instance using Pino that's compatible with our Logger interface
 *
 * @param config Configuration holding the logging options
 * @param context Optional context name for the logger
 * @param destination Optional stream to write to instead of stdout
 */
export function createCompatiblePinoLogger(
  config: LoggerConfig,
  context?: string,
  destination?: DestinationStream
): Logger {
  const pinoLogger = createPinoInstance(config, context, destination);

  // Breadcrumbs default to on, structured logs to off
  const enableBreadcrumbs = config.logging?.enableBreadcrumbs !== false;
  const useStructuredLogs = config.logging?.enableStructuredLogs === true;

  function debug(message: string, data?: LogData): void {
    pinoLogger.debug(prepareLogData(data), message);
  }

  function info(message: string, data?: LogData): void {
    pinoLogger.info(prepareLogData(data), message);
  }

  function warn(message: string, data?: LogData): void {
    pinoLogger.warn(prepareLogData(data), message);
  }

  function error(message: string, data?: LogData): void {
    pinoLogger.error(prepareLogData(data), message);
  }

  /**
   * Log a breadcrumb entry for tracking the execution path
   *
   * @param step The description of the execution step
   * @param duration Optional duration in milliseconds
   * @param data Optional additional data
   */
  function breadcrumb(step: string, duration?: number, data?: LogData): void {
    if (!enableBreadcrumbs) {
      return;
    }

    const breadcrumbData = {
      type: 'breadcrumb',
      breadcrumb: true,
      ...(useStructuredLogs ? prepareLogData(data) : {}),
      ...(duration !== undefined ? { durationMs: duration } : {})
    };

    // Without structured logs the data travels inside the message
    let message = `BREADCRUMB: ${step}`;
    if (!useStructuredLogs && data) {
      message += ` ${JSON.stringify(data)}`;
    }

    pinoLogger.info(breadcrumbData, message);
  }

  return {
    debug,
    info,
    warn,
    error,
    breadcrumb
  };
}
