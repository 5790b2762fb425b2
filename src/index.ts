/*
 * Fluent Image URL
 *
 * Typed, chainable construction of resize query parameters for an
 * ImageResizer-compatible image server.
 */

export * from './builder';

export { loadConfig, validateConfig, defaultConfig } from './config';
export type { FluentImageConfig, LoggingConfig, UrlConfig } from './config';

export { AppError, ValidationError, InvalidArgumentError, isAppError } from './utils/errors';
export type { ErrorDetails } from './utils/errors';

export { createLogger, defaultLogger } from './utils/logging';
export type { Logger, LogData, LoggerConfig } from './utils/logging';
