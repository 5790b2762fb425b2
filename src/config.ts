/**
 * Configuration management for the fluent image URL builder
 *
 * Defaults are overlaid with environment variables and validated against the
 * zod schema before use.
 */

import { fluentImageConfigSchema } from './schemas/configSchema';
import type { FluentImageConfig } from './schemas/configSchema';
import { ValidationError } from './utils/errors';
import type { EnvVars } from './utils/env-config';
import {
  getBooleanFromEnv,
  getEnvironmentFromEnv,
  getLogLevelFromEnv,
  getStringFromEnv
} from './utils/env-config';

export type { FluentImageConfig, LoggingConfig, UrlConfig } from './schemas/configSchema';

export const defaultConfig: FluentImageConfig = {
  environment: 'development',
  logging: {
    level: 'INFO',
    includeTimestamp: true,
    enableStructuredLogs: true,
    enableBreadcrumbs: true,
    prettyPrint: false,
    colorize: false
  },
  url: {}
};

/**
 * Validate a configuration object, raising a ValidationError on failure
 */
export function validateConfig(candidate: unknown): FluentImageConfig {
  const result = fluentImageConfigSchema.safeParse(candidate);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError('Invalid configuration', { issues });
  }
  return result.data;
}

/**
 * Load configuration from environment variables
 *
 * @param env Environment variables, `process.env` by default
 */
export function loadConfig(env: EnvVars = process.env): FluentImageConfig {
  const logging = defaultConfig.logging;
  const baseUrl = getStringFromEnv(env, 'IMAGE_URL_BASE');

  return validateConfig({
    environment: getEnvironmentFromEnv(env, ['IMAGE_URL_ENV', 'NODE_ENV'], defaultConfig.environment),
    logging: {
      level: getLogLevelFromEnv(env, 'LOG_LEVEL', logging?.level ?? 'INFO'),
      includeTimestamp: getBooleanFromEnv(env, 'LOG_INCLUDE_TIMESTAMP', logging?.includeTimestamp ?? true),
      enableStructuredLogs: getBooleanFromEnv(env, 'LOG_STRUCTURED', logging?.enableStructuredLogs ?? true),
      enableBreadcrumbs: getBooleanFromEnv(env, 'LOG_BREADCRUMBS', logging?.enableBreadcrumbs ?? true),
      prettyPrint: getBooleanFromEnv(env, 'LOG_PRETTY', logging?.prettyPrint ?? false),
      colorize: getBooleanFromEnv(env, 'LOG_COLORIZE', logging?.colorize ?? false)
    },
    url: baseUrl ? { baseUrl } : {}
  });
}
