/**
 * Environment Configuration Utilities
 *
 * Reads typed values out of environment variables with defaults.
 */

import type { LoggingConfig } from '../schemas/configSchema';

/**
 * Environment variables as exposed by `process.env`
 */
export type EnvVars = Record<string, string | undefined>;

type LogLevelName = LoggingConfig['level'];
type EnvironmentName = 'development' | 'staging' | 'production';

/**
 * Get a string from environment variable, treating blank values as absent
 */
export function getStringFromEnv(env: EnvVars, key: string): string | undefined {
  const value = env[key];
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return value.trim();
}

/**
 * Get a boolean from environment variable
 *
 * @param env The environment variables
 * @param key The environment variable key
 * @param defaultValue The default value if the key is not found
 * @returns The boolean value from environment or default
 */
export function getBooleanFromEnv(env: EnvVars, key: string, defaultValue: boolean): boolean {
  const value = env[key];
  if (value !== undefined) {
    const strValue = value.toLowerCase();
    return strValue === 'true' || strValue === '1' || strValue === 'yes';
  }
  return defaultValue;
}

/**
 * Get log level from environment variable, case-insensitively
 */
export function getLogLevelFromEnv(
  env: EnvVars,
  key: string,
  defaultValue: LogLevelName
): LogLevelName {
  const value = env[key];
  if (value !== undefined) {
    const strValue = value.toUpperCase();
    if (strValue === 'DEBUG' || strValue === 'INFO' || strValue === 'WARN' || strValue === 'ERROR') {
      return strValue;
    }
  }
  return defaultValue;
}

/**
 * Get the deployment environment from the first key that holds a known name
 */
export function getEnvironmentFromEnv(
  env: EnvVars,
  keys: string[],
  defaultValue: EnvironmentName
): EnvironmentName {
  for (const key of keys) {
    const value = env[key]?.toLowerCase();
    if (value === 'development' || value === 'staging' || value === 'production') {
      return value;
    }
  }
  return defaultValue;
}
