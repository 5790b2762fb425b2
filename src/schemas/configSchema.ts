/**
 * Configuration Schema for the fluent image URL builder
 *
 * Zod schemas for validating configuration objects. The inferred types are
 * the configuration types used throughout the package.
 */

import { z } from 'zod';

/**
 * Schema for logging configuration
 */
export const loggingConfigSchema = z.object({
  level: z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR']),
  includeTimestamp: z.boolean(),
  enableStructuredLogs: z.boolean(),
  enableBreadcrumbs: z.boolean().optional(),
  prettyPrint: z.boolean().optional(),
  colorize: z.boolean().optional(),
});

/**
 * Schema for URL building defaults
 */
export const urlConfigSchema = z.object({
  baseUrl: z.string().url().optional(),
});

export const fluentImageConfigSchema = z.object({
  environment: z.enum(['development', 'staging', 'production']),
  logging: loggingConfigSchema.optional(),
  url: urlConfigSchema,
});

export type LoggingConfig = z.infer<typeof loggingConfigSchema>;
export type UrlConfig = z.infer<typeof urlConfigSchema>;
export type FluentImageConfig = z.infer<typeof fluentImageConfigSchema>;
