/**
 * Argument validation for builder expressions
 */

import { z } from 'zod';
import { InvalidArgumentError } from '../utils/errors';
import type { Logger } from '../utils/logging';
import { AnchorPositions } from './commands';

// Largest value the image server accepts for a pixel dimension (signed 32-bit)
export const MAX_PIXELS = 2147483647;

// Pixel dimensions are whole, positive numbers
export const pixelSchema = z.number().int().positive().max(MAX_PIXELS);

// Multipliers may be fractional but must render without an exponent
export const multiplierSchema = z
  .number()
  .finite()
  .positive()
  .refine(value => !/e/i.test(String(value)), 'Multiplier must render as a plain decimal');

export const anchorSchema = z.enum(AnchorPositions);

export const pathSchema = z.string().regex(/\S/);

function printable(value: unknown): string | number | boolean | null | undefined {
  if (value === null || value === undefined) {
    return value;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return typeof value;
}

/**
 * Parse an argument with the given schema, throwing InvalidArgumentError when
 * it does not match. Nothing is written before this returns.
 *
 * @param schema Schema the value has to satisfy
 * @param argument Name of the argument being checked
 * @param value The value passed by the caller
 * @param message Message for the error raised on failure
 * @param logger Logger that records the rejection
 */
export function parseArgument<T>(
  schema: z.ZodType<T>,
  argument: string,
  value: unknown,
  message: string,
  logger: Logger
): T {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }

  logger.warn('Rejected builder argument', {
    argument,
    value: printable(value),
    issues: result.error.issues.map(issue => issue.message)
  });
  throw new InvalidArgumentError(argument, message, { value: printable(value) });
}

/**
 * Throw InvalidArgumentError when a required reference is null or undefined
 */
export function requireArgument<T>(argument: string, value: T | null | undefined, logger: Logger): T {
  if (value === null || value === undefined) {
    logger.warn('Missing required argument', { argument });
    throw new InvalidArgumentError(argument, `Argument "${argument}" is required.`);
  }
  return value;
}
