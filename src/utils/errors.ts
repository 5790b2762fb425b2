/**
 * Error classes for the fluent image URL builder
 *
 * Every error raised by the package derives from AppError so callers can
 * branch on `code` without checking class identity.
 */

/**
 * Type for error details with structured information
 */
export type ErrorDetails = Record<string, string | number | boolean | null | undefined | string[] | Record<string, string | number | boolean | null | undefined>>;

export class AppError extends Error {
  code: string;
  status: number;
  details?: ErrorDetails;

  constructor(message: string, options: {
    code?: string,
    status?: number,
    details?: ErrorDetails
  } = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = options.code || 'INTERNAL_ERROR';
    this.status = options.status || 500;
    this.details = options.details;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, {
      code: 'VALIDATION_ERROR',
      status: 400,
      details
    });
  }
}

/**
 * Raised when a builder method receives an out-of-range or missing argument
 */
export class InvalidArgumentError extends AppError {
  readonly argument: string;

  constructor(argument: string, message: string, details?: ErrorDetails) {
    super(message, {
      code: 'INVALID_ARGUMENT',
      status: 400,
      details: { argument, ...details }
    });
    this.argument = argument;
  }
}

/**
 * Type guard for errors raised by this package
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
