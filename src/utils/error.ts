/**
 * Error handling utilities for calendar availability
 */

/**
 * Error codes used throughout the application
 */
export const ErrorCodes = {
  // Configuration errors
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  UNKNOWN_OPTION: 'UNKNOWN_OPTION',

  // Interval errors
  DEGENERATE_INTERVAL: 'DEGENERATE_INTERVAL',

  // Authentication errors
  AUTH_EXPIRED: 'AUTH_EXPIRED',
  AUTH_FAILED: 'AUTH_FAILED',
  AUTH_MISSING: 'AUTH_MISSING',

  // Calendar service errors
  PROVIDER_UNAVAILABLE: 'PROVIDER_UNAVAILABLE',
  PROVIDER_NOT_CONFIGURED: 'PROVIDER_NOT_CONFIGURED',
  CALENDAR_NOT_FOUND: 'CALENDAR_NOT_FOUND',
  PERMISSION_DENIED: 'PERMISSION_DENIED',
  RATE_LIMITED: 'RATE_LIMITED',
  INVALID_RESPONSE: 'INVALID_RESPONSE',

  // Internal errors
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export interface AvailabilityErrorOptions {
  calendarId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  cause?: Error;
}

/**
 * Base error class for calendar availability
 */
export class AvailabilityError extends Error {
  public readonly code: ErrorCode;
  public readonly calendarId?: string;
  public readonly retryable: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, options?: AvailabilityErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = 'AvailabilityError';
    this.code = code;
    this.calendarId = options?.calendarId;
    this.retryable = options?.retryable ?? false;
    this.details = options?.details;
  }

  /**
   * Convert to a JSON-serializable object
   */
  toJSON(): Record<string, unknown> {
    return {
      error: true,
      name: this.name,
      code: this.code,
      message: this.message,
      calendarId: this.calendarId,
      retryable: this.retryable,
      details: this.details,
    };
  }

  /**
   * Format as user-friendly message
   */
  toUserMessage(): string {
    const prefix = this.calendarId ? `[${this.calendarId}] ` : '';
    return `${prefix}${this.message}`;
  }
}

/**
 * Unknown option, wrong value shape, or an invalid weekly template
 */
export class ConfigurationError extends AvailabilityError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.CONFIGURATION_ERROR,
    options?: AvailabilityErrorOptions
  ) {
    super(message, code, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * A constructed work window ended up with start >= end
 */
export class DegenerateIntervalError extends AvailabilityError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.DEGENERATE_INTERVAL, { details });
    this.name = 'DegenerateIntervalError';
  }
}

/**
 * The calendar service failed to answer a query
 */
export class ExternalServiceError extends AvailabilityError {
  constructor(message: string, code: ErrorCode, options?: AvailabilityErrorOptions) {
    super(message, code, options);
    this.name = 'ExternalServiceError';
  }
}

/**
 * Create an unknown option error
 */
export function unknownOptionError(name: string): ConfigurationError {
  return new ConfigurationError(
    `Unknown option ${name}, use -O to see possible options`,
    ErrorCodes.UNKNOWN_OPTION,
    { details: { option: name } }
  );
}

/**
 * Create a calendar not found error
 */
export function calendarNotFoundError(calendarId: string): ExternalServiceError {
  return new ExternalServiceError(
    `Calendar not found: ${calendarId}`,
    ErrorCodes.CALENDAR_NOT_FOUND,
    { calendarId }
  );
}

/**
 * Check if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof AvailabilityError) {
    return error.retryable;
  }
  return false;
}

function messageOf(error: unknown): string {
  return error instanceof Error
    ? error.message
    : typeof error === 'string'
      ? error
      : 'An unexpected error occurred';
}

/**
 * Wrap an unknown error as AvailabilityError
 */
export function wrapError(
  error: unknown,
  context?: {
    calendarId?: string;
    operation?: string;
  }
): AvailabilityError {
  if (error instanceof AvailabilityError) {
    return error;
  }

  const message = messageOf(error);

  return new AvailabilityError(
    context?.operation ? `${context.operation}: ${message}` : message,
    ErrorCodes.INTERNAL_ERROR,
    {
      calendarId: context?.calendarId,
      cause: error instanceof Error ? error : undefined,
    }
  );
}

/**
 * Wrap a failure of the calendar service, keeping the calendar it was about.
 * Errors that already carry a code keep it.
 */
export function toExternalServiceError(
  error: unknown,
  calendarId: string,
  operation: string
): ExternalServiceError {
  if (error instanceof ExternalServiceError && error.calendarId === calendarId) {
    return error;
  }

  if (error instanceof AvailabilityError) {
    return new ExternalServiceError(`${operation} failed for ${calendarId}: ${error.message}`, error.code, {
      calendarId,
      retryable: error.retryable,
      details: error.details,
      cause: error,
    });
  }

  return new ExternalServiceError(
    `${operation} failed for ${calendarId}: ${messageOf(error)}`,
    ErrorCodes.PROVIDER_UNAVAILABLE,
    { calendarId, cause: error instanceof Error ? error : undefined }
  );
}

/**
 * Format an AvailabilityError for the terminal
 */
export function formatError(error: AvailabilityError): string {
  const lines: string[] = [];

  lines.push(`Error: ${error.toUserMessage()}`);
  lines.push(`Code: ${error.code}`);

  if (error.retryable) {
    lines.push('This error is retryable.');
  }

  if (error.details) {
    lines.push(`Details: ${JSON.stringify(error.details)}`);
  }

  return lines.join('\n');
}
