/**
 * Custom Error Classes
 * ====================
 * Standardized error classes for better error handling and debugging.
 */

export type ErrorContext = Record<string, unknown>;

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: ErrorContext;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string = 'APP_ERROR',
    statusCode: number = 500,
    context?: ErrorContext,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;
    this.isOperational = isOperational;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      context: this.context,
      isOperational: this.isOperational,
      stack: this.stack,
    };
  }
}

/**
 * Validation error - for input validation failures
 */
export class ValidationError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'VALIDATION_ERROR', 400, context);
  }
}

/**
 * Not found error - for missing resources
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string, context?: ErrorContext) {
    const message = identifier
      ? `${resource} with identifier '${identifier}' not found`
      : `${resource} not found`;
    super(message, 'NOT_FOUND', 404, { resource, identifier, ...context });
  }
}

/**
 * Configuration error - for configuration issues
 */
export class ConfigurationError extends AppError {
  constructor(message: string, configKey?: string, context?: ErrorContext) {
    super(message, 'CONFIGURATION_ERROR', 500, { configKey, ...context });
  }
}

/**
 * Data unavailable - the historical data collaborator could not serve a request
 */
export class DataUnavailableError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'DATA_UNAVAILABLE', 503, context);
  }
}

/**
 * Timeout error - a data load that did not answer in time
 */
export class TimeoutError extends AppError {
  public readonly timeoutMs?: number;

  constructor(message: string = 'Operation timed out', timeoutMs?: number, context?: ErrorContext) {
    super(message, 'TIMEOUT_ERROR', 504, { timeoutMs, ...context });
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Backtest setup error - raised before the first session runs
 */
export class BacktestSetupError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'BACKTEST_SETUP_ERROR', 400, context);
  }
}

/**
 * Backtest cancelled - a cancelled run never yields a result
 */
export class BacktestCancelledError extends AppError {
  public readonly sessionsCompleted: number;

  constructor(sessionsCompleted: number, context?: ErrorContext) {
    super(
      `Backtest cancelled after ${sessionsCompleted} session(s)`,
      'BACKTEST_CANCELLED',
      499,
      { sessionsCompleted, ...context }
    );
    this.sessionsCompleted = sessionsCompleted;
  }
}

/**
 * Matching error - a fill the ledger cannot accept
 */
export class MatchingError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'MATCHING_ERROR', 422, context, false);
  }
}

/**
 * Check if error is an operational error (expected errors that should be handled)
 */
export function isOperationalError(error: Error): boolean {
  if (error instanceof AppError) {
    return error.isOperational;
  }
  return false;
}

/**
 * Failures worth retrying later: missing data and timeouts
 */
export function isRetryableError(error: Error): boolean {
  return error instanceof DataUnavailableError || error instanceof TimeoutError;
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  return new Error(typeof error === 'string' ? error : JSON.stringify(error));
}
