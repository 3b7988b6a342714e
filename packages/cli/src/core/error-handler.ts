/**
 * Error Handler - one-line messages on stderr, full detail in the log
 */

import { AppError, isOperationalError } from '@backtest-lab/utils';
import { logger } from '../logger.js';

/**
 * Format error for user display
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : 'An unexpected error occurred';
}

/**
 * Log error with full context (for debugging)
 */
export function logError(error: unknown, context?: Record<string, unknown>): void {
  const details = error instanceof AppError ? { code: error.code, ...error.context } : {};
  logger.error('CLI error', error, { ...details, ...context });
}

/**
 * Handle and format error for CLI output
 */
export function handleError(error: unknown, context?: Record<string, unknown>): string {
  logError(error, context);
  return formatError(error);
}

/**
 * Print the error and exit; operational errors exit 1, anything else 2
 */
export function die(error: unknown): never {
  process.stderr.write(`Error: ${handleError(error)}\n`);
  process.exit(error instanceof Error && isOperationalError(error) ? 1 : 2);
}
