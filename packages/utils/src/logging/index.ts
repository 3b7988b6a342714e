/**
 * Package-aware logging
 * =====================
 *
 * Usage:
 * ```typescript
 * import { createPackageLogger } from '@backtest-lab/utils';
 *
 * const logger = createPackageLogger('@backtest-lab/simulation');
 * logger.info('Backtest started', { backtestId });
 * ```
 */

import { Logger, createLogger } from '../logger.js';
import type { LogContext } from '../logger.js';

const packageLoggers = new Map<string, Logger>();

/**
 * Create or retrieve a package-specific logger
 */
export function createPackageLogger(packageName: string): Logger {
  const existing = packageLoggers.get(packageName);
  if (existing) {
    return existing;
  }

  const packageLogger = createLogger(packageName);
  packageLoggers.set(packageName, packageLogger);
  return packageLogger;
}

export function getPackageLoggers(): Map<string, Logger> {
  return new Map(packageLoggers);
}

/**
 * Structured log utilities for common operations
 */
export class LogHelpers {
  /**
   * Log a timed operation
   */
  static performance(
    logger: Logger,
    operation: string,
    durationMs: number,
    context?: LogContext
  ): void {
    logger.info(`${operation} completed`, { durationMs, ...context });
  }

  /**
   * Log a recovered failure (the caller carries on)
   */
  static recovered(
    logger: Pick<Logger, 'error'>,
    operation: string,
    error: unknown,
    context?: LogContext
  ): void {
    logger.error(`${operation} failed, continuing`, error, context);
  }
}
