/**
 * Run diagnostics: everything a degraded run recovered from, so callers can
 * judge a result without reading logs.
 */

import type {
  EngineWarning,
  MatchingViolation,
  OrderRejection,
  RunDiagnostics,
} from '@backtest-lab/core';
import { LogHelpers, isRetryableError, type Logger } from '@backtest-lab/utils';

export type DiagnosticsLogger = Pick<Logger, 'error' | 'warn'>;

export class DiagnosticsCollector {
  private sessionsProcessed = 0;
  private skippedSessions = 0;
  private readonly warnings: EngineWarning[] = [];
  private readonly rejections: OrderRejection[] = [];

  constructor(private readonly logger: DiagnosticsLogger) {}

  sessionProcessed(): number {
    return ++this.sessionsProcessed;
  }

  get processed(): number {
    return this.sessionsProcessed;
  }

  /**
   * Count a session dropped because `operation` threw; nothing it did is kept
   */
  sessionSkipped(date: number, operation: string, error: unknown): void {
    this.skippedSessions++;
    LogHelpers.recovered(this.logger, operation, error, {
      date,
      retryable: error instanceof Error && isRetryableError(error),
    });
  }

  warn(warning: EngineWarning): void {
    this.warnings.push(warning);
    this.logger.warn(warning.message, {
      code: warning.code,
      symbol: warning.symbol,
      timestamp: warning.timestamp,
    });
  }

  reject(rejections: readonly OrderRejection[]): void {
    for (const rejection of rejections) {
      this.rejections.push(rejection);
      this.logger.warn('Order rejected', { ...rejection });
    }
  }

  build(matchingViolations: readonly MatchingViolation[]): RunDiagnostics {
    return {
      sessionsProcessed: this.sessionsProcessed,
      skippedSessions: this.skippedSessions,
      rejectedOrders: this.rejections.length,
      warnings: this.warnings.slice(),
      rejections: this.rejections.slice(),
      matchingViolations: matchingViolations.slice(),
    };
  }
}
