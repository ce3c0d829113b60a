import { Logger } from '@nestjs/common';

/**
 * Static logging helpers for code paths without an injected Nest logger.
 * Debug output is suppressed in production and while tests run; errors
 * always log.
 */
export class AppLogger {
  private static readonly isProduction = process.env.NODE_ENV === 'production';
  private static readonly isTest =
    process.env.NODE_ENV === 'test' || process.env.JEST_WORKER_ID !== undefined;

  static debug(message: string, context?: string): void {
    if (!this.isProduction && !this.isTest) {
      Logger.debug(message, context);
    }
  }

  static error(message: string, trace?: string, context?: string): void {
    Logger.error(message, trace, context);
  }

  /**
   * Performance logging with timing
   */
  static logWithTiming(operation: string, startTime: number, context?: string): void {
    const duration = Date.now() - startTime;
    this.debug(`${operation} completed in ${duration}ms`, context);
  }

  /**
   * Ledger read/write logging
   */
  static logLedgerCall(contract: string, method: string, duration?: number): void {
    const message = duration !== undefined
      ? `ledger ${method} on ${contract} (${duration}ms)`
      : `ledger ${method} on ${contract}`;
    this.debug(message, 'Ledger');
  }
}
