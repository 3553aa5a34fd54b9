/**
 * Error Logger
 *
 * Keeps a bounded history of recent errors and forwards each one to the
 * structured logger.
 */

import { createComponentLogger } from '../logger';
import { ErrorInfo, AppError, ErrorCategory, ErrorSeverity } from './types';

const log = createComponentLogger('errors');

/**
 * Error logger class for managing error logs
 */
export class ErrorLogger {
  private static logs: ErrorInfo[] = [];
  private static maxLogs = 1000;

  /**
   * Log an error with technical details
   */
  static logError(error: AppError | Error): void {
    const errorInfo: ErrorInfo = error instanceof AppError
      ? {
          category: error.category,
          severity: error.severity,
          userMessage: error.userMessage,
          technicalDetails: error.technicalDetails,
          timestamp: error.timestamp,
          context: error.context,
          recoverable: error.recoverable,
          suggestedAction: error.suggestedAction
        }
      : {
          category: ErrorCategory.UNEXPECTED,
          severity: ErrorSeverity.CRITICAL,
          userMessage: 'An unexpected error occurred',
          technicalDetails: error.message,
          timestamp: new Date(),
          recoverable: false
        };

    this.logs.push(errorInfo);

    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-this.maxLogs);
    }

    log.error(
      {
        category: errorInfo.category,
        severity: errorInfo.severity,
        details: errorInfo.technicalDetails,
        context: errorInfo.context
      },
      errorInfo.userMessage
    );
  }

  static getLogs(): ErrorInfo[] {
    return [...this.logs];
  }

  static clearLogs(): void {
    this.logs = [];
  }
}
