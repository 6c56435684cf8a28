/**
 * Centralized logging service
 * Replaces console.log statements for production safety
 */

import * as Sentry from '@sentry/node';

export interface LogContext {
  [key: string]: unknown;
}

class Logger {
  private isDevelopment = process.env.NODE_ENV === 'development';
  private isTest = process.env.NODE_ENV === 'test';

  /**
   * Log debug information (only in development)
   */
  debug(message: string, context?: LogContext): void {
    if (this.isDevelopment && !this.isTest) {
      console.debug(`[DEBUG] ${message}`, context || '');
    }
  }

  /**
   * Log general information
   */
  info(message: string, context?: LogContext): void {
    if (this.isDevelopment && !this.isTest) {
      console.info(`[INFO] ${message}`, context || '');
    }

    // Send to monitoring outside development
    if (!this.isDevelopment) {
      Sentry.addBreadcrumb({
        message,
        level: 'info',
        data: context,
      });
    }
  }

  /**
   * Log warnings
   */
  warn(message: string, context?: LogContext): void {
    if (this.isDevelopment && !this.isTest) {
      console.warn(`[WARN] ${message}`, context || '');
    }

    Sentry.captureMessage(message, 'warning');
  }

  /**
   * Log errors
   */
  error(message: string, error?: Error | unknown, context?: LogContext): void {
    if (this.isDevelopment && !this.isTest) {
      console.error(`[ERROR] ${message}`, error || '', context || '');
    }

    if (error instanceof Error) {
      Sentry.captureException(error, {
        extra: { message, ...context },
      });
    } else {
      Sentry.captureMessage(message, 'error');
    }
  }

  /**
   * Log API requests
   */
  api(method: string, path: string, context?: LogContext): void {
    const message = `${method} ${path}`;

    if (this.isDevelopment && !this.isTest) {
      console.log(`[API] ${message}`, context || '');
    }

    if (!this.isDevelopment) {
      Sentry.addBreadcrumb({
        type: 'http',
        category: 'api',
        message,
        data: context,
      });
    }
  }

  /**
   * Log database statements
   */
  db(operation: string, table: string, context?: LogContext): void {
    const message = `${operation} ${table}`;

    if (this.isDevelopment && !this.isTest) {
      console.log(`[DB] ${message}`, context || '');
    }

    if (!this.isDevelopment) {
      Sentry.addBreadcrumb({
        type: 'query',
        category: 'database',
        message,
        data: context,
      });
    }
  }

  /**
   * Log settlement (money-moving) events
   */
  settlement(event: string, context?: LogContext): void {
    const message = `Settlement: ${event}`;

    if (this.isDevelopment && !this.isTest) {
      console.log(`[SETTLEMENT] ${message}`, context || '');
    }

    // Money movements always leave a breadcrumb
    Sentry.addBreadcrumb({
      category: 'settlement',
      message,
      data: context,
    });
  }
}

// Export singleton instance
export const logger = new Logger();

// Export for testing
export { Logger };
