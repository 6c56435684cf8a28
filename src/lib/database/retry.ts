/**
 * STORE RETRY HELPERS
 * ===================
 *
 * Bounded exponential backoff around store calls. Only transient SQLite
 * failures (busy, locked, I/O) are retried; everything else is rethrown on
 * the first attempt.
 *
 * @module lib/database/retry
 */

import { logger } from '@/lib/logger';

export interface RetryOptions {
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  retryOn?: (error: unknown) => boolean;
  label?: string;
}

const TRANSIENT_CODE_PREFIXES = ['SQLITE_BUSY', 'SQLITE_LOCKED', 'SQLITE_IOERR', 'SQLITE_PROTOCOL'];

/**
 * Extract the extended result code from a better-sqlite3 SqliteError.
 */
export function getSqliteErrorCode(error: unknown): string | undefined {
  if (
    error instanceof Error &&
    error.name === 'SqliteError' &&
    'code' in error &&
    typeof error.code === 'string'
  ) {
    return error.code;
  }
  return undefined;
}

export function isTransientStoreError(error: unknown): boolean {
  const code = getSqliteErrorCode(error);
  if (!code) return false;
  return TRANSIENT_CODE_PREFIXES.some((prefix) => code.startsWith(prefix));
}

export function isUniqueViolation(error: unknown): boolean {
  const code = getSqliteErrorCode(error);
  return code === 'SQLITE_CONSTRAINT_UNIQUE' || code === 'SQLITE_CONSTRAINT_PRIMARYKEY';
}

function backoffDelay(attempt: number, initialDelayMs: number, maxDelayMs: number): number {
  return Math.min(initialDelayMs * Math.pow(2, attempt - 1), maxDelayMs);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute an async store call with retry logic.
 * The last error is rethrown unchanged once attempts run out.
 */
export async function withRetry<T>(fn: () => Promise<T> | T, options: RetryOptions = {}): Promise<T> {
  const {
    maxRetries = 3,
    initialDelayMs = 100,
    maxDelayMs = 5000,
    retryOn = isTransientStoreError,
    label = 'store call',
  } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= maxRetries || !retryOn(error)) {
        throw error;
      }

      const delay = backoffDelay(attempt, initialDelayMs, maxDelayMs);
      logger.warn(`[Retry] Retrying ${label}`, {
        attempt,
        maxRetries,
        delayMs: delay,
        error: error instanceof Error ? error.message : String(error),
      });

      await sleep(delay);
    }
  }
}

/**
 * Synchronous variant for calls made inside an open transaction, where
 * yielding to the event loop is not possible. No delay between attempts;
 * the connection's busy_timeout already waits on locks.
 */
export function retrySync<T>(fn: () => T, options: Omit<RetryOptions, 'initialDelayMs' | 'maxDelayMs'> = {}): T {
  const { maxRetries = 3, retryOn = isTransientStoreError, label = 'store call' } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      return fn();
    } catch (error) {
      if (attempt >= maxRetries || !retryOn(error)) {
        throw error;
      }

      logger.warn(`[Retry] Retrying ${label}`, {
        attempt,
        maxRetries,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
