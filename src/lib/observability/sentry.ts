/**
 * Sentry bootstrap for the Node.js server.
 *
 * Logger captures and every `Sentry.metrics.*` emitter are no-ops until this
 * has run. Without `SENTRY_DSN` nothing is initialized.
 *
 * @module observability/sentry
 */

import * as Sentry from '@sentry/node';
import { getEnv } from '@/lib/config/env';
import { logger } from '@/lib/logger';

let initialized = false;

export function initSentry(): boolean {
  if (initialized) return true;

  const env = getEnv();
  if (!env.SENTRY_DSN) {
    logger.info('[Sentry] SENTRY_DSN not set; error reporting and metrics disabled');
    return false;
  }

  const isProduction = env.NODE_ENV === 'production';
  Sentry.init({
    dsn: env.SENTRY_DSN,
    environment: env.NODE_ENV,
    tracesSampleRate: isProduction ? 0.1 : 1.0,
    // Retried by retrySync / withRetry
    ignoreErrors: ['SQLITE_BUSY', 'SQLITE_LOCKED'],
  });
  initialized = true;
  logger.info('[Sentry] Initialized', { environment: env.NODE_ENV });
  return true;
}

/** Tests only */
export function resetSentryInit(): void {
  initialized = false;
}
