/**
 * Centralized Environment Configuration
 * =====================================
 *
 * All environment variables are validated on first access.
 *
 * Usage:
 *   import { getEnv } from '@/lib/config/env';
 *   logger.info('Config loaded', { databasePath: getEnv().DATABASE_PATH });
 *
 * @module lib/config/env
 */

import { z } from 'zod';
import { logger } from '@/lib/logger';

/**
 * Define the schema for all environment variables
 * Every setting has a default so a bare checkout boots
 */
const envSchema = z.object({
  // Node environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Database (better-sqlite3 file path, or :memory:)
  DATABASE_PATH: z.string().min(1, 'DATABASE_PATH must not be empty').default('./data/settlement.db'),
  DATABASE_BUSY_TIMEOUT_MS: z.coerce.number().int().min(0).default(5000),

  // Sentry
  SENTRY_DSN: z.string().optional(),

  // Sequence generator
  SEQUENCE_MAX_RETRIES: z.coerce.number().int().min(1).max(10).default(3),
  SEQUENCE_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(50),
  SEQUENCE_HEALTH_INTERVAL_MS: z.coerce.number().int().min(1000).default(60_000),

  // Inventory adjuster
  INVENTORY_MAX_RETRIES: z.coerce.number().int().min(1).max(10).default(3),

  // Refund policy (0 disables the window)
  REFUND_WINDOW_DAYS: z.coerce.number().int().min(0).default(30),
});

/**
 * Type-safe environment configuration
 */
export type Env = z.infer<typeof envSchema>;

/**
 * Validate and parse environment variables
 * Throws in production; falls back to defaults elsewhere
 */
function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => {
        return `  - ${issue.path.join('.')}: ${issue.message}`;
      })
      .join('\n');

    logger.error('Invalid environment configuration', undefined, { errors });

    if (process.env.NODE_ENV === 'production') {
      throw new Error('Invalid environment configuration. See logs for details.');
    }

    logger.warn('Continuing with default configuration (non-production)');
    return envSchema.parse({});
  }

  return result.data;
}

let cachedEnv: Env | undefined;

/**
 * Validated environment configuration, parsed once per process
 */
export function getEnv(): Env {
  if (!cachedEnv) {
    cachedEnv = validateEnv();
  }
  return cachedEnv;
}

/**
 * Drop the cached configuration (tests that tweak process.env)
 */
export function resetEnvCache(): void {
  cachedEnv = undefined;
}
