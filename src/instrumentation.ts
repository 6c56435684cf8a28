/**
 * Next.js Instrumentation
 * Runs once when the Node.js server starts (not during build or in Edge).
 *
 * @see https://nextjs.org/docs/app/building-your-application/optimizing/instrumentation
 */

import { initSentry } from '@/lib/observability/sentry';

export async function register(): Promise<void> {
  if (process.env.NEXT_RUNTIME !== 'nodejs') return;

  initSentry();
}
