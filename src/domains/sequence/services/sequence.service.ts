/**
 * Sequence Generator
 * ==================
 *
 * Business numbers of the form prefix + yyyyMMdd (UTC) + 6-digit counter,
 * e.g. `CHG20260103000001`. Counters live in the store and reset daily.
 *
 * Store contention is retried with backoff; once retries run out the caller
 * gets a retryable ServiceUnavailableError. There is no local fallback
 * numbering.
 *
 * @module domains/sequence/services
 */

import { logger } from '@/lib/logger';
import { isTransientStoreError, withRetry } from '@/lib/database/retry';
import { emitSequenceMetric } from '@/lib/observability/metrics';
import { ResourceExhaustedError, ServiceUnavailableError, isAppError } from '../../shared/errors';
import { systemClock, type Clock, type SettlementContext } from '../../shared/types';
import type { SequenceRepository } from '../repositories';
import {
  SEQUENCE_COUNTER_MAX,
  SEQUENCE_COUNTER_WIDTH,
  SEQUENCE_PREFIXES,
  type SequenceKind,
} from '../types';
import { SequenceMetricsRegistry } from './sequence-metrics';

export interface SequenceGenerator {
  next(kind: SequenceKind, ctx: SettlementContext): Promise<string>;
  readonly metrics: SequenceMetricsRegistry;
}

export interface SequenceGeneratorDeps {
  repository: SequenceRepository;
  clock?: Clock;
  metrics?: SequenceMetricsRegistry;
  maxRetries: number;
  retryDelayMs: number;
}

/**
 * UTC calendar day as yyyyMMdd
 */
export function formatPeriod(date: Date): string {
  return date.toISOString().slice(0, 10).replace(/-/g, '');
}

export function formatSequenceNumber(kind: SequenceKind, period: string, value: number): string {
  return `${SEQUENCE_PREFIXES[kind]}${period}${String(value).padStart(SEQUENCE_COUNTER_WIDTH, '0')}`;
}

export function createSequenceGenerator(deps: SequenceGeneratorDeps): SequenceGenerator {
  const { repository, clock = systemClock, maxRetries, retryDelayMs } = deps;
  const metrics = deps.metrics ?? new SequenceMetricsRegistry();

  return {
    metrics,

    async next(kind: SequenceKind, ctx: SettlementContext): Promise<string> {
      const startTime = Date.now();
      const period = formatPeriod(clock());

      try {
        const value = await withRetry(() => repository.increment(kind, period), {
          maxRetries,
          initialDelayMs: retryDelayMs,
          retryOn: isTransientStoreError,
          label: `sequence ${kind}`,
        });

        if (value > SEQUENCE_COUNTER_MAX) {
          throw new ResourceExhaustedError(
            `sequence:${kind}`,
            `Daily ${kind} number space exhausted for ${period}`,
            { period, value }
          );
        }

        const number = formatSequenceNumber(kind, period, value);
        const durationMs = Date.now() - startTime;
        metrics.record(kind, true, durationMs);
        emitSequenceMetric({ kind, success: true, durationMs });

        logger.debug('[Sequence] Generated', { kind, number, requestId: ctx.requestId });
        return number;
      } catch (error) {
        const durationMs = Date.now() - startTime;
        const failure = isAppError(error)
          ? error
          : isTransientStoreError(error)
            ? new ServiceUnavailableError(`Sequence store unavailable for ${kind}`, 1)
            : error;
        const errorType = isAppError(failure) ? failure.code : 'UNKNOWN';
        const message = failure instanceof Error ? failure.message : String(failure);

        metrics.record(kind, false, durationMs, message);
        emitSequenceMetric({ kind, success: false, durationMs, errorType });
        logger.error('[Sequence] Generation failed', error, {
          kind,
          period,
          errorType,
          requestId: ctx.requestId,
        });

        throw failure;
      }
    },
  };
}
