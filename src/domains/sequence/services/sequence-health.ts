/**
 * Sequence Health Probe
 * =====================
 *
 * Exercises the generator end to end and grades the result:
 *   UP        < 100 ms and well-formed
 *   DEGRADED  < 500 ms, or failure rate >= 10 %
 *   DOWN      slower, malformed, failed, or failure rate >= 50 %
 *
 * The probe draws a real charge number; the gap it leaves is harmless.
 * Readers go through getRecentReport so polling does not burn numbers.
 *
 * @module domains/sequence/services/sequence-health
 */

import { performance } from 'perf_hooks';
import { logger } from '@/lib/logger';
import { emitHealthMetric } from '@/lib/observability/metrics';
import { systemClock, type Clock } from '../../shared/types';
import { CHARGE_NO_PATTERN, type HealthStatus, type SequenceHealthReport } from '../types';
import type { SequenceGenerator } from './sequence.service';

const UP_THRESHOLD_MS = 100;
const DEGRADED_THRESHOLD_MS = 500;
const DOWN_FAILURE_RATE = 0.5;
const DEGRADED_FAILURE_RATE = 0.1;

export interface SequenceHealthProbeDeps {
  generator: SequenceGenerator;
  clock?: Clock;
  /** Monotonic milliseconds, for latency */
  timer?: () => number;
}

export interface SequenceHealthProbe {
  checkSequenceHealth(): Promise<SequenceHealthReport>;
  startSequenceHealthProbe(intervalMs: number): void;
  stopSequenceHealthProbe(): void;
  getLastReport(): SequenceHealthReport | undefined;
  /** Last report if no older than `maxAgeMs`, otherwise a fresh check */
  getRecentReport(maxAgeMs: number): Promise<SequenceHealthReport>;
}

function gradeLatency(latencyMs: number): HealthStatus {
  if (latencyMs < UP_THRESHOLD_MS) return 'UP';
  if (latencyMs < DEGRADED_THRESHOLD_MS) return 'DEGRADED';
  return 'DOWN';
}

function applyFailureRate(status: HealthStatus, failureRate: number): HealthStatus {
  if (failureRate >= DOWN_FAILURE_RATE) return 'DOWN';
  if (failureRate >= DEGRADED_FAILURE_RATE && status === 'UP') return 'DEGRADED';
  return status;
}

export function createSequenceHealthProbe(deps: SequenceHealthProbeDeps): SequenceHealthProbe {
  const { generator, clock = systemClock, timer = () => performance.now() } = deps;
  let lastReport: SequenceHealthReport | undefined;
  let interval: NodeJS.Timeout | undefined;

  async function checkSequenceHealth(): Promise<SequenceHealthReport> {
    const started = timer();
    let sample: string | undefined;
    let error: string | undefined;

    try {
      sample = await generator.next('charge', { requestId: 'sequence-health-probe' });
      if (!CHARGE_NO_PATTERN.test(sample)) {
        error = `Malformed charge number: ${sample}`;
      }
    } catch (err) {
      error = err instanceof Error ? err.message : String(err);
    }

    const latencyMs = timer() - started;
    const snapshot = generator.metrics.snapshot();
    const status = applyFailureRate(
      error === undefined ? gradeLatency(latencyMs) : 'DOWN',
      snapshot.failureRate
    );

    const report: SequenceHealthReport = {
      status,
      latencyMs,
      sample,
      failureRate: snapshot.failureRate,
      totalGenerated: snapshot.success,
      checkedAt: clock().toISOString(),
      error,
    };

    lastReport = report;
    emitHealthMetric('sequence', status);
    if (status !== 'UP') {
      logger.warn('[SequenceHealth] Generator not healthy', { ...report });
    }

    return report;
  }

  return {
    checkSequenceHealth,

    startSequenceHealthProbe(intervalMs: number): void {
      if (interval) return;
      interval = setInterval(() => {
        checkSequenceHealth().catch((err: unknown) => {
          logger.error('[SequenceHealth] Probe run failed', err);
        });
      }, intervalMs);
      interval.unref();
      logger.info('[SequenceHealth] Probe started', { intervalMs });
    },

    stopSequenceHealthProbe(): void {
      if (interval) {
        clearInterval(interval);
        interval = undefined;
      }
    },

    getLastReport(): SequenceHealthReport | undefined {
      return lastReport;
    },

    async getRecentReport(maxAgeMs: number): Promise<SequenceHealthReport> {
      if (lastReport && clock().getTime() - Date.parse(lastReport.checkedAt) <= maxAgeMs) {
        return lastReport;
      }
      return checkSequenceHealth();
    },
  };
}
