/**
 * In-process sequence metrics registry.
 * Feeds the health probe; Sentry gets the same numbers via emitSequenceMetric.
 *
 * @module domains/sequence/services/sequence-metrics
 */

import type { SequenceKind, SequenceKindStats, SequenceMetricsSnapshot } from '../types';

export class SequenceMetricsRegistry {
  private byKind = new Map<SequenceKind, SequenceKindStats>();
  private lastError?: string;

  record(kind: SequenceKind, success: boolean, durationMs: number, error?: string): void {
    let stats = this.byKind.get(kind);
    if (!stats) {
      stats = { success: 0, failure: 0, totalLatencyMs: 0 };
      this.byKind.set(kind, stats);
    }

    if (success) {
      stats.success += 1;
    } else {
      stats.failure += 1;
      this.lastError = error;
    }
    stats.totalLatencyMs += durationMs;
  }

  snapshot(): SequenceMetricsSnapshot {
    let success = 0;
    let failure = 0;
    let totalLatencyMs = 0;
    const byKind: SequenceMetricsSnapshot['byKind'] = {};

    for (const [kind, stats] of this.byKind) {
      success += stats.success;
      failure += stats.failure;
      totalLatencyMs += stats.totalLatencyMs;
      byKind[kind] = { ...stats };
    }

    const total = success + failure;
    return {
      success,
      failure,
      total,
      failureRate: total === 0 ? 0 : failure / total,
      averageLatencyMs: total === 0 ? 0 : totalLatencyMs / total,
      byKind,
      lastError: this.lastError,
    };
  }

  reset(): void {
    this.byKind.clear();
    this.lastError = undefined;
  }
}
