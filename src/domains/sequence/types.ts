/**
 * Sequence Domain Types
 *
 * @module domains/sequence/types
 */

export const SEQUENCE_PREFIXES = {
  charge: 'CHG',
  prescription: 'PRE',
  registration: 'REG',
} as const;

export type SequenceKind = keyof typeof SEQUENCE_PREFIXES;

/** Highest counter value that still fits the 6-digit suffix */
export const SEQUENCE_COUNTER_MAX = 999_999;

export const SEQUENCE_COUNTER_WIDTH = 6;

/** prefix + yyyyMMdd + 6-digit counter */
export const CHARGE_NO_PATTERN = /^CHG\d{14}$/;

export type HealthStatus = 'UP' | 'DEGRADED' | 'DOWN';

export interface SequenceHealthReport {
  status: HealthStatus;
  latencyMs: number;
  /** Number produced by the probe, when one was produced */
  sample?: string;
  failureRate: number;
  totalGenerated: number;
  checkedAt: string;
  error?: string;
}

export interface SequenceKindStats {
  success: number;
  failure: number;
  totalLatencyMs: number;
}

export interface SequenceMetricsSnapshot {
  success: number;
  failure: number;
  total: number;
  /** failure / total, 0 when nothing has been generated */
  failureRate: number;
  averageLatencyMs: number;
  byKind: Partial<Record<SequenceKind, SequenceKindStats>>;
  lastError?: string;
}
