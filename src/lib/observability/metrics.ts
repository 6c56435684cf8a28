/**
 * STRUCTURED METRICS SERVICE
 * ==========================
 *
 * Centralized metrics emission for Sentry dashboards.
 * All metrics flow through here for consistency and discoverability.
 *
 * Emitted metrics:
 *   - api.request.duration (distribution, ms) — by route
 *   - api.request.server_error (counter) — 5xx responses by route
 *   - sequence.generation.success / failure (counter) — by kind
 *   - sequence.generation.duration (distribution, ms) — by kind
 *   - settlement.operation.success / failure (counter) — by operation
 *   - settlement.operation.duration (distribution, ms) — by operation
 *   - settlement.payment.replay (counter) — duplicate gateway callbacks
 *   - settlement.inventory.restored (counter) — units put back on refund
 *   - health.status (gauge, 0/0.5/1) — by component
 *
 * @module observability/metrics
 */

import * as Sentry from '@sentry/node';

// ============================================================================
// Types
// ============================================================================

interface RequestMetrics {
  route: string;
  method: string;
  statusCode: number;
  durationMs: number;
}

export type SettlementOperation =
  | 'createCharge'
  | 'cancelCharge'
  | 'processPayment'
  | 'processRefund'
  | 'dispensePrescription';

// ============================================================================
// Request Metrics
// ============================================================================

/**
 * Emit request-level metrics to Sentry.
 * Call at the end of each API request.
 */
export function emitRequestMetrics(data: RequestMetrics): void {
  const tags = {
    route: data.route,
    method: data.method,
    status_class: `${Math.floor(data.statusCode / 100)}xx`,
  };

  Sentry.metrics.distribution('api.request.duration', data.durationMs, {
    tags,
    unit: 'millisecond',
  });

  if (data.statusCode >= 500) {
    Sentry.metrics.increment('api.request.server_error', 1, { tags });
  }

  Sentry.metrics.increment('api.request.count', 1, { tags });
}

// ============================================================================
// Sequence Metrics
// ============================================================================

/**
 * Emit one sequence generation outcome.
 */
export function emitSequenceMetric(data: {
  kind: string;
  success: boolean;
  durationMs: number;
  errorType?: string;
}): void {
  const tags: Record<string, string> = { kind: data.kind };

  Sentry.metrics.distribution('sequence.generation.duration', data.durationMs, {
    tags,
    unit: 'millisecond',
  });

  if (data.success) {
    Sentry.metrics.increment('sequence.generation.success', 1, { tags });
  } else {
    Sentry.metrics.increment('sequence.generation.failure', 1, {
      tags: { ...tags, error: data.errorType ?? 'unknown' },
    });
  }
}

// ============================================================================
// Settlement Metrics
// ============================================================================

/**
 * Emit the outcome of a settlement operation (charge, payment, refund).
 */
export function emitSettlementMetric(data: {
  operation: SettlementOperation;
  success: boolean;
  durationMs: number;
  errorCode?: string;
}): void {
  const tags: Record<string, string> = { operation: data.operation };

  Sentry.metrics.distribution('settlement.operation.duration', data.durationMs, {
    tags,
    unit: 'millisecond',
  });

  if (data.success) {
    Sentry.metrics.increment('settlement.operation.success', 1, { tags });
  } else {
    Sentry.metrics.increment('settlement.operation.failure', 1, {
      tags: { ...tags, code: data.errorCode ?? 'UNKNOWN' },
    });
  }
}

/**
 * Count an idempotent payment replay.
 */
export function emitPaymentReplayMetric(paymentMethod: string): void {
  Sentry.metrics.increment('settlement.payment.replay', 1, {
    tags: { payment_method: paymentMethod },
  });
}

/**
 * Count stock units put back by a refund.
 */
export function emitInventoryRestoredMetric(units: number): void {
  Sentry.metrics.increment('settlement.inventory.restored', units);
}

// ============================================================================
// Health Metrics
// ============================================================================

/**
 * Emit component health status metric.
 */
export function emitHealthMetric(component: string, status: 'UP' | 'DEGRADED' | 'DOWN'): void {
  const value = status === 'UP' ? 1 : status === 'DEGRADED' ? 0.5 : 0;
  Sentry.metrics.gauge('health.status', value, { tags: { component } });
}
