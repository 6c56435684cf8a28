/**
 * Sequence Domain
 * ===============
 *
 * Collision-free business numbers for charges, prescriptions and
 * registrations, plus the generator health probe.
 *
 * @module domains/sequence
 *
 * @example
 * ```typescript
 * const chargeNo = await generator.next('charge', ctx); // CHG20260103000001
 * ```
 */

export * from './services';
export { createSequenceRepository, type SequenceRepository } from './repositories';
export {
  SEQUENCE_PREFIXES,
  SEQUENCE_COUNTER_MAX,
  CHARGE_NO_PATTERN,
  type SequenceKind,
  type HealthStatus,
  type SequenceHealthReport,
  type SequenceMetricsSnapshot,
} from './types';
