/**
 * Domain Modules Index
 * ====================
 *
 * Central export point for all domain modules.
 *
 * @module domains
 *
 * @example
 * ```typescript
 * import { getSettlementServices, Errors } from '@/domains';
 * ```
 */

// Shared utilities
export * from './shared';

// Domain modules
export * from './sequence';
export * from './inventory';
export * from './registration';
export * from './prescription';
export * from './charge';

// Composition
export * from './container';
