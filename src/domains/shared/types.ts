/**
 * Shared Domain Types
 * ===================
 *
 * Common types used across multiple domains.
 *
 * @module domains/shared/types
 */

/**
 * Request-scoped context threaded explicitly through every settlement call.
 * Route handlers build it from the incoming request; tests build it by hand.
 */
export interface SettlementContext {
  /** Correlation id, echoed back as `x-request-id` */
  requestId: string;
  /** Cashier / operator performing the action, when known */
  operatorId?: number;
}

/**
 * Offset pagination options for list operations
 */
export interface PaginationOptions {
  /** Number of results per page */
  limit?: number;
  /** Number of results to skip */
  offset?: number;
}

/**
 * Paginated result wrapper
 */
export interface PaginatedResult<T> {
  /** The data items */
  data: T[];
  /** Total count of all matching items */
  total: number;
  /** Whether there are more pages */
  hasMore: boolean;
  limit: number;
  offset: number;
}

/**
 * Injected time source; returns the current instant.
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
