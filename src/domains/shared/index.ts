/**
 * Shared Domain Module
 * ====================
 *
 * Cross-cutting concerns shared across all domains.
 * The HTTP error handler lives in `./errors/handler` and is imported
 * directly by route handlers only.
 *
 * @module domains/shared
 */

// Error handling
export * from './errors';

// Validation
export * from './validation';

// Shared types
export * from './types';
