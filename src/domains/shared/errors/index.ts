/**
 * Shared Error Module
 * ===================
 *
 * Centralized error handling for the application.
 *
 * @module domains/shared/errors
 *
 * @example
 * ```typescript
 * import { Errors, InvalidStateTransitionError } from '@/domains/shared/errors';
 *
 * throw Errors.chargeNotFound(chargeNo);
 * throw new InvalidStateTransitionError('charge', 'REFUNDED', 'pay');
 * ```
 */

// Error classes
export {
  AppError,
  BadRequestError,
  NotFoundError,
  ConflictError,
  InvalidStateTransitionError,
  ValidationError,
  BusinessRuleError,
  InternalError,
  ServiceUnavailableError,
  ResourceExhaustedError,
  type ValidationErrorDetail,
} from './AppError';

// Type guards
export { isAppError, isOperationalError, isRetryableError } from './AppError';

// Error factories
export { Errors } from './AppError';
