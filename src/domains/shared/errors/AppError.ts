/**
 * Application Error Classes
 * =========================
 *
 * Error taxonomy shared by every settlement domain. `code` is the stable
 * machine-readable kind clients branch on; `statusCode` is the HTTP mapping
 * used by the route handlers.
 *
 * @module domains/shared/errors
 */

/**
 * Base application error class
 * All custom errors should extend this class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    statusCode = 500,
    isOperational = true,
    context?: Record<string, unknown>
  ) {
    super(message);

    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.context = context;
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to JSON-safe object for API responses
   */
  toJSON(): Record<string, unknown> {
    return {
      error: this.message,
      code: this.code,
      statusCode: this.statusCode,
      timestamp: this.timestamp.toISOString(),
    };
  }

  /**
   * Convert to detailed object for logging (internal use only)
   */
  toLogObject(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      isOperational: this.isOperational,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }
}

// ============================================================================
// Client Error Classes (4xx)
// ============================================================================

/**
 * 400 Bad Request - Malformed request (unparseable body, bad query string)
 */
export class BadRequestError extends AppError {
  constructor(message = 'Bad request', context?: Record<string, unknown>) {
    super(message, 'BAD_REQUEST', 400, true, context);
  }
}

/**
 * 404 Not Found - Resource not found
 */
export class NotFoundError extends AppError {
  public readonly resourceType?: string;
  public readonly resourceId?: string | number;

  constructor(resourceType?: string, resourceId?: string | number, message?: string) {
    let defaultMessage = 'Resource not found';
    if (resourceType) {
      defaultMessage =
        resourceId !== undefined
          ? `${resourceType} not found: ${String(resourceId)}`
          : `${resourceType} not found`;
    }

    super(message ?? defaultMessage, 'NOT_FOUND', 404, true, {
      resourceType,
      resourceId,
    });

    this.resourceType = resourceType;
    this.resourceId = resourceId;
  }
}

/**
 * 409 Conflict - Duplicate key or competing write
 * (transaction number reused, source already billed)
 */
export class ConflictError extends AppError {
  constructor(message = 'Resource conflict', context?: Record<string, unknown>) {
    super(message, 'CONFLICT', 409, true, context);
  }
}

/**
 * 409 Conflict - Operation not allowed from the entity's current state
 */
export class InvalidStateTransitionError extends AppError {
  public readonly currentState: string;
  public readonly attemptedAction: string;

  constructor(
    entity: string,
    currentState: string,
    attemptedAction: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Cannot ${attemptedAction} ${entity} in state ${currentState}`,
      'INVALID_STATE_TRANSITION',
      409,
      true,
      { ...context, entity, currentState, attemptedAction }
    );
    this.currentState = currentState;
    this.attemptedAction = attemptedAction;
  }
}

/**
 * 422 Unprocessable Entity - Validation errors
 */
export class ValidationError extends AppError {
  public readonly errors: ValidationErrorDetail[];

  constructor(message = 'Validation failed', errors: ValidationErrorDetail[] = []) {
    super(message, 'VALIDATION_ERROR', 422, true, { errors });
    this.errors = errors;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      errors: this.errors,
    };
  }
}

export interface ValidationErrorDetail {
  field: string;
  message: string;
  code?: string;
  value?: unknown;
}

/**
 * Business rule violation error
 */
export class BusinessRuleError extends AppError {
  public readonly rule: string;

  constructor(rule: string, message: string, context?: Record<string, unknown>) {
    super(message, 'BUSINESS_RULE_VIOLATION', 400, true, { ...context, rule });
    this.rule = rule;
  }
}

// ============================================================================
// Server Error Classes (5xx)
// ============================================================================

/**
 * 500 Internal Server Error - Unexpected server error
 */
export class InternalError extends AppError {
  constructor(message = 'Internal server error', context?: Record<string, unknown>) {
    // isOperational = false because this indicates a bug
    super(message, 'INTERNAL_ERROR', 500, false, context);
  }
}

/**
 * 503 Service Unavailable - Store busy or locked; safe to retry
 */
export class ServiceUnavailableError extends AppError {
  public readonly retryAfter?: number;

  constructor(message = 'Service temporarily unavailable', retryAfter?: number) {
    super(message, 'SERVICE_UNAVAILABLE', 503, true, { retryAfter });
    this.retryAfter = retryAfter;
  }
}

/**
 * 503 - A bounded resource ran out (e.g. the daily number space)
 */
export class ResourceExhaustedError extends AppError {
  public readonly resource: string;

  constructor(resource: string, message?: string, context?: Record<string, unknown>) {
    super(message ?? `Resource exhausted: ${resource}`, 'RESOURCE_EXHAUSTED', 503, true, {
      ...context,
      resource,
    });
    this.resource = resource;
  }
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Check if error is an AppError instance
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Check if error is operational (expected) vs programming error
 */
export function isOperationalError(error: unknown): boolean {
  if (isAppError(error)) {
    return error.isOperational;
  }
  return false;
}

/**
 * Whether the caller may retry the same request unchanged
 */
export function isRetryableError(error: unknown): error is ServiceUnavailableError {
  return error instanceof ServiceUnavailableError;
}

// ============================================================================
// Error Factory Functions
// ============================================================================

export const Errors = {
  chargeNotFound: (chargeNo?: string) => new NotFoundError('Charge', chargeNo),
  registrationNotFound: (id?: number) => new NotFoundError('Registration', id),
  prescriptionNotFound: (id?: number) => new NotFoundError('Prescription', id),
  medicineNotFound: (id?: number) => new NotFoundError('Medicine', id),

  badRequest: (message: string) => new BadRequestError(message),
  validation: (message: string, errors?: ValidationErrorDetail[]) =>
    new ValidationError(message, errors),
  conflict: (message: string, context?: Record<string, unknown>) =>
    new ConflictError(message, context),
  invalidTransition: (entity: string, currentState: string, action: string) =>
    new InvalidStateTransitionError(entity, currentState, action),
  internal: (message?: string) => new InternalError(message),
  unavailable: (message?: string, retryAfter?: number) =>
    new ServiceUnavailableError(message, retryAfter),
} as const;
