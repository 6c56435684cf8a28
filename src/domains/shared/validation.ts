/**
 * Shared input validation helpers
 *
 * @module domains/shared/validation
 */

import type { z, ZodError, ZodTypeAny } from 'zod';
import { ValidationError, type ValidationErrorDetail } from './errors/AppError';

/**
 * Convert Zod validation errors to ValidationError
 */
export function convertZodError(error: ZodError, message = 'Validation failed'): ValidationError {
  const errors: ValidationErrorDetail[] = error.errors.map((err) => ({
    field: err.path.join('.'),
    message: err.message,
    code: err.code,
  }));

  return new ValidationError(message, errors);
}

/**
 * Parse `input` against `schema`, throwing a field-level ValidationError on failure.
 */
export function parseOrThrow<S extends ZodTypeAny>(
  schema: S,
  input: unknown,
  message?: string
): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw convertZodError(result.error, message);
  }
  return result.data;
}
