/**
 * API Error Handler
 * =================
 *
 * Centralized error handling for API routes.
 * Converts errors to consistent JSON responses with proper status codes.
 *
 * @module domains/shared/errors/handler
 */

import { NextRequest, NextResponse } from 'next/server';
import * as Sentry from '@sentry/node';
import { ZodError } from 'zod';

import { logger } from '@/lib/logger';
import { getSqliteErrorCode, isTransientStoreError, isUniqueViolation } from '@/lib/database/retry';
import { emitRequestMetrics } from '@/lib/observability/metrics';

import type { SettlementContext } from '../types';
import { convertZodError } from '../validation';
import {
  AppError,
  BadRequestError,
  ConflictError,
  InternalError,
  isAppError,
  ServiceUnavailableError,
  ValidationError,
  type ValidationErrorDetail,
} from './AppError';

// ============================================================================
// Constants
// ============================================================================

const GENERIC_ERROR_MESSAGE = 'An unexpected error occurred';
const REQUEST_ID_HEADER = 'x-request-id';
const OPERATOR_ID_HEADER = 'x-operator-id';

// ============================================================================
// Types
// ============================================================================

interface ErrorResponse {
  error: string;
  code: string;
  statusCode: number;
  requestId?: string;
  errors?: ValidationErrorDetail[];
  timestamp: string;
}

interface HandleApiErrorOptions {
  /** Request ID for tracing */
  requestId?: string;
  /** Whether to log the error */
  logError?: boolean;
  /** Additional context for logging */
  context?: Record<string, unknown>;
  /** Route identifier for error tracking (e.g., 'POST /api/settlement/charges') */
  route?: string;
}

/**
 * Second argument Next.js passes to a route handler
 */
export interface RouteContext<P> {
  params: P;
}

type SettlementRouteHandler<P> = (
  req: NextRequest,
  ctx: SettlementContext,
  routeContext: RouteContext<P>
) => Promise<Response>;

// ============================================================================
// Main Error Handler
// ============================================================================

/**
 * Handle errors in API routes and return appropriate NextResponse
 */
export function handleApiError(
  error: unknown,
  options: HandleApiErrorOptions = {}
): NextResponse<ErrorResponse> {
  const { requestId, logError = true, context, route } = options;
  const timestamp = new Date().toISOString();

  const appError = normalizeError(error);

  if (logError && shouldLogError(appError)) {
    logErrorDetails(appError, { requestId, route, ...context });
  }

  const response: ErrorResponse = {
    error: appError.message,
    code: appError.code,
    statusCode: appError.statusCode,
    timestamp,
  };

  if (requestId) {
    response.requestId = requestId;
  }

  if (appError instanceof ValidationError) {
    response.errors = appError.errors;
  }

  const headers = new Headers();
  if (requestId) {
    headers.set(REQUEST_ID_HEADER, requestId);
  }
  if (
    appError instanceof ServiceUnavailableError &&
    appError.retryAfter != null &&
    appError.retryAfter > 0
  ) {
    headers.set('Retry-After', String(appError.retryAfter));
  }

  return NextResponse.json(response, { status: appError.statusCode, headers });
}

// ============================================================================
// Error Normalization
// ============================================================================

/**
 * Convert any error type to an AppError
 */
export function normalizeError(error: unknown): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof ZodError) {
    return convertZodError(error);
  }

  const sqliteCode = getSqliteErrorCode(error);
  if (sqliteCode) {
    return convertSqliteError(error, sqliteCode);
  }

  if (error instanceof Error) {
    return new InternalError(
      process.env.NODE_ENV === 'production' ? GENERIC_ERROR_MESSAGE : error.message
    );
  }

  return new InternalError(GENERIC_ERROR_MESSAGE);
}

/**
 * Convert SQLite errors to appropriate AppError
 *
 * Busy/locked errors return 503 so clients retry the same request.
 */
function convertSqliteError(error: unknown, code: string): AppError {
  if (isUniqueViolation(error)) {
    return new ConflictError('A record with this key already exists', { sqliteCode: code });
  }

  if (isTransientStoreError(error)) {
    return new ServiceUnavailableError('Settlement store is busy. Please try again.', 1);
  }

  // Status-transition triggers fire when a concurrent writer got there first
  if (code === 'SQLITE_CONSTRAINT_TRIGGER') {
    return new ConflictError('The record was modified concurrently', { sqliteCode: code });
  }

  return new InternalError(
    process.env.NODE_ENV === 'production' ? GENERIC_ERROR_MESSAGE : `Store error: ${code}`,
    { sqliteCode: code }
  );
}

// ============================================================================
// Logging
// ============================================================================

/**
 * Determine if error should be logged
 */
function shouldLogError(error: AppError): boolean {
  if (error.statusCode >= 500) {
    return true;
  }

  if (!error.isOperational) {
    return true;
  }

  if (process.env.NODE_ENV === 'development') {
    return true;
  }

  const skipCodes = ['NOT_FOUND', 'VALIDATION_ERROR'];
  return !skipCodes.includes(error.code);
}

function logErrorDetails(error: AppError, context?: Record<string, unknown>): void {
  const logData = {
    ...error.toLogObject(),
    ...context,
  };

  if (error.statusCode >= 500 || !error.isOperational) {
    logger.error(`[${error.code}] ${error.message}`, error, logData);
  } else {
    logger.warn(`[${error.code}] ${error.message}`, logData);
  }
}

// ============================================================================
// Route Wrapper
// ============================================================================

function parseOperatorId(raw: string | null): number | undefined {
  if (!raw) return undefined;
  const value = Number(raw);
  return Number.isInteger(value) && value > 0 ? value : undefined;
}

/**
 * Global API handler wrapper - use for ALL settlement routes.
 * Builds the SettlementContext from the request headers, traces the call,
 * emits request metrics and echoes `x-request-id` on every response.
 *
 * @example
 * ```typescript
 * export const GET = withApiHandler(async (req, ctx, { params }) => {
 *   const charge = await getSettlementServices().aggregator.getCharge(params.chargeNo);
 *   return NextResponse.json({ charge });
 * });
 * ```
 */
export function withApiHandler<P = Record<string, string>>(
  handler: SettlementRouteHandler<P>
): (req: NextRequest, routeContext: RouteContext<P>) => Promise<Response> {
  return async (req, routeContext) => {
    const requestId = req.headers.get(REQUEST_ID_HEADER) ?? crypto.randomUUID();
    const ctx: SettlementContext = {
      requestId,
      operatorId: parseOperatorId(req.headers.get(OPERATOR_ID_HEADER)),
    };
    const pathname = new URL(req.url).pathname;
    const route = `${req.method} ${pathname}`;
    const startTime = Date.now();
    logger.api(req.method, pathname, { requestId, operatorId: ctx.operatorId });

    let response: Response;
    try {
      response = await Sentry.startSpan(
        {
          name: route,
          op: 'http.server',
          attributes: {
            'http.method': req.method,
            'http.url': pathname,
            'http.request_id': requestId,
          },
        },
        () => handler(req, ctx, routeContext)
      );
      response.headers.set(REQUEST_ID_HEADER, requestId);
    } catch (error) {
      response = handleApiError(error, { requestId, route });
    }

    emitRequestMetrics({
      route: pathname,
      method: req.method,
      statusCode: response.status,
      durationMs: Date.now() - startTime,
    });

    return response;
  };
}

/**
 * Read a JSON request body, rejecting malformed payloads with 400
 */
export async function readJsonBody(req: Request): Promise<unknown> {
  try {
    return await req.json();
  } catch (error) {
    throw new BadRequestError('Request body must be valid JSON', {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}
