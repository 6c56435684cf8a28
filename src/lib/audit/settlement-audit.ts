/**
 * Settlement Audit Wrapper
 * ========================
 *
 * Composed around every money- or stock-moving operation. Logs start,
 * outcome and duration with the request id, and emits
 * settlement.operation.* metrics tagged by operation.
 *
 * Usage:
 *   return withSettlementAudit('processPayment', ctx, () => pay(input), (charge) => ({
 *     chargeNo: charge.chargeNo,
 *   }));
 *
 * @module audit/settlement-audit
 */

import { logger, type LogContext } from '@/lib/logger';
import { emitSettlementMetric, type SettlementOperation } from '@/lib/observability/metrics';

export interface AuditContext {
  requestId: string;
  operatorId?: number;
}

function errorCodeOf(error: unknown): string {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return 'UNKNOWN';
}

export async function withSettlementAudit<T>(
  operation: SettlementOperation,
  ctx: AuditContext,
  fn: () => Promise<T>,
  describe?: (result: T) => LogContext
): Promise<T> {
  const startTime = Date.now();
  const base: LogContext = {
    operation,
    requestId: ctx.requestId,
    operatorId: ctx.operatorId,
  };

  logger.settlement(`${operation} started`, base);

  try {
    const result = await fn();
    const durationMs = Date.now() - startTime;

    emitSettlementMetric({ operation, success: true, durationMs });
    logger.settlement(`${operation} succeeded`, {
      ...base,
      durationMs,
      ...(describe ? describe(result) : {}),
    });

    return result;
  } catch (error) {
    const durationMs = Date.now() - startTime;
    const errorCode = errorCodeOf(error);

    emitSettlementMetric({ operation, success: false, durationMs, errorCode });
    logger.settlement(`${operation} failed`, {
      ...base,
      durationMs,
      errorCode,
      error: error instanceof Error ? error.message : String(error),
    });

    throw error;
  }
}
