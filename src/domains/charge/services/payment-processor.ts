/**
 * Payment Processor
 * =================
 *
 * Exactly-once PENDING → PAID. The payment channel's transaction number is
 * the idempotency key:
 *
 *   PAID, same transactionNo       → replay, stored charge returned unchanged
 *   PAID, different transactionNo  → ConflictError
 *   REFUNDED / CANCELLED           → InvalidStateTransitionError
 *   PENDING                        → conditional UPDATE ... WHERE status = PENDING
 *
 * Losing the conditional UPDATE means another request moved the charge
 * first; the processor re-reads and decides again instead of failing.
 *
 * @module domains/charge/services/payment-processor
 */

import { logger } from '@/lib/logger';
import { runInTransaction, type SettlementDatabase } from '@/lib/db';
import { isUniqueViolation } from '@/lib/database/retry';
import { withSettlementAudit } from '@/lib/audit/settlement-audit';
import { DOMAIN_EVENTS, type DomainEventBus } from '@/lib/events/domain-event-bus';
import { emitPaymentReplayMetric } from '@/lib/observability/metrics';
import {
  ConflictError,
  Errors,
  InvalidStateTransitionError,
  ValidationError,
} from '../../shared/errors';
import { systemClock, type Clock, type SettlementContext } from '../../shared/types';
import { parseOrThrow } from '../../shared/validation';
import { PRESCRIPTION_STATUS, type PrescriptionRepository } from '../../prescription';
import { REGISTRATION_STATUS, type RegistrationRepository } from '../../registration';
import type { ChargeRepository } from '../repositories';
import { chargeStatusName } from '../status';
import { CHARGE_STATUS, type Charge, type ProcessPaymentInput } from '../types';
import { processPaymentSchema } from '../validation';

/** Re-read rounds after a lost conditional write */
const MAX_DECISION_ROUNDS = 3;

export interface PaymentProcessor {
  processPayment(input: ProcessPaymentInput, ctx: SettlementContext): Promise<Charge>;
}

export interface PaymentProcessorDeps {
  db: SettlementDatabase;
  charges: ChargeRepository;
  registrations: RegistrationRepository;
  prescriptions: PrescriptionRepository;
  events: DomainEventBus;
  clock?: Clock;
}

type PaymentDecision = 'replay' | 'pay';

function decide(charge: Charge, transactionNo: string): PaymentDecision {
  if (charge.status === CHARGE_STATUS.PAID) {
    if (charge.transactionNo === transactionNo) {
      return 'replay';
    }
    throw new ConflictError(`Charge ${charge.chargeNo} is already paid by another transaction`, {
      chargeNo: charge.chargeNo,
      transactionNo,
    });
  }

  if (charge.status !== CHARGE_STATUS.PENDING) {
    throw new InvalidStateTransitionError('charge', chargeStatusName(charge.status), 'pay', {
      chargeNo: charge.chargeNo,
    });
  }

  return 'pay';
}

export function createPaymentProcessor(deps: PaymentProcessorDeps): PaymentProcessor {
  const { db, charges, registrations, prescriptions, events, clock = systemClock } = deps;

  function load(chargeNo: string): Charge {
    const charge = charges.findByChargeNo(chargeNo);
    if (!charge) {
      throw Errors.chargeNotFound(chargeNo);
    }
    return charge;
  }

  /**
   * Paid items become actionable downstream: prescriptions go to the
   * pharmacy queue, waiting registrations are marked paid.
   */
  function unlockDownstream(charge: Charge, now: string, ctx: SettlementContext): void {
    for (const detail of charge.details) {
      const moved =
        detail.itemType === 'PRESCRIPTION'
          ? prescriptions.transition(detail.itemRef, PRESCRIPTION_STATUS.AUDITED, PRESCRIPTION_STATUS.PAID, now)
          : registrations.transition(
              detail.itemRef,
              REGISTRATION_STATUS.WAITING,
              REGISTRATION_STATUS.PAID_REGISTRATION,
              now
            );

      if (!moved) {
        logger.debug('[Payment] Downstream item left as is', {
          chargeNo: charge.chargeNo,
          itemType: detail.itemType,
          itemRef: detail.itemRef,
          requestId: ctx.requestId,
        });
      }
    }
  }

  async function settle(input: ProcessPaymentInput, ctx: SettlementContext): Promise<Charge> {
    for (let round = 1; round <= MAX_DECISION_ROUNDS; round++) {
      const charge = load(input.chargeNo);

      if (decide(charge, input.transactionNo) === 'replay') {
        emitPaymentReplayMetric(input.paymentMethod);
        logger.info('[Payment] Duplicate callback replayed', {
          chargeNo: charge.chargeNo,
          transactionNo: input.transactionNo,
          requestId: ctx.requestId,
        });
        return charge;
      }

      if (input.paidAmount !== undefined && input.paidAmount !== charge.actualAmount) {
        throw new ValidationError('Paid amount does not match the charge', [
          {
            field: 'paidAmount',
            message: `Expected ${charge.actualAmount}, got ${input.paidAmount}`,
            code: 'AMOUNT_MISMATCH',
            value: input.paidAmount,
          },
        ]);
      }

      const owner = charges.findByTransactionNo(input.transactionNo);
      if (owner && owner.chargeNo !== charge.chargeNo) {
        throw new ConflictError(`Transaction ${input.transactionNo} already settled ${owner.chargeNo}`, {
          chargeNo: charge.chargeNo,
          transactionNo: input.transactionNo,
        });
      }

      let won: boolean;
      try {
        won = runInTransaction(db, () => {
          const now = clock().toISOString();
          if (!charges.markPaid(charge.chargeNo, input.paymentMethod, input.transactionNo, now)) {
            return false;
          }
          unlockDownstream(charge, now, ctx);
          return true;
        });
      } catch (error) {
        if (isUniqueViolation(error)) {
          throw new ConflictError(`Transaction ${input.transactionNo} already settled another charge`, {
            chargeNo: charge.chargeNo,
            transactionNo: input.transactionNo,
          });
        }
        throw error;
      }

      if (won) {
        const paid = load(charge.chargeNo);
        await events.publish({
          type: DOMAIN_EVENTS.PAYMENT_RECEIVED,
          payload: {
            chargeNo: paid.chargeNo,
            patientId: paid.patientId,
            actualAmount: paid.actualAmount,
            paymentMethod: input.paymentMethod,
            transactionNo: input.transactionNo,
          },
          metadata: { correlationId: ctx.requestId, operatorId: ctx.operatorId },
        });
        return paid;
      }

      logger.warn('[Payment] Lost conditional update, re-reading', {
        chargeNo: charge.chargeNo,
        round,
        requestId: ctx.requestId,
      });
    }

    throw new ConflictError(`Charge ${input.chargeNo} kept changing during payment; retry`, {
      chargeNo: input.chargeNo,
    });
  }

  return {
    processPayment(rawInput, ctx) {
      return withSettlementAudit(
        'processPayment',
        ctx,
        () => settle(parseOrThrow(processPaymentSchema, rawInput, 'Invalid payment request'), ctx),
        (charge) => ({
          chargeNo: charge.chargeNo,
          transactionNo: charge.transactionNo,
          actualAmount: charge.actualAmount,
        })
      );
    },
  };
}
