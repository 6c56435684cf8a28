/**
 * Refund Processor
 * ================
 *
 * PAID → REFUNDED together with everything the payment set in motion:
 * dispensed stock goes back on the shelf, prescriptions and registrations
 * are marked refunded. All of it commits in one immediate transaction or
 * none of it does.
 *
 * Refunds are not idempotent. A second refund of the same charge fails
 * with InvalidStateTransitionError.
 *
 * @module domains/charge/services/refund-processor
 */

import { logger } from '@/lib/logger';
import { runInTransaction, type SettlementDatabase } from '@/lib/db';
import { withSettlementAudit } from '@/lib/audit/settlement-audit';
import { DOMAIN_EVENTS, type DomainEventBus } from '@/lib/events/domain-event-bus';
import { emitInventoryRestoredMetric } from '@/lib/observability/metrics';
import { Errors, InvalidStateTransitionError, ValidationError } from '../../shared/errors';
import { systemClock, type Clock, type SettlementContext } from '../../shared/types';
import { parseOrThrow } from '../../shared/validation';
import type { InventoryAdjuster } from '../../inventory';
import {
  PRESCRIPTION_STATUS,
  type Prescription,
  type PrescriptionRepository,
  type PrescriptionStatus,
} from '../../prescription';
import { REGISTRATION_STATUS, type RegistrationRepository } from '../../registration';
import type { ChargeRepository } from '../repositories';
import { chargeStatusName } from '../status';
import { CHARGE_STATUS, type Charge, type ProcessRefundInput } from '../types';
import { processRefundSchema } from '../validation';

const DAY_MS = 24 * 60 * 60 * 1000;

/** Prescription states a paid charge can leave behind */
const REFUNDABLE_PRESCRIPTION_STATUSES: readonly PrescriptionStatus[] = [
  PRESCRIPTION_STATUS.PAID,
  PRESCRIPTION_STATUS.DISPENSED,
];

export interface RefundProcessor {
  processRefund(input: ProcessRefundInput, ctx: SettlementContext): Promise<Charge>;
}

export interface RefundProcessorDeps {
  db: SettlementDatabase;
  charges: ChargeRepository;
  registrations: RegistrationRepository;
  prescriptions: PrescriptionRepository;
  adjuster: InventoryAdjuster;
  events: DomainEventBus;
  /** 0 disables the window */
  refundWindowDays: number;
  clock?: Clock;
}

export function createRefundProcessor(deps: RefundProcessorDeps): RefundProcessor {
  const {
    db,
    charges,
    registrations,
    prescriptions,
    adjuster,
    events,
    refundWindowDays,
    clock = systemClock,
  } = deps;

  function load(chargeNo: string): Charge {
    const charge = charges.findByChargeNo(chargeNo);
    if (!charge) {
      throw Errors.chargeNotFound(chargeNo);
    }
    return charge;
  }

  function assertRefundable(charge: Charge, refundAmount: number, now: Date): void {
    if (charge.status !== CHARGE_STATUS.PAID) {
      throw new InvalidStateTransitionError('charge', chargeStatusName(charge.status), 'refund', {
        chargeNo: charge.chargeNo,
      });
    }

    if (refundWindowDays > 0 && charge.paidAt) {
      const elapsedMs = now.getTime() - Date.parse(charge.paidAt);
      if (elapsedMs > refundWindowDays * DAY_MS) {
        throw new ValidationError('Refund window has closed', [
          {
            field: 'chargeNo',
            message: `Charge was paid more than ${refundWindowDays} days ago`,
            code: 'REFUND_WINDOW_EXPIRED',
            value: charge.paidAt,
          },
        ]);
      }
    }

    // A fully covered charge (actualAmount 0) refunds 0
    const inRange =
      refundAmount === charge.actualAmount || (refundAmount > 0 && refundAmount <= charge.actualAmount);
    if (!inRange) {
      throw new ValidationError('Refund amount out of range', [
        {
          field: 'refundAmount',
          message: `Refund must be greater than 0 and at most ${charge.actualAmount}`,
          code: 'AMOUNT_OUT_OF_RANGE',
          value: refundAmount,
        },
      ]);
    }
  }

  /**
   * Put back what was actually handed out for each line, once.
   * Returns the number of units restored.
   */
  function restoreStock(prescription: Prescription, chargeNo: string): number {
    let restored = 0;
    for (const line of prescription.lines) {
      if (line.dispensedQuantity <= 0) continue;
      if (!prescriptions.markRestored(line.id)) continue;

      adjuster.adjust({
        medicineId: line.medicineId,
        delta: line.dispensedQuantity,
        reason: 'REFUND_RESTORE',
        reference: chargeNo,
      });
      restored += line.dispensedQuantity;
    }
    return restored;
  }

  async function refund(input: ProcessRefundInput, ctx: SettlementContext): Promise<Charge> {
    const charge = load(input.chargeNo);
    const refundAmount = input.refundAmount ?? charge.actualAmount;
    assertRefundable(charge, refundAmount, clock());

    let restoredUnits = 0;
    const refunded = runInTransaction(db, () => {
      const now = clock().toISOString();

      if (!charges.markRefunded(charge.chargeNo, input.reason, refundAmount, now)) {
        const current = load(charge.chargeNo);
        throw new InvalidStateTransitionError('charge', chargeStatusName(current.status), 'refund', {
          chargeNo: current.chargeNo,
        });
      }

      for (const detail of charge.details) {
        if (detail.itemType === 'REGISTRATION') {
          registrations.transition(
            detail.itemRef,
            REGISTRATION_STATUS.PAID_REGISTRATION,
            REGISTRATION_STATUS.REFUNDED,
            now
          );
          continue;
        }

        const prescription = prescriptions.findById(detail.itemRef);
        if (!prescription) {
          throw Errors.prescriptionNotFound(detail.itemRef);
        }
        if (input.restoreInventory) {
          restoredUnits += restoreStock(prescription, charge.chargeNo);
        }
        const from = REFUNDABLE_PRESCRIPTION_STATUSES.find((status) => status === prescription.status);
        if (from !== undefined) {
          prescriptions.transition(prescription.id, from, PRESCRIPTION_STATUS.REFUNDED, now);
        }
      }

      return load(charge.chargeNo);
    });

    if (restoredUnits > 0) {
      emitInventoryRestoredMetric(restoredUnits);
    }

    logger.settlement('refund committed', {
      chargeNo: refunded.chargeNo,
      refundAmount,
      restoredUnits,
      requestId: ctx.requestId,
    });

    await events.publish({
      type: DOMAIN_EVENTS.CHARGE_REFUNDED,
      payload: {
        chargeNo: refunded.chargeNo,
        patientId: refunded.patientId,
        refundAmount,
        restoredUnits,
        reason: input.reason,
      },
      metadata: { correlationId: ctx.requestId, operatorId: ctx.operatorId },
    });

    return refunded;
  }

  return {
    processRefund(rawInput, ctx) {
      return withSettlementAudit(
        'processRefund',
        ctx,
        () => refund(parseOrThrow(processRefundSchema, rawInput, 'Invalid refund request'), ctx),
        (charge) => ({ chargeNo: charge.chargeNo, refundAmount: charge.refundAmount })
      );
    },
  };
}
