/**
 * Charge Aggregator
 * =================
 *
 * Turns billable items (registration fees, audited prescriptions) into one
 * immutable PENDING charge. A source can sit on at most one non-cancelled
 * charge; the check runs before numbering and again inside the insert
 * transaction, where the write lock makes it authoritative.
 *
 * @module domains/charge/services/charge-aggregator
 */

import { logger } from '@/lib/logger';
import { runInTransaction, type SettlementDatabase } from '@/lib/db';
import { withSettlementAudit } from '@/lib/audit/settlement-audit';
import { DOMAIN_EVENTS, type DomainEventBus } from '@/lib/events/domain-event-bus';
import {
  ConflictError,
  Errors,
  InternalError,
  InvalidStateTransitionError,
  ValidationError,
  type ValidationErrorDetail,
} from '../../shared/errors';
import { systemClock, type Clock, type PaginatedResult, type SettlementContext } from '../../shared/types';
import { parseOrThrow } from '../../shared/validation';
import { PRESCRIPTION_STATUS, type PrescriptionRepository } from '../../prescription';
import {
  BILLABLE_REGISTRATION_STATUSES,
  type RegistrationRepository,
} from '../../registration';
import type { SequenceGenerator } from '../../sequence';
import type { ChargeRepository } from '../repositories';
import { chargeStatusName } from '../status';
import {
  CHARGE_STATUS,
  type CancelChargeInput,
  type Charge,
  type ChargeDetail,
  type ChargeQuery,
  type ChargesByType,
  type ChargeSource,
  type ChargeType,
  type CreateChargeInput,
} from '../types';
import { cancelChargeSchema, chargeQuerySchema, createChargeSchema } from '../validation';

// ============================================================================
// Types
// ============================================================================

export interface ChargeAggregator {
  createCharge(input: CreateChargeInput, ctx: SettlementContext): Promise<Charge>;
  createRegistrationCharge(registrationId: number, ctx: SettlementContext): Promise<Charge>;
  createPrescriptionCharge(
    registrationId: number,
    prescriptionIds: number[],
    ctx: SettlementContext
  ): Promise<Charge>;
  isRegistrationFeePaid(registrationId: number): boolean;
  getChargesByType(registrationId: number): ChargesByType;
  cancelCharge(input: CancelChargeInput, ctx: SettlementContext): Promise<Charge>;
  getCharge(chargeNo: string): Charge;
  queryCharges(filter: Partial<Record<keyof ChargeQuery, unknown>>): PaginatedResult<Charge>;
}

export interface ChargeAggregatorDeps {
  db: SettlementDatabase;
  charges: ChargeRepository;
  registrations: RegistrationRepository;
  prescriptions: PrescriptionRepository;
  sequence: SequenceGenerator;
  events: DomainEventBus;
  clock?: Clock;
}

type ResolvedDetail = Omit<ChargeDetail, 'lineNo'>;

// ============================================================================
// Helpers
// ============================================================================

function resolveChargeType(details: ResolvedDetail[]): ChargeType {
  const hasRegistration = details.some((detail) => detail.itemType === 'REGISTRATION');
  const hasPrescription = details.some((detail) => detail.itemType === 'PRESCRIPTION');
  if (hasRegistration && hasPrescription) return 'MIXED';
  return hasRegistration ? 'REGISTRATION_ONLY' : 'PRESCRIPTION_ONLY';
}

function sumAmounts(details: ReadonlyArray<{ itemAmount: number }>): number {
  return details.reduce((sum, detail) => sum + detail.itemAmount, 0);
}

// ============================================================================
// Service
// ============================================================================

export function createChargeAggregator(deps: ChargeAggregatorDeps): ChargeAggregator {
  const { db, charges, registrations, prescriptions, sequence, events, clock = systemClock } = deps;

  /**
   * Look up and price each source. NotFound is thrown immediately; the
   * remaining problems are collected into one ValidationError.
   */
  function resolveSources(patientId: number, sources: ChargeSource[]): ResolvedDetail[] {
    const errors: ValidationErrorDetail[] = [];
    const resolved: ResolvedDetail[] = [];

    sources.forEach((source, index) => {
      const field = `sources.${index}`;

      if (source.type === 'REGISTRATION') {
        const registration = registrations.findById(source.id);
        if (!registration) {
          throw Errors.registrationNotFound(source.id);
        }
        if (registration.patientId !== patientId) {
          errors.push({ field, message: 'Registration belongs to another patient', code: 'PATIENT_MISMATCH' });
          return;
        }
        if (
          !BILLABLE_REGISTRATION_STATUSES.includes(registration.status) ||
          registration.registrationFee <= 0
        ) {
          errors.push({
            field,
            message: `Registration ${registration.regNo} is not billable`,
            code: 'NOT_BILLABLE',
            value: registration.status,
          });
          return;
        }
        resolved.push({
          itemType: 'REGISTRATION',
          itemRef: registration.id,
          itemName: `Registration fee ${registration.regNo}`,
          itemAmount: registration.registrationFee,
        });
        return;
      }

      const prescription = prescriptions.findById(source.id);
      if (!prescription) {
        throw Errors.prescriptionNotFound(source.id);
      }
      if (prescription.patientId !== patientId) {
        errors.push({ field, message: 'Prescription belongs to another patient', code: 'PATIENT_MISMATCH' });
        return;
      }
      if (prescription.status !== PRESCRIPTION_STATUS.AUDITED || prescription.totalAmount <= 0) {
        errors.push({
          field,
          message: `Prescription ${prescription.prescriptionNo} is not billable`,
          code: 'NOT_BILLABLE',
          value: prescription.status,
        });
        return;
      }
      const linesTotal = sumAmounts(
        prescription.lines.map((line) => ({ itemAmount: line.quantity * line.unitPrice }))
      );
      if (linesTotal !== prescription.totalAmount) {
        errors.push({
          field,
          message: `Prescription ${prescription.prescriptionNo} total ${prescription.totalAmount} does not match its lines (${linesTotal})`,
          code: 'AMOUNT_MISMATCH',
        });
        return;
      }
      resolved.push({
        itemType: 'PRESCRIPTION',
        itemRef: prescription.id,
        itemName: `Prescription ${prescription.prescriptionNo}`,
        itemAmount: prescription.totalAmount,
      });
    });

    if (errors.length > 0) {
      throw new ValidationError('Charge sources are not billable', errors);
    }

    // Registration fee first, then prescriptions in request order
    return [
      ...resolved.filter((detail) => detail.itemType === 'REGISTRATION'),
      ...resolved.filter((detail) => detail.itemType === 'PRESCRIPTION'),
    ];
  }

  function assertNotBilled(details: ResolvedDetail[]): void {
    for (const detail of details) {
      const existing = charges.findActiveChargeNoForSource(detail.itemType, detail.itemRef);
      if (existing) {
        throw new ConflictError(
          `${detail.itemType} ${detail.itemRef} is already billed by ${existing}`,
          { itemType: detail.itemType, itemRef: detail.itemRef, chargeNo: existing }
        );
      }
    }
  }

  function load(chargeNo: string): Charge {
    const charge = charges.findByChargeNo(chargeNo);
    if (!charge) {
      throw Errors.chargeNotFound(chargeNo);
    }
    return charge;
  }

  async function createCharge(rawInput: CreateChargeInput, ctx: SettlementContext): Promise<Charge> {
    return withSettlementAudit(
      'createCharge',
      ctx,
      async () => {
        const input = parseOrThrow(createChargeSchema, rawInput, 'Invalid charge request');
        const resolved = resolveSources(input.patientId, input.sources);
        assertNotBilled(resolved);

        const totalAmount = sumAmounts(resolved);
        if (input.declaredTotal !== undefined && input.declaredTotal !== totalAmount) {
          throw new ValidationError('Declared total does not match the billable items', [
            {
              field: 'declaredTotal',
              message: `Expected ${totalAmount}, got ${input.declaredTotal}`,
              code: 'TOTAL_MISMATCH',
              value: input.declaredTotal,
            },
          ]);
        }

        const actualAmount = totalAmount - input.discountAmount - input.insuranceAmount;
        if (actualAmount < 0 || actualAmount > totalAmount) {
          throw new ValidationError('Discount and insurance exceed the charge total', [
            {
              field: 'discountAmount',
              message: `discount ${input.discountAmount} + insurance ${input.insuranceAmount} exceeds total ${totalAmount}`,
              code: 'AMOUNT_OUT_OF_RANGE',
            },
          ]);
        }

        const chargeNo = await sequence.next('charge', ctx);
        const details: ChargeDetail[] = resolved.map((detail, index) => ({
          ...detail,
          lineNo: index + 1,
        }));

        const charge = runInTransaction(db, () => {
          assertNotBilled(resolved);

          const created = charges.insert(
            {
              chargeNo,
              patientId: input.patientId,
              chargeType: resolveChargeType(resolved),
              totalAmount,
              discountAmount: input.discountAmount,
              insuranceAmount: input.insuranceAmount,
              actualAmount,
              details,
            },
            clock().toISOString()
          );

          if (created.totalAmount !== sumAmounts(created.details)) {
            throw new InternalError('Charge total diverged from its details', { chargeNo });
          }
          return created;
        });

        await events.publish({
          type: DOMAIN_EVENTS.CHARGE_CREATED,
          payload: {
            chargeNo: charge.chargeNo,
            patientId: charge.patientId,
            chargeType: charge.chargeType,
            totalAmount: charge.totalAmount,
            actualAmount: charge.actualAmount,
          },
          metadata: { correlationId: ctx.requestId, operatorId: ctx.operatorId },
        });

        return charge;
      },
      (charge) => ({
        chargeNo: charge.chargeNo,
        chargeType: charge.chargeType,
        totalAmount: charge.totalAmount,
        actualAmount: charge.actualAmount,
      })
    );
  }

  return {
    createCharge,

    async createRegistrationCharge(registrationId, ctx) {
      const registration = registrations.findById(registrationId);
      if (!registration) {
        throw Errors.registrationNotFound(registrationId);
      }
      return createCharge(
        { patientId: registration.patientId, sources: [{ type: 'REGISTRATION', id: registrationId }] },
        ctx
      );
    },

    async createPrescriptionCharge(registrationId, prescriptionIds, ctx) {
      const registration = registrations.findById(registrationId);
      if (!registration) {
        throw Errors.registrationNotFound(registrationId);
      }

      const errors: ValidationErrorDetail[] = [];
      prescriptionIds.forEach((prescriptionId, index) => {
        const prescription = prescriptions.findById(prescriptionId);
        if (prescription && prescription.registrationId !== registrationId) {
          errors.push({
            field: `prescriptionIds.${index}`,
            message: `Prescription ${prescription.prescriptionNo} was not written for this registration`,
            code: 'REGISTRATION_MISMATCH',
          });
        }
      });
      if (errors.length > 0) {
        throw new ValidationError('Prescriptions do not belong to the registration', errors);
      }

      const sources: ChargeSource[] = prescriptionIds.map((id) => ({ type: 'PRESCRIPTION', id }));

      // Bill the fee alongside the first prescriptions if nobody has billed it yet
      const feeOutstanding =
        registration.registrationFee > 0 &&
        BILLABLE_REGISTRATION_STATUSES.includes(registration.status) &&
        charges.findActiveChargeNoForSource('REGISTRATION', registrationId) === null;
      if (feeOutstanding) {
        sources.unshift({ type: 'REGISTRATION', id: registrationId });
        logger.info('[ChargeAggregator] Adding unpaid registration fee', {
          regNo: registration.regNo,
          requestId: ctx.requestId,
        });
      }

      return createCharge({ patientId: registration.patientId, sources }, ctx);
    },

    isRegistrationFeePaid(registrationId) {
      return charges.hasPaidRegistrationCharge(registrationId);
    },

    getChargesByType(registrationId) {
      const linked = charges.findByRegistration(registrationId);
      return {
        registrationCharges: linked.filter((charge) => charge.chargeType === 'REGISTRATION_ONLY'),
        prescriptionCharges: linked.filter((charge) => charge.chargeType === 'PRESCRIPTION_ONLY'),
        mixedCharges: linked.filter((charge) => charge.chargeType === 'MIXED'),
      };
    },

    cancelCharge(rawInput, ctx) {
      return withSettlementAudit(
        'cancelCharge',
        ctx,
        async () => {
          const input = parseOrThrow(cancelChargeSchema, rawInput, 'Invalid cancel request');
          const charge = load(input.chargeNo);
          if (charge.status !== CHARGE_STATUS.PENDING) {
            throw new InvalidStateTransitionError('charge', chargeStatusName(charge.status), 'cancel', {
              chargeNo: charge.chargeNo,
            });
          }

          const cancelled = runInTransaction(db, () => {
            if (!charges.markCancelled(input.chargeNo, input.reason, clock().toISOString())) {
              const current = load(input.chargeNo);
              throw new InvalidStateTransitionError('charge', chargeStatusName(current.status), 'cancel', {
                chargeNo: current.chargeNo,
              });
            }
            return load(input.chargeNo);
          });

          await events.publish({
            type: DOMAIN_EVENTS.CHARGE_CANCELLED,
            payload: { chargeNo: cancelled.chargeNo, reason: input.reason },
            metadata: { correlationId: ctx.requestId, operatorId: ctx.operatorId },
          });

          return cancelled;
        },
        (cancelled) => ({ chargeNo: cancelled.chargeNo })
      );
    },

    getCharge(chargeNo) {
      return load(chargeNo);
    },

    queryCharges(rawFilter) {
      const filter = parseOrThrow(chargeQuerySchema, rawFilter, 'Invalid charge query');
      return charges.query(filter);
    },
  };
}
