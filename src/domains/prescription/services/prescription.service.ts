/**
 * Prescription Service
 * ====================
 *
 * Writing, auditing and dispensing prescriptions. Dispensing is the point
 * where stock leaves the pharmacy, so it records per line how much was
 * handed out; refunds restore exactly that amount.
 *
 * @module domains/prescription/services
 */

import { z } from 'zod';
import { logger } from '@/lib/logger';
import { runInTransaction, type SettlementDatabase } from '@/lib/db';
import { withSettlementAudit } from '@/lib/audit/settlement-audit';
import { DOMAIN_EVENTS, type DomainEventBus } from '@/lib/events/domain-event-bus';
import { Errors, InvalidStateTransitionError, ValidationError } from '../../shared/errors';
import { systemClock, type Clock, type SettlementContext } from '../../shared/types';
import { parseOrThrow } from '../../shared/validation';
import type { InventoryAdjuster } from '../../inventory';
import type { RegistrationRepository } from '../../registration';
import type { SequenceGenerator } from '../../sequence';
import type { PrescriptionRepository } from '../repositories';
import {
  PRESCRIPTION_STATUS,
  type CreatePrescriptionInput,
  type NewPrescriptionLine,
  type Prescription,
  type PrescriptionStatus,
} from '../types';

const createPrescriptionSchema = z.object({
  patientId: z.number().int().positive(),
  registrationId: z.number().int().positive().optional(),
  lines: z
    .array(
      z.object({
        medicineId: z.number().int().positive(),
        quantity: z.number().int().positive(),
      })
    )
    .min(1, 'A prescription needs at least one line'),
});

const AUDITABLE_STATUSES: readonly PrescriptionStatus[] = [
  PRESCRIPTION_STATUS.DRAFT,
  PRESCRIPTION_STATUS.SUBMITTED,
];

export function prescriptionStatusName(status: PrescriptionStatus): string {
  const entry = Object.entries(PRESCRIPTION_STATUS).find(([, value]) => value === status);
  return entry ? entry[0] : String(status);
}

export interface PrescriptionService {
  createPrescription(input: CreatePrescriptionInput, ctx: SettlementContext): Promise<Prescription>;
  auditPrescription(prescriptionId: number, ctx: SettlementContext): Promise<Prescription>;
  dispensePrescription(prescriptionId: number, ctx: SettlementContext): Promise<Prescription>;
  getPrescription(prescriptionId: number): Prescription;
}

export interface PrescriptionServiceDeps {
  db: SettlementDatabase;
  prescriptions: PrescriptionRepository;
  registrations: RegistrationRepository;
  adjuster: InventoryAdjuster;
  sequence: SequenceGenerator;
  events: DomainEventBus;
  clock?: Clock;
}

export function createPrescriptionService(deps: PrescriptionServiceDeps): PrescriptionService {
  const { db, prescriptions, registrations, adjuster, sequence, events, clock = systemClock } = deps;

  function load(prescriptionId: number): Prescription {
    const prescription = prescriptions.findById(prescriptionId);
    if (!prescription) {
      throw Errors.prescriptionNotFound(prescriptionId);
    }
    return prescription;
  }

  return {
    async createPrescription(rawInput, ctx) {
      const input = parseOrThrow(createPrescriptionSchema, rawInput, 'Invalid prescription');

      if (input.registrationId !== undefined) {
        const registration = registrations.findById(input.registrationId);
        if (!registration) {
          throw Errors.registrationNotFound(input.registrationId);
        }
        if (registration.patientId !== input.patientId) {
          throw new ValidationError('Registration belongs to another patient', [
            { field: 'registrationId', message: 'Registration belongs to another patient', code: 'PATIENT_MISMATCH' },
          ]);
        }
      }

      // Prices are captured now; later catalogue changes do not reprice the prescription
      const lines: NewPrescriptionLine[] = input.lines.map((line) => ({
        ...line,
        unitPrice: adjuster.getMedicine(line.medicineId).unitPrice,
      }));
      const totalAmount = lines.reduce((sum, line) => sum + line.quantity * line.unitPrice, 0);

      const prescriptionNo = await sequence.next('prescription', ctx);
      const prescription = runInTransaction(db, () =>
        prescriptions.insert(
          prescriptionNo,
          input.patientId,
          input.registrationId ?? null,
          totalAmount,
          lines,
          clock().toISOString()
        )
      );

      logger.info('[Prescription] Created', {
        prescriptionNo,
        lines: lines.length,
        totalAmount,
        requestId: ctx.requestId,
      });
      return prescription;
    },

    async auditPrescription(prescriptionId, ctx) {
      const prescription = load(prescriptionId);
      const from = AUDITABLE_STATUSES.find((status) => status === prescription.status);
      if (
        from === undefined ||
        !prescriptions.transition(prescriptionId, from, PRESCRIPTION_STATUS.AUDITED, clock().toISOString())
      ) {
        throw new InvalidStateTransitionError(
          'prescription',
          prescriptionStatusName(load(prescriptionId).status),
          'audit'
        );
      }

      logger.info('[Prescription] Audited', {
        prescriptionNo: prescription.prescriptionNo,
        requestId: ctx.requestId,
      });
      return load(prescriptionId);
    },

    dispensePrescription(prescriptionId, ctx) {
      return withSettlementAudit(
        'dispensePrescription',
        ctx,
        async () => {
          const prescription = load(prescriptionId);
          if (prescription.status !== PRESCRIPTION_STATUS.PAID) {
            throw new InvalidStateTransitionError(
              'prescription',
              prescriptionStatusName(prescription.status),
              'dispense',
              { prescriptionNo: prescription.prescriptionNo }
            );
          }

          runInTransaction(db, () => {
            const now = clock().toISOString();
            if (
              !prescriptions.transition(
                prescriptionId,
                PRESCRIPTION_STATUS.PAID,
                PRESCRIPTION_STATUS.DISPENSED,
                now
              )
            ) {
              throw new InvalidStateTransitionError(
                'prescription',
                prescriptionStatusName(load(prescriptionId).status),
                'dispense',
                { prescriptionNo: prescription.prescriptionNo }
              );
            }

            for (const line of prescription.lines) {
              adjuster.adjust({
                medicineId: line.medicineId,
                delta: -line.quantity,
                reason: 'DISPENSE',
                reference: prescription.prescriptionNo,
              });
              prescriptions.recordDispensed(line.id, line.quantity);
            }
          });

          const dispensed = load(prescriptionId);
          await events.publish({
            type: DOMAIN_EVENTS.PRESCRIPTION_DISPENSED,
            payload: {
              prescriptionNo: dispensed.prescriptionNo,
              patientId: dispensed.patientId,
              lines: dispensed.lines.map((line) => ({
                medicineId: line.medicineId,
                dispensedQuantity: line.dispensedQuantity,
              })),
            },
            metadata: { correlationId: ctx.requestId, operatorId: ctx.operatorId },
          });

          return dispensed;
        },
        (dispensed) => ({ prescriptionNo: dispensed.prescriptionNo })
      );
    },

    getPrescription(prescriptionId) {
      return load(prescriptionId);
    },
  };
}
