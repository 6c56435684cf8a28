/**
 * Charge Aggregator Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { DOMAIN_EVENTS, type DomainEvent } from '@/lib/events/domain-event-bus';
import { CHARGE_STATUS } from '@/domains/charge';
import { REGISTRATION_STATUS } from '@/domains/registration';
import {
  ConflictError,
  InvalidStateTransitionError,
  NotFoundError,
  ValidationError,
} from '@/domains/shared/errors';
import {
  captureRejection,
  createTestHarness,
  seedVisit,
  testContext,
  TEST_START,
  type SeededVisit,
  type TestHarness,
} from '@/tests/setup/settlement';

describe('ChargeAggregator', () => {
  let harness: TestHarness;
  let visit: SeededVisit;
  const ctx = testContext();

  beforeEach(async () => {
    harness = createTestHarness();
    visit = await seedVisit(harness, { patientId: 1001 });
  });

  function mixedSources() {
    return [
      { type: 'PRESCRIPTION' as const, id: visit.prescription.id },
      { type: 'REGISTRATION' as const, id: visit.registration.id },
    ];
  }

  describe('createCharge', () => {
    it('creates a PENDING MIXED charge with the fee line first', async () => {
      const charge = await harness.aggregator.createCharge(
        { patientId: 1001, sources: mixedSources() },
        ctx
      );

      expect(charge).toMatchObject({
        chargeNo: 'CHG20260103000001',
        patientId: 1001,
        chargeType: 'MIXED',
        totalAmount: 10000,
        discountAmount: 0,
        insuranceAmount: 0,
        actualAmount: 10000,
        status: CHARGE_STATUS.PENDING,
        paymentMethod: null,
        transactionNo: null,
        paidAt: null,
        createdAt: TEST_START,
      });
      expect(charge.details).toEqual([
        {
          lineNo: 1,
          itemType: 'REGISTRATION',
          itemRef: visit.registration.id,
          itemName: 'Registration fee REG20260103000001',
          itemAmount: 2000,
        },
        {
          lineNo: 2,
          itemType: 'PRESCRIPTION',
          itemRef: visit.prescription.id,
          itemName: 'Prescription PRE20260103000001',
          itemAmount: 8000,
        },
      ]);
    });

    it('applies discount and insurance to the actual amount', async () => {
      const charge = await harness.aggregator.createCharge(
        { patientId: 1001, sources: mixedSources(), discountAmount: 500, insuranceAmount: 1500 },
        ctx
      );

      expect(charge.totalAmount).toBe(10000);
      expect(charge.actualAmount).toBe(8000);
    });

    it('accepts a fully covered charge', async () => {
      const charge = await harness.aggregator.createCharge(
        { patientId: 1001, sources: mixedSources(), insuranceAmount: 10000 },
        ctx
      );

      expect(charge.actualAmount).toBe(0);
    });

    it('rejects reductions above the total', async () => {
      const error = await captureRejection(
        harness.aggregator.createCharge(
          { patientId: 1001, sources: mixedSources(), discountAmount: 9000, insuranceAmount: 2000 },
          ctx
        )
      );

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ errors: [{ field: 'discountAmount', code: 'AMOUNT_OUT_OF_RANGE' }] });
    });

    it('accepts a matching declared total', async () => {
      const charge = await harness.aggregator.createCharge(
        { patientId: 1001, sources: mixedSources(), declaredTotal: 10000 },
        ctx
      );

      expect(charge.totalAmount).toBe(10000);
    });

    it('rejects a declared total that differs from the billable items', async () => {
      const error = await captureRejection(
        harness.aggregator.createCharge(
          { patientId: 1001, sources: mixedSources(), declaredTotal: 9999 },
          ctx
        )
      );

      expect(error).toMatchObject({
        code: 'VALIDATION_ERROR',
        errors: [{ field: 'declaredTotal', message: 'Expected 10000, got 9999', code: 'TOTAL_MISMATCH' }],
      });
    });

    it('rejects duplicate sources in one request', async () => {
      const error = await captureRejection(
        harness.aggregator.createCharge(
          {
            patientId: 1001,
            sources: [
              { type: 'REGISTRATION', id: visit.registration.id },
              { type: 'REGISTRATION', id: visit.registration.id },
            ],
          },
          ctx
        )
      );

      expect(error).toMatchObject({
        errors: [{ field: 'sources.1', message: `Duplicate source REGISTRATION:${visit.registration.id}` }],
      });
    });

    it('rejects an empty source list', async () => {
      await expect(harness.aggregator.createCharge({ patientId: 1001, sources: [] }, ctx)).rejects.toBeInstanceOf(
        ValidationError
      );
    });

    it('throws NotFound for an unknown source', async () => {
      const error = await captureRejection(
        harness.aggregator.createCharge({ patientId: 1001, sources: [{ type: 'PRESCRIPTION', id: 999 }] }, ctx)
      );

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toMatchObject({ message: 'Prescription not found: 999' });
    });

    it('collects a patient mismatch for every foreign source', async () => {
      const error = await captureRejection(
        harness.aggregator.createCharge({ patientId: 4242, sources: mixedSources() }, ctx)
      );

      expect(error).toMatchObject({
        errors: [
          { field: 'sources.0', code: 'PATIENT_MISMATCH' },
          { field: 'sources.1', code: 'PATIENT_MISMATCH' },
        ],
      });
    });

    it('rejects a registration that is no longer billable', async () => {
      harness.repositories.registrations.transition(
        visit.registration.id,
        REGISTRATION_STATUS.WAITING,
        REGISTRATION_STATUS.CANCELLED,
        TEST_START
      );

      const error = await captureRejection(harness.aggregator.createRegistrationCharge(visit.registration.id, ctx));

      expect(error).toMatchObject({
        errors: [
          {
            field: 'sources.0',
            message: 'Registration REG20260103000001 is not billable',
            code: 'NOT_BILLABLE',
            value: REGISTRATION_STATUS.CANCELLED,
          },
        ],
      });
    });

    it('rejects a free registration', async () => {
      const freeVisit = await seedVisit(harness, { patientId: 1002, registrationFee: 0 });

      const error = await captureRejection(harness.aggregator.createRegistrationCharge(freeVisit.registration.id, ctx));

      expect(error).toMatchObject({ errors: [{ code: 'NOT_BILLABLE' }] });
    });

    it('rejects a prescription that has not been audited', async () => {
      const draft = await harness.prescriptionService.createPrescription(
        { patientId: 1001, registrationId: visit.registration.id, lines: [{ medicineId: visit.medicines[0].id, quantity: 1 }] },
        ctx
      );

      const error = await captureRejection(
        harness.aggregator.createCharge({ patientId: 1001, sources: [{ type: 'PRESCRIPTION', id: draft.id }] }, ctx)
      );

      expect(error).toMatchObject({ errors: [{ code: 'NOT_BILLABLE', value: 0 }] });
    });

    it('refuses to bill a source that already sits on an active charge', async () => {
      const first = await harness.aggregator.createRegistrationCharge(visit.registration.id, ctx);

      const error = await captureRejection(
        harness.aggregator.createCharge({ patientId: 1001, sources: mixedSources() }, ctx)
      );

      expect(error).toBeInstanceOf(ConflictError);
      expect(error).toMatchObject({
        message: `REGISTRATION ${visit.registration.id} is already billed by ${first.chargeNo}`,
      });
    });

    it('allows billing a source again once its charge is cancelled', async () => {
      const first = await harness.aggregator.createRegistrationCharge(visit.registration.id, ctx);
      await harness.aggregator.cancelCharge({ chargeNo: first.chargeNo, reason: 'wrong patient card' }, ctx);

      const second = await harness.aggregator.createRegistrationCharge(visit.registration.id, ctx);

      expect(second.chargeNo).toBe('CHG20260103000002');
    });

    it('publishes ChargeCreated after commit', async () => {
      const seen: DomainEvent[] = [];
      harness.events.subscribe(DOMAIN_EVENTS.CHARGE_CREATED, async (event) => {
        seen.push(event);
      });

      await harness.aggregator.createCharge({ patientId: 1001, sources: mixedSources() }, ctx);

      expect(seen).toHaveLength(1);
      expect(seen[0]?.payload).toEqual({
        chargeNo: 'CHG20260103000001',
        patientId: 1001,
        chargeType: 'MIXED',
        totalAmount: 10000,
        actualAmount: 10000,
      });
      expect(seen[0]?.metadata).toMatchObject({ correlationId: 'req-test', operatorId: 7 });
    });
  });

  describe('phased charging', () => {
    it('bills the registration fee on its own', async () => {
      const charge = await harness.aggregator.createRegistrationCharge(visit.registration.id, ctx);

      expect(charge.chargeType).toBe('REGISTRATION_ONLY');
      expect(charge.totalAmount).toBe(2000);
    });

    it('adds the outstanding fee to the first prescription charge', async () => {
      const charge = await harness.aggregator.createPrescriptionCharge(
        visit.registration.id,
        [visit.prescription.id],
        ctx
      );

      expect(charge.chargeType).toBe('MIXED');
      expect(charge.details.map((detail) => detail.itemType)).toEqual(['REGISTRATION', 'PRESCRIPTION']);
    });

    it('bills prescriptions alone once the fee is already charged', async () => {
      await harness.aggregator.createRegistrationCharge(visit.registration.id, ctx);

      const charge = await harness.aggregator.createPrescriptionCharge(
        visit.registration.id,
        [visit.prescription.id],
        ctx
      );

      expect(charge.chargeType).toBe('PRESCRIPTION_ONLY');
      expect(charge.totalAmount).toBe(8000);
    });

    it('rejects prescriptions written under another registration', async () => {
      const other = await seedVisit(harness, { patientId: 1002 });

      const error = await captureRejection(
        harness.aggregator.createPrescriptionCharge(visit.registration.id, [other.prescription.id], ctx)
      );

      expect(error).toMatchObject({ errors: [{ field: 'prescriptionIds.0', code: 'REGISTRATION_MISMATCH' }] });
    });

    it('reports whether the fee has been paid', async () => {
      const charge = await harness.aggregator.createRegistrationCharge(visit.registration.id, ctx);
      expect(harness.aggregator.isRegistrationFeePaid(visit.registration.id)).toBe(false);

      await harness.payments.processPayment(
        { chargeNo: charge.chargeNo, paymentMethod: 'CASH', transactionNo: 'TXN-FEE-1' },
        ctx
      );

      expect(harness.aggregator.isRegistrationFeePaid(visit.registration.id)).toBe(true);
    });

    it('groups a registration’s charges by type', async () => {
      const fee = await harness.aggregator.createRegistrationCharge(visit.registration.id, ctx);
      const drugs = await harness.aggregator.createPrescriptionCharge(
        visit.registration.id,
        [visit.prescription.id],
        ctx
      );

      const grouped = harness.aggregator.getChargesByType(visit.registration.id);

      expect(grouped.registrationCharges.map((c) => c.chargeNo)).toEqual([fee.chargeNo]);
      expect(grouped.prescriptionCharges.map((c) => c.chargeNo)).toEqual([drugs.chargeNo]);
      expect(grouped.mixedCharges).toEqual([]);
    });
  });

  describe('cancelCharge', () => {
    it('cancels a pending charge with its reason', async () => {
      const charge = await harness.aggregator.createRegistrationCharge(visit.registration.id, ctx);
      harness.clock.advance(60_000);

      const cancelled = await harness.aggregator.cancelCharge(
        { chargeNo: charge.chargeNo, reason: 'patient left' },
        ctx
      );

      expect(cancelled).toMatchObject({
        status: CHARGE_STATUS.CANCELLED,
        cancelReason: 'patient left',
        cancelledAt: '2026-01-03T09:01:00.000Z',
      });
    });

    it('rejects cancelling twice', async () => {
      const charge = await harness.aggregator.createRegistrationCharge(visit.registration.id, ctx);
      await harness.aggregator.cancelCharge({ chargeNo: charge.chargeNo, reason: 'patient left' }, ctx);

      const error = await captureRejection(
        harness.aggregator.cancelCharge({ chargeNo: charge.chargeNo, reason: 'again' }, ctx)
      );

      expect(error).toBeInstanceOf(InvalidStateTransitionError);
      expect(error).toMatchObject({ message: 'Cannot cancel charge in state CANCELLED' });
    });

    it('rejects cancelling a paid charge', async () => {
      const charge = await harness.aggregator.createRegistrationCharge(visit.registration.id, ctx);
      await harness.payments.processPayment(
        { chargeNo: charge.chargeNo, paymentMethod: 'CARD', transactionNo: 'TXN-1' },
        ctx
      );

      await expect(
        harness.aggregator.cancelCharge({ chargeNo: charge.chargeNo, reason: 'changed mind' }, ctx)
      ).rejects.toThrow('Cannot cancel charge in state PAID');
    });

    it('throws NotFound for an unknown charge', async () => {
      await expect(
        harness.aggregator.cancelCharge({ chargeNo: 'CHG20260103999999', reason: 'x' }, ctx)
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('queries', () => {
    it('returns a charge by number', async () => {
      const charge = await harness.aggregator.createRegistrationCharge(visit.registration.id, ctx);

      expect(harness.aggregator.getCharge(charge.chargeNo)).toEqual(charge);
      expect(() => harness.aggregator.getCharge('CHG20260103000099')).toThrow('Charge not found: CHG20260103000099');
    });

    it('pages newest first and filters by coerced query values', async () => {
      const other = await seedVisit(harness, { patientId: 1002 });
      const fee = await harness.aggregator.createRegistrationCharge(visit.registration.id, ctx);
      harness.clock.advance(1000);
      const drugs = await harness.aggregator.createPrescriptionCharge(
        visit.registration.id,
        [visit.prescription.id],
        ctx
      );
      harness.clock.advance(1000);
      const mixed = await harness.aggregator.createPrescriptionCharge(
        other.registration.id,
        [other.prescription.id],
        ctx
      );

      const firstPage = harness.aggregator.queryCharges({ limit: '2' });
      expect(firstPage).toMatchObject({ total: 3, hasMore: true, limit: 2, offset: 0 });
      expect(firstPage.data.map((c) => c.chargeNo)).toEqual([mixed.chargeNo, drugs.chargeNo]);

      const secondPage = harness.aggregator.queryCharges({ limit: '2', offset: '2' });
      expect(secondPage.hasMore).toBe(false);
      expect(secondPage.data.map((c) => c.chargeNo)).toEqual([fee.chargeNo]);

      expect(harness.aggregator.queryCharges({ patientId: '1002' }).data.map((c) => c.chargeNo)).toEqual([
        mixed.chargeNo,
      ]);
      expect(
        harness.aggregator.queryCharges({ startDate: '2026-01-03T09:00:01.000Z', endDate: '2026-01-03T09:00:02.000Z' })
          .total
      ).toBe(1);
    });

    it('compares date bounds written without milliseconds against stored times', async () => {
      harness.clock.set('2026-01-03T09:00:00.250Z');
      const inside = await harness.aggregator.createRegistrationCharge(visit.registration.id, ctx);
      harness.clock.set('2026-01-03T09:00:01.250Z');
      await harness.aggregator.createPrescriptionCharge(visit.registration.id, [visit.prescription.id], ctx);

      const page = harness.aggregator.queryCharges({
        startDate: '2026-01-03T09:00:00Z',
        endDate: '2026-01-03T09:00:01Z',
      });

      expect(page.total).toBe(1);
      expect(page.data.map((c) => c.chargeNo)).toEqual([inside.chargeNo]);
    });

    it('filters by status', async () => {
      const charge = await harness.aggregator.createRegistrationCharge(visit.registration.id, ctx);
      await harness.aggregator.cancelCharge({ chargeNo: charge.chargeNo, reason: 'duplicate' }, ctx);

      expect(harness.aggregator.queryCharges({ status: '3' }).total).toBe(1);
      expect(harness.aggregator.queryCharges({ status: CHARGE_STATUS.PENDING }).total).toBe(0);
    });

    it('rejects an out-of-range page size', () => {
      expect(() => harness.aggregator.queryCharges({ limit: 500 })).toThrow(ValidationError);
      expect(() => harness.aggregator.queryCharges({ status: 9 })).toThrow(ValidationError);
    });
  });
});
