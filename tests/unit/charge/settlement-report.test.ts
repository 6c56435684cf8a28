/**
 * Settlement Report Engine Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ValidationError } from '@/domains/shared/errors';
import {
  createTestHarness,
  seedVisit,
  testContext,
  type SeededVisit,
  type TestHarness,
} from '@/tests/setup/settlement';

const HOUR_MS = 60 * 60 * 1000;

describe('SettlementReportEngine', () => {
  let harness: TestHarness;
  const ctx = testContext();

  beforeEach(() => {
    harness = createTestHarness();
  });

  async function billVisit(visit: SeededVisit, discountAmount = 0) {
    return harness.aggregator.createCharge(
      {
        patientId: visit.patientId,
        sources: [
          { type: 'REGISTRATION', id: visit.registration.id },
          { type: 'PRESCRIPTION', id: visit.prescription.id },
        ],
        discountAmount,
      },
      ctx
    );
  }

  it('reports an empty day as zeros', () => {
    expect(harness.reports.getDailySettlement('2026-01-03')).toEqual({
      date: '2026-01-03',
      from: '2026-01-03T00:00:00.000Z',
      to: '2026-01-04T00:00:00.000Z',
      chargeCounts: { PENDING: 0, PAID: 0, REFUNDED: 0, CANCELLED: 0 },
      paidAmount: 0,
      collectedAmount: 0,
      refunds: { count: 0, amount: 0 },
      netCollection: 0,
      byPaymentMethod: {},
    });
  });

  it('totals a day of payments, refunds and cancellations', async () => {
    const a = await seedVisit(harness, { patientId: 1001 });
    const b = await seedVisit(harness, { patientId: 1002 });
    const c = await seedVisit(harness, { patientId: 1003 });

    const paid = await billVisit(a);
    await harness.payments.processPayment(
      { chargeNo: paid.chargeNo, paymentMethod: 'CASH', transactionNo: 'TXN-A' },
      ctx
    );

    const refunded = await billVisit(b, 1000);
    await harness.payments.processPayment(
      { chargeNo: refunded.chargeNo, paymentMethod: 'CARD', transactionNo: 'TXN-B' },
      ctx
    );
    harness.clock.advance(HOUR_MS);
    await harness.refunds.processRefund(
      { chargeNo: refunded.chargeNo, reason: 'billing error', restoreInventory: true },
      ctx
    );

    await harness.aggregator.createRegistrationCharge(c.registration.id, ctx);
    const cancelled = await harness.aggregator.createCharge(
      { patientId: 1003, sources: [{ type: 'PRESCRIPTION', id: c.prescription.id }] },
      ctx
    );
    await harness.aggregator.cancelCharge({ chargeNo: cancelled.chargeNo, reason: 'duplicate' }, ctx);

    const report = harness.reports.getDailySettlement('2026-01-03');

    expect(report.chargeCounts).toEqual({ PENDING: 1, PAID: 1, REFUNDED: 1, CANCELLED: 1 });
    expect(report.paidAmount).toBe(10000);
    expect(report.collectedAmount).toBe(19000);
    expect(report.refunds).toEqual({ count: 1, amount: 9000 });
    expect(report.netCollection).toBe(10000);
    expect(report.byPaymentMethod).toEqual({
      CASH: { count: 1, amount: 10000 },
      CARD: { count: 1, amount: 9000 },
    });
  });

  it('books a refund on the day it happens, not the day of payment', async () => {
    const visit = await seedVisit(harness, { patientId: 1001 });
    const charge = await billVisit(visit);
    await harness.payments.processPayment(
      { chargeNo: charge.chargeNo, paymentMethod: 'WECHAT', transactionNo: 'TXN-1' },
      ctx
    );
    harness.clock.advance(24 * HOUR_MS);
    await harness.refunds.processRefund(
      { chargeNo: charge.chargeNo, reason: 'not collected', restoreInventory: false, refundAmount: 2500 },
      ctx
    );

    const paymentDay = harness.reports.getDailySettlement('2026-01-03');
    expect(paymentDay).toMatchObject({
      chargeCounts: { REFUNDED: 1 },
      paidAmount: 0,
      collectedAmount: 10000,
      refunds: { count: 0, amount: 0 },
      netCollection: 10000,
    });

    const refundDay = harness.reports.getDailySettlement('2026-01-04');
    expect(refundDay).toMatchObject({
      chargeCounts: { PENDING: 0, PAID: 0, REFUNDED: 0, CANCELLED: 0 },
      collectedAmount: 0,
      refunds: { count: 1, amount: 2500 },
      netCollection: -2500,
    });
  });

  it('covers an arbitrary half-open range', async () => {
    const visit = await seedVisit(harness, { patientId: 1001 });
    const charge = await billVisit(visit);
    await harness.payments.processPayment(
      { chargeNo: charge.chargeNo, paymentMethod: 'ALIPAY', transactionNo: 'TXN-1' },
      ctx
    );

    const upToPayment = harness.reports.getSettlementStatistics({
      from: '2026-01-03T08:00:00.000Z',
      to: '2026-01-03T09:00:00.000Z',
    });
    const throughPayment = harness.reports.getSettlementStatistics({
      from: '2026-01-03T09:00:00.000Z',
      to: '2026-01-03T09:00:00.001Z',
    });

    expect(upToPayment.collectedAmount).toBe(0);
    expect(throughPayment.collectedAmount).toBe(10000);
  });

  it('normalizes range bounds written without milliseconds', async () => {
    const visit = await seedVisit(harness, { patientId: 1001 });
    harness.clock.set('2026-01-03T09:00:00.250Z');
    const charge = await billVisit(visit);
    await harness.payments.processPayment(
      { chargeNo: charge.chargeNo, paymentMethod: 'CASH', transactionNo: 'TXN-1' },
      ctx
    );

    const stats = harness.reports.getSettlementStatistics({
      from: '2026-01-03T09:00:00Z',
      to: '2026-01-03T09:00:01Z',
    });
    const after = harness.reports.getSettlementStatistics({
      from: '2026-01-03T08:59:59Z',
      to: '2026-01-03T09:00:00Z',
    });

    expect(stats.from).toBe('2026-01-03T09:00:00.000Z');
    expect(stats.to).toBe('2026-01-03T09:00:01.000Z');
    expect(stats.chargeCounts.PAID).toBe(1);
    expect(stats.collectedAmount).toBe(10000);
    expect(after.collectedAmount).toBe(0);
  });

  it('rejects an inverted range', () => {
    expect(() =>
      harness.reports.getSettlementStatistics({ from: '2026-01-04T00:00:00.000Z', to: '2026-01-03T00:00:00.000Z' })
    ).toThrow(ValidationError);
  });

  it.each(['2026-02-30', '03/01/2026', ''])('rejects the date %j', (date) => {
    expect(() => harness.reports.getDailySettlement(date)).toThrow(ValidationError);
  });
});
