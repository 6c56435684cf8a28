/**
 * Settlement API route tests
 * Handlers run against the process-wide services over an in-memory store.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { NextRequest } from 'next/server';
import { z } from 'zod';
import { POST as createCharge, GET as listCharges } from '@/app/api/settlement/charges/route';
import { GET as getCharge } from '@/app/api/settlement/charges/[chargeNo]/route';
import { POST as payCharge } from '@/app/api/settlement/charges/[chargeNo]/payment/route';
import { POST as refundCharge } from '@/app/api/settlement/charges/[chargeNo]/refund/route';
import { POST as cancelCharge } from '@/app/api/settlement/charges/[chargeNo]/cancel/route';
import { GET as dailySettlement } from '@/app/api/settlement/daily/route';
import { GET as sequenceHealth } from '@/app/api/health/sequence/route';
import { closeDb } from '@/lib/db';
import { getSettlementServices, resetSettlementServices } from '@/domains/container';
import { ServiceUnavailableError } from '@/domains/shared/errors';
import { seedVisit, type SeededVisit } from '@/tests/setup/settlement';

const BASE = 'http://localhost/api/settlement';

const chargeBody = z.object({
  charge: z.object({ chargeNo: z.string(), status: z.number(), transactionNo: z.string().nullable() }),
});

const errorBody = z.object({
  error: z.string(),
  code: z.string(),
  statusCode: z.number(),
  requestId: z.string().optional(),
  errors: z.array(z.object({ field: z.string(), code: z.string().optional() })).optional(),
});

function jsonRequest(url: string, body: unknown, requestId = 'req-route'): NextRequest {
  return new NextRequest(url, {
    method: 'POST',
    body: JSON.stringify(body),
    headers: { 'content-type': 'application/json', 'x-request-id': requestId, 'x-operator-id': '7' },
  });
}

function params(chargeNo: string) {
  return { params: { chargeNo } };
}

describe('Settlement API routes', () => {
  let visit: SeededVisit;

  beforeEach(async () => {
    visit = await seedVisit(getSettlementServices(), { patientId: 1001 });
  });

  afterEach(() => {
    resetSettlementServices();
    closeDb();
  });

  async function postCharge(): Promise<string> {
    const res = await createCharge(
      jsonRequest(`${BASE}/charges`, {
        patientId: 1001,
        sources: [
          { type: 'REGISTRATION', id: visit.registration.id },
          { type: 'PRESCRIPTION', id: visit.prescription.id },
        ],
      }),
      { params: {} }
    );
    expect(res.status).toBe(201);
    return chargeBody.parse(await res.json()).charge.chargeNo;
  }

  describe('POST /charges', () => {
    it('creates a charge and echoes the request id', async () => {
      const res = await createCharge(
        jsonRequest(
          `${BASE}/charges`,
          { patientId: 1001, sources: [{ type: 'REGISTRATION', id: visit.registration.id }] },
          'req-create-1'
        ),
        { params: {} }
      );

      expect(res.status).toBe(201);
      expect(res.headers.get('x-request-id')).toBe('req-create-1');
      const { charge } = chargeBody.parse(await res.json());
      expect(charge.chargeNo).toMatch(/^CHG\d{14}$/);
      expect(charge.status).toBe(0);
    });

    it('answers 400 for a body that is not JSON', async () => {
      const req = new NextRequest(`${BASE}/charges`, {
        method: 'POST',
        body: '{not json',
        headers: { 'x-request-id': 'req-bad-json' },
      });

      const res = await createCharge(req, { params: {} });

      expect(res.status).toBe(400);
      expect(res.headers.get('x-request-id')).toBe('req-bad-json');
      expect(errorBody.parse(await res.json())).toMatchObject({ code: 'BAD_REQUEST', requestId: 'req-bad-json' });
    });

    it('answers 422 with field errors for an invalid body', async () => {
      const res = await createCharge(jsonRequest(`${BASE}/charges`, { patientId: -1, sources: [] }), { params: {} });

      expect(res.status).toBe(422);
      const body = errorBody.parse(await res.json());
      expect(body.code).toBe('VALIDATION_ERROR');
      expect(body.errors?.map((error) => error.field)).toEqual(['patientId', 'sources']);
    });

    it('answers 409 when the source is already billed', async () => {
      await postCharge();

      const res = await createCharge(
        jsonRequest(`${BASE}/charges`, { patientId: 1001, sources: [{ type: 'REGISTRATION', id: visit.registration.id }] }),
        { params: {} }
      );

      expect(res.status).toBe(409);
      expect(errorBody.parse(await res.json()).code).toBe('CONFLICT');
    });

    it('answers 503 with Retry-After when numbering is unavailable', async () => {
      vi.spyOn(getSettlementServices().sequence, 'next').mockRejectedValue(
        new ServiceUnavailableError('Sequence store unavailable for charge', 1)
      );

      const res = await createCharge(
        jsonRequest(`${BASE}/charges`, { patientId: 1001, sources: [{ type: 'REGISTRATION', id: visit.registration.id }] }),
        { params: {} }
      );

      expect(res.status).toBe(503);
      expect(res.headers.get('Retry-After')).toBe('1');
      expect(errorBody.parse(await res.json()).code).toBe('SERVICE_UNAVAILABLE');
    });
  });

  describe('GET /charges', () => {
    it('filters by query string', async () => {
      const chargeNo = await postCharge();

      const res = await listCharges(new NextRequest(`${BASE}/charges?patientId=1001&limit=5`), { params: {} });

      expect(res.status).toBe(200);
      const body = z
        .object({ data: z.array(z.object({ chargeNo: z.string() })), total: z.number(), limit: z.number() })
        .parse(await res.json());
      expect(body).toEqual({ data: [{ chargeNo }], total: 1, limit: 5 });
    });

    it('answers 422 for an unknown status', async () => {
      const res = await listCharges(new NextRequest(`${BASE}/charges?status=7`), { params: {} });

      expect(res.status).toBe(422);
    });
  });

  describe('GET /charges/:chargeNo', () => {
    it('answers 404 for an unknown charge', async () => {
      const res = await getCharge(new NextRequest(`${BASE}/charges/CHG20260103999999`), params('CHG20260103999999'));

      expect(res.status).toBe(404);
      expect(errorBody.parse(await res.json())).toMatchObject({
        code: 'NOT_FOUND',
        error: 'Charge not found: CHG20260103999999',
      });
    });
  });

  describe('payment, refund and cancel', () => {
    it('pays idempotently and rejects a competing transaction', async () => {
      const chargeNo = await postCharge();
      const url = `${BASE}/charges/${chargeNo}/payment`;

      const first = await payCharge(jsonRequest(url, { paymentMethod: 'CARD', transactionNo: 'TXN-1' }), params(chargeNo));
      const replay = await payCharge(jsonRequest(url, { paymentMethod: 'CARD', transactionNo: 'TXN-1' }), params(chargeNo));
      const competing = await payCharge(jsonRequest(url, { paymentMethod: 'CARD', transactionNo: 'TXN-2' }), params(chargeNo));

      expect(first.status).toBe(200);
      expect(chargeBody.parse(await first.json()).charge).toMatchObject({ status: 1, transactionNo: 'TXN-1' });
      expect(replay.status).toBe(200);
      expect(competing.status).toBe(409);
    });

    it('refunds once and then answers 409', async () => {
      const chargeNo = await postCharge();
      await payCharge(
        jsonRequest(`${BASE}/charges/${chargeNo}/payment`, { paymentMethod: 'CASH', transactionNo: 'TXN-1' }),
        params(chargeNo)
      );
      const url = `${BASE}/charges/${chargeNo}/refund`;

      const refunded = await refundCharge(jsonRequest(url, { reason: 'patient declined' }), params(chargeNo));
      const again = await refundCharge(jsonRequest(url, { reason: 'patient declined' }), params(chargeNo));

      expect(refunded.status).toBe(200);
      expect(chargeBody.parse(await refunded.json()).charge.status).toBe(2);
      expect(again.status).toBe(409);
      expect(errorBody.parse(await again.json()).code).toBe('INVALID_STATE_TRANSITION');
    });

    it('cancels a pending charge', async () => {
      const chargeNo = await postCharge();

      const res = await cancelCharge(
        jsonRequest(`${BASE}/charges/${chargeNo}/cancel`, { reason: 'wrong items' }),
        params(chargeNo)
      );

      expect(res.status).toBe(200);
      expect(chargeBody.parse(await res.json()).charge.status).toBe(3);
    });
  });

  describe('GET /daily', () => {
    it('reports the requested day', async () => {
      const chargeNo = await postCharge();
      await payCharge(
        jsonRequest(`${BASE}/charges/${chargeNo}/payment`, { paymentMethod: 'CASH', transactionNo: 'TXN-1' }),
        params(chargeNo)
      );
      const today = new Date().toISOString().slice(0, 10);

      const res = await dailySettlement(new NextRequest(`${BASE}/daily?date=${today}`), { params: {} });

      expect(res.status).toBe(200);
      const { settlement } = z
        .object({ settlement: z.object({ date: z.string(), collectedAmount: z.number() }) })
        .parse(await res.json());
      expect(settlement).toEqual({ date: today, collectedAmount: 10000 });
    });

    it('answers 422 for an impossible date', async () => {
      const res = await dailySettlement(new NextRequest(`${BASE}/daily?date=2026-13-01`), { params: {} });

      expect(res.status).toBe(422);
    });
  });

  describe('GET /health/sequence', () => {
    it('reports the generator and is never cached', async () => {
      const res = await sequenceHealth(new NextRequest('http://localhost/api/health/sequence'), { params: {} });

      expect(res.status).toBe(200);
      expect(res.headers.get('Cache-Control')).toBe('no-store');
      const report = z.object({ status: z.string(), sample: z.string() }).parse(await res.json());
      expect(report.sample).toMatch(/^CHG\d{14}$/);
    });

    it('serves the recent report without drawing another number', async () => {
      const next = vi.spyOn(getSettlementServices().sequence, 'next');

      const first = await sequenceHealth(new NextRequest('http://localhost/api/health/sequence'), { params: {} });
      const second = await sequenceHealth(new NextRequest('http://localhost/api/health/sequence'), { params: {} });

      const sample = z.object({ sample: z.string() });
      expect(sample.parse(await second.json()).sample).toBe(sample.parse(await first.json()).sample);
      expect(next).toHaveBeenCalledTimes(1);
    });

    it('answers 503 when the generator is down', async () => {
      vi.spyOn(getSettlementServices().sequence, 'next').mockRejectedValue(
        new ServiceUnavailableError('Sequence store unavailable for charge', 1)
      );

      const res = await sequenceHealth(new NextRequest('http://localhost/api/health/sequence'), { params: {} });

      expect(res.status).toBe(503);
      expect(z.object({ status: z.string() }).parse(await res.json()).status).toBe('DOWN');
    });
  });
});
