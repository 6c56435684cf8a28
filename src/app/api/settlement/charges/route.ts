/**
 * Charges collection
 *
 * POST - aggregate billable items into a new PENDING charge
 * GET  - query charges (chargeNo, patientId, status, startDate, endDate, limit, offset)
 *
 * @module api/settlement/charges
 */

import { NextResponse } from 'next/server';
import { getSettlementServices } from '@/domains/container';
import { createChargeSchema } from '@/domains/charge/validation';
import { readJsonBody, withApiHandler } from '@/domains/shared/errors/handler';
import { parseOrThrow } from '@/domains/shared/validation';

export const POST = withApiHandler(async (req, ctx) => {
  const input = parseOrThrow(createChargeSchema, await readJsonBody(req), 'Invalid charge request');
  const charge = await getSettlementServices().aggregator.createCharge(input, ctx);
  return NextResponse.json({ charge }, { status: 201 });
});

export const GET = withApiHandler(async (req) => {
  const filter = Object.fromEntries(req.nextUrl.searchParams.entries());
  const result = getSettlementServices().aggregator.queryCharges(filter);
  return NextResponse.json(result);
});
