/**
 * Daily settlement for one UTC day: GET ?date=YYYY-MM-DD (defaults to today)
 *
 * @module api/settlement/daily
 */

import { NextResponse } from 'next/server';
import { getSettlementServices } from '@/domains/container';
import { withApiHandler } from '@/domains/shared/errors/handler';

export const GET = withApiHandler(async (req) => {
  const date = req.nextUrl.searchParams.get('date') ?? new Date().toISOString().slice(0, 10);
  const settlement = getSettlementServices().reports.getDailySettlement(date);
  return NextResponse.json({ settlement });
});
