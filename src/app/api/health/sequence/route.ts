/**
 * Sequence generator health
 *
 * 200 for UP / DEGRADED, 503 for DOWN. Serves the periodic probe's report
 * while it is younger than one probe interval.
 *
 * @module api/health/sequence
 */

import { NextResponse } from 'next/server';
import { getSettlementServices } from '@/domains/container';
import { withApiHandler } from '@/domains/shared/errors/handler';
import { getEnv } from '@/lib/config/env';

export const dynamic = 'force-dynamic';

export const GET = withApiHandler(async () => {
  const report = await getSettlementServices().sequenceHealth.getRecentReport(
    getEnv().SEQUENCE_HEALTH_INTERVAL_MS
  );
  return NextResponse.json(report, {
    status: report.status === 'DOWN' ? 503 : 200,
    headers: { 'Cache-Control': 'no-store' },
  });
});
