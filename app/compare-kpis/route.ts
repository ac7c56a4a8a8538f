import { NextRequest, NextResponse } from 'next/server';
import { errorResponse, readJsonBody } from '@/lib/api-response';
import { logger } from '@/lib/logger';
import { compareSiteKpis } from '@/lib/sustainability/comparator';
import { parseCompareKpisInput } from '@/lib/sustainability/requests';

export const dynamic = 'force-dynamic';
export const revalidate = 0;

/**
 * Compares KPIs between two periods for a site (CompareSiteKpis tool).
 */
export async function POST(request: NextRequest) {
  try {
    const input = parseCompareKpisInput(await readJsonBody(request));
    logger.info('CompareSiteKpis', input);
    const comparison = compareSiteKpis(input.site_id, input.current_period, input.previous_period);
    return NextResponse.json(comparison, { status: 200 });
  } catch (error: unknown) {
    return errorResponse('CompareSiteKpis', error);
  }
}
