import { NextRequest, NextResponse } from 'next/server';
import { errorResponse, readJsonBody } from '@/lib/api-response';
import { logger } from '@/lib/logger';
import { generateSiteKpis } from '@/lib/sustainability/kpi-generator';
import { parseGetKpisInput } from '@/lib/sustainability/requests';

export const dynamic = 'force-dynamic';
export const revalidate = 0;

/**
 * Mocked sustainability KPIs for one site and period (GetSiteKpis tool).
 */
export async function POST(request: NextRequest) {
  try {
    const input = parseGetKpisInput(await readJsonBody(request));
    logger.info('GetSiteKpis', input);
    return NextResponse.json(generateSiteKpis(input.site_id, input.period), { status: 200 });
  } catch (error: unknown) {
    return errorResponse('GetSiteKpis', error);
  }
}
