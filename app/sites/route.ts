import { NextResponse } from 'next/server';
import { errorResponse } from '@/lib/api-response';
import { logger } from '@/lib/logger';
import { listSites } from '@/lib/sustainability/sites';

export const dynamic = 'force-dynamic';
export const revalidate = 0;

/**
 * Mocked site locations, used by agents to look up which sites exist before
 * asking for their KPIs.
 */
export async function GET() {
  try {
    const sites = listSites();
    logger.info('ListSites', { count: sites.length });
    return NextResponse.json(sites, { status: 200 });
  } catch (error: unknown) {
    return errorResponse('ListSites', error);
  }
}
