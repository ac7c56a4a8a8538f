import { NextRequest, NextResponse } from 'next/server';
import { errorResponse, NO_STORE_HEADERS } from '@/lib/api-response';
import { logger } from '@/lib/logger';
import { getServiceConfig } from '@/lib/service-config';
import { buildToolRegistry } from '@/lib/sustainability/tool-registry';

export const dynamic = 'force-dynamic';
export const revalidate = 0;

export async function GET(request: NextRequest) {
  try {
    const baseUrl = getServiceConfig().publicBaseUrl ?? request.nextUrl.origin;
    logger.debug('Tool registry requested', { baseUrl });
    return NextResponse.json(buildToolRegistry(baseUrl), { status: 200, headers: NO_STORE_HEADERS });
  } catch (error: unknown) {
    return errorResponse('ToolRegistry', error);
  }
}
