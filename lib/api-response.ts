/**
 * @fileoverview Shared route-handler helpers: JSON body reading and error
 * responses.
 */

import { NextRequest, NextResponse } from 'next/server';
import { logger } from '@/lib/logger';
import { RequestValidationError } from '@/lib/sustainability/requests';

export const NO_STORE_HEADERS = { 'Cache-Control': 'no-store, no-cache, must-revalidate, max-age=0' };

export async function readJsonBody(request: NextRequest): Promise<unknown> {
  const text = await request.text();
  if (!text.trim()) {
    throw new RequestValidationError([{ field: 'body', message: 'is required' }]);
  }
  try {
    return JSON.parse(text);
  } catch {
    throw new RequestValidationError([{ field: 'body', message: 'must be valid JSON' }]);
  }
}

export function errorResponse(route: string, error: unknown): NextResponse {
  if (error instanceof RequestValidationError) {
    logger.warn(`${route} rejected request`, { issues: error.issues });
    return NextResponse.json(
      { error: 'Invalid request body', issues: error.issues },
      { status: 400, headers: NO_STORE_HEADERS },
    );
  }

  logger.error(`${route} failed`, error);
  const message = error instanceof Error ? error.message : 'Unknown error';
  return NextResponse.json({ error: message }, { status: 500, headers: NO_STORE_HEADERS });
}
