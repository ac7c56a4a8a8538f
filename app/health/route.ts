import { NextResponse } from 'next/server';
import { NO_STORE_HEADERS } from '@/lib/api-response';

export const dynamic = 'force-dynamic';
export const revalidate = 0;

export async function GET() {
  return NextResponse.json({ status: 'ok' }, { status: 200, headers: NO_STORE_HEADERS });
}
