import { NextResponse } from 'next/server';
import { errorResponse } from '@/lib/http';
import { getServices } from '@/lib/services';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

/**
 * GET /storage_status
 * Reports which storage backend is serving sessions and how much it holds.
 */
export async function GET() {
  try {
    const status = await getServices().store.status();
    return NextResponse.json(status);
  } catch (error) {
    return errorResponse(error, 'storage_status');
  }
}
