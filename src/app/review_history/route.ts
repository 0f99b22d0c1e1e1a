import { NextRequest, NextResponse } from 'next/server';
import { errorResponse } from '@/lib/http';
import { getServices } from '@/lib/services';
import { readSessionId } from '@/lib/sessionCookie';
import type { HistoryResponse } from '@/types/database';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

/**
 * GET /review_history
 * Returns the answered questions of the current session, oldest first.
 */
export async function GET(request: NextRequest) {
  const { config, quiz } = getServices();

  try {
    const { session, history } = await quiz.reviewHistory(readSessionId(request, config.session));
    const body: HistoryResponse = { history, score: session.score, total: session.totalAnswered };
    return NextResponse.json(body);
  } catch (error) {
    return errorResponse(error, 'review_history');
  }
}
