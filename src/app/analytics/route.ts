import { NextResponse } from 'next/server';
import { computeFeedbackAnalytics, recentFeedback } from '@/lib/feedbackStats';
import { errorResponse } from '@/lib/http';
import { getServices } from '@/lib/services';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

/**
 * GET /analytics
 * Answer accuracy and question ratings across all sessions,
 * plus the ten most recent feedback entries.
 */
export async function GET() {
  try {
    const entries = await getServices().store.feedbackEntries();
    return NextResponse.json({
      ...computeFeedbackAnalytics(entries),
      recent: recentFeedback(entries, 10),
    });
  } catch (error) {
    return errorResponse(error, 'analytics');
  }
}
