import { NextRequest, NextResponse } from 'next/server';
import { QuizError } from '@/lib/errors';
import { errorResponse, readFields } from '@/lib/http';
import { getServices } from '@/lib/services';

export const runtime = 'nodejs';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * POST /cleanup
 * Deletes sessions not updated within the retention window.
 *
 * Request fields (form data or JSON):
 * - older_than_days?: number - Overrides the configured retention window
 */
export async function POST(request: NextRequest) {
  const { config, store } = getServices();

  try {
    const fields = await readFields(request);
    let days = config.session.retentionDays;

    if (fields.older_than_days !== undefined && fields.older_than_days !== '') {
      const parsed = Number(fields.older_than_days);
      if (!Number.isFinite(parsed) || parsed < 0) {
        throw new QuizError('older_than_days must be a non-negative number');
      }
      days = parsed;
    }

    const result = await store.cleanup(days * DAY_MS);
    return NextResponse.json({ deleted: result.deleted, localDeleted: result.localDeleted });
  } catch (error) {
    return errorResponse(error, 'cleanup');
  }
}
