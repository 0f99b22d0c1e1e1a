import { NextRequest, NextResponse } from 'next/server';
import { errorResponse, readFields } from '@/lib/http';
import { parseCategory } from '@/lib/quizService';
import { getServices } from '@/lib/services';
import { attachSessionCookie, readSessionId } from '@/lib/sessionCookie';

export const runtime = 'nodejs';

/**
 * POST /new_question
 * Generates a question and makes it the session's active question.
 *
 * Request fields (form data or JSON):
 * - category?: string - One of the quiz categories, or "random"
 */
export async function POST(request: NextRequest) {
  const { config, quiz } = getServices();

  try {
    const fields = await readFields(request);
    const category = parseCategory(fields.category);

    const { session, question } = await quiz.newQuestion(readSessionId(request, config.session), category);

    return attachSessionCookie(NextResponse.json(question), session.sessionId, config.session);
  } catch (error) {
    return errorResponse(error, 'new_question');
  }
}
