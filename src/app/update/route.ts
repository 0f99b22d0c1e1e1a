import { NextRequest, NextResponse } from 'next/server';
import { errorResponse, readFields } from '@/lib/http';
import { getServices } from '@/lib/services';
import { attachSessionCookie, readSessionId } from '@/lib/sessionCookie';
import type { AnswerResponse } from '@/types/database';

export const runtime = 'nodejs';

/**
 * POST /update
 * Submits an answer to the session's active question.
 *
 * Request fields (form data or JSON):
 * - answer: "A" | "B" | "C" | "D"
 */
export async function POST(request: NextRequest) {
  const { config, quiz } = getServices();

  try {
    const fields = await readFields(request);
    const { session, record } = await quiz.submitAnswer(readSessionId(request, config.session), fields.answer);

    const body: AnswerResponse = {
      question: record.question.text,
      choices: record.question.choices,
      feedback: record.feedback,
      correct: record.correct,
      correct_answer: record.question.correctChoice,
      score: session.score,
      total: session.totalAnswered,
    };
    return attachSessionCookie(NextResponse.json(body), session.sessionId, config.session);
  } catch (error) {
    return errorResponse(error, 'update');
  }
}
