import { cookies } from 'next/headers';
import { QuizApp, type QuizState } from '@/components/QuizApp';
import { getServices } from '@/lib/services';
import { decodeSessionCookie } from '@/lib/sessionCookie';
import { toHistoryDocument } from '@/lib/store/sessionCodec';
import { CATEGORIES, toPublicQuestion } from '@/types/questions';

export const dynamic = 'force-dynamic';

export default async function Home() {
  const { config, quiz } = getServices();
  const sessionId = decodeSessionCookie(cookies().get(config.session.cookieName)?.value, config.session.secret);
  const session = await quiz.loadSession(sessionId);

  const initialState: QuizState = {
    question: session.currentQuestion ? toPublicQuestion(session.currentQuestion) : null,
    score: session.score,
    total: session.totalAnswered,
    history: session.history.map(toHistoryDocument),
  };

  return (
    <div>
      <h1 className="text-3xl font-bold text-slate-800 mb-2">Brain Bee Practice</h1>
      <p className="text-slate-600 mb-8">
        Answer generated neuroscience questions and review your progress.
      </p>
      <QuizApp initialState={initialState} categories={[...CATEGORIES]} />
    </div>
  );
}
