import { decodeQuestion, isRecord, toQuestionDocument } from '@/lib/questionCodec';
import { isLetter, type Question } from '@/types/questions';
import type { AnswerRecord, HistoryDocument, Session, SessionDocument } from '@/types/database';

const EPOCH = new Date(0).toISOString();

function isCount(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

export function toHistoryDocument(record: AnswerRecord): HistoryDocument {
  return {
    question: record.question.text,
    choices: [...record.question.choices],
    user_answer: record.userChoice,
    correct_answer: record.question.correctChoice,
    feedback: record.feedback,
    is_correct: record.correct,
    ...(record.question.explanation !== undefined ? { explanation: record.question.explanation } : {}),
    ...(record.question.category !== undefined ? { category: record.question.category } : {}),
  };
}

export function toSessionDocument(session: Session): SessionDocument {
  return {
    session_id: session.sessionId,
    history: session.history.map(toHistoryDocument),
    current_question: session.currentQuestion ? toQuestionDocument(session.currentQuestion) : null,
    score: session.score,
    total_questions: session.totalAnswered,
    updated_at: session.updatedAt,
  };
}

function decodeHistoryEntry(value: unknown): AnswerRecord | null {
  if (!isRecord(value)) {
    return null;
  }

  const question = decodeQuestion({
    question: value.question,
    choices: value.choices,
    correct_answer: value.correct_answer,
    explanation: value.explanation,
    category: value.category,
  });
  const { user_answer: userChoice, feedback, is_correct: isCorrect } = value;
  if (!question.ok || !isLetter(userChoice) || typeof feedback !== 'string') {
    return null;
  }

  return {
    question: question.question,
    userChoice,
    correct: typeof isCorrect === 'boolean' ? isCorrect : userChoice === question.question.correctChoice,
    feedback,
  };
}

/**
 * Strictly decode a stored session document. Anything that does not have
 * the expected shape or breaks the counter invariants yields null.
 */
export function fromSessionDocument(value: unknown): Session | null {
  if (!isRecord(value)) {
    return null;
  }

  const { session_id: sessionId, score, total_questions: totalAnswered } = value;
  if (typeof sessionId !== 'string' || !sessionId || !isCount(score) || !isCount(totalAnswered)) {
    return null;
  }
  if (!Array.isArray(value.history) || score > totalAnswered || value.history.length > totalAnswered) {
    return null;
  }

  const history: AnswerRecord[] = [];
  for (const entry of value.history) {
    const record = decodeHistoryEntry(entry);
    if (!record) {
      return null;
    }
    history.push(record);
  }

  let currentQuestion: Question | null = null;
  if (value.current_question !== null && value.current_question !== undefined) {
    const decoded = decodeQuestion(value.current_question);
    if (!decoded.ok) {
      return null;
    }
    currentQuestion = decoded.question;
  }

  return {
    sessionId,
    history,
    currentQuestion,
    score,
    totalAnswered,
    updatedAt: typeof value.updated_at === 'string' ? value.updated_at : EPOCH,
  };
}

export function serializeSession(session: Session): string {
  return JSON.stringify(toSessionDocument(session));
}

export function parseSession(json: string): Session | null {
  try {
    return fromSessionDocument(JSON.parse(json));
  } catch {
    return null;
  }
}

export interface BoundedSession {
  session: Session;
  json: string;
  truncated: boolean;
}

/**
 * Keep the serialized session under `maxBytes` by dropping the oldest
 * history entries, retaining the last `keep`. Counters are untouched.
 */
export function boundSession(session: Session, maxBytes: number, keep: number): BoundedSession {
  const json = serializeSession(session);
  if (Buffer.byteLength(json, 'utf-8') <= maxBytes) {
    return { session, json, truncated: false };
  }

  const history = keep > 0 ? session.history.slice(-keep) : [];
  const bounded: Session = { ...session, history };
  const boundedJson = serializeSession(bounded);

  if (Buffer.byteLength(boundedJson, 'utf-8') > maxBytes) {
    console.warn(`[store] Session ${session.sessionId} is still over ${maxBytes} bytes after truncation`);
  }

  return {
    session: bounded,
    json: boundedJson,
    truncated: history.length < session.history.length,
  };
}
