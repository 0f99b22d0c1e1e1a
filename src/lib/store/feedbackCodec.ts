import { isRecord } from '@/lib/questionCodec';
import { decodeRating } from '@/lib/ratingCodec';
import type { FeedbackEntry } from '@/types/database';

function optionalString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

/**
 * Decode a stored feedback document. Documents written before answers were
 * rated, or with an unreadable rating, get a null rating.
 */
export function decodeFeedbackEntry(value: unknown): FeedbackEntry | null {
  if (!isRecord(value)) {
    return null;
  }

  const { question, user_answer: userAnswer, correct_answer: correctAnswer } = value;
  const { is_correct: isCorrect, timestamp, feedback_id: feedbackId } = value;
  if (
    typeof question !== 'string' ||
    typeof userAnswer !== 'string' ||
    typeof correctAnswer !== 'string' ||
    typeof isCorrect !== 'boolean' ||
    typeof timestamp !== 'string' ||
    typeof feedbackId !== 'string'
  ) {
    return null;
  }

  const rating = decodeRating(value.rating);
  return {
    question,
    user_answer: userAnswer,
    correct_answer: correctAnswer,
    evaluation: optionalString(value.evaluation),
    category: optionalString(value.category),
    is_correct: isCorrect,
    timestamp,
    feedback_id: feedbackId,
    rating: rating.ok ? rating.rating : null,
  };
}

export function parseFeedbackEntry(json: string): FeedbackEntry | null {
  try {
    return decodeFeedbackEntry(JSON.parse(json));
  } catch {
    return null;
  }
}
