import { isRecord, parseJsonReply } from '@/lib/questionCodec';
import { DIFFICULTY_LEVELS, type AnswerRating, type DifficultyLevel } from '@/types/database';

export type RatingDecodeResult =
  | { ok: true; rating: AnswerRating }
  | { ok: false; error: string };

const TEXT_FIELDS = [
  'question_quality_justification',
  'answer_correctness_justification',
  'overall_assessment',
  'suggested_improvements',
] as const;

function isScore(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= 10;
}

function isDifficulty(value: string): value is DifficultyLevel {
  return (DIFFICULTY_LEVELS as readonly string[]).includes(value);
}

/**
 * Validates a rating object. Both scores must be integers from 1 to 10;
 * the free-text fields may be omitted.
 */
export function decodeRating(value: unknown): RatingDecodeResult {
  if (!isRecord(value)) {
    return { ok: false, error: 'expected a JSON object' };
  }

  const { question_quality_rating: quality, answer_correctness_rating: correctness } = value;
  if (!isScore(quality)) {
    return { ok: false, error: 'question_quality_rating must be an integer from 1 to 10' };
  }
  if (!isScore(correctness)) {
    return { ok: false, error: 'answer_correctness_rating must be an integer from 1 to 10' };
  }

  const difficulty = typeof value.difficulty_level === 'string' ? value.difficulty_level.trim().toLowerCase() : '';
  if (!isDifficulty(difficulty)) {
    return { ok: false, error: `difficulty_level must be one of ${DIFFICULTY_LEVELS.join(', ')}` };
  }

  const text: Record<(typeof TEXT_FIELDS)[number], string> = {
    question_quality_justification: '',
    answer_correctness_justification: '',
    overall_assessment: '',
    suggested_improvements: '',
  };
  for (const field of TEXT_FIELDS) {
    const fieldValue = value[field];
    if (fieldValue === undefined || fieldValue === null) {
      continue;
    }
    if (typeof fieldValue !== 'string') {
      return { ok: false, error: `${field} must be a string` };
    }
    text[field] = fieldValue.trim();
  }

  return {
    ok: true,
    rating: {
      question_quality_rating: quality,
      answer_correctness_rating: correctness,
      difficulty_level: difficulty,
      ...text,
    },
  };
}

export function parseRatingReply(content: string | null): RatingDecodeResult {
  const reply = parseJsonReply(content);
  if (!reply.ok) {
    return reply;
  }
  return decodeRating(reply.value);
}
