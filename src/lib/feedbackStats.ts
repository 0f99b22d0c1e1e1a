import type { DifficultyLevel, FeedbackEntry } from '@/types/database';

export interface CategoryStats {
  total: number;
  correct: number;
  accuracy: number; // 0-100
}

export interface FeedbackAnalytics {
  totalFeedback: number;
  correctAnswers: number;
  overallAccuracy: number; // 0-100
  categories: Record<string, CategoryStats>;
  ratings: RatingStats;
}

/** Averages are on the 1-10 scale, null until something has been rated. */
export interface RatingStats {
  rated: number;
  averageQuestionQuality: number | null;
  averageAnswerCorrectness: number | null;
  difficulty: Record<DifficultyLevel, number>;
}

function accuracy(correct: number, total: number): number {
  return total > 0 ? (correct / total) * 100 : 0;
}

function average(sum: number, count: number): number | null {
  return count > 0 ? Math.round((sum / count) * 100) / 100 : null;
}

function computeRatingStats(entries: FeedbackEntry[]): RatingStats {
  const difficulty: Record<DifficultyLevel, number> = { easy: 0, medium: 0, hard: 0, expert: 0 };
  let rated = 0;
  let qualitySum = 0;
  let correctnessSum = 0;

  for (const { rating } of entries) {
    if (!rating) continue;
    rated++;
    qualitySum += rating.question_quality_rating;
    correctnessSum += rating.answer_correctness_rating;
    difficulty[rating.difficulty_level]++;
  }

  return {
    rated,
    averageQuestionQuality: average(qualitySum, rated),
    averageAnswerCorrectness: average(correctnessSum, rated),
    difficulty,
  };
}

/**
 * Aggregate answer feedback overall and per category.
 * Entries without a category are counted under "Unknown".
 */
export function computeFeedbackAnalytics(entries: FeedbackEntry[]): FeedbackAnalytics {
  const categories: Record<string, CategoryStats> = {};
  let correctAnswers = 0;

  for (const entry of entries) {
    const category = entry.category || 'Unknown';
    if (!categories[category]) {
      categories[category] = { total: 0, correct: 0, accuracy: 0 };
    }

    categories[category].total++;
    if (entry.is_correct) {
      categories[category].correct++;
      correctAnswers++;
    }
  }

  for (const stats of Object.values(categories)) {
    stats.accuracy = accuracy(stats.correct, stats.total);
  }

  return {
    totalFeedback: entries.length,
    correctAnswers,
    overallAccuracy: accuracy(correctAnswers, entries.length),
    categories,
    ratings: computeRatingStats(entries),
  };
}

/**
 * Most recent entries first.
 */
export function recentFeedback(entries: FeedbackEntry[], limit = 10): FeedbackEntry[] {
  return [...entries].sort((a, b) => b.timestamp.localeCompare(a.timestamp)).slice(0, limit);
}
