/**
 * Types for session and feedback records
 */

import type { Letter, Question } from './questions';

/** One answered question in a session's history */
export interface AnswerRecord {
  /** Snapshot of the question as it was asked */
  question: Question;
  userChoice: Letter;
  correct: boolean;
  feedback: string;
}

/** Per-client quiz progress, keyed by an opaque token */
export interface Session {
  sessionId: string;
  /** Oldest first; may be truncated, counters never are */
  history: AnswerRecord[];
  currentQuestion: Question | null;
  score: number;
  totalAnswered: number;
  updatedAt: string;
}

export const DIFFICULTY_LEVELS = ['easy', 'medium', 'hard', 'expert'] as const;

export type DifficultyLevel = (typeof DIFFICULTY_LEVELS)[number];

/** Model assessment of an asked question, stored with its feedback entry */
export interface AnswerRating {
  /** 1-10 */
  question_quality_rating: number;
  /** 1-10, how sound the keyed answer is */
  answer_correctness_rating: number;
  question_quality_justification: string;
  answer_correctness_justification: string;
  overall_assessment: string;
  difficulty_level: DifficultyLevel;
  suggested_improvements: string;
}

/** Answer record persisted for aggregate analytics */
export interface FeedbackEntry {
  question: string;
  user_answer: string;
  correct_answer: string;
  evaluation: string | null;
  category: string | null;
  is_correct: boolean;
  timestamp: string;
  feedback_id: string;
  /** null when the question could not be rated */
  rating: AnswerRating | null;
}

/** Outcome of saving a session */
export interface SaveResult {
  persistedRemotely: boolean;
  truncated: boolean;
}

/** History entry as stored in a session document */
export interface HistoryDocument {
  question: string;
  choices: string[];
  user_answer: string;
  correct_answer: string;
  feedback: string;
  is_correct: boolean;
  explanation?: string;
  category?: string;
}

export interface QuestionDocument {
  question: string;
  choices: string[];
  correct_answer: string;
  explanation?: string;
  category?: string;
}

/** Session as stored in the remote bucket and the local database */
export interface SessionDocument {
  session_id: string;
  history: HistoryDocument[];
  current_question: QuestionDocument | null;
  score: number;
  total_questions: number;
  updated_at: string;
}

/** Diagnostic view of both storage legs */
export interface StorageStatus {
  sessions: number;
  feedback: number;
  backend: 'remote' | 'local';
  remoteConfigured: boolean;
  remoteAvailable: boolean;
  localSessions: number;
  localFeedback: number;
}

/** Body of a POST /update response */
export interface AnswerResponse {
  question: string;
  choices: string[];
  feedback: string;
  correct: boolean;
  correct_answer: string;
  score: number;
  total: number;
}

/** Body of a GET /review_history response */
export interface HistoryResponse {
  history: HistoryDocument[];
  score: number;
  total: number;
}
