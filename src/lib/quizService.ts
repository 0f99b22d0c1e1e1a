import { randomUUID } from 'crypto';
import { QuizError, extractErrorMessage } from '@/lib/errors';
import type { Evaluator } from '@/lib/evaluator';
import type { ContentGenerator } from '@/lib/generator';
import type { ResilientStore } from '@/lib/store/resilientStore';
import { toHistoryDocument } from '@/lib/store/sessionCodec';
import { CATEGORIES, LETTERS, isCategory, isLetter, toPublicQuestion, type PublicQuestion } from '@/types/questions';
import type { AnswerRecord, FeedbackEntry, HistoryDocument, SaveResult, Session } from '@/types/database';

export interface NewQuestionResult {
  session: Session;
  question: PublicQuestion;
  save: SaveResult;
}

export interface SubmitAnswerResult {
  session: Session;
  record: AnswerRecord;
  save: SaveResult;
}

export interface HistoryResult {
  session: Session;
  history: HistoryDocument[];
}

export interface QuizServiceOptions {
  now?: () => Date;
  newId?: () => string;
}

/**
 * Parse the optional category field of a new-question request.
 * Empty values and "random" mean any category.
 */
export function parseCategory(value: unknown): string | null {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== 'string') {
    throw new QuizError('category must be a string');
  }

  const category = value.trim();
  if (!category || category.toLowerCase() === 'random') {
    return null;
  }
  if (!isCategory(category)) {
    throw new QuizError(`Unknown category "${category}". Expected one of: ${CATEGORIES.join(', ')}`);
  }
  return category;
}

/**
 * The quiz flow behind the HTTP handlers: one question at a time per
 * session, graded and appended to the session's history.
 */
export class QuizService {
  private readonly generator: ContentGenerator;
  private readonly evaluator: Evaluator;
  private readonly store: ResilientStore;
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(
    generator: ContentGenerator,
    evaluator: Evaluator,
    store: ResilientStore,
    options: QuizServiceOptions = {}
  ) {
    this.generator = generator;
    this.evaluator = evaluator;
    this.store = store;
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? randomUUID;
  }

  loadSession(sessionId: string | null): Promise<Session> {
    return this.store.load(sessionId);
  }

  async newQuestion(sessionId: string | null, category: string | null): Promise<NewQuestionResult> {
    const session = await this.store.load(sessionId);
    const question = await this.generator.generate(category);

    const updated: Session = { ...session, currentQuestion: question };
    const save = await this.store.save(updated);

    return { session: updated, question: toPublicQuestion(question), save };
  }

  /**
   * Grade `answer` against the session's active question. A session with no
   * active question (never asked, or already answered) is a client error and
   * leaves the counters untouched.
   */
  async submitAnswer(sessionId: string | null, answer: unknown): Promise<SubmitAnswerResult> {
    const letter = typeof answer === 'string' ? answer.trim().toUpperCase() : '';
    if (!isLetter(letter)) {
      throw new QuizError(`answer must be one of ${LETTERS.join(', ')}`);
    }

    const session = await this.store.load(sessionId);
    const question = session.currentQuestion;
    if (!question) {
      throw new QuizError('No active question. Request a new question first.');
    }

    const record = await this.evaluator.evaluate(question, letter);

    const updated: Session = {
      ...session,
      history: [...session.history, record],
      currentQuestion: null,
      score: session.score + (record.correct ? 1 : 0),
      totalAnswered: session.totalAnswered + 1,
    };
    const save = await this.store.save(updated);

    await this.recordFeedback(record);

    return { session: updated, record, save };
  }

  async reviewHistory(sessionId: string | null): Promise<HistoryResult> {
    const session = await this.store.load(sessionId);
    return { session, history: session.history.map(toHistoryDocument) };
  }

  private async recordFeedback(record: AnswerRecord): Promise<void> {
    const rating = await this.evaluator.rate(record.question);
    const entry: FeedbackEntry = {
      question: record.question.text,
      user_answer: record.userChoice,
      correct_answer: record.question.correctChoice,
      evaluation: record.feedback,
      category: record.question.category ?? null,
      is_correct: record.correct,
      timestamp: this.now().toISOString(),
      feedback_id: this.newId(),
      rating,
    };

    try {
      await this.store.recordFeedback(entry);
    } catch (error) {
      console.warn(`[quiz] Feedback entry not recorded: ${extractErrorMessage(error)}`);
    }
  }
}
