import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { QuizError } from '@/lib/errors';
import { parseCategory } from '@/lib/quizService';
import { createServices, type Services } from '@/lib/services';
import { FakeBucket, FakeLLMClient, SAMPLE_REPLY, questionReply, testConfig } from './helpers';

describe('parseCategory', () => {
  it('treats empty values and "random" as any category', () => {
    expect(parseCategory(undefined)).toBeNull();
    expect(parseCategory(null)).toBeNull();
    expect(parseCategory('  ')).toBeNull();
    expect(parseCategory('Random')).toBeNull();
  });

  it('accepts known categories', () => {
    expect(parseCategory(' Neuroanatomy ')).toBe('Neuroanatomy');
  });

  it('rejects unknown categories', () => {
    expect(() => parseCategory('Astrophysics')).toThrow(QuizError);
    expect(() => parseCategory(7)).toThrow('category must be a string');
  });
});

describe('QuizService', () => {
  let bucket: FakeBucket;
  let nextId: number;

  function build(llm: FakeLLMClient): Services {
    nextId = 0;
    return createServices(testConfig(), {
      llm,
      bucket,
      now: () => new Date('2026-03-01T12:00:00.000Z'),
      newId: () => `id-${++nextId}`,
      random: () => 0,
    });
  }

  beforeEach(() => {
    bucket = new FakeBucket();
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('hides the correct answer of a new question', async () => {
    const { quiz } = build(new FakeLLMClient([questionReply()]));

    const { session, question, save } = await quiz.newQuestion(null, null);

    expect(question).toEqual({
      question: SAMPLE_REPLY.question,
      choices: SAMPLE_REPLY.choices,
      category: SAMPLE_REPLY.category,
    });
    expect(session.sessionId).toBe('id-1');
    expect(session.currentQuestion?.correctChoice).toBe('B');
    expect(save.persistedRemotely).toBe(true);
  });

  it('grades an answer and updates the counters', async () => {
    const { quiz } = build(new FakeLLMClient([questionReply(), 'Acetylcholine acts on nicotinic receptors.']));
    const { session } = await quiz.newQuestion(null, 'Motor system');

    const { session: updated, record } = await quiz.submitAnswer(session.sessionId, ' b ');

    expect(record.correct).toBe(true);
    expect(record.feedback).toBe('Correct! Acetylcholine acts on nicotinic receptors.');
    expect(updated.score).toBe(1);
    expect(updated.totalAnswered).toBe(1);
    expect(updated.currentQuestion).toBeNull();
    expect(updated.history).toHaveLength(1);
  });

  it('records a feedback entry for every answer', async () => {
    const services = build(new FakeLLMClient([questionReply(), '']));
    const { session } = await services.quiz.newQuestion(null, null);

    await services.quiz.submitAnswer(session.sessionId, 'C');

    expect(await services.store.feedbackEntries()).toEqual([
      {
        question: SAMPLE_REPLY.question,
        user_answer: 'C',
        correct_answer: 'B',
        evaluation: `Incorrect. The correct answer was B: Acetylcholine. ${SAMPLE_REPLY.explanation}`,
        category: SAMPLE_REPLY.category,
        is_correct: false,
        timestamp: '2026-03-01T12:00:00.000Z',
        feedback_id: 'id-2',
        rating: null,
      },
    ]);
  });

  it('stores the model rating with the feedback entry', async () => {
    const rating = {
      question_quality_rating: 9,
      answer_correctness_rating: 10,
      question_quality_justification: 'Unambiguous.',
      answer_correctness_justification: 'Acetylcholine is right.',
      overall_assessment: 'Strong question.',
      difficulty_level: 'easy',
      suggested_improvements: '',
    };
    const services = build(new FakeLLMClient([questionReply(), 'Explained.', JSON.stringify(rating)]));
    const { session } = await services.quiz.newQuestion(null, null);

    await services.quiz.submitAnswer(session.sessionId, 'B');

    const [entry] = await services.store.feedbackEntries();
    expect(entry.rating).toEqual(rating);
    expect(entry.is_correct).toBe(true);
  });

  it('rejects an answer when no question is active', async () => {
    const { quiz } = build(new FakeLLMClient());

    await expect(quiz.submitAnswer(null, 'A')).rejects.toThrow('No active question. Request a new question first.');
  });

  it('rejects a second answer to the same question without touching the counters', async () => {
    const { quiz } = build(new FakeLLMClient([questionReply(), 'Explained.']));
    const { session } = await quiz.newQuestion(null, null);
    await quiz.submitAnswer(session.sessionId, 'B');

    await expect(quiz.submitAnswer(session.sessionId, 'B')).rejects.toBeInstanceOf(QuizError);

    const reloaded = await quiz.loadSession(session.sessionId);
    expect(reloaded.score).toBe(1);
    expect(reloaded.totalAnswered).toBe(1);
  });

  it('rejects letters outside A to D', async () => {
    const { quiz } = build(new FakeLLMClient([questionReply()]));
    const { session } = await quiz.newQuestion(null, null);

    await expect(quiz.submitAnswer(session.sessionId, 'E')).rejects.toThrow('answer must be one of A, B, C, D');
    await expect(quiz.submitAnswer(session.sessionId, undefined)).rejects.toThrow('answer must be one of A, B, C, D');
  });

  it('accumulates history on the local store while the remote is unreachable', async () => {
    bucket.failAll(new Error('fetch failed'));
    const { quiz } = build(new FakeLLMClient([], questionReply()));

    let sessionId: string | null = null;
    for (const answer of ['B', 'A', 'B']) {
      const { session } = await quiz.newQuestion(sessionId, null);
      sessionId = session.sessionId;
      const { save } = await quiz.submitAnswer(sessionId, answer);
      expect(save.persistedRemotely).toBe(false);
    }

    const { session, history } = await quiz.reviewHistory(sessionId);
    expect(history.map((entry) => entry.user_answer)).toEqual(['B', 'A', 'B']);
    expect(session.score).toBe(2);
    expect(session.totalAnswered).toBe(3);
  });
});
