import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { LLMError } from '@/lib/errors';
import { Evaluator, verdict } from '@/lib/evaluator';
import { EVALUATION_SYSTEM_PROMPT, RATING_SYSTEM_PROMPT } from '@/lib/prompts';
import { LETTERS } from '@/types/questions';
import { FakeLLMClient, makeQuestion } from './helpers';

describe('Evaluator', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('marks an answer correct only when it matches the correct choice', async () => {
    const question = makeQuestion();
    const evaluator = new Evaluator(new FakeLLMClient([], new LLMError('transient', 'upstream down')));

    for (const letter of LETTERS) {
      const record = await evaluator.evaluate(question, letter);
      expect(record.correct).toBe(letter === 'B');
      expect(record.userChoice).toBe(letter);
      expect(record.question).toBe(question);
    }
  });

  it('appends the model explanation to the verdict', async () => {
    const client = new FakeLLMClient(['  The calcarine sulcus marks V1.  ']);
    const evaluator = new Evaluator(client);

    const record = await evaluator.evaluate(makeQuestion(), 'B');

    expect(record.feedback).toBe('Correct! The calcarine sulcus marks V1.');
    expect(client.requests[0]).toMatchObject({ systemPrompt: EVALUATION_SYSTEM_PROMPT, format: 'text' });
    expect(client.requests[0].userPrompt).toContain("Student's answer: Occipital lobe\nCorrect answer: Occipital lobe");
  });

  it('uses the stored explanation when the model is unavailable', async () => {
    const evaluator = new Evaluator(new FakeLLMClient([new LLMError('not_configured', 'no credentials')]));

    const record = await evaluator.evaluate(makeQuestion(), 'A');

    expect(record.correct).toBe(false);
    expect(record.feedback).toBe(
      'Incorrect. The correct answer was B: Occipital lobe. The primary visual cortex lies along the calcarine sulcus of the occipital lobe.'
    );
  });

  it('falls back to the bare verdict when there is no explanation at all', async () => {
    const evaluator = new Evaluator(new FakeLLMClient([''], ''));

    const record = await evaluator.evaluate(makeQuestion({ explanation: undefined }), 'C');

    expect(record.feedback).toBe('Incorrect. The correct answer was B: Occipital lobe.');
  });

  describe('rate', () => {
    const RATING = {
      question_quality_rating: 8,
      answer_correctness_rating: 10,
      question_quality_justification: 'Clear stem with plausible distractors.',
      answer_correctness_justification: 'V1 sits in the occipital lobe.',
      overall_assessment: 'Good recall question.',
      difficulty_level: 'Medium',
      suggested_improvements: 'Mention the calcarine sulcus in the stem.',
    };

    it('returns the decoded rating', async () => {
      const client = new FakeLLMClient([JSON.stringify(RATING)]);

      const rating = await new Evaluator(client).rate(makeQuestion());

      expect(rating).toEqual({ ...RATING, difficulty_level: 'medium' });
      expect(client.requests[0]).toMatchObject({ systemPrompt: RATING_SYSTEM_PROMPT, format: 'json' });
      expect(client.requests[0].userPrompt).toContain(
        'Question: Which lobe contains the primary visual cortex?\nOption A: Frontal lobe'
      );
      expect(client.requests[0].userPrompt).toContain('Correct answer: B');
    });

    it('returns null when the model call fails', async () => {
      const evaluator = new Evaluator(new FakeLLMClient([new LLMError('transient', 'upstream down')]));

      expect(await evaluator.rate(makeQuestion())).toBeNull();
      expect(console.warn).toHaveBeenCalledWith('[evaluator] Rating unavailable: upstream down');
    });

    it('returns null for a reply that is not JSON', async () => {
      const evaluator = new Evaluator(new FakeLLMClient(['The question is fine.']));

      expect(await evaluator.rate(makeQuestion())).toBeNull();
      expect(console.warn).toHaveBeenCalledWith('[evaluator] Discarding malformed rating: no JSON object found in reply');
    });

    it('returns null for a score outside 1 to 10', async () => {
      const evaluator = new Evaluator(new FakeLLMClient([JSON.stringify({ ...RATING, question_quality_rating: 11 })]));

      expect(await evaluator.rate(makeQuestion())).toBeNull();
      expect(console.warn).toHaveBeenCalledWith(
        '[evaluator] Discarding malformed rating: question_quality_rating must be an integer from 1 to 10'
      );
    });
  });
});

describe('verdict', () => {
  it('names the correct option on a wrong answer', () => {
    expect(verdict(makeQuestion(), true)).toBe('Correct!');
    expect(verdict(makeQuestion({ correctChoice: 'D' }), false)).toBe(
      'Incorrect. The correct answer was D: Parietal lobe.'
    );
  });
});
