import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { LLMError } from '@/lib/errors';
import { ContentGenerator } from '@/lib/generator';
import { GENERATION_SYSTEM_PROMPT } from '@/lib/prompts';
import { clearFallbackCache, getFallbackQuestions } from '@/lib/questions';
import { CATEGORIES, LETTERS } from '@/types/questions';
import { FakeLLMClient, SAMPLE_REPLY, questionReply } from './helpers';

const MISSING_NOTES = path.join(os.tmpdir(), 'neuro-quiz-no-notes');

function expectWellFormed(question: { choices: string[]; correctChoice: string }) {
  expect(question.choices).toHaveLength(4);
  question.choices.forEach((choice, i) => {
    expect(choice.startsWith(`Option ${LETTERS[i]}:`)).toBe(true);
  });
  expect(LETTERS).toContain(question.correctChoice);
}

describe('ContentGenerator', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    clearFallbackCache();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the decoded question from a valid reply', async () => {
    const client = new FakeLLMClient([questionReply()]);
    const generator = new ContentGenerator(client, { notesDir: MISSING_NOTES });

    const question = await generator.generate('Neural communication (electrical and chemical)');

    expect(question).toEqual({
      text: SAMPLE_REPLY.question,
      choices: SAMPLE_REPLY.choices,
      correctChoice: 'B',
      explanation: SAMPLE_REPLY.explanation,
      category: 'Neural communication (electrical and chemical)',
    });
    expect(client.requests).toHaveLength(1);
    expect(client.requests[0].systemPrompt).toBe(GENERATION_SYSTEM_PROMPT);
    expect(client.requests[0].format).toBe('json');
  });

  it.each(CATEGORIES.map((category) => [category]))('yields a well-formed question for %s', async (category) => {
    const client = new FakeLLMClient([questionReply({ category: undefined })]);
    const generator = new ContentGenerator(client, { notesDir: MISSING_NOTES });

    const question = await generator.generate(category);

    expectWellFormed(question);
    expect(question.category).toBe(category);
    expect(client.requests[0].userPrompt).toContain(`about ${category}.`);
  });

  it('tolerates markdown fences around the JSON', async () => {
    const client = new FakeLLMClient(['```json\n' + questionReply() + '\n```']);
    const generator = new ContentGenerator(client, { notesDir: MISSING_NOTES });

    const question = await generator.generate('Motor system');

    expect(question.text).toBe(SAMPLE_REPLY.question);
  });

  it('retries once with the rejection reason after a malformed reply', async () => {
    const client = new FakeLLMClient([
      questionReply({ choices: ['Option A: Dopamine', 'Option B: Acetylcholine', 'Option C: Serotonin'] }),
      questionReply(),
    ]);
    const generator = new ContentGenerator(client, { notesDir: MISSING_NOTES });

    const question = await generator.generate('Motor system');

    expect(question.text).toBe(SAMPLE_REPLY.question);
    expect(client.requests).toHaveLength(2);
    expect(client.requests[1].userPrompt).toContain('Your previous reply was rejected: expected 4 choices, found 3.');
  });

  it('falls back to the static bank after two malformed replies', async () => {
    const client = new FakeLLMClient([], 'not json at all');
    const generator = new ContentGenerator(client, { notesDir: MISSING_NOTES, random: () => 0 });

    const question = await generator.generate('Neuroanatomy');

    expect(client.requests).toHaveLength(2);
    expect(question.category).toBe('Neuroanatomy');
    expect(question.text).toBe(
      'MRI of a patient with face blindness but normal object recognition shows damage in the right occipitotemporal cortex. Which region is most likely affected?'
    );
    expect(question.correctChoice).toBe('B');
  });

  it('never raises when the model always fails', async () => {
    const client = new FakeLLMClient([], new LLMError('transient', 'upstream 503'));
    const generator = new ContentGenerator(client, { notesDir: MISSING_NOTES });

    for (const category of [...CATEGORIES, null]) {
      const question = await generator.generate(category);
      expectWellFormed(question);
    }
  });

  it('skips the retry when credentials are rejected', async () => {
    const client = new FakeLLMClient([], new LLMError('auth', 'invalid api key'));
    const generator = new ContentGenerator(client, { notesDir: MISSING_NOTES, random: () => 0 });

    const question = await generator.generate('Sensory system');

    expect(client.requests).toHaveLength(1);
    expect(question.category).toBe('Sensory system');
    expect(question.correctChoice).toBe('A');
  });

  it('retries once after a transient failure', async () => {
    const client = new FakeLLMClient([new LLMError('transient', 'timed out'), questionReply()]);
    const generator = new ContentGenerator(client, { notesDir: MISSING_NOTES });

    const question = await generator.generate('Higher cognition');

    expect(client.requests).toHaveLength(2);
    expect(question.text).toBe(SAMPLE_REPLY.question);
    expect(client.requests[1].userPrompt).not.toContain('previous reply was rejected');
  });

  it('picks a category at random for "random" or unknown input', async () => {
    const generator = new ContentGenerator(new FakeLLMClient(), { random: () => 0.99 });

    expect(generator.resolveCategory('random')).toBe('Neurology (Diseases of the Brain)');
    expect(generator.resolveCategory(null)).toBe('Neurology (Diseases of the Brain)');
    expect(generator.resolveCategory('Motor system')).toBe('Motor system');
  });

  it('includes reference notes in the prompt when a notes file exists', async () => {
    const notesDir = fs.mkdtempSync(path.join(os.tmpdir(), 'neuro-quiz-notes-'));
    fs.writeFileSync(path.join(notesDir, 'Motor system.txt'), 'The cerebellum compares intended and actual movement.');
    const client = new FakeLLMClient([questionReply()]);
    const generator = new ContentGenerator(client, { notesDir });

    await generator.generate('Motor system');

    expect(client.requests[0].userPrompt).toContain(
      'Base the question on this reference material:\nThe cerebellum compares intended and actual movement.'
    );
    fs.rmSync(notesDir, { recursive: true, force: true });
  });
});

describe('fallback bank', () => {
  it('holds at least one valid question per category', () => {
    clearFallbackCache();
    const questions = getFallbackQuestions();

    for (const category of CATEGORIES) {
      const inCategory = questions.filter((q) => q.category === category);
      expect(inCategory.length).toBeGreaterThan(0);
      inCategory.forEach(expectWellFormed);
    }
  });
});
