import { LETTERS, isLetter, type Question } from '@/types/questions';
import type { QuestionDocument } from '@/types/database';

export type DecodeResult =
  | { ok: true; question: Question }
  | { ok: false; error: string };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function decodeChoices(value: unknown): string[] | string {
  if (!Array.isArray(value)) {
    return 'choices must be an array';
  }
  if (value.length !== LETTERS.length) {
    return `expected 4 choices, found ${value.length}`;
  }

  const choices: string[] = [];
  for (let i = 0; i < LETTERS.length; i++) {
    const choice: unknown = value[i];
    const prefix = `Option ${LETTERS[i]}:`;
    if (typeof choice !== 'string' || !choice.trim().startsWith(prefix)) {
      return `choice ${i + 1} must start with "${prefix}"`;
    }
    const text = choice.trim().slice(prefix.length).trim();
    if (!text) {
      return `choice ${prefix} has no text`;
    }
    choices.push(`${prefix} ${text}`);
  }
  return choices;
}

/**
 * Validates a `{ question, choices, correct_answer, explanation, category }`
 * object. `defaultCategory` is used when the payload names none.
 */
export function decodeQuestion(value: unknown, defaultCategory?: string): DecodeResult {
  if (!isRecord(value)) {
    return { ok: false, error: 'expected a JSON object' };
  }

  const text = value.question;
  if (typeof text !== 'string' || !text.trim()) {
    return { ok: false, error: 'question text is missing' };
  }

  const choices = decodeChoices(value.choices);
  if (typeof choices === 'string') {
    return { ok: false, error: choices };
  }

  const correct = typeof value.correct_answer === 'string' ? value.correct_answer.trim() : value.correct_answer;
  if (!isLetter(correct)) {
    return { ok: false, error: `correct_answer must be one of ${LETTERS.join(', ')}` };
  }

  if (value.explanation !== undefined && typeof value.explanation !== 'string') {
    return { ok: false, error: 'explanation must be a string' };
  }
  if (value.category !== undefined && value.category !== null && typeof value.category !== 'string') {
    return { ok: false, error: 'category must be a string' };
  }

  const explanation = typeof value.explanation === 'string' ? value.explanation.trim() : undefined;
  const category = (typeof value.category === 'string' && value.category.trim()) || defaultCategory;

  return {
    ok: true,
    question: {
      text: text.trim(),
      choices,
      correctChoice: correct,
      ...(explanation ? { explanation } : {}),
      ...(category ? { category } : {}),
    },
  };
}

export type JsonReplyResult =
  | { ok: true; value: unknown }
  | { ok: false; error: string };

/**
 * Extracts the JSON object from a model reply. Markdown code fences and
 * surrounding prose are tolerated.
 */
export function parseJsonReply(content: string | null): JsonReplyResult {
  if (!content || !content.trim()) {
    return { ok: false, error: 'empty reply' };
  }

  const stripped = content.replace(/```json\s*/g, '').replace(/```\s*/g, '');
  const jsonMatch = stripped.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    return { ok: false, error: 'no JSON object found in reply' };
  }

  try {
    return { ok: true, value: JSON.parse(jsonMatch[0]) };
  } catch (error) {
    return { ok: false, error: `invalid JSON: ${error instanceof Error ? error.message : String(error)}` };
  }
}

export function parseQuestionReply(content: string | null, defaultCategory?: string): DecodeResult {
  const reply = parseJsonReply(content);
  if (!reply.ok) {
    return reply;
  }
  return decodeQuestion(reply.value, defaultCategory);
}

export function toQuestionDocument(question: Question): QuestionDocument {
  return {
    question: question.text,
    choices: [...question.choices],
    correct_answer: question.correctChoice,
    ...(question.explanation !== undefined ? { explanation: question.explanation } : {}),
    ...(question.category !== undefined ? { category: question.category } : {}),
  };
}
