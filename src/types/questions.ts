/**
 * Types for generated neuroscience quiz questions
 */

/** Answer letters, in display order */
export const LETTERS = ['A', 'B', 'C', 'D'] as const;

export type Letter = (typeof LETTERS)[number];

/** The topic areas questions are generated for */
export const CATEGORIES = [
  'Sensory system',
  'Motor system',
  'Neural communication (electrical and chemical)',
  'Neuroanatomy',
  'Higher cognition',
  'Neurology (Diseases of the Brain)',
] as const;

export type Category = (typeof CATEGORIES)[number];

/** A single multiple-choice question */
export interface Question {
  /** The question text */
  text: string;
  /** Exactly four entries, "Option A: ..." through "Option D: ..." */
  choices: string[];
  /** The letter of the correct answer */
  correctChoice: Letter;
  /** Why the correct answer is right */
  explanation?: string;
  category?: string;
}

/** The fields of a question that may be shown before it is answered */
export interface PublicQuestion {
  question: string;
  choices: string[];
  category: string | null;
}

/** The static question bank used when generation is unavailable */
export interface FallbackBank {
  questions: Array<{
    question: string;
    choices: string[];
    correct_answer: string;
    explanation?: string;
    category: string;
  }>;
}

export function isLetter(value: unknown): value is Letter {
  return typeof value === 'string' && (LETTERS as readonly string[]).includes(value);
}

export function isCategory(value: unknown): value is Category {
  return typeof value === 'string' && (CATEGORIES as readonly string[]).includes(value);
}

export function toPublicQuestion(question: Question): PublicQuestion {
  return {
    question: question.text,
    choices: [...question.choices],
    category: question.category ?? null,
  };
}

/**
 * Text of the option for a letter, without its "Option X:" prefix.
 */
export function optionText(question: Question, letter: Letter): string {
  const choice = question.choices[LETTERS.indexOf(letter)] ?? '';
  return choice.replace(/^Option [A-D]:\s*/, '').trim();
}
