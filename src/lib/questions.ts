import fs from 'fs';
import path from 'path';
import { decodeQuestion } from '@/lib/questionCodec';
import type { FallbackBank, Question } from '@/types/questions';

const FALLBACK_PATH = path.join(process.cwd(), 'data', 'fallback-questions.json');

/** Served only when the bank file itself cannot be read. */
const BUILT_IN_QUESTION: Question = {
  text: 'Which structure connects the left and right cerebral hemispheres and allows them to share information?',
  choices: [
    'Option A: Corpus callosum',
    'Option B: Cerebellar peduncle',
    'Option C: Internal capsule',
    'Option D: Fornix',
  ],
  correctChoice: 'A',
  explanation:
    'The corpus callosum is the largest commissural fibre bundle, linking homologous cortical areas of the two hemispheres.',
  category: 'Neuroanatomy',
};

let fallbackCache: Question[] | null = null;

function readBank(filePath: string): Question[] {
  const data = fs.readFileSync(filePath, 'utf-8');
  const bank: FallbackBank = JSON.parse(data);

  const questions: Question[] = [];
  for (const entry of bank.questions ?? []) {
    const result = decodeQuestion(entry);
    if (result.ok) {
      questions.push(result.question);
    } else {
      console.warn(`[questions] Skipping invalid fallback question: ${result.error}`);
    }
  }
  return questions;
}

/**
 * Load the fallback question bank from the JSON file.
 * Caches the result in memory for subsequent calls.
 */
export function getFallbackQuestions(): Question[] {
  if (fallbackCache) {
    return fallbackCache;
  }

  try {
    fallbackCache = readBank(FALLBACK_PATH);
  } catch (error) {
    console.error(`[questions] Could not read ${FALLBACK_PATH}:`, error);
    fallbackCache = [];
  }

  if (fallbackCache.length === 0) {
    fallbackCache = [BUILT_IN_QUESTION];
  }
  return fallbackCache;
}

/**
 * Pick a fallback question, preferring the requested category.
 */
export function getFallbackQuestion(category?: string, random: () => number = Math.random): Question {
  const questions = getFallbackQuestions();
  const inCategory = category ? questions.filter((q) => q.category === category) : [];
  const pool = inCategory.length > 0 ? inCategory : questions;
  return pool[Math.floor(random() * pool.length)] ?? BUILT_IN_QUESTION;
}

/**
 * Clear the fallback cache.
 * Useful for testing or if the bank file is updated.
 */
export function clearFallbackCache(): void {
  fallbackCache = null;
}
