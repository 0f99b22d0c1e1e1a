import type { Category, Question } from '@/types/questions';

const CATEGORY_CONTEXT: Record<Category, string> = {
  'Sensory system': 'Focus on receptors, sensory transduction, ascending pathways and sensory cortices.',
  'Motor system': 'Focus on motor units, spinal reflexes, descending pathways, basal ganglia and cerebellum.',
  'Neural communication (electrical and chemical)':
    'Focus on membrane potentials, ion channels, action potentials, synapses and neurotransmitters.',
  Neuroanatomy: 'Focus on brain regions, their connections, blood supply, ventricles and meninges.',
  'Higher cognition': 'Focus on memory, language, attention, executive function, emotion and sleep.',
  'Neurology (Diseases of the Brain)':
    'Focus on the mechanisms, symptoms and localisation of neurological and neurodegenerative disorders.',
};

export const GENERATION_SYSTEM_PROMPT = `You are an expert neuroscience educator who writes questions for the Brain Bee competition.

Requirements:
1. The question tests understanding, not memorization, ideally through a realistic clinical or research scenario
2. Exactly four answer choices labelled "Option A:" to "Option D:", exactly one of them correct
3. Distractors are plausible but clearly wrong to an expert
4. The explanation teaches the underlying concept in two to four sentences
5. Difficulty: advanced, suitable for Brain Bee finalists

Respond with a single JSON object and nothing else:
{
  "question": "<question text>",
  "choices": ["Option A: <text>", "Option B: <text>", "Option C: <text>", "Option D: <text>"],
  "correct_answer": "<A|B|C|D>",
  "explanation": "<explanation>",
  "category": "<category>"
}`;

export function buildQuestionPrompt(category: Category, reference?: string): string {
  const lines = [
    `Write one Brain Bee competition style multiple-choice question about ${category}.`,
    CATEGORY_CONTEXT[category],
  ];

  if (reference) {
    lines.push('', 'Base the question on this reference material:', reference);
  }

  lines.push('', `Set "category" to "${category}".`);
  return lines.join('\n');
}

export function buildRetryPrompt(category: Category, previousError: string, reference?: string): string {
  return [
    buildQuestionPrompt(category, reference),
    '',
    `Your previous reply was rejected: ${previousError}.`,
    'Reply with the JSON object only. "choices" must hold exactly four strings starting with "Option A:", "Option B:", "Option C:" and "Option D:" in that order, and "correct_answer" must be a single letter A, B, C or D.',
  ].join('\n');
}

export const EVALUATION_SYSTEM_PROMPT =
  'You are a neuroscience tutor reviewing a student answer to a Brain Bee practice question. ' +
  'Explain concisely and accurately, in at most four sentences, without repeating the question.';

export function buildEvaluationPrompt(question: Question, chosenText: string, correctText: string, correct: boolean): string {
  return [
    `Question: ${question.text}`,
    `Student's answer: ${chosenText}`,
    `Correct answer: ${correctText}`,
    '',
    correct
      ? 'The student answered correctly. Explain why this answer is right.'
      : "The student answered incorrectly. Explain why the correct answer is right and why the student's choice is wrong.",
  ].join('\n');
}

export const RATING_SYSTEM_PROMPT = `You are a neuroscience assessment expert reviewing Brain Bee practice questions. Be strict and objective.

Respond with a single JSON object and nothing else:
{
  "question_quality_rating": <integer 1-10>,
  "answer_correctness_rating": <integer 1-10>,
  "question_quality_justification": "<why the question earned its rating>",
  "answer_correctness_justification": "<whether the keyed answer is right and unambiguous>",
  "overall_assessment": "<one or two sentences>",
  "difficulty_level": "<easy|medium|hard|expert>",
  "suggested_improvements": "<how the question could be improved>"
}`;

export function buildRatingPrompt(question: Question): string {
  const lines = [
    'Rate this multiple-choice question for clarity, difficulty, quality of distractors and educational value of the explanation.',
    '',
    `Question: ${question.text}`,
    ...question.choices,
    `Correct answer: ${question.correctChoice}`,
  ];
  if (question.explanation) {
    lines.push(`Explanation: ${question.explanation}`);
  }
  return lines.join('\n');
}
