import { LLMError, extractErrorMessage } from '@/lib/errors';
import type { LLMClient } from '@/lib/llm/types';
import { selectReferenceExcerpt } from '@/lib/notes';
import { GENERATION_SYSTEM_PROMPT, buildQuestionPrompt, buildRetryPrompt } from '@/lib/prompts';
import { parseQuestionReply } from '@/lib/questionCodec';
import { getFallbackQuestion } from '@/lib/questions';
import { CATEGORIES, isCategory, type Category, type Question } from '@/types/questions';

const MAX_ATTEMPTS = 2;

export interface ContentGeneratorOptions {
  random?: () => number;
  /** Directory holding `{category}.txt` reference notes */
  notesDir?: string;
}

/**
 * Produces quiz questions from the language model, with the static bank as
 * the last resort. `generate` always resolves to a valid question.
 */
export class ContentGenerator {
  private readonly client: LLMClient;
  private readonly random: () => number;
  private readonly notesDir?: string;

  constructor(client: LLMClient, options: ContentGeneratorOptions = {}) {
    this.client = client;
    this.random = options.random ?? Math.random;
    this.notesDir = options.notesDir;
  }

  resolveCategory(category?: string | null): Category {
    if (isCategory(category)) {
      return category;
    }
    return CATEGORIES[Math.floor(this.random() * CATEGORIES.length)] ?? CATEGORIES[0];
  }

  async generate(category?: string | null): Promise<Question> {
    const resolved = this.resolveCategory(category);
    const reference = selectReferenceExcerpt(resolved, this.notesDir, this.random);

    let lastError: string | null = null;

    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      const userPrompt =
        lastError === null ? buildQuestionPrompt(resolved, reference) : buildRetryPrompt(resolved, lastError, reference);

      let content: string | null;
      try {
        const response = await this.client.generate({
          systemPrompt: GENERATION_SYSTEM_PROMPT,
          userPrompt,
          format: 'json',
          maxTokens: 1000,
          temperature: 0.6,
          topP: 0.85,
        });
        content = response.content;
      } catch (error) {
        if (error instanceof LLMError && !error.retryable) {
          console.warn(`[generator] ${this.client.name} unavailable (${error.kind}): ${error.message}`);
          break;
        }
        console.warn(`[generator] Attempt ${attempt} failed: ${extractErrorMessage(error)}`);
        lastError = null;
        continue;
      }

      const result = parseQuestionReply(content, resolved);
      if (result.ok) {
        return result.question;
      }

      console.warn(`[generator] Attempt ${attempt} returned a malformed question: ${result.error}`);
      lastError = result.error;
    }

    return getFallbackQuestion(resolved, this.random);
  }
}
