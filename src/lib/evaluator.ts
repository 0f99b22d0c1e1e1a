import { extractErrorMessage } from '@/lib/errors';
import type { LLMClient } from '@/lib/llm/types';
import { EVALUATION_SYSTEM_PROMPT, RATING_SYSTEM_PROMPT, buildEvaluationPrompt, buildRatingPrompt } from '@/lib/prompts';
import { parseRatingReply } from '@/lib/ratingCodec';
import { optionText, type Letter, type Question } from '@/types/questions';
import type { AnswerRating, AnswerRecord } from '@/types/database';

export function verdict(question: Question, correct: boolean): string {
  if (correct) {
    return 'Correct!';
  }
  return `Incorrect. The correct answer was ${question.correctChoice}: ${optionText(question, question.correctChoice)}.`;
}

/**
 * Grades answers locally and asks the language model to explain them and
 * to rate the question that was asked.
 */
export class Evaluator {
  private readonly client: LLMClient;

  constructor(client: LLMClient) {
    this.client = client;
  }

  async evaluate(question: Question, userChoice: Letter): Promise<AnswerRecord> {
    const correct = userChoice === question.correctChoice;
    const explanation = (await this.explain(question, userChoice, correct)) ?? question.explanation;

    return {
      question,
      userChoice,
      correct,
      feedback: explanation ? `${verdict(question, correct)} ${explanation}` : verdict(question, correct),
    };
  }

  private async explain(question: Question, userChoice: Letter, correct: boolean): Promise<string | undefined> {
    try {
      const response = await this.client.generate({
        systemPrompt: EVALUATION_SYSTEM_PROMPT,
        userPrompt: buildEvaluationPrompt(
          question,
          optionText(question, userChoice),
          optionText(question, question.correctChoice),
          correct
        ),
        format: 'text',
        maxTokens: 300,
        temperature: 0.3,
      });
      return response.content?.trim() || undefined;
    } catch (error) {
      console.warn(`[evaluator] Explanation unavailable: ${extractErrorMessage(error)}`);
      return undefined;
    }
  }

  /**
   * Ask the model to assess `question`. Resolves to null when the call fails
   * or the reply does not decode.
   */
  async rate(question: Question): Promise<AnswerRating | null> {
    let content: string | null;
    try {
      const response = await this.client.generate({
        systemPrompt: RATING_SYSTEM_PROMPT,
        userPrompt: buildRatingPrompt(question),
        format: 'json',
        maxTokens: 500,
        temperature: 0.3,
      });
      content = response.content;
    } catch (error) {
      console.warn(`[evaluator] Rating unavailable: ${extractErrorMessage(error)}`);
      return null;
    }

    const result = parseRatingReply(content);
    if (!result.ok) {
      console.warn(`[evaluator] Discarding malformed rating: ${result.error}`);
      return null;
    }
    return result.rating;
  }
}
