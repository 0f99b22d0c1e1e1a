import OpenAI, { APIConnectionError, APIError, AzureOpenAI } from 'openai';
import type { LLMConfig } from '@/lib/config';
import { LLMError, extractErrorMessage } from '@/lib/errors';
import type { LLMChatRequest, LLMClient, LLMResponse } from './types';

/**
 * Maps SDK failures onto the provider-neutral error kinds.
 */
export function toLLMError(error: unknown): LLMError {
  if (error instanceof LLMError) {
    return error;
  }

  // Connection errors (including timeouts) carry no status
  if (error instanceof APIConnectionError) {
    return new LLMError('transient', error.message, { cause: error });
  }

  if (error instanceof APIError) {
    const status = error.status;
    if (status === 401 || status === 403) {
      return new LLMError('auth', error.message, { cause: error });
    }
    if (status === 408 || status === 409 || status === 429 || (status !== undefined && status >= 500)) {
      return new LLMError('transient', error.message, { cause: error });
    }
    if (status !== undefined && status >= 400) {
      return new LLMError('invalid_request', error.message, { cause: error });
    }
  }

  return new LLMError('unknown', extractErrorMessage(error), { cause: error });
}

export class OpenAIClient implements LLMClient {
  readonly name: string;
  private readonly openai: OpenAI;
  private readonly model: string;

  constructor(config: LLMConfig) {
    this.model = config.model;

    if (config.azureEndpoint && config.azureApiKey) {
      this.name = 'azure-openai';
      this.openai = new AzureOpenAI({
        endpoint: config.azureEndpoint,
        apiKey: config.azureApiKey,
        apiVersion: config.azureApiVersion,
        deployment: config.model,
        timeout: config.timeoutMs,
        maxRetries: 0,
      });
    } else {
      this.name = 'openai';
      this.openai = new OpenAI({
        apiKey: config.openAIApiKey ?? undefined,
        baseURL: config.openAIBaseURL ?? undefined,
        timeout: config.timeoutMs,
        maxRetries: 0,
      });
    }
  }

  async generate(request: LLMChatRequest): Promise<LLMResponse> {
    try {
      const response = await this.openai.chat.completions.create({
        model: this.model,
        messages: this.buildMessages(request),
        response_format: request.format === 'json' ? { type: 'json_object' } : undefined,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        top_p: request.topP,
      });

      const choice = response.choices[0];
      return {
        content: choice?.message?.content ?? null,
        finishReason: choice?.finish_reason ?? null,
      };
    } catch (error) {
      throw toLLMError(error);
    }
  }

  private buildMessages(request: LLMChatRequest) {
    const messages: Array<{ role: 'system' | 'user'; content: string }> = [];

    if (request.systemPrompt) {
      messages.push({ role: 'system', content: request.systemPrompt });
    }

    messages.push({ role: 'user', content: request.userPrompt });

    return messages;
  }
}

/** Stands in when no credentials are configured; every call fails fast. */
export class UnconfiguredClient implements LLMClient {
  readonly name = 'unconfigured';

  generate(): Promise<LLMResponse> {
    return Promise.reject(new LLMError('not_configured', 'No language model credentials are configured'));
  }
}

export function createLLMClient(config: LLMConfig): LLMClient {
  const hasAzure = Boolean(config.azureEndpoint && config.azureApiKey);
  if (!hasAzure && !config.openAIApiKey) {
    console.warn('[llm] No Azure OpenAI or OpenAI credentials, questions will come from the fallback bank');
    return new UnconfiguredClient();
  }
  return new OpenAIClient(config);
}
