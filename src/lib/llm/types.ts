export type ChatResponseFormat = 'json' | 'text';

export interface LLMChatRequest {
  systemPrompt?: string;
  userPrompt: string;
  format: ChatResponseFormat;
  maxTokens?: number;
  temperature?: number;
  topP?: number;
}

export interface LLMResponse {
  content: string | null;
  finishReason: string | null;
}

/**
 * Chat completion capability. Implementations reject with an `LLMError`.
 */
export interface LLMClient {
  readonly name: string;
  generate(request: LLMChatRequest): Promise<LLMResponse>;
}
