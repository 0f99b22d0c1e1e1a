import { APIConnectionError, APIError } from 'openai';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { LLMError } from '@/lib/errors';
import { OpenAIClient, UnconfiguredClient, createLLMClient, toLLMError } from '@/lib/llm/openAIClient';
import { testConfig } from './helpers';

describe('toLLMError', () => {
  it.each([
    [401, 'auth'],
    [403, 'auth'],
    [408, 'transient'],
    [429, 'transient'],
    [503, 'transient'],
    [400, 'invalid_request'],
    [404, 'invalid_request'],
  ])('maps HTTP %i to %s', (status, kind) => {
    const error = APIError.generate(status, { message: 'upstream said no' }, 'upstream said no', {});

    const mapped = toLLMError(error);

    expect(mapped.kind).toBe(kind);
    expect(mapped.cause).toBe(error);
  });

  it('treats connection failures as transient', () => {
    expect(toLLMError(new APIConnectionError({ message: 'Connection error.' })).kind).toBe('transient');
  });

  it('passes LLMErrors through and wraps anything else', () => {
    const existing = new LLMError('auth', 'bad key');

    expect(toLLMError(existing)).toBe(existing);
    expect(toLLMError(new TypeError('boom'))).toMatchObject({ kind: 'unknown', message: 'boom' });
  });

  it('marks only transient and unknown failures as retryable', () => {
    expect(new LLMError('transient', 'x').retryable).toBe(true);
    expect(new LLMError('unknown', 'x').retryable).toBe(true);
    expect(new LLMError('auth', 'x').retryable).toBe(false);
    expect(new LLMError('invalid_request', 'x').retryable).toBe(false);
    expect(new LLMError('not_configured', 'x').retryable).toBe(false);
  });
});

describe('createLLMClient', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns a client that fails fast without credentials', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const client = createLLMClient(testConfig().llm);

    expect(client).toBeInstanceOf(UnconfiguredClient);
    await expect(client.generate({ userPrompt: 'hi', format: 'text' })).rejects.toMatchObject({
      kind: 'not_configured',
    });
  });

  it('uses Azure OpenAI when an endpoint and key are set', () => {
    const client = createLLMClient({
      ...testConfig().llm,
      azureEndpoint: 'https://example.invalid',
      azureApiKey: 'test-key',
    });

    expect(client).toBeInstanceOf(OpenAIClient);
    expect(client.name).toBe('azure-openai');
  });

  it('uses OpenAI with only an API key', () => {
    const client = createLLMClient({ ...testConfig().llm, openAIApiKey: 'test-key' });

    expect(client.name).toBe('openai');
  });
});
