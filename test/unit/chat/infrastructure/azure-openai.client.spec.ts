import { ReadableStream } from 'node:stream/web';
import {
  parseChatCompletion,
  requestChatCompletion,
  type ChatCompletionRequest,
} from '@/modules/chat/infrastructure/adapters/azure-openai/azure-openai.client';
import { azureChatCompletionsUrl } from '@/modules/chat/infrastructure/adapters/azure-openai/endpoints';
import {
  AzureOpenAiContentFilterError,
  AzureOpenAiEmptyOutputError,
} from '@/modules/chat/infrastructure/adapters/azure-openai/errors';

describe('azure-openai client helpers', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  function buildRequest(overrides: Partial<ChatCompletionRequest> = {}): ChatCompletionRequest {
    return {
      endpoint: 'https://example-resource.openai.azure.com',
      apiKey: 'test-secret',
      apiVersion: '2024-02-15-preview',
      deployment: 'gpt35-deployment',
      messages: [{ role: 'user', content: 'hello' }],
      maxTokens: 100,
      temperature: 0.7,
      timeoutMs: 5_000,
      ...overrides,
    };
  }

  function abortError(): Error {
    const error = new Error('This operation was aborted');
    error.name = 'AbortError';
    return error;
  }

  // Headers arrive at once; the body only ends when the request signal aborts it.
  function mockStalledBody(status: number): void {
    jest.spyOn(global, 'fetch').mockImplementation(async (_url, init) => {
      const signal = init?.signal;
      const body = new ReadableStream<Uint8Array>({
        start(controller) {
          signal?.addEventListener('abort', () => controller.error(abortError()), { once: true });
        },
      });
      return new Response(body, { status, headers: { 'Content-Type': 'application/json' } });
    });
  }

  it('aborts a stalled response body when the caller deadline fires', async () => {
    mockStalledBody(200);
    const caller = new AbortController();
    setTimeout(() => caller.abort(), 30);

    await expect(requestChatCompletion(buildRequest({ signal: caller.signal }))).rejects.toMatchObject({
      name: 'AbortError',
    });
  });

  it('aborts a stalled response body when the request timeout elapses', async () => {
    mockStalledBody(200);

    await expect(requestChatCompletion(buildRequest({ timeoutMs: 30 }))).rejects.toMatchObject({
      name: 'AbortError',
    });
  });

  it('aborts a stalled error body instead of reporting the status', async () => {
    mockStalledBody(500);

    await expect(requestChatCompletion(buildRequest({ timeoutMs: 30 }))).rejects.toMatchObject({
      name: 'AbortError',
    });
  });

  it('builds the chat completions url', () => {
    expect(
      azureChatCompletionsUrl({
        endpoint: 'https://example-resource.openai.azure.com///',
        deployment: 'my deployment',
        apiVersion: '2024-02-15-preview',
      }),
    ).toBe(
      'https://example-resource.openai.azure.com/openai/deployments/my%20deployment/chat/completions?api-version=2024-02-15-preview',
    );
  });

  it('falls back to completion tokens and then to an estimate', () => {
    expect(
      parseChatCompletion({
        choices: [{ message: { content: 'abcdefgh' }, finish_reason: 'length' }],
        usage: { completion_tokens: 7 },
      }),
    ).toEqual({ text: 'abcdefgh', tokenCount: 7, finishReason: 'length' });

    expect(parseChatCompletion({ choices: [{ message: { content: 'abcdefgh' } }] })).toEqual({
      text: 'abcdefgh',
      tokenCount: 2,
      finishReason: null,
    });
  });

  it('rejects filtered and empty completions', () => {
    expect(() =>
      parseChatCompletion({ choices: [{ message: { content: 'x' }, finish_reason: 'content_filter' }] }),
    ).toThrow(AzureOpenAiContentFilterError);
    expect(() => parseChatCompletion({ choices: [] })).toThrow(AzureOpenAiEmptyOutputError);
    expect(() => parseChatCompletion('not json')).toThrow(AzureOpenAiEmptyOutputError);
  });
});
