import { ConfigService } from '@nestjs/config';
import type { ModelInvocationRequest } from '@/modules/chat/application/ports/model-invocation.port';
import {
  InvalidModelRequestError,
  ModelUnavailableError,
  TransientModelError,
} from '@/modules/chat/domain/errors';
import { buildDefaultModelDescriptors } from '@/modules/chat/domain/model-catalog';
import { AzureOpenAiAdapter } from '@/modules/chat/infrastructure/adapters/azure-openai/azure-openai.adapter';

describe('AzureOpenAiAdapter', () => {
  const [highCapabilityModel] = buildDefaultModelDescriptors({
    highCapabilityDeployment: 'gpt4-deployment',
    fastDeployment: 'gpt35-deployment',
  });

  const configured = new ConfigService({
    AZURE_OPENAI_ENDPOINT: 'https://example-resource.openai.azure.com/',
    AZURE_OPENAI_API_KEY: 'test-secret',
    AZURE_OPENAI_API_VERSION: '2024-02-15-preview',
    AZURE_OPENAI_TIMEOUT_MS: 5000,
  });

  function buildRequest(overrides: Partial<ModelInvocationRequest> = {}): ModelInvocationRequest {
    return {
      model: highCapabilityModel,
      messages: [
        { role: 'system', content: 'You are a test assistant.' },
        { role: 'user', content: 'hello there' },
      ],
      config: { maxOutputTokens: 10_000, temperature: 0.2 },
      requestId: 'req-1',
      ...overrides,
    };
  }

  function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
      status,
      headers: { 'Content-Type': 'application/json' },
    });
  }

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('answers locally when credentials are missing', async () => {
    const fetchSpy = jest.spyOn(global, 'fetch');
    const adapter = new AzureOpenAiAdapter(new ConfigService({}));

    const result = await adapter.invoke(buildRequest());

    expect(adapter.isMockMode()).toBe(true);
    expect(result.isMock).toBe(true);
    expect(result.finishReason).toBe('stop');
    expect(result.text.split('\n').slice(0, 3)).toEqual([
      '[GPT-4 mock reply]',
      '',
      'You asked: "hello there"',
    ]);
    expect(result.text).toContain('route requests to the gpt4-deployment deployment.');
    expect(result.tokenCount).toBe(Math.floor(result.text.length / 4));
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it('truncates long questions in the local reply', async () => {
    const adapter = new AzureOpenAiAdapter(new ConfigService({}));

    const result = await adapter.invoke(
      buildRequest({ messages: [{ role: 'user', content: 'q'.repeat(150) }] }),
    );

    expect(result.text).toContain(`You asked: "${'q'.repeat(100)}..."`);
  });

  it('calls the deployment chat completions endpoint', async () => {
    const fetchSpy = jest.spyOn(global, 'fetch').mockResolvedValue(
      jsonResponse({
        choices: [{ message: { role: 'assistant', content: '  General Kenobi  ' }, finish_reason: 'stop' }],
        usage: { prompt_tokens: 20, completion_tokens: 5, total_tokens: 25 },
      }),
    );
    const adapter = new AzureOpenAiAdapter(configured);

    const result = await adapter.invoke(buildRequest());

    expect(result).toEqual({ text: 'General Kenobi', tokenCount: 25, finishReason: 'stop', isMock: false });
    const [url, init] = fetchSpy.mock.calls[0] ?? [];
    expect(url).toBe(
      'https://example-resource.openai.azure.com/openai/deployments/gpt4-deployment/chat/completions?api-version=2024-02-15-preview',
    );
    expect(init).toMatchObject({
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'api-key': 'test-secret',
        'x-ms-client-request-id': 'req-1',
      },
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      messages: [
        { role: 'system', content: 'You are a test assistant.' },
        { role: 'user', content: 'hello there' },
      ],
      max_tokens: 8192,
      temperature: 0.2,
    });
  });

  it.each([
    [429, TransientModelError],
    [500, TransientModelError],
    [503, ModelUnavailableError],
    [404, ModelUnavailableError],
    [401, ModelUnavailableError],
    [400, InvalidModelRequestError],
  ])('classifies HTTP %i responses', async (status, expected) => {
    jest.spyOn(global, 'fetch').mockResolvedValue(jsonResponse({ error: { code: 'x' } }, status));
    const adapter = new AzureOpenAiAdapter(configured);

    const failure = adapter.invoke(buildRequest());

    await expect(failure).rejects.toBeInstanceOf(expected);
    await expect(failure).rejects.toMatchObject({ statusCode: status, modelId: 'gpt-4' });
  });

  it('treats a content filter rejection as an invalid request', async () => {
    jest
      .spyOn(global, 'fetch')
      .mockResolvedValue(jsonResponse({ error: { code: 'content_filter' } }, 429));
    const adapter = new AzureOpenAiAdapter(configured);

    await expect(adapter.invoke(buildRequest())).rejects.toBeInstanceOf(InvalidModelRequestError);
  });

  it('treats a filtered completion as an invalid request', async () => {
    jest.spyOn(global, 'fetch').mockResolvedValue(
      jsonResponse({ choices: [{ message: { content: '' }, finish_reason: 'content_filter' }] }),
    );
    const adapter = new AzureOpenAiAdapter(configured);

    await expect(adapter.invoke(buildRequest())).rejects.toBeInstanceOf(InvalidModelRequestError);
  });

  it('treats an empty completion as transient', async () => {
    jest.spyOn(global, 'fetch').mockResolvedValue(
      jsonResponse({ choices: [{ message: { content: '   ' }, finish_reason: 'stop' }] }),
    );
    const adapter = new AzureOpenAiAdapter(configured);

    await expect(adapter.invoke(buildRequest())).rejects.toThrow(
      'Azure OpenAI response missing message content',
    );
  });

  it('treats network failures as transient', async () => {
    jest.spyOn(global, 'fetch').mockRejectedValue(new TypeError('fetch failed'));
    const adapter = new AzureOpenAiAdapter(configured);

    await expect(adapter.invoke(buildRequest())).rejects.toBeInstanceOf(TransientModelError);
  });
});
