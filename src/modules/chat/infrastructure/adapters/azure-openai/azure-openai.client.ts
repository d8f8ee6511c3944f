import { isRecord } from '../../../../../common/utils/object.utils';
import type { InvocationMessage } from '../../../application/ports/model-invocation.port';
import { fetchWithTimeout } from '../shared';
import { azureChatCompletionsUrl } from './endpoints';
import {
  AzureOpenAiContentFilterError,
  AzureOpenAiEmptyOutputError,
  AzureOpenAiHttpError,
} from './errors';
import { estimateTokenCount } from './mock-replies';

export interface ChatCompletionRequest {
  endpoint: string;
  apiKey: string;
  apiVersion: string;
  deployment: string;
  messages: InvocationMessage[];
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
  requestId?: string;
  signal?: AbortSignal;
}

export interface ChatCompletionResult {
  text: string;
  tokenCount: number;
  finishReason: string | null;
}

export async function requestChatCompletion(
  input: ChatCompletionRequest,
): Promise<ChatCompletionResult> {
  return fetchWithTimeout(
    azureChatCompletionsUrl({
      endpoint: input.endpoint,
      deployment: input.deployment,
      apiVersion: input.apiVersion,
    }),
    {
      method: 'POST',
      headers: buildHeaders(input.apiKey, input.requestId),
      body: JSON.stringify({
        messages: input.messages,
        max_tokens: input.maxTokens,
        temperature: input.temperature,
      }),
    },
    input.timeoutMs,
    readCompletion,
    input.signal,
  );
}

async function readCompletion(response: Response, signal: AbortSignal): Promise<ChatCompletionResult> {
  if (!response.ok) {
    throw new AzureOpenAiHttpError(response.status, await readErrorCode(response, signal));
  }

  const parsed: unknown = await response.json();
  return parseChatCompletion(parsed);
}

export function parseChatCompletion(payload: unknown): ChatCompletionResult {
  const choices: unknown = isRecord(payload) ? payload.choices : undefined;
  const choice: unknown = Array.isArray(choices) ? choices[0] : undefined;
  const finishReason =
    isRecord(choice) && typeof choice.finish_reason === 'string' ? choice.finish_reason : null;

  if (finishReason === 'content_filter') {
    throw new AzureOpenAiContentFilterError();
  }

  const message: unknown = isRecord(choice) ? choice.message : undefined;
  const text = isRecord(message) && typeof message.content === 'string' ? message.content.trim() : '';
  if (text.length === 0) {
    throw new AzureOpenAiEmptyOutputError();
  }

  return {
    text,
    tokenCount: readTotalTokens(isRecord(payload) ? payload.usage : undefined) ?? estimateTokenCount(text),
    finishReason,
  };
}

function readTotalTokens(usage: unknown): number | null {
  if (!isRecord(usage)) {
    return null;
  }

  if (typeof usage.total_tokens === 'number') {
    return usage.total_tokens;
  }

  return typeof usage.completion_tokens === 'number' ? usage.completion_tokens : null;
}

async function readErrorCode(response: Response, signal: AbortSignal): Promise<string | null> {
  try {
    const body: unknown = await response.json();
    const error = isRecord(body) ? body.error : undefined;
    return isRecord(error) && typeof error.code === 'string' ? error.code : null;
  } catch (error: unknown) {
    // An aborted read is a timeout, not a missing error body.
    if (signal.aborted) {
      throw error;
    }
    return null;
  }
}

function buildHeaders(apiKey: string, requestId?: string): Record<string, string> {
  return {
    'Content-Type': 'application/json',
    'api-key': apiKey,
    ...(requestId ? { 'x-ms-client-request-id': requestId } : {}),
  };
}
