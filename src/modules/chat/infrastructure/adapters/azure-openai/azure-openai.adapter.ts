import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createLogger } from '../../../../../common/utils/logger';
import type {
  ModelInvocationPort,
  ModelInvocationRequest,
  ModelInvocationResult,
} from '../../../application/ports/model-invocation.port';
import { requestChatCompletion } from './azure-openai.client';
import { classifyInvocationError } from './classify-error';
import { buildMockReply, estimateTokenCount } from './mock-replies';

@Injectable()
export class AzureOpenAiAdapter implements ModelInvocationPort {
  private readonly logger = createLogger(AzureOpenAiAdapter.name);
  private readonly endpoint: string | undefined;
  private readonly apiKey: string | undefined;
  private readonly apiVersion: string;
  private readonly timeoutMs: number;

  constructor(private readonly configService: ConfigService) {
    this.endpoint = this.configService.get<string>('AZURE_OPENAI_ENDPOINT');
    this.apiKey = this.configService.get<string>('AZURE_OPENAI_API_KEY');
    this.apiVersion =
      this.configService.get<string>('AZURE_OPENAI_API_VERSION') ?? '2024-02-15-preview';
    this.timeoutMs = this.configService.get<number>('AZURE_OPENAI_TIMEOUT_MS') ?? 20_000;

    if (this.isMockMode()) {
      this.logger.warn('azure_openai_mock_mode', {
        event: 'azure_openai_mock_mode',
        has_endpoint: Boolean(this.endpoint),
        has_api_key: Boolean(this.apiKey),
      });
    }
  }

  isMockMode(): boolean {
    return !this.endpoint || !this.apiKey;
  }

  async invoke(request: ModelInvocationRequest): Promise<ModelInvocationResult> {
    const endpoint = this.endpoint;
    const apiKey = this.apiKey;

    if (!endpoint || !apiKey) {
      return this.mockReply(request);
    }

    const startedAt = Date.now();
    try {
      const completion = await requestChatCompletion({
        endpoint,
        apiKey,
        apiVersion: this.apiVersion,
        deployment: request.model.deploymentName,
        messages: request.messages,
        maxTokens: Math.min(request.config.maxOutputTokens, request.model.maxTokens),
        temperature: request.config.temperature,
        timeoutMs: this.timeoutMs,
        requestId: request.requestId,
        signal: request.signal,
      });

      this.logger.performance('azure_openai_chat_completion', startedAt, {
        model: request.model.id,
        request_id: request.requestId ?? null,
        token_count: completion.tokenCount,
      });

      return { ...completion, isMock: false };
    } catch (error: unknown) {
      throw classifyInvocationError(error, request.model.id);
    }
  }

  private mockReply(request: ModelInvocationRequest): ModelInvocationResult {
    const lastUserMessage = [...request.messages].reverse().find((message) => message.role === 'user');
    const text = buildMockReply(request.model, lastUserMessage?.content ?? '');

    return {
      text,
      tokenCount: estimateTokenCount(text),
      finishReason: 'stop',
      isMock: true,
    };
  }
}
