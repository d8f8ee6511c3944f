import type { ModelDescriptor } from '../../domain/model-catalog';

export interface InvocationMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface InvocationConfig {
  maxOutputTokens: number;
  temperature: number;
}

export interface ModelInvocationRequest {
  model: ModelDescriptor;
  messages: InvocationMessage[];
  config: InvocationConfig;
  signal?: AbortSignal;
  requestId?: string;
}

export interface ModelInvocationResult {
  text: string;
  tokenCount: number;
  finishReason: string | null;
  isMock: boolean;
}

/**
 * Calls one hosted model once. Implementations classify every failure as a
 * TransientModelError, ModelUnavailableError or InvalidModelRequestError.
 */
export interface ModelInvocationPort {
  invoke(request: ModelInvocationRequest): Promise<ModelInvocationResult>;
  isMockMode(): boolean;
}
