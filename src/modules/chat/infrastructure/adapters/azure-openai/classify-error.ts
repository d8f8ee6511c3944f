import {
  InvalidModelRequestError,
  ModelInvocationError,
  ModelUnavailableError,
  TransientModelError,
} from '../../../domain/errors';
import {
  AzureOpenAiContentFilterError,
  AzureOpenAiEmptyOutputError,
  AzureOpenAiHttpError,
} from './errors';

const TRANSIENT_STATUSES = new Set([408, 429, 500, 502, 504]);
const UNAVAILABLE_STATUSES = new Set([401, 403, 404, 503]);
const INVALID_REQUEST_STATUSES = new Set([400, 413, 422]);

/**
 * Maps any failure raised while calling Azure OpenAI onto the
 * transient / unavailable / invalid-request taxonomy.
 */
export function classifyInvocationError(error: unknown, modelId: string): ModelInvocationError {
  if (error instanceof ModelInvocationError) {
    return error;
  }

  if (error instanceof AzureOpenAiHttpError) {
    return classifyHttpStatus(error, modelId);
  }

  if (error instanceof AzureOpenAiContentFilterError) {
    return new InvalidModelRequestError(modelId, error.message);
  }

  if (error instanceof AzureOpenAiEmptyOutputError) {
    return new TransientModelError(modelId, error.message);
  }

  if (isTimeoutOrNetwork(error)) {
    return new TransientModelError(modelId, 'Model request timed out or failed to connect');
  }

  const message = error instanceof Error ? error.message : 'Unknown model invocation failure';
  return new TransientModelError(modelId, message);
}

export function isTimeoutOrNetwork(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  return (
    error.name === 'AbortError' ||
    error.name === 'TimeoutError' ||
    (error.name === 'TypeError' && error.message.includes('fetch'))
  );
}

function classifyHttpStatus(error: AzureOpenAiHttpError, modelId: string): ModelInvocationError {
  const status = error.status;

  if (error.errorCode === 'content_filter') {
    return new InvalidModelRequestError(modelId, error.message, status);
  }

  if (TRANSIENT_STATUSES.has(status)) {
    return new TransientModelError(modelId, error.message, status);
  }

  if (UNAVAILABLE_STATUSES.has(status)) {
    return new ModelUnavailableError(modelId, error.message, status);
  }

  if (INVALID_REQUEST_STATUSES.has(status)) {
    return new InvalidModelRequestError(modelId, error.message, status);
  }

  return status >= 500
    ? new TransientModelError(modelId, error.message, status)
    : new InvalidModelRequestError(modelId, error.message, status);
}
