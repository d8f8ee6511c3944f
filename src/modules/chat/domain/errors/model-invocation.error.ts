export type ModelFailureKind = 'transient' | 'unavailable' | 'invalid_request';

/**
 * Base for every failure the model-invocation port may raise.
 * `kind` drives the dispatcher's retry/fallback decision.
 */
export abstract class ModelInvocationError extends Error {
  abstract readonly kind: ModelFailureKind;

  constructor(
    message: string,
    public readonly modelId: string,
    public readonly statusCode?: number,
  ) {
    super(message);
  }
}

/** Timeouts, network failures, throttling, 5xx and empty completions. Worth retrying. */
export class TransientModelError extends ModelInvocationError {
  readonly kind = 'transient';

  constructor(modelId: string, message = 'Model invocation failed transiently', statusCode?: number) {
    super(message, modelId, statusCode);
    this.name = 'TransientModelError';
  }
}

/** The model or its deployment cannot serve requests right now. */
export class ModelUnavailableError extends ModelInvocationError {
  readonly kind = 'unavailable';

  constructor(modelId: string, message = 'Model is unavailable', statusCode?: number) {
    super(message, modelId, statusCode);
    this.name = 'ModelUnavailableError';
  }
}

/** The model rejected the request itself; another attempt would fail the same way. */
export class InvalidModelRequestError extends ModelInvocationError {
  readonly kind = 'invalid_request';

  constructor(modelId: string, message = 'Model rejected the request', statusCode?: number) {
    super(message, modelId, statusCode);
    this.name = 'InvalidModelRequestError';
  }
}
