import type { ModelInvocationError } from './model-invocation.error';

export type InvalidOverrideReason = 'unknown_model' | 'model_unavailable';

export class InvalidOverrideError extends Error {
  constructor(
    public readonly requestedModel: string,
    public readonly reason: InvalidOverrideReason,
  ) {
    super(
      reason === 'unknown_model'
        ? `Unknown model: ${requestedModel}`
        : `Model is currently unavailable: ${requestedModel}`,
    );
    this.name = 'InvalidOverrideError';
  }
}

export class AllModelsExhaustedError extends Error {
  constructor(
    public readonly primaryModel: string,
    public readonly fallbackModel: string | null,
    public readonly lastError?: ModelInvocationError,
  ) {
    super(
      fallbackModel
        ? `Models ${primaryModel} and ${fallbackModel} both failed`
        : `Model ${primaryModel} failed and no fallback model is available`,
    );
    this.name = 'AllModelsExhaustedError';
  }
}

export class DispatchDeadlineExceededError extends Error {
  constructor(public readonly elapsedMs: number) {
    super(`Request deadline exceeded after ${elapsedMs}ms`);
    this.name = 'DispatchDeadlineExceededError';
  }
}

export class InvalidSelectionTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidSelectionTableError';
  }
}

export class IllegalDispatchTransitionError extends Error {
  constructor(state: string, event: string) {
    super(`Event ${event} is not valid in dispatch state ${state}`);
    this.name = 'IllegalDispatchTransitionError';
  }
}
