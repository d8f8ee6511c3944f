import { IllegalDispatchTransitionError, type ModelFailureKind } from '../errors';

export type DispatchPhase = 'primary' | 'fallback';
export type FallbackReason = 'primary_unavailable' | 'retries_exhausted';
export type DispatchFailureReason = 'invalid_request' | 'all_models_exhausted' | 'deadline_exceeded';

export interface DispatchPolicy {
  /** Total attempts against the primary model, first one included. */
  maxAttempts: number;
  baseBackoffMs: number;
  maxBackoffMs: number;
  /** An available fallback model, or null when none is configured or it is disabled. */
  fallbackModelId: string | null;
}

export type DispatchState =
  | { status: 'attempting'; model: string; phase: DispatchPhase; attempt: number }
  | { status: 'retrying'; model: string; attempt: number; delayMs: number }
  | { status: 'falling_back'; from: string; to: string; reason: FallbackReason }
  | { status: 'succeeded'; model: string; phase: DispatchPhase; attempt: number }
  | {
      status: 'failed';
      model: string;
      phase: DispatchPhase;
      attempt: number;
      reason: DispatchFailureReason;
    };

export type DispatchEvent =
  | { type: 'invocation_succeeded' }
  | { type: 'invocation_failed'; kind: ModelFailureKind }
  | { type: 'backoff_elapsed' }
  | { type: 'fallback_started' }
  | { type: 'deadline_exceeded' };

export type TerminalDispatchState = Extract<DispatchState, { status: 'succeeded' | 'failed' }>;

export function isTerminal(state: DispatchState): state is TerminalDispatchState {
  return state.status === 'succeeded' || state.status === 'failed';
}

/** `attempt` is the number of the attempt that just failed (1-based). */
export function computeBackoffMs(
  attempt: number,
  policy: Pick<DispatchPolicy, 'baseBackoffMs' | 'maxBackoffMs'>,
): number {
  const exponential = policy.baseBackoffMs * 2 ** Math.max(0, attempt - 1);
  return Math.min(exponential, policy.maxBackoffMs);
}

export function initialDispatchState(
  primary: { id: string; available: boolean },
  policy: DispatchPolicy,
): DispatchState {
  if (!primary.available) {
    return fallBackFrom(primary.id, 'primary_unavailable', 0, policy);
  }

  return { status: 'attempting', model: primary.id, phase: 'primary', attempt: 1 };
}

export function transition(
  state: DispatchState,
  event: DispatchEvent,
  policy: DispatchPolicy,
): DispatchState {
  if (isTerminal(state)) {
    throw new IllegalDispatchTransitionError(state.status, event.type);
  }

  if (event.type === 'deadline_exceeded') {
    return failFrom(state, 'deadline_exceeded');
  }

  switch (state.status) {
    case 'attempting':
      return transitionFromAttempting(state, event, policy);
    case 'retrying':
      if (event.type === 'backoff_elapsed') {
        return { status: 'attempting', model: state.model, phase: 'primary', attempt: state.attempt };
      }
      break;
    case 'falling_back':
      if (event.type === 'fallback_started') {
        return { status: 'attempting', model: state.to, phase: 'fallback', attempt: 1 };
      }
      break;
  }

  throw new IllegalDispatchTransitionError(state.status, event.type);
}

function transitionFromAttempting(
  state: Extract<DispatchState, { status: 'attempting' }>,
  event: DispatchEvent,
  policy: DispatchPolicy,
): DispatchState {
  if (event.type === 'invocation_succeeded') {
    return { status: 'succeeded', model: state.model, phase: state.phase, attempt: state.attempt };
  }

  if (event.type !== 'invocation_failed') {
    throw new IllegalDispatchTransitionError(state.status, event.type);
  }

  if (event.kind === 'invalid_request') {
    return { ...state, status: 'failed', reason: 'invalid_request' };
  }

  // The fallback model gets exactly one attempt.
  if (state.phase === 'fallback') {
    return { ...state, status: 'failed', reason: 'all_models_exhausted' };
  }

  if (event.kind === 'unavailable') {
    return fallBackFrom(state.model, 'primary_unavailable', state.attempt, policy);
  }

  if (state.attempt < policy.maxAttempts) {
    return {
      status: 'retrying',
      model: state.model,
      attempt: state.attempt + 1,
      delayMs: computeBackoffMs(state.attempt, policy),
    };
  }

  return fallBackFrom(state.model, 'retries_exhausted', state.attempt, policy);
}

function fallBackFrom(
  model: string,
  reason: FallbackReason,
  attempt: number,
  policy: DispatchPolicy,
): DispatchState {
  if (policy.fallbackModelId === null || policy.fallbackModelId === model) {
    return { status: 'failed', model, phase: 'primary', attempt, reason: 'all_models_exhausted' };
  }

  return { status: 'falling_back', from: model, to: policy.fallbackModelId, reason };
}

function failFrom(
  state: Exclude<DispatchState, TerminalDispatchState>,
  reason: DispatchFailureReason,
): DispatchState {
  switch (state.status) {
    case 'attempting':
      return { ...state, status: 'failed', reason };
    case 'retrying':
      return { status: 'failed', model: state.model, phase: 'primary', attempt: state.attempt - 1, reason };
    case 'falling_back':
      return { status: 'failed', model: state.from, phase: 'primary', attempt: 0, reason };
  }
}
