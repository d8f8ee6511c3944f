import {
  computeBackoffMs,
  initialDispatchState,
  transition,
  type DispatchPolicy,
  type DispatchState,
} from '@/modules/chat/domain/dispatch';
import { IllegalDispatchTransitionError } from '@/modules/chat/domain/errors';

describe('dispatch state machine', () => {
  const policy: DispatchPolicy = {
    maxAttempts: 3,
    baseBackoffMs: 100,
    maxBackoffMs: 1000,
    fallbackModelId: 'gpt-35-turbo',
  };

  const attempting = (attempt: number, phase: 'primary' | 'fallback' = 'primary'): DispatchState => ({
    status: 'attempting',
    model: phase === 'primary' ? 'gpt-4' : 'gpt-35-turbo',
    phase,
    attempt,
  });

  it('doubles the backoff per attempt up to the cap', () => {
    expect(computeBackoffMs(1, policy)).toBe(100);
    expect(computeBackoffMs(2, policy)).toBe(200);
    expect(computeBackoffMs(3, policy)).toBe(400);
    expect(computeBackoffMs(5, policy)).toBe(1000);
  });

  it('starts on the primary model when it is available', () => {
    expect(initialDispatchState({ id: 'gpt-4', available: true }, policy)).toEqual(attempting(1));
  });

  it('starts by falling back when the primary model is unavailable', () => {
    expect(initialDispatchState({ id: 'gpt-4', available: false }, policy)).toEqual({
      status: 'falling_back',
      from: 'gpt-4',
      to: 'gpt-35-turbo',
      reason: 'primary_unavailable',
    });
  });

  it('fails immediately when neither primary nor fallback can serve', () => {
    const state = initialDispatchState(
      { id: 'gpt-4', available: false },
      { ...policy, fallbackModelId: null },
    );

    expect(state).toMatchObject({ status: 'failed', reason: 'all_models_exhausted', attempt: 0 });
  });

  it('schedules a retry after a transient failure', () => {
    const next = transition(attempting(1), { type: 'invocation_failed', kind: 'transient' }, policy);

    expect(next).toEqual({ status: 'retrying', model: 'gpt-4', attempt: 2, delayMs: 100 });
    expect(transition(next, { type: 'backoff_elapsed' }, policy)).toEqual(attempting(2));
  });

  it('falls back once retries are exhausted', () => {
    const next = transition(attempting(3), { type: 'invocation_failed', kind: 'transient' }, policy);

    expect(next).toEqual({
      status: 'falling_back',
      from: 'gpt-4',
      to: 'gpt-35-turbo',
      reason: 'retries_exhausted',
    });
    expect(transition(next, { type: 'fallback_started' }, policy)).toEqual(attempting(1, 'fallback'));
  });

  it('falls back without retrying when the primary is unavailable', () => {
    const next = transition(attempting(1), { type: 'invocation_failed', kind: 'unavailable' }, policy);

    expect(next).toMatchObject({ status: 'falling_back', reason: 'primary_unavailable' });
  });

  it('fails without retry or fallback on an invalid request', () => {
    const next = transition(attempting(1), { type: 'invocation_failed', kind: 'invalid_request' }, policy);

    expect(next).toEqual({
      status: 'failed',
      model: 'gpt-4',
      phase: 'primary',
      attempt: 1,
      reason: 'invalid_request',
    });
  });

  it('gives the fallback model a single attempt', () => {
    const next = transition(
      attempting(1, 'fallback'),
      { type: 'invocation_failed', kind: 'transient' },
      policy,
    );

    expect(next).toMatchObject({ status: 'failed', model: 'gpt-35-turbo', reason: 'all_models_exhausted' });
  });

  it('skips a fallback that names the failing model', () => {
    const next = transition(
      attempting(3),
      { type: 'invocation_failed', kind: 'transient' },
      { ...policy, fallbackModelId: 'gpt-4' },
    );

    expect(next).toMatchObject({ status: 'failed', reason: 'all_models_exhausted' });
  });

  it('fails with deadline_exceeded from any non-terminal state', () => {
    const retrying: DispatchState = { status: 'retrying', model: 'gpt-4', attempt: 2, delayMs: 100 };

    expect(transition(retrying, { type: 'deadline_exceeded' }, policy)).toEqual({
      status: 'failed',
      model: 'gpt-4',
      phase: 'primary',
      attempt: 1,
      reason: 'deadline_exceeded',
    });
    expect(transition(attempting(2), { type: 'deadline_exceeded' }, policy)).toMatchObject({
      status: 'failed',
      reason: 'deadline_exceeded',
    });
  });

  it('rejects events that do not apply to the current state', () => {
    const succeeded = transition(attempting(1), { type: 'invocation_succeeded' }, policy);
    const retrying: DispatchState = { status: 'retrying', model: 'gpt-4', attempt: 2, delayMs: 100 };

    expect(succeeded).toEqual({ status: 'succeeded', model: 'gpt-4', phase: 'primary', attempt: 1 });
    expect(() => transition(succeeded, { type: 'backoff_elapsed' }, policy)).toThrow(
      IllegalDispatchTransitionError,
    );
    expect(() => transition(retrying, { type: 'invocation_succeeded' }, policy)).toThrow(
      'Event invocation_succeeded is not valid in dispatch state retrying',
    );
  });
});
