import { Inject, Injectable } from '@nestjs/common';
import { setTimeout as sleep } from 'node:timers/promises';
import { createLogger } from '../../../../common/utils/logger';
import type { ConversationContext } from '../../domain/conversation-context';
import {
  initialDispatchState,
  isTerminal,
  transition,
  type DispatchPhase,
  type DispatchPolicy,
  type DispatchState,
  type TerminalDispatchState,
} from '../../domain/dispatch';
import {
  AllModelsExhaustedError,
  DispatchDeadlineExceededError,
  InvalidModelRequestError,
  ModelInvocationError,
} from '../../domain/errors';
import { ModelCatalog, type ModelDescriptor } from '../../domain/model-catalog';
import type { ModelSelection } from '../../domain/model-selector';
import type { ChatSettings } from '../chat-settings';
import type { AttemptResult, MetricsPort } from '../ports/metrics.port';
import type {
  InvocationMessage,
  ModelInvocationPort,
  ModelInvocationResult,
} from '../ports/model-invocation.port';
import { CHAT_SETTINGS, METRICS_PORT, MODEL_INVOCATION_PORT } from '../ports/tokens';

export interface AttemptRecord {
  model: string;
  phase: DispatchPhase;
  attempt: number;
  latencyMs: number;
  result: AttemptResult;
}

export interface DispatchSuccess {
  outcome: 'succeeded' | 'fell_back';
  model: ModelDescriptor;
  primaryModel: string;
  wasAutoSelected: boolean;
  responseText: string;
  tokenCount: number;
  finishReason: string | null;
  isMock: boolean;
  /** Latency of the successful attempt only. */
  latencyMs: number;
  attemptCount: number;
  attempts: AttemptRecord[];
}

export type DispatchError =
  | InvalidModelRequestError
  | AllModelsExhaustedError
  | DispatchDeadlineExceededError;

export interface DispatchFailure {
  outcome: 'failed';
  model: string;
  wasAutoSelected: boolean;
  /** Elapsed time across every attempt and backoff wait. */
  latencyMs: number;
  attemptCount: number;
  attempts: AttemptRecord[];
  error: DispatchError;
}

export type DispatchResult = DispatchSuccess | DispatchFailure;

export interface DispatchInput {
  selection: ModelSelection;
  context: ConversationContext;
  query: string;
  signal?: AbortSignal;
  requestId?: string;
}

type AttemptOutcome =
  | { ok: true; reply: ModelInvocationResult }
  | { ok: false; error: ModelInvocationError; cancelled: boolean };

/**
 * Runs the retry/fallback protocol for one query. Every step is computed by
 * the pure `transition` function; this service performs the side effects
 * (invocations, backoff waits, logging, metrics) between steps.
 */
@Injectable()
export class DispatcherService {
  private readonly logger = createLogger(DispatcherService.name);

  constructor(
    @Inject(MODEL_INVOCATION_PORT)
    private readonly invocation: ModelInvocationPort,
    @Inject(METRICS_PORT)
    private readonly metrics: MetricsPort,
    @Inject(CHAT_SETTINGS)
    private readonly settings: ChatSettings,
    private readonly catalog: ModelCatalog,
  ) {}

  async dispatch(input: DispatchInput): Promise<DispatchResult> {
    const startedAt = Date.now();
    const primary = input.selection.model;
    const policy = this.buildPolicy();
    const messages = this.buildMessages(input.context, input.query);
    const attempts: AttemptRecord[] = [];

    let lastError: ModelInvocationError | undefined;
    let reply: ModelInvocationResult | undefined;
    let state: DispatchState = initialDispatchState(
      { id: primary.id, available: this.catalog.isAvailable(primary.id) },
      policy,
    );

    while (!isTerminal(state)) {
      if (input.signal?.aborted) {
        state = transition(state, { type: 'deadline_exceeded' }, policy);
        continue;
      }

      switch (state.status) {
        case 'attempting': {
          const attemptStartedAt = Date.now();
          const outcome = await this.attempt(state.model, messages, input);
          const latencyMs = Date.now() - attemptStartedAt;
          const result: AttemptResult = outcome.ok
            ? 'succeeded'
            : outcome.cancelled
              ? 'cancelled'
              : outcome.error.kind;

          attempts.push({
            model: state.model,
            phase: state.phase,
            attempt: state.attempt,
            latencyMs,
            result,
          });
          this.metrics.incrementDispatchAttempt({ model: state.model, result });
          this.metrics.observeDispatchLatency({ model: state.model, seconds: latencyMs / 1000 });

          if (outcome.ok) {
            reply = outcome.reply;
            state = transition(state, { type: 'invocation_succeeded' }, policy);
          } else if (outcome.cancelled) {
            lastError = outcome.error;
            state = transition(state, { type: 'deadline_exceeded' }, policy);
          } else {
            lastError = outcome.error;
            this.logger.warn('dispatch_attempt_failed', {
              event: 'dispatch_attempt_failed',
              request_id: input.requestId ?? null,
              model: state.model,
              phase: state.phase,
              attempt: state.attempt,
              kind: outcome.error.kind,
              status_code: outcome.error.statusCode ?? null,
              error_message: outcome.error.message,
            });
            state = transition(
              state,
              { type: 'invocation_failed', kind: outcome.error.kind },
              policy,
            );
          }
          break;
        }
        case 'retrying': {
          const waited = await this.waitBackoff(state.delayMs, input.signal);
          state = transition(
            state,
            { type: waited ? 'backoff_elapsed' : 'deadline_exceeded' },
            policy,
          );
          break;
        }
        case 'falling_back': {
          this.logger.dispatch('dispatch_fell_back', {
            event: 'dispatch_fell_back',
            request_id: input.requestId ?? null,
            from: state.from,
            to: state.to,
            reason: state.reason,
          });
          this.metrics.incrementFallback(state.reason);
          state = transition(state, { type: 'fallback_started' }, policy);
          break;
        }
      }
    }

    return this.buildResult(state, {
      input,
      policy,
      attempts,
      reply,
      lastError,
      elapsedMs: Date.now() - startedAt,
    });
  }

  private async attempt(
    modelId: string,
    messages: InvocationMessage[],
    input: DispatchInput,
  ): Promise<AttemptOutcome> {
    const model = this.requireModel(modelId);

    try {
      const reply = await this.invocation.invoke({
        model,
        messages,
        config: this.settings.invocation,
        signal: input.signal,
        requestId: input.requestId,
      });
      return { ok: true, reply };
    } catch (error: unknown) {
      if (!(error instanceof ModelInvocationError)) {
        throw error;
      }

      return { ok: false, error, cancelled: input.signal?.aborted === true };
    }
  }

  /** Resolves false when the caller's signal fires before the delay elapses. */
  private async waitBackoff(delayMs: number, signal?: AbortSignal): Promise<boolean> {
    if (delayMs <= 0) {
      return !signal?.aborted;
    }

    try {
      await sleep(delayMs, undefined, { signal });
      return true;
    } catch (error: unknown) {
      if (signal?.aborted) {
        return false;
      }
      throw error;
    }
  }

  private buildResult(
    state: TerminalDispatchState,
    input: {
      input: DispatchInput;
      policy: DispatchPolicy;
      attempts: AttemptRecord[];
      reply: ModelInvocationResult | undefined;
      lastError: ModelInvocationError | undefined;
      elapsedMs: number;
    },
  ): DispatchResult {
    const primary = input.input.selection.model;
    const wasAutoSelected = input.input.selection.wasAutoSelected;

    if (state.status === 'succeeded' && input.reply) {
      const model = this.requireModel(state.model);
      const successful = input.attempts[input.attempts.length - 1];

      input.input.context.appendExchange(input.input.query, input.reply.text);

      return {
        outcome: state.phase === 'fallback' ? 'fell_back' : 'succeeded',
        model,
        primaryModel: primary.id,
        wasAutoSelected,
        responseText: input.reply.text,
        tokenCount: input.reply.tokenCount,
        finishReason: input.reply.finishReason,
        isMock: input.reply.isMock,
        latencyMs: successful ? successful.latencyMs : input.elapsedMs,
        attemptCount: input.attempts.length,
        attempts: input.attempts,
      };
    }

    const error = this.buildError(state, input.policy, input.lastError, input.elapsedMs, primary.id);

    this.logger.warn('dispatch_failed', {
      event: 'dispatch_failed',
      request_id: input.input.requestId ?? null,
      primary_model: primary.id,
      reason: state.status === 'failed' ? state.reason : 'missing_reply',
      attempts: input.attempts.length,
      elapsed_ms: input.elapsedMs,
    });

    return {
      outcome: 'failed',
      model: primary.id,
      wasAutoSelected,
      latencyMs: input.elapsedMs,
      attemptCount: input.attempts.length,
      attempts: input.attempts,
      error,
    };
  }

  private buildError(
    state: TerminalDispatchState,
    policy: DispatchPolicy,
    lastError: ModelInvocationError | undefined,
    elapsedMs: number,
    primaryModelId: string,
  ): DispatchError {
    if (state.status === 'failed' && state.reason === 'deadline_exceeded') {
      return new DispatchDeadlineExceededError(elapsedMs);
    }

    if (state.status === 'failed' && state.reason === 'invalid_request') {
      return lastError instanceof InvalidModelRequestError
        ? lastError
        : new InvalidModelRequestError(state.model);
    }

    const fallback =
      policy.fallbackModelId !== null && policy.fallbackModelId !== primaryModelId
        ? policy.fallbackModelId
        : null;
    return new AllModelsExhaustedError(primaryModelId, fallback, lastError);
  }

  private buildPolicy(): DispatchPolicy {
    const fallbackModelId = this.settings.fallbackModelId;

    return {
      maxAttempts: this.settings.dispatch.maxAttempts,
      baseBackoffMs: this.settings.dispatch.baseBackoffMs,
      maxBackoffMs: this.settings.dispatch.maxBackoffMs,
      fallbackModelId: this.catalog.isAvailable(fallbackModelId) ? fallbackModelId : null,
    };
  }

  private buildMessages(context: ConversationContext, query: string): InvocationMessage[] {
    return [
      { role: 'system', content: this.settings.systemPrompt },
      ...context.toMessages(),
      { role: 'user', content: query },
    ];
  }

  private requireModel(modelId: string): ModelDescriptor {
    const model = this.catalog.get(modelId);
    if (!model) {
      throw new Error(`Model missing from catalog: ${modelId}`);
    }
    return model;
  }
}
