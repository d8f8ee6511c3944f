import { Inject, Injectable } from '@nestjs/common';
import { createLogger } from '../../../../../common/utils/logger';
import { buildSessionTitle, DEFAULT_SESSION_TITLE } from '../../../domain/chat-session';
import { scoreQuery, type ComplexityAnalysis } from '../../../domain/complexity-scorer';
import { ModelSelector, type ModelSelection } from '../../../domain/model-selector';
import { buildFollowUpSuggestions } from '../../../domain/suggestions';
import type { ChatSettings } from '../../chat-settings';
import type {
  ChatPersistencePort,
  ChatSessionRecord,
  TurnRecord,
} from '../../ports/chat-persistence.port';
import type { MetricsPort } from '../../ports/metrics.port';
import { CHAT_PERSISTENCE_PORT, CHAT_SETTINGS, METRICS_PORT } from '../../ports/tokens';
import { DispatcherService, type DispatchSuccess } from '../../services/dispatcher.service';
import { SessionContextRegistry } from '../../services/session-context.registry';

export interface OrchestrateChatInput {
  requestId: string;
  message: string;
  sessionId?: string;
  model?: string;
}

export interface ChatTurnResult {
  sessionId: string;
  messageId: string;
  chosenModel: string;
  wasAutoSelected: boolean;
  complexityScore: number;
  responseText: string;
  latencyMs: number;
  outcome: DispatchSuccess['outcome'];
  attemptCount: number;
  tokenCount: number;
  isMock: boolean;
  suggestions: string[];
  analysis: {
    score: number;
    signals: string[];
    length: number;
  };
}

/**
 * Composition root of one chat turn: score, select and dispatch under the
 * session lock, then persist the exchange and build follow-up suggestions.
 */
@Injectable()
export class OrchestrateChatUseCase {
  private readonly logger = createLogger(OrchestrateChatUseCase.name);

  constructor(
    @Inject(CHAT_PERSISTENCE_PORT)
    private readonly persistence: ChatPersistencePort,
    @Inject(METRICS_PORT)
    private readonly metrics: MetricsPort,
    @Inject(CHAT_SETTINGS)
    private readonly settings: ChatSettings,
    private readonly selector: ModelSelector,
    private readonly dispatcher: DispatcherService,
    private readonly registry: SessionContextRegistry,
  ) {}

  async execute(input: OrchestrateChatInput): Promise<ChatTurnResult> {
    const receivedAt = new Date();
    const session = await this.resolveSession(input.sessionId);
    const deadline = AbortSignal.timeout(this.settings.requestDeadlineMs);

    const turn = await this.registry.withSession(session.id, async (context) => {
      const analysis = scoreQuery(input.message, this.settings.scorer);
      this.metrics.observeComplexityScore(analysis.score);

      const selection = this.selector.select(analysis.score, input.model);
      const result = await this.dispatcher.dispatch({
        selection,
        context,
        query: input.message,
        signal: deadline,
        requestId: input.requestId,
      });

      if (result.outcome === 'failed') {
        this.metrics.incrementChatRequest({
          model: result.model,
          outcome: 'failed',
          autoSelected: result.wasAutoSelected,
        });
        this.logger.warn('chat_turn_failed', {
          event: 'chat_turn_failed',
          request_id: input.requestId,
          session_id: session.id,
          selected_model: selection.model.id,
          complexity_score: analysis.score,
          attempts: result.attemptCount,
          error_type: result.error.name,
        });
        throw result.error;
      }

      try {
        const messageId = await this.persistExchange(session, input, receivedAt, analysis, result);
        return { analysis, selection, result, messageId };
      } catch (error: unknown) {
        // The context already holds the exchange; rebuild it from storage next time.
        this.registry.forget(session.id);
        throw error;
      }
    });

    const suggestions = buildFollowUpSuggestions(turn.result.responseText);
    await this.persistence.saveSuggestions({ messageId: turn.messageId, suggestions });

    this.recordSuccess(input, session.id, turn.analysis, turn.selection, turn.result);

    return {
      sessionId: session.id,
      messageId: turn.messageId,
      chosenModel: turn.result.model.id,
      wasAutoSelected: turn.result.wasAutoSelected,
      complexityScore: turn.analysis.score,
      responseText: turn.result.responseText,
      latencyMs: turn.result.latencyMs,
      outcome: turn.result.outcome,
      attemptCount: turn.result.attemptCount,
      tokenCount: turn.result.tokenCount,
      isMock: turn.result.isMock,
      suggestions: suggestions.map((suggestion) => suggestion.text),
      analysis: {
        score: turn.analysis.score,
        signals: turn.analysis.signals.map((signal) => signal.name),
        length: turn.analysis.length,
      },
    };
  }

  private async resolveSession(sessionId?: string): Promise<ChatSessionRecord> {
    if (sessionId) {
      const existing = await this.persistence.getSession(sessionId);
      if (existing) {
        return existing;
      }
    }

    return this.persistence.createSession({});
  }

  private async persistExchange(
    session: ChatSessionRecord,
    input: OrchestrateChatInput,
    receivedAt: Date,
    analysis: ComplexityAnalysis,
    result: DispatchSuccess,
  ): Promise<string> {
    const isFirstTurn = (await this.persistence.countMessages(session.id)) === 0;
    const records = buildTurnRecords(input, receivedAt, analysis, result);
    const persisted = await this.persistence.persistTurn(session.id, records);

    if (isFirstTurn && session.title === DEFAULT_SESSION_TITLE) {
      await this.persistence.renameSession(session.id, buildSessionTitle(input.message));
    }

    const assistantMessageId = persisted.messageIds[1];
    if (!assistantMessageId) {
      throw new Error('Persistence did not return the assistant message id');
    }

    return assistantMessageId;
  }

  private recordSuccess(
    input: OrchestrateChatInput,
    sessionId: string,
    analysis: ComplexityAnalysis,
    selection: ModelSelection,
    result: DispatchSuccess,
  ): void {
    this.metrics.incrementChatRequest({
      model: result.model.id,
      outcome: result.outcome,
      autoSelected: result.wasAutoSelected,
    });
    this.metrics.addTokens({ model: result.model.id, tokens: result.tokenCount });

    this.logger.chat('chat_turn_completed', {
      event: 'chat_turn_completed',
      request_id: input.requestId,
      session_id: sessionId,
      complexity_score: analysis.score,
      signals: analysis.signals.map((signal) => signal.name),
      selection_reason: selection.reason,
      selected_model: selection.model.id,
      chosen_model: result.model.id,
      outcome: result.outcome,
      attempts: result.attemptCount,
      latency_ms: result.latencyMs,
      is_mock: result.isMock,
    });
  }
}

function buildTurnRecords(
  input: OrchestrateChatInput,
  receivedAt: Date,
  analysis: ComplexityAnalysis,
  result: DispatchSuccess,
): TurnRecord[] {
  return [
    {
      role: 'user',
      content: input.message,
      modelUsed: null,
      complexityScore: analysis.score,
      tokenCount: null,
      latencyMs: null,
      timestamp: receivedAt.toISOString(),
      metadata: {
        requestId: input.requestId,
        signals: analysis.signals.map((signal) => signal.name),
        requestedModel: input.model ?? null,
      },
    },
    {
      role: 'assistant',
      content: result.responseText,
      modelUsed: result.model.id,
      complexityScore: null,
      tokenCount: result.tokenCount,
      latencyMs: result.latencyMs,
      timestamp: new Date().toISOString(),
      metadata: {
        requestId: input.requestId,
        outcome: result.outcome,
        primaryModel: result.primaryModel,
        wasAutoSelected: result.wasAutoSelected,
        attemptCount: result.attemptCount,
        finishReason: result.finishReason,
        isMock: result.isMock,
      },
    },
  ];
}
