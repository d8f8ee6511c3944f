import { Inject, Injectable } from '@nestjs/common';
import { createLogger } from '../../../../../common/utils/logger';
import { SessionNotFoundError } from '../../../domain/errors';
import type {
  ChatFeedbackPort,
  FeedbackRecord,
  FeedbackStats,
} from '../../ports/chat-feedback.port';
import type { ChatPersistencePort } from '../../ports/chat-persistence.port';
import type { MetricsPort } from '../../ports/metrics.port';
import { CHAT_FEEDBACK_PORT, CHAT_PERSISTENCE_PORT, METRICS_PORT } from '../../ports/tokens';

export interface SubmitChatFeedbackInput {
  requestId: string;
  sessionId: string;
  messageId?: string;
  rating: number;
  comment?: string;
  wasHelpful?: boolean;
}

@Injectable()
export class SubmitChatFeedbackUseCase {
  private readonly logger = createLogger(SubmitChatFeedbackUseCase.name);

  constructor(
    @Inject(CHAT_FEEDBACK_PORT)
    private readonly chatFeedbackPort: ChatFeedbackPort,
    @Inject(CHAT_PERSISTENCE_PORT)
    private readonly persistence: ChatPersistencePort,
    @Inject(METRICS_PORT)
    private readonly metricsPort: MetricsPort,
  ) {}

  async execute(input: SubmitChatFeedbackInput): Promise<FeedbackRecord> {
    const feedback = await this.chatFeedbackPort.persistFeedback({
      sessionId: input.sessionId,
      messageId: input.messageId,
      rating: input.rating,
      comment: input.comment?.trim() || undefined,
      wasHelpful: input.wasHelpful,
      requestId: input.requestId,
    });

    this.metricsPort.incrementFeedbackReceived({ helpful: feedback.wasHelpful });
    this.logger.chat('feedback_recorded', {
      event: 'feedback_recorded',
      request_id: input.requestId,
      session_id: input.sessionId,
      message_id: input.messageId ?? null,
      rating: input.rating,
      was_helpful: input.wasHelpful ?? null,
    });

    return feedback;
  }

  async getSessionFeedback(sessionId: string): Promise<FeedbackRecord[]> {
    const session = await this.persistence.getSession(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }

    return this.chatFeedbackPort.getSessionFeedback(sessionId);
  }

  getStats(): Promise<FeedbackStats> {
    return this.chatFeedbackPort.getFeedbackStats();
  }
}
