import { SubmitChatFeedbackUseCase } from '@/modules/chat/application/use-cases/submit-chat-feedback/submit-chat-feedback.use-case';
import { FeedbackTargetError, SessionNotFoundError } from '@/modules/chat/domain/errors';
import {
  InMemoryChatFeedback,
  InMemoryChatPersistence,
} from '../../../fixtures/chat/in-memory-chat.persistence';
import { RecordingMetrics } from '../../../fixtures/chat/recording-metrics';

describe('SubmitChatFeedbackUseCase', () => {
  function buildSubject() {
    const persistence = new InMemoryChatPersistence();
    const feedback = new InMemoryChatFeedback(persistence);
    const metrics = new RecordingMetrics();
    const useCase = new SubmitChatFeedbackUseCase(feedback, persistence, metrics);
    return { useCase, persistence, feedback, metrics };
  }

  it('stores feedback and counts it by helpfulness', async () => {
    const { useCase, persistence, metrics } = buildSubject();
    const session = await persistence.createSession({});

    const record = await useCase.execute({
      requestId: 'req-1',
      sessionId: session.id,
      rating: 5,
      comment: '  very clear  ',
      wasHelpful: true,
    });

    expect(record).toMatchObject({
      sessionId: session.id,
      messageId: null,
      rating: 5,
      comment: 'very clear',
      wasHelpful: true,
    });
    expect(metrics.feedback).toEqual([{ helpful: true }]);
  });

  it('drops blank comments', async () => {
    const { useCase, persistence, metrics } = buildSubject();
    const session = await persistence.createSession({});

    const record = await useCase.execute({
      requestId: 'req-1',
      sessionId: session.id,
      rating: 3,
      comment: '   ',
    });

    expect(record.comment).toBeNull();
    expect(metrics.feedback).toEqual([{ helpful: null }]);
  });

  it('rejects feedback on a message from another session', async () => {
    const { useCase, persistence, metrics } = buildSubject();
    const mine = await persistence.createSession({});
    const other = await persistence.createSession({});
    const { messageIds } = await persistence.persistTurn(other.id, [
      {
        role: 'assistant',
        content: 'answer',
        modelUsed: 'gpt-4',
        complexityScore: null,
        tokenCount: 10,
        latencyMs: 100,
        timestamp: '2026-01-01T00:00:00.000Z',
        metadata: {},
      },
    ]);

    await expect(
      useCase.execute({ requestId: 'req-1', sessionId: mine.id, messageId: messageIds[0], rating: 4 }),
    ).rejects.toMatchObject({ failure: 'message_not_in_session' });
    expect(metrics.feedback).toEqual([]);
  });

  it('rejects feedback for an unknown session', async () => {
    const { useCase } = buildSubject();

    await expect(
      useCase.execute({
        requestId: 'req-1',
        sessionId: '3f0c1c52-3d5b-4a4e-9d1f-0a4b7f9e2c11',
        rating: 4,
      }),
    ).rejects.toBeInstanceOf(FeedbackTargetError);
  });

  it('lists feedback of an existing session only', async () => {
    const { useCase, persistence } = buildSubject();
    const session = await persistence.createSession({});
    await useCase.execute({ requestId: 'req-1', sessionId: session.id, rating: 2, wasHelpful: false });

    await expect(useCase.getSessionFeedback(session.id)).resolves.toHaveLength(1);
    await expect(useCase.getSessionFeedback('missing')).rejects.toBeInstanceOf(SessionNotFoundError);
  });

  it('aggregates stats', async () => {
    const { useCase, persistence } = buildSubject();
    const session = await persistence.createSession({});
    await useCase.execute({ requestId: 'req-1', sessionId: session.id, rating: 5, wasHelpful: true });
    await useCase.execute({ requestId: 'req-2', sessionId: session.id, rating: 4, wasHelpful: true });
    await useCase.execute({ requestId: 'req-3', sessionId: session.id, rating: 1, wasHelpful: false });

    await expect(useCase.getStats()).resolves.toEqual({
      totalFeedback: 3,
      averageRating: 3.33,
      helpfulCount: 2,
      helpfulRatio: 0.67,
    });
  });
});
