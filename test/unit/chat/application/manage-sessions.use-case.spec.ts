import { SessionContextRegistry } from '@/modules/chat/application/services/session-context.registry';
import { ManageSessionsUseCase } from '@/modules/chat/application/use-cases/manage-sessions/manage-sessions.use-case';
import { SessionNotFoundError } from '@/modules/chat/domain/errors';
import { buildTestChatSettings } from '../../../fixtures/chat/chat-settings.fixture';
import { InMemoryChatPersistence } from '../../../fixtures/chat/in-memory-chat.persistence';

describe('ManageSessionsUseCase', () => {
  function buildSubject() {
    const persistence = new InMemoryChatPersistence();
    const registry = new SessionContextRegistry(persistence, buildTestChatSettings());
    const useCase = new ManageSessionsUseCase(persistence, registry);
    return { useCase, persistence, registry };
  }

  it('creates sessions with a default title', async () => {
    const { useCase } = buildSubject();

    await expect(useCase.create({})).resolves.toMatchObject({ title: 'New Chat', messageCount: 0 });
    await expect(useCase.create({ title: '  Trip planning ' })).resolves.toMatchObject({
      title: 'Trip planning',
    });
  });

  it('returns a session with its messages', async () => {
    const { useCase, persistence } = buildSubject();
    const session = await useCase.create({});
    await persistence.persistTurn(session.id, [
      {
        role: 'user',
        content: 'hello',
        modelUsed: null,
        complexityScore: 0,
        tokenCount: null,
        latencyMs: null,
        timestamp: '2026-01-01T00:00:00.000Z',
        metadata: {},
      },
    ]);

    const detail = await useCase.get(session.id);

    expect(detail.messageCount).toBe(1);
    expect(detail.lastMessage).toBe('hello');
    expect(detail.messages.map((message) => message.content)).toEqual(['hello']);
  });

  it('renames sessions and reports missing ones', async () => {
    const { useCase } = buildSubject();
    const session = await useCase.create({});

    await expect(useCase.rename(session.id, ' Renamed ')).resolves.toMatchObject({ title: 'Renamed' });
    await expect(useCase.rename('missing', 'x')).rejects.toBeInstanceOf(SessionNotFoundError);
  });

  it('deletes a session and drops its cached context', async () => {
    const { useCase, registry } = buildSubject();
    const session = await useCase.create({});
    await registry.withSession(session.id, async () => undefined);

    await expect(useCase.delete(session.id)).resolves.toEqual({ deleted: true, sessionId: session.id });
    expect(registry.cachedSessions).toBe(0);
    await expect(useCase.get(session.id)).rejects.toBeInstanceOf(SessionNotFoundError);
    await expect(useCase.delete(session.id)).rejects.toBeInstanceOf(SessionNotFoundError);
  });
});
