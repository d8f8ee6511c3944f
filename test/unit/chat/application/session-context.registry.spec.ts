import { SessionContextRegistry } from '@/modules/chat/application/services/session-context.registry';
import { buildTestChatSettings } from '../../../fixtures/chat/chat-settings.fixture';
import { InMemoryChatPersistence } from '../../../fixtures/chat/in-memory-chat.persistence';

describe('SessionContextRegistry', () => {
  function buildSubject(contextCacheMaxSessions = 100) {
    const persistence = new InMemoryChatPersistence();
    const settings = buildTestChatSettings({ contextCacheMaxSessions, historyLimit: 6 });
    const registry = new SessionContextRegistry(persistence, settings);
    return { persistence, registry };
  }

  it('hydrates a context from stored history once', async () => {
    const { persistence, registry } = buildSubject();
    const session = await persistence.createSession({});
    await persistence.persistTurn(session.id, [
      {
        role: 'user',
        content: 'stored question',
        modelUsed: null,
        complexityScore: 0,
        tokenCount: null,
        latencyMs: null,
        timestamp: '2026-01-01T00:00:00.000Z',
        metadata: {},
      },
      {
        role: 'assistant',
        content: 'stored answer',
        modelUsed: 'gpt-35-turbo',
        complexityScore: null,
        tokenCount: 12,
        latencyMs: 300,
        timestamp: '2026-01-01T00:00:01.000Z',
        metadata: {},
      },
    ]);

    const first = await registry.withSession(session.id, async (context) => context.toMessages());
    await registry.withSession(session.id, async (context) => context.appendExchange('next', 'reply'));
    const size = await registry.withSession(session.id, async (context) => context.size);

    expect(first).toEqual([
      { role: 'user', content: 'stored question' },
      { role: 'assistant', content: 'stored answer' },
    ]);
    expect(size).toBe(4);
    expect(persistence.historyRequests).toEqual([{ sessionId: session.id, limit: 6 }]);
  });

  it('serializes turns of the same session', async () => {
    const { registry } = buildSubject();
    const order: string[] = [];
    let releaseFirst: () => void = () => undefined;

    const first = registry.withSession('session-1', async (context) => {
      order.push('first');
      await new Promise<void>((resolve) => {
        releaseFirst = resolve;
      });
      context.appendExchange('q1', 'a1');
    });
    const second = registry.withSession('session-1', async (context) => {
      order.push(`second saw ${context.size} turns`);
    });

    await new Promise((resolve) => setImmediate(resolve));
    expect(order).toEqual(['first']);

    releaseFirst();
    await Promise.all([first, second]);

    expect(order).toEqual(['first', 'second saw 2 turns']);
  });

  it('evicts the least recently used idle context', async () => {
    const { persistence, registry } = buildSubject(2);

    await registry.withSession('session-a', async () => undefined);
    await registry.withSession('session-b', async () => undefined);
    await registry.withSession('session-c', async () => undefined);

    expect(registry.cachedSessions).toBe(2);

    await registry.withSession('session-a', async () => undefined);

    expect(persistence.historyRequests.map((request) => request.sessionId)).toEqual([
      'session-a',
      'session-b',
      'session-c',
      'session-a',
    ]);
  });

  it('rebuilds a forgotten context from storage', async () => {
    const { persistence, registry } = buildSubject();

    await registry.withSession('session-a', async (context) => context.appendExchange('q', 'a'));
    registry.forget('session-a');
    const size = await registry.withSession('session-a', async (context) => context.size);

    expect(size).toBe(0);
    expect(persistence.historyRequests).toHaveLength(2);
  });
});
