import { Inject, Injectable } from '@nestjs/common';
import { createLogger } from '../../../../common/utils/logger';
import { ConversationContext } from '../../domain/conversation-context';
import type { ChatSettings } from '../chat-settings';
import type { ChatPersistencePort } from '../ports/chat-persistence.port';
import { CHAT_PERSISTENCE_PORT, CHAT_SETTINGS } from '../ports/tokens';
import { KeyedMutex } from '../support/keyed-mutex';

/**
 * Owns one ConversationContext per session and the lock that serializes
 * turns of the same session. Contexts are hydrated from persistence on first
 * use and cached in least-recently-used order.
 */
@Injectable()
export class SessionContextRegistry {
  private readonly logger = createLogger(SessionContextRegistry.name);
  private readonly contexts = new Map<string, ConversationContext>();
  private readonly mutex = new KeyedMutex();

  constructor(
    @Inject(CHAT_PERSISTENCE_PORT)
    private readonly persistence: ChatPersistencePort,
    @Inject(CHAT_SETTINGS)
    private readonly settings: ChatSettings,
  ) {}

  withSession<T>(sessionId: string, task: (context: ConversationContext) => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(sessionId, async () => {
      const context = await this.resolve(sessionId);
      return task(context);
    });
  }

  forget(sessionId: string): void {
    this.contexts.delete(sessionId);
  }

  get cachedSessions(): number {
    return this.contexts.size;
  }

  private async resolve(sessionId: string): Promise<ConversationContext> {
    const cached = this.contexts.get(sessionId);
    if (cached) {
      this.contexts.delete(sessionId);
      this.contexts.set(sessionId, cached);
      return cached;
    }

    const turns = await this.persistence.getConversationHistory({
      sessionId,
      limit: this.settings.historyLimit,
    });
    const context = new ConversationContext(sessionId, this.settings.context, turns);
    this.contexts.set(sessionId, context);
    this.evictIdle();

    this.logger.debug('session_context_hydrated', {
      event: 'session_context_hydrated',
      session_id: sessionId,
      turns: context.size,
      cached_sessions: this.contexts.size,
    });

    return context;
  }

  private evictIdle(): void {
    for (const sessionId of this.contexts.keys()) {
      if (this.contexts.size <= this.settings.contextCacheMaxSessions) {
        return;
      }

      if (!this.mutex.isLocked(sessionId)) {
        this.contexts.delete(sessionId);
      }
    }
  }
}
