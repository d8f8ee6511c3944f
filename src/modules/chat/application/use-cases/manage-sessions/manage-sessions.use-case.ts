import { Inject, Injectable } from '@nestjs/common';
import { createLogger } from '../../../../../common/utils/logger';
import { DEFAULT_SESSION_TITLE } from '../../../domain/chat-session';
import { SessionNotFoundError } from '../../../domain/errors';
import type {
  ChatPersistencePort,
  ChatSessionRecord,
  StoredMessage,
} from '../../ports/chat-persistence.port';
import { CHAT_PERSISTENCE_PORT } from '../../ports/tokens';
import { SessionContextRegistry } from '../../services/session-context.registry';

export interface SessionDetail extends ChatSessionRecord {
  messages: StoredMessage[];
}

@Injectable()
export class ManageSessionsUseCase {
  private readonly logger = createLogger(ManageSessionsUseCase.name);

  constructor(
    @Inject(CHAT_PERSISTENCE_PORT)
    private readonly persistence: ChatPersistencePort,
    private readonly registry: SessionContextRegistry,
  ) {}

  create(input: { title?: string; userId?: string }): Promise<ChatSessionRecord> {
    return this.persistence.createSession({
      title: input.title?.trim() || DEFAULT_SESSION_TITLE,
      userId: input.userId,
    });
  }

  list(input: { limit: number; offset: number }): Promise<ChatSessionRecord[]> {
    return this.persistence.listSessions(input);
  }

  async get(sessionId: string): Promise<SessionDetail> {
    const session = await this.persistence.getSession(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }

    const messages = await this.persistence.getSessionMessages(sessionId);
    return { ...session, messages };
  }

  async rename(sessionId: string, title: string): Promise<ChatSessionRecord> {
    const renamed = await this.persistence.renameSession(sessionId, title.trim());
    if (!renamed) {
      throw new SessionNotFoundError(sessionId);
    }
    return renamed;
  }

  async delete(sessionId: string): Promise<{ deleted: true; sessionId: string }> {
    const deleted = await this.persistence.deleteSession(sessionId);
    if (!deleted) {
      throw new SessionNotFoundError(sessionId);
    }

    this.registry.forget(sessionId);
    this.logger.info('session_deleted', { event: 'session_deleted', session_id: sessionId });

    return { deleted: true, sessionId };
  }
}
