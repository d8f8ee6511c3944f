import { Inject, Injectable } from '@nestjs/common';
import { Pool } from 'pg';
import { coerceTimestamp } from '../../../../common/utils/date.utils';
import type {
  ChatPersistencePort,
  ChatSessionRecord,
  PersistTurnResult,
  StoredMessage,
  TurnRecord,
} from '../../application/ports/chat-persistence.port';
import { PG_POOL } from '../../application/ports/tokens';
import { buildMessagePreview, DEFAULT_SESSION_TITLE } from '../../domain/chat-session';
import type { ChatRole, ContextTurn } from '../../domain/conversation-context';
import type { FollowUpSuggestion, SuggestionCategory } from '../../domain/suggestions';
import { fromJsonbObject, toJsonb } from './shared';

const MAX_HISTORY_MESSAGES = 100;

interface SessionRow {
  id: string;
  user_id: string | null;
  title: string;
  created_at: Date;
  updated_at: Date;
  is_active: boolean;
  message_count: number | null;
  last_message: string | null;
}

interface MessageRow {
  id: string;
  session_id: string;
  role: string;
  content: string;
  model_used: string | null;
  complexity_score: number | null;
  tokens_used: number | null;
  latency_ms: number | null;
  created_at: Date;
  metadata: unknown;
}

const SESSION_COLUMNS = `s.id::text,
       s.user_id,
       s.title,
       s.created_at,
       s.updated_at,
       s.is_active,
       (SELECT count(*)::int FROM messages m WHERE m.session_id = s.id) AS message_count,
       (SELECT m.content
          FROM messages m
         WHERE m.session_id = s.id
         ORDER BY m.seq DESC
         LIMIT 1) AS last_message`;

@Injectable()
export class PgChatRepository implements ChatPersistencePort {
  constructor(@Inject(PG_POOL) private readonly pool: Pool) {}

  async createSession(input: { title?: string; userId?: string }): Promise<ChatSessionRecord> {
    const result = await this.pool.query<SessionRow>(
      `INSERT INTO chat_sessions (title, user_id)
       VALUES ($1, $2)
       RETURNING id::text, user_id, title, created_at, updated_at, is_active,
                 0 AS message_count, NULL::text AS last_message`,
      [input.title ?? DEFAULT_SESSION_TITLE, input.userId ?? null],
    );

    return mapSessionRow(result.rows[0]);
  }

  async getSession(sessionId: string): Promise<ChatSessionRecord | null> {
    const result = await this.pool.query<SessionRow>(
      `SELECT ${SESSION_COLUMNS}
       FROM chat_sessions s
       WHERE s.id = $1::uuid
       LIMIT 1`,
      [sessionId],
    );

    const row = result.rows[0];
    return row ? mapSessionRow(row) : null;
  }

  async listSessions(input: { limit: number; offset: number }): Promise<ChatSessionRecord[]> {
    const result = await this.pool.query<SessionRow>(
      `SELECT ${SESSION_COLUMNS}
       FROM chat_sessions s
       WHERE s.is_active
       ORDER BY s.updated_at DESC
       LIMIT $1 OFFSET $2`,
      [input.limit, input.offset],
    );

    return result.rows.map(mapSessionRow);
  }

  async renameSession(sessionId: string, title: string): Promise<ChatSessionRecord | null> {
    const result = await this.pool.query<{ id: string }>(
      `UPDATE chat_sessions
       SET title = $2,
           updated_at = CURRENT_TIMESTAMP
       WHERE id = $1::uuid
       RETURNING id::text`,
      [sessionId, title],
    );

    if ((result.rowCount ?? 0) === 0) {
      return null;
    }

    return this.getSession(sessionId);
  }

  async deleteSession(sessionId: string): Promise<boolean> {
    const result = await this.pool.query(`DELETE FROM chat_sessions WHERE id = $1::uuid`, [
      sessionId,
    ]);
    return (result.rowCount ?? 0) > 0;
  }

  async getConversationHistory(input: { sessionId: string; limit: number }): Promise<ContextTurn[]> {
    const limit = Math.min(Math.max(0, input.limit), MAX_HISTORY_MESSAGES);
    if (limit === 0) {
      return [];
    }

    const result = await this.pool.query<{ role: string; content: string }>(
      `SELECT role, content
       FROM messages
       WHERE session_id = $1::uuid
       ORDER BY seq DESC
       LIMIT $2`,
      [input.sessionId, limit],
    );

    return result.rows
      .map((row) => ({ role: toChatRole(row.role), content: row.content }))
      .reverse();
  }

  async getSessionMessages(sessionId: string): Promise<StoredMessage[]> {
    const result = await this.pool.query<MessageRow>(
      `SELECT id::text,
              session_id::text,
              role,
              content,
              model_used,
              complexity_score,
              tokens_used,
              latency_ms,
              created_at,
              metadata
       FROM messages
       WHERE session_id = $1::uuid
       ORDER BY seq ASC`,
      [sessionId],
    );

    return result.rows.map(mapMessageRow);
  }

  async persistTurn(sessionId: string, records: TurnRecord[]): Promise<PersistTurnResult> {
    const client = await this.pool.connect();

    try {
      await client.query('BEGIN');

      const messageIds: string[] = [];
      for (const record of records) {
        const inserted = await client.query<{ id: string }>(
          `INSERT INTO messages (
             session_id,
             role,
             content,
             model_used,
             complexity_score,
             tokens_used,
             latency_ms,
             created_at,
             metadata
           )
           VALUES ($1::uuid, $2, $3, $4, $5, $6, $7, $8::timestamptz, $9::jsonb)
           RETURNING id::text`,
          [
            sessionId,
            record.role,
            record.content,
            record.modelUsed,
            record.complexityScore,
            record.tokenCount,
            record.latencyMs === null ? null : Math.round(record.latencyMs),
            record.timestamp,
            toJsonb(record.metadata),
          ],
        );
        messageIds.push(inserted.rows[0].id);
      }

      await client.query(
        `UPDATE chat_sessions
         SET updated_at = CURRENT_TIMESTAMP
         WHERE id = $1::uuid`,
        [sessionId],
      );

      await client.query('COMMIT');
      return { messageIds };
    } catch (error: unknown) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  async countMessages(sessionId: string): Promise<number> {
    const result = await this.pool.query<{ total: number }>(
      `SELECT count(*)::int AS total FROM messages WHERE session_id = $1::uuid`,
      [sessionId],
    );
    return result.rows[0]?.total ?? 0;
  }

  async saveSuggestions(input: {
    messageId: string;
    suggestions: FollowUpSuggestion[];
  }): Promise<void> {
    if (input.suggestions.length === 0) {
      return;
    }

    await this.pool.query(
      `INSERT INTO suggestions (message_id, suggestion_text, category, position)
       SELECT $1::uuid, item.text, item.category, item.position::smallint
       FROM unnest($2::text[], $3::text[], $4::int[]) AS item(text, category, position)`,
      [
        input.messageId,
        input.suggestions.map((suggestion) => suggestion.text),
        input.suggestions.map((suggestion) => suggestion.category),
        input.suggestions.map((_suggestion, index) => index),
      ],
    );
  }

  async getSuggestions(messageId: string): Promise<FollowUpSuggestion[]> {
    const result = await this.pool.query<{ suggestion_text: string; category: string | null }>(
      `SELECT suggestion_text, category
       FROM suggestions
       WHERE message_id = $1::uuid
       ORDER BY position ASC, created_at ASC`,
      [messageId],
    );

    return result.rows.map((row) => ({
      text: row.suggestion_text,
      category: toSuggestionCategory(row.category),
    }));
  }

  async checkHealth(): Promise<boolean> {
    const result = await this.pool.query<{ ok: number }>('SELECT 1 AS ok');
    return result.rows[0]?.ok === 1;
  }
}

function mapSessionRow(row: SessionRow): ChatSessionRecord {
  return {
    id: row.id,
    userId: row.user_id,
    title: row.title,
    createdAt: coerceTimestamp(row.created_at),
    updatedAt: coerceTimestamp(row.updated_at),
    isActive: row.is_active,
    messageCount: row.message_count ?? 0,
    lastMessage: buildMessagePreview(row.last_message),
  };
}

function mapMessageRow(row: MessageRow): StoredMessage {
  return {
    id: row.id,
    sessionId: row.session_id,
    role: toChatRole(row.role),
    content: row.content,
    modelUsed: row.model_used,
    complexityScore: row.complexity_score,
    tokenCount: row.tokens_used,
    latencyMs: row.latency_ms,
    timestamp: coerceTimestamp(row.created_at),
    metadata: fromJsonbObject(row.metadata),
  };
}

function toChatRole(value: string): ChatRole {
  return value === 'assistant' ? 'assistant' : 'user';
}

function toSuggestionCategory(value: string | null): SuggestionCategory {
  if (value === 'clarification' || value === 'related_topic') {
    return value;
  }
  return 'follow_up';
}
