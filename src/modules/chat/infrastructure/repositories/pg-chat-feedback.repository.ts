import { Inject, Injectable } from '@nestjs/common';
import { Pool } from 'pg';
import { coerceTimestamp } from '../../../../common/utils/date.utils';
import type {
  ChatFeedbackPort,
  FeedbackRecord,
  FeedbackStats,
  PersistFeedbackInput,
} from '../../application/ports/chat-feedback.port';
import { PG_POOL } from '../../application/ports/tokens';
import { FeedbackTargetError } from '../../domain/errors';
import { isSameUuid } from './shared';

interface FeedbackRow {
  id: string;
  session_id: string;
  message_id: string | null;
  rating: number;
  comment: string | null;
  was_helpful: boolean | null;
  created_at: Date;
}

const FEEDBACK_COLUMNS = `id::text,
       session_id::text,
       message_id::text,
       rating,
       comment,
       was_helpful,
       created_at`;

@Injectable()
export class PgChatFeedbackRepository implements ChatFeedbackPort {
  constructor(@Inject(PG_POOL) private readonly pool: Pool) {}

  async persistFeedback(input: PersistFeedbackInput): Promise<FeedbackRecord> {
    const client = await this.pool.connect();

    try {
      await client.query('BEGIN');

      const session = await client.query<{ id: string }>(
        `SELECT id::text FROM chat_sessions WHERE id = $1::uuid LIMIT 1`,
        [input.sessionId],
      );
      if (!session.rows[0]) {
        throw new FeedbackTargetError('session_not_found');
      }

      if (input.messageId) {
        const message = await client.query<{ session_id: string }>(
          `SELECT session_id::text
           FROM messages
           WHERE id = $1::uuid
           LIMIT 1`,
          [input.messageId],
        );

        if (!isSameUuid(message.rows[0]?.session_id, input.sessionId)) {
          throw new FeedbackTargetError('message_not_in_session');
        }
      }

      const result = await client.query<FeedbackRow>(
        `INSERT INTO feedback (
           session_id,
           message_id,
           rating,
           comment,
           was_helpful,
           request_id
         )
         VALUES ($1::uuid, $2::uuid, $3, $4, $5, $6)
         RETURNING ${FEEDBACK_COLUMNS}`,
        [
          input.sessionId,
          input.messageId ?? null,
          input.rating,
          input.comment ?? null,
          input.wasHelpful ?? null,
          input.requestId,
        ],
      );

      await client.query('COMMIT');
      return mapFeedbackRow(result.rows[0]);
    } catch (error: unknown) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  async getSessionFeedback(sessionId: string): Promise<FeedbackRecord[]> {
    const result = await this.pool.query<FeedbackRow>(
      `SELECT ${FEEDBACK_COLUMNS}
       FROM feedback
       WHERE session_id = $1::uuid
       ORDER BY created_at DESC`,
      [sessionId],
    );

    return result.rows.map(mapFeedbackRow);
  }

  async getFeedbackStats(): Promise<FeedbackStats> {
    const result = await this.pool.query<{
      total: number;
      average_rating: string | null;
      helpful: number;
    }>(
      `SELECT count(*)::int AS total,
              avg(rating) AS average_rating,
              count(*) FILTER (WHERE was_helpful)::int AS helpful
       FROM feedback`,
    );

    const row = result.rows[0];
    const total = row?.total ?? 0;
    const helpful = row?.helpful ?? 0;
    const average = row?.average_rating ? Number(row.average_rating) : 0;

    return {
      totalFeedback: total,
      averageRating: roundTo2(average),
      helpfulCount: helpful,
      helpfulRatio: total > 0 ? roundTo2(helpful / total) : 0,
    };
  }
}

function mapFeedbackRow(row: FeedbackRow): FeedbackRecord {
  return {
    id: row.id,
    sessionId: row.session_id,
    messageId: row.message_id,
    rating: row.rating,
    comment: row.comment,
    wasHelpful: row.was_helpful,
    createdAt: coerceTimestamp(row.created_at),
  };
}

function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}
