// src/repositories/ConversationRepository.ts
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../utils/logger.js';
import { NotFoundError } from '../utils/errors.js';
import {
  type ConversationData,
  type ConversationLog,
  type HistoryWindow,
  type MessageData,
  type MessageRole,
} from '../types/index.js';
import { RepositoryBase, applyHistoryWindow, type Queryable } from './RepositoryBase.js';

/**
 * PostgreSQL-backed Conversation Log. Message ids come from a BIGSERIAL, so the
 * database is the only serialization point for concurrent appends.
 */
export class ConversationRepository extends RepositoryBase implements ConversationLog {
  constructor(db: Queryable) {
    super(db);
  }

  /**
   * Resumes the latest conversation of (user, session) or creates it. Concurrent
   * first turns both reach the insert; the unique (user_id, session_id) index
   * lets one of them win and the other re-reads the winner.
   */
  public async openConversation(userId: string, sessionId?: string | null): Promise<ConversationData> {
    const session = sessionId ?? null;
    const existing = await this.findOpenConversation(userId, session);
    if (existing) return existing;

    const conversationId = uuidv4();
    const created = await this.run(
      'create conversation',
      `INSERT INTO conversations (conversation_id, user_id, session_id, created_at, last_active_at)
       VALUES ($1, $2, $3, NOW(), NOW())
       ON CONFLICT DO NOTHING
       RETURNING *;`,
      [conversationId, userId, session]
    );
    if (created.rows.length > 0) {
      logger.info(`[ConversationRepository] Created conversation ${conversationId} for user ${userId}`);
      return this.mapRowToConversationData(created.rows[0]);
    }

    const winner = await this.findOpenConversation(userId, session);
    if (!winner) {
      throw new Error(`Conversation for user ${userId} conflicted on insert but could not be read back.`);
    }
    logger.debug(`[ConversationRepository] Joined concurrently created conversation ${winner.conversation_id}`);
    return winner;
  }

  private async findOpenConversation(userId: string, session: string | null): Promise<ConversationData | undefined> {
    const result = await this.run(
      'find open conversation',
      `SELECT * FROM conversations
       WHERE user_id = $1 AND session_id IS NOT DISTINCT FROM $2
       ORDER BY last_active_at DESC
       LIMIT 1`,
      [userId, session]
    );
    if (result.rows.length === 0) return undefined;
    return this.mapRowToConversationData(result.rows[0]);
  }

  public async getConversation(userId: string, conversationId: string): Promise<ConversationData | undefined> {
    const result = await this.run(
      'get conversation',
      `SELECT * FROM conversations WHERE user_id = $1 AND conversation_id::text = $2`,
      [userId, conversationId]
    );
    if (result.rows.length === 0) return undefined;
    return this.mapRowToConversationData(result.rows[0]);
  }

  public async append(userId: string, conversationId: string, role: MessageRole, content: string): Promise<number> {
    // Ownership check, last_active_at bump and insert happen in one statement.
    const sql = `
      WITH touched AS (
        UPDATE conversations SET last_active_at = NOW()
        WHERE user_id = $1 AND conversation_id::text = $2
        RETURNING conversation_id
      )
      INSERT INTO messages (conversation_id, role, content, created_at)
      SELECT conversation_id, $3, $4, clock_timestamp() FROM touched
      RETURNING message_id;
    `;
    const result = await this.run('append message', sql, [userId, conversationId, role, content]);
    if (result.rows.length === 0) {
      throw new NotFoundError(`Conversation ${conversationId} not found for user ${userId}.`);
    }
    const messageId = Number(result.rows[0].message_id);
    logger.debug(`[ConversationRepository] Appended ${role} message ${messageId} to ${conversationId}`);
    return messageId;
  }

  public async readRecent(userId: string, conversationId: string, window: HistoryWindow): Promise<MessageData[]> {
    // LIMIT NULL means no limit in PostgreSQL
    const result = await this.run(
      'read recent messages',
      `SELECT m.* FROM messages m
       JOIN conversations c ON c.conversation_id = m.conversation_id
       WHERE c.user_id = $1 AND m.conversation_id::text = $2
       ORDER BY m.message_id DESC
       LIMIT $3`,
      [userId, conversationId, window.maxMessages ?? null]
    );
    const oldestFirst = result.rows.map((row) => this.mapRowToMessageData(row)).reverse();
    return applyHistoryWindow(oldestFirst, window);
  }
}
