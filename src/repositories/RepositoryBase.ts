// src/repositories/RepositoryBase.ts
import { type QueryResult } from 'pg';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { AppError, StorageUnavailableError, ValidationError, errorMessage } from '../utils/errors.js';
import {
  MAX_TITLE_LENGTH,
  type HistoryWindow,
  type MessageData,
  type TaskData,
  type ConversationData,
} from '../types/index.js';

/**
 * The slice of pg.Pool / pg.PoolClient the repositories use. Every write is a
 * single statement, so no repository needs to check out a client.
 */
export interface Queryable {
  query(text: string, params?: unknown[]): Promise<QueryResult>;
}

const timestamp = z.union([z.date(), z.string()]).transform((value) => (value instanceof Date ? value.toISOString() : value));

export const TaskRowSchema = z.object({
  task_id: z.coerce.number().int().positive(),
  user_id: z.string(),
  title: z.string(),
  description: z.string().nullable(),
  completed: z.boolean(),
  created_at: timestamp,
  updated_at: timestamp,
});

export const ConversationRowSchema = z.object({
  conversation_id: z.string(),
  user_id: z.string(),
  session_id: z.string().nullable(),
  created_at: timestamp,
  last_active_at: timestamp,
});

export const MessageRowSchema = z.object({
  message_id: z.coerce.number().int().positive(),
  conversation_id: z.string(),
  role: z.enum(['user', 'assistant', 'tool']),
  content: z.string(),
  created_at: timestamp,
});

/** Trimmed title, or ValidationError when it is empty or too long. */
export function checkTitle(title: string): string {
  const trimmed = title.trim();
  if (trimmed.length === 0) {
    throw new ValidationError('Task title cannot be empty.');
  }
  if (trimmed.length > MAX_TITLE_LENGTH) {
    throw new ValidationError(`Task title cannot exceed ${MAX_TITLE_LENGTH} characters.`);
  }
  return trimmed;
}

/** SQLSTATE of a pg driver error, when there is one. */
export function sqlState(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

// Class 22 (data exception) and 23 (integrity constraint violation) are the
// caller's data, not an unavailable store.
const REJECTED_DATA = /^2[23]/;

export class RepositoryBase {
  protected db: Queryable;

  constructor(db: Queryable) {
    this.db = db;
  }

  protected mapRowToTaskData(row: unknown): TaskData {
    return TaskRowSchema.parse(row);
  }

  protected mapRowToConversationData(row: unknown): ConversationData {
    return ConversationRowSchema.parse(row);
  }

  protected mapRowToMessageData(row: unknown): MessageData {
    return MessageRowSchema.parse(row);
  }

  /**
   * Runs a statement. Data the database rejects becomes ValidationError; any
   * other driver failure becomes StorageUnavailableError. AppErrors raised by
   * the repository itself pass through untouched.
   */
  protected async run(context: string, sql: string, params: unknown[]): Promise<QueryResult> {
    try {
      return await this.db.query(sql, params);
    } catch (error: unknown) {
      if (error instanceof AppError) throw error;
      const state = sqlState(error);
      if (state && REJECTED_DATA.test(state)) {
        logger.warn(`[${this.constructor.name}] ${context} rejected with SQLSTATE ${state}: ${errorMessage(error)}`);
        throw new ValidationError(`${context} rejected: ${errorMessage(error)}`, { sqlState: state });
      }
      logger.error({ err: error }, `[${this.constructor.name}] ${context} failed`);
      throw new StorageUnavailableError(`${context} failed: ${errorMessage(error)}`, { cause: errorMessage(error) });
    }
  }
}

/** Rough token estimate used for history budgets: ~4 characters per token. */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/**
 * Trims an oldest-first message list to the window, dropping the oldest
 * messages first. Messages are never altered.
 */
export function applyHistoryWindow(messages: MessageData[], window: HistoryWindow): MessageData[] {
  let kept = messages;
  if (window.maxMessages !== undefined && kept.length > window.maxMessages) {
    kept = kept.slice(kept.length - window.maxMessages);
  }
  if (window.maxTokens !== undefined) {
    let budget = window.maxTokens;
    let start = kept.length;
    while (start > 0) {
      const cost = estimateTokens(kept[start - 1].content);
      if (cost > budget) break;
      budget -= cost;
      start--;
    }
    kept = kept.slice(start);
  }
  return kept;
}
