// src/repositories/InMemoryConversationLog.ts
import { v4 as uuidv4 } from 'uuid';
import { NotFoundError } from '../utils/errors.js';
import {
  type ConversationData,
  type ConversationLog,
  type HistoryWindow,
  type MessageData,
  type MessageRole,
} from '../types/index.js';
import { applyHistoryWindow } from './RepositoryBase.js';

export class InMemoryConversationLog implements ConversationLog {
  private readonly conversations = new Map<string, ConversationData>();
  private readonly messages = new Map<string, MessageData[]>();
  private nextMessageId = 1;

  public async openConversation(userId: string, sessionId?: string | null): Promise<ConversationData> {
    const session = sessionId ?? null;
    let latest: ConversationData | undefined;
    for (const conversation of this.conversations.values()) {
      if (conversation.user_id !== userId || conversation.session_id !== session) continue;
      // ISO strings of equal length compare chronologically
      if (!latest || conversation.last_active_at >= latest.last_active_at) {
        latest = conversation;
      }
    }
    if (latest) return { ...latest };

    const now = new Date().toISOString();
    const created: ConversationData = {
      conversation_id: uuidv4(),
      user_id: userId,
      session_id: session,
      created_at: now,
      last_active_at: now,
    };
    this.conversations.set(created.conversation_id, created);
    this.messages.set(created.conversation_id, []);
    return { ...created };
  }

  public async getConversation(userId: string, conversationId: string): Promise<ConversationData | undefined> {
    const conversation = this.conversations.get(conversationId);
    if (!conversation || conversation.user_id !== userId) return undefined;
    return { ...conversation };
  }

  public async append(userId: string, conversationId: string, role: MessageRole, content: string): Promise<number> {
    const conversation = this.conversations.get(conversationId);
    const log = this.messages.get(conversationId);
    if (!conversation || !log || conversation.user_id !== userId) {
      throw new NotFoundError(`Conversation ${conversationId} not found for user ${userId}.`);
    }
    const now = new Date().toISOString();
    const message: MessageData = {
      message_id: this.nextMessageId++,
      conversation_id: conversationId,
      role,
      content,
      created_at: now,
    };
    log.push(message);
    conversation.last_active_at = now;
    return message.message_id;
  }

  public async readRecent(userId: string, conversationId: string, window: HistoryWindow): Promise<MessageData[]> {
    const conversation = this.conversations.get(conversationId);
    if (!conversation || conversation.user_id !== userId) return [];
    const log = this.messages.get(conversationId) ?? [];
    return applyHistoryWindow(
      log.map((message) => ({ ...message })),
      window
    );
  }
}
