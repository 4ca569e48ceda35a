export type MessageRole = 'user' | 'assistant' | 'tool';

export interface ConversationData {
  conversation_id: string; // UUID
  user_id: string;
  session_id: string | null;
  created_at: string;
  last_active_at: string;
}

export interface MessageData {
  message_id: number;
  conversation_id: string;
  role: MessageRole;
  content: string;
  created_at: string;
}

/**
 * Bounds for readRecent. When both are given the stricter one wins; the
 * newest messages are always the ones kept.
 */
export interface HistoryWindow {
  maxMessages?: number;
  maxTokens?: number;
}

/**
 * Append-only, per-conversation ordered message log. Appends are atomic and
 * a read reflects every append that completed before it.
 */
export interface ConversationLog {
  openConversation(userId: string, sessionId?: string | null): Promise<ConversationData>;
  getConversation(userId: string, conversationId: string): Promise<ConversationData | undefined>;
  append(userId: string, conversationId: string, role: MessageRole, content: string): Promise<number>;
  readRecent(userId: string, conversationId: string, window: HistoryWindow): Promise<MessageData[]>;
}
