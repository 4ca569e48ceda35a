// src/api/chatRoutes.ts
import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { logger } from '../utils/index.js';
import { UnauthorizedError, ValidationError } from '../utils/errors.js';
import { type HistoryWindow, type MessageData } from '../types/index.js';
import { type ChatTurnService } from '../services/ChatTurnService.js';

export const USER_ID_HEADER = 'x-user-id';

export const ChatRequestSchema = z.object({
  message: z.string().max(4000, 'message cannot exceed 4000 characters.'),
  conversation_id: z.string().uuid('conversation_id must be a valid UUID.').optional(),
  session_id: z.string().min(1).max(255).optional(),
});

const HistoryQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(200).optional(),
});

export interface ChatResponseBody {
  conversation_id: string | null;
  reply: string;
  intent: string | null;
  outcome: string;
  logged: boolean;
}

/**
 * The user id is set by the upstream authentication layer; a request without
 * one never reaches the engine.
 */
export function requireUserId(header: string | string[] | undefined): string {
  const value = Array.isArray(header) ? header[0] : header;
  const userId = value?.trim();
  if (!userId) {
    throw new UnauthorizedError(`Missing ${USER_ID_HEADER} header.`);
  }
  return userId;
}

function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError('Invalid request.', parsed.error.flatten());
  }
  return parsed.data;
}

export async function postChat(
  chat: ChatTurnService,
  userId: string,
  body: unknown,
  signal?: AbortSignal
): Promise<ChatResponseBody> {
  const request = parseOrThrow(ChatRequestSchema, body);
  const result = await chat.processTurn({
    userId,
    utterance: request.message,
    conversationId: request.conversation_id,
    sessionId: request.session_id ?? null,
    signal,
  });
  return {
    conversation_id: result.conversation_id,
    reply: result.reply,
    intent: result.intent?.action ?? null,
    outcome: result.outcome.kind,
    logged: result.logged,
  };
}

export async function getMessages(
  chat: ChatTurnService,
  userId: string,
  conversationId: string,
  query: unknown,
  defaultWindow: HistoryWindow
): Promise<MessageData[]> {
  if (!z.string().uuid().safeParse(conversationId).success) {
    throw new ValidationError(`Invalid conversation ID format: ${conversationId}`);
  }
  const { limit } = parseOrThrow(HistoryQuerySchema, query);
  const window: HistoryWindow = limit ? { maxMessages: limit } : { maxMessages: defaultWindow.maxMessages };
  return chat.getHistory(userId, conversationId, window);
}

export const chatRoutes = (chat: ChatTurnService, historyWindow: HistoryWindow): Router => {
  const router = Router();

  router.post('/chat', async (req: Request, res: Response, next: NextFunction) => {
    // Abort the turn when the client goes away before the reply is written.
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) controller.abort();
    });
    try {
      const userId = requireUserId(req.headers[USER_ID_HEADER]);
      logger.info(`[API] POST /api/chat called by user ${userId}`);
      res.json(await postChat(chat, userId, req.body, controller.signal));
    } catch (error) {
      next(error);
    }
  });

  router.get('/conversations/:conversationId/messages', async (req: Request, res: Response, next: NextFunction) => {
    const { conversationId } = req.params;
    try {
      const userId = requireUserId(req.headers[USER_ID_HEADER]);
      logger.info(`[API] GET /api/conversations/${conversationId}/messages called by user ${userId}`);
      res.json(await getMessages(chat, userId, conversationId, req.query, historyWindow));
    } catch (error) {
      next(error);
    }
  });

  return router;
};
