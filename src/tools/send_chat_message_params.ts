// src/tools/send_chat_message_params.ts
import { z } from 'zod';
import { UserIdSchema } from './shared_params.js';

export const TOOL_NAME = 'send_chat_message';

export const TOOL_DESCRIPTION = `
Sends one natural-language message ("add a task to buy milk", "mark task 1 as done",
"delete that") to the task assistant and returns its reply.
Omit conversation_id to continue the latest conversation for the given session_id
(or start a new one). Returns the conversation_id, the reply and the recognised intent.
`;

export const TOOL_PARAMS = z.object({
  user_id: UserIdSchema,
  message: z.string().max(4000, 'Message cannot exceed 4000 characters.').describe('Required. The user utterance.'),
  conversation_id: z
    .string()
    .uuid('conversation_id must be a valid UUID if provided.')
    .optional()
    .describe('Optional. The conversation to continue.'),
  session_id: z
    .string()
    .min(1)
    .max(255)
    .optional()
    .describe('Optional. Client session used to find the conversation when conversation_id is omitted.'),
});

export type SendChatMessageArgs = z.infer<typeof TOOL_PARAMS>;
