// src/tools/send_chat_message_tool.ts
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { TOOL_NAME, TOOL_DESCRIPTION, TOOL_PARAMS, SendChatMessageArgs } from './send_chat_message_params.js';
import { logger } from '../utils/logger.js';
import { jsonResult, toMcpError, type ToolContext, type ToolResult } from './tool_context.js';

export const sendChatMessageTool = (server: McpServer, context: ToolContext): void => {
  const processRequest = async (args: SendChatMessageArgs, extra: { signal: AbortSignal }): Promise<ToolResult> => {
    logger.info(`[${TOOL_NAME}] Received message for user ${args.user_id}`);
    try {
      const result = await context.chat.processTurn({
        userId: args.user_id,
        utterance: args.message,
        conversationId: args.conversation_id,
        sessionId: args.session_id ?? null,
        signal: extra.signal,
      });
      return jsonResult({
        conversation_id: result.conversation_id,
        reply: result.reply,
        intent: result.intent,
        outcome: result.outcome.kind,
        logged: result.logged,
      });
    } catch (error: unknown) {
      throw toMcpError(TOOL_NAME, error);
    }
  };

  server.tool(TOOL_NAME, TOOL_DESCRIPTION, TOOL_PARAMS.shape, processRequest);
};
