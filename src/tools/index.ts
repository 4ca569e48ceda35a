import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { logger } from '../utils/index.js';
import { type ToolContext } from './tool_context.js';

import { createTaskTool } from './create_task_tool.js';
import { listTasksTool } from './list_tasks_tool.js';
import { getTaskTool } from './get_task_tool.js';
import { updateTaskTool } from './update_task_tool.js';
import { completeTaskTool } from './complete_task_tool.js';
import { deleteTaskTool } from './delete_task_tool.js';
import { sendChatMessageTool } from './send_chat_message_tool.js';

export type { ToolContext } from './tool_context.js';

/**
 * Register all defined tools with the MCP server instance.
 */
export function registerTools(server: McpServer, context: ToolContext): void {
  logger.info('Registering tools...');

  try {
    createTaskTool(server, context);
    listTasksTool(server, context);
    getTaskTool(server, context);
    updateTaskTool(server, context);
    completeTaskTool(server, context);
    deleteTaskTool(server, context);
    sendChatMessageTool(server, context);

    logger.info('All tools registered successfully.');
  } catch (error) {
    logger.error({ err: error }, 'Failed during synchronous tool registration');
    throw new Error(`Failed to register tools: ${error instanceof Error ? error.message : String(error)}`);
  }
}
