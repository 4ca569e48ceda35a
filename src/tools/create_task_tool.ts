// src/tools/create_task_tool.ts
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { TOOL_NAME, TOOL_DESCRIPTION, TOOL_PARAMS, CreateTaskArgs } from './create_task_params.js';
import { logger } from '../utils/logger.js';
import { jsonResult, toMcpError, writeTasks, type ToolContext, type ToolResult } from './tool_context.js';

export const createTaskTool = (server: McpServer, context: ToolContext): void => {
  const processRequest = async (args: CreateTaskArgs): Promise<ToolResult> => {
    logger.info(`[${TOOL_NAME}] Received request for user ${args.user_id}`);
    try {
      const task = await writeTasks(context, () => context.tasks.create(args.user_id, args.title, args.description));
      logger.info(`[${TOOL_NAME}] Created task ${task.task_id}`);
      return jsonResult(task);
    } catch (error: unknown) {
      throw toMcpError(TOOL_NAME, error);
    }
  };

  server.tool(TOOL_NAME, TOOL_DESCRIPTION, TOOL_PARAMS.shape, processRequest);
};
