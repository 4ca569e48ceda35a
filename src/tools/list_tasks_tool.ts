// src/tools/list_tasks_tool.ts
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { TOOL_NAME, TOOL_DESCRIPTION, TOOL_PARAMS, ListTasksArgs } from './list_tasks_params.js';
import { logger } from '../utils/logger.js';
import { jsonResult, readTasks, toMcpError, type ToolContext, type ToolResult } from './tool_context.js';

export const listTasksTool = (server: McpServer, context: ToolContext): void => {
  const processRequest = async (args: ListTasksArgs): Promise<ToolResult> => {
    logger.info(`[${TOOL_NAME}] Received request for user ${args.user_id} with filter ${args.filter}`);
    try {
      const tasks = await readTasks(context, () => context.tasks.list(args.user_id, args.filter));
      return jsonResult(tasks);
    } catch (error: unknown) {
      throw toMcpError(TOOL_NAME, error);
    }
  };

  server.tool(TOOL_NAME, TOOL_DESCRIPTION, TOOL_PARAMS.shape, processRequest);
};
