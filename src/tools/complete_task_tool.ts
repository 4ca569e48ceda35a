// src/tools/complete_task_tool.ts
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { TOOL_NAME, TOOL_DESCRIPTION, TOOL_PARAMS, CompleteTaskArgs } from './complete_task_params.js';
import { logger } from '../utils/logger.js';
import { NotFoundError } from '../utils/errors.js';
import { jsonResult, toMcpError, writeTasks, type ToolContext, type ToolResult } from './tool_context.js';

export const completeTaskTool = (server: McpServer, context: ToolContext): void => {
  const processRequest = async (args: CompleteTaskArgs): Promise<ToolResult> => {
    logger.info(`[${TOOL_NAME}] Received request for task ${args.task_id}`);
    try {
      const task = await writeTasks(context, () => context.tasks.complete(args.user_id, args.task_id));
      if (!task) {
        throw new NotFoundError(`Task ${args.task_id} not found.`);
      }
      return jsonResult(task);
    } catch (error: unknown) {
      throw toMcpError(TOOL_NAME, error);
    }
  };

  server.tool(TOOL_NAME, TOOL_DESCRIPTION, TOOL_PARAMS.shape, processRequest);
};
