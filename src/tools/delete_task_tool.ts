// src/tools/delete_task_tool.ts
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { TOOL_NAME, TOOL_DESCRIPTION, TOOL_PARAMS, DeleteTaskArgs } from './delete_task_params.js';
import { logger } from '../utils/logger.js';
import { NotFoundError } from '../utils/errors.js';
import { jsonResult, toMcpError, writeTasks, type ToolContext, type ToolResult } from './tool_context.js';

export const deleteTaskTool = (server: McpServer, context: ToolContext): void => {
  const processRequest = async (args: DeleteTaskArgs): Promise<ToolResult> => {
    logger.info(`[${TOOL_NAME}] Received request to delete task ${args.task_id}`);
    try {
      const deleted = await writeTasks(context, () => context.tasks.delete(args.user_id, args.task_id));
      if (!deleted) {
        throw new NotFoundError(`Task ${args.task_id} not found.`);
      }
      logger.info(`[${TOOL_NAME}] Deleted task ${args.task_id}`);
      return jsonResult({ success: true, task_id: args.task_id });
    } catch (error: unknown) {
      throw toMcpError(TOOL_NAME, error);
    }
  };

  server.tool(TOOL_NAME, TOOL_DESCRIPTION, TOOL_PARAMS.shape, processRequest);
};
