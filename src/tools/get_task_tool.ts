// src/tools/get_task_tool.ts
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { TOOL_NAME, TOOL_DESCRIPTION, TOOL_PARAMS, GetTaskArgs } from './get_task_params.js';
import { logger } from '../utils/logger.js';
import { NotFoundError } from '../utils/errors.js';
import { jsonResult, readTasks, toMcpError, type ToolContext, type ToolResult } from './tool_context.js';

export const getTaskTool = (server: McpServer, context: ToolContext): void => {
  const processRequest = async (args: GetTaskArgs): Promise<ToolResult> => {
    logger.info(`[${TOOL_NAME}] Received request for task ${args.task_id}`);
    try {
      const task = await readTasks(context, () => context.tasks.get(args.user_id, args.task_id));
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
