// src/tools/update_task_tool.ts
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { TOOL_NAME, TOOL_DESCRIPTION, TOOL_PARAMS, UpdateTaskArgs } from './update_task_params.js';
import { logger } from '../utils/logger.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';
import { type TaskUpdateFields } from '../types/index.js';
import { jsonResult, toMcpError, writeTasks, type ToolContext, type ToolResult } from './tool_context.js';

export const updateTaskTool = (server: McpServer, context: ToolContext): void => {
  const processRequest = async (args: UpdateTaskArgs): Promise<ToolResult> => {
    logger.info(`[${TOOL_NAME}] Received request for task ${args.task_id}`);
    try {
      const fields: TaskUpdateFields = {};
      if (args.title !== undefined) fields.title = args.title;
      if (args.description !== undefined) fields.description = args.description;
      if (args.completed !== undefined) fields.completed = args.completed;
      if (Object.keys(fields).length === 0) {
        throw new ValidationError('Provide at least one of title, description or completed.');
      }

      const task = await writeTasks(context, () => context.tasks.update(args.user_id, args.task_id, fields));
      if (!task) {
        throw new NotFoundError(`Task ${args.task_id} not found.`);
      }
      logger.info(`[${TOOL_NAME}] Updated task ${task.task_id}`);
      return jsonResult(task);
    } catch (error: unknown) {
      throw toMcpError(TOOL_NAME, error);
    }
  };

  server.tool(TOOL_NAME, TOOL_DESCRIPTION, TOOL_PARAMS.shape, processRequest);
};
