// src/tools/list_tasks_params.ts
import { z } from 'zod';
import { UserIdSchema } from './shared_params.js';

export const TOOL_NAME = 'list_tasks';

export const TOOL_DESCRIPTION = `
Lists a user's tasks in creation order.
Optionally filters by status: 'all' (default), 'pending' or 'completed'.
`;

export const TaskFilterEnum = z.enum(['all', 'pending', 'completed']);

export const TOOL_PARAMS = z.object({
  user_id: UserIdSchema,
  filter: TaskFilterEnum.optional()
    .default('all')
    .describe("Optional. Which tasks to return: 'all', 'pending' or 'completed'. Defaults to 'all'."),
});

export type ListTasksArgs = z.infer<typeof TOOL_PARAMS>;
