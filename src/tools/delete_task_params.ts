// src/tools/delete_task_params.ts
import { z } from 'zod';
import { TaskIdSchema, UserIdSchema } from './shared_params.js';

export const TOOL_NAME = 'delete_task';

export const TOOL_DESCRIPTION = `
Permanently deletes a task owned by the user.
`;

export const TOOL_PARAMS = z.object({
  user_id: UserIdSchema,
  task_id: TaskIdSchema,
});

export type DeleteTaskArgs = z.infer<typeof TOOL_PARAMS>;
