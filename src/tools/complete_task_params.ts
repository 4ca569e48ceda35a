// src/tools/complete_task_params.ts
import { z } from 'zod';
import { TaskIdSchema, UserIdSchema } from './shared_params.js';

export const TOOL_NAME = 'complete_task';

export const TOOL_DESCRIPTION = `
Marks a task as completed. Completing an already completed task is a no-op that
returns the task unchanged.
`;

export const TOOL_PARAMS = z.object({
  user_id: UserIdSchema,
  task_id: TaskIdSchema,
});

export type CompleteTaskArgs = z.infer<typeof TOOL_PARAMS>;
