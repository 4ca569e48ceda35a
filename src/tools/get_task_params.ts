// src/tools/get_task_params.ts
import { z } from 'zod';
import { TaskIdSchema, UserIdSchema } from './shared_params.js';

export const TOOL_NAME = 'get_task';

export const TOOL_DESCRIPTION = `
Retrieves a single task owned by the user.
Fails with an invalid-params error when no such task exists for that user.
`;

export const TOOL_PARAMS = z.object({
  user_id: UserIdSchema,
  task_id: TaskIdSchema,
});

export type GetTaskArgs = z.infer<typeof TOOL_PARAMS>;
