// src/tools/update_task_params.ts
import { z } from 'zod';
import { MAX_TITLE_LENGTH } from '../types/index.js';
import { TaskIdSchema, UserIdSchema } from './shared_params.js';

export const TOOL_NAME = 'update_task';

export const TOOL_DESCRIPTION = `
Updates a task's title, description and/or completion flag.
At least one of title, description or completed must be supplied.
Pass description: null to clear the description. Returns the updated task.
`;

export const TOOL_PARAMS = z.object({
  user_id: UserIdSchema,
  task_id: TaskIdSchema,
  title: z
    .string()
    .trim()
    .min(1, 'Task title cannot be empty.')
    .max(MAX_TITLE_LENGTH, `Task title cannot exceed ${MAX_TITLE_LENGTH} characters.`)
    .optional()
    .describe('Optional. The new title.'),
  description: z
    .string()
    .max(1024, 'Description cannot exceed 1024 characters.')
    .nullable()
    .optional()
    .describe('Optional. The new description, or null to clear it.'),
  completed: z.boolean().optional().describe('Optional. The new completion flag.'),
});

export type UpdateTaskArgs = z.infer<typeof TOOL_PARAMS>;
