// src/tools/create_task_params.ts
import { z } from 'zod';
import { MAX_TITLE_LENGTH } from '../types/index.js';
import { UserIdSchema } from './shared_params.js';

export const TOOL_NAME = 'create_task';

export const TOOL_DESCRIPTION = `
Creates a new task for a user.
Requires the owning user_id and a non-empty title; a description is optional.
Returns the created task, including its numeric task_id.
`;

export const TOOL_PARAMS = z.object({
  user_id: UserIdSchema,
  title: z
    .string()
    .trim()
    .min(1, 'Task title cannot be empty.')
    .max(MAX_TITLE_LENGTH, `Task title cannot exceed ${MAX_TITLE_LENGTH} characters.`)
    .describe(`Required. The title of the task (1-${MAX_TITLE_LENGTH} characters).`),
  description: z
    .string()
    .max(1024, 'Description cannot exceed 1024 characters.')
    .optional()
    .describe('Optional. Free-form details for the task (max 1024 characters).'),
});

export type CreateTaskArgs = z.infer<typeof TOOL_PARAMS>;
