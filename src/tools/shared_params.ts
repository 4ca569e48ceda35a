// src/tools/shared_params.ts
import { z } from 'zod';

export const UserIdSchema = z
  .string()
  .trim()
  .min(1, 'user_id cannot be empty.')
  .max(255)
  .describe('Required. Identifier of the authenticated user who owns the tasks.');

export const TaskIdSchema = z
  .number()
  .int('task_id must be an integer.')
  .positive('task_id must be positive.')
  .describe('Required. The numeric identifier of the task.');
