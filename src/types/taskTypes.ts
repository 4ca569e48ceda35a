/**
 * Filter accepted by TaskStore.list. 'pending' means not yet completed.
 */
export type TaskFilter = 'all' | 'pending' | 'completed';

// Matches the VARCHAR(255) title column.
export const MAX_TITLE_LENGTH = 255;

/**
 * A task as owned by the Task Store. `task_id` is unique within a `user_id`.
 */
export interface TaskData {
  task_id: number;
  user_id: string;
  title: string;
  description: string | null;
  completed: boolean;
  created_at: string; // ISO8601
  updated_at: string; // ISO8601, bumped on every mutation
}

/**
 * Fields an update may change. At least one must be present.
 */
export interface TaskUpdateFields {
  title?: string;
  description?: string | null;
  completed?: boolean;
}

/**
 * Contract of the Task Store Adapter. Every call is scoped by `userId`; no call
 * ever returns or mutates another user's task. `undefined` / `false` mean NotFound.
 * Failures of the backend surface as StorageUnavailableError.
 */
export interface TaskStore {
  create(userId: string, title: string, description?: string | null): Promise<TaskData>;
  list(userId: string, filter: TaskFilter): Promise<TaskData[]>;
  get(userId: string, taskId: number): Promise<TaskData | undefined>;
  update(userId: string, taskId: number, fields: TaskUpdateFields): Promise<TaskData | undefined>;
  delete(userId: string, taskId: number): Promise<boolean>;
  complete(userId: string, taskId: number): Promise<TaskData | undefined>;
}
