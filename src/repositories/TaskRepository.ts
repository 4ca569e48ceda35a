// src/repositories/TaskRepository.ts
import { logger } from '../utils/logger.js';
import { ValidationError } from '../utils/errors.js';
import { type TaskData, type TaskFilter, type TaskStore, type TaskUpdateFields } from '../types/index.js';
import { RepositoryBase, checkTitle, type Queryable } from './RepositoryBase.js';

// updated_at must strictly increase even when two writes land in the same microsecond
const NEXT_UPDATED_AT = `GREATEST(clock_timestamp(), updated_at + INTERVAL '1 microsecond')`;

/**
 * PostgreSQL-backed Task Store. Every statement filters on user_id, so a task
 * owned by another user behaves exactly like a missing one.
 */
export class TaskRepository extends RepositoryBase implements TaskStore {
  constructor(db: Queryable) {
    super(db);
  }

  public async create(userId: string, title: string, description?: string | null): Promise<TaskData> {
    const trimmed = checkTitle(title);
    const sql = `
      INSERT INTO tasks (user_id, title, description, completed, created_at, updated_at)
      VALUES ($1, $2, $3, FALSE, clock_timestamp(), clock_timestamp())
      RETURNING *;
    `;
    const result = await this.run('create task', sql, [userId, trimmed, description ?? null]);
    if (result.rowCount !== 1) {
      throw new Error(`Failed to insert task for user ${userId}.`);
    }
    const created = this.mapRowToTaskData(result.rows[0]);
    logger.info(`[TaskRepository] Created task ${created.task_id} for user ${userId}`);
    return created;
  }

  public async list(userId: string, filter: TaskFilter): Promise<TaskData[]> {
    let sql = `SELECT * FROM tasks WHERE user_id = $1`;
    const params: unknown[] = [userId];
    if (filter === 'pending') {
      sql += ` AND completed = $2`;
      params.push(false);
    } else if (filter === 'completed') {
      sql += ` AND completed = $2`;
      params.push(true);
    }
    sql += ` ORDER BY task_id ASC`;

    const result = await this.run('list tasks', sql, params);
    logger.debug(`[TaskRepository] Found ${result.rows.length} tasks for user ${userId} (filter '${filter}')`);
    return result.rows.map((row) => this.mapRowToTaskData(row));
  }

  public async get(userId: string, taskId: number): Promise<TaskData | undefined> {
    const result = await this.run('get task', `SELECT * FROM tasks WHERE user_id = $1 AND task_id = $2`, [
      userId,
      taskId,
    ]);
    if (result.rows.length === 0) return undefined;
    return this.mapRowToTaskData(result.rows[0]);
  }

  public async update(userId: string, taskId: number, fields: TaskUpdateFields): Promise<TaskData | undefined> {
    const setClauses: string[] = [];
    const params: unknown[] = [userId, taskId];

    if (fields.title !== undefined) {
      params.push(checkTitle(fields.title));
      setClauses.push(`title = $${params.length}`);
    }
    if (fields.description !== undefined) {
      params.push(fields.description);
      setClauses.push(`description = $${params.length}`);
    }
    if (fields.completed !== undefined) {
      params.push(fields.completed);
      setClauses.push(`completed = $${params.length}`);
    }
    if (setClauses.length === 0) {
      throw new ValidationError('At least one field must be provided to update a task.');
    }
    setClauses.push(`updated_at = ${NEXT_UPDATED_AT}`);

    const sql = `UPDATE tasks SET ${setClauses.join(', ')} WHERE user_id = $1 AND task_id = $2 RETURNING *;`;
    const result = await this.run('update task', sql, params);
    if (result.rows.length === 0) return undefined;
    logger.info(`[TaskRepository] Updated task ${taskId} for user ${userId}`);
    return this.mapRowToTaskData(result.rows[0]);
  }

  public async delete(userId: string, taskId: number): Promise<boolean> {
    const result = await this.run('delete task', `DELETE FROM tasks WHERE user_id = $1 AND task_id = $2`, [
      userId,
      taskId,
    ]);
    const deleted = (result.rowCount ?? 0) > 0;
    if (deleted) {
      logger.info(`[TaskRepository] Deleted task ${taskId} for user ${userId}`);
    }
    return deleted;
  }

  public async complete(userId: string, taskId: number): Promise<TaskData | undefined> {
    const sql = `
      UPDATE tasks SET completed = TRUE, updated_at = ${NEXT_UPDATED_AT}
      WHERE user_id = $1 AND task_id = $2
      RETURNING *;
    `;
    const result = await this.run('complete task', sql, [userId, taskId]);
    if (result.rows.length === 0) return undefined;
    logger.info(`[TaskRepository] Completed task ${taskId} for user ${userId}`);
    return this.mapRowToTaskData(result.rows[0]);
  }
}
