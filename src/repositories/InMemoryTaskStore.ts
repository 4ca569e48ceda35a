// src/repositories/InMemoryTaskStore.ts
import { ValidationError } from '../utils/errors.js';
import { type TaskData, type TaskFilter, type TaskStore, type TaskUpdateFields } from '../types/index.js';
import { checkTitle } from './RepositoryBase.js';

/**
 * Process-local Task Store used with STORE_DRIVER=memory and in tests.
 * Returned tasks are copies; callers cannot reach the stored objects.
 */
export class InMemoryTaskStore implements TaskStore {
  private readonly tasksByUser = new Map<string, Map<number, TaskData>>();
  private nextTaskId = 1;
  private lastTimestamp = 0;

  public async create(userId: string, title: string, description?: string | null): Promise<TaskData> {
    const trimmed = checkTitle(title);
    const now = this.nextTimestamp();
    const task: TaskData = {
      task_id: this.nextTaskId++,
      user_id: userId,
      title: trimmed,
      description: description ?? null,
      completed: false,
      created_at: now,
      updated_at: now,
    };
    this.userTasks(userId).set(task.task_id, task);
    return { ...task };
  }

  public async list(userId: string, filter: TaskFilter): Promise<TaskData[]> {
    return [...this.userTasks(userId).values()]
      .filter((task) => filter === 'all' || task.completed === (filter === 'completed'))
      .sort((a, b) => a.task_id - b.task_id)
      .map((task) => ({ ...task }));
  }

  public async get(userId: string, taskId: number): Promise<TaskData | undefined> {
    const task = this.userTasks(userId).get(taskId);
    return task ? { ...task } : undefined;
  }

  public async update(userId: string, taskId: number, fields: TaskUpdateFields): Promise<TaskData | undefined> {
    if (fields.title === undefined && fields.description === undefined && fields.completed === undefined) {
      throw new ValidationError('At least one field must be provided to update a task.');
    }
    const title = fields.title === undefined ? undefined : checkTitle(fields.title);
    const task = this.userTasks(userId).get(taskId);
    if (!task) return undefined;

    if (title !== undefined) task.title = title;
    if (fields.description !== undefined) task.description = fields.description;
    if (fields.completed !== undefined) task.completed = fields.completed;
    task.updated_at = this.nextTimestamp();
    return { ...task };
  }

  public async delete(userId: string, taskId: number): Promise<boolean> {
    return this.userTasks(userId).delete(taskId);
  }

  public async complete(userId: string, taskId: number): Promise<TaskData | undefined> {
    return this.update(userId, taskId, { completed: true });
  }

  private userTasks(userId: string): Map<number, TaskData> {
    let tasks = this.tasksByUser.get(userId);
    if (!tasks) {
      tasks = new Map();
      this.tasksByUser.set(userId, tasks);
    }
    return tasks;
  }

  private nextTimestamp(): string {
    const millis = Math.max(Date.now(), this.lastTimestamp + 1);
    this.lastTimestamp = millis;
    return new Date(millis).toISOString();
  }
}
