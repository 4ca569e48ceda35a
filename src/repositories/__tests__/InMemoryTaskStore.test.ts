// src/repositories/__tests__/InMemoryTaskStore.test.ts
import { InMemoryTaskStore } from '../InMemoryTaskStore.js';
import { ValidationError } from '../../utils/errors.js';

describe('InMemoryTaskStore', () => {
  let store: InMemoryTaskStore;

  beforeEach(() => {
    store = new InMemoryTaskStore();
  });

  it('should create pending tasks with trimmed titles and increasing ids', async () => {
    const first = await store.create('user-1', '  buy groceries ');
    const second = await store.create('user-1', 'call mom', 'about Sunday');

    expect(first).toMatchObject({ task_id: 1, title: 'buy groceries', description: null, completed: false });
    expect(second).toMatchObject({ task_id: 2, description: 'about Sunday' });
    expect(first.created_at).toBe(first.updated_at);
  });

  it('should reject an empty title', async () => {
    await expect(store.create('user-1', '   ')).rejects.toBeInstanceOf(ValidationError);
  });

  it('should reject a title longer than 255 characters and keep nothing', async () => {
    await expect(store.create('user-1', 'x'.repeat(256))).rejects.toThrow(
      new ValidationError('Task title cannot exceed 255 characters.')
    );
    const accepted = await store.create('user-1', 'y'.repeat(255));

    await expect(store.update('user-1', accepted.task_id, { title: 'z'.repeat(300) })).rejects.toBeInstanceOf(
      ValidationError
    );
    expect(await store.list('user-1', 'all')).toEqual([accepted]);
  });

  it('should filter lists by completion and order them by id', async () => {
    await store.create('user-1', 'buy groceries');
    await store.create('user-1', 'call mom');
    await store.create('user-1', 'renew passport');
    await store.complete('user-1', 2);

    expect((await store.list('user-1', 'all')).map((t) => t.task_id)).toEqual([1, 2, 3]);
    expect((await store.list('user-1', 'pending')).map((t) => t.task_id)).toEqual([1, 3]);
    expect((await store.list('user-1', 'completed')).map((t) => t.task_id)).toEqual([2]);
  });

  it("should keep every user's tasks apart", async () => {
    await store.create('user-1', 'buy groceries');

    expect(await store.list('user-2', 'all')).toEqual([]);
    expect(await store.get('user-2', 1)).toBeUndefined();
    expect(await store.update('user-2', 1, { title: 'stolen' })).toBeUndefined();
    expect(await store.delete('user-2', 1)).toBe(false);
    expect(await store.complete('user-2', 1)).toBeUndefined();
    expect(await store.get('user-1', 1)).toMatchObject({ title: 'buy groceries', completed: false });
  });

  it('should bump updated_at on every mutation', async () => {
    const created = await store.create('user-1', 'buy groceries');
    const renamed = await store.update('user-1', 1, { title: 'buy food' });
    const completed = await store.complete('user-1', 1);

    if (!renamed || !completed) throw new Error('task vanished');
    expect(renamed.updated_at > created.updated_at).toBe(true);
    expect(completed.updated_at > renamed.updated_at).toBe(true);
    expect(completed.created_at).toBe(created.created_at);
  });

  it('should require at least one field and a non-empty title on update', async () => {
    await store.create('user-1', 'buy groceries');

    await expect(store.update('user-1', 1, {})).rejects.toBeInstanceOf(ValidationError);
    await expect(store.update('user-1', 1, { title: ' ' })).rejects.toBeInstanceOf(ValidationError);
  });

  it('should clear a description with null', async () => {
    await store.create('user-1', 'buy groceries', 'milk');

    expect(await store.update('user-1', 1, { description: null })).toMatchObject({ description: null });
  });

  it('should hand out copies of stored tasks', async () => {
    const task = await store.create('user-1', 'buy groceries');
    task.title = 'mutated outside';

    expect(await store.get('user-1', 1)).toMatchObject({ title: 'buy groceries' });
  });

  it('should report whether a delete removed anything', async () => {
    await store.create('user-1', 'buy groceries');

    expect(await store.delete('user-1', 1)).toBe(true);
    expect(await store.delete('user-1', 1)).toBe(false);
  });
});
