// src/services/__tests__/ToolDispatcher.test.ts
import { ToolDispatcher, recoveredErrorCode } from '../ToolDispatcher.js';
import { type DispatchOutcome, type TaskRef } from '../ChatServiceTypes.js';
import { InvariantViolationError, StorageUnavailableError } from '../../utils/errors.js';
import { makeTask, RecordingTaskStore } from '../../__tests__/helpers.js';

const USER = 'user-1';

function byId(taskId: number, mention = `task ${taskId}`): TaskRef {
  return { kind: 'id', task_id: taskId, via: 'numeric', mention };
}

describe('ToolDispatcher', () => {
  let store: RecordingTaskStore;
  let dispatcher: ToolDispatcher;

  beforeEach(() => {
    store = new RecordingTaskStore();
    dispatcher = new ToolDispatcher({ store, storageTimeoutMs: 1000 });
  });

  describe('non-acting intents', () => {
    it('should turn clarify and reject into outcomes without touching the store', async () => {
      const clarify = await dispatcher.dispatch(USER, {
        action: 'clarify',
        reason: { code: 'slot_missing', action: 'create', slot: 'title' },
      });
      const reject = await dispatcher.dispatch(USER, { action: 'reject', reason: { code: 'narration', action: 'complete' } });

      expect(clarify).toEqual({ kind: 'clarify', reason: { code: 'slot_missing', action: 'create', slot: 'title' } });
      expect(reject).toEqual({ kind: 'rejected', reason: { code: 'narration', action: 'complete' } });
      expect(store.calls).toHaveLength(0);
    });

    it('should report an ambiguous reference with every candidate and no store call', async () => {
      const candidates = [
        { task_id: 3, title: 'call mom', completed: false },
        { task_id: 4, title: 'call mom', completed: false },
      ];
      const outcome = await dispatcher.dispatch(USER, {
        action: 'delete',
        task_ref: { kind: 'unresolved', mention: 'the call mom task', reason: { code: 'ambiguous', candidates } },
      });

      expect(outcome).toEqual({ kind: 'ambiguous', action: 'delete', reference: 'the call mom task', candidates });
      expect(store.calls).toHaveLength(0);
    });

    it('should report an unresolved reference as not found', async () => {
      const outcome = await dispatcher.dispatch(USER, {
        action: 'complete',
        task_ref: { kind: 'unresolved', mention: 'that', reason: { code: 'no_recent_reference' } },
      });

      expect(outcome).toEqual({ kind: 'not_found', action: 'complete', reference: 'that', reason: 'no_recent_reference' });
      expect(store.calls).toHaveLength(0);
    });
  });

  describe('create and list', () => {
    it('should create a task with a null description when none is given', async () => {
      const outcome = await dispatcher.dispatch(USER, { action: 'create', title: 'buy groceries' });

      expect(outcome).toMatchObject({
        kind: 'success',
        action: 'create',
        affected_task: { task_id: 1, title: 'buy groceries', completed: false, description: null },
      });
      expect(store.calls).toEqual([{ method: 'create', args: [USER, 'buy groceries', null] }]);
    });

    it('should list with the requested filter', async () => {
      await store.inner.create(USER, 'buy groceries');
      await store.inner.create(USER, 'call mom');
      await store.inner.complete(USER, 1);

      const outcome = await dispatcher.dispatch(USER, { action: 'list', filter: 'pending' });

      expect(outcome).toMatchObject({ kind: 'listed', filter: 'pending', tasks: [{ task_id: 2, title: 'call mom' }] });
      expect(store.calls).toEqual([{ method: 'list', args: [USER, 'pending'] }]);
    });
  });

  describe('reference actions', () => {
    beforeEach(async () => {
      await store.inner.create(USER, 'buy groceries', 'milk');
    });

    it('should re-read the task and then complete it', async () => {
      const outcome = await dispatcher.dispatch(USER, { action: 'complete', task_ref: byId(1) });

      expect(store.calls.map((call) => call.method)).toEqual(['get', 'complete']);
      expect(outcome).toMatchObject({
        kind: 'success',
        action: 'complete',
        before_state: { completed: false },
        after_state: { task_id: 1, completed: true },
      });
    });

    it('should not mutate a task that is already complete', async () => {
      await store.inner.complete(USER, 1);

      const outcome = await dispatcher.dispatch(USER, { action: 'complete', task_ref: byId(1) });

      expect(store.calls.map((call) => call.method)).toEqual(['get']);
      expect(outcome).toMatchObject({ kind: 'success', action: 'complete', before_state: { completed: true } });
    });

    it('should delete a task and report the state it had', async () => {
      const outcome = await dispatcher.dispatch(USER, { action: 'delete', task_ref: byId(1) });

      expect(outcome).toMatchObject({
        kind: 'success',
        action: 'delete',
        affected_task: { task_id: 1, title: 'buy groceries' },
        after_state: null,
      });
      expect(await store.inner.get(USER, 1)).toBeUndefined();
    });

    it('should append to an existing description', async () => {
      const outcome = await dispatcher.dispatch(USER, {
        action: 'update',
        task_ref: byId(1, 'that'),
        new_description: 'organic items',
        description_mode: 'append',
      });

      expect(store.calls[1]).toEqual({ method: 'update', args: [USER, 1, { description: 'milk; organic items' }] });
      expect(outcome).toMatchObject({ kind: 'success', after_state: { description: 'milk; organic items' } });
    });

    it('should replace the description when appending to an empty one', async () => {
      await store.inner.create(USER, 'call mom');

      await dispatcher.dispatch(USER, {
        action: 'update',
        task_ref: byId(2),
        new_description: 'ask about Sunday',
        description_mode: 'append',
      });

      expect(store.calls[1]).toEqual({ method: 'update', args: [USER, 2, { description: 'ask about Sunday' }] });
    });

    it('should report a task that vanished since the snapshot as not found', async () => {
      const outcome = await dispatcher.dispatch(USER, { action: 'delete', task_ref: byId(42) });

      expect(outcome).toEqual({ kind: 'not_found', action: 'delete', reference: 'task 42', reason: 'no_match' });
      expect(store.mutatingCalls()).toBe(0);
    });

    it("should not reach another user's task", async () => {
      const outcome = await dispatcher.dispatch('user-2', { action: 'delete', task_ref: byId(1) });

      expect(outcome).toMatchObject({ kind: 'not_found' });
      expect(await store.inner.get(USER, 1)).toMatchObject({ title: 'buy groceries' });
    });
  });

  describe('storage failures', () => {
    beforeEach(async () => {
      await store.inner.create(USER, 'buy groceries');
    });

    it('should retry a failed read once', async () => {
      store.failNext('get', new StorageUnavailableError('connection reset'));

      const outcome = await dispatcher.dispatch(USER, { action: 'complete', task_ref: byId(1) });

      expect(store.callsTo('get')).toBe(2);
      expect(outcome).toMatchObject({ kind: 'success', action: 'complete' });
    });

    it('should give up after the read retry without mutating', async () => {
      store.failNext('get', new StorageUnavailableError('connection reset'));
      store.failNext('get', new StorageUnavailableError('connection reset'));

      const outcome = await dispatcher.dispatch(USER, { action: 'complete', task_ref: byId(1) });

      expect(outcome).toMatchObject({ kind: 'tool_failure', action: 'complete', error_code: 'StorageUnavailable' });
      expect(store.mutatingCalls()).toBe(0);
    });

    it('should never retry a failed mutation', async () => {
      store.failNext('complete', new StorageUnavailableError('connection reset'));

      const outcome = await dispatcher.dispatch(USER, { action: 'complete', task_ref: byId(1) });

      expect(store.callsTo('complete')).toBe(1);
      expect(outcome).toMatchObject({ kind: 'tool_failure', action: 'complete', error_code: 'StorageUnavailable' });
    });

    it('should turn a stalled mutation into StorageUnavailable', async () => {
      dispatcher = new ToolDispatcher({ store, storageTimeoutMs: 20 });
      store.stall('delete');

      const outcome = await dispatcher.dispatch(USER, { action: 'delete', task_ref: byId(1) });

      expect(outcome).toMatchObject({ kind: 'tool_failure', action: 'delete', error_code: 'StorageUnavailable' });
      expect(store.callsTo('delete')).toBe(1);
    });

    it('should report unexpected store errors as internal with an error id', async () => {
      store.failNext('create', new Error('disk full'));

      const outcome = await dispatcher.dispatch(USER, { action: 'create', title: 'call mom' });

      expect(outcome).toMatchObject({
        kind: 'tool_failure',
        action: 'create',
        error_code: 'InternalServerError',
        cause: 'disk full',
      });
      expect(outcome.kind === 'tool_failure' && outcome.error_id).toMatch(/^[0-9a-f-]{36}$/);
    });

    it('should let an invariant violation escape', async () => {
      store.failNext('get', new InvariantViolationError('corrupt row'));

      await expect(dispatcher.dispatch(USER, { action: 'complete', task_ref: byId(1) })).rejects.toBeInstanceOf(
        InvariantViolationError
      );
    });
  });

  describe('cancellation', () => {
    beforeEach(async () => {
      await store.inner.create(USER, 'buy groceries');
    });

    it('should not issue any call once the signal has fired', async () => {
      const controller = new AbortController();
      controller.abort();

      const created = await dispatcher.dispatch(USER, { action: 'create', title: 'call mom' }, { signal: controller.signal });
      const listed = await dispatcher.dispatch(USER, { action: 'list', filter: 'all' }, { signal: controller.signal });

      expect(created).toEqual({ kind: 'cancelled' });
      expect(listed).toEqual({ kind: 'cancelled' });
      expect(store.calls).toHaveLength(0);
    });

    it('should abandon the pre-mutation read and skip the mutation when aborted', async () => {
      const controller = new AbortController();
      store.stall('get');

      const pending = dispatcher.dispatch(USER, { action: 'delete', task_ref: byId(1) }, { signal: controller.signal });
      controller.abort();

      expect(await pending).toEqual({ kind: 'cancelled' });
      expect(store.mutatingCalls()).toBe(0);
      expect(await store.inner.get(USER, 1)).toBeDefined();
    });
  });

  describe('turnRecordFor', () => {
    const task = makeTask({ task_id: 7, title: 'buy groceries' });

    it('should record the affected task of a success', () => {
      const outcome: DispatchOutcome = { kind: 'success', action: 'create', affected_task: task, after_state: task };
      expect(dispatcher.turnRecordFor(outcome)).toEqual({
        tool: 'create_task',
        action: 'create',
        status: 'ok',
        task_ids: [7],
      });
    });

    it('should record listed tasks in display order', () => {
      const other = makeTask({ task_id: 3, title: 'call mom' });
      expect(dispatcher.turnRecordFor({ kind: 'listed', filter: 'all', tasks: [task, other] })).toEqual({
        tool: 'list_tasks',
        action: 'list',
        status: 'ok',
        task_ids: [7, 3],
      });
    });

    it('should record ambiguity candidates without a tool', () => {
      const outcome: DispatchOutcome = {
        kind: 'ambiguous',
        action: 'delete',
        reference: 'call mom',
        candidates: [
          { task_id: 3, title: 'call mom', completed: false },
          { task_id: 4, title: 'call mom', completed: false },
        ],
      };
      expect(dispatcher.turnRecordFor(outcome)).toEqual({ tool: null, action: 'delete', status: 'ambiguous', task_ids: [3, 4] });
    });

    it('should record nothing for outcomes without tasks', () => {
      expect(dispatcher.turnRecordFor({ kind: 'cancelled' })).toBeUndefined();
      expect(
        dispatcher.turnRecordFor({ kind: 'not_found', action: 'delete', reference: 'x', reason: 'no_match' })
      ).toBeUndefined();
    });
  });

  describe('recoveredErrorCode', () => {
    it('should map recovered outcomes to their taxonomy code', () => {
      expect(recoveredErrorCode({ kind: 'not_found', action: 'delete', reference: 'x', reason: 'no_match' })).toBe(
        'ReferenceNotFound'
      );
      expect(recoveredErrorCode({ kind: 'ambiguous', action: 'delete', reference: 'x', candidates: [] })).toBe(
        'ReferenceAmbiguous'
      );
      expect(recoveredErrorCode({ kind: 'clarify', reason: { code: 'classification_malformed' } })).toBe(
        'ClassificationMalformed'
      );
      expect(
        recoveredErrorCode({ kind: 'clarify', reason: { code: 'slot_missing', action: 'create', slot: 'title' } })
      ).toBe('SlotMissing');
      expect(
        recoveredErrorCode({ kind: 'clarify', reason: { code: 'title_too_long', action: 'update', max_length: 255 } })
      ).toBe('SlotInvalid');
      expect(recoveredErrorCode({ kind: 'cancelled' })).toBe('TurnCancelled');
    });

    it('should leave successes and statements alone', () => {
      expect(recoveredErrorCode({ kind: 'listed', filter: 'all', tasks: [] })).toBeUndefined();
      expect(recoveredErrorCode({ kind: 'rejected', reason: { code: 'narration' } })).toBeUndefined();
    });
  });
});
