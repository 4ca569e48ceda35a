// src/services/ToolDispatcher.ts
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../utils/logger.js';
import {
  AppError,
  ErrorCode,
  InvariantViolationError,
  TurnCancelledError,
  errorMessage,
  type ErrorCodeValue,
} from '../utils/errors.js';
import { storageCall } from '../utils/async.js';
import { type TaskData, type TaskStore, type TaskUpdateFields } from '../types/index.js';
import { TOOL_NAME as CREATE_TASK } from '../tools/create_task_params.js';
import { TOOL_NAME as LIST_TASKS } from '../tools/list_tasks_params.js';
import { TOOL_NAME as UPDATE_TASK } from '../tools/update_task_params.js';
import { TOOL_NAME as COMPLETE_TASK } from '../tools/complete_task_params.js';
import { TOOL_NAME as DELETE_TASK } from '../tools/delete_task_params.js';
import {
  type ClarifyReason,
  type DispatchOutcome,
  type MutatingAction,
  type RecoverableErrorCode,
  type RefAction,
  type ResolvedIntent,
  type TaskAction,
  type TaskRef,
  type TurnRecord,
} from './ChatServiceTypes.js';

export interface ToolDispatcherOptions {
  store: TaskStore;
  storageTimeoutMs: number;
}

export interface DispatchOptions {
  signal?: AbortSignal;
}

type RefIntent = Extract<ResolvedIntent, { action: RefAction }>;

const TOOL_FOR_ACTION: Record<MutatingAction, string> = {
  create: CREATE_TASK,
  complete: COMPLETE_TASK,
  delete: DELETE_TASK,
  update: UPDATE_TASK,
};

const CLARIFY_CODES: Record<ClarifyReason['code'], ErrorCodeValue> = {
  slot_missing: ErrorCode.SlotMissing,
  title_too_long: ErrorCode.SlotInvalid,
  intent_unrecognized: ErrorCode.IntentUnrecognized,
  classification_malformed: ErrorCode.ClassificationMalformed,
};

/**
 * Taxonomy code of an outcome that stands for a recovered failure; undefined
 * for outcomes that did what was asked, and for statements.
 */
export function recoveredErrorCode(outcome: DispatchOutcome): ErrorCodeValue | undefined {
  switch (outcome.kind) {
    case 'ambiguous':
      return ErrorCode.ReferenceAmbiguous;
    case 'not_found':
      return ErrorCode.ReferenceNotFound;
    case 'clarify':
      return CLARIFY_CODES[outcome.reason.code];
    case 'tool_failure':
      return outcome.error_code;
    case 'cancelled':
      return ErrorCode.TurnCancelled;
    default:
      return undefined;
  }
}

export function isRecoverableStoreError(error: unknown): boolean {
  return !(error instanceof InvariantViolationError) && !(error instanceof TurnCancelledError);
}

/**
 * Builds the tool_failure outcome for an error raised while serving a turn.
 * Storage errors keep their code; anything else is reported as internal.
 */
export function toolFailure(action: TaskAction | 'classify' | 'turn', error: unknown): DispatchOutcome {
  const errorId = uuidv4();
  let code: RecoverableErrorCode = ErrorCode.InternalServerError;
  if (error instanceof AppError) {
    if (error.errorCode === ErrorCode.StorageUnavailable) code = ErrorCode.StorageUnavailable;
    else if (error.errorCode === ErrorCode.ClassificationTimeout) code = ErrorCode.ClassificationTimeout;
  }
  logger.error({ err: error, errorId, action }, `[ToolDispatcher] ${action} failed with ${code}`);
  return { kind: 'tool_failure', action, error_code: code, error_id: errorId, cause: errorMessage(error) };
}

/**
 * The only component that calls the Task Store. Performs at most one mutating
 * call per intent, re-reading the target task immediately before mutating it.
 */
export class ToolDispatcher {
  private readonly store: TaskStore;
  private readonly storageTimeoutMs: number;

  constructor(options: ToolDispatcherOptions) {
    this.store = options.store;
    this.storageTimeoutMs = options.storageTimeoutMs;
  }

  public async dispatch(userId: string, intent: ResolvedIntent, options: DispatchOptions = {}): Promise<DispatchOutcome> {
    try {
      switch (intent.action) {
        case 'clarify':
          return { kind: 'clarify', reason: intent.reason };
        case 'reject':
          return { kind: 'rejected', reason: intent.reason };
        case 'list': {
          const tasks = await this.read(() => this.store.list(userId, intent.filter), options.signal);
          logger.info(`[ToolDispatcher] Listed ${tasks.length} ${intent.filter} task(s) for user ${userId}`);
          return { kind: 'listed', filter: intent.filter, tasks };
        }
        case 'create': {
          this.throwIfAborted(options.signal);
          const task = await this.mutate(() => this.store.create(userId, intent.title, intent.description ?? null));
          logger.info(`[ToolDispatcher] Created task ${task.task_id} for user ${userId}`);
          return { kind: 'success', action: 'create', affected_task: task, after_state: task };
        }
        case 'complete':
        case 'delete':
        case 'update':
          return await this.dispatchRef(userId, intent, options.signal);
      }
    } catch (error: unknown) {
      if (error instanceof TurnCancelledError) {
        logger.info(`[ToolDispatcher] ${intent.action} cancelled before any store call was issued`);
        return { kind: 'cancelled' };
      }
      if (!isRecoverableStoreError(error)) throw error;
      return toolFailure(intent.action === 'clarify' || intent.action === 'reject' ? 'turn' : intent.action, error);
    }
  }

  /**
   * Derives the tool-role record that makes this outcome referable by later
   * turns. Outcomes that reference no task yield undefined.
   */
  public turnRecordFor(outcome: DispatchOutcome): TurnRecord | undefined {
    switch (outcome.kind) {
      case 'success':
        return {
          tool: TOOL_FOR_ACTION[outcome.action],
          action: outcome.action,
          status: 'ok',
          task_ids: [outcome.affected_task.task_id],
        };
      case 'listed':
        return { tool: LIST_TASKS, action: 'list', status: 'ok', task_ids: outcome.tasks.map((t) => t.task_id) };
      case 'ambiguous':
        return {
          tool: null,
          action: outcome.action,
          status: 'ambiguous',
          task_ids: outcome.candidates.map((c) => c.task_id),
        };
      default:
        return undefined;
    }
  }

  private async dispatchRef(userId: string, intent: RefIntent, signal?: AbortSignal): Promise<DispatchOutcome> {
    const ref = intent.task_ref;
    if (ref.kind === 'unresolved') {
      if (ref.reason.code === 'ambiguous') {
        return { kind: 'ambiguous', action: intent.action, reference: ref.mention, candidates: ref.reason.candidates };
      }
      return { kind: 'not_found', action: intent.action, reference: ref.mention, reason: ref.reason.code };
    }

    // Read-validate-then-mutate: the snapshot the reference was resolved
    // against may be stale by now.
    const before = await this.read(() => this.store.get(userId, ref.task_id), signal);
    if (!before) {
      logger.info(`[ToolDispatcher] Task ${ref.task_id} vanished before ${intent.action} for user ${userId}`);
      return { kind: 'not_found', action: intent.action, reference: ref.mention, reason: 'no_match' };
    }

    switch (intent.action) {
      case 'complete': {
        if (before.completed) {
          return { kind: 'success', action: 'complete', affected_task: before, before_state: before, after_state: before };
        }
        const after = await this.mutateTask(ref, signal, (taskId) => this.store.complete(userId, taskId));
        if (!after) return { kind: 'not_found', action: 'complete', reference: ref.mention, reason: 'no_match' };
        return { kind: 'success', action: 'complete', affected_task: after, before_state: before, after_state: after };
      }
      case 'delete': {
        const deleted = await this.mutateTask(ref, signal, (taskId) => this.store.delete(userId, taskId));
        if (!deleted) return { kind: 'not_found', action: 'delete', reference: ref.mention, reason: 'no_match' };
        return { kind: 'success', action: 'delete', affected_task: before, before_state: before, after_state: null };
      }
      case 'update': {
        const fields = this.updateFields(intent, before);
        const after = await this.mutateTask(ref, signal, (taskId) => this.store.update(userId, taskId, fields));
        if (!after) return { kind: 'not_found', action: 'update', reference: ref.mention, reason: 'no_match' };
        return { kind: 'success', action: 'update', affected_task: after, before_state: before, after_state: after };
      }
    }
  }

  private updateFields(intent: Extract<ResolvedIntent, { action: 'update' }>, before: TaskData): TaskUpdateFields {
    const fields: TaskUpdateFields = {};
    if (intent.new_title !== undefined) fields.title = intent.new_title;
    if (intent.new_description !== undefined) {
      fields.description =
        intent.description_mode === 'append' && before.description
          ? `${before.description}; ${intent.new_description}`
          : intent.new_description;
    }
    if (intent.completed !== undefined) fields.completed = intent.completed;
    return fields;
  }

  private async mutateTask<T>(
    ref: TaskRef,
    signal: AbortSignal | undefined,
    call: (taskId: number) => Promise<T>
  ): Promise<T> {
    if (ref.kind !== 'id') {
      throw new InvariantViolationError('Mutation reached with an unresolved task reference', { ref });
    }
    this.throwIfAborted(signal);
    return this.mutate(() => call(ref.task_id));
  }

  /** Idempotent store call: caller's signal applies, one retry on StorageUnavailable. */
  private read<T>(call: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    return storageCall(call, { timeoutMs: this.storageTimeoutMs, signal, idempotent: true });
  }

  /**
   * Mutating store call: never retried, and not bound to the caller's signal
   * once issued so the outcome can still be recorded.
   */
  private mutate<T>(call: () => Promise<T>): Promise<T> {
    return storageCall(call, { timeoutMs: this.storageTimeoutMs, idempotent: false });
  }

  private throwIfAborted(signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw new TurnCancelledError();
    }
  }
}
