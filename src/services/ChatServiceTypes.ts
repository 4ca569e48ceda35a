// src/services/ChatServiceTypes.ts
import { type ErrorCodeValue } from '../utils/errors.js';
import { type TaskData, type TaskFilter } from '../types/index.js';

export type MutatingAction = 'create' | 'complete' | 'delete' | 'update';
export type TaskAction = MutatingAction | 'list';
export type RefAction = 'complete' | 'delete' | 'update';

export interface TaskSummary {
  task_id: number;
  title: string;
  completed: boolean;
}

export type UnresolvedReason =
  | { code: 'no_match' }
  | { code: 'ambiguous'; candidates: TaskSummary[] }
  | { code: 'no_recent_reference' };

export type ResolutionVia = 'numeric' | 'ordinal' | 'anaphora' | 'description';

export type TaskRef =
  | { kind: 'id'; task_id: number; via: ResolutionVia; mention: string }
  | { kind: 'unresolved'; mention: string; reason: UnresolvedReason };

export type MissingSlot = 'title' | 'task_ref' | 'update_fields';

export type ClarifyReason =
  | { code: 'slot_missing'; action: TaskAction; slot: MissingSlot }
  | { code: 'title_too_long'; action: 'create' | 'update'; max_length: number }
  | { code: 'intent_unrecognized' }
  | { code: 'classification_malformed' };

export type RejectReason = { code: 'narration'; action?: TaskAction } | { code: 'empty_utterance' };

export type ResolvedIntent =
  | { action: 'create'; title: string; description?: string }
  | { action: 'list'; filter: TaskFilter }
  | { action: 'complete'; task_ref: TaskRef }
  | { action: 'delete'; task_ref: TaskRef }
  | {
      action: 'update';
      task_ref: TaskRef;
      new_title?: string;
      new_description?: string;
      description_mode: 'replace' | 'append';
      completed?: boolean;
    }
  | { action: 'clarify'; reason: ClarifyReason }
  | { action: 'reject'; reason: RejectReason };

export type RecoverableErrorCode = Extract<
  ErrorCodeValue,
  'StorageUnavailable' | 'ClassificationTimeout' | 'InternalServerError'
>;

export type DispatchOutcome =
  | {
      kind: 'success';
      action: MutatingAction;
      affected_task: TaskData;
      before_state?: TaskData;
      after_state: TaskData | null; // null once deleted
    }
  | { kind: 'listed'; filter: TaskFilter; tasks: TaskData[] }
  | { kind: 'not_found'; action: RefAction; reference: string; reason: 'no_match' | 'no_recent_reference' }
  | { kind: 'ambiguous'; action: RefAction; reference: string; candidates: TaskSummary[] }
  | { kind: 'clarify'; reason: ClarifyReason }
  | { kind: 'rejected'; reason: RejectReason }
  | { kind: 'tool_failure'; action: TaskAction | 'classify' | 'turn'; error_code: RecoverableErrorCode; error_id: string; cause: string }
  | { kind: 'cancelled' };

/**
 * Structured content of a tool-role message. `task_ids` keeps the order the
 * tasks were presented to the user, which positional references rely on.
 */
export interface TurnRecord {
  tool: string | null;
  action: TaskAction;
  status: 'ok' | 'ambiguous';
  task_ids: number[];
}

export type TurnPhase = 'Received' | 'Resolving' | 'Classified' | 'Dispatched' | 'Composed' | 'Logged';

export interface TurnInput {
  userId: string;
  utterance: string;
  conversationId?: string;
  sessionId?: string | null;
  signal?: AbortSignal;
}

export interface TurnResult {
  conversation_id: string | null;
  reply: string;
  intent: ResolvedIntent | null;
  outcome: DispatchOutcome;
  logged: boolean;
}
