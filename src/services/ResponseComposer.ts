// src/services/ResponseComposer.ts
import { type TaskData, type TaskFilter } from '../types/index.js';
import {
  type ClarifyReason,
  type DispatchOutcome,
  type MissingSlot,
  type RejectReason,
  type TaskAction,
} from './ChatServiceTypes.js';

const VERB: Record<TaskAction, string> = {
  create: 'add',
  list: 'list',
  complete: 'complete',
  delete: 'delete',
  update: 'update',
};

const EMPTY_LIST: Record<TaskFilter, string> = {
  all: "You don't have any tasks yet.",
  pending: "You don't have any pending tasks right now.",
  completed: "You haven't completed any tasks yet.",
};

/**
 * Deterministic outcome-to-text templates. No free-form generation: the same
 * outcome always yields the same reply.
 */
export class ResponseComposer {
  public compose(outcome: DispatchOutcome): string {
    switch (outcome.kind) {
      case 'success':
        return this.success(outcome);
      case 'listed':
        return this.listed(outcome.filter, outcome.tasks);
      case 'not_found':
        if (outcome.reason === 'no_recent_reference') {
          return `I'm not sure which task you mean by "${outcome.reference}". Could you tell me its number or title?`;
        }
        return `I couldn't find a task matching "${outcome.reference}".`;
      case 'ambiguous': {
        const lines = outcome.candidates.map((c, i) => `${i + 1}. ${c.title} (task #${c.task_id})`);
        return [
          `I found ${outcome.candidates.length} tasks matching "${outcome.reference}":`,
          ...lines,
          `Which one did you mean? Tell me the number, e.g. "${VERB[outcome.action]} task 1".`,
        ].join('\n');
      }
      case 'clarify':
        return this.clarify(outcome.reason);
      case 'rejected':
        return this.rejected(outcome.reason);
      case 'tool_failure': {
        const apology =
          outcome.error_code === 'ClassificationTimeout'
            ? "Sorry, I couldn't process that in time. Please try again."
            : 'Sorry, something went wrong on my end. Please try again in a moment.';
        return `${apology} (Error ID: ${outcome.error_id})`;
      }
      case 'cancelled':
        return 'The request was cancelled before any changes were made.';
    }
  }

  private success(outcome: Extract<DispatchOutcome, { kind: 'success' }>): string {
    const task = outcome.affected_task;
    switch (outcome.action) {
      case 'create':
        return `I've added "${task.title}" to your tasks (task #${task.task_id}).`;
      case 'complete':
        if (outcome.before_state?.completed) {
          return `"${task.title}" was already marked as complete.`;
        }
        return `Done! I've marked "${task.title}" as complete.`;
      case 'delete':
        return `I've deleted "${task.title}".`;
      case 'update': {
        const before = outcome.before_state ?? task;
        return [`I've updated "${before.title}".`, ...this.describeChanges(before, task)].join(' ');
      }
    }
  }

  private describeChanges(before: TaskData, after: TaskData): string[] {
    const changes: string[] = [];
    if (after.title !== before.title) {
      changes.push(`It's now called "${after.title}".`);
    }
    if (after.description !== before.description) {
      changes.push(after.description ? `Description: "${after.description}".` : 'The description was cleared.');
    }
    if (after.completed !== before.completed) {
      changes.push(after.completed ? 'It is now marked as complete.' : 'It is now marked as pending.');
    }
    return changes;
  }

  private listed(filter: TaskFilter, tasks: TaskData[]): string {
    if (tasks.length === 0) {
      return EMPTY_LIST[filter];
    }
    const header = filter === 'all' ? 'Here are your tasks:' : `Here are your ${filter} tasks:`;
    const lines = tasks.map((task, i) => `${i + 1}. ${task.title}${task.completed ? ' (completed)' : ''}`);
    return [header, ...lines].join('\n');
  }

  private clarify(reason: ClarifyReason): string {
    switch (reason.code) {
      case 'slot_missing':
        return this.askForSlot(reason.action, reason.slot);
      case 'title_too_long':
        return `That title is too long. Task titles can have at most ${reason.max_length} characters; could you give me a shorter one?`;
      case 'intent_unrecognized':
        return "Sorry, I didn't understand that. You can ask me to add, list, complete, update or delete tasks.";
      case 'classification_malformed':
        return "Sorry, I couldn't work out what you meant. Could you rephrase that?";
    }
  }

  private askForSlot(action: TaskAction, slot: MissingSlot): string {
    switch (slot) {
      case 'title':
        return 'What should the new task be called?';
      case 'task_ref':
        return `Which task would you like me to ${VERB[action]}? You can use its number or title.`;
      case 'update_fields':
        return 'What would you like to change about that task? You can give it a new title or description.';
    }
  }

  private rejected(reason: RejectReason): string {
    if (reason.code === 'empty_utterance') {
      return "I didn't catch that. What would you like to do with your tasks?";
    }
    if (reason.action) {
      const verb = VERB[reason.action];
      return `Thanks for the update! I haven't changed anything. If you'd like me to ${verb} a task, just ask, e.g. "${verb} task 1".`;
    }
    return "Thanks for the update! I haven't changed anything. Tell me what you'd like me to do with your tasks.";
  }
}
