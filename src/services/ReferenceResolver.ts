// src/services/ReferenceResolver.ts
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { type MessageData, type TaskData } from '../types/index.js';
import { type TaskRef, type TaskSummary, type TurnRecord } from './ChatServiceTypes.js';

export const TurnRecordSchema = z.object({
  tool: z.string().nullable(),
  action: z.enum(['create', 'list', 'complete', 'delete', 'update']),
  status: z.enum(['ok', 'ambiguous']),
  task_ids: z.array(z.number().int().positive()),
});

/**
 * Everything a reference may be resolved against for one turn.
 */
export interface ResolutionContext {
  snapshot: TaskData[];
  // Most recent set of tasks shown to (or created for) the user, in display order
  recentSet?: { task_ids: number[]; numbered: boolean };
  // Task of the most recent turn that produced or referenced exactly one task
  lastSingle?: number;
}

const MIN_SCORE = 0.5;
const SCORE_EPSILON = 1e-9;

const ORDINALS: Record<string, number> = {
  first: 1,
  second: 2,
  third: 3,
  fourth: 4,
  fifth: 5,
  sixth: 6,
  seventh: 7,
  eighth: 8,
  ninth: 9,
  tenth: 10,
  last: -1,
};

const ANAPHORA =
  /^(?:it|that|this|the one|the task|the same one|(?:that|this) (?:one|task|item|todo|reminder)|the (?:one|task) (?:i|you) just (?:added|created|made|mentioned|completed|updated))$/;
const NUMERIC = /^(?:the\s+)?(?:(?:task|item|todo|to-do|reminder)\s+)?(?:(?:number|no\.?)\s*|#\s*)?(\d+)$/;
const ORDINAL =
  /^(?:the\s+)?(first|second|third|fourth|fifth|sixth|seventh|eighth|ninth|tenth|last|\d+(?:st|nd|rd|th))(?:\s+(?:one|task|item|todo|reminder))?(?:\s+(?:on|in)\s+(?:the|my)\s+list)?$/;

const STOPWORDS = new Set([
  'a',
  'an',
  'the',
  'my',
  'our',
  'that',
  'this',
  'to',
  'of',
  'for',
  'on',
  'in',
  'with',
  'and',
  'one',
  'task',
  'tasks',
  'item',
  'todo',
  'reminder',
  'about',
  'called',
  'named',
]);

function normalizeMention(mention: string): string {
  return mention
    .toLowerCase()
    .replace(/["“”‘’]/g, '')
    .replace(/[.!?,;:]+$/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((token) => token.length > 0 && !STOPWORDS.has(token));
}

function commonPrefixLength(a: string, b: string): number {
  let i = 0;
  while (i < a.length && i < b.length && a[i] === b[i]) i++;
  return i;
}

/** Equal tokens, simple plurals, or long shared stems ("grocery" / "groceries"). */
export function tokensMatch(a: string, b: string): boolean {
  if (a === b || a === `${b}s` || b === `${a}s`) return true;
  const required = Math.max(4, Math.min(a.length, b.length) - 2);
  return commonPrefixLength(a, b) >= required;
}

/**
 * Similarity of a descriptive mention to a task title in [0, 1]. 1 means every
 * mention token matches a title token and vice versa.
 */
export function similarity(mention: string, title: string): number {
  const mentionTokens = tokenize(mention);
  const titleTokens = tokenize(title);
  if (mentionTokens.length === 0 || titleTokens.length === 0) return 0;
  const mentionHits = mentionTokens.filter((m) => titleTokens.some((t) => tokensMatch(m, t))).length;
  if (mentionHits === 0) return 0;
  const titleHits = titleTokens.filter((t) => mentionTokens.some((m) => tokensMatch(m, t))).length;
  return 0.7 * (mentionHits / mentionTokens.length) + 0.3 * (titleHits / titleTokens.length);
}

function summarize(task: TaskData): TaskSummary {
  return { task_id: task.task_id, title: task.title, completed: task.completed };
}

/**
 * Maps mentions such as "task 1", "the second one", "that" or "the groceries one"
 * to a concrete task id. Pure: the same mention and context always give the same ref.
 */
export class ReferenceResolver {
  /**
   * Derives the positional set and the last single reference from tool-role
   * turn records in the (bounded, oldest-first) history.
   */
  public buildContext(history: MessageData[], snapshot: TaskData[]): ResolutionContext {
    const context: ResolutionContext = { snapshot };
    for (let i = history.length - 1; i >= 0; i--) {
      const message = history[i];
      if (message.role !== 'tool') continue;
      const record = this.parseRecord(message);
      if (!record) continue;

      const isSet = record.action === 'list' || record.action === 'create' || record.status === 'ambiguous';
      if (!context.recentSet && isSet) {
        context.recentSet = {
          task_ids: record.task_ids,
          numbered: record.action === 'list' || record.status === 'ambiguous',
        };
      }
      if (context.lastSingle === undefined && record.task_ids.length === 1) {
        context.lastSingle = record.task_ids[0];
      }
      if (context.recentSet && context.lastSingle !== undefined) break;
    }
    return context;
  }

  public resolve(mention: string, context: ResolutionContext): TaskRef {
    const normalized = normalizeMention(mention);

    if (ANAPHORA.test(normalized)) {
      if (context.lastSingle === undefined) {
        return { kind: 'unresolved', mention, reason: { code: 'no_recent_reference' } };
      }
      return { kind: 'id', task_id: context.lastSingle, via: 'anaphora', mention };
    }

    const numeric = NUMERIC.exec(normalized);
    if (numeric) {
      return this.resolveNumber(mention, parseInt(numeric[1], 10), context);
    }

    const ordinal = ORDINAL.exec(normalized);
    if (ordinal) {
      const word = ordinal[1];
      const position = ORDINALS[word] ?? parseInt(word, 10);
      return this.resolvePosition(mention, position, context);
    }

    return this.resolveDescription(mention, normalized, context);
  }

  /**
   * "task N" is a position when the most recent set was shown as a numbered
   * list long enough to contain N; otherwise it is a task id.
   */
  private resolveNumber(mention: string, n: number, context: ResolutionContext): TaskRef {
    const set = context.recentSet;
    if (set && set.numbered && n >= 1 && n <= set.task_ids.length) {
      return { kind: 'id', task_id: set.task_ids[n - 1], via: 'numeric', mention };
    }
    if (context.snapshot.some((task) => task.task_id === n)) {
      return { kind: 'id', task_id: n, via: 'numeric', mention };
    }
    return { kind: 'unresolved', mention, reason: { code: 'no_match' } };
  }

  private resolvePosition(mention: string, position: number, context: ResolutionContext): TaskRef {
    const set = context.recentSet;
    if (!set || set.task_ids.length === 0) {
      return { kind: 'unresolved', mention, reason: { code: 'no_recent_reference' } };
    }
    const index = position === -1 ? set.task_ids.length - 1 : position - 1;
    if (index < 0 || index >= set.task_ids.length) {
      return { kind: 'unresolved', mention, reason: { code: 'no_match' } };
    }
    return { kind: 'id', task_id: set.task_ids[index], via: 'ordinal', mention };
  }

  private resolveDescription(mention: string, normalized: string, context: ResolutionContext): TaskRef {
    const scored = context.snapshot
      .map((task) => ({ task, score: similarity(normalized, task.title) }))
      .filter((entry) => entry.score >= MIN_SCORE)
      .sort((a, b) => b.score - a.score || a.task.task_id - b.task.task_id);

    if (scored.length === 0) {
      return { kind: 'unresolved', mention, reason: { code: 'no_match' } };
    }

    const top = scored[0].score;
    const tied = scored.filter((entry) => top - entry.score < SCORE_EPSILON);
    if (tied.length > 1) {
      logger.debug(`[ReferenceResolver] "${mention}" is ambiguous between ${tied.length} tasks`);
      return {
        kind: 'unresolved',
        mention,
        reason: { code: 'ambiguous', candidates: tied.map((entry) => summarize(entry.task)) },
      };
    }
    return { kind: 'id', task_id: scored[0].task.task_id, via: 'description', mention };
  }

  private parseRecord(message: MessageData): TurnRecord | undefined {
    let parsed: unknown;
    try {
      parsed = JSON.parse(message.content);
    } catch (error: unknown) {
      logger.debug({ err: error }, `[ReferenceResolver] Skipping non-JSON tool message ${message.message_id}`);
      return undefined;
    }
    const result = TurnRecordSchema.safeParse(parsed);
    return result.success ? result.data : undefined;
  }
}
