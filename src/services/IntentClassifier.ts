// src/services/IntentClassifier.ts
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { ClassificationTimeoutError, withRetry, withTimeout } from '../utils/index.js';
import { MAX_TITLE_LENGTH, type MessageData, type TaskFilter } from '../types/index.js';
import { type ResolvedIntent, type TaskAction } from './ChatServiceTypes.js';
import { type ReferenceResolver, type ResolutionContext } from './ReferenceResolver.js';
import { type SynonymAction, type SynonymTable } from './SynonymTable.js';

/**
 * The language-model capability. Returns raw, untrusted text which is expected
 * (but not guaranteed) to be a JSON object describing one intent.
 */
export interface IntentModel {
  classify(utterance: string, history: MessageData[], signal: AbortSignal): Promise<string>;
}

export const ModelIntentSchema = z.object({
  action: z.string(),
  title: z.string().nullish(),
  description: z.string().nullish(),
  task_reference: z.string().nullish(),
  new_title: z.string().nullish(),
  new_description: z.string().nullish(),
  filter: z.enum(['all', 'pending', 'completed']).nullish(),
});

export type ModelIntent = z.infer<typeof ModelIntentSchema>;

/** Intent with its task mention still unresolved. */
type ExtractedIntent =
  | { action: 'create'; title: string | null; description?: string }
  | { action: 'list'; filter: TaskFilter }
  | { action: 'complete' | 'delete'; mention: string | null }
  | ({ action: 'update' } & UpdateSlots);

interface UpdateSlots {
  mention: string | null;
  new_title?: string;
  new_description?: string;
  description_mode: 'replace' | 'append';
  completed?: boolean;
}

export interface IntentClassifierOptions {
  synonyms: SynonymTable;
  resolver: ReferenceResolver;
  model?: IntentModel;
  classificationTimeoutMs: number;
}

const CREATE_FILLER =
  /^(?:(?:a|an|the|one|another)\s+)?(?:new\s+)?(?:task|todo|to-do|item|reminder|entry)s?\b\s*(?:(?:to|called|named|titled|for|that says|saying)\b|:|-)?\s*/i;
const LIST_SUFFIX = /\s+(?:to|on|onto|in|into)\s+(?:my|the)\s+(?:task\s+|todo\s+|to-do\s+)?(?:list|tasks|todos|to-dos)$/i;
const DESCRIPTION_SPLIT = /\s+(?:with\s+(?:a\s+|the\s+)?(?:description|note|details)(?:\s+of)?:?|description:|note:|details:)\s*/i;
const PENDING_WORDS = /\b(?:pending|incomplete|open|remaining|outstanding|unfinished|not\s+done|not\s+completed|left)\b/i;
const COMPLETED_WORDS = /\b(?:completed|complete|done|finished)\b/i;

function stripQuotes(text: string): string {
  const trimmed = text.trim();
  const match = /^["'“‘](.*)["'”’]$/.exec(trimmed);
  return (match ? match[1] : trimmed).trim();
}

function cleanUtterance(utterance: string): string {
  return utterance
    .replace(/\s+/g, ' ')
    .replace(/[\s.!?]+$/, '')
    .trim();
}

export function extractTitle(slot: string): { title: string | null; description?: string } {
  let text = slot;
  let description: string | undefined;
  const split = DESCRIPTION_SPLIT.exec(text);
  if (split) {
    description = stripQuotes(text.slice(split.index + split[0].length)) || undefined;
    text = text.slice(0, split.index);
  }
  text = text.replace(CREATE_FILLER, '').replace(LIST_SUFFIX, '');
  const title = stripQuotes(text);
  return { title: title.length > 0 ? title : null, description };
}

export function extractFilter(text: string): TaskFilter {
  if (PENDING_WORDS.test(text)) return 'pending';
  if (COMPLETED_WORDS.test(text)) return 'completed';
  return 'all';
}

/**
 * Splits an update slot ("that to include organic items", "task 2 to call dad")
 * into the task mention and the requested change.
 */
export function extractUpdate(slot: string): UpdateSlots {
  const rules: { regex: RegExp; apply: (m: RegExpExecArray) => UpdateSlots }[] = [
    {
      regex: /^(?:the\s+)?(?:description|notes?|details)\s+(?:of|for|on)\s+(.+?)\s+(?:to|as)\s+(.+)$/i,
      apply: (m) => ({ mention: m[1], new_description: stripQuotes(m[2]), description_mode: 'replace' }),
    },
    {
      regex: /^(?:the\s+)?(?:title|name)\s+(?:of|for|on)\s+(.+?)\s+(?:to|as)\s+(.+)$/i,
      apply: (m) => ({ mention: m[1], new_title: stripQuotes(m[2]), description_mode: 'replace' }),
    },
    {
      regex: /^(.+?)\s+(?:to\s+(?:also\s+)?include|to\s+also\s+have|so\s+it\s+includes|with\s+(?:a\s+)?note)\s+(.+)$/i,
      apply: (m) => ({ mention: m[1], new_description: stripQuotes(m[2]), description_mode: 'append' }),
    },
    {
      regex: /^(.+?)(?:'s)?\s+(?:description|notes?|details)\s+(?:to|as)\s+(.+)$/i,
      apply: (m) => ({ mention: m[1], new_description: stripQuotes(m[2]), description_mode: 'replace' }),
    },
    {
      regex: /^(.+?)(?:'s)?\s+(?:title|name)\s+(?:to|as)\s+(.+)$/i,
      apply: (m) => ({ mention: m[1], new_title: stripQuotes(m[2]), description_mode: 'replace' }),
    },
    {
      regex: /^(.+?)\s+(?:to|as|into)\s+(?:say\s+|read\s+)?(.+)$/i,
      apply: (m) => ({ mention: m[1], new_title: stripQuotes(m[2]), description_mode: 'replace' }),
    },
  ];
  for (const rule of rules) {
    const match = rule.regex.exec(slot);
    if (match) return rule.apply(match);
  }
  return { mention: slot, description_mode: 'replace' };
}

/**
 * Turns an utterance into a Resolved Intent. Deterministic synonym-table rules
 * run first; the optional model is only consulted when no rule recognises the
 * utterance, and its output is validated like any other untrusted input.
 */
export class IntentClassifier {
  private readonly synonyms: SynonymTable;
  private readonly resolver: ReferenceResolver;
  private readonly model?: IntentModel;
  private readonly classificationTimeoutMs: number;

  constructor(options: IntentClassifierOptions) {
    this.synonyms = options.synonyms;
    this.resolver = options.resolver;
    this.model = options.model;
    this.classificationTimeoutMs = options.classificationTimeoutMs;
  }

  /**
   * @throws ClassificationTimeoutError when the model timed out twice
   * @throws TurnCancelledError when the caller aborted while the model was running
   */
  public async classify(
    utterance: string,
    context: ResolutionContext,
    history: MessageData[],
    signal?: AbortSignal
  ): Promise<ResolvedIntent> {
    const cleaned = cleanUtterance(utterance);
    if (cleaned.length === 0) {
      return { action: 'reject', reason: { code: 'empty_utterance' } };
    }

    const imperative = this.synonyms.stripPoliteness(cleaned);
    if (imperative.length === 0) {
      return { action: 'clarify', reason: { code: 'intent_unrecognized' } };
    }

    const narration = this.synonyms.detectNarration(imperative);
    if (narration) {
      logger.debug(`[IntentClassifier] Treating first-person narration as a statement: "${imperative}"`);
      const action = narration.action ? this.toTaskAction(narration.action) : undefined;
      return { action: 'reject', reason: action ? { code: 'narration', action } : { code: 'narration' } };
    }

    const extracted = this.extractByRules(imperative);
    if (extracted) {
      return this.finalize(extracted, context);
    }

    if (!this.model) {
      return { action: 'clarify', reason: { code: 'intent_unrecognized' } };
    }
    return this.classifyWithModel(this.model, cleaned, context, history, signal);
  }

  private extractByRules(text: string): ExtractedIntent | undefined {
    const match = this.synonyms.match(text);
    if (!match) return undefined;
    logger.debug(`[IntentClassifier] Matched pattern "${match.pattern}" -> ${match.action}`);
    return this.fromAction(match.action, match.slot, text);
  }

  private fromAction(action: SynonymAction, slot: string | null, text: string): ExtractedIntent {
    switch (action) {
      case 'create':
        return { action: 'create', ...(slot ? extractTitle(slot) : { title: null }) };
      case 'list':
        return { action: 'list', filter: extractFilter(slot ?? text.replace(/^\S+/, '')) };
      case 'complete':
      case 'delete':
        return { action, mention: slot };
      case 'update':
        return slot ? { action: 'update', ...extractUpdate(slot) } : { action: 'update', mention: null, description_mode: 'replace' };
      case 'reopen':
        return { action: 'update', mention: slot, completed: false, description_mode: 'replace' };
    }
  }

  private finalize(extracted: ExtractedIntent, context: ResolutionContext): ResolvedIntent {
    switch (extracted.action) {
      case 'create':
        if (!extracted.title) {
          return { action: 'clarify', reason: { code: 'slot_missing', action: 'create', slot: 'title' } };
        }
        if (extracted.title.length > MAX_TITLE_LENGTH) {
          return { action: 'clarify', reason: { code: 'title_too_long', action: 'create', max_length: MAX_TITLE_LENGTH } };
        }
        return extracted.description
          ? { action: 'create', title: extracted.title, description: extracted.description }
          : { action: 'create', title: extracted.title };
      case 'list':
        return extracted;
      case 'complete':
      case 'delete':
        if (!extracted.mention) {
          return { action: 'clarify', reason: { code: 'slot_missing', action: extracted.action, slot: 'task_ref' } };
        }
        return { action: extracted.action, task_ref: this.resolver.resolve(extracted.mention, context) };
      case 'update': {
        if (!extracted.mention) {
          return { action: 'clarify', reason: { code: 'slot_missing', action: 'update', slot: 'task_ref' } };
        }
        const hasChange =
          !!extracted.new_title || !!extracted.new_description || extracted.completed !== undefined;
        if (!hasChange) {
          return { action: 'clarify', reason: { code: 'slot_missing', action: 'update', slot: 'update_fields' } };
        }
        if (extracted.new_title && extracted.new_title.length > MAX_TITLE_LENGTH) {
          return { action: 'clarify', reason: { code: 'title_too_long', action: 'update', max_length: MAX_TITLE_LENGTH } };
        }
        const intent: Extract<ResolvedIntent, { action: 'update' }> = {
          action: 'update',
          task_ref: this.resolver.resolve(extracted.mention, context),
          description_mode: extracted.description_mode,
        };
        if (extracted.new_title) intent.new_title = extracted.new_title;
        if (extracted.new_description) intent.new_description = extracted.new_description;
        if (extracted.completed !== undefined) intent.completed = extracted.completed;
        return intent;
      }
    }
  }

  private async classifyWithModel(
    model: IntentModel,
    utterance: string,
    context: ResolutionContext,
    history: MessageData[],
    signal?: AbortSignal
  ): Promise<ResolvedIntent> {
    // Classification is idempotent, so a timeout earns exactly one retry.
    const raw = await withRetry(
      () =>
        withTimeout((innerSignal) => model.classify(utterance, history, innerSignal), {
          timeoutMs: this.classificationTimeoutMs,
          signal,
          onTimeout: () => new ClassificationTimeoutError(`Intent model did not answer within ${this.classificationTimeoutMs}ms`),
        }),
      (error) => error instanceof ClassificationTimeoutError
    );

    const parsed = this.parseModelOutput(raw);
    if (!parsed) {
      logger.warn('[IntentClassifier] Model output was malformed; asking the user to rephrase');
      return { action: 'clarify', reason: { code: 'classification_malformed' } };
    }

    const action = this.synonyms.canonicalAction(parsed.action);
    if (!action) {
      return { action: 'clarify', reason: { code: 'intent_unrecognized' } };
    }

    let extracted: ExtractedIntent;
    switch (action) {
      case 'create': {
        const title = parsed.title ? extractTitle(parsed.title).title : null;
        extracted = { action: 'create', title, description: parsed.description ?? undefined };
        break;
      }
      case 'list':
        extracted = { action: 'list', filter: parsed.filter ?? 'all' };
        break;
      case 'complete':
      case 'delete':
        extracted = { action, mention: parsed.task_reference ?? null };
        break;
      case 'update':
      case 'reopen':
        extracted = {
          action: 'update',
          mention: parsed.task_reference ?? null,
          new_title: parsed.new_title ?? undefined,
          new_description: parsed.new_description ?? undefined,
          description_mode: 'replace',
          completed: action === 'reopen' ? false : undefined,
        };
        break;
    }
    return this.finalize(extracted, context);
  }

  /** Returns undefined for anything that is not a JSON object of the expected shape. */
  public parseModelOutput(raw: string): ModelIntent | undefined {
    const start = raw.indexOf('{');
    const end = raw.lastIndexOf('}');
    if (start === -1 || end <= start) return undefined;
    let json: unknown;
    try {
      json = JSON.parse(raw.slice(start, end + 1));
    } catch (error: unknown) {
      logger.debug({ err: error }, '[IntentClassifier] Model output is not valid JSON');
      return undefined;
    }
    const result = ModelIntentSchema.safeParse(json);
    return result.success ? result.data : undefined;
  }

  private toTaskAction(action: SynonymAction): TaskAction {
    return action === 'reopen' ? 'update' : action;
  }
}
