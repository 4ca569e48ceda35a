// src/__tests__/helpers.ts
import { type QueryResult } from 'pg';
import { InMemoryConversationLog, InMemoryTaskStore, type Queryable } from '../repositories/index.js';
import {
  ChatTurnService,
  IntentClassifier,
  ReferenceResolver,
  ResponseComposer,
  SynonymTable,
  ToolDispatcher,
  type IntentModel,
} from '../services/index.js';
import {
  type ConversationLog,
  type MessageData,
  type TaskData,
  type TaskFilter,
  type TaskStore,
  type TaskUpdateFields,
} from '../types/index.js';

type StoreMethod = keyof TaskStore;
const MUTATING_METHODS = new Set<StoreMethod>(['create', 'update', 'delete', 'complete']);

/**
 * TaskStore wrapper that records every call and can fail or stall selected
 * calls. Backed by the in-memory store.
 */
export class RecordingTaskStore implements TaskStore {
  public readonly inner = new InMemoryTaskStore();
  public readonly calls: { method: StoreMethod; args: unknown[] }[] = [];
  private readonly failures: { method: StoreMethod; error: Error }[] = [];
  private readonly stalls = new Set<StoreMethod>();

  public failNext(method: StoreMethod, error: Error): void {
    this.failures.push({ method, error });
  }

  /** Calls to `method` never settle until unstall() is called. */
  public stall(method: StoreMethod): void {
    this.stalls.add(method);
  }

  public unstall(method: StoreMethod): void {
    this.stalls.delete(method);
  }

  public mutatingCalls(): number {
    return this.calls.filter((call) => MUTATING_METHODS.has(call.method)).length;
  }

  public callsTo(method: StoreMethod): number {
    return this.calls.filter((call) => call.method === method).length;
  }

  public create(userId: string, title: string, description?: string | null): Promise<TaskData> {
    return this.record('create', [userId, title, description], () => this.inner.create(userId, title, description));
  }

  public list(userId: string, filter: TaskFilter): Promise<TaskData[]> {
    return this.record('list', [userId, filter], () => this.inner.list(userId, filter));
  }

  public get(userId: string, taskId: number): Promise<TaskData | undefined> {
    return this.record('get', [userId, taskId], () => this.inner.get(userId, taskId));
  }

  public update(userId: string, taskId: number, fields: TaskUpdateFields): Promise<TaskData | undefined> {
    return this.record('update', [userId, taskId, fields], () => this.inner.update(userId, taskId, fields));
  }

  public delete(userId: string, taskId: number): Promise<boolean> {
    return this.record('delete', [userId, taskId], () => this.inner.delete(userId, taskId));
  }

  public complete(userId: string, taskId: number): Promise<TaskData | undefined> {
    return this.record('complete', [userId, taskId], () => this.inner.complete(userId, taskId));
  }

  private async record<T>(method: StoreMethod, args: unknown[], call: () => Promise<T>): Promise<T> {
    this.calls.push({ method, args });
    const failureIndex = this.failures.findIndex((failure) => failure.method === method);
    if (failureIndex !== -1) {
      const [failure] = this.failures.splice(failureIndex, 1);
      throw failure.error;
    }
    if (this.stalls.has(method)) {
      return new Promise<T>(() => {});
    }
    return call();
  }
}

type ScriptStep = string | Error | 'stall';

/**
 * IntentModel returning scripted raw outputs in order. 'stall' never settles.
 */
export class ScriptedIntentModel implements IntentModel {
  public readonly received: { utterance: string; history: MessageData[] }[] = [];
  private readonly steps: ScriptStep[];

  constructor(steps: ScriptStep[]) {
    this.steps = [...steps];
  }

  public async classify(utterance: string, history: MessageData[]): Promise<string> {
    this.received.push({ utterance, history });
    const step = this.steps.shift();
    if (step === undefined) {
      throw new Error(`No scripted response left for "${utterance}"`);
    }
    if (step instanceof Error) throw step;
    if (step === 'stall') return new Promise<string>(() => {});
    return step;
  }
}

export interface TestEngine {
  chat: ChatTurnService;
  tasks: RecordingTaskStore;
  conversations: ConversationLog;
  classifier: IntentClassifier;
  dispatcher: ToolDispatcher;
  resolver: ReferenceResolver;
}

export interface TestEngineOptions {
  model?: IntentModel;
  conversations?: ConversationLog;
  classificationTimeoutMs?: number;
  storageTimeoutMs?: number;
}

export function buildEngine(options: TestEngineOptions = {}): TestEngine {
  const tasks = new RecordingTaskStore();
  const conversations = options.conversations ?? new InMemoryConversationLog();
  const resolver = new ReferenceResolver();
  const storageTimeoutMs = options.storageTimeoutMs ?? 1000;
  const classifier = new IntentClassifier({
    synonyms: SynonymTable.getDefault(),
    resolver,
    model: options.model,
    classificationTimeoutMs: options.classificationTimeoutMs ?? 1000,
  });
  const dispatcher = new ToolDispatcher({ store: tasks, storageTimeoutMs });
  const chat = new ChatTurnService({
    tasks,
    conversations,
    resolver,
    classifier,
    dispatcher,
    composer: new ResponseComposer(),
    historyWindow: { maxMessages: 10, maxTokens: 2000 },
    storageTimeoutMs,
  });
  return { chat, tasks, conversations, classifier, dispatcher, resolver };
}

export function makeTask(overrides: Partial<TaskData> & Pick<TaskData, 'task_id' | 'title'>): TaskData {
  return {
    user_id: 'user-1',
    description: null,
    completed: false,
    created_at: '2024-01-01T00:00:00.000Z',
    updated_at: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}

let nextMessageId = 1;

export function toolMessage(record: object, conversationId = 'conv-1'): MessageData {
  return {
    message_id: nextMessageId++,
    conversation_id: conversationId,
    role: 'tool',
    content: JSON.stringify(record),
    created_at: '2024-01-01T00:00:00.000Z',
  };
}

/**
 * Queryable that answers statements from a queue of canned results and keeps
 * every statement it was given.
 */
export class FakeDb implements Queryable {
  public readonly queries: { text: string; params: unknown[] }[] = [];
  private readonly responses: (QueryResult | Error)[] = [];

  public returns(rows: Record<string, unknown>[], rowCount: number = rows.length): this {
    this.responses.push({ command: '', rowCount, oid: 0, fields: [], rows });
    return this;
  }

  public fails(error: Error): this {
    this.responses.push(error);
    return this;
  }

  public async query(text: string, params: unknown[] = []): Promise<QueryResult> {
    this.queries.push({ text, params });
    const next = this.responses.shift();
    if (next === undefined) {
      throw new Error(`Unexpected query: ${text}`);
    }
    if (next instanceof Error) throw next;
    return next;
  }
}
