// src/services/ChatTurnService.ts
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../utils/logger.js';
import { InvariantViolationError, NotFoundError, TurnCancelledError } from '../utils/errors.js';
import { storageCall } from '../utils/async.js';
import {
  type ConversationData,
  type ConversationLog,
  type HistoryWindow,
  type MessageData,
  type TaskStore,
} from '../types/index.js';
import { type DispatchOutcome, type ResolvedIntent, type TurnInput, type TurnPhase, type TurnResult } from './ChatServiceTypes.js';
import { type IntentClassifier } from './IntentClassifier.js';
import { type ReferenceResolver } from './ReferenceResolver.js';
import { type ResponseComposer } from './ResponseComposer.js';
import { type ToolDispatcher, recoveredErrorCode, toolFailure } from './ToolDispatcher.js';

export interface ChatTurnServiceDeps {
  tasks: TaskStore;
  conversations: ConversationLog;
  resolver: ReferenceResolver;
  classifier: IntentClassifier;
  dispatcher: ToolDispatcher;
  composer: ResponseComposer;
  historyWindow: HistoryWindow;
  storageTimeoutMs: number;
}

/**
 * Runs one conversational turn:
 * Received -> Resolving -> Classified -> Dispatched -> Composed -> Logged.
 *
 * Recoverable failures short-circuit to Composed with an error reply and are
 * still Logged. Only InvariantViolationError, and a conversation id that does
 * not belong to the user, reach the caller.
 */
export class ChatTurnService {
  private readonly deps: ChatTurnServiceDeps;

  constructor(deps: ChatTurnServiceDeps) {
    this.deps = deps;
  }

  public async processTurn(input: TurnInput): Promise<TurnResult> {
    const turnId = uuidv4();
    const { userId } = input;
    const phase = (name: TurnPhase, detail = ''): void => {
      logger.debug(`[ChatTurnService] turn ${turnId} ${name}${detail ? `: ${detail}` : ''}`);
    };

    phase('Received');
    let received: { conversation: ConversationData; history: MessageData[] };
    try {
      received = await this.receive(input);
    } catch (error: unknown) {
      if (error instanceof InvariantViolationError || error instanceof NotFoundError) throw error;
      // Without a conversation there is nowhere to log the turn.
      const outcome = toolFailure('turn', error);
      return { conversation_id: null, reply: this.deps.composer.compose(outcome), intent: null, outcome, logged: false };
    }
    const { conversation, history } = received;

    let intent: ResolvedIntent | null = null;
    let outcome: DispatchOutcome;
    try {
      phase('Resolving');
      ({ intent, outcome } = await this.classifyAndDispatch(input, history, phase));
    } catch (error: unknown) {
      if (error instanceof InvariantViolationError) throw error;
      outcome = error instanceof TurnCancelledError ? { kind: 'cancelled' } : toolFailure('turn', error);
    }

    const reply = this.deps.composer.compose(outcome);
    phase('Composed');

    const logged = await this.logTurn(userId, conversation.conversation_id, outcome, reply);
    phase('Logged', logged ? 'ok' : 'failed');

    const summary = `[ChatTurnService] Turn for user ${userId} in conversation ${conversation.conversation_id} finished with ${outcome.kind}`;
    const recovered = recoveredErrorCode(outcome);
    if (recovered) {
      logger.warn(`${summary} (recovered ${recovered})`);
    } else {
      logger.info(summary);
    }
    return { conversation_id: conversation.conversation_id, reply, intent, outcome, logged };
  }

  /**
   * Opens the conversation, reads the bounded history and only then appends the
   * user message, so the history never contains the current utterance.
   */
  private async receive(input: TurnInput): Promise<{ conversation: ConversationData; history: MessageData[] }> {
    const conversation = await this.openConversation(input);
    const conversationId = conversation.conversation_id;
    const history = await this.read(() =>
      this.deps.conversations.readRecent(input.userId, conversationId, this.deps.historyWindow)
    );
    await this.write(() => this.deps.conversations.append(input.userId, conversationId, 'user', input.utterance));
    return { conversation, history };
  }

  private async classifyAndDispatch(
    input: TurnInput,
    history: MessageData[],
    phase: (name: TurnPhase, detail?: string) => void
  ): Promise<{ intent: ResolvedIntent | null; outcome: DispatchOutcome }> {
    const { userId, utterance, signal } = input;
    const snapshot = await this.read(() => this.deps.tasks.list(userId, 'all'), signal);
    const context = this.deps.resolver.buildContext(history, snapshot);

    let intent: ResolvedIntent;
    try {
      intent = await this.deps.classifier.classify(utterance, context, history, signal);
    } catch (error: unknown) {
      if (error instanceof InvariantViolationError || error instanceof TurnCancelledError) throw error;
      return { intent: null, outcome: toolFailure('classify', error) };
    }
    phase('Classified', intent.action);

    const outcome = await this.deps.dispatcher.dispatch(userId, intent, { signal });
    phase('Dispatched', outcome.kind);
    return { intent, outcome };
  }

  /**
   * Messages of a conversation owned by the user, oldest first.
   */
  public async getHistory(userId: string, conversationId: string, window: HistoryWindow): Promise<MessageData[]> {
    const conversation = await this.read(() => this.deps.conversations.getConversation(userId, conversationId));
    if (!conversation) {
      throw new NotFoundError(`Conversation ${conversationId} not found.`);
    }
    return this.read(() => this.deps.conversations.readRecent(userId, conversationId, window));
  }

  private async openConversation(input: TurnInput): Promise<ConversationData> {
    const { userId, conversationId } = input;
    if (conversationId) {
      const existing = await this.read(() => this.deps.conversations.getConversation(userId, conversationId));
      if (!existing) {
        logger.warn(`[ChatTurnService] Conversation ${conversationId} not found for user ${userId}`);
        throw new NotFoundError(`Conversation ${conversationId} not found.`);
      }
      return existing;
    }
    // Not idempotent: may insert a new conversation.
    return this.write(() => this.deps.conversations.openConversation(userId, input.sessionId ?? null));
  }

  /**
   * Appends the turn record (when the outcome references tasks) and the reply.
   * Runs regardless of cancellation so the log matches the task state.
   */
  private async logTurn(userId: string, conversationId: string, outcome: DispatchOutcome, reply: string): Promise<boolean> {
    const record = this.deps.dispatcher.turnRecordFor(outcome);
    try {
      if (record) {
        await this.write(() =>
          this.deps.conversations.append(userId, conversationId, 'tool', JSON.stringify(record))
        );
      }
      await this.write(() => this.deps.conversations.append(userId, conversationId, 'assistant', reply));
      return true;
    } catch (error: unknown) {
      logger.error({ err: error }, `[ChatTurnService] Failed to log turn in conversation ${conversationId}`);
      return false;
    }
  }

  private read<T>(call: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    return storageCall(call, { timeoutMs: this.deps.storageTimeoutMs, signal, idempotent: true });
  }

  private write<T>(call: () => Promise<T>): Promise<T> {
    return storageCall(call, { timeoutMs: this.deps.storageTimeoutMs, idempotent: false });
  }
}
