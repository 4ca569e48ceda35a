import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerTools } from './tools/index.js';
import { logger } from './utils/index.js';
import { ConfigurationManager } from './config/ConfigurationManager.js';
import { DatabaseManager } from './db/DatabaseManager.js';
import {
  ConversationRepository,
  InMemoryConversationLog,
  InMemoryTaskStore,
  TaskRepository,
} from './repositories/index.js';
import {
  ChatTurnService,
  IntentClassifier,
  OpenAiIntentModel,
  ReferenceResolver,
  ResponseComposer,
  SynonymTable,
  ToolDispatcher,
  type IntentModel,
} from './services/index.js';
import { type ConversationLog, type HistoryWindow, type TaskStore } from './types/index.js';

export interface AppContext {
  tasks: TaskStore;
  conversations: ConversationLog;
  chat: ChatTurnService;
  historyWindow: HistoryWindow;
  storageTimeoutMs: number;
  close(): Promise<void>;
}

export interface AppContextOverrides {
  tasks?: TaskStore;
  conversations?: ConversationLog;
  // null disables the model fallback even when an API key is configured
  model?: IntentModel | null;
}

/**
 * Wires stores, the optional intent model and the chat services from the
 * configuration. Overrides replace individual collaborators (tests, embedding).
 */
export async function createAppContext(
  config: ConfigurationManager = ConfigurationManager.getInstance(),
  overrides: AppContextOverrides = {}
): Promise<AppContext> {
  let tasks = overrides.tasks;
  let conversations = overrides.conversations;
  let close = async (): Promise<void> => {};

  if (!tasks || !conversations) {
    if (config.getStoreDriver() === 'postgres') {
      const dbManager = await DatabaseManager.getInstance();
      const pool = dbManager.getPool();
      tasks ??= new TaskRepository(pool);
      conversations ??= new ConversationRepository(pool);
      close = () => dbManager.closeDb();
    } else {
      logger.warn('Using in-memory stores; tasks and conversations are lost on exit.');
      tasks ??= new InMemoryTaskStore();
      conversations ??= new InMemoryConversationLog();
    }
  }

  let model: IntentModel | undefined;
  if (overrides.model !== undefined) {
    model = overrides.model ?? undefined;
  } else {
    const apiKey = config.getOpenAiApiKey();
    if (apiKey) {
      model = new OpenAiIntentModel({ apiKey, baseURL: config.getOpenAiBaseUrl(), model: config.getIntentModel() });
    }
  }
  logger.info(`Intent model fallback is ${model ? 'enabled' : 'disabled'}`);

  const historyWindow: HistoryWindow = {
    maxMessages: config.getHistoryMaxMessages(),
    maxTokens: config.getHistoryMaxTokens(),
  };
  const storageTimeoutMs = config.getStorageTimeoutMs();
  const resolver = new ReferenceResolver();

  const chat = new ChatTurnService({
    tasks,
    conversations,
    resolver,
    classifier: new IntentClassifier({
      synonyms: SynonymTable.getDefault(),
      resolver,
      model,
      classificationTimeoutMs: config.getClassificationTimeoutMs(),
    }),
    dispatcher: new ToolDispatcher({ store: tasks, storageTimeoutMs }),
    composer: new ResponseComposer(),
    historyWindow,
    storageTimeoutMs,
  });

  return { tasks, conversations, chat, historyWindow, storageTimeoutMs, close };
}

/**
 * Creates and configures an MCP server instance with every tool registered.
 */
export function createServer(context: AppContext): McpServer {
  logger.info('Creating MCP server instance');

  const server = new McpServer({
    name: 'todo-intent-engine',
    version: '1.0.0',
  });

  registerTools(server, context);

  logger.info('MCP server instance created and tools registered successfully');
  return server;
}
