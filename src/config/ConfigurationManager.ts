import { logger } from '../utils/logger.js';

export type StoreDriver = 'postgres' | 'memory';

// Define the structure for all configurations managed
interface ManagedConfigs {
  // PostgreSQL connection details
  pgHost: string;
  pgPort: number;
  pgUser: string;
  pgPassword?: string;
  pgDatabase: string;

  storeDriver: StoreDriver;

  // LLM fallback classifier; disabled while no API key is configured
  openAiApiKey?: string;
  openAiBaseUrl?: string;
  intentModel: string;

  classificationTimeoutMs: number;
  storageTimeoutMs: number;
  historyMaxMessages: number;
  historyMaxTokens: number;

  httpPort?: number;

  // Run db/schema.sql on startup
  forceSchemaRun: boolean;
}

/**
 * Centralized configuration management for all services.
 * Implements singleton pattern to ensure consistent configuration.
 */
export class ConfigurationManager {
  private static instance: ConfigurationManager | null = null;

  public config: ManagedConfigs;

  private constructor() {
    this.config = {
      pgHost: 'localhost',
      pgPort: 5432,
      pgUser: 'todo_user',
      pgPassword: undefined, // Avoid default passwords in code
      pgDatabase: 'todo_db',
      storeDriver: 'postgres',
      openAiApiKey: undefined,
      openAiBaseUrl: undefined,
      intentModel: 'gpt-4o-mini',
      classificationTimeoutMs: 8000,
      storageTimeoutMs: 5000,
      historyMaxMessages: 10,
      historyMaxTokens: 2000,
      httpPort: undefined,
      forceSchemaRun: false,
    };

    this.loadEnvironmentOverrides();
  }

  /**
   * Get the singleton instance of ConfigurationManager.
   */
  public static getInstance(): ConfigurationManager {
    if (!ConfigurationManager.instance) {
      ConfigurationManager.instance = new ConfigurationManager();
    }
    return ConfigurationManager.instance;
  }

  /**
   * Drops the cached instance so the next getInstance() re-reads the environment.
   */
  public static reset(): void {
    ConfigurationManager.instance = null;
  }

  // --- Getters for specific configurations ---

  public getPgHost(): string {
    return this.config.pgHost;
  }
  public getPgPort(): number {
    return this.config.pgPort;
  }
  public getPgUser(): string {
    return this.config.pgUser;
  }
  public getPgPassword(): string | undefined {
    return this.config.pgPassword;
  }
  public getPgDatabase(): string {
    return this.config.pgDatabase;
  }
  public getStoreDriver(): StoreDriver {
    return this.config.storeDriver;
  }
  public getOpenAiApiKey(): string | undefined {
    return this.config.openAiApiKey;
  }
  public getOpenAiBaseUrl(): string | undefined {
    return this.config.openAiBaseUrl;
  }
  public getIntentModel(): string {
    return this.config.intentModel;
  }
  public getClassificationTimeoutMs(): number {
    return this.config.classificationTimeoutMs;
  }
  public getStorageTimeoutMs(): number {
    return this.config.storageTimeoutMs;
  }
  public getHistoryMaxMessages(): number {
    return this.config.historyMaxMessages;
  }
  public getHistoryMaxTokens(): number {
    return this.config.historyMaxTokens;
  }
  public getHttpPort(): number | undefined {
    return this.config.httpPort;
  }
  public getForceSchemaRun(): boolean {
    return this.config.forceSchemaRun;
  }

  /**
   * Load configuration overrides from environment variables.
   */
  private loadEnvironmentOverrides(): void {
    logger.info('Loading environment variable overrides for configuration...');

    if (process.env.PGHOST) {
      this.config.pgHost = process.env.PGHOST;
      logger.info(`Overriding pgHost from env: ${this.config.pgHost}`);
    }
    this.config.pgPort = this.readPositiveInt('PGPORT', this.config.pgPort);
    if (process.env.PGUSER) {
      this.config.pgUser = process.env.PGUSER;
      logger.info(`Overriding pgUser from env: ${this.config.pgUser}`);
    }
    // Password is only ever read from the environment
    if (process.env.PGPASSWORD) {
      this.config.pgPassword = process.env.PGPASSWORD;
      logger.info('Overriding pgPassword from env.'); // Don't log the password itself
    }
    if (process.env.PGDATABASE) {
      this.config.pgDatabase = process.env.PGDATABASE;
      logger.info(`Overriding pgDatabase from env: ${this.config.pgDatabase}`);
    }

    const driver = process.env.STORE_DRIVER;
    if (driver === 'postgres' || driver === 'memory') {
      this.config.storeDriver = driver;
      logger.info(`Overriding storeDriver from env: ${driver}`);
    } else if (driver) {
      logger.warn(`Invalid STORE_DRIVER environment variable: ${driver}. Using default ${this.config.storeDriver}.`);
    }

    if (process.env.OPENAI_API_KEY) {
      this.config.openAiApiKey = process.env.OPENAI_API_KEY;
      logger.info('Overriding openAiApiKey from env.');
    }
    if (process.env.OPENAI_BASE_URL) {
      this.config.openAiBaseUrl = process.env.OPENAI_BASE_URL;
      logger.info(`Overriding openAiBaseUrl from env: ${this.config.openAiBaseUrl}`);
    }
    if (process.env.INTENT_MODEL) {
      this.config.intentModel = process.env.INTENT_MODEL;
      logger.info(`Overriding intentModel from env: ${this.config.intentModel}`);
    }

    this.config.classificationTimeoutMs = this.readPositiveInt(
      'CLASSIFICATION_TIMEOUT_MS',
      this.config.classificationTimeoutMs
    );
    this.config.storageTimeoutMs = this.readPositiveInt('STORAGE_TIMEOUT_MS', this.config.storageTimeoutMs);
    this.config.historyMaxMessages = this.readPositiveInt('HISTORY_MAX_MESSAGES', this.config.historyMaxMessages);
    this.config.historyMaxTokens = this.readPositiveInt('HISTORY_MAX_TOKENS', this.config.historyMaxTokens);

    if (process.env.HTTP_PORT) {
      this.config.httpPort = this.readPositiveInt('HTTP_PORT', 0) || undefined;
    }
    if (process.env.FORCE_SCHEMA_RUN === 'true') {
      this.config.forceSchemaRun = true;
      logger.info('Overriding forceSchemaRun from env: true');
    }
  }

  private readPositiveInt(name: string, fallback: number): number {
    const raw = process.env[name];
    if (!raw) return fallback;
    const value = parseInt(raw, 10);
    if (isNaN(value) || value <= 0) {
      logger.warn(`Invalid ${name} environment variable: ${raw}. Using default ${fallback}.`);
      return fallback;
    }
    logger.info(`Overriding ${name} from env: ${value}`);
    return value;
  }
}
