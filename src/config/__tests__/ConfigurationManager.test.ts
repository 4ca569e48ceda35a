// src/config/__tests__/ConfigurationManager.test.ts
import { ConfigurationManager } from '../ConfigurationManager.js';

const VARIABLES = [
  'STORE_DRIVER',
  'OPENAI_API_KEY',
  'CLASSIFICATION_TIMEOUT_MS',
  'STORAGE_TIMEOUT_MS',
  'HISTORY_MAX_MESSAGES',
  'HTTP_PORT',
  'FORCE_SCHEMA_RUN',
];

describe('ConfigurationManager', () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const name of VARIABLES) {
      saved[name] = process.env[name];
      delete process.env[name];
    }
    ConfigurationManager.reset();
  });

  afterEach(() => {
    for (const name of VARIABLES) {
      const value = saved[name];
      if (value === undefined) delete process.env[name];
      else process.env[name] = value;
    }
    ConfigurationManager.reset();
  });

  it('should use defaults without environment overrides', () => {
    const config = ConfigurationManager.getInstance();

    expect(config.getStoreDriver()).toBe('postgres');
    expect(config.getOpenAiApiKey()).toBeUndefined();
    expect(config.getClassificationTimeoutMs()).toBe(8000);
    expect(config.getStorageTimeoutMs()).toBe(5000);
    expect(config.getHistoryMaxMessages()).toBe(10);
    expect(config.getHttpPort()).toBeUndefined();
    expect(config.getForceSchemaRun()).toBe(false);
  });

  it('should read overrides from the environment', () => {
    process.env.STORE_DRIVER = 'memory';
    process.env.OPENAI_API_KEY = 'test-key';
    process.env.STORAGE_TIMEOUT_MS = '250';
    process.env.HTTP_PORT = '3000';
    process.env.FORCE_SCHEMA_RUN = 'true';

    const config = ConfigurationManager.getInstance();

    expect(config.getStoreDriver()).toBe('memory');
    expect(config.getOpenAiApiKey()).toBe('test-key');
    expect(config.getStorageTimeoutMs()).toBe(250);
    expect(config.getHttpPort()).toBe(3000);
    expect(config.getForceSchemaRun()).toBe(true);
  });

  it('should keep defaults for invalid values', () => {
    process.env.STORE_DRIVER = 'sqlite';
    process.env.CLASSIFICATION_TIMEOUT_MS = '-5';
    process.env.HISTORY_MAX_MESSAGES = 'lots';

    const config = ConfigurationManager.getInstance();

    expect(config.getStoreDriver()).toBe('postgres');
    expect(config.getClassificationTimeoutMs()).toBe(8000);
    expect(config.getHistoryMaxMessages()).toBe(10);
  });

  it('should return the same instance until reset', () => {
    const first = ConfigurationManager.getInstance();
    expect(ConfigurationManager.getInstance()).toBe(first);
    ConfigurationManager.reset();
    expect(ConfigurationManager.getInstance()).not.toBe(first);
  });
});
