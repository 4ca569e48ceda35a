// src/db/DatabaseManager.ts
import pg, { Pool, PoolClient } from 'pg';
import fs from 'node:fs/promises';
import path from 'node:path';
import { ConfigurationManager } from '../config/ConfigurationManager.js';
import { logger } from '../utils/logger.js';

const ESSENTIAL_TABLES = ['tasks', 'conversations', 'messages'];

export class DatabaseManager {
  private static instance: DatabaseManager | null = null;
  private static initializationPromise: Promise<void> | null = null;
  private pool: Pool;
  private initializationComplete: boolean = false;

  private constructor() {
    const configManager = ConfigurationManager.getInstance();
    logger.info('[DatabaseManager] Setting up PostgreSQL connection pool...');
    this.pool = new pg.Pool({
      host: configManager.getPgHost(),
      port: configManager.getPgPort(),
      user: configManager.getPgUser(),
      password: configManager.getPgPassword(),
      database: configManager.getPgDatabase(),
      connectionTimeoutMillis: configManager.getStorageTimeoutMs(),
    });

    this.pool.on('error', (err) => {
      // Idle client errors must not crash the process; the next query reconnects.
      logger.error({ err }, '[DatabaseManager] Unexpected error on idle client');
    });
  }

  public static async getInstance(): Promise<DatabaseManager> {
    if (DatabaseManager.instance?.initializationComplete) {
      return DatabaseManager.instance;
    }

    if (!DatabaseManager.initializationPromise) {
      const newInstance = new DatabaseManager();
      DatabaseManager.initializationPromise = newInstance
        .initializeDatabaseInternal()
        .then(() => {
          logger.info('[DatabaseManager] Initialization successful.');
          DatabaseManager.instance = newInstance;
        })
        .catch(async (initError: unknown) => {
          logger.error({ err: initError }, '[DatabaseManager] Initialization failed.');
          DatabaseManager.initializationPromise = null;
          DatabaseManager.instance = null;
          await newInstance.pool.end();
          throw initError;
        });
    }

    await DatabaseManager.initializationPromise;

    if (!DatabaseManager.instance?.initializationComplete) {
      throw new Error('DatabaseManager initialization failed or did not complete.');
    }
    return DatabaseManager.instance;
  }

  private async initializeDatabaseInternal(): Promise<void> {
    let client: PoolClient | null = null;
    try {
      client = await this.pool.connect();
      const versionRes = await client.query('SELECT version();');
      logger.info(`[DatabaseManager] Connected to ${versionRes.rows[0]?.version ?? 'PostgreSQL'}`);

      if (ConfigurationManager.getInstance().getForceSchemaRun()) {
        const schemaPath = path.join(__dirname, 'schema.sql');
        logger.info(`[DatabaseManager] FORCE_SCHEMA_RUN is enabled. Executing ${schemaPath}...`);
        const schemaSql = await fs.readFile(schemaPath, 'utf8');
        await client.query(schemaSql);
        logger.info('[DatabaseManager] Schema script executed.');
      }

      const missing = await this.findMissingTables(client);
      if (missing.length > 0) {
        throw new Error(
          `Missing database tables: ${missing.join(', ')}. Start once with FORCE_SCHEMA_RUN=true to create them.`
        );
      }

      this.initializationComplete = true;
    } finally {
      client?.release();
    }
  }

  private async findMissingTables(client: PoolClient): Promise<string[]> {
    const result = await client.query(
      `SELECT table_name FROM information_schema.tables WHERE table_schema = 'public' AND table_name = ANY($1);`,
      [ESSENTIAL_TABLES]
    );
    const present = new Set(result.rows.map((row: { table_name: string }) => row.table_name));
    return ESSENTIAL_TABLES.filter((table) => !present.has(table));
  }

  public getPool(): Pool {
    if (!this.initializationComplete) {
      throw new Error('DatabaseManager getPool called before initialization was complete.');
    }
    return this.pool;
  }

  public async closeDb(): Promise<void> {
    DatabaseManager.instance = null;
    DatabaseManager.initializationPromise = null;
    this.initializationComplete = false;
    logger.info('[DatabaseManager] Closing PostgreSQL connection pool...');
    await this.pool.end();
    logger.info('[DatabaseManager] PostgreSQL connection pool closed.');
  }
}
