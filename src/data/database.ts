import fs from 'fs';
import path from 'path';
import { Pool, PoolClient } from 'pg';
import { Database, RunResult } from 'sqlite3';
import { logger } from '../utils/logger';
import { getDialect, SQLDialect, convertParameters, DatabaseProvider, SqlParam } from './DatabaseDialect';
import { SchemaBuilder } from './SchemaBuilder';

export interface DatabaseConfig {
  provider: DatabaseProvider;
  connectionString?: string;
  host?: string;
  port?: number;
  database?: string;
  username?: string;
  password?: string;
}

export type DbRow = Record<string, unknown>;

export interface QueryResult {
  rows: DbRow[];
  rowCount: number;
}

export type QueryFn = (text: string, params?: SqlParam[]) => Promise<QueryResult>;

const EXECUTION_LOCK_KEY = 42;

const RETURNS_ROWS = /^\s*(SELECT|WITH|PRAGMA)\b|\bRETURNING\b/i;

export class DatabaseManager {
  private pgPool?: Pool;
  private sqlite?: Database;
  private config: DatabaseConfig;
  private dialect: SQLDialect;
  private lockChain: Promise<unknown> = Promise.resolve();

  constructor(config: DatabaseConfig) {
    this.config = config;
    this.dialect = getDialect(config.provider);
  }

  async initialize(): Promise<void> {
    logger.info(`Initializing database with provider: ${this.config.provider}`);

    switch (this.config.provider) {
      case 'postgresql':
        await this.initializePostgreSQL();
        break;
      case 'sqlite':
        await this.initializeSQLite(this.config.database || './data/signals.db');
        break;
      case 'memory':
        await this.initializeSQLite(':memory:');
        break;
    }

    await this.createSchema();
    logger.info('Database initialization completed successfully');
  }

  private async initializePostgreSQL(): Promise<void> {
    const connectionString = this.config.connectionString ||
      `postgresql://${this.config.username}:${this.config.password ?? ''}@${this.config.host}:${this.config.port}/${this.config.database}`;

    this.pgPool = new Pool({
      connectionString,
      max: 20,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    });

    const client = await this.pgPool.connect();
    try {
      await client.query('SELECT NOW()');
    } finally {
      client.release();
    }

    logger.info('PostgreSQL connection established');
  }

  private async initializeSQLite(dbPath: string): Promise<void> {
    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
        logger.info(`Created database directory: ${dir}`);
      }
    }

    await new Promise<void>((resolve, reject) => {
      this.sqlite = new Database(dbPath, (err) => {
        if (err) {
          reject(err);
        } else {
          logger.info(`SQLite database opened: ${dbPath}`);
          resolve();
        }
      });
    });
  }

  private async createSchema(): Promise<void> {
    const schema = new SchemaBuilder(this.dialect).buildSchema();
    const statements = schema.split(';').map(stmt => stmt.trim()).filter(stmt => stmt.length > 0);

    for (const statement of statements) {
      await this.query(statement);
    }
  }

  /**
   * Run one statement. SQL is written with `$N` placeholders for every provider.
   */
  async query(text: string, params: SqlParam[] = []): Promise<QueryResult> {
    if (this.pgPool) {
      const result = await this.pgPool.query(text, params);
      return { rows: result.rows, rowCount: result.rowCount ?? result.rows.length };
    }
    if (this.sqlite) {
      return this.querySQLite(this.sqlite, text, params);
    }
    throw new Error('No database connection available');
  }

  private querySQLite(db: Database, text: string, params: SqlParam[]): Promise<QueryResult> {
    const converted = convertParameters(text, params, this.config.provider);

    return new Promise((resolve, reject) => {
      if (RETURNS_ROWS.test(converted.sql)) {
        db.all(converted.sql, converted.params, (err: Error | null, rows: DbRow[]) => {
          if (err) reject(err);
          else resolve({ rows, rowCount: rows.length });
        });
      } else {
        db.run(converted.sql, converted.params, function (this: RunResult, err: Error | null) {
          if (err) reject(err);
          else resolve({ rows: [], rowCount: this.changes });
        });
      }
    });
  }

  async transaction<T>(callback: (query: QueryFn) => Promise<T>): Promise<T> {
    if (this.pgPool) {
      const client = await this.pgPool.connect();
      try {
        await client.query('BEGIN');
        const result = await callback(this.clientQuery(client));
        await client.query('COMMIT');
        return result;
      } catch (error) {
        await client.query('ROLLBACK');
        throw error;
      } finally {
        client.release();
      }
    }
    return this.serialize(() => callback((text, params) => this.query(text, params)));
  }

  /**
   * Serialize a read-check-write sequence across concurrent callers.
   * PostgreSQL takes a transaction-scoped advisory lock; SQLite runs on a
   * single connection and is serialized in process.
   */
  async withAdvisoryLock<T>(callback: (query: QueryFn) => Promise<T>): Promise<T> {
    if (this.pgPool) {
      return this.transaction(async (query) => {
        await query('SELECT pg_advisory_xact_lock($1)', [EXECUTION_LOCK_KEY]);
        return callback(query);
      });
    }
    return this.serialize(() => callback((text, params) => this.query(text, params)));
  }

  private clientQuery(client: PoolClient): QueryFn {
    return async (text, params = []) => {
      const result = await client.query(text, params);
      return { rows: result.rows, rowCount: result.rowCount ?? result.rows.length };
    };
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.lockChain.then(task, task);
    this.lockChain = run.catch(() => undefined);
    return run;
  }

  async healthCheck(): Promise<{ healthy: boolean; provider: DatabaseProvider; pool: { total: number; idle: number; waiting: number } | null }> {
    let healthy = false;
    try {
      await this.query('SELECT 1');
      healthy = true;
    } catch (error) {
      logger.error('Database health check failed:', error);
    }

    return {
      healthy,
      provider: this.config.provider,
      pool: this.pgPool ? {
        total: this.pgPool.totalCount,
        idle: this.pgPool.idleCount,
        waiting: this.pgPool.waitingCount,
      } : null,
    };
  }

  getProvider(): DatabaseProvider {
    return this.config.provider;
  }

  async close(): Promise<void> {
    if (this.pgPool) {
      await this.pgPool.end();
      this.pgPool = undefined;
      logger.info('PostgreSQL pool closed');
    }

    const sqlite = this.sqlite;
    if (sqlite) {
      this.sqlite = undefined;
      await new Promise<void>((resolve, reject) => {
        sqlite.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
      logger.info('SQLite database closed');
    }
  }
}
