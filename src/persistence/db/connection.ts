import Database, { Database as DatabaseType, RunResult, Statement } from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { getLogger } from '../../utils/logger';
import {
  getErrorMessage,
  logError,
  DatabaseConnectionError,
  translateSqliteError,
  withRetry,
  DEFAULT_RETRY_CONFIG,
} from '../../utils/error-handling';
import { UnitOfWork } from '../unit-of-work';
import { BindValue } from '../repository/GenericRepository';
import { initializeTables } from './schema';
import { NOW_EXPRESSION } from './sql';

export const IN_MEMORY = ':memory:';

export interface SQLiteClientOptions {
  busyTimeoutMs?: number;
}

/**
 * SQLite connection owning the `build` and `sql_diff` tables.
 */
export class SQLiteClient {
  private db: DatabaseType;
  private logger = getLogger('SQLiteClient');
  private isConnected = false;

  constructor(
    private readonly dbPath: string,
    private readonly options: SQLiteClientOptions = {},
  ) {
    this.logger.debug('Initializing SQLite client', { path: dbPath });
    try {
      if (dbPath !== IN_MEMORY) {
        const dbDir = path.dirname(path.resolve(dbPath));
        if (!fs.existsSync(dbDir)) {
          this.logger.info('Creating database directory', { directory: dbDir });
          fs.mkdirSync(dbDir, { recursive: true });
        }
      }

      this.db = new Database(dbPath, { timeout: options.busyTimeoutMs ?? 5000 });
    } catch (error) {
      logError(this.logger, 'Failed to create SQLite database instance', error, { path: dbPath });
      throw new DatabaseConnectionError('SQLite', `Failed to create database instance: ${getErrorMessage(error)}`, error);
    }
  }

  public get path(): string {
    return this.dbPath;
  }

  /**
   * Verifies the connection, applies pragmas and creates the schema. Idempotent.
   */
  public async connect(): Promise<void> {
    if (this.isConnected) {
      this.logger.debug('Already connected to SQLite');
      return;
    }

    try {
      await withRetry(
        async () => {
          this.testConnection();
          if (this.dbPath !== IN_MEMORY) {
            this.db.pragma('journal_mode = WAL');
          }
          this.db.pragma(`busy_timeout = ${this.options.busyTimeoutMs ?? 5000}`);
          initializeTables(this.db);
          this.isConnected = true;
          this.logger.debug('Connected to SQLite', { path: this.dbPath });
        },
        DEFAULT_RETRY_CONFIG,
        this.logger,
        'SQLite connection',
      );
    } catch (error) {
      logError(this.logger, 'Failed to connect to SQLite after retries', error);
      throw new DatabaseConnectionError('SQLite', `Connection failed: ${getErrorMessage(error)}`, error);
    }
  }

  public disconnect(): void {
    if (!this.db.open) {
      this.logger.debug('Already disconnected from SQLite');
      return;
    }

    this.db.close();
    this.isConnected = false;
    this.logger.debug('Disconnected from SQLite');
  }

  public getDb(): DatabaseType {
    if (!this.isConnected) {
      throw new DatabaseConnectionError('SQLite', 'Not connected to SQLite. Call connect() first.');
    }
    return this.db;
  }

  public getUnitOfWork(): UnitOfWork {
    return new UnitOfWork(this.getDb());
  }

  public run(sql: string, params: BindValue[] = []): RunResult {
    const db = this.getDb();
    this.logger.debug('Executing SQLite statement', { sql: sql.substring(0, 100), paramCount: params.length });
    try {
      return db.prepare(sql).run(...params);
    } catch (error) {
      this.logger.debug('SQLite statement failed', { error: getErrorMessage(error), sql: sql.substring(0, 100) });
      throw translateSqliteError(error, 'run');
    }
  }

  public prepare(sql: string): Statement {
    const db = this.getDb();
    try {
      return db.prepare(sql);
    } catch (error) {
      logError(this.logger, 'Failed to prepare SQLite statement', error, { sql: sql.substring(0, 100) });
      throw translateSqliteError(error, 'prepare');
    }
  }

  public all(sql: string, params: BindValue[] = []): unknown[] {
    this.logger.debug('Executing SQLite SELECT query', { sql: sql.substring(0, 100) });
    try {
      return this.getDb()
        .prepare(sql)
        .all(...params);
    } catch (error) {
      throw translateSqliteError(error, 'all');
    }
  }

  public get(sql: string, params: BindValue[] = []): unknown {
    this.logger.debug('Executing SQLite GET query', { sql: sql.substring(0, 100) });
    try {
      return this.getDb()
        .prepare(sql)
        .get(...params);
    } catch (error) {
      throw translateSqliteError(error, 'get');
    }
  }

  /**
   * Executes one or more statements without parameters (DDL, schema diffs).
   */
  public exec(sql: string): void {
    try {
      this.getDb().exec(sql);
    } catch (error) {
      throw translateSqliteError(error, 'exec');
    }
  }

  public transaction<T>(fn: () => T): T {
    const transaction = this.getDb().transaction(fn);
    try {
      return transaction();
    } catch (error) {
      this.logger.debug('Transaction rolled back', { error: getErrorMessage(error) });
      throw error;
    }
  }

  /**
   * The database clock, in the stored timestamp format.
   */
  public now(): string {
    const row = this.get(`SELECT ${NOW_EXPRESSION} AS now`);
    if (row && typeof row === 'object' && 'now' in row && typeof row.now === 'string') {
      return row.now;
    }
    throw new DatabaseConnectionError('SQLite', 'Unable to read the database clock');
  }

  public isConnectedToDatabase(): boolean {
    return this.isConnected;
  }

  private testConnection(): void {
    try {
      this.db.prepare('SELECT 1').get();
    } catch (error) {
      this.logger.warn('SQLite connection test failed', { error: getErrorMessage(error) });
      throw error;
    }
  }
}
