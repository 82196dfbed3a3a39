/**
 * @file Centralized configuration management for build-ledger.
 *       Resolves the SQLite location, schema diff directory and logging settings
 *       from defaults and environment variables.
 */

import * as path from 'path';
import { z } from 'zod';
import { LogLevel, LOG_LEVELS } from '../utils/logger';

export interface DatabaseConfig {
  sqlite: {
    path: string;
    busyTimeoutMs: number;
  };
  diffsDir: string;
}

export interface LoggingConfig {
  level: LogLevel;
  enableConsole: boolean;
  enableFile: boolean;
  logFilePath?: string;
}

export interface AppConfig {
  database: DatabaseConfig;
  logging: LoggingConfig;
}

export const DEFAULT_SQLITE_PATH = './data/build-ledger.db';

/**
 * Schema diffs shipped with the package, relative to this module (src/config or dist/config).
 */
export const BUNDLED_DIFFS_DIR = path.resolve(__dirname, '../../sql/diffs');

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

function createDefaultConfig(projectRoot: string): AppConfig {
  return {
    database: {
      sqlite: {
        path: path.resolve(projectRoot, DEFAULT_SQLITE_PATH),
        busyTimeoutMs: 5000,
      },
      diffsDir: BUNDLED_DIFFS_DIR,
    },
    logging: {
      level: 'info',
      enableConsole: true,
      enableFile: false,
    },
  };
}

/**
 * Loads configuration from defaults and environment variables.
 * Priority: runtime updates > environment variables > defaults.
 */
export class ConfigManager {
  private config: AppConfig;
  private projectRoot: string;

  constructor(projectRoot: string, env: NodeJS.ProcessEnv = process.env) {
    this.projectRoot = projectRoot;
    this.config = this.loadConfig(env);
  }

  private loadConfig(env: NodeJS.ProcessEnv): AppConfig {
    const config = createDefaultConfig(this.projectRoot);

    if (env.BUILD_LEDGER_SQLITE_PATH) {
      config.database.sqlite.path = this.resolveSqlitePath(env.BUILD_LEDGER_SQLITE_PATH);
    }
    if (env.BUILD_LEDGER_BUSY_TIMEOUT_MS) {
      const busyTimeout = parseInt(env.BUILD_LEDGER_BUSY_TIMEOUT_MS, 10);
      if (!isNaN(busyTimeout) && busyTimeout >= 0) {
        config.database.sqlite.busyTimeoutMs = busyTimeout;
      }
    }
    if (env.BUILD_LEDGER_DIFFS_DIR) {
      config.database.diffsDir = path.resolve(this.projectRoot, env.BUILD_LEDGER_DIFFS_DIR);
    }

    if (env.BUILD_LEDGER_LOG_LEVEL) {
      const parsed = LogLevelSchema.safeParse(env.BUILD_LEDGER_LOG_LEVEL.toLowerCase());
      if (!parsed.success) {
        throw new Error(
          `Invalid BUILD_LEDGER_LOG_LEVEL "${env.BUILD_LEDGER_LOG_LEVEL}": expected one of ${LOG_LEVELS.join(', ')}`,
        );
      }
      config.logging.level = parsed.data;
    }
    if (env.BUILD_LEDGER_LOG_FILE) {
      config.logging.enableFile = true;
      config.logging.logFilePath = path.resolve(this.projectRoot, env.BUILD_LEDGER_LOG_FILE);
    }

    return config;
  }

  /**
   * `:memory:` is passed through untouched, anything else is resolved against the project root.
   */
  public resolveSqlitePath(sqlitePath: string): string {
    return sqlitePath === ':memory:' ? sqlitePath : path.resolve(this.projectRoot, sqlitePath);
  }

  public getConfig(): AppConfig {
    return this.config;
  }

  public getDatabaseConfig(): DatabaseConfig {
    return this.config.database;
  }

  public getLoggingConfig(): LoggingConfig {
    return this.config.logging;
  }

  /**
   * Updates configuration at runtime (CLI flags, tests).
   */
  public updateConfig(updates: { database?: Partial<DatabaseConfig>; logging?: Partial<LoggingConfig> }): void {
    this.config = {
      database: { ...this.config.database, ...updates.database },
      logging: { ...this.config.logging, ...updates.logging },
    };
  }
}

let globalConfigManager: ConfigManager | null = null;

export function initializeConfig(projectRoot: string): ConfigManager {
  globalConfigManager = new ConfigManager(projectRoot);
  return globalConfigManager;
}

/**
 * Throws when `initializeConfig` has not been called yet.
 */
export function getConfig(): ConfigManager {
  if (!globalConfigManager) {
    throw new Error('Configuration not initialized. Call initializeConfig() first.');
  }
  return globalConfigManager;
}

export function resetConfig(): void {
  globalConfigManager = null;
}
