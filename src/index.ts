/**
 * @file Public entry point of build-ledger.
 *       Opens the SQLite ledger, applies pending schema diffs and exposes the
 *       lifecycle service alongside the lower-level persistence pieces.
 */

import { ConfigManager } from './config';
import { BuildLedger } from './core/BuildLedger';
import { SQLiteClient } from './persistence/db/connection';
import { DiffRunner } from './persistence/migrations/DiffRunner';
import { getLogger } from './utils/logger';

export interface OpenLedgerOptions {
  /** Skip applying pending schema diffs after connecting. */
  skipMigrations?: boolean;
}

export interface LedgerHandle {
  client: SQLiteClient;
  ledger: BuildLedger;
  diffs: DiffRunner;
  close(): void;
}

/**
 * Connects to the configured database and returns a ready ledger. Call `close()`
 * when done.
 */
export async function openLedger(config: ConfigManager, options: OpenLedgerOptions = {}): Promise<LedgerHandle> {
  const { sqlite, diffsDir } = config.getDatabaseConfig();
  const client = new SQLiteClient(sqlite.path, { busyTimeoutMs: sqlite.busyTimeoutMs });

  try {
    await client.connect();
    const diffs = new DiffRunner(client, diffsDir);
    if (!options.skipMigrations) {
      await diffs.applyPending();
    }
    getLogger('build-ledger').debug('Ledger opened', { path: sqlite.path });
    return {
      client,
      ledger: new BuildLedger(client),
      diffs,
      close: () => client.disconnect(),
    };
  } catch (error) {
    client.disconnect();
    throw error;
  }
}

export { ConfigManager, initializeConfig, getConfig } from './config';
export type { AppConfig, DatabaseConfig, LoggingConfig } from './config';
export { BuildLedger } from './core/BuildLedger';
export type { LookupOptions, LedgerStats } from './core/BuildLedger';
export * from './core/validation';
export { SQLiteClient } from './persistence/db/connection';
export { SqlLiteral, SQL_NOW, toDbTimestamp, fromDbTimestamp } from './persistence/db/sql';
export { initializeTables, generateSchemaStatements } from './persistence/db/schema';
export { DiffRunner } from './persistence/migrations/DiffRunner';
export type { DiffStatus } from './persistence/migrations/DiffRunner';
export * from './persistence/models';
export * from './persistence/repositories';
export { UnitOfWork } from './persistence/unit-of-work';
export { Logger, getLogger, initializeLogger } from './utils/logger';
export type { LogLevel } from './utils/logger';
export * from './utils/error-handling';
