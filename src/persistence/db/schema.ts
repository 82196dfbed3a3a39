import { Database } from 'better-sqlite3';
import { BuildModel, SqlDiffModel, TableDefinition } from '../models';
import { generateCreateTableCommand, generateIndexes, generateTriggers } from '../utils/schema-generator';

/**
 * Every table the ledger owns, in creation order.
 */
export function getModels(): TableDefinition[] {
  return [new BuildModel(), new SqlDiffModel()];
}

/**
 * Full DDL for the ledger: tables, then their indexes, then their triggers.
 */
export function generateSchemaStatements(): string[] {
  const models = getModels();
  return [
    ...models.map((model) => generateCreateTableCommand(model)),
    ...models.flatMap((model) => generateIndexes(model.getTableName(), model.getIndexes())),
    ...models.flatMap((model) => generateTriggers(model)),
  ];
}

/**
 * Creates all tables, indexes and triggers. Safe to run against an existing database.
 */
export function initializeTables(db: Database): void {
  const statements = generateSchemaStatements();
  db.transaction(() => {
    for (const statement of statements) {
      db.exec(statement);
    }
  })();
}
