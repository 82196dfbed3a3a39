import { BaseModel, TableDefinition } from '../models/base.model';

export function generateCreateTableCommand(model: TableDefinition): string {
  const tableName = model.getTableName();
  const schema = model.getSchema();

  const columns: string[] = [];
  const constraints: string[] = [];

  for (const [key, value] of Object.entries(schema)) {
    const definition = `${key} ${value}`.trim();
    if (BaseModel.isConstraintKey(key)) {
      constraints.push(definition);
    } else {
      columns.push(definition);
    }
  }

  const allDefinitions = [...columns, ...constraints];

  return `CREATE TABLE IF NOT EXISTS ${tableName} (
    ${allDefinitions.join(',\n    ')}
  )`;
}

export function generateIndexes(tableName: string, indexes: Record<string, string[]>): string[] {
  const indexCommands: string[] = [];

  for (const [indexName, columns] of Object.entries(indexes)) {
    const fullIndexName = `idx_${tableName}_${indexName}`;
    const columnList = columns.join(', ');
    indexCommands.push(`CREATE INDEX IF NOT EXISTS ${fullIndexName} ON ${tableName}(${columnList})`);
  }

  return indexCommands;
}

export function generateTriggers(model: TableDefinition): string[] {
  return Object.entries(model.getTriggers()).map(
    ([triggerName, body]) => `CREATE TRIGGER IF NOT EXISTS ${triggerName} ${body}`,
  );
}
