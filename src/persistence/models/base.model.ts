import { BaseDTO } from './base.dto';

const CONSTRAINT_PREFIXES = ['PRIMARY KEY', 'FOREIGN KEY', 'UNIQUE', 'CHECK', 'CONSTRAINT'];

/**
 * The parts of a model the schema generator needs.
 */
export interface TableDefinition {
  getTableName(): string;
  getSchema(): Record<string, string>;
  getIndexes(): Record<string, string[]>;
  getTriggers(): Record<string, string>;
}

/**
 * Describes how a DTO is stored: table, columns, indexes and triggers.
 */
export abstract class BaseModel<T extends BaseDTO> implements TableDefinition {
  abstract getTableName(): string;

  abstract getIdColumn(): keyof T & string;

  /**
   * Column name to SQL declaration. Keys starting with a table constraint keyword
   * (`UNIQUE (...)`, `CONSTRAINT name`, ...) are emitted after the columns.
   */
  abstract getSchema(): Record<string, string>;

  /**
   * Validates a raw row read from the database and returns it as a DTO.
   */
  abstract toDto(row: unknown): T;

  /**
   * Index name suffix to indexed columns.
   */
  getIndexes(): Record<string, string[]> {
    return {};
  }

  /**
   * Trigger name to the remainder of its `CREATE TRIGGER` statement.
   */
  getTriggers(): Record<string, string> {
    return {};
  }

  static isConstraintKey(key: string): boolean {
    return CONSTRAINT_PREFIXES.some((prefix) => key.startsWith(prefix));
  }

  getColumnNames(): string[] {
    return Object.keys(this.getSchema()).filter((key) => !BaseModel.isConstraintKey(key));
  }

  hasColumn(column: string): boolean {
    return this.getColumnNames().includes(column);
  }
}
