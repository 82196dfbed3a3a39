import { Database, RunResult } from 'better-sqlite3';
import { IRepository, ColumnValues } from './IRepository';
import { BaseDTO } from '../models/base.dto';
import { BaseModel } from '../models/base.model';
import { isSqlLiteral, toDbTimestamp } from '../db/sql';
import { getLogger, Logger } from '../../utils/logger';
import { DataValidationError, getErrorMessage, translateSqliteError } from '../../utils/error-handling';

export type BindValue = string | number | bigint | Buffer | null;

/**
 * Column names, their SQL value expressions (`?` or an inlined literal) and the
 * parameters bound to the placeholders.
 */
export interface ColumnSplit {
  keys: string[];
  values: string[];
  args: BindValue[];
}

export class GenericRepository<T extends BaseDTO> implements IRepository<T> {
  protected readonly db: Database;
  protected readonly model: BaseModel<T>;
  protected readonly tableName: string;
  protected readonly idColumn: string;
  protected readonly logger: Logger;

  constructor(db: Database, model: BaseModel<T>) {
    this.db = db;
    this.model = model;
    this.tableName = model.getTableName();
    this.idColumn = model.getIdColumn();
    this.logger = getLogger(`Repository:${this.tableName}`);
  }

  add(columns: ColumnValues<T>): number {
    const { keys, values, args } = this.kvaSplit(columns);
    const sql =
      keys.length === 0
        ? `INSERT INTO ${this.tableName} DEFAULT VALUES`
        : `INSERT INTO ${this.tableName} (${keys.join(', ')}) VALUES (${values.join(', ')})`;
    const result = this.runStatement('insert', sql, args);
    return Number(result.lastInsertRowid);
  }

  get(id: number): T | null {
    const sql = `SELECT * FROM ${this.tableName} WHERE ${this.idColumn} = ?`;
    const row = this.queryOne('get', sql, [id]);
    return row === undefined ? null : this.model.toDto(row);
  }

  getAll(): T[] {
    const sql = `SELECT * FROM ${this.tableName} ORDER BY ${this.idColumn}`;
    return this.queryAll('getAll', sql, []);
  }

  search(criteria: Partial<T>): T[] {
    const clauses: string[] = [];
    const args: BindValue[] = [];

    for (const [column, value] of Object.entries(criteria)) {
      const current: unknown = value;
      if (current === undefined) {
        continue;
      }
      this.assertColumn(column);
      if (current === null) {
        clauses.push(`${column} IS NULL`);
      } else {
        clauses.push(`${column} = ?`);
        args.push(this.toBindValue(column, current));
      }
    }

    if (clauses.length === 0) {
      return this.getAll();
    }

    const sql = `SELECT * FROM ${this.tableName} WHERE ${clauses.join(' AND ')} ORDER BY ${this.idColumn}`;
    return this.queryAll('search', sql, args);
  }

  update(id: number, columns: ColumnValues<T>): number {
    return this.updateWhere(columns, `${this.idColumn} = ?`, [id]);
  }

  count(): number {
    return this.countWhere();
  }

  /**
   * Updates the rows matching `whereClause` and returns how many changed.
   */
  protected updateWhere(columns: ColumnValues<T>, whereClause: string, whereArgs: BindValue[]): number {
    const { keys, values, args } = this.kvaSplit(columns);
    if (keys.length === 0) {
      this.logger.debug('Nothing to update. Skipping query', { table: this.tableName });
      return 0;
    }

    const setClause = keys.map((key, index) => `${key} = ${values[index]}`).join(', ');
    const sql = `UPDATE ${this.tableName} SET ${setClause} WHERE ${whereClause}`;
    return this.runStatement('update', sql, [...args, ...whereArgs]).changes;
  }

  protected countWhere(whereClause?: string, args: BindValue[] = []): number {
    const where = whereClause ? ` WHERE ${whereClause}` : '';
    const row = this.queryOne('count', `SELECT COUNT(*) AS count FROM ${this.tableName}${where}`, args);
    if (row && typeof row === 'object' && 'count' in row && typeof row.count === 'number') {
      return row.count;
    }
    return 0;
  }

  /**
   * Splits a column map into keys, value expressions and bound arguments.
   */
  protected kvaSplit(columns: ColumnValues<T>): ColumnSplit {
    const keys: string[] = [];
    const values: string[] = [];
    const args: BindValue[] = [];

    for (const [column, value] of Object.entries(columns)) {
      const current: unknown = value;
      if (current === undefined) {
        continue;
      }
      this.assertColumn(column);
      keys.push(column);
      if (isSqlLiteral(current)) {
        values.push(current.sql);
      } else {
        values.push('?');
        args.push(this.toBindValue(column, current));
      }
    }

    return { keys, values, args };
  }

  protected assertColumn(column: string): void {
    if (!this.model.hasColumn(column)) {
      throw new DataValidationError(`Unknown column for ${this.tableName}`, [`${column}: no such column`]);
    }
  }

  protected toBindValue(column: string, value: unknown): BindValue {
    if (value === null || typeof value === 'string' || typeof value === 'bigint') {
      return value;
    }
    if (typeof value === 'number') {
      if (!Number.isFinite(value)) {
        throw new DataValidationError(`Invalid value for ${this.tableName}.${column}`, [
          `${column}: expected a finite number`,
        ]);
      }
      return value;
    }
    if (typeof value === 'boolean') {
      return value ? 1 : 0;
    }
    if (value instanceof Date) {
      return toDbTimestamp(value);
    }
    if (Buffer.isBuffer(value)) {
      return value;
    }
    throw new DataValidationError(`Invalid value for ${this.tableName}.${column}`, [
      `${column}: unsupported type ${typeof value}`,
    ]);
  }

  protected runStatement(operation: string, sql: string, args: BindValue[]): RunResult {
    this.logger.debug('Executing statement', { operation, sql: sql.substring(0, 100), paramCount: args.length });
    try {
      return this.db.prepare(sql).run(...args);
    } catch (error) {
      this.logger.debug('Statement failed', { operation, error: getErrorMessage(error) });
      throw translateSqliteError(error, operation);
    }
  }

  protected queryOne(operation: string, sql: string, args: BindValue[]): unknown {
    this.logger.debug('Executing query', { operation, sql: sql.substring(0, 100), paramCount: args.length });
    try {
      return this.db.prepare(sql).get(...args);
    } catch (error) {
      throw translateSqliteError(error, operation);
    }
  }

  protected queryAll(operation: string, sql: string, args: BindValue[]): T[] {
    this.logger.debug('Executing query', { operation, sql: sql.substring(0, 100), paramCount: args.length });
    let rows: unknown[];
    try {
      rows = this.db.prepare(sql).all(...args);
    } catch (error) {
      throw translateSqliteError(error, operation);
    }
    return rows.map((row) => this.model.toDto(row));
  }
}
