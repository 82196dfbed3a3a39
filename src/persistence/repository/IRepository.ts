import { BaseDTO } from '../models/base.dto';
import { SqlLiteral } from '../db/sql';

/**
 * Column/value map for inserts and updates. `undefined` leaves a column out of the
 * statement, `null` writes NULL, and a SqlLiteral is inlined as SQL.
 */
export type ColumnValues<T> = { [K in keyof T]?: T[K] | SqlLiteral };

/**
 * Repository calls run synchronously on the better-sqlite3 connection, so they can
 * be composed inside `UnitOfWork.withTransaction`.
 */
export interface IRepository<T extends BaseDTO> {
  add(columns: ColumnValues<T>): number;
  get(id: number): T | null;
  getAll(): T[];
  search(criteria: Partial<T>): T[];
  update(id: number, columns: ColumnValues<T>): number;
  count(): number;
}
