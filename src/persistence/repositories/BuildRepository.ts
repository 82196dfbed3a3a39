import { Database } from 'better-sqlite3';
import { GenericRepository, BindValue } from '../repository/GenericRepository';
import { BuildDTO } from '../models/BuildDTO';
import { BuildModel } from '../models/BuildModel';
import { SQL_NOW } from '../db/sql';

export const DEFAULT_LIST_LIMIT = 50;
export const MAX_LIST_LIMIT = 1000;

export interface BuildListFilter {
  branch?: string;
  revision?: string;
  includeDeleted?: boolean;
  limit?: number;
  offset?: number;
}

/**
 * Persistence for Build Records. Soft-deleted rows stay readable through `get`
 * and `search`; the list and lookup helpers skip them unless asked otherwise.
 */
export class BuildRepository extends GenericRepository<BuildDTO> {
  constructor(db: Database) {
    super(db, new BuildModel());
  }

  findByVersion(version: string): BuildDTO | null {
    const row = this.queryOne('findByVersion', 'SELECT * FROM build WHERE version = ?', [version]);
    return row === undefined ? null : this.model.toDto(row);
  }

  /**
   * Newest builds first.
   */
  list(filter: BuildListFilter = {}): BuildDTO[] {
    const clauses: string[] = [];
    const args: BindValue[] = [];

    if (filter.branch !== undefined) {
      clauses.push('branch = ?');
      args.push(filter.branch);
    }
    if (filter.revision !== undefined) {
      clauses.push('revision = ?');
      args.push(filter.revision);
    }
    if (!filter.includeDeleted) {
      clauses.push('delete_dttm IS NULL');
    }

    const limit = Math.min(Math.max(filter.limit ?? DEFAULT_LIST_LIMIT, 1), MAX_LIST_LIMIT);
    const offset = Math.max(filter.offset ?? 0, 0);
    const where = clauses.length > 0 ? ` WHERE ${clauses.join(' AND ')}` : '';

    return this.queryAll(
      'list',
      `SELECT * FROM build${where} ORDER BY build_id DESC LIMIT ? OFFSET ?`,
      [...args, limit, offset],
    );
  }

  /**
   * The build currently live on a branch: deployed successfully, not reverted,
   * not deleted, most recent deploy wins.
   */
  latestDeployed(branch: string): BuildDTO | null {
    const row = this.queryOne(
      'latestDeployed',
      `SELECT * FROM build
       WHERE branch = ?
         AND deploy_dttm IS NOT NULL
         AND deploy_exit_status = 0
         AND revert_dttm IS NULL
         AND delete_dttm IS NULL
       ORDER BY deploy_dttm DESC, build_id DESC
       LIMIT 1`,
      [branch],
    );
    return row === undefined ? null : this.model.toDto(row);
  }

  /**
   * Marks a build deleted. Returns 0 when it is missing or already deleted.
   */
  softDelete(buildId: number): number {
    return this.updateWhere({ delete_dttm: SQL_NOW }, 'build_id = ? AND delete_dttm IS NULL', [buildId]);
  }

  /**
   * Clears the delete marker. Returns 0 when the build is missing or not deleted.
   */
  restore(buildId: number): number {
    return this.updateWhere({ delete_dttm: null }, 'build_id = ? AND delete_dttm IS NOT NULL', [buildId]);
  }

  countActive(): number {
    return this.countWhere('delete_dttm IS NULL');
  }

  countDeleted(): number {
    return this.countWhere('delete_dttm IS NOT NULL');
  }
}
