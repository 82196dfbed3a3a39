import { Database } from 'better-sqlite3';
import { GenericRepository } from '../repository/GenericRepository';
import { SqlDiffDTO } from '../models/SqlDiffDTO';
import { SqlDiffModel } from '../models/SqlDiffModel';
import { SQL_NOW } from '../db/sql';

/**
 * Bookkeeping for schema diff files. Diff names look like `diff001_description.sql`;
 * characters 5-7 hold the sequence number that orders them.
 */
export class SqlDiffRepository extends GenericRepository<SqlDiffDTO> {
  constructor(db: Database) {
    super(db, new SqlDiffModel());
  }

  insert(sqlDiffName: string): number {
    return this.add({ sql_diff_name: sqlDiffName });
  }

  findByName(sqlDiffName: string): SqlDiffDTO | null {
    const [diff] = this.search({ sql_diff_name: sqlDiffName });
    return diff ?? null;
  }

  scan(): SqlDiffDTO[] {
    return this.queryAll('scan', 'SELECT * FROM sql_diff ORDER BY substr(sql_diff_name, 5, 3), sql_diff_name', []);
  }

  markApplied(sqlDiffName: string): number {
    return this.updateWhere({ applied_dttm: SQL_NOW }, 'sql_diff_name = ?', [sqlDiffName]);
  }

  scanUnapplied(): SqlDiffDTO[] {
    return this.queryAll(
      'scanUnapplied',
      `SELECT * FROM sql_diff
       WHERE applied_dttm IS NULL
       ORDER BY substr(sql_diff_name, 5, 3) ASC, sql_diff_name ASC`,
      [],
    );
  }
}
