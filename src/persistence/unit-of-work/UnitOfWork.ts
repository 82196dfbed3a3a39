import { Database } from 'better-sqlite3';
import { IUnitOfWork } from './IUnitOfWork';
import { BuildRepository, SqlDiffRepository } from '../repositories';
import { getLogger, Logger } from '../../utils/logger';
import { getErrorMessage } from '../../utils/error-handling';

/**
 * Groups the repositories sharing one connection and brackets work in a transaction.
 */
export class UnitOfWork implements IUnitOfWork {
  private readonly db: Database;
  private readonly logger: Logger;
  public readonly builds: BuildRepository;
  public readonly sqlDiffs: SqlDiffRepository;

  constructor(db: Database) {
    this.db = db;
    this.logger = getLogger('UnitOfWork');
    this.builds = new BuildRepository(db);
    this.sqlDiffs = new SqlDiffRepository(db);
  }

  /**
   * Runs `work` inside a better-sqlite3 transaction: committed when it returns,
   * rolled back and rethrown when it throws. `work` must stay synchronous so no
   * other caller's statements can land between BEGIN and COMMIT.
   */
  public withTransaction<T>(work: () => T): T {
    try {
      return this.db.transaction(work)();
    } catch (error) {
      this.logger.debug('Transaction rolled back', { error: getErrorMessage(error) });
      throw error;
    }
  }
}
