import * as fs from 'fs';
import * as path from 'path';
import { SQLiteClient } from '../db/connection';
import { SqlDiffRepository } from '../repositories';
import { SqlDiffDTO } from '../models';
import { UnitOfWork } from '../unit-of-work';
import { getLogger, Logger } from '../../utils/logger';
import { getErrorMessage, logError, MigrationError } from '../../utils/error-handling';

/**
 * `diff` + three-digit sequence + `_` + description, e.g. `diff002_add_build_index.sql`.
 */
export const DIFF_FILE_PATTERN = /^diff\d{3}_[\w-]+\.sql$/;

export interface DiffStatus {
  name: string;
  applied: boolean;
  appliedAt: string | null;
}

/**
 * Applies numbered schema diff files once each, recording them in `sql_diff`.
 */
export class DiffRunner {
  private readonly logger: Logger;
  private readonly unitOfWork: UnitOfWork;
  private readonly sqlDiffs: SqlDiffRepository;

  constructor(
    private readonly client: SQLiteClient,
    private readonly diffsDir: string,
  ) {
    this.logger = getLogger('DiffRunner');
    this.unitOfWork = client.getUnitOfWork();
    this.sqlDiffs = this.unitOfWork.sqlDiffs;
  }

  /**
   * Diff file names in the directory, in sequence order. A missing directory has none.
   */
  discover(): string[] {
    if (!fs.existsSync(this.diffsDir)) {
      this.logger.debug('Diffs directory does not exist', { diffsDir: this.diffsDir });
      return [];
    }

    return fs
      .readdirSync(this.diffsDir)
      .filter((name) => DIFF_FILE_PATTERN.test(name))
      .sort(compareDiffNames);
  }

  /**
   * Tracks discovered diffs not yet known to the database. Returns the new names.
   */
  async register(): Promise<string[]> {
    const known = new Set(this.sqlDiffs.scan().map((diff) => diff.sql_diff_name));
    const added: string[] = [];

    for (const name of this.discover()) {
      if (!known.has(name)) {
        this.sqlDiffs.insert(name);
        added.push(name);
      }
    }

    if (added.length > 0) {
      this.logger.info('Registered schema diffs', { diffs: added });
    }
    return added;
  }

  /**
   * Applies every unapplied diff in sequence order, each in its own transaction.
   * Stops at the first failure; diffs applied before it stay applied.
   */
  async applyPending(): Promise<string[]> {
    await this.register();
    const pending = this.sqlDiffs.scanUnapplied();
    const applied: string[] = [];

    for (const diff of pending) {
      this.apply(diff);
      applied.push(diff.sql_diff_name);
    }

    if (applied.length > 0) {
      this.logger.info('Applied schema diffs', { diffs: applied });
    }
    return applied;
  }

  /**
   * Tracked diffs plus diff files on disk the database does not know about yet,
   * which are reported as unapplied. Read-only: nothing is registered.
   */
  async status(): Promise<DiffStatus[]> {
    const statuses: DiffStatus[] = this.sqlDiffs.scan().map((diff) => ({
      name: diff.sql_diff_name,
      applied: diff.applied_dttm !== null,
      appliedAt: diff.applied_dttm,
    }));
    const known = new Set(statuses.map((diff) => diff.name));

    for (const name of this.discover()) {
      if (!known.has(name)) {
        statuses.push({ name, applied: false, appliedAt: null });
      }
    }
    return statuses.sort((a, b) => compareDiffNames(a.name, b.name));
  }

  private apply(diff: SqlDiffDTO): void {
    const name = diff.sql_diff_name;
    const filePath = path.join(this.diffsDir, name);

    let sql: string;
    try {
      sql = fs.readFileSync(filePath, 'utf8');
    } catch (error) {
      throw new MigrationError(name, `cannot read ${filePath}: ${getErrorMessage(error)}`, error);
    }

    const done = this.logger.startTimer(`apply ${name}`);
    try {
      this.unitOfWork.withTransaction(() => {
        this.client.exec(sql);
        this.sqlDiffs.markApplied(name);
      });
    } catch (error) {
      logError(this.logger, 'Schema diff failed', error, { diff: name });
      throw new MigrationError(name, getErrorMessage(error), error);
    }
    done();
  }
}

function sequenceOf(name: string): number {
  return parseInt(name.substring(4, 7), 10);
}

export function compareDiffNames(a: string, b: string): number {
  return sequenceOf(a) - sequenceOf(b) || a.localeCompare(b);
}
