import { SQLiteClient } from '../db/connection';
import { TIMESTAMP_PATTERN } from '../db/sql';
import { SqlDiffRepository } from './SqlDiffRepository';
import { CheckConstraintError, UniqueConstraintError } from '../../utils/error-handling';

describe('SqlDiffRepository', () => {
  let client: SQLiteClient;
  let sqlDiffs: SqlDiffRepository;

  beforeEach(async () => {
    client = new SQLiteClient(':memory:');
    await client.connect();
    sqlDiffs = client.getUnitOfWork().sqlDiffs;
  });

  afterEach(() => {
    client.disconnect();
  });

  it('should track a new diff as unapplied', () => {
    sqlDiffs.insert('diff001_first.sql');
    const diff = sqlDiffs.findByName('diff001_first.sql');

    expect(diff).toMatchObject({ sql_diff_id: 1, sql_diff_name: 'diff001_first.sql', applied_dttm: null });
    expect(diff?.create_dttm).toMatch(TIMESTAMP_PATTERN);
  });

  it('should return null for an unknown diff', () => {
    expect(sqlDiffs.findByName('diff999_missing.sql')).toBeNull();
  });

  it('should refuse to track the same diff twice', () => {
    sqlDiffs.insert('diff001_first.sql');

    expect(() => sqlDiffs.insert('diff001_first.sql')).toThrow(UniqueConstraintError);
  });

  it('should refuse names longer than 80 characters', () => {
    expect(() => sqlDiffs.insert(`diff001_${'x'.repeat(73)}`)).toThrow(CheckConstraintError);
  });

  it('should scan diffs in sequence order regardless of insert order', () => {
    sqlDiffs.insert('diff010_tenth.sql');
    sqlDiffs.insert('diff002_second.sql');
    sqlDiffs.insert('diff001_first.sql');

    const scanned = sqlDiffs.scan();

    expect(scanned.map((diff) => diff.sql_diff_name)).toEqual([
      'diff001_first.sql',
      'diff002_second.sql',
      'diff010_tenth.sql',
    ]);
  });

  it('should only return unapplied diffs from scanUnapplied', () => {
    sqlDiffs.insert('diff002_second.sql');
    sqlDiffs.insert('diff001_first.sql');

    expect(sqlDiffs.markApplied('diff001_first.sql')).toBe(1);

    const pending = sqlDiffs.scanUnapplied();
    const applied = sqlDiffs.findByName('diff001_first.sql');

    expect(pending.map((diff) => diff.sql_diff_name)).toEqual(['diff002_second.sql']);
    expect(applied?.applied_dttm).toMatch(TIMESTAMP_PATTERN);
  });
});
