/**
 * @file Integrity rules the build table enforces on its own, whatever client writes to it.
 */

import { SQLiteClient } from '../db/connection';
import { TIMESTAMP_PATTERN } from '../db/sql';
import { BuildRowSchema } from '../models';
import { initializeTables } from '../db/schema';
import {
  CheckConstraintError,
  ImmutableColumnError,
  NotNullConstraintError,
  UniqueConstraintError,
} from '../../utils/error-handling';
import { sleep } from '../../../tests/helpers/test-utils';

describe('build table', () => {
  let client: SQLiteClient;

  const insert = (branch: string, revision: string, version: string | null = null): number =>
    Number(
      client.run('INSERT INTO build (branch, revision, version) VALUES (?, ?, ?)', [branch, revision, version])
        .lastInsertRowid,
    );

  const readRow = (buildId: number) => BuildRowSchema.parse(client.get('SELECT * FROM build WHERE build_id = ?', [buildId]));

  beforeEach(async () => {
    client = new SQLiteClient(':memory:');
    await client.connect();
  });

  afterEach(() => {
    client.disconnect();
  });

  describe('inserting', () => {
    it('should fill in the id and timestamps for a minimal build', () => {
      const buildId = insert('main', 'abc123');
      const build = readRow(buildId);

      expect(buildId).toBe(1);
      expect(build.version).toBeNull();
      expect(build.build_exit_status).toBeNull();
      expect(build.deploy_dttm).toBeNull();
      expect(build.delete_dttm).toBeNull();
      expect(build.create_dttm).toMatch(TIMESTAMP_PATTERN);
      expect(build.update_dttm).toBe(build.create_dttm);
    });

    it('should hand out increasing build ids', () => {
      const ids = [insert('main', 'a1'), insert('main', 'a2'), insert('dev', 'a3')];

      expect(ids).toEqual([1, 2, 3]);
    });

    it('should not reuse the id of the highest deleted row', () => {
      insert('main', 'a1');
      const second = insert('main', 'a2');
      client.run('DELETE FROM build WHERE build_id = ?', [second]);

      expect(insert('main', 'a3')).toBe(3);
    });

    it('should require a branch', () => {
      expect(() => client.run('INSERT INTO build (revision) VALUES (?)', ['abc123'])).toThrow(
        expect.objectContaining({ name: 'NotNullConstraintError', table: 'build', column: 'branch' }),
      );
    });

    it('should require a revision', () => {
      expect(() => client.run('INSERT INTO build (branch) VALUES (?)', ['main'])).toThrow(NotNullConstraintError);
      expect(() => client.run('INSERT INTO build (branch) VALUES (?)', ['main'])).toThrow(
        'NOT NULL constraint failed: build.revision',
      );
    });

    it('should reject labels longer than 100 characters', () => {
      expect(() => insert('b'.repeat(101), 'abc123')).toThrow(
        expect.objectContaining({ name: 'CheckConstraintError', constraint: 'build_branch_length' }),
      );
      expect(() => insert('main', 'r'.repeat(101))).toThrow(CheckConstraintError);
      expect(() => insert('main', 'abc123', 'v'.repeat(101))).toThrow(CheckConstraintError);
    });

    it('should accept labels of exactly 100 characters', () => {
      const buildId = insert('b'.repeat(100), 'r'.repeat(100), 'v'.repeat(100));

      expect(readRow(buildId).branch).toHaveLength(100);
    });
  });

  describe('initializeTables', () => {
    it('should leave an existing database as it is', () => {
      const buildId = insert('main', 'abc123');

      initializeTables(client.getDb());

      expect(readRow(buildId).revision).toBe('abc123');
      expect(client.get("SELECT COUNT(*) AS count FROM sqlite_master WHERE type = 'trigger'")).toEqual({ count: 4 });
    });
  });

  describe('versions', () => {
    it('should reject a version already recorded', () => {
      insert('main', 'a1', '1.0.0');

      expect(() => insert('dev', 'a2', '1.0.0')).toThrow(UniqueConstraintError);
      expect(() => insert('dev', 'a2', '1.0.0')).toThrow(
        expect.objectContaining({ table: 'build', column: 'version' }),
      );
    });

    it('should allow any number of builds without a version', () => {
      insert('main', 'a1');
      insert('main', 'a2');
      insert('main', 'a3');

      expect(client.get('SELECT COUNT(*) AS count FROM build WHERE version IS NULL')).toEqual({ count: 3 });
    });
  });

  describe('updating', () => {
    it('should refuse to change build_id', () => {
      const buildId = insert('main', 'abc123');

      expect(() => client.run('UPDATE build SET build_id = 99 WHERE build_id = ?', [buildId])).toThrow(
        expect.objectContaining({ name: 'ImmutableColumnError', table: 'build', column: 'build_id' }),
      );
    });

    it('should refuse to change create_dttm', () => {
      const buildId = insert('main', 'abc123');

      expect(() =>
        client.run("UPDATE build SET create_dttm = '2000-01-01 00:00:00.000' WHERE build_id = ?", [buildId]),
      ).toThrow('build.create_dttm is immutable');
    });

    it('should allow rewriting create_dttm with its current value', () => {
      const buildId = insert('main', 'abc123');
      const { create_dttm } = readRow(buildId);

      expect(client.run('UPDATE build SET create_dttm = ? WHERE build_id = ?', [create_dttm, buildId]).changes).toBe(1);
    });

    it('should refresh update_dttm on every update and leave create_dttm alone', async () => {
      const buildId = insert('main', 'abc123');
      const before = readRow(buildId);
      await sleep(5);

      client.run('UPDATE build SET build_exit_status = 0 WHERE build_id = ?', [buildId]);
      const after = readRow(buildId);

      expect(after.create_dttm).toBe(before.create_dttm);
      expect(after.update_dttm > before.update_dttm).toBe(true);
      expect(after.update_dttm).toMatch(TIMESTAMP_PATTERN);
    });

    it('should keep an explicitly assigned later update_dttm', () => {
      const buildId = insert('main', 'abc123');

      client.run("UPDATE build SET update_dttm = '2999-01-01 00:00:00.000' WHERE build_id = ?", [buildId]);
      expect(readRow(buildId).update_dttm).toBe('2999-01-01 00:00:00.000');

      client.run('UPDATE build SET build_exit_status = 1 WHERE build_id = ?', [buildId]);
      expect(readRow(buildId).update_dttm).toBe('2999-01-01 00:00:00.000');
    });

    it('should refresh update_dttm even when no value changes', async () => {
      const buildId = insert('main', 'abc123');
      const before = readRow(buildId);
      await sleep(5);

      client.run('UPDATE build SET branch = branch WHERE build_id = ?', [buildId]);

      expect(readRow(buildId).update_dttm > before.update_dttm).toBe(true);
    });

    it('should refuse to move update_dttm backwards', () => {
      const buildId = insert('main', 'abc123');

      expect(() =>
        client.run("UPDATE build SET update_dttm = '2000-01-01 00:00:00.000' WHERE build_id = ?", [buildId]),
      ).toThrow(ImmutableColumnError);
      expect(() => client.run('UPDATE build SET update_dttm = NULL WHERE build_id = ?', [buildId])).toThrow(
        'build.update_dttm cannot move backwards',
      );
    });
  });
});
