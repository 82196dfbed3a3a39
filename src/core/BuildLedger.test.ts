/**
 * @file Tests for the build lifecycle service.
 */

import { BuildLedger } from './BuildLedger';
import { SQLiteClient } from '../persistence/db/connection';
import { TIMESTAMP_PATTERN } from '../persistence/db/sql';
import { BuildNotFoundError, DataValidationError, DuplicateVersionError } from '../utils/error-handling';

describe('BuildLedger', () => {
  let client: SQLiteClient;
  let ledger: BuildLedger;

  beforeEach(async () => {
    client = new SQLiteClient(':memory:');
    await client.connect();
    ledger = new BuildLedger(client);
  });

  afterEach(() => {
    client.disconnect();
  });

  describe('startBuild', () => {
    it('should open a build with only branch and revision set', async () => {
      const build = await ledger.startBuild({ branch: 'main', revision: 'abc123' });

      expect(build).toMatchObject({
        build_id: 1,
        branch: 'main',
        revision: 'abc123',
        version: null,
        build_exit_status: null,
        deploy_dttm: null,
        revert_dttm: null,
        delete_dttm: null,
      });
      expect(build.create_dttm).toMatch(TIMESTAMP_PATTERN);
    });

    it('should trim labels', async () => {
      const build = await ledger.startBuild({ branch: '  release/1.x ', revision: ' abc123' });

      expect(build.branch).toBe('release/1.x');
      expect(build.revision).toBe('abc123');
    });

    it('should reject empty or oversized labels', async () => {
      await expect(ledger.startBuild({ branch: '   ', revision: 'abc123' })).rejects.toMatchObject({
        message: 'Data validation failed: invalid build start',
        validationErrors: ['branch: branch must not be empty'],
      });
      await expect(ledger.startBuild({ branch: 'main', revision: 'r'.repeat(101) })).rejects.toMatchObject({
        validationErrors: ['revision: revision must be at most 100 characters'],
      });
      expect((await ledger.stats()).total).toBe(0);
    });
  });

  describe('finishBuild', () => {
    it('should record the build outcome', async () => {
      const { build_id } = await ledger.startBuild({ branch: 'main', revision: 'abc123' });

      const build = await ledger.finishBuild(build_id, {
        exitStatus: 0,
        version: '1.0.0',
        output: 'compiled 12 files\n',
        execSec: 42.5,
        size: 1048576,
      });

      expect(build).toMatchObject({
        version: '1.0.0',
        build_exit_status: 0,
        build_output_tx: 'compiled 12 files\n',
        build_exec_sec: 42.5,
        build_size: 1048576,
        previous_version: null,
      });
    });

    it('should default previous_version to the version live on the branch', async () => {
      const first = await ledger.startBuild({ branch: 'main', revision: 'a1' });
      await ledger.finishBuild(first.build_id, { exitStatus: 0, version: '1.0.0' });
      await ledger.recordDeploy(first.build_id, { exitStatus: 0 });

      const second = await ledger.startBuild({ branch: 'main', revision: 'a2' });
      const other = await ledger.startBuild({ branch: 'dev', revision: 'a3' });

      expect((await ledger.finishBuild(second.build_id, { exitStatus: 0, version: '1.1.0' })).previous_version).toBe(
        '1.0.0',
      );
      expect((await ledger.finishBuild(other.build_id, { exitStatus: 0, version: '2.0.0' })).previous_version).toBeNull();
    });

    it('should keep an explicit previous version, including null', async () => {
      const first = await ledger.startBuild({ branch: 'main', revision: 'a1' });
      await ledger.finishBuild(first.build_id, { exitStatus: 0, version: '1.0.0' });
      await ledger.recordDeploy(first.build_id, { exitStatus: 0 });
      const second = await ledger.startBuild({ branch: 'main', revision: 'a2' });
      const third = await ledger.startBuild({ branch: 'main', revision: 'a3' });

      const explicit = await ledger.finishBuild(second.build_id, { exitStatus: 0, previousVersion: '0.9.0' });
      const cleared = await ledger.finishBuild(third.build_id, { exitStatus: 0, previousVersion: null });

      expect(explicit.previous_version).toBe('0.9.0');
      expect(cleared.previous_version).toBeNull();
    });

    it('should not name the build itself as its previous version', async () => {
      const build = await ledger.startBuild({ branch: 'main', revision: 'a1' });
      await ledger.finishBuild(build.build_id, { exitStatus: 0, version: '1.0.0' });
      await ledger.recordDeploy(build.build_id, { exitStatus: 0 });

      const rebuilt = await ledger.finishBuild(build.build_id, { exitStatus: 0, version: '1.0.0' });

      expect(rebuilt.previous_version).toBeNull();
    });

    it('should store NULL for omitted values when a build is finished again', async () => {
      const { build_id } = await ledger.startBuild({ branch: 'main', revision: 'abc123' });
      await ledger.finishBuild(build_id, { exitStatus: 1, version: '1.0.0', output: 'failed', execSec: 3 });

      const build = await ledger.finishBuild(build_id, { exitStatus: 0 });

      expect(build).toMatchObject({ build_exit_status: 0, version: null, build_output_tx: null, build_exec_sec: null });
    });

    it('should reject a version recorded by another build', async () => {
      const first = await ledger.startBuild({ branch: 'main', revision: 'a1' });
      const second = await ledger.startBuild({ branch: 'main', revision: 'a2' });
      await ledger.finishBuild(first.build_id, { exitStatus: 0, version: '1.0.0' });

      await expect(ledger.finishBuild(second.build_id, { exitStatus: 0, version: '1.0.0' })).rejects.toThrow(
        DuplicateVersionError,
      );
      expect((await ledger.getBuild(second.build_id)).build_exit_status).toBeNull();
      expect(client.getDb().inTransaction).toBe(false);
    });

    it('should validate the result', async () => {
      const { build_id } = await ledger.startBuild({ branch: 'main', revision: 'abc123' });

      await expect(ledger.finishBuild(build_id, { exitStatus: 1.5 })).rejects.toMatchObject({
        validationErrors: ['exitStatus: exit status must be an integer'],
      });
      await expect(ledger.finishBuild(build_id, { exitStatus: 0, execSec: -1 })).rejects.toMatchObject({
        validationErrors: ['execSec: execSec must not be negative'],
      });
    });

    it('should fail for an unknown build', async () => {
      await expect(ledger.finishBuild(99, { exitStatus: 0 })).rejects.toThrow('Build not found: #99');
    });
  });

  describe('concurrent calls', () => {
    it('should keep a build started alongside a failing finish', async () => {
      const first = await ledger.startBuild({ branch: 'main', revision: 'a1' });
      const second = await ledger.startBuild({ branch: 'main', revision: 'a2' });
      await ledger.finishBuild(first.build_id, { exitStatus: 0, version: '1.0.0' });

      const [finished, started] = await Promise.allSettled([
        ledger.finishBuild(second.build_id, { exitStatus: 0, version: '1.0.0' }),
        ledger.startBuild({ branch: 'dev', revision: 'c3' }),
      ]);

      expect(finished).toMatchObject({ status: 'rejected', reason: expect.any(DuplicateVersionError) });
      expect(started).toMatchObject({ status: 'fulfilled', value: { build_id: 3, branch: 'dev' } });
      expect(await ledger.stats()).toEqual({ total: 3, active: 3, deleted: 0 });
      expect((await ledger.getBuild(3)).revision).toBe('c3');
      expect(client.getDb().inTransaction).toBe(false);
    });

    it('should commit overlapping phase updates on different builds', async () => {
      const first = await ledger.startBuild({ branch: 'main', revision: 'a1' });
      const second = await ledger.startBuild({ branch: 'dev', revision: 'a2' });

      const results = await Promise.allSettled([
        ledger.finishBuild(first.build_id, { exitStatus: 0, version: '1.0.0' }),
        ledger.finishBuild(second.build_id, { exitStatus: 1, version: '2.0.0' }),
        ledger.recordDeploy(first.build_id, { exitStatus: 0 }),
      ]);

      expect(results.map((result) => result.status)).toEqual(['fulfilled', 'fulfilled', 'fulfilled']);
      expect(await ledger.getBuild(first.build_id)).toMatchObject({ version: '1.0.0', deploy_exit_status: 0 });
      expect(await ledger.getBuild(second.build_id)).toMatchObject({ version: '2.0.0', build_exit_status: 1 });
    });
  });

  describe('deploy and revert', () => {
    it('should timestamp the deploy and keep its output', async () => {
      const { build_id } = await ledger.startBuild({ branch: 'main', revision: 'abc123' });

      const build = await ledger.recordDeploy(build_id, { exitStatus: 0, output: 'rolled out to 3 hosts' });

      expect(build.deploy_dttm).toMatch(TIMESTAMP_PATTERN);
      expect(build.deploy_exit_status).toBe(0);
      expect(build.deploy_output_tx).toBe('rolled out to 3 hosts');
    });

    it('should record a revert and take the build out of latestDeployed', async () => {
      const { build_id } = await ledger.startBuild({ branch: 'main', revision: 'abc123' });
      await ledger.recordDeploy(build_id, { exitStatus: 0 });
      expect((await ledger.latestDeployed('main'))?.build_id).toBe(build_id);

      const build = await ledger.recordRevert(build_id, { exitStatus: 0, output: 'restored previous release' });

      expect(build.revert_dttm).toMatch(TIMESTAMP_PATTERN);
      expect(build.revert_exit_status).toBe(0);
      expect(build.revert_output_tx).toBe('restored previous release');
      expect(await ledger.latestDeployed('main')).toBeNull();
    });

    it('should allow a deploy to be recorded before the build result', async () => {
      const { build_id } = await ledger.startBuild({ branch: 'main', revision: 'abc123' });

      const build = await ledger.recordDeploy(build_id, { exitStatus: 2 });

      expect(build.build_exit_status).toBeNull();
      expect(build.deploy_exit_status).toBe(2);
    });
  });

  describe('soft delete', () => {
    it('should hide a deleted build until it is restored', async () => {
      const { build_id } = await ledger.startBuild({ branch: 'main', revision: 'abc123' });

      const deleted = await ledger.deleteBuild(build_id);

      expect(deleted.delete_dttm).toMatch(TIMESTAMP_PATTERN);
      await expect(ledger.getBuild(build_id)).rejects.toThrow(BuildNotFoundError);
      expect((await ledger.getBuild(build_id, { includeDeleted: true })).build_id).toBe(build_id);
      expect(await ledger.listBuilds()).toEqual([]);

      const restored = await ledger.restoreBuild(build_id);

      expect(restored.delete_dttm).toBeNull();
      expect((await ledger.listBuilds()).map((build) => build.build_id)).toEqual([build_id]);
    });

    it('should refuse to update a deleted build', async () => {
      const { build_id } = await ledger.startBuild({ branch: 'main', revision: 'abc123' });
      await ledger.deleteBuild(build_id);

      await expect(ledger.recordDeploy(build_id, { exitStatus: 0 })).rejects.toThrow(BuildNotFoundError);
      await expect(ledger.finishBuild(build_id, { exitStatus: 0 })).rejects.toThrow(BuildNotFoundError);
    });

    it('should leave the delete timestamp alone when deleting twice', async () => {
      const { build_id } = await ledger.startBuild({ branch: 'main', revision: 'abc123' });
      const first = await ledger.deleteBuild(build_id);

      const second = await ledger.deleteBuild(build_id);

      expect(second.delete_dttm).toBe(first.delete_dttm);
    });

    it('should fail for unknown builds', async () => {
      await expect(ledger.deleteBuild(5)).rejects.toThrow('Build not found: #5');
      await expect(ledger.restoreBuild(5)).rejects.toThrow('Build not found: #5');
    });

    it('should count active and deleted builds', async () => {
      await ledger.startBuild({ branch: 'main', revision: 'a1' });
      await ledger.startBuild({ branch: 'main', revision: 'a2' });
      const removed = await ledger.startBuild({ branch: 'main', revision: 'a3' });
      await ledger.deleteBuild(removed.build_id);

      expect(await ledger.stats()).toEqual({ total: 3, active: 2, deleted: 1 });
    });
  });

  describe('lookups', () => {
    it('should find builds by version', async () => {
      const { build_id } = await ledger.startBuild({ branch: 'main', revision: 'abc123' });
      await ledger.finishBuild(build_id, { exitStatus: 0, version: '3.1.4' });

      expect((await ledger.getBuildByVersion('3.1.4')).build_id).toBe(build_id);
      await expect(ledger.getBuildByVersion('0.0.1')).rejects.toThrow('Build not found: version 0.0.1');
    });

    it('should reject build ids that are not positive integers', async () => {
      await expect(ledger.getBuild(0)).rejects.toThrow(DataValidationError);
      await expect(ledger.getBuild(0)).rejects.toMatchObject({ validationErrors: ['build id must be positive'] });
      await expect(ledger.getBuild(1.5)).rejects.toMatchObject({
        validationErrors: ['build id must be an integer'],
      });
    });

    it('should list builds by branch, newest first', async () => {
      await ledger.startBuild({ branch: 'main', revision: 'a1' });
      await ledger.startBuild({ branch: 'dev', revision: 'a2' });
      await ledger.startBuild({ branch: 'main', revision: 'a3' });

      const listed = await ledger.listBuilds({ branch: 'main' });

      expect(listed.map((build) => build.revision)).toEqual(['a3', 'a1']);
    });

    it('should reject a list limit out of range', async () => {
      await expect(ledger.listBuilds({ limit: 0 })).rejects.toThrow(DataValidationError);
    });
  });
});
