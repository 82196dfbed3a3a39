import { SQLiteClient } from '../persistence/db/connection';
import { SQL_NOW } from '../persistence/db/sql';
import { BuildDTO, isDeleted } from '../persistence/models';
import { BuildRepository } from '../persistence/repositories';
import { UnitOfWork } from '../persistence/unit-of-work';
import { getLogger, Logger } from '../utils/logger';
import { BuildNotFoundError, DuplicateVersionError, UniqueConstraintError } from '../utils/error-handling';
import {
  BuildIdSchema,
  FinishBuildInput,
  FinishBuildInputSchema,
  ListBuildsFilter,
  ListBuildsFilterSchema,
  PhaseResultInput,
  PhaseResultInputSchema,
  StartBuildInput,
  StartBuildInputSchema,
  parseInput,
} from './validation';

export interface LookupOptions {
  includeDeleted?: boolean;
}

export interface LedgerStats {
  total: number;
  active: number;
  deleted: number;
}

/**
 * Records the build, deploy and revert phases of Build Records.
 *
 * Phases are not ordered: a deploy can be recorded for a build that never
 * reported a result. The read-check-write of each phase runs synchronously
 * inside one transaction, so concurrent calls on the same connection never
 * interleave within it. Each phase call writes all of that phase's columns, so an
 * omitted optional value is stored as NULL. Soft-deleted builds cannot be updated
 * until restored.
 */
export class BuildLedger {
  private readonly unitOfWork: UnitOfWork;
  private readonly builds: BuildRepository;
  private readonly logger: Logger;

  constructor(client: SQLiteClient) {
    this.unitOfWork = client.getUnitOfWork();
    this.builds = this.unitOfWork.builds;
    this.logger = getLogger('BuildLedger');
  }

  /**
   * Opens a Build Record for a branch and revision. Every other field starts out NULL.
   */
  async startBuild(input: StartBuildInput): Promise<BuildDTO> {
    const { branch, revision } = parseInput(StartBuildInputSchema, input, 'build start');
    const buildId = this.builds.add({ branch, revision });
    this.logger.info('Build started', { buildId, branch, revision });
    return this.requireBuild(buildId);
  }

  /**
   * Records the outcome of the build phase. `previousVersion` defaults to the version
   * currently deployed on the build's branch.
   */
  async finishBuild(buildId: number, input: FinishBuildInput): Promise<BuildDTO> {
    const id = parseInput(BuildIdSchema, buildId, 'build id');
    const result = parseInput(FinishBuildInputSchema, input, 'build result');

    return this.unitOfWork.withTransaction(() => {
      const build = this.requireActive(id);

      let previousVersion = result.previousVersion;
      if (previousVersion === undefined) {
        const live = this.builds.latestDeployed(build.branch);
        previousVersion = live && live.build_id !== id ? live.version : null;
      }

      const version = result.version ?? null;
      try {
        this.builds.update(id, {
          version,
          build_output_tx: result.output ?? null,
          build_exit_status: result.exitStatus,
          build_exec_sec: result.execSec ?? null,
          build_size: result.size ?? null,
          previous_version: previousVersion,
        });
      } catch (error) {
        if (version !== null && error instanceof UniqueConstraintError && error.column === 'version') {
          throw new DuplicateVersionError(version, error);
        }
        throw error;
      }

      this.logger.info('Build finished', { buildId: id, version, exitStatus: result.exitStatus });
      return this.requireBuild(id);
    });
  }

  async recordDeploy(buildId: number, input: PhaseResultInput): Promise<BuildDTO> {
    const id = parseInput(BuildIdSchema, buildId, 'build id');
    const result = parseInput(PhaseResultInputSchema, input, 'deploy result');

    return this.unitOfWork.withTransaction(() => {
      this.requireActive(id);
      this.builds.update(id, {
        deploy_dttm: SQL_NOW,
        deploy_output_tx: result.output ?? null,
        deploy_exit_status: result.exitStatus,
      });
      this.logger.info('Deploy recorded', { buildId: id, exitStatus: result.exitStatus });
      return this.requireBuild(id);
    });
  }

  async recordRevert(buildId: number, input: PhaseResultInput): Promise<BuildDTO> {
    const id = parseInput(BuildIdSchema, buildId, 'build id');
    const result = parseInput(PhaseResultInputSchema, input, 'revert result');

    return this.unitOfWork.withTransaction(() => {
      this.requireActive(id);
      this.builds.update(id, {
        revert_dttm: SQL_NOW,
        revert_output_tx: result.output ?? null,
        revert_exit_status: result.exitStatus,
      });
      this.logger.info('Revert recorded', { buildId: id, exitStatus: result.exitStatus });
      return this.requireBuild(id);
    });
  }

  /**
   * Soft-deletes a build. Deleting an already deleted build changes nothing.
   */
  async deleteBuild(buildId: number): Promise<BuildDTO> {
    const id = parseInput(BuildIdSchema, buildId, 'build id');
    const changed = this.builds.softDelete(id);
    const build = this.requireBuild(id);
    if (changed > 0) {
      this.logger.info('Build deleted', { buildId: id });
    }
    return build;
  }

  /**
   * Clears the delete marker. Restoring an active build changes nothing.
   */
  async restoreBuild(buildId: number): Promise<BuildDTO> {
    const id = parseInput(BuildIdSchema, buildId, 'build id');
    const changed = this.builds.restore(id);
    const build = this.requireBuild(id);
    if (changed > 0) {
      this.logger.info('Build restored', { buildId: id });
    }
    return build;
  }

  async getBuild(buildId: number, options: LookupOptions = {}): Promise<BuildDTO> {
    const id = parseInput(BuildIdSchema, buildId, 'build id');
    const build = this.requireBuild(id);
    if (isDeleted(build) && !options.includeDeleted) {
      throw new BuildNotFoundError(`#${id}`);
    }
    return build;
  }

  async getBuildByVersion(version: string, options: LookupOptions = {}): Promise<BuildDTO> {
    const build = this.builds.findByVersion(version);
    if (!build || (isDeleted(build) && !options.includeDeleted)) {
      throw new BuildNotFoundError(`version ${version}`);
    }
    return build;
  }

  async listBuilds(filter: ListBuildsFilter = {}): Promise<BuildDTO[]> {
    return this.builds.list(parseInput(ListBuildsFilterSchema, filter, 'list filter'));
  }

  async latestDeployed(branch: string): Promise<BuildDTO | null> {
    return this.builds.latestDeployed(branch);
  }

  async stats(): Promise<LedgerStats> {
    return {
      total: this.builds.count(),
      active: this.builds.countActive(),
      deleted: this.builds.countDeleted(),
    };
  }

  private requireBuild(buildId: number): BuildDTO {
    const build = this.builds.get(buildId);
    if (!build) {
      throw new BuildNotFoundError(`#${buildId}`);
    }
    return build;
  }

  private requireActive(buildId: number): BuildDTO {
    const build = this.requireBuild(buildId);
    if (isDeleted(build)) {
      throw new BuildNotFoundError(`#${buildId}`);
    }
    return build;
  }
}
