import { BaseModel } from './base.model';
import { BuildDTO, BuildRowSchema, MAX_LABEL_LENGTH } from './BuildDTO';
import { NOW_EXPRESSION } from '../db/sql';

export const BUILD_TABLE = 'build';

export class BuildModel extends BaseModel<BuildDTO> {
  getTableName(): string {
    return BUILD_TABLE;
  }

  getIdColumn(): 'build_id' {
    return 'build_id';
  }

  getSchema(): Record<string, string> {
    return {
      build_id: 'INTEGER PRIMARY KEY AUTOINCREMENT',
      branch: `VARCHAR(${MAX_LABEL_LENGTH}) NOT NULL`,
      revision: `VARCHAR(${MAX_LABEL_LENGTH}) NOT NULL`,
      version: `VARCHAR(${MAX_LABEL_LENGTH}) DEFAULT NULL`,
      build_output_tx: 'MEDIUMTEXT DEFAULT NULL',
      build_exit_status: 'INTEGER DEFAULT NULL',
      build_exec_sec: 'DECIMAL DEFAULT NULL',
      build_size: 'DECIMAL DEFAULT NULL',
      previous_version: `VARCHAR(${MAX_LABEL_LENGTH}) DEFAULT NULL`,
      deploy_dttm: 'TIMESTAMP DEFAULT NULL',
      deploy_output_tx: 'MEDIUMTEXT DEFAULT NULL',
      deploy_exit_status: 'INTEGER DEFAULT NULL',
      revert_dttm: 'TIMESTAMP DEFAULT NULL',
      revert_output_tx: 'MEDIUMTEXT DEFAULT NULL',
      revert_exit_status: 'INTEGER DEFAULT NULL',
      create_dttm: `TIMESTAMP NOT NULL DEFAULT (${NOW_EXPRESSION})`,
      update_dttm: `TIMESTAMP NOT NULL DEFAULT (${NOW_EXPRESSION})`,
      delete_dttm: 'TIMESTAMP DEFAULT NULL',
      'UNIQUE (version)': '',
      // SQLite ignores VARCHAR lengths
      'CONSTRAINT build_branch_length': `CHECK (length(branch) <= ${MAX_LABEL_LENGTH})`,
      'CONSTRAINT build_revision_length': `CHECK (length(revision) <= ${MAX_LABEL_LENGTH})`,
      'CONSTRAINT build_version_length': `CHECK (length(version) <= ${MAX_LABEL_LENGTH})`,
      'CONSTRAINT build_previous_version_length': `CHECK (length(previous_version) <= ${MAX_LABEL_LENGTH})`,
    };
  }

  getIndexes(): Record<string, string[]> {
    return {
      branch: ['branch', 'build_id'],
      revision: ['revision'],
      delete_dttm: ['delete_dttm'],
    };
  }

  getTriggers(): Record<string, string> {
    return {
      build_id_immutable: `BEFORE UPDATE OF build_id ON build
      FOR EACH ROW WHEN NEW.build_id IS NOT OLD.build_id
      BEGIN
        SELECT RAISE(ABORT, 'build.build_id is immutable');
      END`,
      build_create_dttm_immutable: `BEFORE UPDATE OF create_dttm ON build
      FOR EACH ROW WHEN NEW.create_dttm IS NOT OLD.create_dttm
      BEGIN
        SELECT RAISE(ABORT, 'build.create_dttm is immutable');
      END`,
      build_update_dttm_monotonic: `BEFORE UPDATE OF update_dttm ON build
      FOR EACH ROW WHEN NEW.update_dttm IS NULL OR NEW.update_dttm < OLD.update_dttm
      BEGIN
        SELECT RAISE(ABORT, 'build.update_dttm cannot move backwards');
      END`,
      // Mirrors ON UPDATE CURRENT_TIMESTAMP: an explicitly assigned update_dttm wins
      build_touch_update_dttm: `AFTER UPDATE ON build
      FOR EACH ROW WHEN NEW.update_dttm IS OLD.update_dttm
      BEGIN
        UPDATE build SET update_dttm = max(${NOW_EXPRESSION}, OLD.update_dttm)
        WHERE build_id = NEW.build_id;
      END`,
    };
  }

  toDto(row: unknown): BuildDTO {
    return BuildRowSchema.parse(row);
  }
}
