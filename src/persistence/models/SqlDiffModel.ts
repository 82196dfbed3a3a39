import { BaseModel } from './base.model';
import { SqlDiffDTO, SqlDiffRowSchema, MAX_DIFF_NAME_LENGTH } from './SqlDiffDTO';
import { NOW_EXPRESSION } from '../db/sql';

export const SQL_DIFF_TABLE = 'sql_diff';

export class SqlDiffModel extends BaseModel<SqlDiffDTO> {
  getTableName(): string {
    return SQL_DIFF_TABLE;
  }

  getIdColumn(): 'sql_diff_id' {
    return 'sql_diff_id';
  }

  getSchema(): Record<string, string> {
    return {
      sql_diff_id: 'INTEGER PRIMARY KEY AUTOINCREMENT',
      sql_diff_name: `VARCHAR(${MAX_DIFF_NAME_LENGTH}) NOT NULL`,
      create_dttm: `TIMESTAMP NOT NULL DEFAULT (${NOW_EXPRESSION})`,
      applied_dttm: 'TIMESTAMP DEFAULT NULL',
      'UNIQUE (sql_diff_name)': '',
      'CONSTRAINT sql_diff_name_length': `CHECK (length(sql_diff_name) <= ${MAX_DIFF_NAME_LENGTH})`,
    };
  }

  toDto(row: unknown): SqlDiffDTO {
    return SqlDiffRowSchema.parse(row);
  }
}
