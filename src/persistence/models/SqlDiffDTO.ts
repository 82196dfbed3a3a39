import { z } from 'zod';
import { BaseDTO } from './base.dto';

export const MAX_DIFF_NAME_LENGTH = 80;

/**
 * A schema diff file known to the database, applied or not.
 */
export interface SqlDiffDTO extends BaseDTO {
  sql_diff_id: number;
  sql_diff_name: string;
  applied_dttm: string | null;
}

export const SqlDiffRowSchema = z.object({
  sql_diff_id: z.number().int(),
  sql_diff_name: z.string(),
  create_dttm: z.string(),
  applied_dttm: z.string().nullable(),
}) satisfies z.ZodType<SqlDiffDTO>;
