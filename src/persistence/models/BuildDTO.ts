import { z } from 'zod';
import { BaseDTO } from './base.dto';

export const MAX_LABEL_LENGTH = 100;

/**
 * One row of the `build` table: a single build/deploy/revert lifecycle for a
 * branch and revision.
 */
export interface BuildDTO extends BaseDTO {
  build_id: number;
  branch: string;
  revision: string;
  version: string | null;
  build_output_tx: string | null;
  build_exit_status: number | null;
  build_exec_sec: number | null;
  build_size: number | null;
  previous_version: string | null;
  deploy_dttm: string | null;
  deploy_output_tx: string | null;
  deploy_exit_status: number | null;
  revert_dttm: string | null;
  revert_output_tx: string | null;
  revert_exit_status: number | null;
  update_dttm: string;
  delete_dttm: string | null;
}

export const BuildRowSchema = z.object({
  build_id: z.number().int(),
  branch: z.string(),
  revision: z.string(),
  version: z.string().nullable(),
  build_output_tx: z.string().nullable(),
  build_exit_status: z.number().int().nullable(),
  build_exec_sec: z.number().nullable(),
  build_size: z.number().nullable(),
  previous_version: z.string().nullable(),
  deploy_dttm: z.string().nullable(),
  deploy_output_tx: z.string().nullable(),
  deploy_exit_status: z.number().int().nullable(),
  revert_dttm: z.string().nullable(),
  revert_output_tx: z.string().nullable(),
  revert_exit_status: z.number().int().nullable(),
  create_dttm: z.string(),
  update_dttm: z.string(),
  delete_dttm: z.string().nullable(),
}) satisfies z.ZodType<BuildDTO>;

export function isDeleted(build: BuildDTO): boolean {
  return build.delete_dttm !== null;
}
