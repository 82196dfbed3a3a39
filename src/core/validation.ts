/**
 * @file Input schemas for the ledger's lifecycle operations.
 */

import { z } from 'zod';
import { MAX_LABEL_LENGTH } from '../persistence/models/BuildDTO';
import { MAX_LIST_LIMIT } from '../persistence/repositories/BuildRepository';
import { DataValidationError } from '../utils/error-handling';

const label = (field: string) =>
  z
    .string({ required_error: `${field} is required` })
    .trim()
    .min(1, `${field} must not be empty`)
    .max(MAX_LABEL_LENGTH, `${field} must be at most ${MAX_LABEL_LENGTH} characters`);

const exitStatus = z.number({ required_error: 'exit status is required' }).int('exit status must be an integer');

const measure = (field: string) =>
  z.number().finite(`${field} must be finite`).nonnegative(`${field} must not be negative`);

export const BuildIdSchema = z.number().int('build id must be an integer').positive('build id must be positive');

export const StartBuildInputSchema = z.object({
  branch: label('branch'),
  revision: label('revision'),
});

export const FinishBuildInputSchema = z.object({
  exitStatus,
  version: label('version').nullable().optional(),
  output: z.string().nullable().optional(),
  execSec: measure('execSec').nullable().optional(),
  size: measure('size').nullable().optional(),
  previousVersion: label('previousVersion').nullable().optional(),
});

export const PhaseResultInputSchema = z.object({
  exitStatus,
  output: z.string().nullable().optional(),
});

export const ListBuildsFilterSchema = z.object({
  branch: label('branch').optional(),
  revision: label('revision').optional(),
  includeDeleted: z.boolean().optional(),
  limit: z.number().int().min(1).max(MAX_LIST_LIMIT).optional(),
  offset: z.number().int().min(0).optional(),
});

export type StartBuildInput = z.input<typeof StartBuildInputSchema>;
export type FinishBuildInput = z.input<typeof FinishBuildInputSchema>;
export type PhaseResultInput = z.input<typeof PhaseResultInputSchema>;
export type ListBuildsFilter = z.input<typeof ListBuildsFilterSchema>;

/**
 * Parses `input` with `schema`, turning zod issues into a DataValidationError
 * with one `path: message` entry per issue.
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    );
    throw new DataValidationError(`invalid ${what}`, issues);
  }
  return result.data;
}
