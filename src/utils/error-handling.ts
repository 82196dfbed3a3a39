/**
 * @file Error types and helpers shared across build-ledger.
 *       Converts unknown thrown values into messages and maps SQLite driver errors
 *       onto typed constraint errors.
 */

import Database from 'better-sqlite3';

/**
 * Safely extracts an error message from an unknown thrown value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }

  return String(error);
}

export function getErrorStack(error: unknown): string | undefined {
  if (error instanceof Error) {
    return error.stack;
  }

  if (error && typeof error === 'object' && 'stack' in error) {
    return String(error.stack);
  }

  return undefined;
}

export function getErrorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function formatError(error: unknown): { message: string; stack?: string } {
  return {
    message: getErrorMessage(error),
    stack: getErrorStack(error),
  };
}

export function logError(
  logger: { error: (message: string, context?: Record<string, unknown>) => void },
  message: string,
  error: unknown,
  additionalContext?: Record<string, unknown>,
): void {
  const errorInfo = formatError(error);
  logger.error(message, {
    error: errorInfo.message,
    stack: errorInfo.stack,
    ...additionalContext,
  });
}

export class DatabaseConnectionError extends Error {
  constructor(
    public readonly database: string,
    message: string,
    public readonly originalError?: unknown,
  ) {
    super(`${database} connection error: ${message}`);
    this.name = 'DatabaseConnectionError';
  }
}

export class DatabaseOperationError extends Error {
  constructor(
    public readonly database: string,
    public readonly operation: string,
    message: string,
    public readonly originalError?: unknown,
  ) {
    super(`${database} ${operation} error: ${message}`);
    this.name = 'DatabaseOperationError';
  }
}

export class DataValidationError extends Error {
  constructor(
    message: string,
    public readonly validationErrors: string[],
  ) {
    super(`Data validation failed: ${message}`);
    this.name = 'DataValidationError';
  }
}

export type ConstraintKind = 'not_null' | 'unique' | 'check' | 'immutable' | 'other';

/**
 * A write rejected by a declarative constraint of the schema.
 */
export class ConstraintViolationError extends Error {
  constructor(
    public readonly kind: ConstraintKind,
    message: string,
    public readonly table?: string,
    public readonly column?: string,
    public readonly originalError?: unknown,
  ) {
    super(message);
    this.name = 'ConstraintViolationError';
  }
}

export class NotNullConstraintError extends ConstraintViolationError {
  constructor(message: string, table?: string, column?: string, originalError?: unknown) {
    super('not_null', message, table, column, originalError);
    this.name = 'NotNullConstraintError';
  }
}

export class UniqueConstraintError extends ConstraintViolationError {
  constructor(message: string, table?: string, column?: string, originalError?: unknown) {
    super('unique', message, table, column, originalError);
    this.name = 'UniqueConstraintError';
  }
}

/**
 * `constraint` holds the name of the CHECK constraint that failed.
 */
export class CheckConstraintError extends ConstraintViolationError {
  constructor(
    message: string,
    public readonly constraint?: string,
    originalError?: unknown,
  ) {
    super('check', message, undefined, undefined, originalError);
    this.name = 'CheckConstraintError';
  }
}

export class ImmutableColumnError extends ConstraintViolationError {
  constructor(message: string, table?: string, column?: string, originalError?: unknown) {
    super('immutable', message, table, column, originalError);
    this.name = 'ImmutableColumnError';
  }
}

export class BuildNotFoundError extends Error {
  constructor(public readonly lookup: string) {
    super(`Build not found: ${lookup}`);
    this.name = 'BuildNotFoundError';
  }
}

export class DuplicateVersionError extends Error {
  constructor(
    public readonly version: string,
    public readonly originalError?: unknown,
  ) {
    super(`Version already recorded: ${version}`);
    this.name = 'DuplicateVersionError';
  }
}

export class MigrationError extends Error {
  constructor(
    public readonly diffName: string,
    message: string,
    public readonly originalError?: unknown,
  ) {
    super(`Migration ${diffName} failed: ${message}`);
    this.name = 'MigrationError';
  }
}

const QUALIFIED_COLUMN = /constraint failed: (\w+)\.(\w+)/i;
const CHECK_NAME = /CHECK constraint failed: (\w+)/i;
// Trigger aborts carry messages of the form "<table>.<column> is immutable"
const TRIGGER_COLUMN = /^(\w+)\.(\w+) /;

/**
 * Maps a better-sqlite3 error onto the typed constraint errors above. Anything
 * that is not a constraint failure becomes a DatabaseOperationError.
 */
export function translateSqliteError(error: unknown, operation: string): Error {
  if (error instanceof ConstraintViolationError || error instanceof DatabaseOperationError) {
    return error;
  }

  const message = getErrorMessage(error);
  if (!(error instanceof Database.SqliteError) || !error.code.startsWith('SQLITE_CONSTRAINT')) {
    return new DatabaseOperationError('SQLite', operation, message, error);
  }

  const qualified = QUALIFIED_COLUMN.exec(message);
  const table = qualified?.[1];
  const column = qualified?.[2];

  switch (error.code) {
    case 'SQLITE_CONSTRAINT_NOTNULL':
      return new NotNullConstraintError(message, table, column, error);
    case 'SQLITE_CONSTRAINT_UNIQUE':
    case 'SQLITE_CONSTRAINT_PRIMARYKEY':
      return new UniqueConstraintError(message, table, column, error);
    case 'SQLITE_CONSTRAINT_CHECK':
      return new CheckConstraintError(message, CHECK_NAME.exec(message)?.[1], error);
    case 'SQLITE_CONSTRAINT_TRIGGER': {
      const target = TRIGGER_COLUMN.exec(message);
      return new ImmutableColumnError(message, target?.[1], target?.[2], error);
    }
    default:
      return new ConstraintViolationError('other', message, table, column, error);
  }
}

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  retryableErrors?: string[];
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 200,
  maxDelayMs: 2000,
  backoffMultiplier: 2,
  retryableErrors: ['SQLITE_BUSY', 'SQLITE_LOCKED'],
};

export function isRetryableError(error: unknown, retryConfig: RetryConfig = DEFAULT_RETRY_CONFIG): boolean {
  if (!retryConfig.retryableErrors) {
    return false;
  }

  const errorMessage = getErrorMessage(error);
  const errorCode = getErrorCode(error);

  return retryConfig.retryableErrors.some(
    (retryable) => errorMessage.includes(retryable) || (errorCode !== undefined && errorCode.startsWith(retryable)),
  );
}

/**
 * Runs an operation, retrying retryable failures with exponential backoff.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  retryConfig: RetryConfig = DEFAULT_RETRY_CONFIG,
  logger?: {
    debug: (message: string, context?: Record<string, unknown>) => void;
    warn: (message: string, context?: Record<string, unknown>) => void;
  },
  operationName: string = 'operation',
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= retryConfig.maxAttempts; attempt++) {
    try {
      const result = await operation();
      if (attempt > 1 && logger) {
        logger.debug(`${operationName} succeeded on attempt ${attempt}`);
      }
      return result;
    } catch (error) {
      lastError = error;

      if (attempt === retryConfig.maxAttempts) {
        break;
      }

      if (!isRetryableError(error, retryConfig)) {
        throw error;
      }

      const delay = Math.min(
        retryConfig.baseDelayMs * Math.pow(retryConfig.backoffMultiplier, attempt - 1),
        retryConfig.maxDelayMs,
      );

      if (logger) {
        logger.warn(`${operationName} failed on attempt ${attempt}, retrying in ${delay}ms`, {
          error: getErrorMessage(error),
          attempt,
          maxAttempts: retryConfig.maxAttempts,
        });
      }

      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  throw lastError;
}
