/**
 * A fragment of SQL inlined verbatim into generated statements instead of being
 * bound as a parameter. Only ever construct these from constants.
 */
export class SqlLiteral {
  constructor(public readonly sql: string) {}

  toString(): string {
    return this.sql;
  }
}

/**
 * Current UTC time as `YYYY-MM-DD HH:MM:SS.SSS`. Lexical order of these strings is
 * chronological order.
 */
export const NOW_EXPRESSION = "strftime('%Y-%m-%d %H:%M:%f', 'now')";

export const SQL_NOW = new SqlLiteral(NOW_EXPRESSION);

export const TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\.\d{3}$/;

export function isSqlLiteral(value: unknown): value is SqlLiteral {
  return value instanceof SqlLiteral;
}

/**
 * Formats a Date in the stored timestamp format.
 */
export function toDbTimestamp(date: Date): string {
  return date.toISOString().replace('T', ' ').replace('Z', '');
}

/**
 * Parses a stored timestamp back into a Date (the stored value is UTC).
 */
export function fromDbTimestamp(value: string): Date {
  return new Date(value.replace(' ', 'T') + 'Z');
}
