/**
 * @file Structured logger for build-ledger.
 *       Each line is `<timestamp> [LEVEL] [context] message {metadata}` and goes to
 *       every sink the logger was configured with: the console, a log file, or both.
 */

import * as fs from 'fs';
import * as path from 'path';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogMetadata = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: string;
  metadata?: LogMetadata;
}

export interface LoggerOptions {
  level: LogLevel;
  enableConsole: boolean;
  enableFile: boolean;
  logFilePath?: string;
}

type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  console[level](line);
};

function fileSink(logFilePath: string): LogSink {
  fs.mkdirSync(path.dirname(logFilePath), { recursive: true });
  return (_level, line) => {
    try {
      fs.appendFileSync(logFilePath, `${line}\n`);
    } catch (error) {
      console.error(`Failed to write to log file ${logFilePath}:`, error);
    }
  };
}

function createSinks(options: LoggerOptions): LogSink[] {
  const sinks: LogSink[] = [];
  if (options.enableConsole) {
    sinks.push(consoleSink);
  }
  if (options.enableFile && options.logFilePath) {
    sinks.push(fileSink(options.logFilePath));
  }
  return sinks;
}

/**
 * JSON for log metadata. Bigints become strings and repeated references are cut off.
 */
function stringifyMetadata(metadata: LogMetadata): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(metadata, (_key, value: unknown) => {
    if (typeof value === 'bigint') {
      return value.toString();
    }
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular Reference]';
      }
      seen.add(value);
    }
    return value;
  });
}

export function formatLogEntry({ timestamp, level, message, context, metadata }: LogEntry): string {
  const parts = [timestamp, `[${level.toUpperCase()}]`];
  if (context) {
    parts.push(`[${context}]`);
  }
  parts.push(message);
  if (metadata) {
    parts.push(stringifyMetadata(metadata));
  }
  return parts.join(' ');
}

export class Logger {
  private readonly minRank: number;

  private constructor(
    private readonly level: LogLevel,
    private readonly sinks: readonly LogSink[],
    private readonly context?: string,
  ) {
    this.minRank = LOG_LEVELS.indexOf(level);
  }

  static create(options: LoggerOptions, context?: string): Logger {
    return new Logger(options.level, createSinks(options), context);
  }

  /**
   * A logger writing to the same sinks, tagged `parent:context`.
   */
  child(context: string): Logger {
    return new Logger(this.level, this.sinks, this.context ? `${this.context}:${context}` : context);
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= this.minRank;
  }

  log(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (this.sinks.length === 0 || !this.isEnabled(level)) {
      return;
    }

    const line = formatLogEntry({
      timestamp: new Date().toISOString(),
      level,
      message,
      context: this.context,
      metadata,
    });
    for (const sink of this.sinks) {
      sink(level, line);
    }
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', message, metadata);
  }

  /**
   * Logs `name` at debug level and returns a callback that logs how long it took.
   */
  startTimer(name: string): () => void {
    const startedAt = Date.now();
    this.debug(`${name} started`);
    return () => this.debug(`${name} finished`, { durationMs: Date.now() - startedAt });
  }
}

let rootLogger: Logger | undefined;

export function initializeLogger(options: LoggerOptions): Logger {
  rootLogger = Logger.create(options);
  return rootLogger;
}

/**
 * A child of the root logger. Before `initializeLogger` runs, the root logs `info`
 * and above to the console.
 */
export function getLogger(context?: string): Logger {
  if (!rootLogger) {
    rootLogger = Logger.create({ level: 'info', enableConsole: true, enableFile: false });
  }
  return context ? rootLogger.child(context) : rootLogger;
}
