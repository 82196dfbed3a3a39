import * as fs from 'fs';
import { Command } from 'commander';
import chalk from 'chalk';
import { ConfigManager, initializeConfig } from '../../config';
import { openLedger, LedgerHandle, OpenLedgerOptions } from '../../index';
import { initializeLogger, LOG_LEVELS, LogLevel } from '../../utils/logger';
import { DataValidationError, getErrorMessage } from '../../utils/error-handling';

export interface GlobalCLIOptions {
  db?: string;
  logLevel?: string;
}

export interface OutputOptions {
  output?: string;
  outputFile?: string;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export abstract class BaseCommand {
  protected readonly program: Command;

  constructor(program: Command) {
    this.program = program;
  }

  abstract register(): Command;

  /**
   * Loads configuration for the working directory, applies the global flags and
   * initializes logging.
   */
  protected initConfigAndLogger(globals: GlobalCLIOptions): ConfigManager {
    const config = initializeConfig(process.cwd());

    if (globals.db) {
      const { sqlite } = config.getDatabaseConfig();
      config.updateConfig({
        database: { sqlite: { ...sqlite, path: config.resolveSqlitePath(globals.db) } },
      });
    }
    if (globals.logLevel) {
      const level = globals.logLevel.toLowerCase();
      if (!isLogLevel(level)) {
        throw new DataValidationError('invalid --log-level', [`expected one of ${LOG_LEVELS.join(', ')}`]);
      }
      config.updateConfig({ logging: { level } });
    }

    const loggingConfig = config.getLoggingConfig();
    initializeLogger({
      level: loggingConfig.level,
      enableConsole: loggingConfig.enableConsole,
      enableFile: loggingConfig.enableFile,
      logFilePath: loggingConfig.logFilePath,
    });
    return config;
  }

  /**
   * Opens the ledger for the duration of `work` and always closes it afterwards.
   */
  protected async withLedger<T>(
    command: Command,
    work: (handle: LedgerHandle) => Promise<T>,
    options: OpenLedgerOptions = {},
  ): Promise<T> {
    const config = this.initConfigAndLogger(command.optsWithGlobals<GlobalCLIOptions>());
    const handle = await openLedger(config, options);
    try {
      return await work(handle);
    } finally {
      handle.close();
    }
  }

  protected parseBuildId(raw: string): number {
    const buildId = Number(raw);
    if (!/^\d+$/.test(raw.trim()) || !Number.isSafeInteger(buildId) || buildId < 1) {
      throw new DataValidationError('invalid build id', [`"${raw}" is not a positive integer`]);
    }
    return buildId;
  }

  protected parseInteger(raw: string, flag: string): number {
    if (!/^-?\d+$/.test(raw.trim())) {
      throw new DataValidationError(`invalid ${flag}`, [`"${raw}" is not an integer`]);
    }
    return Number(raw);
  }

  protected parseDecimal(raw: string | undefined, flag: string): number | undefined {
    if (raw === undefined) {
      return undefined;
    }
    const value = Number(raw);
    if (raw.trim() === '' || !Number.isFinite(value)) {
      throw new DataValidationError(`invalid ${flag}`, [`"${raw}" is not a number`]);
    }
    return value;
  }

  /**
   * Log text from `--output` or the contents of `--output-file`; not both.
   */
  protected readOutput(options: OutputOptions): string | undefined {
    if (options.output !== undefined && options.outputFile !== undefined) {
      throw new DataValidationError('conflicting output options', ['use either --output or --output-file']);
    }
    if (options.outputFile !== undefined) {
      return fs.readFileSync(options.outputFile, 'utf8');
    }
    return options.output;
  }

  protected handleError(error: unknown, context: string): never {
    console.error(chalk.red(`❌ ${context}: ${getErrorMessage(error)}`));
    if (error instanceof DataValidationError) {
      error.validationErrors.forEach((issue) => console.error(chalk.red(`   - ${issue}`)));
    }
    if (process.env.NODE_ENV === 'development' && error instanceof Error && error.stack) {
      console.error(chalk.gray(error.stack));
    }
    process.exit(1);
  }
}
