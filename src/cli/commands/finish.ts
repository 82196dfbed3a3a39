import { Command } from 'commander';
import { BaseCommand, OutputOptions } from './base';
import { displaySuccess } from '../ui';

interface FinishOptions extends OutputOptions {
  exitStatus: string;
  version?: string;
  execSec?: string;
  size?: string;
  previousVersion?: string;
}

export class FinishCommand extends BaseCommand {
  register(): Command {
    return this.program
      .command('finish <buildId>')
      .description('Record the result of the build phase')
      .requiredOption('-e, --exit-status <code>', 'Exit status of the build process')
      .option('-v, --version <version>', 'Version produced by the build')
      .option('--exec-sec <seconds>', 'Build duration in seconds')
      .option('--size <size>', 'Artifact size')
      .option('--previous-version <version>', 'Version this build replaces (defaults to the deployed one)')
      .option('-o, --output <text>', 'Build log text')
      .option('--output-file <path>', 'Read the build log from a file')
      .action(async (rawBuildId: string, options: FinishOptions, command: Command) => {
        try {
          const buildId = this.parseBuildId(rawBuildId);
          const exitStatus = this.parseInteger(options.exitStatus, '--exit-status');
          const execSec = this.parseDecimal(options.execSec, '--exec-sec');
          const size = this.parseDecimal(options.size, '--size');
          const output = this.readOutput(options);

          await this.withLedger(command, async ({ ledger }) => {
            const build = await ledger.finishBuild(buildId, {
              exitStatus,
              version: options.version,
              execSec,
              size,
              previousVersion: options.previousVersion,
              output,
            });
            displaySuccess(`Recorded build result for #${build.build_id}`, {
              version: build.version,
              previous_version: build.previous_version,
              build_exit_status: build.build_exit_status,
            });
          });
        } catch (error) {
          this.handleError(error, 'Finish failed');
        }
      });
  }
}
