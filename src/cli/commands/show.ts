import { Command } from 'commander';
import { BaseCommand } from './base';
import { displayBuild } from '../ui';
import { DataValidationError } from '../../utils/error-handling';

interface ShowOptions {
  version?: string;
  includeDeleted?: boolean;
}

export class ShowCommand extends BaseCommand {
  register(): Command {
    return this.program
      .command('show [buildId]')
      .description('Show one Build Record by id or version')
      .option('-v, --version <version>', 'Look the build up by version instead of id')
      .option('--include-deleted', 'Also show soft-deleted builds')
      .action(async (rawBuildId: string | undefined, options: ShowOptions, command: Command) => {
        try {
          if ((rawBuildId === undefined) === (options.version === undefined)) {
            throw new DataValidationError('invalid arguments', ['pass either a build id or --version']);
          }
          const lookup = { includeDeleted: Boolean(options.includeDeleted) };

          await this.withLedger(command, async ({ ledger }) => {
            const build =
              rawBuildId !== undefined
                ? await ledger.getBuild(this.parseBuildId(rawBuildId), lookup)
                : await ledger.getBuildByVersion(options.version ?? '', lookup);
            displayBuild(build);
          });
        } catch (error) {
          this.handleError(error, 'Show failed');
        }
      });
  }
}
