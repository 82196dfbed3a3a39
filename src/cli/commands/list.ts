import { Command } from 'commander';
import { BaseCommand } from './base';
import { displayBuilds } from '../ui';
import { DEFAULT_LIST_LIMIT } from '../../persistence/repositories';

interface ListOptions {
  branch?: string;
  revision?: string;
  limit: string;
  offset: string;
  includeDeleted?: boolean;
}

export class ListCommand extends BaseCommand {
  register(): Command {
    return this.program
      .command('list')
      .description('List Build Records, newest first')
      .option('-b, --branch <branch>', 'Only builds of this branch')
      .option('-r, --revision <revision>', 'Only builds of this revision')
      .option('-l, --limit <number>', 'Maximum number of builds', String(DEFAULT_LIST_LIMIT))
      .option('--offset <number>', 'Number of builds to skip', '0')
      .option('--include-deleted', 'Include soft-deleted builds')
      .action(async (options: ListOptions, command: Command) => {
        try {
          const filter = {
            branch: options.branch,
            revision: options.revision,
            limit: this.parseInteger(options.limit, '--limit'),
            offset: this.parseInteger(options.offset, '--offset'),
            includeDeleted: Boolean(options.includeDeleted),
          };

          await this.withLedger(command, async ({ ledger }) => {
            const builds = await ledger.listBuilds(filter);
            displayBuilds(builds, options.branch ? `Builds on ${options.branch}` : 'Builds');
          });
        } catch (error) {
          this.handleError(error, 'List failed');
        }
      });
  }
}
