import { Command } from 'commander';
import { BaseCommand } from './base';
import { displaySuccess } from '../ui';

export class StartCommand extends BaseCommand {
  register(): Command {
    return this.program
      .command('start <branch> <revision>')
      .description('Open a Build Record for a branch and revision')
      .action(async (branch: string, revision: string, _options: Record<string, never>, command: Command) => {
        try {
          await this.withLedger(command, async ({ ledger }) => {
            const build = await ledger.startBuild({ branch, revision });
            displaySuccess(`Started build #${build.build_id}`, {
              build_id: build.build_id,
              branch: build.branch,
              revision: build.revision,
            });
          });
        } catch (error) {
          this.handleError(error, 'Start failed');
        }
      });
  }
}
