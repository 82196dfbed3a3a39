import { Command } from 'commander';
import { BaseCommand } from './base';
import { displaySuccess } from '../ui';

export class DeleteCommand extends BaseCommand {
  register(): Command {
    return this.program
      .command('delete <buildId>')
      .description('Soft-delete a Build Record (sets delete_dttm)')
      .action(async (rawBuildId: string, _options: Record<string, never>, command: Command) => {
        try {
          const buildId = this.parseBuildId(rawBuildId);
          await this.withLedger(command, async ({ ledger }) => {
            const build = await ledger.deleteBuild(buildId);
            displaySuccess(`Deleted build #${build.build_id}`, { delete_dttm: build.delete_dttm });
          });
        } catch (error) {
          this.handleError(error, 'Delete failed');
        }
      });
  }
}

export class RestoreCommand extends BaseCommand {
  register(): Command {
    return this.program
      .command('restore <buildId>')
      .description('Restore a soft-deleted Build Record')
      .action(async (rawBuildId: string, _options: Record<string, never>, command: Command) => {
        try {
          const buildId = this.parseBuildId(rawBuildId);
          await this.withLedger(command, async ({ ledger }) => {
            const build = await ledger.restoreBuild(buildId);
            displaySuccess(`Restored build #${build.build_id}`, { update_dttm: build.update_dttm });
          });
        } catch (error) {
          this.handleError(error, 'Restore failed');
        }
      });
  }
}
