import { Command } from 'commander';
import { BaseCommand } from './base';
import { displayDiffStatus, displaySuccess } from '../ui';

export class InitCommand extends BaseCommand {
  register(): Command {
    return this.program
      .command('init')
      .description('Create the build table and apply pending schema diffs')
      .action(async (_options: Record<string, never>, command: Command) => {
        try {
          await this.withLedger(command, async ({ client, diffs }) => {
            displaySuccess('Ledger ready', { database: client.path });
            displayDiffStatus(await diffs.status());
          });
        } catch (error) {
          this.handleError(error, 'Init failed');
        }
      });
  }
}

interface MigrateOptions {
  status?: boolean;
}

export class MigrateCommand extends BaseCommand {
  register(): Command {
    return this.program
      .command('migrate')
      .description('Apply pending schema diffs')
      .option('--status', 'List schema diffs and whether they are applied, without changing the database')
      .action(async (options: MigrateOptions, command: Command) => {
        try {
          await this.withLedger(
            command,
            async ({ diffs }) => {
              if (!options.status) {
                const applied = await diffs.applyPending();
                displaySuccess(`Applied ${applied.length} schema diff${applied.length === 1 ? '' : 's'}`);
              }
              displayDiffStatus(await diffs.status());
            },
            { skipMigrations: true },
          );
        } catch (error) {
          this.handleError(error, 'Migration failed');
        }
      });
  }
}
