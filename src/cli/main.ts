#!/usr/bin/env node

import 'dotenv/config';
import { Command } from 'commander';
import { InitCommand, MigrateCommand } from './commands/init';
import { StartCommand } from './commands/start';
import { FinishCommand } from './commands/finish';
import { PhaseCommand } from './commands/phase';
import { ShowCommand } from './commands/show';
import { ListCommand } from './commands/list';
import { DeleteCommand, RestoreCommand } from './commands/remove';

function createProgram(): Command {
  const program = new Command();

  program
    .name('build-ledger')
    .description('Record build, deploy and revert events in a SQLite ledger')
    .version('1.0.0')
    // global flags go before the command, leaving `finish --version` to the subcommand
    .enablePositionalOptions()
    .option('--db <path>', 'SQLite database file (overrides BUILD_LEDGER_SQLITE_PATH)')
    .option('--log-level <level>', 'debug | info | warn | error');

  new InitCommand(program).register();
  new MigrateCommand(program).register();
  new StartCommand(program).register();
  new FinishCommand(program).register();
  new PhaseCommand(program, 'deploy').register();
  new PhaseCommand(program, 'revert').register();
  new ShowCommand(program).register();
  new ListCommand(program).register();
  new DeleteCommand(program).register();
  new RestoreCommand(program).register();

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(error);
      process.exit(1);
    });
}

export { createProgram };
