import { Command } from 'commander';
import { BaseCommand, OutputOptions } from './base';
import { displaySuccess } from '../ui';

export type PhaseName = 'deploy' | 'revert';

interface PhaseOptions extends OutputOptions {
  exitStatus: string;
}

/**
 * `deploy` and `revert` take the same arguments and differ only in the columns they fill.
 */
export class PhaseCommand extends BaseCommand {
  constructor(
    program: Command,
    private readonly phase: PhaseName,
  ) {
    super(program);
  }

  register(): Command {
    return this.program
      .command(`${this.phase} <buildId>`)
      .description(`Record the result of the ${this.phase} phase`)
      .requiredOption('-e, --exit-status <code>', `Exit status of the ${this.phase} process`)
      .option('-o, --output <text>', `${this.phase} log text`)
      .option('--output-file <path>', `Read the ${this.phase} log from a file`)
      .action(async (rawBuildId: string, options: PhaseOptions, command: Command) => {
        try {
          const buildId = this.parseBuildId(rawBuildId);
          const result = {
            exitStatus: this.parseInteger(options.exitStatus, '--exit-status'),
            output: this.readOutput(options),
          };

          await this.withLedger(command, async ({ ledger }) => {
            const build =
              this.phase === 'deploy'
                ? await ledger.recordDeploy(buildId, result)
                : await ledger.recordRevert(buildId, result);
            const at = this.phase === 'deploy' ? build.deploy_dttm : build.revert_dttm;
            displaySuccess(`Recorded ${this.phase} for #${build.build_id}`, {
              exit_status: result.exitStatus,
              at,
            });
          });
        } catch (error) {
          this.handleError(error, `${this.phase === 'deploy' ? 'Deploy' : 'Revert'} failed`);
        }
      });
  }
}
