import chalk from 'chalk';
import Table from 'cli-table3';
import { BuildDTO } from '../persistence/models';
import { DiffStatus } from '../persistence/migrations/DiffRunner';

const NONE = '—';

export function displaySuccess(message: string, metrics?: Record<string, string | number | null>): void {
  console.log(chalk.green(`\n✅ ${message}`));
  if (metrics) {
    console.log(chalk.gray('='.repeat(Math.min(message.length + 3, 50))));
    Object.entries(metrics).forEach(([key, value]) => {
      const formattedValue =
        typeof value === 'number' ? chalk.yellow(value.toLocaleString()) : chalk.white(value ?? NONE);
      console.log(`${chalk.cyan(key)}: ${formattedValue}`);
    });
  }
}

export function formatExitStatus(status: number | null): string {
  if (status === null) {
    return chalk.gray(NONE);
  }
  return status === 0 ? chalk.green(String(status)) : chalk.red(String(status));
}

/**
 * One-word summary of how far a build got.
 */
export function describeState(build: BuildDTO): string {
  if (build.delete_dttm !== null) return 'deleted';
  if (build.revert_dttm !== null) return 'reverted';
  if (build.deploy_dttm !== null) return build.deploy_exit_status === 0 ? 'deployed' : 'deploy failed';
  if (build.build_exit_status !== null) return build.build_exit_status === 0 ? 'built' : 'build failed';
  return 'started';
}

export function displayBuild(build: BuildDTO): void {
  const table = new Table({ style: { head: ['cyan'], border: ['gray'] } });
  const rows: Array<[string, string]> = [
    ['build_id', String(build.build_id)],
    ['state', describeState(build)],
    ['branch', build.branch],
    ['revision', build.revision],
    ['version', build.version ?? NONE],
    ['previous_version', build.previous_version ?? NONE],
    ['build_exit_status', formatExitStatus(build.build_exit_status)],
    ['build_exec_sec', build.build_exec_sec === null ? NONE : String(build.build_exec_sec)],
    ['build_size', build.build_size === null ? NONE : String(build.build_size)],
    ['deploy_dttm', build.deploy_dttm ?? NONE],
    ['deploy_exit_status', formatExitStatus(build.deploy_exit_status)],
    ['revert_dttm', build.revert_dttm ?? NONE],
    ['revert_exit_status', formatExitStatus(build.revert_exit_status)],
    ['create_dttm', build.create_dttm],
    ['update_dttm', build.update_dttm],
    ['delete_dttm', build.delete_dttm ?? NONE],
  ];
  rows.forEach(([key, value]) => table.push({ [chalk.cyan(key)]: value }));
  console.log(table.toString());

  const logs: Array<[string, string | null]> = [
    ['Build output', build.build_output_tx],
    ['Deploy output', build.deploy_output_tx],
    ['Revert output', build.revert_output_tx],
  ];
  for (const [title, text] of logs) {
    if (text) {
      console.log(chalk.green(`\n📄 ${title}`));
      console.log(text.trimEnd());
    }
  }
}

export function displayBuilds(builds: BuildDTO[], title: string): void {
  console.log(chalk.green(`\n📋 ${title}`));
  console.log(chalk.gray('='.repeat(title.length + 3)));

  if (builds.length === 0) {
    console.log(chalk.yellow('\n📭 No builds found.'));
    return;
  }

  const table = new Table({
    head: ['ID', 'Branch', 'Revision', 'Version', 'State', 'Build', 'Deploy', 'Created'].map((h) => chalk.bold(h)),
    colWidths: [8, 20, 14, 16, 15, 7, 8, 25],
    wordWrap: true,
    style: { head: ['cyan'], border: ['gray'] },
  });

  builds.forEach((build) => {
    table.push([
      String(build.build_id),
      build.branch,
      build.revision.length > 12 ? build.revision.substring(0, 12) : build.revision,
      build.version ?? chalk.gray(NONE),
      build.delete_dttm !== null ? chalk.gray(describeState(build)) : chalk.blue(describeState(build)),
      formatExitStatus(build.build_exit_status),
      formatExitStatus(build.deploy_exit_status),
      chalk.gray(build.create_dttm),
    ]);
  });

  console.log(table.toString());
  console.log(chalk.green(`\n📊 Displayed ${builds.length} build${builds.length === 1 ? '' : 's'}`));
}

export function displayDiffStatus(diffs: DiffStatus[]): void {
  if (diffs.length === 0) {
    console.log(chalk.yellow('\n📭 No schema diffs tracked.'));
    return;
  }

  const table = new Table({
    head: ['Diff', 'Applied'].map((h) => chalk.bold(h)),
    style: { head: ['cyan'], border: ['gray'] },
  });
  diffs.forEach((diff) => {
    table.push([diff.name, diff.appliedAt ? chalk.green(diff.appliedAt) : chalk.yellow('pending')]);
  });
  console.log(table.toString());
}
