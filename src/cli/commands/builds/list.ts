/**
 * Builds List Command
 *
 * Lists builds, newest first, in table format.
 *
 * @module cli/commands/builds/list
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { runHandler, EXIT_CODES, type BaseCommand, type ExitCode } from '../../base-command.js';
import { listBuilds, loadBuildRecord, getLatestBuildId } from '../../../storage/builds.js';
import type { BuildRecord, BuildStatus } from '../../../schemas/build.js';
import { errorMessage } from '../../../errors/index.js';
import { formatDuration } from '../../formatters/progress.js';
import { shortKey } from '../../formatters/build-summary.js';
import { parseFormat, type OutputFormat } from '../options.js';
import { padRight, truncate } from './shared.js';

export interface ListBuildsOptions {
  limit?: string;
  format?: OutputFormat;
}

const STATUS_COLORS: Record<BuildStatus, (text: string) => string> = {
  running: chalk.yellow,
  succeeded: chalk.green,
  failed: chalk.red,
};

function formatTableHeader(): string {
  return chalk.bold(
    padRight('BUILD ID', 34) + padRight('RECIPE', 18) + padRight('STATUS', 11) + padRight('IMAGE', 15) + 'DURATION'
  );
}

/**
 * Format one build as a table row.
 */
export function formatBuildRow(record: BuildRecord, isLatest: boolean): string {
  const id = padRight(truncate(record.buildId, 32) + (isLatest ? '*' : ''), 34);
  const recipe = padRight(truncate(record.recipeName, 16), 18);
  const status = padRight(STATUS_COLORS[record.status](record.status), 11);
  const image = padRight(record.imageId ? shortKey(record.imageId) : '-', 15);
  const duration = record.durationMs !== undefined ? formatDuration(record.durationMs) : '-';
  return `${id}${recipe}${status}${image}${duration}`;
}

export async function handleListBuilds(options: ListBuildsOptions, base: BaseCommand): Promise<ExitCode> {
  const buildIds = await listBuilds();
  const limit = parseInt(options.limit || '20', 10);
  const shown = buildIds.slice(0, limit);

  const records: BuildRecord[] = [];
  for (const buildId of shown) {
    try {
      records.push(await loadBuildRecord(buildId));
    } catch (error) {
      base.warn(`Skipping build ${buildId}: ${errorMessage(error)}`);
    }
  }

  if (options.format === 'json') {
    base.json(records);
    return EXIT_CODES.SUCCESS;
  }

  if (buildIds.length === 0) {
    base.info('No builds found.');
    base.info('Run a build with: provision build <recipe>');
    return EXIT_CODES.SUCCESS;
  }

  const latest = await getLatestBuildId();
  base.section('Builds');
  base.print(formatTableHeader());
  for (const record of records) {
    base.print(formatBuildRow(record, record.buildId === latest));
  }

  base.blank();
  if (shown.length < buildIds.length) {
    base.info(`Showing ${shown.length} of ${buildIds.length} builds (use --limit to show more)`);
  } else {
    base.info(`Total: ${buildIds.length} build${buildIds.length === 1 ? '' : 's'}`);
  }
  return EXIT_CODES.SUCCESS;
}

export function registerListCommand(buildsCmd: Command): void {
  buildsCmd
    .command('list')
    .description('List builds, newest first (* marks latest)')
    .option('-n, --limit <count>', 'Maximum number of builds to show', '20')
    .option('-f, --format <type>', 'Output format: text, json', parseFormat, 'text')
    .action(async (options: ListBuildsOptions, cmd: Command) => {
      await runHandler(cmd, (base) => handleListBuilds(options, base));
    });
}
