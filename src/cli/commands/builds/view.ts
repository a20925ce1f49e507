/**
 * Builds View Command
 *
 * Shows one build record and the stages its manifest lists.
 *
 * @module cli/commands/builds/view
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { runHandler, EXIT_CODES, type BaseCommand, type ExitCode } from '../../base-command.js';
import { loadBuildRecord } from '../../../storage/builds.js';
import { loadManifest } from '../../../pipeline/manifest.js';
import { formatDuration } from '../../formatters/progress.js';
import { formatErrorSummary, shortKey } from '../../formatters/build-summary.js';
import { parseFormat, type OutputFormat } from '../options.js';
import { padRight, resolveBuildRef } from './shared.js';

export interface ViewBuildOptions {
  format?: OutputFormat;
}

export async function handleViewBuild(ref: string, options: ViewBuildOptions, base: BaseCommand): Promise<ExitCode> {
  const buildId = await resolveBuildRef(ref);
  if (!buildId) {
    base.error(`Build not found: ${ref}`);
    return EXIT_CODES.NOT_FOUND;
  }

  const record = await loadBuildRecord(buildId);
  const manifest = await loadManifest(buildId);

  if (options.format === 'json') {
    base.json({ record, manifest });
    return EXIT_CODES.SUCCESS;
  }

  base.section(`Build ${record.buildId}`);
  base.keyValue('Recipe', `${record.recipeName} (${record.recipePath})`);
  base.keyValue('Status', record.status);
  base.keyValue('Profile', record.options.profile);
  base.keyValue('Started', record.startedAt);
  if (record.durationMs !== undefined) {
    base.keyValue('Duration', formatDuration(record.durationMs));
  }
  if (record.imageId) {
    base.keyValue('Image', record.imageId);
  }

  if (manifest) {
    base.section('Stages');
    for (const stage of manifest.stages) {
      const origin = stage.cached ? chalk.blue('cached') : chalk.green('executed');
      base.print(`${stage.stageId.padEnd(20)}${padRight(origin, 10)}${shortKey(stage.cacheKey)}`);
    }
  }

  if (record.error) {
    base.blank();
    base.print(formatErrorSummary(record.error));
  }
  return EXIT_CODES.SUCCESS;
}

export function registerViewCommand(buildsCmd: Command): void {
  buildsCmd
    .command('view <buildId>')
    .description('Show a build ("latest" for the most recent)')
    .option('-f, --format <type>', 'Output format: text, json', parseFormat, 'text')
    .action(async (buildId: string, options: ViewBuildOptions, cmd: Command) => {
      await runHandler(cmd, (base) => handleViewBuild(buildId, options, base));
    });
}
