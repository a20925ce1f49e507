/**
 * Cache Commands
 *
 * - cache list: cached stage layers
 * - cache clear: remove every cached layer
 *
 * @module cli/commands/cache
 */

import type { Command } from 'commander';
import { LayerCache } from '../../pipeline/layer-cache.js';
import { EXIT_CODES, runHandler, type BaseCommand, type ExitCode } from '../base-command.js';
import { createSpinner } from '../formatters/progress.js';
import { formatFileSize, shortKey } from '../formatters/build-summary.js';
import { parseFormat, type OutputFormat } from './options.js';

export interface ListCacheOptions {
  format?: OutputFormat;
}

export async function handleListCache(options: ListCacheOptions, base: BaseCommand): Promise<ExitCode> {
  const entries = await new LayerCache(base).list();

  if (options.format === 'json') {
    base.json(entries);
    return EXIT_CODES.SUCCESS;
  }

  if (entries.length === 0) {
    base.info('Layer cache is empty.');
    return EXIT_CODES.SUCCESS;
  }

  for (const entry of entries) {
    base.print(
      `${shortKey(entry.cacheKey)}  ${entry.stageId.padEnd(20)}${formatFileSize(entry.sizeBytes).padStart(10)}  ${entry.buildId}`
    );
  }
  base.blank();
  base.info(`Total: ${entries.length} layer${entries.length === 1 ? '' : 's'}`);
  return EXIT_CODES.SUCCESS;
}

export async function handleClearCache(base: BaseCommand): Promise<ExitCode> {
  const spinner = base.isQuiet() ? null : createSpinner('Clearing layer cache...').start();
  const removed = await new LayerCache(base).clear();
  spinner?.succeed(`Removed ${removed} cached layer${removed === 1 ? '' : 's'}`);
  return EXIT_CODES.SUCCESS;
}

export function registerCacheCommands(program: Command): void {
  const cache = program.command('cache').description('Inspect or empty the layer cache');

  cache
    .command('list')
    .description('List cached stage layers')
    .option('-f, --format <type>', 'Output format: text, json', parseFormat, 'text')
    .action(async (options: ListCacheOptions, cmd: Command) => {
      await runHandler(cmd, (base) => handleListCache(options, base));
    });

  cache
    .command('clear')
    .description('Remove every cached layer (the next build executes all stages)')
    .action(async (_options: unknown, cmd: Command) => {
      await runHandler(cmd, (base) => handleClearCache(base));
    });
}
