/**
 * Plan Command
 *
 * Shows each stage's declared inputs, its cache key and whether the layer
 * cache would serve it. Nothing is executed or written.
 *
 * @module cli/commands/plan
 */

import type { Command } from 'commander';
import { runBuild } from '../../builder/build.js';
import type { StageNumber } from '../../pipeline/types.js';
import type { Profile } from '../../schemas/common.js';
import { EXIT_CODES, runHandler, type BaseCommand, type ExitCode } from '../base-command.js';
import { formatPlan } from '../formatters/build-summary.js';
import { parseFormat, parseProfile, parseStageNumber, type OutputFormat } from './options.js';

export interface PlanCommandOptions {
  cache?: boolean;
  fromStage?: StageNumber;
  stopAfter?: StageNumber;
  profile?: Profile;
  format?: OutputFormat;
}

export async function handlePlan(
  recipe: string | undefined,
  options: PlanCommandOptions,
  base: BaseCommand
): Promise<ExitCode> {
  const { result } = await runBuild({
    recipe,
    profile: options.profile,
    noCache: options.cache === false,
    fromStage: options.fromStage,
    stopAfterStage: options.stopAfter,
    dryRun: true,
    logger: base,
  });

  if (options.format === 'json') {
    base.json({
      stages: result.stages.map(({ stageId, cacheKey, cached, inputs }) => ({ stageId, cacheKey, cached, inputs })),
      stagesNotRun: result.stagesNotRun,
      error: result.error ?? null,
    });
  } else {
    base.print(formatPlan(result));
    if (result.error) {
      base.blank();
      base.error(`${result.error.stageId}: ${result.error.message}`);
    }
  }

  return result.success ? EXIT_CODES.SUCCESS : EXIT_CODES.ERROR;
}

export function registerPlanCommand(program: Command): void {
  program
    .command('plan [recipe]')
    .description('Show stages, cache keys and cache status without building')
    .option('--no-cache', 'Plan as if the layer cache were empty')
    .option('--from-stage <n>', 'Reuse cached layers only for stages before n', parseStageNumber)
    .option('--stop-after <n>', 'Plan stages up to n', parseStageNumber)
    .option('-p, --profile <name>', 'Package profile: production, development', parseProfile)
    .option('-f, --format <type>', 'Output format: text, json', parseFormat, 'text')
    .action(async (recipe: string | undefined, options: PlanCommandOptions, cmd: Command) => {
      await runHandler(cmd, (base) => handlePlan(recipe, options, base));
    });
}
