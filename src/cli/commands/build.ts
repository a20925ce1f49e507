/**
 * Build Command
 *
 * Runs the provisioning pipeline for a recipe and prints a summary.
 * Exit status: 0 when every requested stage completed, 1 when a stage
 * failed, 2 for recipe and configuration errors.
 *
 * @module cli/commands/build
 */

import type { Command } from 'commander';
import { runBuild } from '../../builder/build.js';
import type { PipelineResult } from '../../pipeline/executor.js';
import type { StageNumber } from '../../pipeline/types.js';
import type { Profile } from '../../schemas/common.js';
import { EXIT_CODES, runHandler, type BaseCommand, type ExitCode } from '../base-command.js';
import { createStageProgress } from '../formatters/progress.js';
import { formatBuildSummary, formatQuickSummary, formatTimingBreakdown } from '../formatters/build-summary.js';
import { parseFormat, parseProfile, parseStageNumber, type OutputFormat } from './options.js';

// ============================================================================
// Types
// ============================================================================

export interface BuildCommandOptions {
  /** commander turns --no-cache into cache: false */
  cache?: boolean;
  fromStage?: StageNumber;
  stopAfter?: StageNumber;
  dryRun?: boolean;
  profile?: Profile;
  format?: OutputFormat;
  timing?: boolean;
}

/**
 * JSON shape printed with --format json
 */
export function toBuildJson(result: PipelineResult) {
  return {
    buildId: result.buildId,
    success: result.success,
    dryRun: result.dryRun,
    imageId: result.image?.imageId ?? null,
    imageCreated: result.imageCreated,
    stagesExecuted: result.stagesExecuted,
    stagesCached: result.stagesCached,
    stagesNotRun: result.stagesNotRun,
    durationMs: result.timing.durationMs,
    error: result.error ?? null,
  };
}

// ============================================================================
// Handler
// ============================================================================

/**
 * Handle `provision build [recipe]`.
 */
export async function handleBuild(
  recipe: string | undefined,
  options: BuildCommandOptions,
  base: BaseCommand
): Promise<ExitCode> {
  const json = options.format === 'json';
  const progress = json || base.isQuiet() ? null : createStageProgress();

  base.debug(`Building ${recipe ?? 'provision.json'} (data dir: ${base.dataDir})`);

  const { result } = await runBuild({
    recipe,
    profile: options.profile,
    noCache: options.cache === false,
    fromStage: options.fromStage,
    stopAfterStage: options.stopAfter,
    dryRun: options.dryRun,
    logger: json ? undefined : base,
    callbacks: progress
      ? {
          onStageStart: (_stageId, stageNumber) => progress.startStage(stageNumber),
          onStageComplete: (_stageId, report) =>
            report.cached
              ? progress.cacheStage(report.stageNumber)
              : progress.completeStage(report.stageNumber, report.durationMs),
          onStageError: (stageId, error) => {
            const stage = progress.getAllStages().find((s) => s.id === stageId);
            if (stage) progress.failStage(stage.number, error.message);
          },
        }
      : undefined,
  });
  progress?.skipRemaining();

  if (json) {
    base.json(toBuildJson(result));
  } else if (base.isQuiet()) {
    base.print(formatQuickSummary(result));
  } else {
    base.blank();
    base.print(formatBuildSummary(result));
    if (options.timing) {
      base.blank();
      base.print(formatTimingBreakdown(result.timing));
    }
  }

  return result.success ? EXIT_CODES.SUCCESS : EXIT_CODES.ERROR;
}

// ============================================================================
// Command Registration
// ============================================================================

export function registerBuildCommand(program: Command): void {
  program
    .command('build [recipe]')
    .description('Run the provisioning pipeline for a recipe (file or directory)')
    .option('--no-cache', 'Execute every stage regardless of the layer cache')
    .option('--from-stage <n>', 'Reuse cached layers only for stages before n', parseStageNumber)
    .option('--stop-after <n>', 'Stop after stage n (no image unless n is 4)', parseStageNumber)
    .option('--dry-run', 'Compute cache keys and report the plan without executing')
    .option('-p, --profile <name>', 'Package profile: production, development', parseProfile)
    .option('-f, --format <type>', 'Output format: text, json', parseFormat, 'text')
    .option('--timing', 'Show the per-stage timing breakdown')
    .action(async (recipe: string | undefined, options: BuildCommandOptions, cmd: Command) => {
      await runHandler(cmd, (base) => handleBuild(recipe, options, base));
    });
}
