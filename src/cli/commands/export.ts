/**
 * Export Command
 *
 * Bundles a build's record, manifest and image, optionally with its stage
 * checkpoints and rendered Dockerfile, and optionally as a ZIP archive.
 *
 * @module cli/commands/export
 */

import * as path from 'node:path';
import type { Command } from 'commander';
import { exportBuild } from '../../export/index.js';
import { formatFileSize } from '../formatters/build-summary.js';
import { EXIT_CODES, runHandler, type BaseCommand, type ExitCode } from '../base-command.js';
import { resolveBuildRef } from './builds/shared.js';

export interface ExportCommandOptions {
  stages?: boolean;
  dockerfile?: boolean;
  zip?: boolean;
  output?: string;
}

export async function handleExport(ref: string, options: ExportCommandOptions, base: BaseCommand): Promise<ExitCode> {
  const buildId = await resolveBuildRef(ref);
  if (!buildId) {
    base.error(`Build not found: ${ref}`);
    return EXIT_CODES.NOT_FOUND;
  }

  const { bundle, zipResult } = await exportBuild(buildId, {
    includeStages: options.stages,
    includeDockerfile: options.dockerfile,
    outputDir: options.output ? path.resolve(options.output) : undefined,
    zip: options.zip,
  });

  base.success(`Exported ${bundle.index.files.length} files (${formatFileSize(bundle.totalSizeBytes)})`);
  base.keyValue('Bundle', bundle.bundlePath);
  if (zipResult) {
    base.keyValue('Archive', `${zipResult.zipPath} (${formatFileSize(zipResult.sizeBytes)})`);
  }
  return EXIT_CODES.SUCCESS;
}

export function registerExportCommand(program: Command): void {
  program
    .command('export <buildId>')
    .description('Export build artifacts ("latest" for the most recent build)')
    .option('--stages', 'Include stage checkpoint files')
    .option('--dockerfile', "Include the Dockerfile rendered from the build's recipe")
    .option('-z, --zip', 'Create a ZIP archive')
    .option('-o, --output <path>', 'Output directory')
    .action(async (buildId: string, options: ExportCommandOptions, cmd: Command) => {
      await runHandler(cmd, (base) => handleExport(buildId, options, base));
    });
}
