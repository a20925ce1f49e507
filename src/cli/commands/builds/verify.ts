/**
 * Builds Verify Command
 *
 * Recomputes the hash of every checkpoint a build's manifest lists.
 * Exit status 1 when any checkpoint is missing or changed.
 *
 * @module cli/commands/builds/verify
 */

import type { Command } from 'commander';
import { runHandler, EXIT_CODES, type BaseCommand, type ExitCode } from '../../base-command.js';
import { loadManifest, verifyManifest } from '../../../pipeline/manifest.js';
import { resolveBuildRef } from './shared.js';

export async function handleVerifyBuild(ref: string, base: BaseCommand): Promise<ExitCode> {
  const buildId = await resolveBuildRef(ref);
  if (!buildId || !(await loadManifest(buildId))) {
    base.error(`No manifest for build: ${ref}`);
    return EXIT_CODES.NOT_FOUND;
  }

  const verification = await verifyManifest(buildId);
  for (const stage of verification.stages) {
    if (stage.matches) {
      base.success(stage.stageId);
    } else {
      base.fail(`${stage.stageId}: expected ${stage.expectedHash}, found ${stage.actualHash}`);
    }
  }

  if (!verification.valid) {
    base.error(`Build ${buildId} failed verification`);
    return EXIT_CODES.ERROR;
  }
  base.success(`Build ${buildId} verified (${verification.stages.length} checkpoints)`);
  return EXIT_CODES.SUCCESS;
}

export function registerVerifyCommand(buildsCmd: Command): void {
  buildsCmd
    .command('verify <buildId>')
    .description("Verify a build's checkpoints against its manifest")
    .action(async (buildId: string, _options: unknown, cmd: Command) => {
      await runHandler(cmd, (base) => handleVerifyBuild(buildId, base));
    });
}
