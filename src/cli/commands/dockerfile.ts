/**
 * Dockerfile Command
 *
 * Prints (or writes) the Dockerfile equivalent of a recipe.
 *
 * @module cli/commands/dockerfile
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Command } from 'commander';
import { loadRecipe } from '../../recipe/loader.js';
import { selectProfile } from '../../builder/build.js';
import { renderDockerfile, renderDockerignore } from '../../dockerfile/render.js';
import { loadGlobalConfig } from '../../storage/config.js';
import type { Profile } from '../../schemas/common.js';
import { EXIT_CODES, runHandler, type BaseCommand, type ExitCode } from '../base-command.js';
import { parseProfile } from './options.js';

export interface DockerfileCommandOptions {
  profile?: Profile;
  /** Write to this file instead of stdout */
  output?: string;
  /** Also write .dockerignore beside the output file */
  ignoreFile?: boolean;
}

export async function handleDockerfile(
  recipe: string | undefined,
  options: DockerfileCommandOptions,
  base: BaseCommand
): Promise<ExitCode> {
  const loaded = await loadRecipe(recipe);
  const globalConfig = await loadGlobalConfig();
  const dockerfile = renderDockerfile(loaded.recipe, {
    profile: selectProfile(options.profile, globalConfig),
    unattended: globalConfig.unattended,
  });

  if (!options.output) {
    process.stdout.write(dockerfile);
    return EXIT_CODES.SUCCESS;
  }

  const outputPath = path.resolve(options.output);
  await fs.mkdir(path.dirname(outputPath), { recursive: true });
  await fs.writeFile(outputPath, dockerfile, 'utf-8');
  base.success(`Wrote ${outputPath}`);

  if (options.ignoreFile) {
    const ignorePath = path.join(path.dirname(outputPath), '.dockerignore');
    await fs.writeFile(ignorePath, renderDockerignore(loaded.recipe), 'utf-8');
    base.success(`Wrote ${ignorePath}`);
  }

  return EXIT_CODES.SUCCESS;
}

export function registerDockerfileCommand(program: Command): void {
  program
    .command('dockerfile [recipe]')
    .description('Render the equivalent Dockerfile for a recipe')
    .option('-p, --profile <name>', 'Package profile: production, development', parseProfile)
    .option('-o, --output <path>', 'Write to a file instead of stdout')
    .option('--ignore-file', 'Also write .dockerignore next to the output file')
    .action(async (recipe: string | undefined, options: DockerfileCommandOptions, cmd: Command) => {
      await runHandler(cmd, (base) => handleDockerfile(recipe, options, base));
    });
}
