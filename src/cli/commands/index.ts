/**
 * CLI Commands Registry
 *
 * Registers all available CLI commands with the main program.
 * Each command is implemented in its own file and registered here.
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerBuildCommand } from './build.js';
import { registerPlanCommand } from './plan.js';
import { registerDockerfileCommand } from './dockerfile.js';
import { registerBuildsCommands } from './builds/index.js';
import { registerImageCommands } from './image.js';
import { registerCacheCommands } from './cache.js';
import { registerExportCommand } from './export.js';

export function registerCommands(program: Command): void {
  registerBuildCommand(program);
  registerPlanCommand(program);
  registerDockerfileCommand(program);

  const buildsCmd = program.command('builds').description('Build history and verification');
  registerBuildsCommands(buildsCmd);

  registerImageCommands(program);
  registerCacheCommands(program);
  registerExportCommand(program);
}

/**
 * Help entries for every command.
 */
export function getCommandHelp(): Array<{ name: string; description: string }> {
  return [
    { name: 'build [recipe]', description: 'Run the provisioning pipeline' },
    { name: 'plan [recipe]', description: 'Show stages, cache keys and cache status' },
    { name: 'dockerfile [recipe]', description: 'Render the equivalent Dockerfile' },
    { name: 'builds list', description: 'List builds' },
    { name: 'builds view <buildId>', description: 'Show a build' },
    { name: 'builds verify <buildId>', description: "Verify a build's checkpoints" },
    { name: 'image list', description: 'List stored images' },
    { name: 'image inspect <imageId>', description: 'Show an image' },
    { name: 'cache list', description: 'List cached layers' },
    { name: 'cache clear', description: 'Empty the layer cache' },
    { name: 'export <buildId>', description: 'Export build artifacts, optionally as ZIP' },
  ];
}
