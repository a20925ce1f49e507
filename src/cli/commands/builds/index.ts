/**
 * Builds Commands
 *
 * @module cli/commands/builds
 */

import type { Command } from 'commander';
import { registerListCommand } from './list.js';
import { registerViewCommand } from './view.js';
import { registerVerifyCommand } from './verify.js';

export { handleListBuilds, formatBuildRow, type ListBuildsOptions } from './list.js';
export { handleViewBuild, type ViewBuildOptions } from './view.js';
export { handleVerifyBuild } from './verify.js';
export { resolveBuildRef } from './shared.js';

export function registerBuildsCommands(buildsCmd: Command): void {
  registerListCommand(buildsCmd);
  registerViewCommand(buildsCmd);
  registerVerifyCommand(buildsCmd);
}
