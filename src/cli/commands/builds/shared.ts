/**
 * Helpers shared by the builds subcommands.
 *
 * @module cli/commands/builds/shared
 */

import { buildExists, getLatestBuildId } from '../../../storage/builds.js';

/**
 * Resolve a build reference ("latest" or an ID) to an existing build ID.
 *
 * @returns null when no such build exists
 */
export async function resolveBuildRef(ref: string): Promise<string | null> {
  if (ref === 'latest') {
    return getLatestBuildId();
  }
  return (await buildExists(ref)) ? ref : null;
}

export function truncate(str: string, maxLen: number): string {
  if (str.length <= maxLen) return str;
  return str.slice(0, maxLen - 3) + '...';
}

/**
 * Pad to a visible width, ignoring ANSI color codes.
 */
export function padRight(str: string, width: number): string {
  const visibleLength = str.replace(/\x1b\[[0-9;]*m/g, '').length;
  return str + ' '.repeat(Math.max(0, width - visibleLength));
}
