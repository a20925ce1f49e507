/**
 * Build Storage Operations
 *
 * Management of build directories, build records, and the latest symlink.
 *
 * @module storage/builds
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { BuildRecordSchema, type BuildRecord } from '../schemas/build.js';
import { atomicWriteJson } from '../schemas/migrations/index.js';
import { readDocument } from './atomic.js';
import {
  getBuildsDir,
  getBuildDir,
  getBuildRecordPath,
  getLatestBuildSymlink,
} from './paths.js';

/**
 * Create build directory structure
 */
export async function createBuildDir(buildId: string): Promise<string> {
  const buildDir = getBuildDir(buildId);
  await fs.mkdir(buildDir, { recursive: true });
  return buildDir;
}

/**
 * Check whether a build directory exists
 */
export async function buildExists(buildId: string): Promise<boolean> {
  try {
    const stat = await fs.stat(getBuildDir(buildId));
    return stat.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Save a build record (validated before writing)
 */
export async function saveBuildRecord(record: BuildRecord): Promise<void> {
  const validated = BuildRecordSchema.parse(record);
  await atomicWriteJson(getBuildRecordPath(validated.buildId), validated);
}

/**
 * Load a build record
 *
 * @throws Error if the build doesn't exist or its record is invalid
 */
export async function loadBuildRecord(buildId: string): Promise<BuildRecord> {
  const filePath = getBuildRecordPath(buildId);
  const record = await readDocument(filePath, 'build', BuildRecordSchema);
  if (!record) {
    throw new Error(`Build not found: ${buildId} (path: ${filePath})`);
  }
  return record;
}

/**
 * List all build IDs
 *
 * @returns Array of build IDs, sorted descending (newest first)
 */
export async function listBuilds(): Promise<string[]> {
  try {
    const entries = await fs.readdir(getBuildsDir(), { withFileTypes: true });

    return entries
      .filter((entry) => entry.name !== 'latest' && entry.isDirectory())
      .map((entry) => entry.name)
      .sort((a, b) => b.localeCompare(a));
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return [];
    }
    throw error;
  }
}

/**
 * Get the latest build ID
 *
 * @returns The latest build ID, or null if no build has completed
 */
export async function getLatestBuildId(): Promise<string | null> {
  try {
    const target = await fs.readlink(getLatestBuildSymlink());
    return path.basename(target);
  } catch {
    return null;
  }
}

/**
 * Update the 'latest' symlink to point to a build
 *
 * @throws Error if the target build directory does not exist
 */
export async function updateLatestSymlink(buildId: string): Promise<void> {
  const linkPath = getLatestBuildSymlink();
  const targetDir = getBuildDir(buildId);

  try {
    const stat = await fs.stat(targetDir);
    if (!stat.isDirectory()) {
      throw new Error(`Target is not a directory: ${buildId}`);
    }
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new Error(`Build directory does not exist: ${buildId}`);
    }
    throw error;
  }

  await fs.mkdir(getBuildsDir(), { recursive: true });

  try {
    await fs.unlink(linkPath);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
      throw error;
    }
  }

  // Relative target, so the data directory can be moved
  await fs.symlink(buildId, linkPath);
}
