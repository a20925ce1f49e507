/**
 * Path Resolution Utilities
 *
 * Provides consistent path generation for the storage layer.
 *
 * Directory Structure:
 * ```
 * ~/.provisioner/                                    # Default data directory
 * ├── config.json                                    # Global CLI config
 * ├── builds/
 * │   ├── latest -> 20200715-101500-core             # Symlink to latest build
 * │   └── <build_id>/                                # e.g., 20200715-101500-core
 * │       ├── build.json                             # Build record
 * │       ├── manifest.json                          # Build manifest with stage hashes
 * │       ├── XX_stage_name.json                     # Stage checkpoint files
 * │       └── exports/                               # Export bundles
 * ├── cache/
 * │   └── layers/<cache_key>.json                    # Cached stage snapshots
 * └── images/<digest>.json                           # Resulting images
 * ```
 *
 * @module storage/paths
 */

import * as path from 'node:path';
import * as os from 'node:os';

/**
 * Validates an ID string to prevent path traversal attacks.
 *
 * Rejects IDs containing:
 * - `..` (parent directory traversal)
 * - `/` (forward slash - Unix path separator)
 * - `\` (backslash - Windows path separator)
 *
 * @param id - The ID to validate
 * @param idName - Name of the ID for error messages (e.g., 'buildId')
 * @throws {Error} If the ID contains path traversal characters
 */
function validateIdSecurity(id: string, idName: string): void {
  if (id.includes('..') || id.includes('/') || id.includes('\\')) {
    throw new Error(`${idName} contains invalid characters (path traversal not allowed)`);
  }
}

function requireId(id: string, idName: string): void {
  if (!id || id.trim() === '') {
    throw new Error(`${idName} is required`);
  }
  validateIdSecurity(id, idName);
}

/**
 * Gets the root data directory for the application.
 *
 * Uses the `PROVISIONER_DATA_DIR` environment variable if set,
 * otherwise defaults to `~/.provisioner/`. The variable is read on every
 * call so `--data-dir` and tests can redirect storage at run time.
 *
 * @example
 * ```typescript
 * process.env.PROVISIONER_DATA_DIR = '/custom/path';
 * getDataDir(); // '/custom/path'
 * ```
 */
export function getDataDir(): string {
  const envDir = process.env.PROVISIONER_DATA_DIR;

  if (envDir) {
    if (envDir.startsWith('~')) {
      return path.join(os.homedir(), envDir.slice(1));
    }
    return path.resolve(envDir);
  }

  return path.join(os.homedir(), '.provisioner');
}

// ============================================
// Builds
// ============================================

export function getBuildsDir(): string {
  return path.join(getDataDir(), 'builds');
}

/**
 * Gets the directory path for a specific build.
 *
 * @param buildId - The build ID (format: YYYYMMDD-HHMMSS-<recipe-slug>)
 * @throws {Error} If buildId is empty or contains path separators
 * @example
 * ```typescript
 * getBuildDir('20200715-101500-core');
 * // '/home/user/.provisioner/builds/20200715-101500-core'
 * ```
 */
export function getBuildDir(buildId: string): string {
  requireId(buildId, 'buildId');
  return path.join(getBuildsDir(), buildId);
}

/**
 * Gets the file path for a stage checkpoint file.
 *
 * @param buildId - The build ID
 * @param stageId - The stage ID (format: XX_stage_name, e.g., "02_dependencies")
 */
export function getStageFilePath(buildId: string, stageId: string): string {
  requireId(buildId, 'buildId');
  requireId(stageId, 'stageId');

  const fileName = stageId.endsWith('.json') ? stageId : `${stageId}.json`;
  return path.join(getBuildDir(buildId), fileName);
}

/**
 * Gets the path to the "latest" symlink, which points at the most recent
 * build directory.
 */
export function getLatestBuildSymlink(): string {
  return path.join(getBuildsDir(), 'latest');
}

export function getBuildRecordPath(buildId: string): string {
  return path.join(getBuildDir(buildId), 'build.json');
}

export function getManifestPath(buildId: string): string {
  return path.join(getBuildDir(buildId), 'manifest.json');
}

export function getExportsDir(buildId: string): string {
  return path.join(getBuildDir(buildId), 'exports');
}

// ============================================
// Layer Cache and Images
// ============================================

export function getLayerCacheDir(): string {
  return path.join(getDataDir(), 'cache', 'layers');
}

/**
 * Gets the path of a cached layer.
 *
 * @param cacheKey - 64-character hex cache key
 */
export function getLayerPath(cacheKey: string): string {
  requireId(cacheKey, 'cacheKey');
  return path.join(getLayerCacheDir(), `${cacheKey}.json`);
}

export function getImagesDir(): string {
  return path.join(getDataDir(), 'images');
}

/**
 * Gets the path of a stored image. Accepts the image id with or without
 * its "sha256:" prefix.
 */
export function getImagePath(imageId: string): string {
  const digest = imageId.startsWith('sha256:') ? imageId.slice('sha256:'.length) : imageId;
  requireId(digest, 'imageId');
  return path.join(getImagesDir(), `${digest}.json`);
}

// ============================================
// Global Config
// ============================================

export function getGlobalConfigPath(): string {
  return path.join(getDataDir(), 'config.json');
}
