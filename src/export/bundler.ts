/**
 * Export Bundler
 *
 * Creates export bundles from build data for sharing or archiving.
 * Bundles include the build record and manifest, the resulting image record
 * when there is one, and optionally the stage checkpoints and the rendered
 * Dockerfile.
 *
 * @module export/bundler
 */

import * as path from 'node:path';
import * as fs from 'node:fs/promises';
import {
  getBuildRecordPath,
  getExportsDir,
  getImagePath,
  getManifestPath,
  getStageFilePath,
  fileExists,
  atomicWriteJson,
  listStageFiles,
  getLatestBuildId,
  loadBuildRecord,
} from '../storage/index.js';
import { loadRecipe } from '../recipe/loader.js';
import { renderDockerfile } from '../dockerfile/render.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for export bundle creation
 */
export interface ExportOptions {
  /** Include stage checkpoint files */
  includeStages?: boolean;

  /** Render the recipe's Dockerfile into the bundle */
  includeDockerfile?: boolean;

  /** Custom output directory (defaults to the build's exports dir) */
  outputDir?: string;
}

export type ExportFileCategory = 'build' | 'manifest' | 'image' | 'stage' | 'dockerfile';

/**
 * Entry describing a file in the export bundle
 */
export interface ExportFileEntry {
  /** Relative path within bundle */
  relativePath: string;
  sizeBytes: number;
  category: ExportFileCategory;
}

/**
 * Export bundle index describing bundle contents
 */
export interface ExportBundleIndex {
  schemaVersion: number;
  createdAt: string;
  buildId: string;
  files: ExportFileEntry[];
  options: ExportOptions;
}

export interface BundleResult {
  bundlePath: string;
  index: ExportBundleIndex;
  totalSizeBytes: number;
  /** Count of files by category */
  fileCounts: Partial<Record<ExportFileCategory, number>>;
}

// ============================================================================
// Constants
// ============================================================================

const BUNDLE_SCHEMA_VERSION = 1;

/** Bundle index filename; kept apart from the build's own manifest.json */
export const BUNDLE_INDEX_FILENAME = 'bundle.json';

// ============================================================================
// Bundle Creation
// ============================================================================

/**
 * Creates an export bundle from a build.
 *
 * The bundle includes:
 * - Always: build.json, manifest.json (when written), image.json (when the
 *   build produced an image)
 * - With includeStages: stages/ directory with checkpoint files
 * - With includeDockerfile: Dockerfile rendered from the build's recipe
 *
 * @param buildId - Build to export, or 'latest'
 * @throws Error if the build does not exist
 *
 * @example
 * ```typescript
 * const { bundlePath } = await createExportBundle('20200715-101500-core', { includeStages: true });
 * ```
 */
export async function createExportBundle(
  buildId: string = 'latest',
  options: ExportOptions = {}
): Promise<BundleResult> {
  const resolvedBuildId = await resolveBuildId(buildId);
  const record = await loadBuildRecord(resolvedBuildId);
  const bundleDir = await createBundleDirectory(resolvedBuildId, options);

  const index: ExportBundleIndex = {
    schemaVersion: BUNDLE_SCHEMA_VERSION,
    createdAt: new Date().toISOString(),
    buildId: resolvedBuildId,
    files: [],
    options,
  };

  await copyIfPresent(getBuildRecordPath(resolvedBuildId), bundleDir, 'build.json', 'build', index);
  await copyIfPresent(getManifestPath(resolvedBuildId), bundleDir, 'manifest.json', 'manifest', index);
  if (record.imageId) {
    await copyIfPresent(getImagePath(record.imageId), bundleDir, 'image.json', 'image', index);
  }

  if (options.includeStages) {
    await fs.mkdir(path.join(bundleDir, 'stages'), { recursive: true });
    for (const stageId of await listStageFiles(resolvedBuildId)) {
      await copyIfPresent(
        getStageFilePath(resolvedBuildId, stageId),
        bundleDir,
        `stages/${stageId}.json`,
        'stage',
        index
      );
    }
  }

  if (options.includeDockerfile) {
    const { recipe } = await loadRecipe(record.recipePath);
    const destPath = path.join(bundleDir, 'Dockerfile');
    await fs.writeFile(destPath, renderDockerfile(recipe, { profile: record.options.profile }), 'utf-8');
    const stats = await fs.stat(destPath);
    index.files.push({ relativePath: 'Dockerfile', sizeBytes: stats.size, category: 'dockerfile' });
  }

  await atomicWriteJson(path.join(bundleDir, BUNDLE_INDEX_FILENAME), index);

  const totalSizeBytes = index.files.reduce((sum, f) => sum + f.sizeBytes, 0);
  const fileCounts: Partial<Record<ExportFileCategory, number>> = {};
  for (const file of index.files) {
    fileCounts[file.category] = (fileCounts[file.category] ?? 0) + 1;
  }

  return { bundlePath: bundleDir, index, totalSizeBytes, fileCounts };
}

/**
 * Resolves 'latest' to the build the latest symlink points at
 */
async function resolveBuildId(buildId: string): Promise<string> {
  if (buildId !== 'latest') {
    return buildId;
  }

  const latest = await getLatestBuildId();
  if (!latest) {
    throw new Error("No 'latest' build found");
  }
  return latest;
}

/**
 * Creates the bundle directory with timestamp
 */
async function createBundleDirectory(buildId: string, options: ExportOptions): Promise<string> {
  const baseDir = options.outputDir || getExportsDir(buildId);

  // Milliseconds keep two exports in the same second apart
  const timestamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, 23);
  const bundleDir = path.join(baseDir, `export-${timestamp}`);

  await fs.mkdir(bundleDir, { recursive: true });
  return bundleDir;
}

async function copyIfPresent(
  sourcePath: string,
  bundleDir: string,
  relativePath: string,
  category: ExportFileCategory,
  index: ExportBundleIndex
): Promise<void> {
  if (!(await fileExists(sourcePath))) {
    return;
  }

  const destPath = path.join(bundleDir, relativePath);
  await fs.copyFile(sourcePath, destPath);
  const stats = await fs.stat(destPath);
  index.files.push({ relativePath, sizeBytes: stats.size, category });
}

// ============================================================================
// Bundle Validation
// ============================================================================

/**
 * Validates a bundle directory has required files
 */
export async function validateBundle(bundlePath: string): Promise<{
  valid: boolean;
  indexPresent: boolean;
  missingRequired: string[];
  presentFiles: string[];
}> {
  const presentFiles: string[] = [];
  const missingRequired: string[] = [];

  const indexPresent = await fileExists(path.join(bundlePath, BUNDLE_INDEX_FILENAME));

  for (const file of ['build.json']) {
    if (await fileExists(path.join(bundlePath, file))) {
      presentFiles.push(file);
    } else {
      missingRequired.push(file);
    }
  }

  for (const file of ['manifest.json', 'image.json', 'Dockerfile']) {
    if (await fileExists(path.join(bundlePath, file))) {
      presentFiles.push(file);
    }
  }

  return {
    valid: indexPresent && missingRequired.length === 0,
    indexPresent,
    missingRequired,
    presentFiles,
  };
}
