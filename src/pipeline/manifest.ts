/**
 * Manifest Generation Module
 *
 * Generates and manages build manifests with SHA-256 file integrity
 * verification. Each build produces a manifest.json tracking every stage
 * checkpoint it wrote, the checkpoint's hash and the stage's cache key.
 *
 * @module pipeline/manifest
 */

import * as crypto from 'node:crypto';
import * as fs from 'node:fs/promises';

import {
  BuildManifestSchema,
  createEmptyManifest,
  addStageToManifest,
  finalizeManifest,
  type BuildManifest,
  type ManifestStageEntry,
} from '../schemas/manifest.js';
import type { BuildError } from '../schemas/build.js';
import { getStageFilePath, getManifestPath } from '../storage/paths.js';
import { atomicWriteJson, readDocument } from '../storage/atomic.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Stage information for manifest generation
 */
export interface StageFileInfo {
  /** Stage identifier (e.g., "02_dependencies") */
  stageId: string;
  cacheKey: string;
  cached: boolean;
  /** Previous stage that fed into this one */
  upstreamStage?: string;
}

/**
 * Result of verifying a manifest's integrity
 */
export interface ManifestVerificationResult {
  /** Whether all stage hashes match */
  valid: boolean;
  stages: Array<{
    stageId: string;
    expectedHash: string;
    actualHash: string;
    matches: boolean;
  }>;
}

// ============================================================================
// Hash Calculation
// ============================================================================

/**
 * Calculate SHA-256 hash of a file's contents.
 *
 * @returns 64-character lowercase hex SHA-256 hash
 * @throws If file doesn't exist or can't be read
 */
export async function calculateFileHash(filePath: string): Promise<string> {
  const content = await fs.readFile(filePath);
  return crypto.createHash('sha256').update(content).digest('hex');
}

// ============================================================================
// Stage Entry Creation
// ============================================================================

/**
 * Create a ManifestStageEntry from a checkpoint file.
 */
export async function createStageEntry(buildId: string, stage: StageFileInfo): Promise<ManifestStageEntry> {
  const filePath = getStageFilePath(buildId, stage.stageId);

  const [hash, stats] = await Promise.all([calculateFileHash(filePath), fs.stat(filePath)]);

  return {
    stageId: stage.stageId,
    filename: `${stage.stageId}.json`,
    createdAt: stats.mtime.toISOString(),
    sha256: hash,
    sizeBytes: stats.size,
    cacheKey: stage.cacheKey,
    cached: stage.cached,
    upstreamStage: stage.upstreamStage,
  };
}

// ============================================================================
// Manifest Generation
// ============================================================================

/**
 * Generate the manifest for a finished build.
 *
 * @example
 * ```typescript
 * const manifest = await generateManifest('20200715-101500-core', 'core', stages, {
 *   success: true,
 *   imageId: 'sha256:…',
 * });
 * ```
 */
export async function generateManifest(
  buildId: string,
  recipeName: string,
  stages: StageFileInfo[],
  outcome: { success: boolean; imageId?: string; error?: BuildError }
): Promise<BuildManifest> {
  let manifest = createEmptyManifest(buildId, recipeName);

  for (const stage of stages) {
    manifest = addStageToManifest(manifest, await createStageEntry(buildId, stage));
  }

  return finalizeManifest(manifest, outcome);
}

// ============================================================================
// Manifest Persistence
// ============================================================================

/**
 * Save a manifest to the build directory.
 *
 * @returns Path where manifest was saved
 */
export async function saveManifest(buildId: string, manifest: BuildManifest): Promise<string> {
  const manifestPath = getManifestPath(buildId);
  await atomicWriteJson(manifestPath, manifest);
  return manifestPath;
}

/**
 * Load an existing manifest from a build directory.
 *
 * @returns The loaded manifest, or null if it doesn't exist
 */
export async function loadManifest(buildId: string): Promise<BuildManifest | null> {
  return readDocument(getManifestPath(buildId), 'manifest', BuildManifestSchema);
}

// ============================================================================
// Manifest Verification
// ============================================================================

/**
 * Verify manifest integrity by recalculating hashes.
 *
 * @throws If manifest doesn't exist
 *
 * @example
 * ```typescript
 * const result = await verifyManifest('20200715-101500-core');
 * if (!result.valid) {
 *   const corrupted = result.stages.filter((s) => !s.matches);
 * }
 * ```
 */
export async function verifyManifest(buildId: string): Promise<ManifestVerificationResult> {
  const manifest = await loadManifest(buildId);
  if (!manifest) {
    throw new Error(`Manifest not found for build ${buildId}`);
  }

  const stageResults: ManifestVerificationResult['stages'] = [];

  for (const stage of manifest.stages) {
    let actualHash: string;
    try {
      actualHash = await calculateFileHash(getStageFilePath(buildId, stage.stageId));
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        throw error;
      }
      actualHash = '<file_not_found>';
    }

    stageResults.push({
      stageId: stage.stageId,
      expectedHash: stage.sha256,
      actualHash,
      matches: actualHash === stage.sha256,
    });
  }

  return {
    valid: stageResults.every((stage) => stage.matches),
    stages: stageResults,
  };
}
