/**
 * Build Manifest Schema
 *
 * Each build produces manifest.json for integrity verification. It lists
 * every stage checkpoint written, its SHA-256 and size, the stage's cache
 * key, and whether the stage executed or came from the layer cache.
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from './versions.js';
import { ISO8601TimestampSchema, ImageIdSchema, Sha256Schema } from './common.js';
import { BuildErrorSchema } from './build.js';

// ============================================================================
// Stage Entry Schema
// ============================================================================

export const ManifestStageEntrySchema = z.object({
  /** Stage identifier (e.g., "02_dependencies") */
  stageId: z.string().min(1),

  /** Checkpoint filename (e.g., "02_dependencies.json") */
  filename: z.string().min(1),

  createdAt: ISO8601TimestampSchema,

  /** SHA-256 of the checkpoint file contents */
  sha256: Sha256Schema,

  sizeBytes: z.number().int().nonnegative(),

  /** Cache key of the stage */
  cacheKey: Sha256Schema,

  /** True when the stage was served from the layer cache */
  cached: z.boolean(),

  upstreamStage: z.string().optional(),
});

export type ManifestStageEntry = z.infer<typeof ManifestStageEntrySchema>;

// ============================================================================
// Main Manifest Schema
// ============================================================================

export const BuildManifestSchema = z.object({
  schemaVersion: z.number().int().positive().default(SCHEMA_VERSIONS.manifest),

  buildId: z.string().min(1),

  /** Recipe name (e.g., "core") */
  recipeName: z.string().min(1),

  createdAt: ISO8601TimestampSchema,

  stages: z.array(ManifestStageEntrySchema),

  /** Stage IDs whose mutations ran in this build */
  stagesExecuted: z.array(z.string()),

  /** Stage IDs reused from the layer cache */
  stagesCached: z.array(z.string()),

  /** Last stage that completed, empty when none did */
  finalStage: z.string(),

  success: z.boolean(),

  /** Resulting image, present only when the final stage ran to completion */
  imageId: ImageIdSchema.optional(),

  /** Failure details when success is false */
  error: BuildErrorSchema.optional(),
});

export type BuildManifest = z.infer<typeof BuildManifestSchema>;

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Create an empty manifest for a new build
 */
export function createEmptyManifest(buildId: string, recipeName: string): BuildManifest {
  return {
    schemaVersion: SCHEMA_VERSIONS.manifest,
    buildId,
    recipeName,
    createdAt: new Date().toISOString(),
    stages: [],
    stagesExecuted: [],
    stagesCached: [],
    finalStage: '',
    success: false,
  };
}

/**
 * Add a stage entry to a manifest
 */
export function addStageToManifest(
  manifest: BuildManifest,
  entry: ManifestStageEntry
): BuildManifest {
  return {
    ...manifest,
    stages: [...manifest.stages, entry],
    stagesExecuted: entry.cached ? manifest.stagesExecuted : [...manifest.stagesExecuted, entry.stageId],
    stagesCached: entry.cached ? [...manifest.stagesCached, entry.stageId] : manifest.stagesCached,
    finalStage: entry.stageId,
  };
}

/**
 * Finalize the manifest when the build completes
 */
export function finalizeManifest(
  manifest: BuildManifest,
  outcome: Pick<BuildManifest, 'success' | 'imageId' | 'error'>
): BuildManifest {
  return {
    ...manifest,
    success: outcome.success,
    imageId: outcome.imageId,
    error: outcome.error,
    createdAt: new Date().toISOString(),
  };
}
