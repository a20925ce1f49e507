/**
 * Image Snapshot and Resulting Image Schemas
 *
 * An ImageSnapshot is the environment state between stages. Every stage
 * receives one and returns a new one; snapshots are never edited in place.
 * The final snapshot of a successful build is stored as an ImageRecord,
 * addressed by the SHA-256 of the snapshot's canonical JSON.
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from './versions.js';
import {
  EnvMapSchema,
  ISO8601TimestampSchema,
  ImageIdSchema,
  ImagePathSchema,
  Sha256Schema,
} from './common.js';

// ============================================================================
// Base Reference
// ============================================================================

/**
 * The resolved base image a snapshot starts from.
 */
export const BaseRefSchema = z.object({
  /** Identifier as written in the recipe, without digest pin */
  identifier: z.string().min(1),
  repository: z.string().min(1),
  version: z.string().min(1),
  variant: z.string().nullable(),
  distribution: z.string().min(1),
  release: z.string().min(1),
  digest: Sha256Schema,
  /** Directory the language installer writes packages into */
  languagePackageRoot: ImagePathSchema,
});

export type BaseRef = z.infer<typeof BaseRefSchema>;

// ============================================================================
// Layers and Files
// ============================================================================

export const LayeredFileSchema = z.object({
  sha256: Sha256Schema,
  sizeBytes: z.number().int().nonnegative(),
});

export type LayeredFile = z.infer<typeof LayeredFileSchema>;

/**
 * Filesystem delta committed by one stage.
 */
export const LayerRecordSchema = z.object({
  stageId: z.string().min(1),
  cacheKey: Sha256Schema,
  /** Bytes the layer adds to the image */
  sizeBytes: z.number().int().nonnegative(),
  /** Paths present in the committed layer */
  pathsAdded: z.array(z.string()),
  /** Paths written during the stage and removed before commit */
  pathsPruned: z.array(z.string()),
});

export type LayerRecord = z.infer<typeof LayerRecordSchema>;

// ============================================================================
// Snapshot
// ============================================================================

export const ImageSnapshotSchema = z.object({
  /** Null only in the empty snapshot before stage 00 */
  base: BaseRefSchema.nullable(),
  /** Installed OS packages (name → version) */
  systemPackages: z.record(z.string(), z.string()),
  /** Installed language packages (normalised name → version) */
  languagePackages: z.record(z.string(), z.string()),
  /** Layered application files (absolute image path → content) */
  files: z.record(z.string(), LayeredFileSchema),
  /** Working directory for processes, null until the source stage */
  workdir: z.string().nullable(),
  env: EnvMapSchema,
  layers: z.array(LayerRecordSchema),
});

export type ImageSnapshot = z.infer<typeof ImageSnapshotSchema>;

// ============================================================================
// Resulting Image
// ============================================================================

export const ImageRecordSchema = z.object({
  schemaVersion: z.number().int().positive().default(SCHEMA_VERSIONS.image),

  /** "sha256:" + snapshot digest */
  imageId: ImageIdSchema,

  /** Recipe name the image was built from (e.g., "core") */
  recipeName: z.string().min(1),

  /** Build that first produced this image */
  buildId: z.string().min(1),

  createdAt: ISO8601TimestampSchema,

  /** Sum of all layer sizes */
  sizeBytes: z.number().int().nonnegative(),

  snapshot: ImageSnapshotSchema,
});

export type ImageRecord = z.infer<typeof ImageRecordSchema>;
