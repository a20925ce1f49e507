/**
 * Stage Checkpoint Schema
 *
 * Each stage of a build writes a JSON checkpoint into the build directory,
 * whether it executed or came from the layer cache. The checkpoint records
 * the declared inputs, the resulting cache key and the snapshot.
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from './versions.js';
import { ISO8601TimestampSchema, Sha256Schema } from './common.js';

// ============================================================================
// Stage ID Pattern
// ============================================================================

/**
 * Stage IDs follow format: NN_stage_name
 * Examples: "00_base", "02_dependencies", "04_runtime_config"
 */
export const STAGE_ID_PATTERN = /^\d{2}_[a-z_]+$/;

export const StageIdSchema = z
  .string()
  .regex(STAGE_ID_PATTERN, 'Stage ID must match pattern NN_stage_name (e.g., "02_dependencies")');

// ============================================================================
// Stage Metadata Schema
// ============================================================================

/**
 * Standard metadata included in every stage checkpoint.
 */
export const StageMetadataSchema = z.object({
  stageId: StageIdSchema,

  /** Numeric stage number (0-4) */
  stageNumber: z.number().int().min(0).max(4),

  /** Stage name (e.g., "dependencies") */
  stageName: z.string().min(1),

  schemaVersion: z.number().int().positive().default(SCHEMA_VERSIONS.stage),

  /** Build this checkpoint belongs to */
  buildId: z.string().min(1),

  createdAt: ISO8601TimestampSchema,

  /** Previous stage that fed into this one */
  upstreamStage: z.string().optional(),

  /** Cache key computed from the declared inputs */
  cacheKey: Sha256Schema,

  /** True when the snapshot was loaded from the layer cache */
  cached: z.boolean(),

  /** Declared inputs, as hashed into the cache key */
  inputs: z.record(z.string(), z.unknown()),
});

export type StageMetadata = z.infer<typeof StageMetadataSchema>;

// ============================================================================
// Stage Output Wrapper
// ============================================================================

/**
 * Generic checkpoint wrapper. All stage files carry a _meta field.
 */
export const StageOutputSchema = <T extends z.ZodTypeAny>(dataSchema: T) =>
  z.object({
    _meta: StageMetadataSchema,
    data: dataSchema,
  });

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Create stage metadata for a new checkpoint.
 */
export function createStageMetadata(params: {
  stageNumber: number;
  stageName: string;
  buildId: string;
  cacheKey: string;
  cached: boolean;
  inputs: Record<string, unknown>;
  upstreamStage?: string;
}): StageMetadata {
  const stageId = `${params.stageNumber.toString().padStart(2, '0')}_${params.stageName}`;

  return {
    stageId,
    stageNumber: params.stageNumber,
    stageName: params.stageName,
    schemaVersion: SCHEMA_VERSIONS.stage,
    buildId: params.buildId,
    createdAt: new Date().toISOString(),
    upstreamStage: params.upstreamStage,
    cacheKey: params.cacheKey,
    cached: params.cached,
    inputs: params.inputs,
  };
}

/**
 * Parse stage number from a stage ID
 * @example parseStageNumber("02_dependencies") // returns 2
 */
export function parseStageNumber(stageId: string): number {
  const match = stageId.match(/^(\d{2})_/);
  if (!match) {
    throw new Error(`Invalid stage ID format: ${stageId}`);
  }
  return parseInt(match[1], 10);
}

/**
 * Parse stage name from a stage ID
 * @example parseStageName("04_runtime_config") // returns "runtime_config"
 */
export function parseStageName(stageId: string): string {
  const match = stageId.match(/^\d{2}_(.+)$/);
  if (!match) {
    throw new Error(`Invalid stage ID format: ${stageId}`);
  }
  return match[1];
}
