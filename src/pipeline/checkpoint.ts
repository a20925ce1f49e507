/**
 * Checkpoint Writing Module
 *
 * Wraps each stage's snapshot with metadata and writes it atomically into
 * the build directory, whether the stage executed or came from the cache.
 * All checkpoints follow the structure: { _meta: StageMetadata, data: ImageSnapshot }
 *
 * @module pipeline/checkpoint
 */

import * as fs from 'node:fs/promises';
import { z } from 'zod';
import {
  createStageMetadata,
  StageOutputSchema,
  type StageMetadata,
} from '../schemas/stage.js';
import { ImageSnapshotSchema, type ImageSnapshot } from '../schemas/image.js';
import { saveStageFile, loadStageFile } from '../storage/stages.js';
import type { StageInputs, StageName, StageNumber } from './types.js';

// ============================================================================
// Types
// ============================================================================

export const CheckpointSchema = StageOutputSchema(ImageSnapshotSchema);

export type Checkpoint = z.infer<typeof CheckpointSchema>;

export interface CheckpointOptions {
  cacheKey: string;
  /** True when the snapshot came from the layer cache */
  cached: boolean;
  inputs: StageInputs;
  /** Upstream stage ID that produced the input snapshot */
  upstreamStage?: string;
}

export interface CheckpointResult {
  /** Full path where checkpoint was written */
  filePath: string;
  /** The metadata that was injected */
  metadata: StageMetadata;
  sizeBytes: number;
}

// ============================================================================
// Write Functions
// ============================================================================

/**
 * Write a stage checkpoint with automatically injected metadata.
 *
 * @example
 * const result = await writeCheckpoint('20200715-101500-core', 2, 'dependencies', snapshot, {
 *   cacheKey,
 *   cached: false,
 *   inputs: { manifestSha256 },
 *   upstreamStage: '01_system_packages',
 * });
 */
export async function writeCheckpoint(
  buildId: string,
  stageNumber: StageNumber,
  stageName: StageName,
  snapshot: ImageSnapshot,
  options: CheckpointOptions
): Promise<CheckpointResult> {
  const metadata = createStageMetadata({
    stageNumber,
    stageName,
    buildId,
    cacheKey: options.cacheKey,
    cached: options.cached,
    inputs: options.inputs,
    upstreamStage: options.upstreamStage,
  });

  const checkpoint: Checkpoint = { _meta: metadata, data: snapshot };
  const filePath = await saveStageFile(buildId, metadata.stageId, checkpoint);
  const stats = await fs.stat(filePath);

  return { filePath, metadata, sizeBytes: stats.size };
}

// ============================================================================
// Read Functions
// ============================================================================

/**
 * Read and validate a full checkpoint.
 *
 * @throws Error if the checkpoint file doesn't exist, ZodError if it is invalid
 */
export async function readCheckpoint(buildId: string, stageId: string): Promise<Checkpoint> {
  return loadStageFile(buildId, stageId, CheckpointSchema);
}

/**
 * Read the snapshot a stage produced.
 */
export async function readCheckpointSnapshot(buildId: string, stageId: string): Promise<ImageSnapshot> {
  const checkpoint = await readCheckpoint(buildId, stageId);
  return checkpoint.data;
}

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Validate that a value has the checkpoint structure.
 */
export function validateCheckpointStructure(checkpoint: unknown): checkpoint is Checkpoint {
  return CheckpointSchema.safeParse(checkpoint).success;
}

/**
 * Get detailed validation errors for a checkpoint structure.
 *
 * @returns Validation error messages, empty if valid
 */
export function getCheckpointValidationErrors(checkpoint: unknown): string[] {
  const result = CheckpointSchema.safeParse(checkpoint);
  if (result.success) {
    return [];
  }
  return result.error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}
