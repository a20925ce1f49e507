/**
 * Pipeline Infrastructure
 *
 * Stage execution framework for the five-stage provisioning pipeline.
 * Provides stage interfaces, cache keys, the layer cache, checkpointing and
 * execution planning.
 *
 * @module pipeline
 */

// Type definitions and constants
export {
  type StageNumber,
  type StageName,
  STAGE_NAMES,
  type Logger,
  type StageContext,
  type StageInputs,
  type LayerDelta,
  type StageResult,
  type PreparedStage,
  type Stage,
  type ExecuteOptions,
  formatStageNumber,
  buildStageId,
  isValidStageNumber,
} from './types.js';

// Stage dependencies
export {
  FINAL_STAGE,
  VALID_STAGE_NUMBERS,
  STAGE_IDS,
  assertValidStageNumber,
  getStageId,
  getImmediateUpstream,
  getDownstreamStages,
} from './dependencies.js';

// Cache keys and the layer cache
export { computeCacheKey } from './cache-key.js';
export { LayerCache, type LayerCacheEntry } from './layer-cache.js';

// Checkpoint writing
export {
  CheckpointSchema,
  writeCheckpoint,
  readCheckpoint,
  readCheckpointSnapshot,
  validateCheckpointStructure,
  getCheckpointValidationErrors,
  type CheckpointOptions,
  type CheckpointResult,
  type Checkpoint,
} from './checkpoint.js';

// Manifest generation
export {
  type StageFileInfo,
  type ManifestVerificationResult,
  calculateFileHash,
  createStageEntry,
  generateManifest,
  saveManifest,
  loadManifest,
  verifyManifest,
} from './manifest.js';

// Planning
export { createExecutionPlan, type ExecutionPlan } from './plan.js';

// Executor
export {
  PipelineExecutor,
  createPipelineExecutor,
  type PipelineTiming,
  type StageReport,
  type PipelineResult,
  type ExecutorCallbacks,
} from './executor.js';
