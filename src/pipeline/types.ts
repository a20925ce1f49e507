/**
 * Pipeline Type Definitions
 *
 * Core interfaces for the five-stage provisioning pipeline. These types
 * define the contracts between stages, the execution context, and the
 * results structure.
 *
 * @module pipeline/types
 */

import type { Profile } from '../schemas/common.js';
import type { Recipe } from '../schemas/recipe.js';
import type { ImageSnapshot } from '../schemas/image.js';
import type { Resolvers } from '../resolver/types.js';

// ============================================================================
// Stage Numbers and Names
// ============================================================================

/**
 * Valid stage numbers (0-4).
 *
 * Stage numbering:
 * - 00: Base image
 * - 01: System packages
 * - 02: Language dependencies
 * - 03: Source tree
 * - 04: Runtime configuration
 */
export type StageNumber = 0 | 1 | 2 | 3 | 4;

export type StageName = 'base' | 'system_packages' | 'dependencies' | 'source' | 'runtime_config';

export const STAGE_NAMES: Record<StageNumber, StageName> = {
  0: 'base',
  1: 'system_packages',
  2: 'dependencies',
  3: 'source',
  4: 'runtime_config',
} as const;

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Minimal logger interface for pipeline stages.
 * Allows stages to log at various levels without depending on a specific logger.
 */
export interface Logger {
  /** Log debug-level message (hidden unless verbose) */
  debug(message: string, ...args: unknown[]): void;

  info(message: string, ...args: unknown[]): void;

  warn(message: string, ...args: unknown[]): void;

  error(message: string, ...args: unknown[]): void;
}

// ============================================================================
// Stage Context
// ============================================================================

/**
 * Runtime context passed to each stage.
 */
export interface StageContext {
  /** Build identifier (format: YYYYMMDD-HHMMSS-<recipe-slug>) */
  buildId: string;

  /** Validated recipe */
  recipe: Recipe;

  /** Absolute directory of the recipe file; recipe paths resolve against it */
  recipeDir: string;

  /** Base image registry, OS package manager and dependency installer */
  resolvers: Resolvers;

  /** Package selection profile */
  profile: Profile;

  /** Forces the noninteractive package frontend */
  unattended: boolean;

  logger?: Logger;
}

// ============================================================================
// Stage Interface
// ============================================================================

/**
 * Declared inputs of a stage. Must be JSON-compatible: they are hashed with
 * the parent cache key into the stage's cache key and recorded in its
 * checkpoint.
 */
export type StageInputs = Record<string, unknown>;

/**
 * Filesystem delta a stage commits. The executor turns it into a
 * LayerRecord by adding the stage id and cache key.
 */
export interface LayerDelta {
  sizeBytes: number;
  pathsAdded: string[];
  pathsPruned: string[];
}

/**
 * What a stage returns: the new snapshot (without its own layer record) and
 * the delta it committed.
 */
export interface StageResult {
  snapshot: ImageSnapshot;
  layer: LayerDelta;
}

/**
 * A stage whose declared inputs have been read. `apply` runs against
 * exactly the inputs that were hashed, so a file changing between hashing
 * and execution cannot produce a layer under the wrong key.
 */
export interface PreparedStage {
  inputs: StageInputs;

  /**
   * Apply the stage's mutations. Must not modify `snapshot`.
   */
  apply(snapshot: ImageSnapshot): Promise<StageResult>;
}

/**
 * Interface that all pipeline stages implement.
 *
 * @example
 * ```typescript
 * const runtimeConfigStage: Stage = {
 *   id: '04_runtime_config',
 *   name: 'runtime_config',
 *   number: 4,
 *   async prepare(context) {
 *     const env = resolveEnvAssignments(context.recipe.env);
 *     return {
 *       inputs: { env },
 *       apply: async (snapshot) => ({
 *         snapshot: { ...snapshot, env: { ...snapshot.env, ...env } },
 *         layer: { sizeBytes: 0, pathsAdded: [], pathsPruned: [] },
 *       }),
 *     };
 *   },
 * };
 * ```
 */
export interface Stage {
  /**
   * Stage identifier in format NN_stage_name.
   * @example "02_dependencies"
   */
  id: string;

  name: StageName;

  number: StageNumber;

  /**
   * Read and normalise the stage's declared inputs.
   *
   * @throws ProvisionError when an input cannot be read (e.g., a missing
   *   dependency manifest)
   */
  prepare(context: StageContext): Promise<PreparedStage>;
}

// ============================================================================
// Execution Options
// ============================================================================

/**
 * Options for pipeline execution.
 */
export interface ExecuteOptions {
  /** Execute every stage regardless of the layer cache */
  noCache?: boolean;

  /** Reuse cached layers only for stages before this one */
  fromStage?: StageNumber;

  /** Stop after this stage; no image unless it is the final stage */
  stopAfterStage?: StageNumber;

  /** Compute keys and cache status without executing or writing anything */
  dryRun?: boolean;
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Format a stage number as a two-digit string with leading zero.
 */
export function formatStageNumber(num: StageNumber): string {
  return num.toString().padStart(2, '0');
}

/**
 * Build a stage ID from number and name.
 */
export function buildStageId(num: StageNumber, name: StageName): string {
  return `${formatStageNumber(num)}_${name}`;
}

/**
 * Check if a value is a valid stage number (0-4).
 */
export function isValidStageNumber(value: unknown): value is StageNumber {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 4;
}
