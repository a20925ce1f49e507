/**
 * Build Record Schema
 *
 * Each build produces a build.json capturing the recipe, the options it ran
 * with, its status, and the resulting image or the failure that stopped it.
 */

import { z } from 'zod';
import { ERROR_KINDS } from '../errors/index.js';
import { SCHEMA_VERSIONS } from './versions.js';
import { ISO8601TimestampSchema, ImageIdSchema, ProfileSchema } from './common.js';

// ============================================================================
// Build Status
// ============================================================================

/**
 * - running: stages are executing
 * - succeeded: every requested stage completed
 * - failed: a stage failed and the build aborted
 */
export const BuildStatusSchema = z.enum(['running', 'succeeded', 'failed']);

export type BuildStatus = z.infer<typeof BuildStatusSchema>;

export const ErrorKindSchema = z.enum(ERROR_KINDS);

// ============================================================================
// Build Options
// ============================================================================

export const BuildOptionsSchema = z.object({
  /** Execute every stage regardless of the layer cache */
  noCache: z.boolean().default(false),

  /** Reuse cached layers only for stages before this one */
  fromStage: z.number().int().min(0).max(4).optional(),

  /** Stop after this stage; no image unless it is the final stage */
  stopAfterStage: z.number().int().min(0).max(4).optional(),

  /** Compute the plan without executing or writing anything */
  dryRun: z.boolean().default(false),

  /** Package selection profile */
  profile: ProfileSchema.default('production'),
});

export type BuildOptions = z.infer<typeof BuildOptionsSchema>;
export type BuildOptionsInput = z.input<typeof BuildOptionsSchema>;

// ============================================================================
// Build Record
// ============================================================================

export const BuildErrorSchema = z.object({
  /** Stage that failed, empty when the failure happened before any stage */
  stageId: z.string(),
  kind: ErrorKindSchema,
  message: z.string(),
});

export type BuildError = z.infer<typeof BuildErrorSchema>;

export const BuildRecordSchema = z.object({
  schemaVersion: z.number().int().positive().default(SCHEMA_VERSIONS.build),

  /** Build identifier (format: YYYYMMDD-HHMMSS-<recipe-slug>) */
  buildId: z.string().min(1),

  /** Absolute path of the recipe file */
  recipePath: z.string().min(1),

  recipeName: z.string().min(1),

  options: BuildOptionsSchema,

  status: BuildStatusSchema,

  startedAt: ISO8601TimestampSchema,

  completedAt: ISO8601TimestampSchema.optional(),

  durationMs: z.number().int().nonnegative().optional(),

  imageId: ImageIdSchema.optional(),

  error: BuildErrorSchema.optional(),
});

export type BuildRecord = z.infer<typeof BuildRecordSchema>;
