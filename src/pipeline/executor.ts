/**
 * Pipeline Executor
 *
 * Manages stage registration and runs the five-stage provisioning pipeline
 * against an explicit snapshot value.
 *
 * For each stage, in order:
 * 1. prepare: read the declared inputs
 * 2. compute the cache key from the upstream key and those inputs
 * 3. reuse the cached layer if allowed and present, otherwise apply the
 *    stage and store its layer
 * 4. write the stage checkpoint
 *
 * The first stage failure aborts the build. No later stage runs and no image
 * is stored. A manifest is written either way.
 *
 * @module pipeline/executor
 */

import type { ImageRecord, ImageSnapshot, LayerRecord } from '../schemas/image.js';
import type { BuildError } from '../schemas/build.js';
import { errorKindOf, toError } from '../errors/index.js';
import { emptySnapshot, freezeSnapshot, appendLayer } from '../image/snapshot.js';
import { storeImage } from '../image/store.js';
import { updateLatestSymlink } from '../storage/builds.js';
import type { ExecuteOptions, Stage, StageContext, StageInputs, StageNumber } from './types.js';
import { VALID_STAGE_NUMBERS, getImmediateUpstream, getStageId, isValidStageNumber } from './dependencies.js';
import { computeCacheKey } from './cache-key.js';
import { LayerCache } from './layer-cache.js';
import { writeCheckpoint } from './checkpoint.js';
import { generateManifest, saveManifest, type StageFileInfo } from './manifest.js';
import { createExecutionPlan } from './plan.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Timing information for pipeline execution
 */
export interface PipelineTiming {
  startedAt: string;
  completedAt: string;
  durationMs: number;
  /** Duration per stage in milliseconds */
  perStage: Record<string, number>;
}

/**
 * What happened to one stage
 */
export interface StageReport {
  stageId: string;
  stageNumber: StageNumber;
  inputs: StageInputs;
  cacheKey: string;
  /** Served from the layer cache (in a dry run: would be) */
  cached: boolean;
  /** Layer committed by the stage; absent in dry runs */
  layer?: LayerRecord;
  durationMs: number;
}

/**
 * Result of a pipeline execution
 */
export interface PipelineResult {
  /** True when every requested stage completed */
  success: boolean;
  buildId: string;
  dryRun: boolean;
  /** Per-stage reports for every stage that completed */
  stages: StageReport[];
  /** Stage IDs whose mutations ran in this build */
  stagesExecuted: string[];
  /** Stage IDs reused from the layer cache */
  stagesCached: string[];
  /** Stage IDs never reached (after a failure or the stop point) */
  stagesNotRun: string[];
  /** Last stage that completed, empty when none did */
  finalStage: string;
  /** Snapshot after the last completed stage; null in dry runs */
  snapshot: ImageSnapshot | null;
  /** Resulting image, when the final stage completed */
  image: ImageRecord | null;
  /** False when an identical image already existed */
  imageCreated: boolean;
  timing: PipelineTiming;
  error?: BuildError;
}

/**
 * Callback for stage lifecycle events
 */
export interface ExecutorCallbacks {
  /** Called before a stage reads its inputs */
  onStageStart?: (stageId: string, stageNumber: StageNumber) => void;
  /** Called when a stage completes, executed or cached */
  onStageComplete?: (stageId: string, report: StageReport) => void;
  /** Called when a stage fails */
  onStageError?: (stageId: string, error: Error) => void;
}

// ============================================================================
// Pipeline Executor Class
// ============================================================================

/**
 * Pipeline executor that manages stage execution.
 *
 * @example
 * ```typescript
 * const executor = new PipelineExecutor();
 * executor.registerStages(createProvisioningStages());
 *
 * const result = await executor.execute(context, { fromStage: 3 });
 * ```
 */
export class PipelineExecutor {
  private stages: Map<StageNumber, Stage> = new Map();
  private callbacks: ExecutorCallbacks = {};

  // ==========================================================================
  // Stage Registration
  // ==========================================================================

  /**
   * Register a stage with the executor.
   *
   * @throws Error if stage number is invalid or already registered
   */
  registerStage(stage: Stage): void {
    if (!isValidStageNumber(stage.number)) {
      throw new Error(`Invalid stage number ${stage.number} for stage ${stage.id}. Must be 0-4.`);
    }

    const existing = this.stages.get(stage.number);
    if (existing) {
      throw new Error(`Stage ${stage.number} is already registered (${existing.id})`);
    }

    this.stages.set(stage.number, stage);
  }

  registerStages(stages: Stage[]): void {
    for (const stage of stages) {
      this.registerStage(stage);
    }
  }

  getStage(number: StageNumber): Stage | undefined {
    return this.stages.get(number);
  }

  /**
   * Get list of missing stage numbers.
   */
  getMissingStages(): StageNumber[] {
    return VALID_STAGE_NUMBERS.filter((n) => !this.stages.has(n));
  }

  setCallbacks(callbacks: ExecutorCallbacks): void {
    this.callbacks = callbacks;
  }

  // ==========================================================================
  // Execution
  // ==========================================================================

  /**
   * Execute the pipeline.
   *
   * @throws Error if a stage the plan needs is not registered, or the
   *   options are invalid. Stage failures are reported in the result.
   */
  async execute(context: StageContext, options: ExecuteOptions = {}): Promise<PipelineResult> {
    const plan = createExecutionPlan(options);
    const dryRun = options.dryRun ?? false;

    const planned: Stage[] = plan.stageNumbers.map((n) => {
      const stage = this.stages.get(n);
      if (!stage) {
        throw new Error(`Stage ${n} (${getStageId(n)}) not registered. Call registerStage() first.`);
      }
      return stage;
    });

    const startedAt = new Date().toISOString();
    const perStage: Record<string, number> = {};
    const reports: StageReport[] = [];
    const stageFiles: StageFileInfo[] = [];
    const cache = new LayerCache(context.logger);

    let snapshot = freezeSnapshot(emptySnapshot());
    let parentKey: string | null = null;
    let reuseCache = true;
    let error: BuildError | undefined;

    for (const stage of planned) {
      const stageStart = Date.now();
      const upstream = getImmediateUpstream(stage.number);
      const upstreamStage = upstream === null ? undefined : getStageId(upstream);

      this.callbacks.onStageStart?.(stage.id, stage.number);

      try {
        const prepared = await stage.prepare(context);
        const cacheKey = computeCacheKey(parentKey, stage.id, prepared.inputs);
        context.logger?.debug(`${stage.id} cache key ${cacheKey}`);

        const cachedLayer =
          reuseCache && plan.cacheEligible.includes(stage.number) ? await cache.get(cacheKey) : null;
        if (!cachedLayer) {
          reuseCache = false;
        }

        let layer: LayerRecord | undefined;
        if (!dryRun) {
          if (cachedLayer) {
            snapshot = freezeSnapshot(cachedLayer.snapshot);
          } else {
            const result = await prepared.apply(snapshot);
            layer = { stageId: stage.id, cacheKey, ...result.layer };
            snapshot = freezeSnapshot(appendLayer(result.snapshot, layer));
            await cache.put({ cacheKey, stageId: stage.id, parentKey, buildId: context.buildId, snapshot });
          }
          layer ??= snapshot.layers.at(-1);

          await writeCheckpoint(context.buildId, stage.number, stage.name, snapshot, {
            cacheKey,
            cached: cachedLayer !== null,
            inputs: prepared.inputs,
            upstreamStage,
          });
          stageFiles.push({ stageId: stage.id, cacheKey, cached: cachedLayer !== null, upstreamStage });
        }

        perStage[stage.id] = Date.now() - stageStart;
        const report: StageReport = {
          stageId: stage.id,
          stageNumber: stage.number,
          inputs: prepared.inputs,
          cacheKey,
          cached: cachedLayer !== null,
          layer,
          durationMs: perStage[stage.id],
        };
        reports.push(report);
        parentKey = cacheKey;

        this.callbacks.onStageComplete?.(stage.id, report);
      } catch (caught) {
        perStage[stage.id] = Date.now() - stageStart;
        const stageError = toError(caught);
        error = { stageId: stage.id, kind: errorKindOf(caught), message: stageError.message };
        this.callbacks.onStageError?.(stage.id, stageError);
        break;
      }
    }

    const finalStage = reports.at(-1)?.stageId ?? '';
    let image: ImageRecord | null = null;
    let imageCreated = false;

    if (!dryRun) {
      if (!error && plan.producesImage) {
        try {
          const stored = await storeImage({
            snapshot,
            recipeName: context.recipe.name,
            buildId: context.buildId,
          });
          image = stored.image;
          imageCreated = stored.created;
        } catch (caught) {
          error = { stageId: finalStage, kind: errorKindOf(caught), message: toError(caught).message };
        }
      }

      const manifest = await generateManifest(context.buildId, context.recipe.name, stageFiles, {
        success: !error,
        imageId: image?.imageId,
        error,
      });
      await saveManifest(context.buildId, manifest);
      await updateLatestSymlink(context.buildId);
    }

    const completed = new Set(reports.map((report) => report.stageId));

    return {
      success: !error,
      buildId: context.buildId,
      dryRun,
      stages: reports,
      stagesExecuted: reports.filter((report) => !report.cached).map((report) => report.stageId),
      stagesCached: reports.filter((report) => report.cached).map((report) => report.stageId),
      stagesNotRun: VALID_STAGE_NUMBERS.map((n) => getStageId(n)).filter((id) => !completed.has(id)),
      finalStage,
      snapshot: dryRun ? null : snapshot,
      image,
      imageCreated,
      timing: {
        startedAt,
        completedAt: new Date().toISOString(),
        durationMs: Date.now() - new Date(startedAt).getTime(),
        perStage,
      },
      error,
    };
  }
}

// ============================================================================
// Factory Function
// ============================================================================

/**
 * Create a new PipelineExecutor with the given stages registered.
 */
export function createPipelineExecutor(stages: Stage[] = []): PipelineExecutor {
  const executor = new PipelineExecutor();
  executor.registerStages(stages);
  return executor;
}
