/**
 * Execution Plan
 *
 * Turns build options into the list of stages to run and the rule for
 * which of them may be served from the layer cache.
 *
 * - `stopAfterStage N` runs stages 0..N.
 * - `fromStage N` reuses cached layers only for stages before N; stage N
 *   and everything after it execute.
 * - `noCache` executes every stage.
 *
 * Independent of the options, the first cache miss ends reuse: every later
 * stage executes even if a layer exists under its key.
 *
 * @module pipeline/plan
 */

import { FINAL_STAGE, VALID_STAGE_NUMBERS, assertValidStageNumber, getStageId } from './dependencies.js';
import type { ExecuteOptions, StageNumber } from './types.js';

export interface ExecutionPlan {
  /** Stage numbers to run, in order */
  stageNumbers: StageNumber[];
  /** Stage IDs in the same order */
  stageIds: string[];
  /** Stages after the stop point, never reached */
  stagesNotRun: string[];
  /** Stages whose layers may come from the cache */
  cacheEligible: StageNumber[];
  /** Whether the final stage is reached and an image will be stored */
  producesImage: boolean;
}

/**
 * Create the execution plan for a set of options.
 *
 * @throws Error if fromStage or stopAfterStage is invalid, or fromStage is
 *   after stopAfterStage
 *
 * @example
 * createExecutionPlan({ fromStage: 3 });
 * // { stageNumbers: [0, 1, 2, 3, 4], cacheEligible: [0, 1, 2], producesImage: true, ... }
 */
export function createExecutionPlan(options: ExecuteOptions = {}): ExecutionPlan {
  const stopAfter = options.stopAfterStage ?? FINAL_STAGE;
  const fromStage = options.fromStage ?? 0;
  assertValidStageNumber(stopAfter);
  assertValidStageNumber(fromStage);

  if (fromStage > stopAfter) {
    throw new Error(
      `Cannot start from stage ${fromStage} when stopping after stage ${stopAfter}`
    );
  }

  const stageNumbers = VALID_STAGE_NUMBERS.filter((n) => n <= stopAfter);
  const cacheEligible = options.noCache
    ? []
    : stageNumbers.filter((n) => options.fromStage === undefined || n < options.fromStage);

  return {
    stageNumbers,
    stageIds: stageNumbers.map((n) => getStageId(n)),
    stagesNotRun: VALID_STAGE_NUMBERS.filter((n) => n > stopAfter).map((n) => getStageId(n)),
    cacheEligible,
    producesImage: stopAfter === FINAL_STAGE,
  };
}
