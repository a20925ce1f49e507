/**
 * Stage Dependency Map
 *
 * The pipeline has 5 stages (0-4) with linear dependencies:
 * Base (00) → System Packages (01) → Dependencies (02) → Source (03) →
 * Runtime Config (04)
 *
 * Every stage's cache key chains through its upstream stage's key, so
 * invalidating a stage invalidates all of its downstream stages.
 *
 * @module pipeline/dependencies
 */

import { type StageNumber, STAGE_NAMES, buildStageId, isValidStageNumber } from './types.js';

// Re-export for consumers that import from dependencies.js
export { type StageNumber, isValidStageNumber };

// ============================================================================
// Stage Constants
// ============================================================================

export const FINAL_STAGE: StageNumber = 4;

export const VALID_STAGE_NUMBERS: readonly StageNumber[] = [0, 1, 2, 3, 4];

export const STAGE_IDS: Record<StageNumber, string> = {
  0: buildStageId(0, STAGE_NAMES[0]),
  1: buildStageId(1, STAGE_NAMES[1]),
  2: buildStageId(2, STAGE_NAMES[2]),
  3: buildStageId(3, STAGE_NAMES[3]),
  4: buildStageId(4, STAGE_NAMES[4]),
};

/**
 * Assert that a stage number is valid, throwing an error if not.
 */
export function assertValidStageNumber(stageNumber: number): asserts stageNumber is StageNumber {
  if (!isValidStageNumber(stageNumber)) {
    throw new Error(`Invalid stage number: ${stageNumber}. Must be an integer from 0 to 4.`);
  }
}

// ============================================================================
// Stage ID Functions
// ============================================================================

/**
 * Get the stage ID for a stage number.
 *
 * @throws Error if stageNumber is invalid
 *
 * @example
 * getStageId(2); // "02_dependencies"
 */
export function getStageId(stageNumber: number): string {
  assertValidStageNumber(stageNumber);
  return STAGE_IDS[stageNumber];
}

// ============================================================================
// Dependency Functions
// ============================================================================

/**
 * Get the immediate upstream stage for a given stage.
 *
 * @example
 * getImmediateUpstream(3); // 2
 * getImmediateUpstream(0); // null
 */
export function getImmediateUpstream(stageNumber: number): StageNumber | null {
  assertValidStageNumber(stageNumber);
  const upstream = stageNumber - 1;
  return isValidStageNumber(upstream) ? upstream : null;
}

/**
 * Get all stages after a given stage, immediate first. These are the
 * stages a change to `stageNumber` invalidates.
 *
 * @example
 * getDownstreamStages(2); // [3, 4]
 * getDownstreamStages(4); // []
 */
export function getDownstreamStages(stageNumber: number): StageNumber[] {
  assertValidStageNumber(stageNumber);
  return VALID_STAGE_NUMBERS.filter((n) => n > stageNumber);
}
