/**
 * Stage Cache Keys
 *
 * key(stage) = sha256(parentKey, stageId, canonical JSON of declared inputs)
 *
 * Only declared inputs enter the key. A file the stage does not declare can
 * change freely without invalidating it.
 *
 * @module pipeline/cache-key
 */

import { canonicalJson, sha256Hex } from '../image/digest.js';
import type { StageInputs } from './types.js';

/**
 * Compute a stage's cache key.
 *
 * @param parentKey - Cache key of the upstream stage, null for stage 00
 *
 * @example
 * const baseKey = computeCacheKey(null, '00_base', { identifier: 'python:3.8.3-slim-buster' });
 * const packagesKey = computeCacheKey(baseKey, '01_system_packages', { packages: ['binutils'] });
 */
export function computeCacheKey(parentKey: string | null, stageId: string, inputs: StageInputs): string {
  return sha256Hex(`${parentKey ?? ''}\n${stageId}\n${canonicalJson(inputs)}`);
}
