/**
 * Pipeline Stages Exports
 *
 * Central export point for the five provisioning stages, in pipeline order.
 *
 * @module stages
 */

import type { Stage } from '../pipeline/types.js';
import { baseStage } from './base.js';
import { systemPackagesStage } from './system-packages.js';
import { dependenciesStage } from './dependencies.js';
import { sourceStage } from './source.js';
import { runtimeConfigStage } from './runtime-config.js';

// Stage 00: Base environment
export { baseStage } from './base.js';

// Stage 01: OS packages
export { systemPackagesStage, PACKAGE_CACHE_PREFIXES, isPackageCachePath } from './system-packages.js';

// Stage 02: Language dependencies
export { dependenciesStage } from './dependencies.js';

// Stage 03: Source layering
export { sourceStage } from './source.js';

// Stage 04: Runtime configuration
export { runtimeConfigStage } from './runtime-config.js';

/**
 * All five stages, ready for `PipelineExecutor.registerStages`.
 */
export function createProvisioningStages(): Stage[] {
  return [baseStage, systemPackagesStage, dependenciesStage, sourceStage, runtimeConfigStage];
}
