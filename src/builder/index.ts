/**
 * Builder Module
 *
 * @module builder
 */

export {
  runBuild,
  selectCatalog,
  selectProfile,
  type RunBuildOptions,
  type BuildOutcome,
} from './build.js';
export { generateSlug, formatTimestamp, generateBuildId, handleCollision } from './id-generator.js';
