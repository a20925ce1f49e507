/**
 * image-provisioner
 *
 * Library entry point. The `provision` CLI is built on the same exports.
 *
 * @example
 * ```typescript
 * import { runBuild } from 'image-provisioner';
 *
 * const { result } = await runBuild({ recipe: './provision.json' });
 * console.log(result.success, result.image?.imageId);
 * ```
 *
 * @module image-provisioner
 */

export * from './errors/index.js';
export * from './schemas/index.js';
export * from './manifests/index.js';
export * from './resolver/index.js';
export * from './image/index.js';
export * from './source/index.js';
export * from './pipeline/index.js';
export * from './stages/index.js';
export * from './recipe/index.js';
export * from './dockerfile/index.js';
export * from './builder/index.js';
export { exportBuild, createExportBundle, archiveBundle, verifyArchive, type ExportOptions } from './export/index.js';
export {
  getDataDir,
  listBuilds,
  loadBuildRecord,
  getLatestBuildId,
  loadGlobalConfig,
  saveGlobalConfig,
  type GlobalConfig,
} from './storage/index.js';
export { loadConfig, type Config } from './config/index.js';
