/**
 * Storage Layer
 *
 * File-based persistence for builds, stage checkpoints and config.
 * All write operations use atomic temp file + rename pattern.
 *
 * @module storage
 */

// Path utilities
export {
  getDataDir,
  getBuildsDir,
  getBuildDir,
  getStageFilePath,
  getLatestBuildSymlink,
  getBuildRecordPath,
  getManifestPath,
  getExportsDir,
  getLayerCacheDir,
  getLayerPath,
  getImagesDir,
  getImagePath,
  getGlobalConfigPath,
} from './paths.js';

// Atomic operations
export { atomicWriteJson, readJson, readDocument, fileExists } from './atomic.js';

// Build operations
export {
  createBuildDir,
  buildExists,
  saveBuildRecord,
  loadBuildRecord,
  listBuilds,
  getLatestBuildId,
  updateLatestSymlink,
} from './builds.js';

// Stage operations
export {
  saveStageFile,
  loadStageFile,
  stageFileExists,
  listStageFiles,
} from './stages.js';

// Config operations
export {
  GlobalConfigSchema,
  DEFAULT_GLOBAL_CONFIG,
  saveGlobalConfig,
  loadGlobalConfig,
  type GlobalConfig,
} from './config.js';
