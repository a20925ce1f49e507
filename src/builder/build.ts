/**
 * Build Orchestration
 *
 * Everything around one pipeline execution: loading the recipe, choosing
 * the catalog and profile, allocating the build ID and keeping the build
 * record current. The executor owns the stages themselves.
 *
 * Catalog precedence: recipe `catalog` > PROVISIONER_CATALOG >
 * global config `catalogPath` > the bundled catalog.
 *
 * Profile precedence: explicit option > PROVISIONER_PROFILE >
 * global config `defaultProfile` > "production".
 *
 * @module builder/build
 */

import * as path from 'node:path';
import { loadConfig } from '../config/index.js';
import { SCHEMA_VERSIONS } from '../schemas/versions.js';
import type { Profile } from '../schemas/common.js';
import type { BuildOptions, BuildRecord } from '../schemas/build.js';
import type { Catalog } from '../schemas/catalog.js';
import { loadRecipe, type LoadedRecipe } from '../recipe/loader.js';
import { createCatalogResolvers, getDefaultCatalog, loadCatalog } from '../resolver/index.js';
import type { Resolvers } from '../resolver/types.js';
import { createProvisioningStages } from '../stages/index.js';
import { createPipelineExecutor, type ExecutorCallbacks, type PipelineResult } from '../pipeline/executor.js';
import type { ExecuteOptions, Logger, StageContext, StageNumber } from '../pipeline/types.js';
import { createBuildDir, listBuilds, saveBuildRecord } from '../storage/builds.js';
import { loadGlobalConfig, type GlobalConfig } from '../storage/config.js';
import { generateBuildId, handleCollision } from './id-generator.js';

// ============================================================================
// Types
// ============================================================================

export interface RunBuildOptions {
  /** Recipe file or directory; defaults to ./provision.json */
  recipe?: string;
  profile?: Profile;
  noCache?: boolean;
  fromStage?: StageNumber;
  stopAfterStage?: StageNumber;
  dryRun?: boolean;
  /** Replaces the catalog-backed resolvers */
  resolvers?: Resolvers;
  logger?: Logger;
  callbacks?: ExecutorCallbacks;
  /** Clock used for the build ID */
  now?: Date;
}

export interface BuildOutcome {
  loaded: LoadedRecipe;
  /** Final build record; null for dry runs, which write nothing */
  record: BuildRecord | null;
  result: PipelineResult;
}

// ============================================================================
// Catalog and Profile Selection
// ============================================================================

/**
 * Pick the catalog for a recipe.
 *
 * @throws ConfigError when the chosen catalog file is missing or invalid
 */
export async function selectCatalog(loaded: LoadedRecipe, globalConfig: GlobalConfig): Promise<Catalog> {
  const env = loadConfig();

  if (loaded.recipe.catalog) {
    return loadCatalog(path.resolve(loaded.recipeDir, loaded.recipe.catalog));
  }
  if (env.catalogPath) {
    return loadCatalog(path.resolve(env.catalogPath));
  }
  if (globalConfig.catalogPath) {
    return loadCatalog(path.resolve(globalConfig.catalogPath));
  }
  return getDefaultCatalog();
}

export function selectProfile(option: Profile | undefined, globalConfig: GlobalConfig): Profile {
  return option ?? loadConfig().profile ?? globalConfig.defaultProfile ?? 'production';
}

// ============================================================================
// Build
// ============================================================================

/**
 * Run one build.
 *
 * Recipe, catalog and configuration errors are thrown before a build
 * directory exists. Stage failures are reported through `result.success`
 * and recorded in the build record.
 *
 * @example
 * ```typescript
 * const { result } = await runBuild({ recipe: 'examples/geo-app' });
 * if (result.success) {
 *   console.log(result.image?.imageId);
 * }
 * ```
 */
export async function runBuild(options: RunBuildOptions = {}): Promise<BuildOutcome> {
  const loaded = await loadRecipe(options.recipe);
  const globalConfig = await loadGlobalConfig();
  const profile = selectProfile(options.profile, globalConfig);
  const resolvers = options.resolvers ?? createCatalogResolvers(await selectCatalog(loaded, globalConfig));
  const dryRun = options.dryRun ?? false;

  const buildId = handleCollision(generateBuildId(loaded.recipe.name, options.now), await listBuilds());

  const executeOptions: ExecuteOptions = {
    noCache: options.noCache ?? false,
    fromStage: options.fromStage,
    stopAfterStage: options.stopAfterStage,
    dryRun,
  };
  // Recorded as written; the executor takes the narrower stage types
  const buildOptions: BuildOptions = {
    noCache: options.noCache ?? false,
    fromStage: options.fromStage,
    stopAfterStage: options.stopAfterStage,
    dryRun,
    profile,
  };

  const context: StageContext = {
    buildId,
    recipe: loaded.recipe,
    recipeDir: loaded.recipeDir,
    resolvers,
    profile,
    unattended: globalConfig.unattended,
    logger: options.logger,
  };

  const executor = createPipelineExecutor(createProvisioningStages());
  if (options.callbacks) {
    executor.setCallbacks(options.callbacks);
  }

  if (dryRun) {
    const result = await executor.execute(context, executeOptions);
    return { loaded, record: null, result };
  }

  const startedAt = new Date();
  await createBuildDir(buildId);
  await saveBuildRecord({
    schemaVersion: SCHEMA_VERSIONS.build,
    buildId,
    recipePath: loaded.recipePath,
    recipeName: loaded.recipe.name,
    options: buildOptions,
    status: 'running',
    startedAt: startedAt.toISOString(),
  });

  const result = await executor.execute(context, executeOptions);

  const completedAt = new Date();
  const record: BuildRecord = {
    schemaVersion: SCHEMA_VERSIONS.build,
    buildId,
    recipePath: loaded.recipePath,
    recipeName: loaded.recipe.name,
    options: buildOptions,
    status: result.success ? 'succeeded' : 'failed',
    startedAt: startedAt.toISOString(),
    completedAt: completedAt.toISOString(),
    durationMs: completedAt.getTime() - startedAt.getTime(),
    imageId: result.image?.imageId,
    error: result.error,
  };
  await saveBuildRecord(record);

  return { loaded, record, result };
}
