/**
 * Zod Schemas for All Persisted Documents
 *
 * Central export point for the recipe, catalog, snapshot, checkpoint,
 * manifest and build record schemas.
 */

// ============================================================================
// Version Registry
// ============================================================================

export { SCHEMA_VERSIONS, getCurrentVersion, isCurrentVersion, type SchemaType } from './versions.js';

// ============================================================================
// Common Types
// ============================================================================

export {
  ISO8601TimestampSchema,
  Sha256Schema,
  IMAGE_ID_PATTERN,
  ImageIdSchema,
  ENV_NAME_PATTERN,
  EnvNameSchema,
  EnvMapSchema,
  ImagePathSchema,
  ProfileSchema,
  FrontendSchema,
  type ISO8601Timestamp,
  type Sha256,
  type ImageId,
  type EnvMap,
  type Profile,
  type Frontend,
} from './common.js';

// ============================================================================
// Recipe
// ============================================================================

export {
  BASE_IDENTIFIER_PATTERN,
  BaseIdentifierSchema,
  parseBaseIdentifier,
  SYSTEM_PACKAGE_NAME_PATTERN,
  SystemPackageEntrySchema,
  SystemPackagesSchema,
  EnvAssignmentSchema,
  EnvAssignmentsSchema,
  DEFAULT_SOURCE_IGNORE,
  SourceSchema,
  RECIPE_NAME_PATTERN,
  RecipeSchema,
  resolveEnvAssignments,
  type BaseIdentifier,
  type SystemPackageRequest,
  type SystemPackageEntry,
  type EnvAssignment,
  type Recipe,
  type RecipeInput,
} from './recipe.js';

// ============================================================================
// Catalog
// ============================================================================

export {
  CatalogBaseImageSchema,
  CatalogSystemPackageSchema,
  CatalogLanguageReleaseSchema,
  CatalogLanguagePackageSchema,
  CatalogSchema,
  type CatalogBaseImage,
  type CatalogSystemPackage,
  type CatalogLanguageRelease,
  type CatalogLanguagePackage,
  type Catalog,
  type CatalogInput,
} from './catalog.js';

// ============================================================================
// Snapshot and Image
// ============================================================================

export {
  BaseRefSchema,
  LayeredFileSchema,
  LayerRecordSchema,
  ImageSnapshotSchema,
  ImageRecordSchema,
  type BaseRef,
  type LayeredFile,
  type LayerRecord,
  type ImageSnapshot,
  type ImageRecord,
} from './image.js';

export { CachedLayerSchema, type CachedLayer } from './layer.js';

// ============================================================================
// Stage Checkpoints
// ============================================================================

export {
  STAGE_ID_PATTERN,
  StageIdSchema,
  StageMetadataSchema,
  StageOutputSchema,
  createStageMetadata,
  parseStageNumber,
  parseStageName,
  type StageMetadata,
} from './stage.js';

// ============================================================================
// Build Record and Manifest
// ============================================================================

export {
  BuildStatusSchema,
  ErrorKindSchema,
  BuildOptionsSchema,
  BuildErrorSchema,
  BuildRecordSchema,
  type BuildStatus,
  type BuildOptions,
  type BuildOptionsInput,
  type BuildError,
  type BuildRecord,
} from './build.js';

export {
  ManifestStageEntrySchema,
  BuildManifestSchema,
  createEmptyManifest,
  addStageToManifest,
  finalizeManifest,
  type ManifestStageEntry,
  type BuildManifest,
} from './manifest.js';

// ============================================================================
// Migrations
// ============================================================================

export {
  needsMigration,
  migrateSchema,
  registerMigration,
  hasMigration,
  loadAndMigrate,
  loadMigrateAndSave,
  atomicWriteJson,
  type Migration,
  type OutputSchema,
} from './migrations/index.js';
