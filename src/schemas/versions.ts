/**
 * Schema Version Registry
 *
 * All persisted documents include a schemaVersion field for migration support.
 * Each document type has an independent version number (simple integers).
 */

/**
 * Current schema versions for all persisted document types.
 * Increment when making breaking changes to a schema.
 */
export const SCHEMA_VERSIONS = {
  /** Provisioning recipe files */
  recipe: 1,
  /** Package catalog files */
  catalog: 1,
  /** Stage checkpoint files */
  stage: 1,
  /** Build record (build.json) */
  build: 1,
  /** Build manifest (manifest.json) */
  manifest: 1,
  /** Cached stage layers */
  layer: 1,
  /** Resulting images */
  image: 1,
  /** Global CLI configuration */
  globalConfig: 1,
} as const;

/**
 * All schema types that support versioning
 */
export type SchemaType = keyof typeof SCHEMA_VERSIONS;

/**
 * Get the current version for a schema type
 */
export function getCurrentVersion(schemaType: SchemaType): number {
  return SCHEMA_VERSIONS[schemaType];
}

/**
 * Check if a schema version is current
 */
export function isCurrentVersion(
  schemaType: SchemaType,
  version: number
): boolean {
  return version === SCHEMA_VERSIONS[schemaType];
}
