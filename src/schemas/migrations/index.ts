/**
 * Schema Migration Framework
 *
 * Lazy migration on read: when loading a document with an older schema
 * version, run the migration chain to bring it to the current version, then
 * validate it against the current schema.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { ZodType, ZodTypeDef } from 'zod';
import { LayerIOError } from '../../errors/index.js';
import { SCHEMA_VERSIONS, type SchemaType } from '../versions.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Takes data at version N and returns data at version N+1
 */
export type Migration = (data: Record<string, unknown>) => Record<string, unknown>;

/**
 * Key format: "schemaType:fromVersion:toVersion"
 */
type MigrationKey = `${SchemaType}:${number}:${number}`;

/**
 * Any zod schema whose output is T, whatever its input type.
 */
export type OutputSchema<T> = ZodType<T, ZodTypeDef, unknown>;

// ============================================================================
// Migration Registry
// ============================================================================

/**
 * Register migrations here when making breaking schema changes.
 *
 * @example
 * // If the build record v2 adds a required "host" field:
 * registerMigration('build', 1, 2, (data) => ({ ...data, host: 'unknown' }));
 */
const migrations: Map<MigrationKey, Migration> = new Map();

// ============================================================================
// Core Functions
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Extract schema version from data, defaulting to 1 if not present
 */
function extractSchemaVersion(data: unknown): number {
  if (!isRecord(data)) {
    return 1;
  }
  const version = data.schemaVersion;
  if (typeof version === 'number' && Number.isInteger(version) && version > 0) {
    return version;
  }
  return 1;
}

/**
 * Check if data is older than the current version of its schema.
 */
export function needsMigration(data: unknown, schemaType: SchemaType): boolean {
  return extractSchemaVersion(data) < SCHEMA_VERSIONS[schemaType];
}

/**
 * Migrate data from its version to current.
 *
 * Steps without a registered migration are treated as forward-compatible
 * (new optional fields only).
 */
export function migrateSchema(data: unknown, schemaType: SchemaType): unknown {
  if (!isRecord(data)) {
    return data;
  }

  const current = SCHEMA_VERSIONS[schemaType];
  let version = extractSchemaVersion(data);
  let migrated = data;

  while (version < current) {
    const migration = migrations.get(`${schemaType}:${version}:${version + 1}`);
    if (migration) {
      migrated = migration(migrated);
    }
    version++;
  }

  return { ...migrated, schemaVersion: Math.max(current, extractSchemaVersion(data)) };
}

/**
 * Register a new migration
 *
 * @throws Error if toVersion is not fromVersion + 1 or the step is taken
 */
export function registerMigration(
  schemaType: SchemaType,
  fromVersion: number,
  toVersion: number,
  migration: Migration
): void {
  if (toVersion !== fromVersion + 1) {
    throw new Error(
      `Migration must increment version by 1. Got ${fromVersion} -> ${toVersion}`
    );
  }

  const key: MigrationKey = `${schemaType}:${fromVersion}:${toVersion}`;
  if (migrations.has(key)) {
    throw new Error(`Migration already registered for ${key}`);
  }
  migrations.set(key, migration);
}

export function hasMigration(
  schemaType: SchemaType,
  fromVersion: number,
  toVersion: number
): boolean {
  return migrations.has(`${schemaType}:${fromVersion}:${toVersion}`);
}

// ============================================================================
// Loaders
// ============================================================================

/**
 * Parse JSON, migrate it and validate it against the current schema.
 *
 * @example
 * const record = loadAndMigrate(content, 'build', BuildRecordSchema);
 */
export function loadAndMigrate<T>(
  json: string,
  schemaType: SchemaType,
  schema: OutputSchema<T>
): T {
  const data: unknown = JSON.parse(json);
  return schema.parse(migrateSchema(data, schemaType));
}

/**
 * Load a JSON file, migrate and validate it, and atomically write it back
 * when a migration took place.
 */
export async function loadMigrateAndSave<T>(
  filePath: string,
  schemaType: SchemaType,
  schema: OutputSchema<T>
): Promise<{ data: T; migrated: boolean }> {
  const content = await fs.readFile(filePath, 'utf-8');
  const raw: unknown = JSON.parse(content);
  const wasMigrated = needsMigration(raw, schemaType);
  const data = schema.parse(migrateSchema(raw, schemaType));

  if (wasMigrated) {
    await atomicWriteJson(filePath, data);
  }

  return { data, migrated: wasMigrated };
}

// ============================================================================
// Atomic Write
// ============================================================================

/**
 * Atomically write JSON data to a file (temp file + rename).
 *
 * If the process dies between write and rename, an orphaned *.tmp.* file
 * may remain next to the target.
 *
 * @example
 * await atomicWriteJson('/path/to/build.json', { schemaVersion: 1, ... });
 */
export async function atomicWriteJson(filePath: string, data: unknown): Promise<void> {
  const tempPath = `${filePath}.tmp.${process.pid}.${Date.now()}`;
  const json = JSON.stringify(data, null, 2);

  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tempPath, json, 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    // A failed cleanup (ENOTDIR, EACCES) must not replace the write error
    let leftover = '';
    try {
      await fs.rm(tempPath, { force: true });
    } catch {
      leftover = ` (temp file may remain at ${tempPath})`;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new LayerIOError(filePath, `Atomic write failed for ${filePath}: ${message}${leftover}`, {
      cause: error,
    });
  }
}
