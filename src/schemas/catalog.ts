/**
 * Package Catalog Schema
 *
 * The catalog is the offline index the catalog-backed resolvers read: which
 * base images exist and what they ship with, which OS packages can be
 * installed (with their dependencies and sizes), and which language packages
 * exist at which versions.
 *
 * Keys of `baseImages` are base identifiers without a digest pin. Keys of
 * `languagePackages` are normalised package names.
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from './versions.js';
import { EnvMapSchema, ImagePathSchema, Sha256Schema } from './common.js';

// ============================================================================
// Base Images
// ============================================================================

export const CatalogBaseImageSchema = z.object({
  /** Content digest of the published image */
  digest: Sha256Schema,

  /** Distribution name (e.g., "debian") */
  distribution: z.string().min(1),

  /** Distribution release codename (e.g., "buster") */
  release: z.string().min(1),

  /** Uncompressed size of the base layer */
  sizeBytes: z.number().int().nonnegative(),

  /** Directory the language installer writes packages into */
  languagePackageRoot: ImagePathSchema,

  /** OS packages preinstalled in the image (name → version) */
  systemPackages: z.record(z.string(), z.string()).default({}),

  /** Language packages preinstalled in the image (name → version) */
  languagePackages: z.record(z.string(), z.string()).default({}),

  /** Environment the image ships with */
  env: EnvMapSchema.default({}),
});

export type CatalogBaseImage = z.infer<typeof CatalogBaseImageSchema>;

// ============================================================================
// OS Packages
// ============================================================================

export const CatalogSystemPackageSchema = z.object({
  version: z.string().min(1),
  sizeBytes: z.number().int().nonnegative(),
  /** Hard dependencies, always installed */
  depends: z.array(z.string()).default([]),
  /** Installed only when recommends are enabled */
  recommends: z.array(z.string()).default([]),
  /** Asks configuration questions during install */
  prompts: z.boolean().default(false),
  /** False when the mirror cannot serve the archive */
  available: z.boolean().default(true),
});

export type CatalogSystemPackage = z.infer<typeof CatalogSystemPackageSchema>;

// ============================================================================
// Language Packages
// ============================================================================

export const CatalogLanguageReleaseSchema = z.object({
  /** Requirement lines this release depends on (e.g., "numpy>=1.17") */
  requires: z.array(z.string()).default([]),
  sizeBytes: z.number().int().nonnegative().default(0),
});

export type CatalogLanguageRelease = z.infer<typeof CatalogLanguageReleaseSchema>;

export const CatalogLanguagePackageSchema = z.object({
  versions: z.record(z.string(), CatalogLanguageReleaseSchema),
});

export type CatalogLanguagePackage = z.infer<typeof CatalogLanguagePackageSchema>;

// ============================================================================
// Catalog
// ============================================================================

export const CatalogSchema = z.object({
  schemaVersion: z.number().int().positive().default(SCHEMA_VERSIONS.catalog),
  baseImages: z.record(z.string(), CatalogBaseImageSchema).default({}),
  systemPackages: z.record(z.string(), CatalogSystemPackageSchema).default({}),
  languagePackages: z.record(z.string(), CatalogLanguagePackageSchema).default({}),
});

export type Catalog = z.infer<typeof CatalogSchema>;
export type CatalogInput = z.input<typeof CatalogSchema>;
