/**
 * Provisioning Recipe Schema
 *
 * A recipe declares everything the five provisioning stages consume: the
 * pinned base image, the OS package list, the dependency manifest, the source
 * tree and working directory, and the runtime environment.
 *
 * Recipes are JSON files. Relative paths inside a recipe resolve against the
 * directory that contains the recipe.
 *
 * @example
 * ```json
 * {
 *   "name": "core",
 *   "base": "python:3.8.3-slim-buster",
 *   "systemPackages": { "packages": ["binutils", "gdal-bin", "locales"] },
 *   "dependencies": { "manifest": "requirements.txt" },
 *   "source": { "root": ".", "workdir": "/code" },
 *   "env": [{ "name": "PYTHONUNBUFFERED", "value": "1" }]
 * }
 * ```
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from './versions.js';
import {
  EnvNameSchema,
  FrontendSchema,
  ImagePathSchema,
} from './common.js';

// ============================================================================
// Base Image Identifier
// ============================================================================

/**
 * `repository:tag` with an optional `@sha256:<digest>` pin.
 * The tag splits into version and variant at the first hyphen:
 * "python:3.8.3-slim-buster" → version "3.8.3", variant "slim-buster".
 */
export const BASE_IDENTIFIER_PATTERN =
  /^([a-z0-9]+(?:[._/-][a-z0-9]+)*):([A-Za-z0-9_][A-Za-z0-9_.-]{0,127})(?:@sha256:([a-f0-9]{64}))?$/;

export const BaseIdentifierSchema = z
  .string()
  .regex(
    BASE_IDENTIFIER_PATTERN,
    'Base identifier must look like "repository:version-variant" (e.g., "python:3.8.3-slim-buster")'
  );

/**
 * Parsed form of a base identifier.
 */
export interface BaseIdentifier {
  /** Identifier without the digest pin (e.g., "python:3.8.3-slim-buster") */
  reference: string;
  repository: string;
  tag: string;
  version: string;
  /** Variant after the first hyphen of the tag, or null */
  variant: string | null;
  /** Digest pin, when the identifier carries one */
  digest: string | null;
}

/**
 * Parse a base identifier.
 *
 * @throws Error if the identifier does not match BASE_IDENTIFIER_PATTERN
 *
 * @example
 * parseBaseIdentifier('python:3.8.3-slim-buster');
 * // { reference: 'python:3.8.3-slim-buster', repository: 'python', tag: '3.8.3-slim-buster',
 * //   version: '3.8.3', variant: 'slim-buster', digest: null }
 */
export function parseBaseIdentifier(identifier: string): BaseIdentifier {
  const match = BASE_IDENTIFIER_PATTERN.exec(identifier);
  if (!match) {
    throw new Error(`Invalid base identifier: ${identifier}`);
  }

  const [, repository, tag, digest] = match;
  const hyphen = tag.indexOf('-');

  return {
    reference: `${repository}:${tag}`,
    repository,
    tag,
    version: hyphen === -1 ? tag : tag.slice(0, hyphen),
    variant: hyphen === -1 ? null : tag.slice(hyphen + 1),
    digest: digest ?? null,
  };
}

// ============================================================================
// System Packages
// ============================================================================

/**
 * Debian-style package names.
 */
export const SYSTEM_PACKAGE_NAME_PATTERN = /^[a-z0-9][a-z0-9+.-]+$/;

const SystemPackageVersionSchema = z
  .string()
  .regex(/^[A-Za-z0-9.+~:-]+$/, 'Invalid package version');

/**
 * Normalised OS package entry.
 */
export interface SystemPackageRequest {
  name: string;
  /** Exact version pin, when given */
  version?: string;
  /** Installed only under the development profile */
  development: boolean;
}

const SystemPackageObjectSchema = z.object({
  name: z.string().regex(SYSTEM_PACKAGE_NAME_PATTERN, 'Invalid OS package name'),
  version: SystemPackageVersionSchema.optional(),
  /** Installed only under the development profile */
  development: z.boolean().default(false),
  /** Free-form note kept for the rendered Dockerfile */
  comment: z.string().optional(),
});

/**
 * An OS package is either a string ("binutils", "locales=2.28-10") or an
 * object with a development flag and an optional comment.
 */
export const SystemPackageEntrySchema = z.union([
  z
    .string()
    .regex(
      /^[a-z0-9][a-z0-9+.-]+(=[A-Za-z0-9.+~:-]+)?$/,
      'OS packages must be "name" or "name=version"'
    )
    .transform((value) => {
      const [name, version] = value.split('=');
      return { name, version, development: false, comment: undefined };
    }),
  SystemPackageObjectSchema,
]);

export type SystemPackageEntry = z.infer<typeof SystemPackageEntrySchema>;

export const SystemPackagesSchema = z.object({
  /** Install recommended packages as well (apt's default; off here) */
  installRecommends: z.boolean().default(false),
  packages: z.array(SystemPackageEntrySchema).default([]),
});

// ============================================================================
// Environment Assignments
// ============================================================================

export const EnvAssignmentSchema = z.object({
  name: EnvNameSchema,
  value: z.string(),
});

export type EnvAssignment = z.infer<typeof EnvAssignmentSchema>;

/**
 * Environment assignments as an ordered list (duplicates allowed, last wins)
 * or as an object (already unique).
 */
export const EnvAssignmentsSchema = z.union([
  z.array(EnvAssignmentSchema),
  z.record(EnvNameSchema, z.string()).transform((record) =>
    Object.entries(record).map(([name, value]) => ({ name, value }))
  ),
]);

// ============================================================================
// Source Tree
// ============================================================================

/**
 * Path segments never layered into the image.
 */
export const DEFAULT_SOURCE_IGNORE = ['.git', 'node_modules', '__pycache__', '.provisioner'];

export const SourceSchema = z.object({
  /** Source root, relative to the recipe file */
  root: z.string().min(1).default('.'),
  /** Absolute working directory inside the image */
  workdir: ImagePathSchema,
  /** Path segments to leave out of the layer */
  ignore: z.array(z.string().min(1)).default(DEFAULT_SOURCE_IGNORE),
});

// ============================================================================
// Recipe Schema
// ============================================================================

export const RECIPE_NAME_PATTERN = /^[a-z0-9][a-z0-9_.-]*$/;

export const RecipeSchema = z.object({
  /** Schema version for forward compatibility */
  schemaVersion: z.number().int().positive().default(SCHEMA_VERSIONS.recipe),

  /** Build target name (e.g., "core") */
  name: z.string().regex(RECIPE_NAME_PATTERN, 'Recipe name must be lowercase letters, digits, ".", "_" or "-"'),

  /** Pinned base image identifier */
  base: BaseIdentifierSchema,

  /** Package catalog used by the resolvers, relative to the recipe */
  catalog: z.string().min(1).optional(),

  /** Package manager frontend. Unattended builds force "noninteractive". */
  frontend: FrontendSchema.default('noninteractive'),

  /** Build-time only variables; never part of the resulting environment */
  buildArgs: z.record(EnvNameSchema, z.string()).default({}),

  systemPackages: SystemPackagesSchema.default({}),

  dependencies: z.object({
    /** Requirements-style manifest, relative to the recipe */
    manifest: z.string().min(1),
  }),

  source: SourceSchema,

  /** Runtime environment assignments, applied in order */
  env: EnvAssignmentsSchema.default([]),
});

export type Recipe = z.infer<typeof RecipeSchema>;
export type RecipeInput = z.input<typeof RecipeSchema>;

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Collapse ordered assignments into a mapping. Later assignments of the same
 * name replace earlier ones.
 */
export function resolveEnvAssignments(assignments: EnvAssignment[]): Record<string, string> {
  const env = new Map<string, string>();
  for (const { name, value } of assignments) {
    env.set(name, value);
  }
  return Object.fromEntries(env);
}
