/**
 * Common Zod Schemas - Shared types used across the pipeline
 */

import { z } from 'zod';

// ============================================
// ISO8601 Timestamp Schema
// ============================================

/**
 * ISO8601 timestamp string (e.g., "2024-01-15T10:30:00.000Z")
 */
export const ISO8601TimestampSchema = z.string().datetime({ message: 'Must be a valid ISO8601 timestamp' });

export type ISO8601Timestamp = z.infer<typeof ISO8601TimestampSchema>;

// ============================================
// Content Hashes
// ============================================

/**
 * Lowercase hex SHA-256 digest.
 */
export const Sha256Schema = z.string().regex(/^[a-f0-9]{64}$/, 'Must be a valid SHA-256 hash');

export type Sha256 = z.infer<typeof Sha256Schema>;

/**
 * Image identifier: "sha256:" followed by the snapshot digest.
 */
export const IMAGE_ID_PATTERN = /^sha256:[a-f0-9]{64}$/;

export const ImageIdSchema = z
  .string()
  .regex(IMAGE_ID_PATTERN, 'Image ID must be "sha256:" followed by 64 hex characters');

export type ImageId = z.infer<typeof ImageIdSchema>;

// ============================================
// Environment Variables
// ============================================

/**
 * POSIX-style environment variable name.
 */
export const ENV_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const EnvNameSchema = z
  .string()
  .regex(ENV_NAME_PATTERN, 'Environment variable names must match [A-Za-z_][A-Za-z0-9_]*')
  // zod drops this key when it parses a record, so a stored snapshot could not keep it
  .refine((name) => name !== '__proto__', 'Environment variable name __proto__ is reserved');

/**
 * Name to value mapping applied to every process in an environment.
 */
export const EnvMapSchema = z.record(EnvNameSchema, z.string());

export type EnvMap = z.infer<typeof EnvMapSchema>;

// ============================================
// Paths
// ============================================

/**
 * Absolute POSIX path inside an image (e.g., "/code").
 */
export const ImagePathSchema = z
  .string()
  .regex(/^\/[^\0]*$/, 'Image paths must be absolute POSIX paths')
  .refine((value) => !value.split('/').includes('..'), {
    message: 'Image paths must not contain ".." segments',
  });

// ============================================
// Enumerations
// ============================================

/**
 * Package selection profile.
 * - production: development-only OS packages are left out
 * - development: every listed OS package is installed
 */
export const ProfileSchema = z.enum(['production', 'development']);

export type Profile = z.infer<typeof ProfileSchema>;

/**
 * Package manager frontend. Only "noninteractive" never waits for input.
 */
export const FrontendSchema = z.enum(['noninteractive', 'readline', 'dialog', 'teletype']);

export type Frontend = z.infer<typeof FrontendSchema>;
