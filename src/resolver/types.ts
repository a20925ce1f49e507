/**
 * Resolver Ports
 *
 * The stages never talk to a registry, mirror or package index directly.
 * They go through these three interfaces, so the catalog-backed resolvers
 * can be swapped for real backends or test doubles.
 *
 * @module resolver/types
 */

import type { Frontend } from '../schemas/common.js';
import type { BaseIdentifier, SystemPackageRequest } from '../schemas/recipe.js';
import type { BaseRef } from '../schemas/image.js';
import type { Requirement } from '../manifests/requirements.js';

// ============================================================================
// Base Images
// ============================================================================

export interface ResolvedBaseImage {
  base: BaseRef;
  sizeBytes: number;
  systemPackages: Record<string, string>;
  languagePackages: Record<string, string>;
  env: Record<string, string>;
}

export interface BaseImageRegistry {
  /**
   * @throws ResolutionError when the identifier is unknown or the digest pin
   *   does not match
   */
  resolve(identifier: BaseIdentifier): Promise<ResolvedBaseImage>;
}

// ============================================================================
// OS Packages
// ============================================================================

export interface SystemInstallRequest {
  /** Normalised, sorted package list */
  packages: SystemPackageRequest[];
  /** Packages already present (name → version) */
  installed: Record<string, string>;
  installRecommends: boolean;
  frontend: Frontend;
  /** Distribution release the index is read for (e.g., "buster") */
  release: string;
}

export interface SystemInstallResult {
  /** Newly installed packages including transitive dependencies */
  installed: Record<string, string>;
  /** Bytes the installed packages occupy */
  sizeBytes: number;
  /** Archives fetched into the package cache ("name_version.deb") */
  archives: string[];
}

export interface SystemPackageManager {
  /**
   * @throws ResolutionError for unknown packages or version mismatches
   * @throws TransientInfrastructureError when an archive cannot be fetched
   */
  install(request: SystemInstallRequest): Promise<SystemInstallResult>;
}

// ============================================================================
// Language Dependencies
// ============================================================================

export interface DependencyInstallRequest {
  requirements: Requirement[];
  /** Packages already present (normalised name → version) */
  installed: Record<string, string>;
}

export interface DependencyInstallResult {
  /** Full resolved set: every requirement and its transitive dependencies */
  resolved: Record<string, string>;
  /** Packages whose version differs from what was installed before */
  installed: Record<string, string>;
  sizeBytes: number;
}

export interface DependencyInstaller {
  /**
   * @throws ResolutionError for unknown packages and unsatisfiable constraints
   */
  install(request: DependencyInstallRequest): Promise<DependencyInstallResult>;
}

// ============================================================================
// Bundle
// ============================================================================

/**
 * The three ports a build needs.
 */
export interface Resolvers {
  /** Digest of the package sources behind the three ports */
  catalogDigest: string;
  baseImages: BaseImageRegistry;
  systemPackages: SystemPackageManager;
  dependencies: DependencyInstaller;
}
