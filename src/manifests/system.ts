/**
 * OS Package List Normalisation
 *
 * Turns the recipe's OS package entries into the exact, ordered list the
 * system package stage installs: duplicates merged, development-only
 * entries applied per profile, sorted by name.
 *
 * @module manifests/system
 */

import { RecipeError } from '../errors/index.js';
import type { Profile } from '../schemas/common.js';
import type { SystemPackageEntry, SystemPackageRequest } from '../schemas/recipe.js';

export interface NormalizedSystemPackages {
  /** Packages to install, sorted by name */
  packages: SystemPackageRequest[];
  /** Development-only packages left out under the production profile */
  excluded: string[];
}

/**
 * Normalise an OS package list.
 *
 * - the same name listed twice is one package
 * - a pinned entry wins over an unpinned one; two different pins conflict
 * - a package is development-only when every entry for it is
 *
 * @throws RecipeError when one package is pinned to two different versions
 *
 * @example
 * normalizeSystemPackages(['locales', 'binutils', 'locales'], 'production');
 * // { packages: [{ name: 'binutils', ... }, { name: 'locales', ... }], excluded: [] }
 */
export function normalizeSystemPackages(
  entries: readonly (SystemPackageEntry | string)[],
  profile: Profile
): NormalizedSystemPackages {
  const byName = new Map<string, SystemPackageRequest>();
  const conflicts: string[] = [];

  for (const entry of entries) {
    const request = toRequest(entry);
    const existing = byName.get(request.name);
    if (!existing) {
      byName.set(request.name, request);
      continue;
    }

    if (existing.version && request.version && existing.version !== request.version) {
      conflicts.push(`${request.name}: ${existing.version} and ${request.version}`);
      continue;
    }
    byName.set(request.name, {
      name: request.name,
      version: existing.version ?? request.version,
      development: existing.development && request.development,
    });
  }

  if (conflicts.length > 0) {
    throw new RecipeError('Conflicting OS package versions', conflicts);
  }

  const sorted = Array.from(byName.values()).sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  const packages = sorted.filter((pkg) => profile === 'development' || !pkg.development);
  const excluded = sorted.filter((pkg) => profile === 'production' && pkg.development).map((pkg) => pkg.name);

  return { packages, excluded };
}

function toRequest(entry: SystemPackageEntry | string): SystemPackageRequest {
  if (typeof entry === 'string') {
    const [name, version] = entry.split('=');
    return version ? { name, version, development: false } : { name, development: false };
  }
  return entry.version
    ? { name: entry.name, version: entry.version, development: entry.development }
    : { name: entry.name, development: entry.development };
}

/**
 * Render a normalised list as "name" / "name=version" strings.
 */
export function formatSystemPackages(packages: readonly SystemPackageRequest[]): string[] {
  return packages.map((pkg) => (pkg.version ? `${pkg.name}=${pkg.version}` : pkg.name));
}
