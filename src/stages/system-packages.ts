/**
 * System Package Stage (Stage 01)
 *
 * Installs the recipe's OS packages and their dependencies, then prunes the
 * package index and downloaded archives in the same stage, so the committed
 * layer holds the installed files only.
 *
 * Declared inputs: the normalised package list (deduplicated, sorted,
 * profile applied), the frontend and the recommends flag.
 *
 * @module stages/system-packages
 */

import { ProvisionError } from '../errors/index.js';
import { normalizeSystemPackages, formatSystemPackages } from '../manifests/system.js';
import { sortRecord } from '../image/snapshot.js';
import type { Stage } from '../pipeline/types.js';

/** Locations the package manager writes during install and the stage removes */
export const PACKAGE_CACHE_PREFIXES = ['/var/lib/apt/lists/', '/var/cache/apt/'] as const;

export function isPackageCachePath(imagePath: string): boolean {
  return PACKAGE_CACHE_PREFIXES.some((prefix) => imagePath.startsWith(prefix));
}

export const systemPackagesStage: Stage = {
  id: '01_system_packages',
  name: 'system_packages',
  number: 1,

  async prepare(context) {
    const { recipe, profile, unattended, logger } = context;
    const { packages, excluded } = normalizeSystemPackages(recipe.systemPackages.packages, profile);
    const frontend = unattended ? 'noninteractive' : recipe.frontend;
    const installRecommends = recipe.systemPackages.installRecommends;

    if (excluded.length > 0) {
      logger?.info(`Leaving out development-only packages under ${profile}: ${excluded.join(', ')}`);
    }

    return {
      inputs: { packages: formatSystemPackages(packages), frontend, installRecommends },

      async apply(snapshot) {
        if (packages.length === 0) {
          return { snapshot, layer: { sizeBytes: 0, pathsAdded: [], pathsPruned: [] } };
        }
        if (!snapshot.base) {
          throw new ProvisionError('OS packages cannot be installed before a base image is selected');
        }

        const { release } = snapshot.base;
        const result = await context.resolvers.systemPackages.install({
          packages,
          installed: snapshot.systemPackages,
          installRecommends,
          frontend,
          release,
        });

        const names = Object.keys(result.installed);
        logger?.info(`Installed ${names.length} OS packages: ${names.join(', ') || '(none)'}`);

        return {
          snapshot: {
            ...snapshot,
            systemPackages: sortRecord({ ...snapshot.systemPackages, ...result.installed }),
          },
          layer: {
            sizeBytes: result.sizeBytes,
            pathsAdded: names.map((name) => `/var/lib/dpkg/info/${name}.list`),
            pathsPruned: [
              `/var/lib/apt/lists/deb.debian.org_debian_dists_${release}_InRelease`,
              `/var/lib/apt/lists/deb.debian.org_debian_dists_${release}_main_Packages`,
              ...[...result.archives].sort().map((archive) => `/var/cache/apt/archives/${archive}`),
            ],
          },
        };
      },
    };
  },
};
