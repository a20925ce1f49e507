/**
 * Catalog-backed Base Image Registry
 *
 * @module resolver/base-images
 */

import { ResolutionError } from '../errors/index.js';
import type { Catalog } from '../schemas/catalog.js';
import type { BaseIdentifier } from '../schemas/recipe.js';
import type { BaseImageRegistry, ResolvedBaseImage } from './types.js';

export class CatalogBaseImageRegistry implements BaseImageRegistry {
  constructor(private readonly catalog: Catalog) {}

  async resolve(identifier: BaseIdentifier): Promise<ResolvedBaseImage> {
    const entry = this.catalog.baseImages[identifier.reference];
    if (!entry) {
      throw new ResolutionError(
        identifier.reference,
        `Base image not found: ${identifier.reference}`
      );
    }

    if (identifier.digest && identifier.digest !== entry.digest) {
      throw new ResolutionError(
        identifier.reference,
        `Digest mismatch for ${identifier.reference}: pinned sha256:${identifier.digest}, registry has sha256:${entry.digest}`
      );
    }

    return {
      base: {
        identifier: identifier.reference,
        repository: identifier.repository,
        version: identifier.version,
        variant: identifier.variant,
        distribution: entry.distribution,
        release: entry.release,
        digest: entry.digest,
        languagePackageRoot: entry.languagePackageRoot,
      },
      sizeBytes: entry.sizeBytes,
      systemPackages: { ...entry.systemPackages },
      languagePackages: { ...entry.languagePackages },
      env: { ...entry.env },
    };
  }
}
