/**
 * Resolver Module
 *
 * Ports the stages resolve through, and their catalog-backed implementations.
 *
 * @module resolver
 */

import type { Catalog } from '../schemas/catalog.js';
import { CatalogBaseImageRegistry } from './base-images.js';
import { CatalogSystemPackageManager } from './system-packages.js';
import { CatalogDependencyInstaller } from './dependencies.js';
import type { Resolvers } from './types.js';
import { digestOf } from '../image/digest.js';

export type {
  ResolvedBaseImage,
  BaseImageRegistry,
  SystemInstallRequest,
  SystemInstallResult,
  SystemPackageManager,
  DependencyInstallRequest,
  DependencyInstallResult,
  DependencyInstaller,
  Resolvers,
} from './types.js';

export { parseCatalog, loadCatalog, getDefaultCatalog } from './catalog.js';
export { CatalogBaseImageRegistry } from './base-images.js';
export { CatalogSystemPackageManager } from './system-packages.js';
export { CatalogDependencyInstaller, MAX_RESOLUTION_ROUNDS } from './dependencies.js';

/**
 * Build all three resolvers over one catalog.
 */
export function createCatalogResolvers(catalog: Catalog): Resolvers {
  return {
    catalogDigest: digestOf(catalog),
    baseImages: new CatalogBaseImageRegistry(catalog),
    systemPackages: new CatalogSystemPackageManager(catalog),
    dependencies: new CatalogDependencyInstaller(catalog),
  };
}
