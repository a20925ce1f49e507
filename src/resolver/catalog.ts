/**
 * Package Catalog Loading
 *
 * Reads and validates catalog files. The built-in catalog ships with the
 * package and covers the slim Debian Python images and the geospatial stack.
 *
 * @module resolver/catalog
 */

import * as fs from 'node:fs/promises';
import { ConfigError } from '../errors/index.js';
import { CatalogSchema, type Catalog } from '../schemas/catalog.js';
import { normalizePackageName } from '../manifests/requirements.js';
import defaultCatalogData from '../../catalog/default.json';

/**
 * Validate raw catalog data. Language package names are normalised so
 * lookups match normalised requirement names.
 *
 * @throws ConfigError listing schema issues
 */
export function parseCatalog(data: unknown, source = '<inline>'): Catalog {
  const result = CatalogSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid package catalog ${source}:\n  - ${issues.join('\n  - ')}`);
  }

  const catalog = result.data;
  return {
    ...catalog,
    languagePackages: Object.fromEntries(
      Object.entries(catalog.languagePackages).map(([name, pkg]) => [normalizePackageName(name), pkg])
    ),
  };
}

/**
 * Load a catalog file.
 *
 * @throws ConfigError if the file is missing, not JSON or invalid
 */
export async function loadCatalog(filePath: string): Promise<Catalog> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new ConfigError(`Package catalog not found: ${filePath}`);
    }
    throw error;
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch {
    throw new ConfigError(`Invalid JSON in package catalog: ${filePath}`);
  }
  return parseCatalog(data, filePath);
}

let defaultCatalog: Catalog | undefined;

/**
 * The catalog bundled with the package.
 */
export function getDefaultCatalog(): Catalog {
  defaultCatalog ??= parseCatalog(defaultCatalogData, 'default catalog');
  return defaultCatalog;
}
