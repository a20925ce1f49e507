/**
 * Catalog-backed System Package Manager
 *
 * Resolves the requested OS packages plus their hard dependencies (and
 * recommends, when enabled) against the catalog, in sorted order so the
 * installed set never depends on how the list was written.
 *
 * @module resolver/system-packages
 */

import { RecipeError, ResolutionError, TransientInfrastructureError } from '../errors/index.js';
import type { Catalog } from '../schemas/catalog.js';
import type {
  SystemInstallRequest,
  SystemInstallResult,
  SystemPackageManager,
} from './types.js';

function sortedRecord(entries: Iterable<[string, string]>): Record<string, string> {
  return Object.fromEntries(Array.from(entries).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

export class CatalogSystemPackageManager implements SystemPackageManager {
  constructor(private readonly catalog: Catalog) {}

  async install(request: SystemInstallRequest): Promise<SystemInstallResult> {
    const pins = new Map<string, string>();
    for (const pkg of request.packages) {
      if (pkg.version) {
        pins.set(pkg.name, pkg.version);
      }
    }

    const selected = new Map<string, string>();
    const queue = request.packages.map((pkg) => pkg.name).sort();

    // Breadth-first over dependencies
    while (queue.length > 0) {
      const name = queue.shift();
      if (name === undefined || selected.has(name)) {
        continue;
      }

      const present = request.installed[name];
      const pinned = pins.get(name);
      if (present !== undefined && (pinned === undefined || pinned === present)) {
        selected.set(name, present);
        continue;
      }

      const entry = this.catalog.systemPackages[name];
      if (!entry) {
        throw new ResolutionError(name, `Unable to locate package ${name}`);
      }

      if (pinned && pinned !== entry.version) {
        throw new ResolutionError(
          name,
          `Version '${pinned}' for '${name}' was not found (available: ${entry.version})`
        );
      }

      selected.set(name, entry.version);

      const next = [...entry.depends, ...(request.installRecommends ? entry.recommends : [])];
      queue.push(...next.filter((dep) => !selected.has(dep)).sort());
    }

    const installed = new Map<string, string>();
    let sizeBytes = 0;
    const archives: string[] = [];

    for (const [name, version] of Array.from(selected.entries()).sort(([a], [b]) => (a < b ? -1 : 1))) {
      if (request.installed[name] === version) {
        continue;
      }
      const entry = this.catalog.systemPackages[name];

      if (entry.prompts && request.frontend !== 'noninteractive') {
        throw new RecipeError(
          `Package ${name} asks configuration questions and the ${request.frontend} frontend has no one to answer them`
        );
      }
      if (!entry.available) {
        throw new TransientInfrastructureError(
          `Failed to fetch ${name}_${version}.deb from the ${request.release} mirror`
        );
      }

      installed.set(name, version);
      sizeBytes += entry.sizeBytes;
      archives.push(`${name}_${version}.deb`);
    }

    return { installed: sortedRecord(installed), sizeBytes, archives };
  }
}
