/**
 * Catalog-backed Dependency Installer
 *
 * Fixed-point resolution: each round picks, for every constrained name in
 * sorted order, the newest catalog version satisfying all constraints
 * collected so far, then recollects constraints from the top-level
 * requirements plus the requirements of the chosen versions. Resolution ends
 * when a round chooses exactly what the previous round chose.
 *
 * Constraints are collected into sets keyed by name, so neither manifest
 * order nor duplicate lines can change the outcome.
 *
 * A package already in the image is kept whenever its version satisfies the
 * constraints, whether or not the catalog lists it.
 *
 * @module resolver/dependencies
 */

import { ResolutionError } from '../errors/index.js';
import type { Catalog } from '../schemas/catalog.js';
import {
  parseRequirementLine,
  type Requirement,
} from '../manifests/requirements.js';
import {
  formatConstraint,
  formatConstraints,
  satisfiesAll,
  sortVersionsDescending,
  type VersionConstraint,
} from '../manifests/version.js';
import type {
  DependencyInstallRequest,
  DependencyInstallResult,
  DependencyInstaller,
} from './types.js';

/** Rounds after which resolution is reported as not converging */
export const MAX_RESOLUTION_ROUNDS = 50;

type ConstraintSet = Map<string, Map<string, VersionConstraint>>;

function addConstraints(target: ConstraintSet, name: string, constraints: readonly VersionConstraint[]): void {
  let entry = target.get(name);
  if (!entry) {
    entry = new Map();
    target.set(name, entry);
  }
  for (const constraint of constraints) {
    entry.set(formatConstraint(constraint), constraint);
  }
}

function sameChoice(a: Map<string, string>, b: Map<string, string>): boolean {
  if (a.size !== b.size) {
    return false;
  }
  for (const [name, version] of a) {
    if (b.get(name) !== version) {
      return false;
    }
  }
  return true;
}

export class CatalogDependencyInstaller implements DependencyInstaller {
  private readonly releaseRequirements = new Map<string, Requirement[]>();

  constructor(private readonly catalog: Catalog) {}

  /**
   * Resolve requirements to one version per package.
   *
   * @param installed - Packages already present (normalised name → version)
   * @throws ResolutionError for unknown packages, unsatisfiable constraints
   *   or a resolution that does not converge
   */
  resolve(requirements: readonly Requirement[], installed: Readonly<Record<string, string>> = {}): Map<string, string> {
    let chosen = new Map<string, string>();

    for (let round = 1; round <= MAX_RESOLUTION_ROUNDS; round++) {
      const constraints: ConstraintSet = new Map();
      for (const requirement of requirements) {
        addConstraints(constraints, requirement.name, requirement.constraints);
      }
      for (const [name, version] of chosen) {
        for (const dependency of this.requirementsOf(name, version)) {
          addConstraints(constraints, dependency.name, dependency.constraints);
        }
      }

      const next = new Map<string, string>();
      for (const name of Array.from(constraints.keys()).sort()) {
        next.set(name, this.pick(name, Array.from(constraints.get(name)?.values() ?? []), installed[name]));
      }

      if (sameChoice(chosen, next)) {
        return next;
      }
      chosen = next;
    }

    throw new ResolutionError(
      'dependencies',
      `Dependency resolution did not converge after ${MAX_RESOLUTION_ROUNDS} rounds`
    );
  }

  async install(request: DependencyInstallRequest): Promise<DependencyInstallResult> {
    const resolved = this.resolve(request.requirements, request.installed);

    const installed: Record<string, string> = {};
    let sizeBytes = 0;
    for (const [name, version] of resolved) {
      if (request.installed[name] === version) {
        continue;
      }
      installed[name] = version;
      sizeBytes += this.catalog.languagePackages[name].versions[version].sizeBytes;
    }

    return { resolved: Object.fromEntries(resolved), installed, sizeBytes };
  }

  private pick(name: string, constraints: VersionConstraint[], installedVersion: string | undefined): string {
    if (installedVersion !== undefined && satisfiesAll(installedVersion, constraints)) {
      return installedVersion;
    }

    const pkg = this.catalog.languagePackages[name];
    if (!pkg) {
      throw new ResolutionError(name, `No matching distribution found for ${name}`);
    }

    const versions = sortVersionsDescending(Object.keys(pkg.versions));
    const version = versions.find((candidate) => satisfiesAll(candidate, constraints));
    if (version === undefined) {
      throw new ResolutionError(
        name,
        `No version of ${name} satisfies ${formatConstraints(constraints)} (available: ${versions.join(', ')})`
      );
    }
    return version;
  }

  private requirementsOf(name: string, version: string): Requirement[] {
    const key = `${name}==${version}`;
    const cached = this.releaseRequirements.get(key);
    if (cached) {
      return cached;
    }
    const lines = this.catalog.languagePackages[name]?.versions[version]?.requires ?? [];
    const parsed = lines.map((line) => parseRequirementLine(line, `catalog:${key}`));
    this.releaseRequirements.set(key, parsed);
    return parsed;
  }
}
