/**
 * Dockerfile Rendering
 *
 * Renders a recipe as the Dockerfile that performs the same five stages,
 * instruction groups in stage order. The build context is the recipe
 * directory, so the manifest and the source root are copied by their
 * recipe-relative paths.
 *
 * @module dockerfile/render
 */

import * as path from 'node:path';
import type { Profile } from '../schemas/common.js';
import { resolveEnvAssignments, type Recipe, type SystemPackageRequest } from '../schemas/recipe.js';
import { normalizeSystemPackages } from '../manifests/system.js';
import { RecipeError } from '../errors/index.js';

export interface RenderOptions {
  profile?: Profile;
  /** Forces DEBIAN_FRONTEND=noninteractive */
  unattended?: boolean;
}

const SAFE_VALUE = /^[A-Za-z0-9_./:@+,=-]+$/;

/**
 * Quote an ENV or ARG value when it holds anything beyond plain characters.
 *
 * @example
 * quoteValue('1');          // '1'
 * quoteValue('a b');        // '"a b"'
 * quoteValue('$HOME/bin');  // '"\\$HOME/bin"'
 */
export function quoteValue(value: string): string {
  if (SAFE_VALUE.test(value)) {
    return value;
  }
  return `"${value.replace(/[\\"$]/g, '\\$&')}"`;
}

function continued(lines: string[], indent = '    '): string {
  return lines.map((line, i) => (i === 0 ? line : `${indent}${line}`)).join(' \\\n');
}

function formatPackage(pkg: SystemPackageRequest): string {
  return pkg.version ? `${pkg.name}=${pkg.version}` : pkg.name;
}

/**
 * Path of a recipe-relative file or directory inside the build context.
 *
 * @throws RecipeError when the path leaves the recipe directory
 */
function contextPath(field: string, recipeRelative: string): string {
  const posix = recipeRelative.split(path.sep).join('/');
  const normalized = path.posix.normalize(posix).replace(/\/+$/, '');
  if (path.posix.isAbsolute(posix) || normalized === '..' || normalized.startsWith('../')) {
    throw new RecipeError(`${field} must stay inside the recipe directory to be copied: ${recipeRelative}`);
  }
  return normalized || '.';
}

function withTrailingSlash(dir: string): string {
  return dir.endsWith('/') ? dir : `${dir}/`;
}

// ============================================================================
// Stage Sections
// ============================================================================

function renderBase(recipe: Recipe, frontend: string): string[] {
  const lines = [`FROM ${recipe.base} AS ${recipe.name}`, '', `ARG DEBIAN_FRONTEND=${frontend}`];
  for (const [name, value] of Object.entries(recipe.buildArgs).sort(([a], [b]) => a.localeCompare(b))) {
    lines.push(`ARG ${name}=${quoteValue(value)}`);
  }
  return lines;
}

function renderSystemPackages(recipe: Recipe, profile: Profile): string[] {
  const { packages } = normalizeSystemPackages(recipe.systemPackages.packages, profile);
  if (packages.length === 0) {
    return [];
  }

  const install = recipe.systemPackages.installRecommends
    ? 'apt-get update && apt-get install -y'
    : 'apt-get update && apt-get install -y --no-install-recommends';

  return [
    `RUN ${continued([install, ...packages.map(formatPackage)])} \\\n && rm -rf /var/lib/apt/lists/* /var/cache/apt/archives/*.deb`,
  ];
}

function renderDependencies(recipe: Recipe): string[] {
  const manifest = contextPath('dependencies.manifest', recipe.dependencies.manifest);
  const workdir = withTrailingSlash(recipe.source.workdir);
  return [
    `WORKDIR ${recipe.source.workdir}`,
    `COPY ${manifest} ${workdir}`,
    `RUN pip install --no-cache-dir -r ${path.posix.basename(manifest)}`,
  ];
}

function renderSource(recipe: Recipe): string[] {
  const root = contextPath('source.root', recipe.source.root);
  return [`COPY ${root === '.' ? root : withTrailingSlash(root)} ${withTrailingSlash(recipe.source.workdir)}`];
}

function renderRuntimeConfig(recipe: Recipe): string[] {
  const env = Object.entries(resolveEnvAssignments(recipe.env)).sort(([a], [b]) => a.localeCompare(b));
  if (env.length === 0) {
    return [];
  }
  return [`ENV ${continued(env.map(([name, value]) => `${name}=${quoteValue(value)}`))}`];
}

// ============================================================================
// Rendering
// ============================================================================

/**
 * Render the Dockerfile equivalent of a recipe.
 *
 * @throws RecipeError when an OS package is pinned to two versions, or
 *   when the manifest or source root lies outside the recipe directory
 *
 * @example
 * ```typescript
 * process.stdout.write(renderDockerfile(recipe, { profile: 'production' }));
 * ```
 */
export function renderDockerfile(recipe: Recipe, options: RenderOptions = {}): string {
  const profile = options.profile ?? 'production';
  const frontend = (options.unattended ?? true) ? 'noninteractive' : recipe.frontend;

  const sections = [
    [`# ${recipe.name}: rendered by image-provisioner`],
    renderBase(recipe, frontend),
    renderSystemPackages(recipe, profile),
    renderDependencies(recipe),
    renderSource(recipe),
    renderRuntimeConfig(recipe),
  ].filter((section) => section.length > 0);

  return `${sections.map((section) => section.join('\n')).join('\n\n')}\n`;
}

/**
 * Files the build context should not send, from the recipe's ignore list.
 */
export function renderDockerignore(recipe: Recipe): string {
  return `${[...new Set(recipe.source.ignore)].sort().map((entry) => `**/${entry}`).join('\n')}\n`;
}
