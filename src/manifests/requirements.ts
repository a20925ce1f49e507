/**
 * Requirements Manifest Parser
 *
 * Parses requirements-style dependency manifests: one requirement per line,
 * `name[extras] <op> version[, <op> version][; marker]`. Comments, blank
 * lines and backslash continuations are handled; option lines such as
 * `-r other.txt` or `--index-url` are rejected.
 *
 * @module manifests/requirements
 */

import * as fs from 'node:fs/promises';
import { ManifestError } from '../errors/index.js';
import {
  VERSION_OPERATORS,
  formatConstraint,
  formatConstraints,
  type VersionConstraint,
  type VersionOperator,
} from './version.js';

// ============================================================================
// Types
// ============================================================================

export interface Requirement {
  /** Normalised package name */
  name: string;
  /** Name exactly as written */
  rawName: string;
  extras: string[];
  constraints: VersionConstraint[];
  /** Environment marker after ";", kept verbatim and not evaluated */
  marker: string | null;
  /** 1-based line where the requirement starts, 0 when not read from a file */
  line: number;
}

export interface RequirementsManifest {
  path: string;
  /** Raw bytes, hashed into the dependency stage's cache key */
  content: Buffer;
  requirements: Requirement[];
}

// ============================================================================
// Names
// ============================================================================

/**
 * Normalise a package name: lowercase, runs of "-", "_" and "." become "-".
 *
 * @example
 * normalizePackageName('Django_REST.framework'); // 'django-rest-framework'
 */
export function normalizePackageName(name: string): string {
  return name.trim().toLowerCase().replace(/[-_.]+/g, '-');
}

// ============================================================================
// Line Parsing
// ============================================================================

const NAME_PATTERN = /^([A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?)\s*(?:\[([^\]]*)\])?\s*(.*)$/;
const SPECIFIER_PATTERN = /^(===|==|!=|>=|<=|~=|>|<)\s*([A-Za-z0-9.*+!_-]+)$/;

function isVersionOperator(value: string): value is VersionOperator {
  return VERSION_OPERATORS.some((operator) => operator === value);
}

/**
 * Parse one logical requirement line (comments already removed).
 *
 * @throws ManifestError if the line is an option, a URL or malformed
 */
export function parseRequirementLine(text: string, manifestPath = '<inline>', line = 0): Requirement {
  const trimmed = text.trim();

  if (trimmed.startsWith('-')) {
    throw new ManifestError(manifestPath, `Options are not supported: ${trimmed}`, line || undefined);
  }
  if (/^[a-z+]+:\/\//i.test(trimmed) || trimmed.startsWith('.') || trimmed.startsWith('/')) {
    throw new ManifestError(
      manifestPath,
      `Only named requirements are supported: ${trimmed}`,
      line || undefined
    );
  }

  const semicolon = trimmed.indexOf(';');
  const body = semicolon === -1 ? trimmed : trimmed.slice(0, semicolon).trim();
  const marker = semicolon === -1 ? null : trimmed.slice(semicolon + 1).trim() || null;

  const match = NAME_PATTERN.exec(body);
  if (!match) {
    throw new ManifestError(manifestPath, `Invalid requirement: ${trimmed}`, line || undefined);
  }

  const [, rawName, extrasText, specifierText] = match;
  const extras = (extrasText ?? '')
    .split(',')
    .map((extra) => extra.trim().toLowerCase())
    .filter((extra) => extra.length > 0)
    .sort();

  const constraints: VersionConstraint[] = [];
  const specifiers = specifierText.replace(/^\((.*)\)$/, '$1').trim();
  if (specifiers.length > 0) {
    for (const part of specifiers.split(',')) {
      const spec = SPECIFIER_PATTERN.exec(part.trim());
      if (!spec || !isVersionOperator(spec[1])) {
        throw new ManifestError(
          manifestPath,
          `Invalid version specifier "${part.trim()}" for ${rawName}`,
          line || undefined
        );
      }
      constraints.push({ operator: spec[1], version: spec[2] });
    }
  }

  return {
    name: normalizePackageName(rawName),
    rawName,
    extras,
    constraints,
    marker,
    line,
  };
}

/**
 * Strip a trailing comment. "#" starts a comment at line start or after
 * whitespace.
 */
function stripComment(line: string): string {
  if (line.trimStart().startsWith('#')) {
    return '';
  }
  const index = line.search(/\s#/);
  return index === -1 ? line : line.slice(0, index);
}

/**
 * Parse manifest text into requirements, in file order.
 *
 * @example
 * parseRequirements('Django>=3.0,<3.1  # web\npsycopg2==2.8.5\n');
 * // [{ name: 'django', constraints: [>=3.0, <3.1], ... }, { name: 'psycopg2', ... }]
 */
export function parseRequirements(content: string, manifestPath = '<inline>'): Requirement[] {
  const lines = content.split(/\r?\n/);
  const requirements: Requirement[] = [];

  let pending = '';
  let startLine = 0;

  for (let i = 0; i < lines.length; i++) {
    const raw = lines[i];
    if (pending === '') {
      startLine = i + 1;
    }

    // Continuations join before comments are stripped
    if (raw.endsWith('\\')) {
      pending += raw.slice(0, -1) + ' ';
      continue;
    }

    const logical = stripComment(pending + raw).trim();
    pending = '';
    if (logical.length === 0) {
      continue;
    }
    requirements.push(parseRequirementLine(logical, manifestPath, startLine));
  }

  const tail = stripComment(pending).trim();
  if (tail.length > 0) {
    requirements.push(parseRequirementLine(tail, manifestPath, startLine));
  }

  return requirements;
}

// ============================================================================
// File Loading
// ============================================================================

/**
 * Read and parse a requirements file.
 *
 * @throws ManifestError if the file is missing, unreadable or malformed
 */
export async function readRequirementsFile(manifestPath: string): Promise<RequirementsManifest> {
  let content: Buffer;
  try {
    content = await fs.readFile(manifestPath);
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'ENOENT') {
      throw new ManifestError(manifestPath, `Dependency manifest not found: ${manifestPath}`);
    }
    if (code === 'EISDIR') {
      throw new ManifestError(manifestPath, `Dependency manifest is a directory: ${manifestPath}`);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ManifestError(manifestPath, `Cannot read dependency manifest ${manifestPath}: ${message}`);
  }

  return {
    path: manifestPath,
    content,
    requirements: parseRequirements(content.toString('utf-8'), manifestPath),
  };
}

// ============================================================================
// Merging
// ============================================================================

/**
 * Combine requirements by name. Repeated names merge their constraints and
 * extras, so listing a package twice is idempotent.
 *
 * @returns Map keyed by normalised name, in sorted name order
 */
export function mergeRequirements(requirements: readonly Requirement[]): Map<string, Requirement> {
  const merged = new Map<string, Requirement>();

  for (const requirement of requirements) {
    const existing = merged.get(requirement.name);
    if (!existing) {
      merged.set(requirement.name, {
        ...requirement,
        extras: [...requirement.extras],
        constraints: [...requirement.constraints],
      });
      continue;
    }
    existing.extras = Array.from(new Set([...existing.extras, ...requirement.extras])).sort();
    const seen = new Set(existing.constraints.map(formatConstraint));
    for (const constraint of requirement.constraints) {
      const key = formatConstraint(constraint);
      if (!seen.has(key)) {
        existing.constraints.push(constraint);
        seen.add(key);
      }
    }
  }

  return new Map(Array.from(merged.entries()).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

/**
 * Render a requirement back to manifest form ("django[bcrypt]<3.1,>=3.0").
 */
export function formatRequirement(requirement: Requirement): string {
  const extras = requirement.extras.length > 0 ? `[${requirement.extras.join(',')}]` : '';
  const marker = requirement.marker ? `; ${requirement.marker}` : '';
  return `${requirement.name}${extras}${formatConstraints(requirement.constraints)}${marker}`;
}
