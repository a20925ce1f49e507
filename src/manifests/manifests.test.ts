/**
 * Tests for Package Manifests
 *
 * - Version comparison and constraint operators
 * - Requirements parsing (comments, continuations, extras, markers, options)
 * - Requirement merging
 * - OS package list normalisation
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import {
  compareVersions,
  sortVersionsDescending,
  satisfiesConstraint,
  satisfiesAll,
  formatConstraints,
} from './version.js';
import {
  normalizePackageName,
  parseRequirements,
  parseRequirementLine,
  readRequirementsFile,
  mergeRequirements,
  formatRequirement,
} from './requirements.js';
import { normalizeSystemPackages, formatSystemPackages } from './system.js';
import { ManifestError, RecipeError } from '../errors/index.js';

// ============================================================================
// Versions
// ============================================================================

describe('compareVersions', () => {
  it('compares numerically per segment', () => {
    expect(compareVersions('1.10', '1.9')).toBe(1);
    expect(compareVersions('1.2.3', '1.2.4')).toBe(-1);
  });

  it('treats missing segments as zero', () => {
    expect(compareVersions('2.0', '2.0.0')).toBe(0);
    expect(compareVersions('3', '3.0.1')).toBe(-1);
  });

  it('sorts pre-releases before the final release', () => {
    expect(compareVersions('2.2rc1', '2.2')).toBe(-1);
    expect(compareVersions('2.2', '2.2rc1')).toBe(1);
  });

  it('sorts post-releases after the final release', () => {
    expect(compareVersions('1.0.post1', '1.0')).toBe(1);
    expect(compareVersions('1.0', '1.0.post1')).toBe(-1);
    expect(compareVersions('1.0.post1', '1.0.1')).toBe(-1);
  });

  it('orders suffix labels dev, alpha, beta, rc', () => {
    expect(sortVersionsDescending(['1.0', '1.0rc1', '1.0.dev1', '1.0b1', '1.0a1', '1.0.post1'])).toEqual([
      '1.0.post1',
      '1.0',
      '1.0rc1',
      '1.0b1',
      '1.0a1',
      '1.0.dev1',
    ]);
  });

  it('compares suffix numbers numerically', () => {
    expect(compareVersions('2.2rc10', '2.2rc2')).toBe(1);
    expect(compareVersions('1.0.post2', '1.0.post10')).toBe(-1);
  });

  it('treats spellings of one label as equal', () => {
    expect(compareVersions('1.0alpha1', '1.0a1')).toBe(0);
  });

  it('sorts newest first', () => {
    expect(sortVersionsDescending(['1.0', '1.10', '1.9', '0.9'])).toEqual(['1.10', '1.9', '1.0', '0.9']);
  });
});

describe('satisfiesConstraint', () => {
  it('handles equality and wildcards', () => {
    expect(satisfiesConstraint('1.0', { operator: '==', version: '1.0' })).toBe(true);
    expect(satisfiesConstraint('1.0.0', { operator: '==', version: '1.0' })).toBe(true);
    expect(satisfiesConstraint('1.4.2', { operator: '==', version: '1.4.*' })).toBe(true);
    expect(satisfiesConstraint('1.5.0', { operator: '==', version: '1.4.*' })).toBe(false);
    expect(satisfiesConstraint('1.5.0', { operator: '!=', version: '1.4.*' })).toBe(true);
  });

  it('handles ordering operators', () => {
    expect(satisfiesConstraint('3.0.8', { operator: '>=', version: '3.0' })).toBe(true);
    expect(satisfiesConstraint('3.1', { operator: '<', version: '3.1' })).toBe(false);
    expect(satisfiesConstraint('3.1', { operator: '<=', version: '3.1' })).toBe(true);
    expect(satisfiesConstraint('3.1', { operator: '>', version: '3.0.9' })).toBe(true);
  });

  it('handles compatible release', () => {
    expect(satisfiesConstraint('1.4.7', { operator: '~=', version: '1.4.5' })).toBe(true);
    expect(satisfiesConstraint('1.4.4', { operator: '~=', version: '1.4.5' })).toBe(false);
    expect(satisfiesConstraint('1.5.0', { operator: '~=', version: '1.4.5' })).toBe(false);
    expect(satisfiesConstraint('2.9', { operator: '~=', version: '2.2' })).toBe(true);
    expect(satisfiesConstraint('3.0', { operator: '~=', version: '2.2' })).toBe(false);
  });

  it('handles arbitrary equality as a string match', () => {
    expect(satisfiesConstraint('1.0', { operator: '===', version: '1.0' })).toBe(true);
    expect(satisfiesConstraint('1.0.0', { operator: '===', version: '1.0' })).toBe(false);
  });

  it('requires every constraint to hold', () => {
    const constraints = [
      { operator: '>=' as const, version: '3.0' },
      { operator: '<' as const, version: '3.1' },
    ];
    expect(satisfiesAll('3.0.8', constraints)).toBe(true);
    expect(satisfiesAll('3.1.0', constraints)).toBe(false);
    expect(satisfiesAll('9.9', [])).toBe(true);
  });

  it('formats constraints sorted and deduplicated', () => {
    expect(
      formatConstraints([
        { operator: '>=', version: '1.0' },
        { operator: '<', version: '2' },
        { operator: '>=', version: '1.0' },
      ])
    ).toBe('<2,>=1.0');
  });
});

// ============================================================================
// Requirements
// ============================================================================

describe('normalizePackageName', () => {
  it('lowercases and collapses separators', () => {
    expect(normalizePackageName('Django_REST.framework')).toBe('django-rest-framework');
    expect(normalizePackageName('zope..interface')).toBe('zope-interface');
  });
});

describe('parseRequirements', () => {
  it('parses names, extras, constraints and markers', () => {
    const [requirement] = parseRequirements('Django[Bcrypt,argon2] >=3.0, <3.1 ; python_version >= "3.6"\n');

    expect(requirement.name).toBe('django');
    expect(requirement.rawName).toBe('Django');
    expect(requirement.extras).toEqual(['argon2', 'bcrypt']);
    expect(requirement.constraints).toEqual([
      { operator: '>=', version: '3.0' },
      { operator: '<', version: '3.1' },
    ]);
    expect(requirement.marker).toBe('python_version >= "3.6"');
    expect(requirement.line).toBe(1);
  });

  it('skips comments and blank lines', () => {
    const content = ['# web stack', '', 'gunicorn==20.0.4  # server', '   ', 'psycopg2==2.8.5'].join('\n');
    const requirements = parseRequirements(content);

    expect(requirements.map((r) => r.name)).toEqual(['gunicorn', 'psycopg2']);
    expect(requirements.map((r) => r.line)).toEqual([3, 5]);
  });

  it('joins backslash continuations', () => {
    const requirements = parseRequirements('numpy>=1.17,\\\n    <1.20\nshapely\n');

    expect(requirements).toHaveLength(2);
    expect(requirements[0].constraints).toEqual([
      { operator: '>=', version: '1.17' },
      { operator: '<', version: '1.20' },
    ]);
    expect(requirements[1].line).toBe(3);
  });

  it('rejects option lines with the line number', () => {
    expect(() => parseRequirements('django\n-r base.txt\n', 'requirements.txt')).toThrow(
      'requirements.txt:2: Options are not supported: -r base.txt'
    );
  });

  it('rejects URL requirements', () => {
    expect(() => parseRequirementLine('git+https://example.com/repo.git')).toThrow(ManifestError);
  });

  it('rejects malformed specifiers', () => {
    expect(() => parseRequirementLine('django=>3.0', 'req.txt', 4)).toThrow(
      'req.txt:4: Invalid version specifier "=>3.0" for django'
    );
  });
});

describe('mergeRequirements', () => {
  it('merges duplicates idempotently and sorts by name', () => {
    const merged = mergeRequirements(
      parseRequirements('Shapely==1.7.0\nDjango>=3.0\ndjango>=3.0\nDJANGO<3.1\n')
    );

    expect(Array.from(merged.keys())).toEqual(['django', 'shapely']);
    expect(merged.get('django')?.constraints).toEqual([
      { operator: '>=', version: '3.0' },
      { operator: '<', version: '3.1' },
    ]);
  });

  it('formats merged requirements', () => {
    const merged = mergeRequirements(parseRequirements('django[bcrypt]>=3.0\ndjango<3.1\n'));
    const django = merged.get('django');

    expect(django && formatRequirement(django)).toBe('django[bcrypt]<3.1,>=3.0');
  });
});

describe('readRequirementsFile', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'provisioner-manifest-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('reads content and requirements', async () => {
    const file = path.join(tempDir, 'requirements.txt');
    await fs.writeFile(file, 'django==3.0.8\n');

    const manifest = await readRequirementsFile(file);

    expect(manifest.content.toString('utf-8')).toBe('django==3.0.8\n');
    expect(manifest.requirements.map((r) => r.name)).toEqual(['django']);
  });

  it('raises ManifestError when the file is missing', async () => {
    const file = path.join(tempDir, 'missing.txt');

    await expect(readRequirementsFile(file)).rejects.toThrow(ManifestError);
    await expect(readRequirementsFile(file)).rejects.toThrow(`Dependency manifest not found: ${file}`);
  });
});

// ============================================================================
// OS Packages
// ============================================================================

describe('normalizeSystemPackages', () => {
  it('deduplicates and sorts', () => {
    const result = normalizeSystemPackages(['locales', 'binutils', 'locales', 'gdal-bin'], 'production');

    expect(formatSystemPackages(result.packages)).toEqual(['binutils', 'gdal-bin', 'locales']);
    expect(result.excluded).toEqual([]);
  });

  it('is independent of input order', () => {
    const a = normalizeSystemPackages(['b', 'a=1.0', 'c'], 'production');
    const b = normalizeSystemPackages(['c', 'a=1.0', 'b', 'a'], 'production');

    expect(a).toEqual(b);
  });

  it('keeps the pin when a package is listed pinned and unpinned', () => {
    const result = normalizeSystemPackages(['locales', 'locales=2.28-10'], 'production');

    expect(formatSystemPackages(result.packages)).toEqual(['locales=2.28-10']);
  });

  it('rejects two different pins', () => {
    expect(() => normalizeSystemPackages(['locales=1', 'locales=2'], 'production')).toThrow(RecipeError);
  });

  it('excludes development-only packages under production', () => {
    const entries = [
      { name: 'iproute2', development: true },
      { name: 'binutils', development: false },
    ];

    const production = normalizeSystemPackages(entries, 'production');
    const development = normalizeSystemPackages(entries, 'development');

    expect(formatSystemPackages(production.packages)).toEqual(['binutils']);
    expect(production.excluded).toEqual(['iproute2']);
    expect(formatSystemPackages(development.packages)).toEqual(['binutils', 'iproute2']);
    expect(development.excluded).toEqual([]);
  });

  it('keeps a package required outside development', () => {
    const result = normalizeSystemPackages(
      [{ name: 'iproute2', development: true }, 'iproute2'],
      'production'
    );

    expect(formatSystemPackages(result.packages)).toEqual(['iproute2']);
  });
});
