/**
 * Version Comparison and Constraints
 *
 * Release versions ("1.11.2", "2.2rc1", "1.0.post1") compared by their
 * numeric release segments, then by pre- and post-release suffixes, and the
 * constraint operators used by requirements manifests.
 *
 * @module manifests/version
 */

// ============================================================================
// Types
// ============================================================================

export const VERSION_OPERATORS = ['===', '==', '!=', '>=', '<=', '~=', '>', '<'] as const;

export type VersionOperator = (typeof VERSION_OPERATORS)[number];

export interface VersionConstraint {
  operator: VersionOperator;
  /** Version operand; "==" and "!=" accept a trailing ".*" */
  version: string;
}

interface ParsedVersion {
  /** Leading numeric segments ("1.11.2" is [1, 11, 2]) */
  release: number[];
  /** Pre- and post-release parts after the release ("rc1", "post2"), empty for finals */
  suffixes: Suffix[];
}

interface Suffix {
  rank: number;
  label: string;
  number: number;
}

// ============================================================================
// Comparison
// ============================================================================

/** Suffix labels in release order; a final release ranks between rc and post */
const SUFFIX_RANKS = new Map<string, number>([
  ['dev', 0],
  ['a', 1],
  ['alpha', 1],
  ['b', 2],
  ['beta', 2],
  ['c', 3],
  ['rc', 3],
  ['pre', 3],
  ['preview', 3],
  ['post', 5],
  ['r', 5],
  ['rev', 5],
]);

const FINAL: Suffix = { rank: 4, label: '', number: 0 };
const UNKNOWN_RANK = 3;

function parseSuffix(part: string): Suffix {
  const match = /^([A-Za-z]*)(\d*)$/.exec(part);
  if (!match) {
    return { rank: UNKNOWN_RANK, label: part, number: 0 };
  }
  const label = match[1].toLowerCase();
  return {
    rank: SUFFIX_RANKS.get(label) ?? UNKNOWN_RANK,
    label,
    number: match[2] === '' ? 0 : parseInt(match[2], 10),
  };
}

function parseVersion(version: string): ParsedVersion {
  const parts = version
    .trim()
    .replace(/^v/i, '')
    .split(/[.\-_]/);
  const release: number[] = [];
  const suffixes: Suffix[] = [];

  for (const part of parts) {
    if (suffixes.length === 0) {
      const match = /^(\d*)(.*)$/.exec(part);
      const digits = match?.[1] ?? '';
      const rest = match?.[2] ?? part;
      if (digits !== '') {
        release.push(parseInt(digits, 10));
      }
      if (rest !== '') {
        suffixes.push(parseSuffix(rest));
      }
    } else if (part !== '') {
      suffixes.push(parseSuffix(part));
    }
  }
  return { release, suffixes };
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

// dev < a < b < rc < final < post; "rc10" > "rc2"
function compareSuffix(a: Suffix, b: Suffix): number {
  if (a.rank !== b.rank) {
    return a.rank < b.rank ? -1 : 1;
  }
  // Spellings of one label ("a", "alpha") compare equal
  if (a.label !== b.label && !(SUFFIX_RANKS.has(a.label) && SUFFIX_RANKS.has(b.label))) {
    return compareText(a.label, b.label);
  }
  if (a.number !== b.number) {
    return a.number < b.number ? -1 : 1;
  }
  return 0;
}

/**
 * Compare two versions. Missing trailing segments count as zero, so
 * "1.0" equals "1.0.0".
 *
 * @returns negative if a < b, 0 if equal, positive if a > b
 *
 * @example
 * compareVersions('1.10', '1.9'); // 1
 * compareVersions('2.0', '2.0.0'); // 0
 */
export function compareVersions(a: string, b: string): number {
  const left = parseVersion(a);
  const right = parseVersion(b);

  const releaseLength = Math.max(left.release.length, right.release.length);
  for (let i = 0; i < releaseLength; i++) {
    const l = left.release[i] ?? 0;
    const r = right.release[i] ?? 0;
    if (l !== r) {
      return l < r ? -1 : 1;
    }
  }

  const suffixLength = Math.max(left.suffixes.length, right.suffixes.length);
  for (let i = 0; i < suffixLength; i++) {
    const order = compareSuffix(left.suffixes[i] ?? FINAL, right.suffixes[i] ?? FINAL);
    if (order !== 0) {
      return order;
    }
  }
  return 0;
}

/**
 * Sort versions newest first.
 */
export function sortVersionsDescending(versions: Iterable<string>): string[] {
  return Array.from(versions).sort((a, b) => compareVersions(b, a));
}

// ============================================================================
// Constraints
// ============================================================================

function matchesPrefix(version: string, prefix: string): boolean {
  const target = parseVersion(version);
  const wanted = parseVersion(prefix);
  return (
    wanted.release.every((number, i) => (target.release[i] ?? 0) === number) &&
    wanted.suffixes.every((suffix, i) => compareSuffix(target.suffixes[i] ?? FINAL, suffix) === 0)
  );
}

/**
 * Check a single constraint.
 *
 * @example
 * satisfiesConstraint('1.4.7', { operator: '~=', version: '1.4.5' }); // true
 * satisfiesConstraint('1.5.0', { operator: '~=', version: '1.4.5' }); // false
 */
export function satisfiesConstraint(version: string, constraint: VersionConstraint): boolean {
  const { operator } = constraint;
  const operand = constraint.version;

  switch (operator) {
    case '===':
      return version === operand;
    case '==':
      return operand.endsWith('.*')
        ? matchesPrefix(version, operand.slice(0, -2))
        : compareVersions(version, operand) === 0;
    case '!=':
      return operand.endsWith('.*')
        ? !matchesPrefix(version, operand.slice(0, -2))
        : compareVersions(version, operand) !== 0;
    case '>=':
      return compareVersions(version, operand) >= 0;
    case '<=':
      return compareVersions(version, operand) <= 0;
    case '>':
      return compareVersions(version, operand) > 0;
    case '<':
      return compareVersions(version, operand) < 0;
    case '~=': {
      // ~=X.Y.Z means >=X.Y.Z and ==X.Y.*
      const segments = operand.split('.');
      if (segments.length < 2) {
        return compareVersions(version, operand) >= 0;
      }
      const prefix = segments.slice(0, -1).join('.');
      return compareVersions(version, operand) >= 0 && matchesPrefix(version, prefix);
    }
  }
}

/**
 * Check a version against every constraint. No constraints means any version.
 */
export function satisfiesAll(version: string, constraints: readonly VersionConstraint[]): boolean {
  return constraints.every((constraint) => satisfiesConstraint(version, constraint));
}

/**
 * Render a constraint as written in a manifest ("==1.0").
 */
export function formatConstraint(constraint: VersionConstraint): string {
  return `${constraint.operator}${constraint.version}`;
}

/**
 * Render a constraint list, sorted and deduplicated ("<2,>=1.0").
 */
export function formatConstraints(constraints: readonly VersionConstraint[]): string {
  return Array.from(new Set(constraints.map(formatConstraint))).sort().join(',');
}
