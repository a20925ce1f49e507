/**
 * Build ID Generation
 *
 * Build ID Format: YYYYMMDD-HHMMSS-<recipe-slug>
 *
 * IDs are local time, so they sort in the order builds were started on one
 * machine. Two builds of the same recipe within one second get a numeric
 * suffix.
 *
 * @module builder/id-generator
 */

/**
 * Maximum slug length in characters
 */
const MAX_SLUG_LENGTH = 40;

/**
 * Generate a path-safe slug from a recipe name.
 *
 * @example
 * ```typescript
 * generateSlug('Geo App.v2'); // 'geo-app-v2'
 * ```
 */
export function generateSlug(name: string): string {
  let slug = name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');

  if (slug.length > MAX_SLUG_LENGTH) {
    slug = slug.substring(0, MAX_SLUG_LENGTH).replace(/-+$/, '');
  }

  return slug || 'build';
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format a date as YYYYMMDD-HHMMSS.
 */
export function formatTimestamp(date: Date = new Date()): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  return `${day}-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

/**
 * Generate a build ID.
 *
 * @example
 * ```typescript
 * generateBuildId('core', new Date(2020, 6, 15, 10, 15, 0));
 * // '20200715-101500-core'
 * ```
 */
export function generateBuildId(recipeName: string, date: Date = new Date()): string {
  return `${formatTimestamp(date)}-${generateSlug(recipeName)}`;
}

/**
 * Append -2, -3, ... until the ID is not taken.
 *
 * @example
 * ```typescript
 * handleCollision('20200715-101500-core', ['20200715-101500-core']);
 * // '20200715-101500-core-2'
 * ```
 */
export function handleCollision(baseId: string, existingIds: Iterable<string>): string {
  const existing = new Set(existingIds);
  if (!existing.has(baseId)) {
    return baseId;
  }

  let suffix = 2;
  while (existing.has(`${baseId}-${suffix}`)) {
    suffix++;
  }
  return `${baseId}-${suffix}`;
}
