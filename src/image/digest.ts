/**
 * Canonical JSON and Digests
 *
 * Cache keys and image ids are SHA-256 digests of canonical JSON: object keys
 * sorted, no whitespace, undefined properties dropped. Two values that are
 * equal as data always produce the same digest, whatever order their keys
 * were inserted in.
 *
 * @module image/digest
 */

import * as crypto from 'node:crypto';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => (item === undefined ? null : canonicalize(item)));
  }
  if (isPlainObject(value)) {
    return Object.fromEntries(
      Object.keys(value)
        .sort()
        .filter((key) => value[key] !== undefined)
        .map((key) => [key, canonicalize(value[key])])
    );
  }
  return value;
}

/**
 * Serialise a JSON-compatible value with sorted keys.
 *
 * @example
 * canonicalJson({ b: 1, a: [2, { d: 3, c: 4 }] });
 * // '{"a":[2,{"c":4,"d":3}],"b":1}'
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

/**
 * SHA-256 of a string or buffer, as lowercase hex.
 */
export function sha256Hex(content: string | Buffer): string {
  return crypto.createHash('sha256').update(content).digest('hex');
}

/**
 * SHA-256 of a value's canonical JSON.
 */
export function digestOf(value: unknown): string {
  return sha256Hex(canonicalJson(value));
}
