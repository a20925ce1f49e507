/**
 * Image Snapshot Helpers
 *
 * Snapshots are plain data. Stages build new snapshots with spreads and the
 * executor freezes every snapshot it hands out, so a stage that tries to
 * edit its input fails loudly instead of leaking into cached layers.
 *
 * @module image/snapshot
 */

import type { ImageSnapshot, LayerRecord } from '../schemas/image.js';
import { digestOf } from './digest.js';

/**
 * The state before stage 00: no base, nothing installed.
 */
export function emptySnapshot(): ImageSnapshot {
  return {
    base: null,
    systemPackages: {},
    languagePackages: {},
    files: {},
    workdir: null,
    env: {},
    layers: [],
  };
}

/**
 * Deep-freeze a snapshot in place and return it.
 */
export function freezeSnapshot(snapshot: ImageSnapshot): ImageSnapshot {
  deepFreeze(snapshot);
  return snapshot;
}

function deepFreeze(value: unknown): void {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) {
    return;
  }
  for (const child of Object.values(value)) {
    deepFreeze(child);
  }
  Object.freeze(value);
}

/**
 * Append a committed layer, returning a new snapshot.
 */
export function appendLayer(snapshot: ImageSnapshot, layer: LayerRecord): ImageSnapshot {
  return { ...snapshot, layers: [...snapshot.layers, layer] };
}

/**
 * SHA-256 of the snapshot's canonical JSON.
 */
export function snapshotDigest(snapshot: ImageSnapshot): string {
  return digestOf(snapshot);
}

/**
 * Image id of a snapshot: "sha256:" + digest.
 */
export function imageIdOf(snapshot: ImageSnapshot): string {
  return `sha256:${snapshotDigest(snapshot)}`;
}

/**
 * Sum of all layer sizes.
 */
export function imageSize(snapshot: ImageSnapshot): number {
  return snapshot.layers.reduce((total, layer) => total + layer.sizeBytes, 0);
}

/**
 * Return a record with its keys in sorted order.
 */
export function sortRecord<T>(record: Record<string, T>): Record<string, T> {
  return Object.fromEntries(
    Object.keys(record)
      .sort()
      .map((key) => [key, record[key]])
  );
}
