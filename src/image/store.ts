/**
 * Image Store
 *
 * Resulting images are written once under their content address and never
 * rewritten. Storing a snapshot whose image id already exists returns the
 * existing record untouched.
 *
 * @module image/store
 */

import * as fs from 'node:fs/promises';
import { SCHEMA_VERSIONS } from '../schemas/versions.js';
import { ImageRecordSchema, type ImageRecord, type ImageSnapshot } from '../schemas/image.js';
import { atomicWriteJson, readDocument } from '../storage/atomic.js';
import { getImagePath, getImagesDir } from '../storage/paths.js';
import { imageIdOf, imageSize } from './snapshot.js';

export interface StoreImageResult {
  image: ImageRecord;
  /** False when an identical image was already stored */
  created: boolean;
}

/**
 * Build the record for a final snapshot without persisting it.
 */
export function createImageRecord(params: {
  snapshot: ImageSnapshot;
  recipeName: string;
  buildId: string;
}): ImageRecord {
  return {
    schemaVersion: SCHEMA_VERSIONS.image,
    imageId: imageIdOf(params.snapshot),
    recipeName: params.recipeName,
    buildId: params.buildId,
    createdAt: new Date().toISOString(),
    sizeBytes: imageSize(params.snapshot),
    snapshot: params.snapshot,
  };
}

/**
 * Store the resulting image of a build.
 *
 * @example
 * const { image, created } = await storeImage({ snapshot, recipeName: 'core', buildId });
 */
export async function storeImage(params: {
  snapshot: ImageSnapshot;
  recipeName: string;
  buildId: string;
}): Promise<StoreImageResult> {
  const record = createImageRecord(params);

  const existing = await loadImage(record.imageId);
  if (existing) {
    return { image: existing, created: false };
  }

  await atomicWriteJson(getImagePath(record.imageId), ImageRecordSchema.parse(record));
  return { image: record, created: true };
}

/**
 * Load an image by id ("sha256:<digest>" or the bare digest).
 *
 * @returns The image, or null if it was never stored
 */
export async function loadImage(imageId: string): Promise<ImageRecord | null> {
  return readDocument(getImagePath(imageId), 'image', ImageRecordSchema);
}

/**
 * List stored image ids, sorted.
 */
export async function listImages(): Promise<string[]> {
  try {
    const entries = await fs.readdir(getImagesDir());
    return entries
      .filter((name) => /^[a-f0-9]{64}\.json$/.test(name))
      .map((name) => `sha256:${name.slice(0, -5)}`)
      .sort();
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return [];
    }
    throw error;
  }
}
