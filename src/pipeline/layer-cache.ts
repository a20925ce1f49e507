/**
 * Layer Cache
 *
 * Content-addressed store of stage results: cache/layers/<key>.json holds
 * the snapshot a stage produced under that key. Entries are written once;
 * a second write under the same key is skipped.
 *
 * @module pipeline/layer-cache
 */

import * as fs from 'node:fs/promises';
import { ZodError } from 'zod';
import { SCHEMA_VERSIONS } from '../schemas/versions.js';
import { CachedLayerSchema, type CachedLayer } from '../schemas/layer.js';
import type { ImageSnapshot } from '../schemas/image.js';
import { atomicWriteJson, fileExists, readDocument } from '../storage/atomic.js';
import { getLayerCacheDir, getLayerPath } from '../storage/paths.js';
import type { Logger } from './types.js';

export interface LayerCacheEntry {
  cacheKey: string;
  stageId: string;
  buildId: string;
  createdAt: string;
  sizeBytes: number;
}

export class LayerCache {
  constructor(private readonly logger?: Logger) {}

  /**
   * Look up a cached layer.
   *
   * A layer file that fails validation, or whose recorded key differs from
   * its file name, is reported and treated as a miss; the stage then runs
   * and replaces it.
   */
  async get(cacheKey: string): Promise<CachedLayer | null> {
    const filePath = getLayerPath(cacheKey);
    let layer: CachedLayer | null;
    try {
      layer = await readDocument(filePath, 'layer', CachedLayerSchema);
    } catch (error) {
      if (error instanceof ZodError || (error instanceof Error && error.message.startsWith('Invalid JSON'))) {
        this.logger?.warn(`Ignoring unreadable cached layer ${cacheKey}: ${error.message}`);
        return null;
      }
      throw error;
    }

    if (layer && layer.cacheKey !== cacheKey) {
      this.logger?.warn(`Ignoring cached layer ${cacheKey}: recorded under key ${layer.cacheKey}`);
      return null;
    }
    return layer;
  }

  async has(cacheKey: string): Promise<boolean> {
    return fileExists(getLayerPath(cacheKey));
  }

  /**
   * Store a stage result under its key.
   *
   * @returns false when a valid layer was already stored under the key
   */
  async put(params: {
    cacheKey: string;
    stageId: string;
    parentKey: string | null;
    buildId: string;
    snapshot: ImageSnapshot;
  }): Promise<boolean> {
    if (await this.get(params.cacheKey)) {
      return false;
    }

    const layer: CachedLayer = {
      schemaVersion: SCHEMA_VERSIONS.layer,
      cacheKey: params.cacheKey,
      stageId: params.stageId,
      parentKey: params.parentKey,
      buildId: params.buildId,
      createdAt: new Date().toISOString(),
      snapshot: params.snapshot,
    };
    await atomicWriteJson(getLayerPath(params.cacheKey), CachedLayerSchema.parse(layer));
    return true;
  }

  /**
   * List valid cached layers, sorted by stage then creation time.
   */
  async list(): Promise<LayerCacheEntry[]> {
    const entries: LayerCacheEntry[] = [];
    for (const cacheKey of await this.keys()) {
      const layer = await this.get(cacheKey);
      if (!layer) {
        continue;
      }
      const own = layer.snapshot.layers.at(-1);
      entries.push({
        cacheKey,
        stageId: layer.stageId,
        buildId: layer.buildId,
        createdAt: layer.createdAt,
        sizeBytes: own?.sizeBytes ?? 0,
      });
    }
    return entries.sort(
      (a, b) => a.stageId.localeCompare(b.stageId) || a.createdAt.localeCompare(b.createdAt)
    );
  }

  /**
   * Delete every cached layer.
   *
   * @returns Number of layers removed
   */
  async clear(): Promise<number> {
    const keys = await this.keys();
    for (const cacheKey of keys) {
      await fs.rm(getLayerPath(cacheKey), { force: true });
    }
    return keys.length;
  }

  private async keys(): Promise<string[]> {
    try {
      const names = await fs.readdir(getLayerCacheDir());
      return names
        .filter((name) => /^[a-f0-9]{64}\.json$/.test(name))
        .map((name) => name.slice(0, -5))
        .sort();
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return [];
      }
      throw error;
    }
  }
}
