/**
 * Cached Layer Schema
 *
 * A cached layer holds the snapshot a stage produced, stored under the
 * stage's cache key. A build reuses it whenever the key computed from the
 * stage's declared inputs matches.
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from './versions.js';
import { ISO8601TimestampSchema, Sha256Schema } from './common.js';
import { ImageSnapshotSchema } from './image.js';

export const CachedLayerSchema = z.object({
  schemaVersion: z.number().int().positive().default(SCHEMA_VERSIONS.layer),
  cacheKey: Sha256Schema,
  stageId: z.string().min(1),
  /** Cache key of the stage this layer was built on, null for stage 00 */
  parentKey: Sha256Schema.nullable(),
  /** Build that produced the layer */
  buildId: z.string().min(1),
  createdAt: ISO8601TimestampSchema,
  /** Snapshot after the stage ran */
  snapshot: ImageSnapshotSchema,
});

export type CachedLayer = z.infer<typeof CachedLayerSchema>;
