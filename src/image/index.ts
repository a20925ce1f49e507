/**
 * Image Module
 *
 * Snapshot values, canonical digests and the resulting-image store.
 *
 * @module image
 */

export { canonicalJson, sha256Hex, digestOf } from './digest.js';
export {
  emptySnapshot,
  freezeSnapshot,
  appendLayer,
  snapshotDigest,
  imageIdOf,
  imageSize,
  sortRecord,
} from './snapshot.js';
export {
  type StoreImageResult,
  createImageRecord,
  storeImage,
  loadImage,
  listImages,
} from './store.js';
