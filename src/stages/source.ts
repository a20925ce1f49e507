/**
 * Source Layering Stage (Stage 03)
 *
 * Copies the application source tree to the working directory and makes it
 * the working directory of every later process.
 *
 * Declared inputs: the working directory and the content hash of every
 * file in the tree.
 *
 * @module stages/source
 */

import * as path from 'node:path';
import { hashSourceTree, imagePath } from '../source/tree.js';
import { sortRecord } from '../image/snapshot.js';
import type { LayeredFile } from '../schemas/image.js';
import type { Stage } from '../pipeline/types.js';

export const sourceStage: Stage = {
  id: '03_source',
  name: 'source',
  number: 3,

  async prepare(context) {
    const { source } = context.recipe;
    const tree = await hashSourceTree(path.resolve(context.recipeDir, source.root), source.ignore);
    context.logger?.debug(`Hashed ${tree.files.length} source files under ${tree.root}`);

    return {
      inputs: {
        workdir: source.workdir,
        files: Object.fromEntries(tree.files.map((file) => [file.path, file.sha256])),
      },

      async apply(snapshot) {
        const layered: Record<string, LayeredFile> = {};
        for (const file of tree.files) {
          layered[imagePath(source.workdir, file.path)] = { sha256: file.sha256, sizeBytes: file.sizeBytes };
        }

        return {
          snapshot: {
            ...snapshot,
            files: sortRecord({ ...snapshot.files, ...layered }),
            workdir: source.workdir,
          },
          layer: {
            sizeBytes: tree.totalBytes,
            pathsAdded: Object.keys(layered).sort(),
            pathsPruned: [],
          },
        };
      },
    };
  },
};
