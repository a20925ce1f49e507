/**
 * Runtime Configuration Stage (Stage 04)
 *
 * Applies the recipe's environment assignments. A name assigned more than
 * once keeps its last value. Build arguments never reach the environment.
 *
 * @module stages/runtime-config
 */

import { resolveEnvAssignments } from '../schemas/recipe.js';
import { sortRecord } from '../image/snapshot.js';
import type { Stage } from '../pipeline/types.js';

export const runtimeConfigStage: Stage = {
  id: '04_runtime_config',
  name: 'runtime_config',
  number: 4,

  async prepare(context) {
    const env = sortRecord(resolveEnvAssignments(context.recipe.env));

    return {
      inputs: { env },

      async apply(snapshot) {
        return {
          snapshot: { ...snapshot, env: sortRecord({ ...snapshot.env, ...env }) },
          layer: { sizeBytes: 0, pathsAdded: [], pathsPruned: [] },
        };
      },
    };
  },
};
