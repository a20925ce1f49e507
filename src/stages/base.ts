/**
 * Base Environment Stage (Stage 00)
 *
 * Pins the base runtime image as the starting environment. The same
 * identifier always yields the same starting snapshot: everything comes from
 * the registry entry for that identifier.
 *
 * Declared inputs: the identifier as written, digest pin included, and the
 * digest of the catalog the resolvers read. Every later key chains from
 * this one, so a different catalog rebuilds every layer.
 *
 * @module stages/base
 */

import { parseBaseIdentifier } from '../schemas/recipe.js';
import { sortRecord } from '../image/snapshot.js';
import type { Stage } from '../pipeline/types.js';

export const baseStage: Stage = {
  id: '00_base',
  name: 'base',
  number: 0,

  async prepare(context) {
    const identifier = parseBaseIdentifier(context.recipe.base);

    return {
      inputs: { identifier: context.recipe.base, catalogDigest: context.resolvers.catalogDigest },

      async apply(snapshot) {
        const resolved = await context.resolvers.baseImages.resolve(identifier);
        context.logger?.info(
          `Base ${resolved.base.identifier} (${resolved.base.distribution} ${resolved.base.release}, sha256:${resolved.base.digest.slice(0, 12)})`
        );

        return {
          snapshot: {
            ...snapshot,
            base: resolved.base,
            systemPackages: sortRecord(resolved.systemPackages),
            languagePackages: sortRecord(resolved.languagePackages),
            env: sortRecord(resolved.env),
          },
          layer: { sizeBytes: resolved.sizeBytes, pathsAdded: ['/'], pathsPruned: [] },
        };
      },
    };
  },
};
