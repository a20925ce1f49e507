/**
 * Language Dependency Stage (Stage 02)
 *
 * Reads the dependency manifest and installs the resolved set into the
 * language package namespace.
 *
 * Declared inputs: the manifest's bytes, hashed. Nothing else, so source
 * edits never invalidate this stage. A missing or malformed manifest fails
 * here, before source layering can run.
 *
 * @module stages/dependencies
 */

import * as path from 'node:path';
import { ProvisionError } from '../errors/index.js';
import { readRequirementsFile, mergeRequirements } from '../manifests/requirements.js';
import { sha256Hex } from '../image/digest.js';
import { sortRecord } from '../image/snapshot.js';
import type { Stage } from '../pipeline/types.js';

export const dependenciesStage: Stage = {
  id: '02_dependencies',
  name: 'dependencies',
  number: 2,

  async prepare(context) {
    const manifestPath = path.resolve(context.recipeDir, context.recipe.dependencies.manifest);
    const manifest = await readRequirementsFile(manifestPath);
    const requirements = Array.from(mergeRequirements(manifest.requirements).values());
    context.logger?.debug(`Read ${requirements.length} requirements from ${manifestPath}`);

    return {
      inputs: { manifestSha256: sha256Hex(manifest.content) },

      async apply(snapshot) {
        if (!snapshot.base) {
          throw new ProvisionError('Dependencies cannot be installed before a base image is selected');
        }

        const result = await context.resolvers.dependencies.install({
          requirements,
          installed: snapshot.languagePackages,
        });

        const root = snapshot.base.languagePackageRoot;
        const installed = Object.entries(result.installed);
        context.logger?.info(
          `Resolved ${Object.keys(result.resolved).length} packages, installed ${installed.length}`
        );

        return {
          snapshot: {
            ...snapshot,
            languagePackages: sortRecord({ ...snapshot.languagePackages, ...result.installed }),
          },
          layer: {
            sizeBytes: result.sizeBytes,
            pathsAdded: installed.map(([name, version]) => `${root}/${name}-${version}.dist-info`).sort(),
            pathsPruned: [],
          },
        };
      },
    };
  },
};
