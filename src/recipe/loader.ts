/**
 * Recipe Loading
 *
 * Reads a recipe file and validates it. Paths inside a recipe (catalog,
 * dependency manifest, source root) are relative to the recipe's own
 * directory, not the working directory of the process.
 *
 * @module recipe/loader
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { RecipeError, errorMessage } from '../errors/index.js';
import { RecipeSchema, type Recipe } from '../schemas/recipe.js';
import { migrateSchema } from '../schemas/migrations/index.js';

/** File looked up when a directory (or nothing) is given */
export const DEFAULT_RECIPE_FILENAME = 'provision.json';

export interface LoadedRecipe {
  recipe: Recipe;
  /** Absolute path of the recipe file */
  recipePath: string;
  /** Directory recipe paths resolve against */
  recipeDir: string;
}

/**
 * Resolve a recipe argument to a file path. A directory means the default
 * recipe file inside it.
 */
export async function resolveRecipePath(target: string = DEFAULT_RECIPE_FILENAME): Promise<string> {
  const absolute = path.resolve(target);
  try {
    const stats = await fs.stat(absolute);
    return stats.isDirectory() ? path.join(absolute, DEFAULT_RECIPE_FILENAME) : absolute;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return absolute;
    }
    throw error;
  }
}

/**
 * Validate raw recipe data.
 *
 * @throws RecipeError listing every schema issue
 */
export function parseRecipe(data: unknown, source = '<inline>'): Recipe {
  const result = RecipeSchema.safeParse(migrateSchema(data, 'recipe'));
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new RecipeError(`Invalid recipe ${source}`, issues);
  }
  return result.data;
}

/**
 * Load and validate a recipe.
 *
 * @throws RecipeError if the file is missing, not JSON or invalid
 *
 * @example
 * ```typescript
 * const { recipe, recipeDir } = await loadRecipe('examples/geo-app');
 * ```
 */
export async function loadRecipe(target?: string): Promise<LoadedRecipe> {
  const recipePath = await resolveRecipePath(target);

  let content: string;
  try {
    content = await fs.readFile(recipePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new RecipeError(`Recipe not found: ${recipePath}`);
    }
    throw error;
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new RecipeError(`Invalid JSON in recipe ${recipePath}: ${errorMessage(error)}`);
  }

  return {
    recipe: parseRecipe(data, recipePath),
    recipePath,
    recipeDir: path.dirname(recipePath),
  };
}
