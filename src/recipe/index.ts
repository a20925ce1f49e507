/**
 * Recipe Module
 *
 * @module recipe
 */

export {
  DEFAULT_RECIPE_FILENAME,
  resolveRecipePath,
  parseRecipe,
  loadRecipe,
  type LoadedRecipe,
} from './loader.js';
