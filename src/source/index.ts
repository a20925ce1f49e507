/**
 * Source Module
 *
 * @module source
 */

export { type SourceFile, type SourceTree, hashSourceTree, imagePath } from './tree.js';
