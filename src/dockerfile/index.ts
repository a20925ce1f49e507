/**
 * Dockerfile Module
 *
 * @module dockerfile
 */

export { renderDockerfile, renderDockerignore, quoteValue, type RenderOptions } from './render.js';
