/**
 * Stage File Storage Operations
 *
 * Stage files are checkpoints written for each stage of a build.
 * They follow the naming convention: XX_stage_name.json
 *
 * @module storage/stages
 */

import * as fs from 'node:fs/promises';
import { STAGE_ID_PATTERN, parseStageNumber } from '../schemas/stage.js';
import { atomicWriteJson, type OutputSchema } from '../schemas/migrations/index.js';
import { getBuildDir, getStageFilePath } from './paths.js';

/**
 * Save a stage file (checkpoint)
 *
 * @param buildId - The build ID
 * @param stageId - The stage ID (e.g., "02_dependencies")
 * @param data - The checkpoint to save (should include _meta)
 */
export async function saveStageFile(buildId: string, stageId: string, data: unknown): Promise<string> {
  if (!STAGE_ID_PATTERN.test(stageId)) {
    throw new Error(`Invalid stageId format: ${stageId}. Expected NN_stage_name (e.g., 02_dependencies)`);
  }
  const filePath = getStageFilePath(buildId, stageId);
  await atomicWriteJson(filePath, data);
  return filePath;
}

/**
 * Load and validate a stage file
 *
 * @throws Error if file doesn't exist, ZodError if validation fails
 */
export async function loadStageFile<T>(
  buildId: string,
  stageId: string,
  schema: OutputSchema<T>
): Promise<T> {
  const filePath = getStageFilePath(buildId, stageId);

  try {
    const content = await fs.readFile(filePath, 'utf-8');
    return schema.parse(JSON.parse(content));
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new Error(`Stage file not found: ${stageId} in build ${buildId} (path: ${filePath})`);
    }
    throw error;
  }
}

export async function stageFileExists(buildId: string, stageId: string): Promise<boolean> {
  try {
    await fs.access(getStageFilePath(buildId, stageId));
    return true;
  } catch {
    return false;
  }
}

/**
 * List all stage files in a build
 *
 * @returns Stage IDs (without .json extension), sorted by stage number
 */
export async function listStageFiles(buildId: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(getBuildDir(buildId), { withFileTypes: true });

    return entries
      .filter((entry) => entry.isFile() && entry.name.endsWith('.json'))
      .map((entry) => entry.name.slice(0, -5))
      .filter((stageId) => STAGE_ID_PATTERN.test(stageId))
      .sort((a, b) => parseStageNumber(a) - parseStageNumber(b));
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return [];
    }
    throw error;
  }
}
