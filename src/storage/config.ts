/**
 * Global Config Storage
 *
 * Global CLI configuration stored at ~/.provisioner/config.json
 * Contains user preferences and default settings.
 *
 * @module storage/config
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from '../schemas/versions.js';
import { ProfileSchema } from '../schemas/common.js';
import { atomicWriteJson } from '../schemas/migrations/index.js';
import { readDocument } from './atomic.js';
import { getGlobalConfigPath } from './paths.js';

export const GlobalConfigSchema = z.object({
  schemaVersion: z.number().int().positive().default(SCHEMA_VERSIONS.globalConfig),

  /** Catalog used when neither the recipe nor PROVISIONER_CATALOG names one */
  catalogPath: z.string().min(1).optional(),

  /** Profile used when neither the command line nor PROVISIONER_PROFILE sets one */
  defaultProfile: ProfileSchema.optional(),

  /** Force the noninteractive package frontend */
  unattended: z.boolean().default(true),
});

export type GlobalConfig = z.infer<typeof GlobalConfigSchema>;

/**
 * Default configuration when no config file exists
 */
export const DEFAULT_GLOBAL_CONFIG: GlobalConfig = {
  schemaVersion: SCHEMA_VERSIONS.globalConfig,
  unattended: true,
};

export async function saveGlobalConfig(config: GlobalConfig): Promise<void> {
  const validated = GlobalConfigSchema.parse(config);
  await atomicWriteJson(getGlobalConfigPath(), validated);
}

/**
 * Load global config from disk
 *
 * Returns default config if file doesn't exist.
 *
 * @throws Error if config file exists but is invalid
 */
export async function loadGlobalConfig(): Promise<GlobalConfig> {
  const config = await readDocument(getGlobalConfigPath(), 'globalConfig', GlobalConfigSchema);
  return config ?? DEFAULT_GLOBAL_CONFIG;
}
