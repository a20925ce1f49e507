/**
 * Configuration Module
 *
 * Loads and validates environment variables for the provisioner.
 * Uses Zod for runtime validation with sensible defaults.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';
import { ConfigError } from '../errors/index.js';
import { ProfileSchema } from '../schemas/common.js';

const envSchema = z.object({
  // Data directory (build records, layer cache, images)
  PROVISIONER_DATA_DIR: z.string().min(1).optional(),

  // Package catalog used when a recipe names none
  PROVISIONER_CATALOG: z.string().min(1).optional(),

  // Package selection profile
  PROVISIONER_PROFILE: ProfileSchema.optional(),

  // Runtime options
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

type Env = z.infer<typeof envSchema>;

/**
 * Parse configuration from an environment.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env) {
  const parseResult = envSchema.safeParse(source);

  if (!parseResult.success) {
    const issues = parseResult.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid environment variables:\n  - ${issues.join('\n  - ')}`);
  }

  const env: Env = parseResult.data;

  return {
    nodeEnv: env.NODE_ENV,
    isProduction: env.NODE_ENV === 'production',
    isDevelopment: env.NODE_ENV === 'development',
    isTest: env.NODE_ENV === 'test',

    /** Catalog override, when set */
    catalogPath: env.PROVISIONER_CATALOG,

    /** Profile override, when set */
    profile: env.PROVISIONER_PROFILE,
  } as const;
}

/**
 * Application configuration singleton
 */
export const config = loadConfig();

export type Config = ReturnType<typeof loadConfig>;
