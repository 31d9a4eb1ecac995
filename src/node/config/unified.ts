/**
 * Unified Application Configuration
 *
 * Parses environment variables, validates them with Zod, and exports a
 * frozen config object for all Node-side code.
 *
 * Architecture:
 * - `env.ts` defines the raw environment variable schema
 * - `unified.ts` (this file) assembles the typed application config
 * - `index.ts` re-exports everything for convenient imports
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { LogFormatSchema, LogLevelSchema, NodeEnvSchema, getEffectiveNodeEnv, parseEnv } from './env';

// Skip .env in test mode so it cannot override test-specific env vars.
if (process.env.NODE_ENV !== 'test') {
  dotenv.config();
}

const ConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  isProduction: z.boolean(),
  isTest: z.boolean(),
  app: z.object({
    version: z.string().min(1),
  }),
  logging: z.object({
    level: LogLevelSchema,
    format: LogFormatSchema,
    file: z.string().optional(),
  }),
  exploration: z.object({
    progressInterval: z.number().int().min(0),
  }),
});

/**
 * Application configuration type inferred from the schema.
 */
export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Assemble the application config from a raw environment.
 *
 * @throws Error listing every invalid variable as `NAME: message`
 */
export function buildConfig(rawEnv: Record<string, string | undefined>): AppConfig {
  const envResult = parseEnv(rawEnv);
  if (!envResult.success || !envResult.data) {
    const details = (envResult.errors ?? [])
      .map((error) => `${error.path || 'root'}: ${error.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  const env = envResult.data;
  const nodeEnv = getEffectiveNodeEnv(env);

  return ConfigSchema.parse({
    nodeEnv,
    isProduction: nodeEnv === 'production',
    isTest: nodeEnv === 'test',
    app: {
      version: env.npm_package_version?.trim() || '1.0.0',
    },
    logging: {
      level: env.LOG_LEVEL,
      format: env.LOG_FORMAT,
      file: env.LOG_FILE?.trim() || undefined,
    },
    exploration: {
      progressInterval: env.KLOTSKI_PROGRESS_INTERVAL,
    },
  });
}

export const config: AppConfig = Object.freeze(buildConfig(process.env));
