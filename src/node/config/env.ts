/**
 * Environment Variable Schema and Validation
 *
 * Defines the Zod schema for every environment variable the explorer
 * reads, with defaults, and a non-throwing parse helper.
 */

import { z } from 'zod';
import { isJestRuntime } from '../../shared/utils/envFlags';

export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

export const EnvSchema = z.object({
  // ===================================================================
  // ENVIRONMENT
  // ===================================================================

  /** Application environment mode */
  NODE_ENV: NodeEnvSchema.default('development'),

  /** Application version (injected by npm) */
  npm_package_version: z.string().optional(),

  // ===================================================================
  // LOGGING
  // ===================================================================

  /** Minimum log level */
  LOG_LEVEL: LogLevelSchema.default('info'),

  /** Log output format */
  LOG_FORMAT: LogFormatSchema.default('pretty'),

  /** Log file path (optional; no file transport when unset) */
  LOG_FILE: z.string().optional(),

  // ===================================================================
  // EXPLORATION
  // ===================================================================

  /** Expanded states between progress log lines (0 disables) */
  KLOTSKI_PROGRESS_INTERVAL: z.coerce.number().int().min(0).default(10_000),
});

export type RawEnv = z.infer<typeof EnvSchema>;

export interface EnvValidationError {
  path: string;
  message: string;
}

export interface EnvValidationResult {
  success: boolean;
  data?: RawEnv;
  errors?: EnvValidationError[];
}

/**
 * Parse and validate environment variables without throwing.
 */
export function parseEnv(
  env: Record<string, string | undefined> = process.env
): EnvValidationResult {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    return {
      success: false,
      errors: result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    };
  }

  return { success: true, data: result.data };
}

/**
 * Jest workers always count as 'test', whatever NODE_ENV says.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}
