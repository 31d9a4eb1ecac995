/**
 * Configuration Module - Canonical Entry Point
 *
 * Usage:
 *   import { config } from './config';
 */

export { config, buildConfig } from './unified';
export type { AppConfig } from './unified';

export {
  EnvSchema,
  NodeEnvSchema,
  LogLevelSchema,
  LogFormatSchema,
  parseEnv,
  getEffectiveNodeEnv,
} from './env';
export type { NodeEnv, LogLevel, LogFormat, RawEnv, EnvValidationResult } from './env';
