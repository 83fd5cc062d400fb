/**
 * Configuration Module - Canonical Entry Point
 *
 * All server code should import configuration from this module:
 *
 * Usage:
 *   import { config } from './config';
 *
 * Architecture:
 * - `env.ts` - Raw environment variable schema definitions
 * - `unified.ts` - Config assembly
 * - `index.ts` (this file) - Canonical re-export point
 */

export { config, buildConfig, APP_NAME, APP_VERSION } from './unified';
export type { AppConfig } from './unified';

export {
  EnvSchema,
  NodeEnvSchema,
  LogLevelSchema,
  LogFormatSchema,
  parseEnv,
  getEffectiveNodeEnv,
  isProduction,
} from './env';

export type { RawEnv, EnvValidationResult, NodeEnv, LogLevel, LogFormat } from './env';
