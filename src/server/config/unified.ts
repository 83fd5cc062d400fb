/**
 * Unified Application Configuration
 *
 * Parses environment variables, validates them with Zod, and exports a
 * frozen config object that all server code should use.
 *
 * Architecture:
 * - `env.ts` defines the raw environment variable schema
 * - `unified.ts` (this file) assembles the typed application config
 * - `index.ts` re-exports everything for convenient imports
 */

import dotenv from 'dotenv';
import {
  getEffectiveNodeEnv,
  isProduction,
  parseEnv,
  type LogFormat,
  type LogLevel,
  type NodeEnv,
  type RawEnv,
} from './env';

export interface AppConfig {
  readonly nodeEnv: NodeEnv;
  readonly isTest: boolean;
  readonly app: {
    readonly name: string;
    readonly version: string;
  };
  readonly logging: {
    readonly level: LogLevel;
    readonly format: LogFormat;
    readonly file: string | undefined;
  };
  readonly engine: {
    readonly boardSize: number;
    readonly komi: number;
    readonly randomSeed: number | undefined;
    readonly genmoveAttempts: number;
    readonly strictInvariants: boolean;
  };
}

export const APP_NAME = 'goban-rules';
export const APP_VERSION = '0.3.0';

/**
 * Assemble the typed config from an already-validated environment.
 */
export function buildConfig(env: RawEnv): AppConfig {
  const nodeEnv = getEffectiveNodeEnv(env);
  const logFile = env.LOG_FILE?.trim() || undefined;

  return Object.freeze({
    nodeEnv,
    isTest: nodeEnv === 'test',
    app: Object.freeze({
      name: APP_NAME,
      version: env.npm_package_version ?? APP_VERSION,
    }),
    logging: Object.freeze({
      level: env.LOG_LEVEL,
      format: env.LOG_FORMAT ?? (isProduction(nodeEnv) ? 'json' : 'pretty'),
      file: logFile,
    }),
    engine: Object.freeze({
      boardSize: env.GOBAN_BOARD_SIZE,
      komi: env.GOBAN_KOMI,
      randomSeed: env.GOBAN_RANDOM_SEED,
      genmoveAttempts: env.GOBAN_GENMOVE_ATTEMPTS,
      strictInvariants: env.GOBAN_STRICT_INVARIANTS,
    }),
  });
}

// Load .env into process.env before we read anything from it.
// Skip in test mode so a developer's .env cannot leak into test runs.
if (process.env.NODE_ENV !== 'test') {
  dotenv.config();
}

const envResult = parseEnv(process.env);
if (!envResult.success || !envResult.data) {
  console.error('Invalid environment configuration:');
  for (const error of envResult.errors ?? []) {
    console.error(`  - ${error.path || 'root'}: ${error.message}`);
  }
  process.exit(1);
}

export const config: AppConfig = buildConfig(envResult.data);
