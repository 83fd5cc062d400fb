/**
 * Environment Variable Schema and Validation
 *
 * This module defines the Zod schema for all environment variables the GTP
 * front end reads, validates them at startup, and exports the parsed type.
 *
 * All environment variables should be defined here with appropriate
 * validation rules and defaults.
 */

import { z } from 'zod';
import { isJestRuntime } from '../../shared/utils/envFlags';
import { DEFAULT_BOARD_SIZE, MAX_BOARD_SIZE } from '../../shared/types/game';
import { DEFAULT_RANDOM_ATTEMPTS } from '../../shared/ai';

/**
 * Node environment schema.
 */
export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

/**
 * Log level schema.
 */
export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Log format schema.
 */
export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

const booleanFlag = z
  .string()
  .optional()
  .transform((val) => val === 'true' || val === '1');

/**
 * Complete environment variable schema with validation rules and defaults.
 */
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

  /** Minimum level written by the logger */
  LOG_LEVEL: LogLevelSchema.default('info'),

  /** Console format; unset means json in production and pretty elsewhere */
  LOG_FORMAT: LogFormatSchema.optional(),

  /** Optional path of a JSON log file */
  LOG_FILE: z.string().optional(),

  // ===================================================================
  // ENGINE
  // ===================================================================

  /** Board size the engine starts with */
  GOBAN_BOARD_SIZE: z.coerce.number().int().min(1).max(MAX_BOARD_SIZE).default(DEFAULT_BOARD_SIZE),

  /** Komi reported until the controller sends `komi` */
  GOBAN_KOMI: z.coerce.number().default(5.5),

  /** Seed for genmove; unset means a time-based seed */
  GOBAN_RANDOM_SEED: z.coerce.number().int().optional(),

  /** Random probes genmove makes before scanning the board */
  GOBAN_GENMOVE_ATTEMPTS: z.coerce.number().int().min(0).default(DEFAULT_RANDOM_ATTEMPTS),

  /** Re-check every board invariant after each mutation */
  GOBAN_STRICT_INVARIANTS: booleanFlag,
});

/**
 * Inferred type for raw environment variables.
 */
export type RawEnv = z.infer<typeof EnvSchema>;

/**
 * Result of environment validation.
 */
export interface EnvValidationResult {
  success: boolean;
  data?: RawEnv;
  errors?: Array<{ path: string; message: string }>;
}

/**
 * Parse and validate environment variables.
 *
 * @param env - Environment object to parse (defaults to process.env)
 * @returns Validation result with data or errors
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): EnvValidationResult {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    const issues = result.error.issues;
    const errors =
      issues.length > 0
        ? issues.map((e) => ({
            path: e.path.join('.'),
            message: e.message,
          }))
        : [
            {
              path: '',
              message: result.error.message,
            },
          ];

    return {
      success: false,
      errors,
    };
  }

  return {
    success: true,
    data: result.data,
  };
}

/**
 * Determine effective node environment.
 *
 * When running under Jest, always treats the environment as 'test'
 * regardless of NODE_ENV to ensure test-specific behavior.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}

/**
 * Check if running in production mode.
 */
export function isProduction(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'production';
}
