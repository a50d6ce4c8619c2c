/**
 * Environment Variable Schema and Validation
 *
 * This module defines the Zod schema for every environment variable a Node
 * host reads, validates them at startup, and exports typed helpers.
 *
 * All environment variables should be defined here with appropriate
 * validation rules and defaults. The engine under `src/shared` never reads
 * this module.
 */

import { z } from 'zod';
import { MAX_BOARD_DIMENSION } from '../../shared/engine/rulesConfig';
import { DEFAULT_BOARD_COLS, DEFAULT_BOARD_ROWS } from '../../shared/types/game';
import { isJestRuntime } from '../../shared/utils/envFlags';

/**
 * Node environment schema - supports development, production, and test.
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

const boardDimension = z.coerce.number().int().min(1).max(MAX_BOARD_DIMENSION);

/**
 * Complete environment variable schema with validation rules and defaults.
 */
export const EnvSchema = z.object({
  // ===================================================================
  // ENVIRONMENT
  // ===================================================================

  /** Application environment mode */
  NODE_ENV: NodeEnvSchema.default('development'),

  // ===================================================================
  // LOGGING
  // ===================================================================

  /** Minimum level written by the logger */
  LOG_LEVEL: LogLevelSchema.default('info'),

  /** Console output format; files are always JSON */
  LOG_FORMAT: LogFormatSchema.default('pretty'),

  /** Optional path of a JSON log file */
  LOG_FILE: z.string().optional(),

  /** Drop every log entry (used by the test setup) */
  LOG_SILENT: booleanFlag,

  // ===================================================================
  // GAME DEFINITION
  // ===================================================================

  /** Board rows for hosts that build a game definition from config */
  POLYBLOCK_BOARD_ROWS: boardDimension.default(DEFAULT_BOARD_ROWS),

  /** Board columns for hosts that build a game definition from config */
  POLYBLOCK_BOARD_COLS: boardDimension.default(DEFAULT_BOARD_COLS),

  // ===================================================================
  // SELF-PLAY
  // ===================================================================

  /** Number of games the self-play script plays */
  POLYBLOCK_SELFPLAY_GAMES: z.coerce.number().int().positive().default(1),

  /** Seed of the first self-play game; later games use seed + n */
  POLYBLOCK_SELFPLAY_SEED: z.coerce.number().int().nonnegative().default(1),
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

  return {
    success: true,
    data: result.data,
  };
}

/**
 * Determine effective node environment.
 *
 * When running under Jest, always treats the environment as 'test'
 * regardless of NODE_ENV.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}

export function isProduction(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'production';
}

export function isTest(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'test';
}
