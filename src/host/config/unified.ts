/**
 * Unified Host Configuration
 *
 * Parses environment variables, validates them with Zod, and exports a
 * frozen config object that all host code should use.
 *
 * Architecture:
 * - `env.ts` defines the raw environment variable schema
 * - `unified.ts` (this file) assembles the typed host config
 * - `index.ts` re-exports everything for convenient imports
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { LogFormatSchema, LogLevelSchema, NodeEnvSchema, getEffectiveNodeEnv, parseEnv } from './env';

const ConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  isTest: z.boolean(),
  logging: z.object({
    level: LogLevelSchema,
    format: LogFormatSchema,
    file: z.string().optional(),
    silent: z.boolean(),
  }),
  board: z.object({
    rows: z.number().int().positive(),
    cols: z.number().int().positive(),
  }),
  selfPlay: z.object({
    games: z.number().int().positive(),
    seed: z.number().int().nonnegative(),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export class ConfigValidationError extends Error {
  constructor(readonly issues: Array<{ path: string; message: string }>) {
    super(
      `Invalid environment configuration: ${issues
        .map((issue) => `${issue.path || 'root'}: ${issue.message}`)
        .join('; ')}`
    );
    this.name = 'ConfigValidationError';
    Object.setPrototypeOf(this, ConfigValidationError.prototype);
  }
}

/**
 * Build a frozen config from an environment object. Throws
 * {@link ConfigValidationError} listing every invalid variable.
 */
export function buildConfig(source: Record<string, string | undefined>): AppConfig {
  const envResult = parseEnv(source);
  if (!envResult.success || !envResult.data) {
    throw new ConfigValidationError(envResult.errors ?? []);
  }
  const env = envResult.data;

  // Under Jest the effective environment is always "test", even when a .env
  // file says otherwise.
  const nodeEnv = getEffectiveNodeEnv(env);
  const logFile = env.LOG_FILE?.trim() || undefined;

  const preliminaryConfig = {
    nodeEnv,
    isTest: nodeEnv === 'test',
    logging: {
      level: env.LOG_LEVEL,
      format: env.LOG_FORMAT,
      ...(logFile ? { file: logFile } : {}),
      silent: env.LOG_SILENT,
    },
    board: {
      rows: env.POLYBLOCK_BOARD_ROWS,
      cols: env.POLYBLOCK_BOARD_COLS,
    },
    selfPlay: {
      games: env.POLYBLOCK_SELFPLAY_GAMES,
      seed: env.POLYBLOCK_SELFPLAY_SEED,
    },
  };

  return Object.freeze(ConfigSchema.parse(preliminaryConfig));
}

// Load .env into process.env before we read anything from it. Skipped in
// test mode so a developer's .env cannot leak into the suite.
if (process.env.NODE_ENV !== 'test') {
  dotenv.config();
}

function loadConfigOrExit(): AppConfig {
  try {
    return buildConfig(process.env);
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      console.error('Invalid environment configuration:');
      for (const issue of error.issues) {
        console.error(`  - ${issue.path || 'root'}: ${issue.message}`);
      }
      process.exit(1);
    }
    throw error;
  }
}

export const config: AppConfig = loadConfigOrExit();
