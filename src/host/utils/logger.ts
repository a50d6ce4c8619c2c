import winston from 'winston';
import fs from 'fs';
import path from 'path';
import { isEngineError } from '../../shared/engine/errors';
import { config } from '../config';
import type { LogFormat, LogLevel } from '../config';

// ============================================================================
// Types
// ============================================================================

export type LogMeta = Record<string, unknown>;

export interface HostLoggerOptions {
  level: LogLevel;
  format: LogFormat;
  /** Extra JSON file transport when set. */
  file?: string;
  silent: boolean;
  environment: string;
}

const SERVICE_NAME = 'polyblock';

// ============================================================================
// Formats
// ============================================================================

/**
 * Custom format to structure log metadata consistently: standard fields are
 * always present and errors become plain objects. Engine errors are logged
 * through their own `toJSON()` so code and context survive.
 */
const structuredFormat = winston.format((info) => {
  if (!info.service) {
    info.service = SERVICE_NAME;
  }

  if (isEngineError(info.error)) {
    info.error = info.error.toJSON();
  } else if (info.error instanceof Error) {
    info.error = {
      message: info.error.message,
      name: info.error.name,
      stack: info.error.stack,
    };
  }
  return info;
});

/**
 * Format for structured JSON logging (file transports, and the console when
 * LOG_FORMAT=json).
 */
export const jsonFormat = winston.format.combine(
  winston.format.timestamp({
    format: () => new Date().toISOString(),
  }),
  winston.format.errors({ stack: true }),
  structuredFormat(),
  winston.format.json()
);

/**
 * Format for human-readable console output.
 */
export const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  structuredFormat(),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, service, environment, ...meta }) => {
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${timestamp} ${level} [${service}/${environment}]: ${message}${metaStr}`;
  })
);

// ============================================================================
// Logger factory
// ============================================================================

/**
 * Create a winston logger. The console transport follows `format`; the
 * optional file transport always writes JSON.
 */
export function createHostLogger(options: HostLoggerOptions): winston.Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: options.format === 'json' ? jsonFormat : consoleFormat,
    }),
  ];

  if (options.file) {
    const filename = path.resolve(options.file);
    const logDir = path.dirname(filename);
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }
    transports.push(
      new winston.transports.File({
        filename,
        format: jsonFormat,
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      })
    );
  }

  return winston.createLogger({
    level: options.level,
    silent: options.silent,
    defaultMeta: {
      service: SERVICE_NAME,
      environment: options.environment,
    },
    transports,
  });
}

const logger = createHostLogger({
  level: config.logging.level,
  format: config.logging.format,
  ...(config.logging.file ? { file: config.logging.file } : {}),
  silent: config.logging.silent,
  environment: config.nodeEnv,
});

export { logger };
