/**
 * rental-repairs-core - Winston Logger
 *
 * @module infrastructure/logging/createLogger
 */

import winston from 'winston';
import type { ILogger, LogMetadata } from '../../application/ports';
import type { LogLevel } from '../../application/config';

export interface LoggerOptions {
  level: LogLevel;
  /** Drop all output (tests) */
  silent?: boolean;
  /** Extra metadata on every entry */
  defaultMeta?: LogMetadata;
}

/**
 * JSON logger on stdout.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: settings.logLevel });
 * logger.info('Worker assigned', { requestId, workerId });
 * ```
 */
export function createLogger(options: LoggerOptions): ILogger {
  const logger = winston.createLogger({
    level: options.level,
    silent: options.silent ?? false,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json(),
    ),
    defaultMeta: { service: 'rental-repairs-core', ...options.defaultMeta },
    transports: [
      new winston.transports.Console({
        format: winston.format.json(),
      }),
    ],
  });

  return {
    debug: (message, meta) => {
      logger.debug(message, meta ?? {});
    },
    info: (message, meta) => {
      logger.info(message, meta ?? {});
    },
    warn: (message, meta) => {
      logger.warn(message, meta ?? {});
    },
    error: (message, meta) => {
      logger.error(message, meta ?? {});
    },
  };
}
