/**
 * rental-repairs-core - Logger Port
 *
 * Services and adapters log through this interface. The default
 * implementation is built on winston (see `createLogger`); hosts can pass
 * their own.
 */

export type LogMetadata = Record<string, unknown>;

export interface ILogger {
  debug(message: string, meta?: LogMetadata): void;
  info(message: string, meta?: LogMetadata): void;
  warn(message: string, meta?: LogMetadata): void;
  error(message: string, meta?: LogMetadata): void;
}

/**
 * Logger that drops everything.
 */
export const noopLogger: ILogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
