/**
 * rental-repairs-core - Port Module
 *
 * Contracts the application layer needs from its host
 */

export { noopLogger } from './ILogger';
export type { ILogger, LogMetadata } from './ILogger';
