export { createLogger } from './createLogger';
export type { LoggerOptions } from './createLogger';
