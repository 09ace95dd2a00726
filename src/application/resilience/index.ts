export { executeWithConflictRetry } from './executeWithConflictRetry';
export type { ConflictRetryOptions } from './executeWithConflictRetry';
