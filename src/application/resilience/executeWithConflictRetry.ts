/**
 * rental-repairs-core - Conflict Retry
 *
 * Re-runs a whole use case when its commit lost an optimistic concurrency
 * race. Each attempt must reload its aggregates, so `operation` is the full
 * unit of work, not just the write.
 *
 * @module application/resilience/executeWithConflictRetry
 */

import { ConcurrencyException } from '../../domain/exceptions';

export interface ConflictRetryOptions {
  /**
   * Maximum number of attempts (including the first).
   * @defaultValue 3
   */
  maxAttempts?: number;

  /**
   * Delay before the first retry in milliseconds.
   * @defaultValue 25
   */
  delayMs?: number;

  /**
   * Multiplier applied to the delay after each retry.
   * @defaultValue 2
   */
  backoffMultiplier?: number;

  /**
   * Called before each retry.
   */
  onRetry?: (error: ConcurrencyException, attemptNumber: number, delayMs: number) => void;
}

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * @throws the last ConcurrencyException when attempts run out; any other
 *   error immediately
 *
 * @example
 * ```typescript
 * const request = await executeWithConflictRetry(
 *   () => factory.create().executeInTransaction(async (uow) => { ... }),
 *   { maxAttempts: settings.conflictRetry.maxAttempts, delayMs: settings.conflictRetry.delayMs },
 * );
 * ```
 */
export async function executeWithConflictRetry<T>(
  operation: (attemptNumber: number) => Promise<T>,
  options: ConflictRetryOptions = {},
): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? 3);
  const multiplier = options.backoffMultiplier ?? 2;
  let delay = options.delayMs ?? 25;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (!(error instanceof ConcurrencyException) || attempt >= maxAttempts) {
        throw error;
      }
      options.onRetry?.(error, attempt, delay);
      if (delay > 0) {
        await sleep(delay);
      }
      delay *= multiplier;
    }
  }
}
