/**
 * rental-repairs-core - Operation Context
 *
 * Carries the correlation id and acting user of the current unit of work
 * across async boundaries, so domain events can stamp their metadata without
 * every method taking those values as parameters.
 *
 * @module domain/context/OperationContext
 */

import { AsyncLocalStorage } from 'async_hooks';

/**
 * Data available to code running inside an operation.
 */
export interface OperationContextData {
  /** Correlation id shared by everything one caller action causes */
  correlationId?: string;

  /** User id of the principal performing the operation */
  actorId?: string;

  /** Additional caller-supplied values */
  [key: string]: unknown;
}

interface ContextStore {
  data: Map<string, unknown>;
}

/**
 * OperationContext - AsyncLocalStorage-backed ambient context.
 *
 * @example
 * ```typescript
 * await OperationContext.run({ correlationId: 'req-123', actorId: 'manager-1' }, async () => {
 *   await requestService.beginReview('manager-1', requestId);
 *   // events raised here carry correlationId 'req-123'
 * });
 * ```
 */
export class OperationContext {
  private static als = new AsyncLocalStorage<ContextStore>();

  private constructor(private readonly store: ContextStore) {}

  /**
   * Run `callback` with a fresh context holding `initialData`.
   */
  static run<R>(initialData: OperationContextData, callback: () => R): R {
    const store: ContextStore = {
      data: new Map(Object.entries(initialData)),
    };
    return OperationContext.als.run(store, callback);
  }

  /**
   * The active context, or undefined outside of `run()`.
   */
  static current(): OperationContext | undefined {
    const store = OperationContext.als.getStore();
    return store ? new OperationContext(store) : undefined;
  }

  get(key: string): unknown {
    return this.store.data.get(key);
  }

  set(key: string, value: unknown): void {
    this.store.data.set(key, value);
  }

  get correlationId(): string | undefined {
    const value = this.get('correlationId');
    return typeof value === 'string' ? value : undefined;
  }

  get actorId(): string | undefined {
    const value = this.get('actorId');
    return typeof value === 'string' ? value : undefined;
  }
}
