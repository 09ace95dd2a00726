/**
 * rental-repairs-core - Unit of Work Interface
 *
 * Coordinates the writes of one caller action across repositories so that a
 * request and a worker changed together are saved together, and publishes
 * the raised domain events only once the writes are durable.
 *
 * @module domain/repository/IUnitOfWork
 * @see {@link https://martinfowler.com/eaaCatalog/unitOfWork.html | Unit of Work Pattern}
 */

import type {
  IPropertyRepository,
  ITenantRequestRepository,
  IWorkerRepository,
} from './IRepository';

/**
 * Transaction state enumeration.
 *
 * Represents the current state of a Unit of Work transaction lifecycle.
 */
export enum TransactionState {
  /** No transaction has been started */
  Inactive = 'INACTIVE',
  /** Transaction is active and accepting operations */
  Active = 'ACTIVE',
  /** Transaction is being committed */
  Committing = 'COMMITTING',
  /** Transaction has been committed successfully */
  Committed = 'COMMITTED',
  /** Transaction has been rolled back */
  RolledBack = 'ROLLED_BACK',
  /** Commit failed; staged writes were discarded */
  Failed = 'FAILED',
}

/**
 * Result of a transaction completion (commit or rollback).
 *
 * @example
 * ```typescript
 * const result = await unitOfWork.commit();
 * logger.info('Transaction committed', {
 *   duration: result.duration,
 *   affectedCount: result.affectedCount,
 * });
 * ```
 */
export interface TransactionResult {
  success: boolean;

  /** Milliseconds since `start()` */
  duration: number;

  /** Number of aggregates written (0 for a rollback) */
  affectedCount: number;

  /** Number of domain events handed to the event bus */
  publishedEvents: number;

  /** Correlation id of the operation context, when one is active */
  correlationId?: string;
}

/**
 * Typed key identifying a repository within a Unit of Work.
 *
 * The token carries the repository type, so `getRepository(token)` needs no
 * type argument. Units of work bind their repository instances to the token.
 *
 * @template TRepository - The repository interface type
 */
export class RepositoryToken<TRepository> {
  private readonly bindings = new WeakMap<object, TRepository>();

  constructor(readonly name: string) {}

  /**
   * Bind `repository` as this token's instance for `scope`.
   */
  bind(scope: object, repository: TRepository): void {
    this.bindings.set(scope, repository);
  }

  resolve(scope: object): TRepository | undefined {
    return this.bindings.get(scope);
  }

  toString(): string {
    return `RepositoryToken(${this.name})`;
  }
}

/**
 * IUnitOfWork - Transaction management interface for domain operations.
 *
 * Writes made through the unit's repositories are staged. `commit()` checks
 * the versions of all staged writes before applying any of them; if applying
 * fails part-way, the writes already applied are reverted before the error
 * propagates. Events raised by saved aggregates are published after a
 * successful commit and dropped on rollback.
 *
 * @example
 * ```typescript
 * const request = await unitOfWork.executeInTransaction(async (uow) => {
 *   const requests = uow.getRepository(TENANT_REQUEST_REPOSITORY_TOKEN);
 *   const workers = uow.getRepository(WORKER_REPOSITORY_TOKEN);
 *
 *   const request = await requests.get(requestId);
 *   const worker = await workers.get(workerId);
 *   // ... mutate both
 *   await requests.update(request);
 *   await workers.update(worker);
 *   return request;
 * });
 * ```
 */
export interface IUnitOfWork {
  /**
   * Current state of the transaction.
   */
  readonly state: TransactionState;

  /**
   * Unique identifier for this Unit of Work instance.
   *
   * Useful for logging and debugging transaction lifecycles.
   */
  readonly id: string;

  /**
   * Start a new transaction.
   *
   * @throws UnitOfWorkStateException if a transaction is already active
   */
  start(): Promise<void>;

  /**
   * Apply staged writes, then publish buffered events.
   *
   * @throws ConcurrencyException if any staged write is stale; nothing is applied
   * @throws UnitOfWorkStateException if no transaction is active
   */
  commit(): Promise<TransactionResult>;

  /**
   * Discard staged writes and buffered events.
   *
   * @throws UnitOfWorkStateException if no transaction is active
   */
  rollback(): Promise<TransactionResult>;

  /**
   * Get a repository instance within the current transaction scope.
   *
   * @throws UnitOfWorkStateException if the repository is not registered or
   *   no transaction is active
   */
  getRepository<TRepository>(token: RepositoryToken<TRepository>): TRepository;

  /**
   * Check if a repository is registered with this Unit of Work.
   */
  hasRepository<TRepository>(token: RepositoryToken<TRepository>): boolean;

  /**
   * Execute a function within a transaction scope.
   *
   * Starts a transaction, executes the callback, and commits on success
   * or rolls back on failure.
   *
   * @throws Rethrows any error from the callback after rollback
   */
  executeInTransaction<TResult>(
    callback: (unitOfWork: IUnitOfWork) => Promise<TResult>,
  ): Promise<TResult>;

  /**
   * Dispose of the Unit of Work. An active transaction is rolled back.
   */
  dispose(): Promise<void>;
}

/**
 * Factory interface for creating Unit of Work instances.
 *
 * Application services create one unit per use case invocation.
 */
export interface IUnitOfWorkFactory {
  create(): IUnitOfWork;
}

export const PROPERTY_REPOSITORY_TOKEN = new RepositoryToken<IPropertyRepository>(
  'IPropertyRepository',
);

export const WORKER_REPOSITORY_TOKEN = new RepositoryToken<IWorkerRepository>('IWorkerRepository');

export const TENANT_REQUEST_REPOSITORY_TOKEN = new RepositoryToken<ITenantRequestRepository>(
  'ITenantRequestRepository',
);
