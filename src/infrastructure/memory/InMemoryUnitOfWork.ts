/**
 * rental-repairs-core - In-Memory Unit of Work
 *
 * Stages aggregate writes from its repositories and applies them together on
 * commit. Every staged write is version-checked before any is applied; if
 * applying still fails part-way, the writes already applied are reverted in
 * reverse order. Buffered events go to the event bus only after the writes
 * are in the store.
 *
 * @module infrastructure/memory/InMemoryUnitOfWork
 */

import { v4 as uuidv4 } from 'uuid';
import { ILogger, noopLogger } from '../../application/ports';
import { OperationContext } from '../../domain/context';
import type { IDomainEvent, IEventBus } from '../../domain/events';
import { UnitOfWorkStateException } from '../../domain/exceptions';
import type { FieldValue } from '../../domain/specification';
import {
  IUnitOfWork,
  IUnitOfWorkFactory,
  PROPERTY_REPOSITORY_TOKEN,
  RepositoryToken,
  TENANT_REQUEST_REPOSITORY_TOKEN,
  TransactionResult,
  TransactionState,
  WORKER_REPOSITORY_TOKEN,
} from '../../domain/repository';
import { InMemoryRecordStore } from './InMemoryRecordStore';
import type {
  IncludedCollector,
  RelationResolver,
  StagedWrite,
  StagingSession,
} from './InMemoryRepository';
import {
  InMemoryPropertyRepository,
  InMemoryTenantRequestRepository,
  InMemoryWorkerRepository,
} from './repositories';
import type { RelationDefinition } from './SpecificationCompiler';

interface Repositories {
  properties: InMemoryPropertyRepository;
  workers: InMemoryWorkerRepository;
  requests: InMemoryTenantRequestRepository;
}

export class InMemoryUnitOfWork implements IUnitOfWork, StagingSession, RelationResolver {
  readonly id: string = uuidv4();

  private _state: TransactionState = TransactionState.Inactive;
  private startedAt = 0;
  private writes = new Map<string, StagedWrite>();
  private bufferedEvents: IDomainEvent[] = [];
  private repositories: Repositories | undefined;

  constructor(
    private readonly store: InMemoryRecordStore,
    private readonly eventBus: IEventBus,
    private readonly logger: ILogger = noopLogger,
  ) {}

  get state(): TransactionState {
    return this._state;
  }

  get unitOfWorkId(): string {
    return this.id;
  }

  /**
   * Number of aggregates staged so far.
   */
  get pendingWrites(): number {
    return this.writes.size;
  }

  isActive(): boolean {
    return this._state === TransactionState.Active;
  }

  async start(): Promise<void> {
    if (this.isActive()) {
      throw new UnitOfWorkStateException(this.id, this._state, 'Transaction already active');
    }

    this.reset();
    const repositories: Repositories = {
      properties: new InMemoryPropertyRepository(this.store, this, this),
      workers: new InMemoryWorkerRepository(this.store, this, this),
      requests: new InMemoryTenantRequestRepository(this.store, this, this),
    };
    PROPERTY_REPOSITORY_TOKEN.bind(this, repositories.properties);
    WORKER_REPOSITORY_TOKEN.bind(this, repositories.workers);
    TENANT_REQUEST_REPOSITORY_TOKEN.bind(this, repositories.requests);
    this.repositories = repositories;

    this.startedAt = Date.now();
    this._state = TransactionState.Active;
    this.logger.debug('Unit of work started', { unitOfWorkId: this.id });
  }

  /**
   * Called by repositories. A second save of the same aggregate replaces the
   * first but keeps its expected version.
   */
  stage(write: StagedWrite, events: readonly IDomainEvent[]): void {
    const earlier = this.writes.get(write.key);
    if (earlier !== undefined && earlier.expectedVersion !== write.expectedVersion) {
      throw new UnitOfWorkStateException(
        this.id,
        this._state,
        `${write.collection} ${write.id} was staged twice at different versions`,
      );
    }
    this.writes.set(write.key, write);
    this.bufferedEvents.push(...events);
  }

  async commit(): Promise<TransactionResult> {
    this.ensureActive('commit');
    this._state = TransactionState.Committing;

    const writes = [...this.writes.values()];
    const events = this.bufferedEvents;
    const applied: StagedWrite[] = [];

    try {
      for (const write of writes) {
        write.verify();
      }
      for (const write of writes) {
        write.apply();
        applied.push(write);
      }
    } catch (error) {
      for (const write of applied.reverse()) {
        write.revert();
      }
      this._state = TransactionState.Failed;
      this.reset();
      this.logger.warn('Unit of work commit failed', {
        unitOfWorkId: this.id,
        stagedWrites: writes.length,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }

    for (const write of writes) {
      write.complete();
    }
    this._state = TransactionState.Committed;
    this.reset();

    const result = this.result(true, writes.length, events.length);
    this.logger.debug('Unit of work committed', {
      unitOfWorkId: this.id,
      affectedCount: result.affectedCount,
      publishedEvents: result.publishedEvents,
    });

    // writes are durable from here; a handler failure does not undo them
    await this.eventBus.publishAll(events);
    return result;
  }

  async rollback(): Promise<TransactionResult> {
    this.ensureActive('rollback');
    const discarded = this.writes.size;
    this._state = TransactionState.RolledBack;
    this.reset();
    this.logger.debug('Unit of work rolled back', {
      unitOfWorkId: this.id,
      discardedWrites: discarded,
    });
    return this.result(true, 0, 0);
  }

  getRepository<TRepository>(token: RepositoryToken<TRepository>): TRepository {
    this.ensureActive(`resolve ${token.name}`);
    const repository = token.resolve(this);
    if (repository === undefined) {
      throw new UnitOfWorkStateException(this.id, this._state, `${token.name} is not registered`);
    }
    return repository;
  }

  hasRepository<TRepository>(token: RepositoryToken<TRepository>): boolean {
    return token.resolve(this) !== undefined;
  }

  async executeInTransaction<TResult>(
    callback: (unitOfWork: IUnitOfWork) => Promise<TResult>,
  ): Promise<TResult> {
    await this.start();
    let result: TResult;
    try {
      result = await callback(this);
    } catch (error) {
      if (this.isActive()) {
        await this.rollback();
      }
      throw error;
    }
    await this.commit();
    return result;
  }

  async dispose(): Promise<void> {
    if (this.isActive()) {
      await this.rollback();
    }
  }

  /**
   * Load the aggregates `relation` points at, through this unit's
   * repositories so staged writes are visible.
   */
  async resolve(
    relation: RelationDefinition,
    values: readonly FieldValue[],
    into: IncludedCollector,
  ): Promise<void> {
    const repositories = this.requireRepositories();
    switch (relation.target) {
      case 'Property':
        into.Property.push(
          ...(await repositories.properties.findByField(relation.foreignField, values)),
        );
        return;
      case 'Worker':
        into.Worker.push(...(await repositories.workers.findByField(relation.foreignField, values)));
        return;
      case 'TenantRequest':
        into.TenantRequest.push(
          ...(await repositories.requests.findByField(relation.foreignField, values)),
        );
        return;
    }
  }

  private requireRepositories(): Repositories {
    if (this.repositories === undefined) {
      throw new UnitOfWorkStateException(this.id, this._state, 'Transaction not started');
    }
    return this.repositories;
  }

  private ensureActive(operation: string): void {
    if (!this.isActive()) {
      throw new UnitOfWorkStateException(
        this.id,
        this._state,
        `Cannot ${operation}: no active transaction (state ${this._state})`,
      );
    }
  }

  private reset(): void {
    this.writes = new Map();
    this.bufferedEvents = [];
  }

  private result(success: boolean, affectedCount: number, publishedEvents: number): TransactionResult {
    return {
      success,
      duration: Date.now() - this.startedAt,
      affectedCount,
      publishedEvents,
      correlationId: OperationContext.current()?.correlationId,
    };
  }
}

/**
 * Creates units of work over one shared store and event bus.
 *
 * @example
 * ```typescript
 * const store = new InMemoryRecordStore();
 * const factory = new InMemoryUnitOfWorkFactory(store, new InMemoryEventBus(logger), logger);
 * await factory.create().executeInTransaction(async (uow) => { ... });
 * ```
 */
export class InMemoryUnitOfWorkFactory implements IUnitOfWorkFactory {
  constructor(
    readonly store: InMemoryRecordStore,
    private readonly eventBus: IEventBus,
    private readonly logger: ILogger = noopLogger,
  ) {}

  create(): InMemoryUnitOfWork {
    return new InMemoryUnitOfWork(this.store, this.eventBus, this.logger);
  }
}
