/**
 * rental-repairs-core - In-Memory Repository
 *
 * Repository bound to one unit of work. Reads see committed records overlaid
 * with this unit's staged writes; writes are staged and only reach the store
 * when the unit commits.
 *
 * @module infrastructure/memory/InMemoryRepository
 */

import type { AggregateRoot, IDomainEvent } from '../../domain/events';
import {
  AggregateName,
  ConcurrencyException,
  NotFoundException,
  UnitOfWorkStateException,
} from '../../domain/exceptions';
import type { IRepository, IncludedAggregates, QueryResult } from '../../domain/repository';
import {
  FieldValue,
  ISpecification,
  SortOrder,
  compareValues,
  isDate,
  matchesComparison,
} from '../../domain/specification';
import type { AggregateMapping } from './collections';
import { InMemoryRecordStore, SnapshotMap, StoredRecord } from './InMemoryRecordStore';
import {
  CompiledQuery,
  RelationDefinition,
  SpecificationCompiler,
  evaluateFilter,
} from './SpecificationCompiler';

/**
 * One staged write, as the unit of work sees it. Closures keep the
 * collection-specific types inside the repository.
 */
export interface StagedWrite {
  readonly key: string;
  readonly collection: AggregateName;
  readonly id: string;
  readonly expectedVersion: number;

  /** @throws ConcurrencyException when the stored version moved */
  verify(): void;

  apply(): void;

  /** Undo `apply()`; no-op when it did not run */
  revert(): void;

  /** Tell the aggregate its new version */
  complete(): void;
}

/**
 * The unit-of-work side of staging.
 */
export interface StagingSession {
  readonly unitOfWorkId: string;
  isActive(): boolean;
  stage(write: StagedWrite, events: readonly IDomainEvent[]): void;
}

/**
 * Mutable collector the unit of work fills while resolving includes.
 */
export type IncludedCollector = { -readonly [K in keyof IncludedAggregates]: IncludedAggregates[K][number][] };

/**
 * Loads related aggregates for `include(...)`.
 */
export interface RelationResolver {
  resolve(
    relation: RelationDefinition,
    values: readonly FieldValue[],
    into: IncludedCollector,
  ): Promise<void>;
}

function compareForOrdering(a: unknown, b: unknown): number {
  const aMissing = a === null || a === undefined;
  const bMissing = b === null || b === undefined;
  if (aMissing || bMissing) {
    // nulls last
    return aMissing === bMissing ? 0 : aMissing ? 1 : -1;
  }
  return compareValues(a, b) ?? 0;
}

function isFieldValue(value: unknown): value is FieldValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    isDate(value)
  );
}

export abstract class InMemoryRepository<T extends AggregateRoot, K extends AggregateName>
  implements IRepository<T>
{
  private readonly overlay = new Map<string, StoredRecord<SnapshotMap[K]>>();
  private readonly compiler: SpecificationCompiler<T>;

  protected constructor(
    private readonly store: InMemoryRecordStore,
    private readonly session: StagingSession,
    private readonly relations: RelationResolver,
    private readonly mapping: AggregateMapping<K, T>,
  ) {
    this.compiler = new SpecificationCompiler<T>(mapping.definition);
  }

  /**
   * Compile without querying, e.g. to check named specifications at startup.
   *
   * @throws UnsupportedSpecificationException
   */
  prepare(specification: ISpecification<T>): CompiledQuery {
    return this.compiler.compile(specification);
  }

  async get(id: string): Promise<T | undefined> {
    const record = this.overlay.get(id) ?? this.store.read(this.mapping.collection, id);
    return record === undefined ? undefined : this.hydrate(record);
  }

  async add(aggregate: T): Promise<void> {
    this.ensureSession();
    const existing = this.overlay.get(aggregate.id) ?? this.store.read(this.mapping.collection, aggregate.id);
    if (existing !== undefined) {
      throw new ConcurrencyException(this.mapping.collection, aggregate.id, null, existing.version);
    }
    this.stage(aggregate, 0);
  }

  async update(aggregate: T): Promise<void> {
    this.ensureSession();
    const current = this.overlay.get(aggregate.id) ?? this.store.read(this.mapping.collection, aggregate.id);
    if (current === undefined) {
      throw new NotFoundException(this.mapping.collection, aggregate.id);
    }
    if (current.version !== aggregate.version) {
      throw new ConcurrencyException(
        this.mapping.collection,
        aggregate.id,
        aggregate.version,
        current.version,
      );
    }
    this.stage(aggregate, aggregate.version);
  }

  async find(specification: ISpecification<T>): Promise<T[]> {
    const { page } = this.select(this.compiler.compile(specification));
    return page.map((record) => this.hydrate(record));
  }

  async count(specification: ISpecification<T>): Promise<number> {
    return this.select(this.compiler.compile(specification)).total;
  }

  async query(specification: ISpecification<T>): Promise<QueryResult<T>> {
    const compiled = this.compiler.compile(specification);
    const { page, total } = this.select(compiled);

    const included: IncludedCollector = { Property: [], Worker: [], TenantRequest: [] };
    for (const include of compiled.includes) {
      const values = this.distinctValues(page, include.relation.localField);
      if (values.length > 0) {
        await this.relations.resolve(include.relation, values, included);
      }
    }

    return { items: page.map((record) => this.hydrate(record)), total, included };
  }

  /**
   * Aggregates whose `field` equals one of `values`. Used to resolve
   * relations from other collections.
   */
  async findByField(field: string, values: readonly FieldValue[]): Promise<T[]> {
    return this.records()
      .filter((record) => {
        const actual: unknown = Reflect.get(record.data, field);
        return matchesComparison(actual, 'in', values);
      })
      .sort((a, b) => compareForOrdering(a.id, b.id))
      .map((record) => this.hydrate(record));
  }

  private select(compiled: CompiledQuery): {
    page: StoredRecord<SnapshotMap[K]>[];
    total: number;
  } {
    const matches = this.records().filter((record) => evaluateFilter(compiled.filter, record.data));
    const sorted = this.sort(matches, compiled.ordering);
    const page =
      compiled.paging === undefined
        ? sorted
        : sorted.slice(compiled.paging.skip, compiled.paging.skip + compiled.paging.take);
    return { page, total: sorted.length };
  }

  /**
   * Committed records with this unit's staged writes laid over them.
   */
  private records(): StoredRecord<SnapshotMap[K]>[] {
    const byId = new Map<string, StoredRecord<SnapshotMap[K]>>();
    for (const record of this.store.scan(this.mapping.collection)) {
      byId.set(record.id, record);
    }
    for (const [id, record] of this.overlay) {
      byId.set(id, record);
    }
    return [...byId.values()];
  }

  private sort(
    records: StoredRecord<SnapshotMap[K]>[],
    ordering: readonly SortOrder[],
  ): StoredRecord<SnapshotMap[K]>[] {
    return [...records].sort((a, b) => {
      for (const order of ordering) {
        const left: unknown = Reflect.get(a.data, order.field);
        const right: unknown = Reflect.get(b.data, order.field);
        const result = compareForOrdering(left, right);
        if (result !== 0) {
          const missing = left === null || left === undefined || right === null || right === undefined;
          return order.direction === 'desc' && !missing ? -result : result;
        }
      }
      // stable tie-break
      return compareForOrdering(a.id, b.id);
    });
  }

  private distinctValues(records: StoredRecord<SnapshotMap[K]>[], field: string): FieldValue[] {
    const values = new Set<FieldValue>();
    for (const record of records) {
      const value: unknown = Reflect.get(record.data, field);
      if (isFieldValue(value) && value !== null) {
        values.add(value);
      }
    }
    return [...values];
  }

  private hydrate(record: StoredRecord<SnapshotMap[K]>): T {
    return this.mapping.fromSnapshot(record.data, record.version);
  }

  private stage(aggregate: T, expectedVersion: number): void {
    const { collection } = this.mapping;
    const id = aggregate.id;
    const data = this.mapping.toSnapshot(aggregate);
    const store = this.store;

    this.overlay.set(id, { id, version: expectedVersion, data });

    let previous: StoredRecord<SnapshotMap[K]> | undefined;
    let applied = false;
    let newVersion = expectedVersion;

    const write: StagedWrite = {
      key: `${collection}:${id}`,
      collection,
      id,
      expectedVersion,
      verify: () => {
        store.check(collection, id, data, expectedVersion);
      },
      apply: () => {
        previous = store.read(collection, id);
        newVersion = store.write(collection, id, data, expectedVersion);
        applied = true;
      },
      revert: () => {
        if (applied) {
          store.restore(collection, id, previous);
          applied = false;
        }
      },
      complete: () => {
        aggregate.markPersisted(newVersion);
      },
    };

    this.session.stage(write, [...aggregate.domainEvents]);
    aggregate.clearEvents();
  }

  private ensureSession(): void {
    if (!this.session.isActive()) {
      throw new UnitOfWorkStateException(
        this.session.unitOfWorkId,
        'inactive',
        `Cannot write ${this.mapping.collection} outside an active unit of work`,
      );
    }
  }
}
