/**
 * rental-repairs-core - Repository Contracts
 *
 * Per-aggregate persistence ports. The core depends only on these shapes;
 * store adapters live in infrastructure.
 *
 * @module domain/repository/IRepository
 */

import type { Property } from '../property';
import type { ISpecification } from '../specification';
import type { TenantRequest } from '../tenant-request';
import type { Worker } from '../worker';

/**
 * Aggregates loaded for a specification's `include(...)` relations, grouped
 * by aggregate type.
 */
export interface IncludedAggregates {
  readonly Property: readonly Property[];
  readonly Worker: readonly Worker[];
  readonly TenantRequest: readonly TenantRequest[];
}

export interface QueryResult<T> {
  /** The requested page (all matches when the specification has no paging) */
  readonly items: readonly T[];

  /** Number of matches before paging */
  readonly total: number;

  readonly included: IncludedAggregates;
}

/**
 * Generic repository for one aggregate type.
 *
 * @template T - Aggregate root type
 *
 * @example
 * ```typescript
 * const plumbers = await workers.find(
 *   WorkerSpecifications.bySpecialization(WorkerSpecialization.Plumbing).orderBy('email'),
 * );
 * ```
 */
export interface IRepository<T> {
  /**
   * Load by id. Resolves undefined when absent.
   */
  get(id: string): Promise<T | undefined>;

  /**
   * Register a new aggregate.
   *
   * @throws ConcurrencyException when the id already exists
   */
  add(aggregate: T): Promise<void>;

  /**
   * Save changes to an aggregate loaded from this repository.
   *
   * @throws ConcurrencyException when the stored version differs from the
   *   version the aggregate was loaded at
   */
  update(aggregate: T): Promise<void>;

  /**
   * Matching aggregates, ordered and paged as the specification says.
   *
   * @throws UnsupportedSpecificationException before querying when the store
   *   cannot express the specification
   */
  find(specification: ISpecification<T>): Promise<T[]>;

  /**
   * Number of matches, ignoring paging.
   */
  count(specification: ISpecification<T>): Promise<number>;

  /**
   * Matches plus total and included relations.
   */
  query(specification: ISpecification<T>): Promise<QueryResult<T>>;
}

export interface IPropertyRepository extends IRepository<Property> {
  getByCode(code: string): Promise<Property | undefined>;
}

export interface IWorkerRepository extends IRepository<Worker> {
  getByEmail(email: string): Promise<Worker | undefined>;
}

export type ITenantRequestRepository = IRepository<TenantRequest>;
