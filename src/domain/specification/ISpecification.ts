/**
 * rental-repairs-core - Specification Pattern
 *
 * Encapsulates business rules as composable, reusable predicates that also
 * carry ordering, includes and paging. The same specification filters an
 * in-memory collection (tests, domain checks) and compiles to a store query
 * through a visitor.
 *
 * @module domain/specification/ISpecification
 * @see {@link https://martinfowler.com/apsupp/spec.pdf | Specification Pattern}
 */

import { ValidationException } from '../exceptions';
import {
  ComparisonOperand,
  ComparisonOperator,
  FieldKey,
  FieldValue,
  FilterExpression,
  matchesComparison,
} from './FilterExpression';

export type SortDirection = 'asc' | 'desc';

/**
 * One ordering key.
 */
export interface SortOrder {
  readonly field: string;
  readonly direction: SortDirection;
}

/**
 * Offset paging applied after filtering and ordering.
 */
export interface PageRequest {
  readonly skip: number;
  readonly take: number;
}

/**
 * ISpecification - Core specification interface for domain rules.
 *
 * @template T - The type of entity this specification applies to
 *
 * @example
 * ```typescript
 * const plumbersWithRoom = WorkerSpecifications.bySpecialization(WorkerSpecialization.Plumbing)
 *   .and(WorkerSpecifications.available())
 *   .orderBy('email');
 *
 * const inMemory = workers.filter((w) => plumbersWithRoom.isSatisfiedBy(w));
 * const fromStore = await workerRepository.find(plumbersWithRoom);
 * ```
 */
export interface ISpecification<T> {
  /**
   * Check if the candidate satisfies this specification. Pure.
   */
  isSatisfiedBy(candidate: T): boolean;

  /**
   * Logical AND. The right operand is not evaluated when the left fails.
   */
  and(other: ISpecification<T>): ISpecification<T>;

  /**
   * Logical OR. The right operand is not evaluated when the left holds.
   */
  or(other: ISpecification<T>): ISpecification<T>;

  /**
   * Logical NOT.
   */
  not(): ISpecification<T>;

  /** Ordering keys, first key most significant */
  readonly ordering: readonly SortOrder[];

  /** Related aggregates the store should load alongside matches */
  readonly includes: readonly string[];

  /** Paging, if any */
  readonly paging: PageRequest | undefined;

  /**
   * Append an ordering key. Returns a new specification.
   */
  orderBy(field: string, direction?: SortDirection): ISpecification<T>;

  /**
   * Request related aggregates. Returns a new specification.
   */
  include(...relations: string[]): ISpecification<T>;

  /**
   * Restrict results to one page. Returns a new specification.
   */
  page(skip: number, take: number): ISpecification<T>;

  /**
   * Walk the predicate tree with a visitor.
   */
  accept<TResult>(visitor: ISpecificationVisitor<T, TResult>): TResult;
}

/**
 * Specification that can be converted to a query expression.
 *
 * @template T - The type of entity this specification applies to
 * @template TExpression - The query expression type
 */
export interface IQueryableSpecification<T, TExpression = FilterExpression>
  extends ISpecification<T> {
  /**
   * Convert this leaf to a store-neutral expression.
   */
  toExpression(): TExpression;
}

/**
 * Specification visitor interface for expression building.
 *
 * Composite nodes are visited bottom-up: `visitAnd` receives the results of
 * visiting both operands.
 *
 * @template T - The entity type
 * @template TResult - The result type produced by the visitor
 */
export interface ISpecificationVisitor<T, TResult> {
  visitAnd(left: TResult, right: TResult): TResult;

  visitOr(left: TResult, right: TResult): TResult;

  visitNot(expression: TResult): TResult;

  /**
   * Visit a leaf (non-composite) specification.
   */
  visitLeaf(spec: ISpecification<T>): TResult;
}

/**
 * Type guard for leaves that can be translated to a store expression.
 */
export function isQueryableSpecification<T>(
  spec: ISpecification<T>,
): spec is IQueryableSpecification<T> {
  return 'toExpression' in spec && typeof spec.toExpression === 'function';
}

interface SpecificationShape {
  ordering: readonly SortOrder[];
  includes: readonly string[];
  paging: PageRequest | undefined;
}

/**
 * Abstract base class with default combinator and shaping implementations.
 * Subclasses only implement `isSatisfiedBy` (and `toExpression` when they
 * should be usable against a store).
 *
 * @example
 * ```typescript
 * class PostalCodePrefixSpecification extends SpecificationBase<Property> {
 *   constructor(private readonly prefix: string) {
 *     super();
 *   }
 *
 *   isSatisfiedBy(property: Property): boolean {
 *     return property.postalCode.startsWith(this.prefix);
 *   }
 * }
 * ```
 */
export abstract class SpecificationBase<T> implements ISpecification<T> {
  abstract isSatisfiedBy(candidate: T): boolean;

  get ordering(): readonly SortOrder[] {
    return [];
  }

  get includes(): readonly string[] {
    return [];
  }

  get paging(): PageRequest | undefined {
    return undefined;
  }

  and(other: ISpecification<T>): ISpecification<T> {
    return new AndSpecification<T>(this, other);
  }

  or(other: ISpecification<T>): ISpecification<T> {
    return new OrSpecification<T>(this, other);
  }

  not(): ISpecification<T> {
    return new NotSpecification<T>(this);
  }

  orderBy(field: string, direction: SortDirection = 'asc'): ISpecification<T> {
    return new ShapedSpecification<T>(this, {
      ordering: [...this.ordering, { field, direction }],
      includes: this.includes,
      paging: this.paging,
    });
  }

  include(...relations: string[]): ISpecification<T> {
    return new ShapedSpecification<T>(this, {
      ordering: this.ordering,
      includes: mergeIncludes(this.includes, relations),
      paging: this.paging,
    });
  }

  page(skip: number, take: number): ISpecification<T> {
    const errors: Record<string, string[]> = {};
    if (!Number.isInteger(skip) || skip < 0) {
      errors.skip = ['must be a non-negative integer'];
    }
    if (!Number.isInteger(take) || take < 1) {
      errors.take = ['must be a positive integer'];
    }
    if (Object.keys(errors).length > 0) {
      throw new ValidationException('Invalid page request', errors);
    }
    return new ShapedSpecification<T>(this, {
      ordering: this.ordering,
      includes: this.includes,
      paging: { skip, take },
    });
  }

  /**
   * Leaves visit themselves; composites override.
   */
  accept<TResult>(visitor: ISpecificationVisitor<T, TResult>): TResult {
    return visitor.visitLeaf(this);
  }
}

function mergeIncludes(left: readonly string[], right: readonly string[]): readonly string[] {
  return [...new Set([...left, ...right])];
}

/**
 * Wraps a specification with ordering, includes and paging. The predicate is
 * the wrapped one.
 *
 * @internal
 */
class ShapedSpecification<T> extends SpecificationBase<T> {
  constructor(
    private readonly inner: ISpecification<T>,
    private readonly shape: SpecificationShape,
  ) {
    super();
  }

  override get ordering(): readonly SortOrder[] {
    return this.shape.ordering;
  }

  override get includes(): readonly string[] {
    return this.shape.includes;
  }

  override get paging(): PageRequest | undefined {
    return this.shape.paging;
  }

  isSatisfiedBy(candidate: T): boolean {
    return this.inner.isSatisfiedBy(candidate);
  }

  override accept<TResult>(visitor: ISpecificationVisitor<T, TResult>): TResult {
    return this.inner.accept(visitor);
  }
}

/**
 * AND composite specification.
 *
 * Keeps the left operand's ordering when it has one, otherwise the right's.
 * Includes are merged; paging is dropped.
 */
export class AndSpecification<T> extends SpecificationBase<T> {
  constructor(
    readonly left: ISpecification<T>,
    readonly right: ISpecification<T>,
  ) {
    super();
  }

  override get ordering(): readonly SortOrder[] {
    return this.left.ordering.length > 0 ? this.left.ordering : this.right.ordering;
  }

  override get includes(): readonly string[] {
    return mergeIncludes(this.left.includes, this.right.includes);
  }

  isSatisfiedBy(candidate: T): boolean {
    return this.left.isSatisfiedBy(candidate) && this.right.isSatisfiedBy(candidate);
  }

  override accept<TResult>(visitor: ISpecificationVisitor<T, TResult>): TResult {
    return visitor.visitAnd(this.left.accept(visitor), this.right.accept(visitor));
  }
}

/**
 * OR composite specification. Shaping rules match {@link AndSpecification}.
 */
export class OrSpecification<T> extends SpecificationBase<T> {
  constructor(
    readonly left: ISpecification<T>,
    readonly right: ISpecification<T>,
  ) {
    super();
  }

  override get ordering(): readonly SortOrder[] {
    return this.left.ordering.length > 0 ? this.left.ordering : this.right.ordering;
  }

  override get includes(): readonly string[] {
    return mergeIncludes(this.left.includes, this.right.includes);
  }

  isSatisfiedBy(candidate: T): boolean {
    return this.left.isSatisfiedBy(candidate) || this.right.isSatisfiedBy(candidate);
  }

  override accept<TResult>(visitor: ISpecificationVisitor<T, TResult>): TResult {
    return visitor.visitOr(this.left.accept(visitor), this.right.accept(visitor));
  }
}

/**
 * NOT specification decorator. Keeps the wrapped ordering and includes.
 */
export class NotSpecification<T> extends SpecificationBase<T> {
  constructor(readonly wrapped: ISpecification<T>) {
    super();
  }

  override get ordering(): readonly SortOrder[] {
    return this.wrapped.ordering;
  }

  override get includes(): readonly string[] {
    return this.wrapped.includes;
  }

  isSatisfiedBy(candidate: T): boolean {
    return !this.wrapped.isSatisfiedBy(candidate);
  }

  override accept<TResult>(visitor: ISpecificationVisitor<T, TResult>): TResult {
    return visitor.visitNot(this.wrapped.accept(visitor));
  }
}

/**
 * Leaf comparing one field of the candidate with an operand.
 */
export class FieldSpecification<T extends object>
  extends SpecificationBase<T>
  implements IQueryableSpecification<T>
{
  constructor(
    readonly field: FieldKey<T>,
    readonly operator: ComparisonOperator,
    readonly operand: ComparisonOperand,
  ) {
    super();
  }

  isSatisfiedBy(candidate: T): boolean {
    const actual: unknown = Reflect.get(candidate, this.field);
    return matchesComparison(actual, this.operator, this.operand);
  }

  toExpression(): FilterExpression {
    return { kind: 'comparison', field: this.field, operator: this.operator, value: this.operand };
  }
}

/**
 * Leaf that is always (or never) satisfied.
 *
 * @internal
 */
class ConstantSpecification<T> extends SpecificationBase<T> implements IQueryableSpecification<T> {
  constructor(private readonly value: boolean) {
    super();
  }

  isSatisfiedBy(): boolean {
    return this.value;
  }

  toExpression(): FilterExpression {
    return { kind: 'constant', value: this.value };
  }
}

/**
 * Predicate-based leaf. Usable in memory only; store adapters reject it at
 * compile time.
 *
 * @internal
 */
class PredicateSpecification<T> extends SpecificationBase<T> {
  constructor(private readonly predicate: (candidate: T) => boolean) {
    super();
  }

  isSatisfiedBy(candidate: T): boolean {
    return this.predicate(candidate);
  }
}

/**
 * Fluent builder for field leaves.
 *
 * @example
 * ```typescript
 * Specifications.field<TenantRequest>('urgency').in([TenantRequestUrgency.Critical, TenantRequestUrgency.Emergency]);
 * ```
 */
export class FieldCriteria<T extends object> {
  constructor(private readonly field: FieldKey<T>) {}

  equals(value: FieldValue): ISpecification<T> {
    return new FieldSpecification<T>(this.field, 'eq', value);
  }

  notEquals(value: FieldValue): ISpecification<T> {
    return new FieldSpecification<T>(this.field, 'neq', value);
  }

  in(values: readonly FieldValue[]): ISpecification<T> {
    return new FieldSpecification<T>(this.field, 'in', [...values]);
  }

  lessThan(value: number | string | Date): ISpecification<T> {
    return new FieldSpecification<T>(this.field, 'lt', value);
  }

  lessThanOrEqual(value: number | string | Date): ISpecification<T> {
    return new FieldSpecification<T>(this.field, 'lte', value);
  }

  greaterThan(value: number | string | Date): ISpecification<T> {
    return new FieldSpecification<T>(this.field, 'gt', value);
  }

  greaterThanOrEqual(value: number | string | Date): ISpecification<T> {
    return new FieldSpecification<T>(this.field, 'gte', value);
  }

  /** Array field holds `value`, or string field contains it as a substring */
  contains(value: FieldValue): ISpecification<T> {
    return new FieldSpecification<T>(this.field, 'contains', value);
  }

  isNull(): ISpecification<T> {
    return new FieldSpecification<T>(this.field, 'isNull', null);
  }
}

/**
 * Factory functions for creating common specifications.
 */
export const Specifications = {
  /**
   * Specification from a predicate function. In-memory only.
   */
  where<T>(predicate: (candidate: T) => boolean): ISpecification<T> {
    return new PredicateSpecification(predicate);
  },

  /**
   * Start a field comparison.
   */
  field<T extends object>(field: FieldKey<T>): FieldCriteria<T> {
    return new FieldCriteria<T>(field);
  },

  /**
   * Specification that matches everything.
   */
  all<T>(): ISpecification<T> {
    return new ConstantSpecification<T>(true);
  },

  /**
   * Specification that matches nothing.
   */
  none<T>(): ISpecification<T> {
    return new ConstantSpecification<T>(false);
  },

  /**
   * Combine specifications with AND, left to right. Empty input matches all.
   */
  and<T>(...specs: ISpecification<T>[]): ISpecification<T> {
    const [first, ...rest] = specs;
    if (first === undefined) {
      return new ConstantSpecification<T>(true);
    }
    return rest.reduce((acc, spec) => acc.and(spec), first);
  },

  /**
   * Combine specifications with OR, left to right. Empty input matches none.
   */
  or<T>(...specs: ISpecification<T>[]): ISpecification<T> {
    const [first, ...rest] = specs;
    if (first === undefined) {
      return new ConstantSpecification<T>(false);
    }
    return rest.reduce((acc, spec) => acc.or(spec), first);
  },
};
