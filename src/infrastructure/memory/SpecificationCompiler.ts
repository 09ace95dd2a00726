/**
 * rental-repairs-core - Specification Compiler (in-memory adapter)
 *
 * Translates a specification into the store-neutral {@link FilterExpression}
 * plus ordering, includes and paging, and checks every field, operator and
 * relation against the collection definition. Anything the collection cannot
 * express fails here, before a query runs.
 *
 * @module infrastructure/memory/SpecificationCompiler
 */

import { AggregateName, UnsupportedSpecificationException } from '../../domain/exceptions';
import {
  ComparisonOperator,
  FilterExpression,
  ISpecification,
  ISpecificationVisitor,
  PageRequest,
  SortOrder,
  isQueryableSpecification,
  matchesComparison,
} from '../../domain/specification';

/**
 * Relation from one collection to another: records of `target` whose
 * `foreignField` equals this record's `localField`.
 */
export interface RelationDefinition {
  readonly target: AggregateName;
  readonly localField: string;
  readonly foreignField: string;
}

/**
 * What the store can filter, sort and include for one collection.
 */
export interface CollectionDefinition {
  readonly name: AggregateName;
  readonly fields: readonly string[];
  readonly operators: readonly ComparisonOperator[];
  readonly relations: Readonly<Record<string, RelationDefinition>>;
}

export interface CompiledInclude {
  readonly name: string;
  readonly relation: RelationDefinition;
}

export interface CompiledQuery {
  readonly filter: FilterExpression;
  readonly ordering: readonly SortOrder[];
  readonly includes: readonly CompiledInclude[];
  readonly paging: PageRequest | undefined;
}

export class SpecificationCompiler<T> implements ISpecificationVisitor<T, FilterExpression> {
  private readonly adapter: string;

  constructor(private readonly definition: CollectionDefinition) {
    this.adapter = `in-memory:${definition.name}`;
  }

  /**
   * @throws UnsupportedSpecificationException
   */
  compile(specification: ISpecification<T>): CompiledQuery {
    const filter = specification.accept(this);

    for (const order of specification.ordering) {
      this.ensureField(order.field, 'order by');
    }

    const includes = specification.includes.map((name): CompiledInclude => {
      const relation = this.definition.relations[name];
      if (relation === undefined) {
        throw new UnsupportedSpecificationException(
          this.adapter,
          `unknown relation "${name}"; known relations: ` +
            this.describe(Object.keys(this.definition.relations)),
        );
      }
      return { name, relation };
    });

    return { filter, ordering: specification.ordering, includes, paging: specification.paging };
  }

  visitAnd(left: FilterExpression, right: FilterExpression): FilterExpression {
    return { kind: 'and', left, right };
  }

  visitOr(left: FilterExpression, right: FilterExpression): FilterExpression {
    return { kind: 'or', left, right };
  }

  visitNot(expression: FilterExpression): FilterExpression {
    return { kind: 'not', operand: expression };
  }

  visitLeaf(spec: ISpecification<T>): FilterExpression {
    if (!isQueryableSpecification(spec)) {
      throw new UnsupportedSpecificationException(
        this.adapter,
        `${spec.constructor.name} has no query translation; use field criteria instead of predicates`,
      );
    }
    const expression = spec.toExpression();
    this.validate(expression);
    return expression;
  }

  private validate(expression: FilterExpression): void {
    switch (expression.kind) {
      case 'and':
      case 'or':
        this.validate(expression.left);
        this.validate(expression.right);
        return;
      case 'not':
        this.validate(expression.operand);
        return;
      case 'constant':
        return;
      case 'comparison':
        this.ensureField(expression.field, 'filter on');
        if (!this.definition.operators.includes(expression.operator)) {
          throw new UnsupportedSpecificationException(
            this.adapter,
            `operator "${expression.operator}" is not supported; supported operators: ` +
              this.describe(this.definition.operators),
          );
        }
        return;
    }
  }

  private ensureField(field: string, use: string): void {
    if (!this.definition.fields.includes(field)) {
      throw new UnsupportedSpecificationException(
        this.adapter,
        `cannot ${use} field "${field}"; queryable fields: ${this.describe(this.definition.fields)}`,
      );
    }
  }

  private describe(values: readonly string[]): string {
    return values.length > 0 ? values.join(', ') : 'none';
  }
}

/**
 * Evaluate a compiled filter against a stored record.
 */
export function evaluateFilter(expression: FilterExpression, record: object): boolean {
  switch (expression.kind) {
    case 'and':
      return evaluateFilter(expression.left, record) && evaluateFilter(expression.right, record);
    case 'or':
      return evaluateFilter(expression.left, record) || evaluateFilter(expression.right, record);
    case 'not':
      return !evaluateFilter(expression.operand, record);
    case 'constant':
      return expression.value;
    case 'comparison': {
      const actual: unknown = Reflect.get(record, expression.field);
      return matchesComparison(actual, expression.operator, expression.value);
    }
  }
}
