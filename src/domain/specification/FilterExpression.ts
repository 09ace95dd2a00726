/**
 * rental-repairs-core - Store-Neutral Filter Expressions
 *
 * The tree a queryable specification translates into. Store adapters turn it
 * into their native filter (SQL WHERE, Mongo filter, in-memory predicate).
 *
 * @module domain/specification/FilterExpression
 */

import { types } from 'util';

/**
 * Scalar values a field comparison can use.
 */
export type FieldValue = string | number | boolean | Date | null;

/**
 * Comparison operators a leaf may use. Adapters declare which they support.
 */
export type ComparisonOperator =
  | 'eq'
  | 'neq'
  | 'in'
  | 'lt'
  | 'lte'
  | 'gt'
  | 'gte'
  | 'contains'
  | 'isNull';

export type ComparisonOperand = FieldValue | readonly FieldValue[];

export type FilterExpression =
  | { readonly kind: 'and'; readonly left: FilterExpression; readonly right: FilterExpression }
  | { readonly kind: 'or'; readonly left: FilterExpression; readonly right: FilterExpression }
  | { readonly kind: 'not'; readonly operand: FilterExpression }
  | {
      readonly kind: 'comparison';
      readonly field: string;
      readonly operator: ComparisonOperator;
      readonly value: ComparisonOperand;
    }
  | { readonly kind: 'constant'; readonly value: boolean };

/**
 * Keys of `T` whose values can appear in a field comparison.
 *
 * Methods and non-scalar members are excluded, so `FieldKey<Worker>` is
 * `'id' | 'email' | 'specialization' | ...` but not `'assign'`.
 */
export type FieldKey<T> = {
  [K in keyof T & string]-?: T[K] extends FieldValue | readonly FieldValue[] | undefined
    ? K
    : never;
}[keyof T & string];

function isFieldValueArray(value: unknown): value is readonly unknown[] {
  return Array.isArray(value);
}

/**
 * Also true for Dates from another realm, which fail `instanceof Date`.
 */
export function isDate(value: unknown): value is Date {
  return types.isDate(value);
}

function sameValue(a: unknown, b: unknown): boolean {
  if (isDate(a) && isDate(b)) {
    return a.getTime() === b.getTime();
  }
  return a === b || (a === undefined && b === null);
}

/**
 * Order two values of the same kind. Returns undefined when they are not
 * comparable (different kinds, null, undefined).
 */
export function compareValues(a: unknown, b: unknown): number | undefined {
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (isDate(a) && isDate(b)) {
    return a.getTime() - b.getTime();
  }
  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return Number(a) - Number(b);
  }
  return undefined;
}

/**
 * Evaluate one comparison. Used by field specifications in memory and by
 * store adapters evaluating compiled expressions, so both agree.
 */
export function matchesComparison(
  actual: unknown,
  operator: ComparisonOperator,
  operand: ComparisonOperand,
): boolean {
  switch (operator) {
    case 'eq':
      return sameValue(actual, operand);
    case 'neq':
      return !sameValue(actual, operand);
    case 'in':
      return isFieldValueArray(operand) && operand.some((candidate) => sameValue(actual, candidate));
    case 'lt':
    case 'lte':
    case 'gt':
    case 'gte': {
      const order = compareValues(actual, operand);
      if (order === undefined) {
        return false;
      }
      if (operator === 'lt') return order < 0;
      if (operator === 'lte') return order <= 0;
      if (operator === 'gt') return order > 0;
      return order >= 0;
    }
    case 'contains':
      if (isFieldValueArray(actual)) {
        return actual.some((item) => sameValue(item, operand));
      }
      return typeof actual === 'string' && typeof operand === 'string' && actual.includes(operand);
    case 'isNull':
      return actual === null || actual === undefined;
  }
}
