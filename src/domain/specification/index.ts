/**
 * @fileoverview Domain Specification Pattern Exports
 * @description
 * This module exports all specification-related abstractions for
 * encapsulating business rules and composable query predicates.
 *
 * The Specification pattern allows you to:
 * - Encapsulate business rules as reusable, testable objects
 * - Compose complex rules using AND, OR, NOT operators
 * - Compile the same rules into a store query
 *
 * @packageDocumentation
 * @module rental-repairs-core/domain/specification
 *
 * @see {@link https://martinfowler.com/apsupp/spec.pdf | Martin Fowler - Specification Pattern}
 */

// Core Specification Interfaces
export {
  // Base classes for implementation
  SpecificationBase,
  AndSpecification,
  OrSpecification,
  NotSpecification,
  FieldSpecification,
  FieldCriteria,

  // Factory utilities
  Specifications,
  isQueryableSpecification,
} from './ISpecification';

export type {
  // Main interface
  ISpecification,

  // Queryable specification for store integration
  IQueryableSpecification,

  // Visitor pattern for traversal
  ISpecificationVisitor,

  // Shaping
  SortDirection,
  SortOrder,
  PageRequest,
} from './ISpecification';

// Store-neutral expression tree
export { compareValues, isDate, matchesComparison } from './FilterExpression';

export type {
  FieldValue,
  FieldKey,
  ComparisonOperator,
  ComparisonOperand,
  FilterExpression,
} from './FilterExpression';
