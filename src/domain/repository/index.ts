/**
 * @fileoverview Domain Repository Layer Exports
 * @description
 * This module exports all repository-related abstractions including
 * the Unit of Work pattern for transaction management.
 *
 * @packageDocumentation
 * @module rental-repairs-core/domain/repository
 */

// Unit of Work Pattern
export {
  // Enums
  TransactionState,

  // Tokens
  RepositoryToken,
  PROPERTY_REPOSITORY_TOKEN,
  WORKER_REPOSITORY_TOKEN,
  TENANT_REQUEST_REPOSITORY_TOKEN,
} from './IUnitOfWork';

export type {
  // Main interfaces
  IUnitOfWork,
  IUnitOfWorkFactory,

  // Types
  TransactionResult,
} from './IUnitOfWork';

// Repositories
export type {
  IRepository,
  IPropertyRepository,
  IWorkerRepository,
  ITenantRequestRepository,
  IncludedAggregates,
  QueryResult,
} from './IRepository';
