/**
 * rental-repairs-core - In-Memory Adapter
 *
 * @module infrastructure/memory
 */

export { InMemoryRecordStore } from './InMemoryRecordStore';
export type { SnapshotMap, StoredRecord } from './InMemoryRecordStore';

export { SpecificationCompiler, evaluateFilter } from './SpecificationCompiler';
export type {
  CollectionDefinition,
  RelationDefinition,
  CompiledInclude,
  CompiledQuery,
} from './SpecificationCompiler';

export {
  PROPERTY_COLLECTION,
  WORKER_COLLECTION,
  TENANT_REQUEST_COLLECTION,
  PROPERTY_MAPPING,
  WORKER_MAPPING,
  TENANT_REQUEST_MAPPING,
} from './collections';
export type { AggregateMapping } from './collections';

export { InMemoryRepository } from './InMemoryRepository';
export type {
  StagedWrite,
  StagingSession,
  RelationResolver,
  IncludedCollector,
} from './InMemoryRepository';

export {
  InMemoryPropertyRepository,
  InMemoryWorkerRepository,
  InMemoryTenantRequestRepository,
} from './repositories';

export { InMemoryUnitOfWork, InMemoryUnitOfWorkFactory } from './InMemoryUnitOfWork';
export { InMemoryEventBus, ALL_EVENTS } from './InMemoryEventBus';
