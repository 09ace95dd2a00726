/**
 * rental-repairs-core - In-Memory Collection Definitions
 *
 * The queryable fields, operators and relations of each collection, and how
 * each aggregate maps to and from its stored snapshot.
 */

import type { AggregateName } from '../../domain/exceptions';
import { Property } from '../../domain/property';
import type { ComparisonOperator } from '../../domain/specification';
import { TenantRequest } from '../../domain/tenant-request';
import { Worker } from '../../domain/worker';
import type { SnapshotMap } from './InMemoryRecordStore';
import type { CollectionDefinition } from './SpecificationCompiler';

const ALL_OPERATORS: readonly ComparisonOperator[] = [
  'eq',
  'neq',
  'in',
  'lt',
  'lte',
  'gt',
  'gte',
  'contains',
  'isNull',
];

export const PROPERTY_COLLECTION: CollectionDefinition = {
  name: 'Property',
  fields: [
    'id',
    'code',
    'name',
    'city',
    'managerId',
    'isActive',
    'units',
    'requestIds',
    'registeredAt',
  ],
  operators: ALL_OPERATORS,
  relations: {
    requests: { target: 'TenantRequest', localField: 'id', foreignField: 'propertyId' },
  },
};

export const WORKER_COLLECTION: CollectionDefinition = {
  name: 'Worker',
  fields: [
    'id',
    'email',
    'fullName',
    'specialization',
    'isActive',
    'isAvailable',
    'activeAssignmentCount',
    'assignedRequestIds',
    'registeredAt',
  ],
  operators: ALL_OPERATORS,
  relations: {
    assignments: { target: 'TenantRequest', localField: 'id', foreignField: 'assignedWorkerId' },
  },
};

export const TENANT_REQUEST_COLLECTION: CollectionDefinition = {
  name: 'TenantRequest',
  fields: [
    'id',
    'propertyId',
    'tenantId',
    'unitNumber',
    'title',
    'requiredSpecialization',
    'urgency',
    'status',
    'assignedWorkerId',
    'createdAt',
    'updatedAt',
    'dueAt',
    'assignedAt',
    'completedAt',
    'closedAt',
  ],
  operators: ALL_OPERATORS,
  relations: {
    property: { target: 'Property', localField: 'propertyId', foreignField: 'id' },
    assignedWorker: { target: 'Worker', localField: 'assignedWorkerId', foreignField: 'id' },
  },
};

/**
 * Conversion between an aggregate and its stored snapshot.
 */
export interface AggregateMapping<K extends AggregateName, T> {
  readonly collection: K;
  readonly definition: CollectionDefinition;
  toSnapshot(aggregate: T): SnapshotMap[K];
  fromSnapshot(snapshot: SnapshotMap[K], version: number): T;
}

export const PROPERTY_MAPPING: AggregateMapping<'Property', Property> = {
  collection: 'Property',
  definition: PROPERTY_COLLECTION,
  toSnapshot: (property) => property.toSnapshot(),
  fromSnapshot: (snapshot, version) => Property.fromSnapshot(snapshot, version),
};

export const WORKER_MAPPING: AggregateMapping<'Worker', Worker> = {
  collection: 'Worker',
  definition: WORKER_COLLECTION,
  toSnapshot: (worker) => worker.toSnapshot(),
  fromSnapshot: (snapshot, version) => Worker.fromSnapshot(snapshot, version),
};

export const TENANT_REQUEST_MAPPING: AggregateMapping<'TenantRequest', TenantRequest> = {
  collection: 'TenantRequest',
  definition: TENANT_REQUEST_COLLECTION,
  toSnapshot: (request) => request.toSnapshot(),
  fromSnapshot: (snapshot, version) => TenantRequest.fromSnapshot(snapshot, version),
};
