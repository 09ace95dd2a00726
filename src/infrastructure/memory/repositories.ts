/**
 * rental-repairs-core - In-Memory Aggregate Repositories
 *
 * @module infrastructure/memory/repositories
 */

import type { Property } from '../../domain/property';
import type {
  IPropertyRepository,
  ITenantRequestRepository,
  IWorkerRepository,
} from '../../domain/repository';
import type { TenantRequest } from '../../domain/tenant-request';
import type { Worker } from '../../domain/worker';
import { PROPERTY_MAPPING, TENANT_REQUEST_MAPPING, WORKER_MAPPING } from './collections';
import type { InMemoryRecordStore } from './InMemoryRecordStore';
import { InMemoryRepository, RelationResolver, StagingSession } from './InMemoryRepository';

export class InMemoryPropertyRepository
  extends InMemoryRepository<Property, 'Property'>
  implements IPropertyRepository
{
  constructor(store: InMemoryRecordStore, session: StagingSession, relations: RelationResolver) {
    super(store, session, relations, PROPERTY_MAPPING);
  }

  /**
   * Codes are stored upper-cased; lookup is case-insensitive.
   */
  async getByCode(code: string): Promise<Property | undefined> {
    const [property] = await this.findByField('code', [code.trim().toUpperCase()]);
    return property;
  }
}

export class InMemoryWorkerRepository
  extends InMemoryRepository<Worker, 'Worker'>
  implements IWorkerRepository
{
  constructor(store: InMemoryRecordStore, session: StagingSession, relations: RelationResolver) {
    super(store, session, relations, WORKER_MAPPING);
  }

  async getByEmail(email: string): Promise<Worker | undefined> {
    const [worker] = await this.findByField('email', [email.trim().toLowerCase()]);
    return worker;
  }
}

export class InMemoryTenantRequestRepository
  extends InMemoryRepository<TenantRequest, 'TenantRequest'>
  implements ITenantRequestRepository
{
  constructor(store: InMemoryRecordStore, session: StagingSession, relations: RelationResolver) {
    super(store, session, relations, TENANT_REQUEST_MAPPING);
  }
}
