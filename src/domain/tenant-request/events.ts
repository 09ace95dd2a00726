/**
 * rental-repairs-core - TenantRequest Events
 *
 * Payloads are plain data so a notification handler can render a message
 * without loading the aggregate.
 */

import { DomainEvent } from '../events';
import { WorkerSpecialization } from '../specialization';
import { TenantRequestStatus } from './TenantRequestStatus';
import { TenantRequestUrgency } from './TenantRequestUrgency';

export interface RequestCreatedPayload {
  requestId: string;
  propertyId: string;
  tenantId: string;
  unitNumber: string;
  title: string | null;
  description: string;
  requiredSpecialization: WorkerSpecialization;
  urgency: TenantRequestUrgency;
}

export class RequestCreated extends DomainEvent<RequestCreatedPayload> {
  readonly eventName = 'RequestCreated';
}

export interface RequestStatusChangedPayload {
  requestId: string;
  propertyId: string;
  tenantId: string;
  from: TenantRequestStatus;
  to: TenantRequestStatus;
  actorId: string;
  reason: string | null;
  assignedWorkerId: string | null;
}

export class RequestStatusChanged extends DomainEvent<RequestStatusChangedPayload> {
  readonly eventName = 'RequestStatusChanged';
}

export interface WorkerAssignedPayload {
  requestId: string;
  propertyId: string;
  workerId: string;
  previousWorkerId: string | null;
  requiredSpecialization: WorkerSpecialization;
  assignedAt: string;
}

export class WorkerAssigned extends DomainEvent<WorkerAssignedPayload> {
  readonly eventName = 'WorkerAssigned';
}
