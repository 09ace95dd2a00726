/**
 * rental-repairs-core - Worker Events
 */

import { DomainEvent } from '../events';
import { WorkerSpecialization } from '../specialization';

export interface WorkerRegisteredPayload {
  workerId: string;
  email: string;
  fullName: string;
  specialization: WorkerSpecialization;
}

export class WorkerRegistered extends DomainEvent<WorkerRegisteredPayload> {
  readonly eventName = 'WorkerRegistered';
}

/**
 * Why an active assignment ended.
 */
export type AssignmentReleaseReason = 'completed' | 'declined' | 'escalated' | 'reassigned';

export interface WorkerUnassignedPayload {
  workerId: string;
  requestId: string;
  reason: AssignmentReleaseReason;
  activeAssignmentCount: number;
  isAvailable: boolean;
}

export class WorkerUnassigned extends DomainEvent<WorkerUnassignedPayload> {
  readonly eventName = 'WorkerUnassigned';
}

export interface WorkerSpecializationChangedPayload {
  workerId: string;
  from: WorkerSpecialization;
  to: WorkerSpecialization;
  changedBy: string;
  reason: string;
}

export class WorkerSpecializationChanged extends DomainEvent<WorkerSpecializationChangedPayload> {
  readonly eventName = 'WorkerSpecializationChanged';
}

export interface WorkerDeactivatedPayload {
  workerId: string;
  reason: string;
}

export class WorkerDeactivated extends DomainEvent<WorkerDeactivatedPayload> {
  readonly eventName = 'WorkerDeactivated';
}

export interface WorkerActivatedPayload {
  workerId: string;
}

export class WorkerActivated extends DomainEvent<WorkerActivatedPayload> {
  readonly eventName = 'WorkerActivated';
}
