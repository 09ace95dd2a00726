/**
 * @fileoverview Worker Exports
 */

export {
  Worker,
  RegisterWorkerSchema,
  SpecializationChangeAuditSchema,
} from './Worker';
export type {
  WorkerSnapshot,
  SpecializationChange,
  RegisterWorkerInput,
  SpecializationChangeAudit,
  HeldRequest,
} from './Worker';

export {
  checkAssignmentEligibility,
  canBeAssigned,
  assertEligible,
} from './AssignmentEligibility';
export type { EligibilityOptions, EligibilityResult } from './AssignmentEligibility';

export { WorkerAssignmentService } from './WorkerAssignmentService';
export type { AssignmentServiceOptions } from './WorkerAssignmentService';

export { WorkerSpecifications } from './WorkerSpecifications';

export {
  WorkerRegistered,
  WorkerUnassigned,
  WorkerSpecializationChanged,
  WorkerDeactivated,
  WorkerActivated,
} from './events';
export type {
  AssignmentReleaseReason,
  WorkerRegisteredPayload,
  WorkerUnassignedPayload,
  WorkerSpecializationChangedPayload,
  WorkerDeactivatedPayload,
  WorkerActivatedPayload,
} from './events';
