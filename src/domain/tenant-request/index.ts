/**
 * @fileoverview TenantRequest Exports
 */

export { TenantRequest, FileRequestSchema } from './TenantRequest';
export type {
  TenantRequestSnapshot,
  StatusChange,
  FileRequestInput,
  NewRequestOrigin,
} from './TenantRequest';

export {
  TenantRequestStatus,
  TenantRequestStatusPolicy,
  TERMINAL_STATUSES,
  OPEN_STATUSES,
} from './TenantRequestStatus';

export {
  TenantRequestUrgency,
  DEFAULT_URGENCY,
  expectedResolutionHours,
  requiresImmediateAttention,
  parseUrgency,
} from './TenantRequestUrgency';

export { TenantRequestSpecifications } from './TenantRequestSpecifications';

export { RequestCreated, RequestStatusChanged, WorkerAssigned } from './events';
export type {
  RequestCreatedPayload,
  RequestStatusChangedPayload,
  WorkerAssignedPayload,
} from './events';
