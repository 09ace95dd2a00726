/**
 * rental-repairs-core - Named TenantRequest Specifications
 *
 * Built only from field leaves and composition, so every one of them runs in
 * memory and compiles to a store query.
 */

import { FieldCriteria, FieldKey, ISpecification, Specifications } from '../specification';
import { WorkerSpecialization } from '../specialization';
import type { TenantRequest } from './TenantRequest';
import { OPEN_STATUSES, TenantRequestStatus } from './TenantRequestStatus';
import { TenantRequestUrgency } from './TenantRequestUrgency';

function field(name: FieldKey<TenantRequest>): FieldCriteria<TenantRequest> {
  return Specifications.field<TenantRequest>(name);
}

export const TenantRequestSpecifications = {
  byId(id: string): ISpecification<TenantRequest> {
    return field('id').equals(id);
  },

  byStatus(status: TenantRequestStatus): ISpecification<TenantRequest> {
    return field('status').equals(status);
  },

  byStatuses(statuses: readonly TenantRequestStatus[]): ISpecification<TenantRequest> {
    return field('status').in(statuses);
  },

  forProperty(propertyId: string): ISpecification<TenantRequest> {
    return field('propertyId').equals(propertyId);
  },

  filedBy(tenantId: string): ISpecification<TenantRequest> {
    return field('tenantId').equals(tenantId);
  },

  assignedTo(workerId: string): ISpecification<TenantRequest> {
    return field('assignedWorkerId').equals(workerId);
  },

  byUrgency(urgency: TenantRequestUrgency): ISpecification<TenantRequest> {
    return field('urgency').equals(urgency);
  },

  /** Not Completed and not Declined */
  open(): ISpecification<TenantRequest> {
    return field('status').in(OPEN_STATUSES);
  },

  requiringSpecialization(specialization: WorkerSpecialization): ISpecification<TenantRequest> {
    return field('requiredSpecialization').equals(specialization);
  },

  /**
   * Open requests whose urgency-dependent resolution deadline has passed.
   */
  overdue(now: Date): ISpecification<TenantRequest> {
    return TenantRequestSpecifications.open().and(field('dueAt').lessThan(now));
  },

  /**
   * Requests the worker currently holds (Assigned or InProgress).
   */
  activeFor(workerId: string): ISpecification<TenantRequest> {
    return TenantRequestSpecifications.assignedTo(workerId).and(
      TenantRequestSpecifications.byStatuses([
        TenantRequestStatus.Assigned,
        TenantRequestStatus.InProgress,
      ]),
    );
  },
};
