/**
 * rental-repairs-core - Named Worker Specifications
 */

import { FieldCriteria, FieldKey, ISpecification, Specifications } from '../specification';
import { WorkerSpecialization } from '../specialization';
import type { Worker } from './Worker';

function field(name: FieldKey<Worker>): FieldCriteria<Worker> {
  return Specifications.field<Worker>(name);
}

export const WorkerSpecifications = {
  byId(id: string): ISpecification<Worker> {
    return field('id').equals(id);
  },

  bySpecialization(specialization: WorkerSpecialization): ISpecification<Worker> {
    return field('specialization').equals(specialization);
  },

  /** Active and below the cap at the time of the last assignment change */
  available(): ISpecification<Worker> {
    return field('isAvailable').equals(true);
  },

  active(): ISpecification<Worker> {
    return field('isActive').equals(true);
  },

  byEmail(email: string): ISpecification<Worker> {
    return field('email').equals(email.trim().toLowerCase());
  },

  belowCapacity(maxConcurrentAssignments: number): ISpecification<Worker> {
    return field('activeAssignmentCount').lessThan(maxConcurrentAssignments);
  },

  holding(requestId: string): ISpecification<Worker> {
    return field('assignedRequestIds').contains(requestId);
  },

  /**
   * Workers that could take a request needing `required` right now. With
   * `fallbackAllowed`, General workers qualify too.
   */
  eligibleFor(
    required: WorkerSpecialization,
    maxConcurrentAssignments: number,
    fallbackAllowed: boolean,
  ): ISpecification<Worker> {
    const trades =
      fallbackAllowed && required !== WorkerSpecialization.General
        ? [required, WorkerSpecialization.General]
        : [required];
    return WorkerSpecifications.active()
      .and(WorkerSpecifications.belowCapacity(maxConcurrentAssignments))
      .and(field('specialization').in(trades));
  },
};
