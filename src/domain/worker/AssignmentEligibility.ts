/**
 * rental-repairs-core - Assignment Eligibility
 *
 * Decides whether one worker may take one request and, if not, why. The
 * fallback decision (may a General worker cover this trade?) is made by the
 * caller and passed in.
 */

import { AssignmentRejectedException, AssignmentRejectionReason } from '../exceptions';
import { canHandle, specializationDisplayName } from '../specialization';
import type { TenantRequest } from '../tenant-request';
import type { Worker } from './Worker';

export interface EligibilityOptions {
  readonly maxConcurrentAssignments: number;
  readonly fallbackAllowed: boolean;
}

export type EligibilityResult =
  | { readonly eligible: true }
  | { readonly eligible: false; readonly reason: AssignmentRejectionReason; readonly message: string };

type EligibilityRequest = Pick<TenantRequest, 'id' | 'requiredSpecialization'>;

type EligibilityWorker = Pick<
  Worker,
  'id' | 'specialization' | 'isActive' | 'activeAssignmentCount' | 'isAssignedTo'
>;

/**
 * Checks run in this order and the first failure is reported: already
 * assigned, specialization mismatch, unavailable (inactive), at capacity.
 */
export function checkAssignmentEligibility(
  worker: EligibilityWorker,
  request: EligibilityRequest,
  options: EligibilityOptions,
): EligibilityResult {
  if (worker.isAssignedTo(request.id)) {
    return {
      eligible: false,
      reason: AssignmentRejectionReason.AlreadyAssigned,
      message: `Worker ${worker.id} is already assigned to request ${request.id}`,
    };
  }

  if (!canHandle(worker.specialization, request.requiredSpecialization, options.fallbackAllowed)) {
    return {
      eligible: false,
      reason: AssignmentRejectionReason.SpecializationMismatch,
      message:
        `Worker ${worker.id} specializes in ${specializationDisplayName(worker.specialization)} ` +
        `but request ${request.id} requires ${specializationDisplayName(request.requiredSpecialization)}`,
    };
  }

  if (!worker.isActive) {
    return {
      eligible: false,
      reason: AssignmentRejectionReason.Unavailable,
      message: `Worker ${worker.id} is not active`,
    };
  }

  if (worker.activeAssignmentCount >= options.maxConcurrentAssignments) {
    return {
      eligible: false,
      reason: AssignmentRejectionReason.AtCapacity,
      message:
        `Worker ${worker.id} already holds ${worker.activeAssignmentCount} of ` +
        `${options.maxConcurrentAssignments} assignments`,
    };
  }

  return { eligible: true };
}

export function canBeAssigned(
  worker: EligibilityWorker,
  request: EligibilityRequest,
  options: EligibilityOptions,
): boolean {
  return checkAssignmentEligibility(worker, request, options).eligible;
}

/**
 * @throws AssignmentRejectedException carrying the failed check
 */
export function assertEligible(
  worker: EligibilityWorker,
  request: EligibilityRequest,
  options: EligibilityOptions,
): void {
  const result = checkAssignmentEligibility(worker, request, options);
  if (!result.eligible) {
    throw new AssignmentRejectedException(result.reason, worker.id, request.id, result.message);
  }
}
