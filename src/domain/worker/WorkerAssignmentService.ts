/**
 * rental-repairs-core - Worker Assignment Service
 *
 * Domain service for the operations that change a request and a worker
 * together. Every check runs before either aggregate is touched, so a
 * rejection leaves both unchanged. Persisting both in one unit of work is the
 * caller's job.
 *
 * @module domain/worker/WorkerAssignmentService
 */

import type { Principal } from '../authorization';
import { InvariantViolationException, TerminalRequestException } from '../exceptions';
import { TenantRequest, TenantRequestStatus } from '../tenant-request';
import { assertEligible } from './AssignmentEligibility';
import type { AssignmentReleaseReason } from './events';
import { validateCapacity } from './Worker';
import type { Worker } from './Worker';

export interface AssignmentServiceOptions {
  readonly maxConcurrentAssignments: number;
}

export class WorkerAssignmentService {
  private readonly options: AssignmentServiceOptions;

  /**
   * @throws ValidationException when `maxConcurrentAssignments` is not a
   *   positive integer
   */
  constructor(options: AssignmentServiceOptions) {
    this.options = { maxConcurrentAssignments: validateCapacity(options.maxConcurrentAssignments) };
  }

  /**
   * Assign `worker` to an InReview request.
   *
   * @throws AssignmentRejectedException | IllegalStatusTransitionException |
   *   TerminalRequestException | AuthorizationException, with nothing changed
   */
  assign(
    request: TenantRequest,
    worker: Worker,
    principal: Principal,
    fallbackAllowed: boolean,
    now: Date,
  ): void {
    request.ensureCanTransition(TenantRequestStatus.Assigned, principal);
    assertEligible(worker, request, {
      maxConcurrentAssignments: this.options.maxConcurrentAssignments,
      fallbackAllowed,
    });

    worker.acceptAssignment(request.id, this.options.maxConcurrentAssignments);
    request.assignWorker(worker.id, principal, now);
  }

  /**
   * Move an Assigned request from `current` to `next`.
   */
  reassign(
    request: TenantRequest,
    current: Worker,
    next: Worker,
    principal: Principal,
    fallbackAllowed: boolean,
    now: Date,
  ): void {
    request.ensureCanReassign(next.id, principal);
    this.ensureHolder(request, current);
    assertEligible(next, request, {
      maxConcurrentAssignments: this.options.maxConcurrentAssignments,
      fallbackAllowed,
    });

    next.acceptAssignment(request.id, this.options.maxConcurrentAssignments);
    request.reassignWorker(next.id, principal, now);
    current.releaseAssignment(request.id, 'reassigned', this.options.maxConcurrentAssignments, now);
  }

  /**
   * Mark an InProgress request completed and end the worker's assignment.
   */
  complete(
    request: TenantRequest,
    worker: Worker,
    principal: Principal,
    now: Date,
    notes?: string,
  ): void {
    this.ensureHolder(request, worker);
    request.complete(principal, now, notes);
    this.release(request, worker, 'completed', now);
  }

  /**
   * Decline a request. `assignedWorker` must be the request's current worker,
   * or null when it has none.
   */
  decline(
    request: TenantRequest,
    assignedWorker: Worker | null,
    reason: string,
    principal: Principal,
    now: Date,
  ): void {
    this.ensureHolder(request, assignedWorker);
    request.decline(reason, principal, now);
    if (assignedWorker !== null) {
      this.release(request, assignedWorker, 'declined', now);
    }
  }

  /**
   * Escalate a request, releasing its worker if it has one.
   */
  escalate(
    request: TenantRequest,
    assignedWorker: Worker | null,
    reason: string,
    principal: Principal,
    now: Date,
  ): void {
    this.ensureHolder(request, assignedWorker);
    request.escalate(reason, principal, now);
    if (assignedWorker !== null) {
      this.release(request, assignedWorker, 'escalated', now);
    }
  }

  private release(
    request: TenantRequest,
    worker: Worker,
    reason: AssignmentReleaseReason,
    now: Date,
  ): void {
    worker.releaseAssignment(request.id, reason, this.options.maxConcurrentAssignments, now);
  }

  /**
   * The request must be open, and the passed worker must be the one linked
   * to it and still hold it as an active assignment.
   */
  private ensureHolder(request: TenantRequest, worker: Worker | null): void {
    if (request.isTerminal) {
      throw new TerminalRequestException(request.id, request.status);
    }
    const actual = worker?.id ?? null;
    const holds = worker === null || worker.isAssignedTo(request.id);
    if (request.assignedWorkerId !== actual || !holds) {
      throw new InvariantViolationException(
        'AssignedWorkerMismatch',
        'TenantRequest',
        request.id,
        `Request ${request.id} is linked to worker ${request.assignedWorkerId ?? 'none'}, ` +
          `not ${actual ?? 'none'}`,
        'assignedWorkerId',
      );
    }
  }
}
