/**
 * @fileoverview Unit tests for WorkerAssignmentService
 */

import {
  AssignmentRejectedException,
  AssignmentRejectionReason,
  AuthorizationException,
  IllegalStatusTransitionException,
  TenantRequest,
  TenantRequestStatus,
  ValidationException,
  Worker,
  WorkerAssignmentService,
  WorkerSpecialization,
} from '../../../src';
import {
  NOW,
  fileRequest,
  hoursAfter,
  registerProperty,
  registerTenant,
  registerWorker,
  system,
  tenantPrincipal,
  thrownBy,
  workerPrincipal,
} from '../../helpers/fixtures';

const service = new WorkerAssignmentService({ maxConcurrentAssignments: 2 });

function requestInReview(description: string = 'leaking kitchen tap', unit: string = '1A'): TenantRequest {
  const property = registerProperty();
  const tenant = registerTenant(property, unit);
  const request = fileRequest(property, tenant, { description });
  request.beginReview(system, NOW);
  request.clearEvents();
  return request;
}

describe('WorkerAssignmentService', () => {
  let plumber: Worker;

  beforeEach(() => {
    plumber = registerWorker('plumber@example.com', WorkerSpecialization.Plumbing);
  });

  describe('construction', () => {
    it.each([0, -1, 1.5])('should refuse a capacity of %p', (maxConcurrentAssignments) => {
      const error = thrownBy(() => new WorkerAssignmentService({ maxConcurrentAssignments }));

      expect(error).toBeInstanceOf(ValidationException);
      expect(error).toMatchObject({
        errors: { maxConcurrentAssignments: ['must be a positive integer'] },
      });
    });
  });

  describe('assign', () => {
    it('should link the request and the worker', () => {
      const request = requestInReview();

      service.assign(request, plumber, system, false, hoursAfter(NOW, 1));

      expect(request.status).toBe(TenantRequestStatus.Assigned);
      expect(request.assignedWorkerId).toBe(plumber.id);
      expect(plumber.assignedRequestIds).toEqual([request.id]);
      expect(plumber.activeAssignmentCount).toBe(1);
      expect(plumber.isAvailable).toBe(true);
    });

    it('should reject a specialization mismatch and change nothing', () => {
      const request = requestInReview();
      const electrician = registerWorker('spark@example.com', WorkerSpecialization.Electrical);

      const error = thrownBy(() => service.assign(request, electrician, system, true, NOW));

      expect(error).toBeInstanceOf(AssignmentRejectedException);
      expect(error).toMatchObject({
        reason: AssignmentRejectionReason.SpecializationMismatch,
        workerId: electrician.id,
        aggregateId: request.id,
        message:
          `Worker ${electrician.id} specializes in Electrical ` +
          `but request ${request.id} requires Plumbing`,
      });
      expect(request.status).toBe(TenantRequestStatus.InReview);
      expect(request.assignedWorkerId).toBeNull();
      expect(request.domainEvents).toEqual([]);
      expect(electrician.assignedRequestIds).toEqual([]);
    });

    it('should let a General worker cover a trade only when fallback is allowed', () => {
      const generalist = registerWorker('general@example.com', WorkerSpecialization.General);

      expect(thrownBy(() => service.assign(requestInReview(), generalist, system, false, NOW))).toMatchObject({
        reason: AssignmentRejectionReason.SpecializationMismatch,
      });

      const request = requestInReview();
      service.assign(request, generalist, system, true, NOW);
      expect(request.assignedWorkerId).toBe(generalist.id);
    });

    it('should reject a worker at capacity', () => {
      service.assign(requestInReview('leak under sink', '1A'), plumber, system, false, NOW);
      service.assign(requestInReview('clogged drain', '1B'), plumber, system, false, NOW);
      const third = requestInReview('dripping faucet', '2A');

      const error = thrownBy(() => service.assign(third, plumber, system, false, NOW));

      expect(error).toMatchObject({
        reason: AssignmentRejectionReason.AtCapacity,
        message: `Worker ${plumber.id} already holds 2 of 2 assignments`,
      });
      expect(plumber.isAvailable).toBe(false);
      expect(third.status).toBe(TenantRequestStatus.InReview);
    });

    it('should reject an inactive worker', () => {
      plumber.deactivate('on leave', NOW);

      expect(thrownBy(() => service.assign(requestInReview(), plumber, system, false, NOW))).toMatchObject({
        reason: AssignmentRejectionReason.Unavailable,
      });
    });

    it('should check the request before the worker', () => {
      const property = registerProperty();
      const tenant = registerTenant(property, '1A');
      const submitted = fileRequest(property, tenant, { description: 'leaking kitchen tap' });

      expect(() => service.assign(submitted, plumber, system, false, NOW)).toThrowErrorType(
        IllegalStatusTransitionException,
      );
      expect(plumber.assignedRequestIds).toEqual([]);
    });

    it('should refuse principals who may not assign', () => {
      const request = requestInReview();

      expect(() =>
        service.assign(request, plumber, tenantPrincipal(request.tenantId), false, NOW),
      ).toThrowErrorType(AuthorizationException);
      expect(plumber.assignedRequestIds).toEqual([]);
    });
  });

  describe('reassign', () => {
    it('should move the assignment between workers', () => {
      const request = requestInReview();
      const second = registerWorker('second@example.com', WorkerSpecialization.Plumbing);
      service.assign(request, plumber, system, false, NOW);

      service.reassign(request, plumber, second, system, false, hoursAfter(NOW, 1));

      expect(request.status).toBe(TenantRequestStatus.Assigned);
      expect(request.assignedWorkerId).toBe(second.id);
      expect(second.assignedRequestIds).toEqual([request.id]);
      expect(plumber.assignedRequestIds).toEqual([]);
      expect(plumber.domainEvents.map((event) => event.payload)).toEqual([
        {
          workerId: plumber.id,
          requestId: request.id,
          reason: 'reassigned',
          activeAssignmentCount: 0,
          isAvailable: true,
        },
      ]);
    });

    it('should leave both workers untouched when the new one is ineligible', () => {
      const request = requestInReview();
      const painter = registerWorker('painter@example.com', WorkerSpecialization.Painting);
      service.assign(request, plumber, system, false, NOW);

      expect(
        thrownBy(() => service.reassign(request, plumber, painter, system, false, NOW)),
      ).toMatchObject({ reason: AssignmentRejectionReason.SpecializationMismatch });
      expect(request.assignedWorkerId).toBe(plumber.id);
      expect(plumber.assignedRequestIds).toEqual([request.id]);
      expect(painter.assignedRequestIds).toEqual([]);
    });

    it('should require the passed current worker to be the holder', () => {
      const request = requestInReview();
      const other = registerWorker('other@example.com', WorkerSpecialization.Plumbing);
      const next = registerWorker('next@example.com', WorkerSpecialization.Plumbing);
      service.assign(request, plumber, system, false, NOW);

      expect(thrownBy(() => service.reassign(request, other, next, system, false, NOW))).toMatchObject({
        code: 'AssignedWorkerMismatch',
      });
    });
  });

  describe('complete', () => {
    it('should finish the request and free the worker', () => {
      const request = requestInReview();
      service.assign(request, plumber, system, false, NOW);
      request.startWork(workerPrincipal(plumber.id), NOW);

      service.complete(request, plumber, workerPrincipal(plumber.id), hoursAfter(NOW, 2), 'new washer');

      expect(request.status).toBe(TenantRequestStatus.Completed);
      expect(request.assignedWorkerId).toBe(plumber.id);
      expect(plumber.assignedRequestIds).toEqual([]);
      expect(plumber.domainEvents[0]?.payload).toMatchObject({ reason: 'completed' });
    });

    it('should leave the worker holding the request when completion is illegal', () => {
      const request = requestInReview();
      service.assign(request, plumber, system, false, NOW);

      expect(() => service.complete(request, plumber, system, NOW)).toThrowErrorType(
        IllegalStatusTransitionException,
      );
      expect(plumber.assignedRequestIds).toEqual([request.id]);
    });
  });

  describe('decline and escalate', () => {
    it('should release the worker on decline', () => {
      const request = requestInReview();
      service.assign(request, plumber, system, false, NOW);

      service.decline(request, plumber, 'tenant withdrew', system, NOW);

      expect(request.status).toBe(TenantRequestStatus.Declined);
      expect(plumber.assignedRequestIds).toEqual([]);
      expect(plumber.domainEvents[0]?.payload).toMatchObject({ reason: 'declined' });
    });

    it('should decline an unassigned request without a worker', () => {
      const request = requestInReview();

      service.decline(request, null, 'not a maintenance issue', system, NOW);

      expect(request.status).toBe(TenantRequestStatus.Declined);
    });

    it('should reject a null worker for an assigned request', () => {
      const request = requestInReview();
      service.assign(request, plumber, system, false, NOW);

      expect(thrownBy(() => service.escalate(request, null, 'stuck', system, NOW))).toMatchObject({
        code: 'AssignedWorkerMismatch',
      });
      expect(request.status).toBe(TenantRequestStatus.Assigned);
    });

    it('should release the worker on escalation', () => {
      const request = requestInReview();
      service.assign(request, plumber, system, false, NOW);

      service.escalate(request, plumber, 'needs a licensed contractor', system, NOW);

      expect(request.status).toBe(TenantRequestStatus.Escalated);
      expect(request.assignedWorkerId).toBeNull();
      expect(plumber.domainEvents[0]?.payload).toMatchObject({ reason: 'escalated' });
    });

    it('should refuse terminal requests', () => {
      const request = requestInReview();
      service.decline(request, null, 'duplicate', system, NOW);

      expect(thrownBy(() => service.escalate(request, null, 'late', system, NOW))).toMatchObject({
        code: 'TerminalRequest',
      });
    });
  });
});
