/**
 * @fileoverview Unit tests for the TenantRequest aggregate
 */

import {
  AuthorizationException,
  IllegalStatusTransitionException,
  OperationContext,
  TenantRequest,
  TenantRequestSpecifications,
  TenantRequestStatus,
  TenantRequestUrgency,
  TerminalRequestException,
  ValidationException,
  WorkerSpecialization,
} from '../../../src';
import {
  NOW,
  fileRequest,
  hoursAfter,
  managerOf,
  registerProperty,
  registerTenant,
  system,
  tenantPrincipal,
  thrownBy,
  workerPrincipal,
} from '../../helpers/fixtures';

function newRequest(urgency?: TenantRequestUrgency): TenantRequest {
  const property = registerProperty();
  const tenant = registerTenant(property, '1A');
  return fileRequest(property, tenant, {
    title: 'Kitchen tap',
    description: 'leaking kitchen tap',
    urgency,
  });
}

describe('TenantRequest', () => {
  describe('creation', () => {
    it('should start Submitted with an audit entry and a due time', () => {
      const property = registerProperty();
      const tenant = registerTenant(property, '1A');
      const filer = tenantPrincipal(tenant.id);

      const request = property.fileRequest(
        { tenantId: tenant.id, title: 'Kitchen tap', description: 'leaking kitchen tap' },
        filer,
        NOW,
      );

      expect(request.status).toBe(TenantRequestStatus.Submitted);
      expect(request.urgency).toBe(TenantRequestUrgency.Normal);
      expect(request.requiredSpecialization).toBe(WorkerSpecialization.Plumbing);
      expect(request.assignedWorkerId).toBeNull();
      expect(request.dueAt).toEqual(hoursAfter(NOW, 72));
      expect(request.statusHistory).toEqual([
        { from: null, to: TenantRequestStatus.Submitted, at: NOW, actorId: filer.userId, reason: null },
      ]);
    });

    it('should raise RequestCreated with the full request data', () => {
      const property = registerProperty();
      const tenant = registerTenant(property, '1A');

      const request = property.fileRequest(
        {
          tenantId: tenant.id,
          description: 'Furnace makes noise',
          urgency: TenantRequestUrgency.Emergency,
        },
        tenantPrincipal(tenant.id),
        NOW,
      );

      expect(request.domainEvents.map((event) => event.eventName)).toEqual(['RequestCreated']);
      expect(request.domainEvents[0]?.payload).toEqual({
        requestId: request.id,
        propertyId: property.id,
        tenantId: tenant.id,
        unitNumber: '1A',
        title: null,
        description: 'Furnace makes noise',
        requiredSpecialization: WorkerSpecialization.HVAC,
        urgency: TenantRequestUrgency.Emergency,
      });
      expect(request.dueAt).toEqual(hoursAfter(NOW, 2));
    });

    it('should honour a category hint', () => {
      const property = registerProperty();
      const tenant = registerTenant(property, '1A');

      const request = fileRequest(property, tenant, {
        description: 'door sticks',
        categoryHint: 'carpenter',
      });

      expect(request.requiredSpecialization).toBe(WorkerSpecialization.Carpentry);
      expect(request.categoryHint).toBe('carpenter');
    });

    it('should classify from the title when the description names no trade', () => {
      const property = registerProperty();
      const tenant = registerTenant(property, '1A');

      const request = fileRequest(property, tenant, {
        title: 'Leaking faucet',
        description: 'please come asap',
      });

      expect(request.requiredSpecialization).toBe(WorkerSpecialization.Plumbing);
      expect(request.description).toBe('please come asap');
    });

    it('should reject an empty description', () => {
      const property = registerProperty();
      const tenant = registerTenant(property, '1A');

      const error = thrownBy(() =>
        property.fileRequest({ tenantId: tenant.id, description: '  ' }, tenantPrincipal(tenant.id), NOW),
      );

      expect(error).toBeInstanceOf(ValidationException);
      expect(error).toMatchObject({ errors: { description: ['cannot be empty'] } });
      expect(property.requestIds).toEqual([]);
    });
  });

  describe('transitions', () => {
    const manager = () => managerOf('unused');

    it('should move through the happy path and record every step', () => {
      const request = newRequest();
      const propertyManager = managerOf(request.propertyId);
      const worker = workerPrincipal('worker-1');

      request.beginReview(propertyManager, hoursAfter(NOW, 1));
      request.assignWorker('worker-1', propertyManager, hoursAfter(NOW, 2));
      request.startWork(worker, hoursAfter(NOW, 3));
      const released = request.complete(worker, hoursAfter(NOW, 4), 'replaced washer');

      expect(released).toBe('worker-1');
      expect(request.status).toBe(TenantRequestStatus.Completed);
      expect(request.assignedWorkerId).toBe('worker-1');
      expect(request.assignedAt).toEqual(hoursAfter(NOW, 2));
      expect(request.completedAt).toEqual(hoursAfter(NOW, 4));
      expect(request.closedAt).toEqual(hoursAfter(NOW, 4));
      expect(request.completionNotes).toBe('replaced washer');
      expect(request.isTerminal).toBe(true);
      expect(request.statusHistory.map((change) => [change.from, change.to, change.actorId])).toEqual([
        [null, TenantRequestStatus.Submitted, `user-${request.tenantId}`],
        [TenantRequestStatus.Submitted, TenantRequestStatus.InReview, 'manager-1'],
        [TenantRequestStatus.InReview, TenantRequestStatus.Assigned, 'manager-1'],
        [TenantRequestStatus.Assigned, TenantRequestStatus.InProgress, 'user-worker-1'],
        [TenantRequestStatus.InProgress, TenantRequestStatus.Completed, 'user-worker-1'],
      ]);
      expect(request.domainEvents.map((event) => event.eventName)).toEqual([
        'RequestStatusChanged',
        'RequestStatusChanged',
        'WorkerAssigned',
        'RequestStatusChanged',
        'RequestStatusChanged',
      ]);
    });

    it('should reject an illegal transition without changing anything', () => {
      const request = newRequest();

      expect(() => request.startWork(system, NOW)).toThrowErrorType(
        IllegalStatusTransitionException,
      );
      expect(request.status).toBe(TenantRequestStatus.Submitted);
      expect(request.statusHistory).toHaveLength(1);
    });

    it('should check the graph before authorization', () => {
      const request = newRequest();

      expect(() => request.assignWorker('worker-1', manager(), NOW)).toThrowErrorType(
        IllegalStatusTransitionException,
      );
    });

    it('should deny principals without the required relationship', () => {
      const request = newRequest();

      const error = thrownBy(() => request.beginReview(tenantPrincipal(request.tenantId), NOW));

      expect(error).toBeInstanceOf(AuthorizationException);
      expect(error).toMatchObject({ action: 'BeginReview', aggregateId: request.id });
      expect(request.status).toBe(TenantRequestStatus.Submitted);
    });

    it('should only let the assigned worker start work', () => {
      const request = newRequest();
      request.beginReview(system, NOW);
      request.assignWorker('worker-1', system, NOW);

      expect(() => request.startWork(workerPrincipal('worker-2'), NOW)).toThrowErrorType(
        AuthorizationException,
      );
    });

    it('should release the worker when declined', () => {
      const request = newRequest();
      request.beginReview(system, NOW);
      request.assignWorker('worker-1', system, NOW);

      const released = request.decline('duplicate of an earlier request', system, hoursAfter(NOW, 1));

      expect(released).toBe('worker-1');
      expect(request.status).toBe(TenantRequestStatus.Declined);
      expect(request.assignedWorkerId).toBeNull();
      expect(request.closedAt).toEqual(hoursAfter(NOW, 1));
      expect(request.statusHistory[request.statusHistory.length - 1]?.reason).toBe(
        'duplicate of an earlier request',
      );
    });

    it('should decline a request that never had a worker', () => {
      const request = newRequest();

      expect(request.decline('not a maintenance issue', system, NOW)).toBeNull();
      expect(request.status).toBe(TenantRequestStatus.Declined);
    });

    it('should require a reason to decline', () => {
      const request = newRequest();

      expect(() => request.decline(' ', system, NOW)).toThrowErrorType(ValidationException);
      expect(request.status).toBe(TenantRequestStatus.Submitted);
    });

    it('should release the worker on escalation and return to review', () => {
      const request = newRequest();
      request.beginReview(system, NOW);
      request.assignWorker('worker-1', system, NOW);
      request.startWork(system, NOW);

      expect(request.escalate('needs a licensed contractor', system, NOW)).toBe('worker-1');
      expect(request.status).toBe(TenantRequestStatus.Escalated);
      expect(request.assignedWorkerId).toBeNull();
      expect(request.isTerminal).toBe(false);

      request.resolveEscalation(system, NOW);
      expect(request.status).toBe(TenantRequestStatus.InReview);
    });

    it('should refuse every change once terminal', () => {
      const request = newRequest();
      request.decline('not a maintenance issue', system, NOW);

      expect(() => request.beginReview(system, NOW)).toThrowErrorType(TerminalRequestException);
      expect(() => request.escalate('late', system, NOW)).toThrowErrorType(
        TerminalRequestException,
      );
      expect(thrownBy(() => request.ensureCanReassign('worker-2', system))).toMatchObject({
        code: 'TerminalRequest',
      });
    });
  });

  describe('reassignment', () => {
    it('should swap the worker and keep the status', () => {
      const request = newRequest();
      request.beginReview(system, NOW);
      request.assignWorker('worker-1', system, NOW);
      request.clearEvents();

      const previous = request.reassignWorker('worker-2', system, hoursAfter(NOW, 1));

      expect(previous).toBe('worker-1');
      expect(request.status).toBe(TenantRequestStatus.Assigned);
      expect(request.assignedWorkerId).toBe('worker-2');
      expect(request.statusHistory[request.statusHistory.length - 1]).toEqual({
        from: TenantRequestStatus.Assigned,
        to: TenantRequestStatus.Assigned,
        at: hoursAfter(NOW, 1),
        actorId: 'system',
        reason: 'reassigned from worker-1',
      });
      expect(request.domainEvents).toHaveLength(1);
      expect(request.domainEvents[0]?.payload).toMatchObject({
        workerId: 'worker-2',
        previousWorkerId: 'worker-1',
      });
    });

    it('should only reassign Assigned requests', () => {
      const request = newRequest();
      request.beginReview(system, NOW);

      expect(thrownBy(() => request.reassignWorker('worker-2', system, NOW))).toMatchObject({
        code: 'ReassignRequiresAssigned',
      });
    });

    it('should refuse reassigning to the same worker', () => {
      const request = newRequest();
      request.beginReview(system, NOW);
      request.assignWorker('worker-1', system, NOW);

      expect(thrownBy(() => request.ensureCanReassign('worker-1', system))).toMatchObject({
        code: 'ReassignToSameWorker',
      });
    });
  });

  describe('overdue', () => {
    it('should be overdue only after the due time while open', () => {
      const request = newRequest(TenantRequestUrgency.Critical);

      expect(request.isOverdue(hoursAfter(NOW, 4))).toBe(false);
      expect(request.isOverdue(hoursAfter(NOW, 5))).toBe(true);

      request.decline('resolved by tenant', system, hoursAfter(NOW, 5));
      expect(request.isOverdue(hoursAfter(NOW, 6))).toBe(false);
    });

    it('should agree with the overdue specification', () => {
      const request = newRequest(TenantRequestUrgency.High);
      const spec = TenantRequestSpecifications.overdue(hoursAfter(NOW, 25));

      expect(spec.isSatisfiedBy(request)).toBe(true);
      expect(TenantRequestSpecifications.overdue(hoursAfter(NOW, 24)).isSatisfiedBy(request)).toBe(
        false,
      );
    });
  });

  describe('event metadata', () => {
    it('should carry the operation correlation id', () => {
      const request = newRequest();

      OperationContext.run({ correlationId: 'corr-9', actorId: 'system' }, () => {
        request.beginReview(system, NOW);
      });

      expect(request.domainEvents[0]?.metadata).toMatchObject({
        correlationId: 'corr-9',
        actorId: 'system',
      });
    });
  });

  describe('snapshots', () => {
    it('should restore an equal request', () => {
      const request = newRequest();
      request.beginReview(system, NOW);

      const restored = TenantRequest.fromSnapshot(request.toSnapshot(), 2);

      expect(restored.toSnapshot()).toEqual(request.toSnapshot());
      expect(restored.version).toBe(2);
      expect(restored.domainEvents).toEqual([]);
    });
  });
});
