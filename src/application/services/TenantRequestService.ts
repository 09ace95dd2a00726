/**
 * rental-repairs-core - Tenant Request Use Cases
 *
 * Each method is one caller action: it loads the aggregates it needs,
 * applies the change through the domain, and saves everything it touched in
 * the same unit of work. Operations that move a worker on or off a request
 * update the request and the worker together.
 *
 * @module application/services/TenantRequestService
 */

import {
  AuthorizationAction,
  Principal,
  PrincipalRole,
  assertAuthorized,
} from '../../domain/authorization';
import { AuthorizationException, InvariantViolationException } from '../../domain/exceptions';
import type { FileRequestInput } from '../../domain/tenant-request';
import {
  PROPERTY_REPOSITORY_TOKEN,
  TENANT_REQUEST_REPOSITORY_TOKEN,
  WORKER_REPOSITORY_TOKEN,
  IUnitOfWork,
  IWorkerRepository,
} from '../../domain/repository';
import { ISpecification, Specifications } from '../../domain/specification';
import {
  TenantRequest,
  TenantRequestSpecifications,
  TenantRequestStatus,
} from '../../domain/tenant-request';
import { Worker, WorkerAssignmentService } from '../../domain/worker';
import { ApplicationService, ServiceDependencies } from './ApplicationService';

/**
 * Filing input; the tenant is the acting principal.
 */
export type FileRequestCommand = Omit<FileRequestInput, 'tenantId'>;

export interface OverdueQuery {
  /** Restrict to one property */
  propertyId?: string;
  skip?: number;
  take?: number;
}

function describeRequest(request: TenantRequest): Record<string, unknown> {
  return {
    requestId: request.id,
    status: request.status,
    assignedWorkerId: request.assignedWorkerId,
  };
}

export class TenantRequestService extends ApplicationService {
  private readonly assignments: WorkerAssignmentService;

  constructor(dependencies: ServiceDependencies) {
    super(dependencies);
    this.assignments = new WorkerAssignmentService({
      maxConcurrentAssignments: this.settings.maxConcurrentAssignments,
    });
  }

  /**
   * A tenant files a request at their property. The required specialization
   * is derived from the description and optional category hint.
   */
  async fileRequest(
    actorId: string,
    propertyId: string,
    input: FileRequestCommand,
  ): Promise<TenantRequest> {
    return this.execute(
      {
        name: 'fileRequest',
        actorId,
        action: AuthorizationAction.SubmitRequest,
        describe: (request) => ({
          ...describeRequest(request),
          propertyId: request.propertyId,
          requiredSpecialization: request.requiredSpecialization,
          urgency: request.urgency,
        }),
      },
      async ({ unitOfWork, principal, now }) => {
        if (principal.tenantId === undefined) {
          throw new AuthorizationException(
            AuthorizationAction.SubmitRequest,
            principal.userId,
            'Property',
            propertyId,
          );
        }
        const properties = unitOfWork.getRepository(PROPERTY_REPOSITORY_TOKEN);
        const property = await this.load(properties, 'Property', propertyId);

        const request = property.fileRequest(
          { ...input, tenantId: principal.tenantId },
          principal,
          now,
        );
        await unitOfWork.getRepository(TENANT_REQUEST_REPOSITORY_TOKEN).add(request);
        await properties.update(property);
        return request;
      },
    );
  }

  async getRequest(actorId: string, requestId: string): Promise<TenantRequest> {
    return this.execute(
      { name: 'getRequest', actorId, action: AuthorizationAction.ViewRequest },
      async ({ unitOfWork, principal }) => {
        const request = await this.loadRequest(unitOfWork, requestId);
        assertAuthorized(principal, AuthorizationAction.ViewRequest, request.authorizationResource());
        return request;
      },
    );
  }

  async beginReview(actorId: string, requestId: string): Promise<TenantRequest> {
    return this.transition(
      'beginReview',
      AuthorizationAction.BeginReview,
      actorId,
      requestId,
      (request, principal, now) => request.beginReview(principal, now),
    );
  }

  async startWork(actorId: string, requestId: string): Promise<TenantRequest> {
    return this.transition(
      'startWork',
      AuthorizationAction.StartWork,
      actorId,
      requestId,
      (request, principal, now) => request.startWork(principal, now),
    );
  }

  async resolveEscalation(actorId: string, requestId: string): Promise<TenantRequest> {
    return this.transition(
      'resolveEscalation',
      AuthorizationAction.ResolveEscalation,
      actorId,
      requestId,
      (request, principal, now) => request.resolveEscalation(principal, now),
    );
  }

  /**
   * Assign an InReview request. The General fallback is decided from the
   * configured policy and the current exact-match workers.
   */
  async assignWorker(actorId: string, requestId: string, workerId: string): Promise<TenantRequest> {
    return this.execute(
      {
        name: 'assignWorker',
        actorId,
        action: AuthorizationAction.AssignWorker,
        describe: describeRequest,
      },
      async ({ unitOfWork, principal, now }) => {
        const workers = unitOfWork.getRepository(WORKER_REPOSITORY_TOKEN);
        const request = await this.loadRequest(unitOfWork, requestId);
        const worker = await this.load(workers, 'Worker', workerId);
        const fallbackAllowed = await this.generalFallbackAllowed(
          workers,
          request.requiredSpecialization,
        );

        this.assignments.assign(request, worker, principal, fallbackAllowed, now);
        await this.saveRequest(unitOfWork, request);
        await workers.update(worker);
        return request;
      },
    );
  }

  async reassignWorker(
    actorId: string,
    requestId: string,
    workerId: string,
  ): Promise<TenantRequest> {
    return this.execute(
      {
        name: 'reassignWorker',
        actorId,
        action: AuthorizationAction.AssignWorker,
        describe: describeRequest,
      },
      async ({ unitOfWork, principal, now }) => {
        const workers = unitOfWork.getRepository(WORKER_REPOSITORY_TOKEN);
        const request = await this.loadRequest(unitOfWork, requestId);
        const currentId = request.ensureCanReassign(workerId, principal);
        const current = await this.load(workers, 'Worker', currentId);
        const next = await this.load(workers, 'Worker', workerId);
        const fallbackAllowed = await this.generalFallbackAllowed(
          workers,
          request.requiredSpecialization,
        );

        this.assignments.reassign(request, current, next, principal, fallbackAllowed, now);
        await this.saveRequest(unitOfWork, request);
        await workers.update(next);
        await workers.update(current);
        return request;
      },
    );
  }

  async completeWork(actorId: string, requestId: string, notes?: string): Promise<TenantRequest> {
    return this.execute(
      {
        name: 'completeWork',
        actorId,
        action: AuthorizationAction.CompleteWork,
        describe: describeRequest,
      },
      async ({ unitOfWork, principal, now }) => {
        const workers = unitOfWork.getRepository(WORKER_REPOSITORY_TOKEN);
        const request = await this.loadRequest(unitOfWork, requestId);
        const worker = await this.loadAssignedWorker(workers, request);
        if (worker === null) {
          request.ensureCanTransition(TenantRequestStatus.Completed, principal);
          throw new InvariantViolationException(
            'WorkerLinkMismatch',
            'TenantRequest',
            request.id,
            `Request ${request.id} is ${request.status} without an assigned worker`,
            'assignedWorkerId',
          );
        }

        this.assignments.complete(request, worker, principal, now, notes);
        await this.saveRequest(unitOfWork, request);
        await workers.update(worker);
        return request;
      },
    );
  }

  async declineRequest(actorId: string, requestId: string, reason: string): Promise<TenantRequest> {
    return this.releasing(
      'declineRequest',
      AuthorizationAction.Decline,
      actorId,
      requestId,
      (request, worker, principal, now) =>
        this.assignments.decline(request, worker, reason, principal, now),
    );
  }

  async escalateRequest(actorId: string, requestId: string, reason: string): Promise<TenantRequest> {
    return this.releasing(
      'escalateRequest',
      AuthorizationAction.Escalate,
      actorId,
      requestId,
      (request, worker, principal, now) =>
        this.assignments.escalate(request, worker, reason, principal, now),
    );
  }

  /**
   * Open requests past their due time, oldest due first. Property managers
   * only see their own properties.
   */
  async listOverdue(actorId: string, query: OverdueQuery = {}): Promise<TenantRequest[]> {
    return this.execute(
      {
        name: 'listOverdue',
        actorId,
        action: AuthorizationAction.ListOverdueRequests,
        describe: (requests) => ({ count: requests.length }),
      },
      async ({ unitOfWork, principal, now }) => {
        assertAuthorized(principal, AuthorizationAction.ListOverdueRequests, {
          aggregate: 'TenantRequest',
          propertyId: query.propertyId,
        });

        let specification = TenantRequestSpecifications.overdue(now).and(
          this.visibleTo(principal, query.propertyId),
        );
        specification = specification.orderBy('dueAt').orderBy('createdAt');
        if (query.skip !== undefined || query.take !== undefined) {
          specification = specification.page(query.skip ?? 0, query.take ?? 50);
        }

        return unitOfWork.getRepository(TENANT_REQUEST_REPOSITORY_TOKEN).find(specification);
      },
    );
  }

  private visibleTo(
    principal: Principal,
    propertyId: string | undefined,
  ): ISpecification<TenantRequest> {
    const isSystem = principal.roles.includes(PrincipalRole.System);
    const visible = isSystem
      ? Specifications.all<TenantRequest>()
      : Specifications.or(
          ...principal.managedPropertyIds.map((id) => TenantRequestSpecifications.forProperty(id)),
        );
    return propertyId === undefined
      ? visible
      : visible.and(TenantRequestSpecifications.forProperty(propertyId));
  }

  private async transition(
    name: string,
    action: AuthorizationAction,
    actorId: string,
    requestId: string,
    change: (request: TenantRequest, principal: Principal, now: Date) => void,
  ): Promise<TenantRequest> {
    return this.execute(
      { name, actorId, action, describe: describeRequest },
      async ({ unitOfWork, principal, now }) => {
        const request = await this.loadRequest(unitOfWork, requestId);
        change(request, principal, now);
        await this.saveRequest(unitOfWork, request);
        return request;
      },
    );
  }

  /**
   * A transition that may end the assigned worker's assignment.
   */
  private async releasing(
    name: string,
    action: AuthorizationAction,
    actorId: string,
    requestId: string,
    change: (
      request: TenantRequest,
      worker: Worker | null,
      principal: Principal,
      now: Date,
    ) => void,
  ): Promise<TenantRequest> {
    return this.execute(
      { name, actorId, action, describe: describeRequest },
      async ({ unitOfWork, principal, now }) => {
        const workers = unitOfWork.getRepository(WORKER_REPOSITORY_TOKEN);
        const request = await this.loadRequest(unitOfWork, requestId);
        const worker = await this.loadAssignedWorker(workers, request);

        change(request, worker, principal, now);
        await this.saveRequest(unitOfWork, request);
        if (worker !== null) {
          await workers.update(worker);
        }
        return request;
      },
    );
  }

  private loadRequest(unitOfWork: IUnitOfWork, requestId: string): Promise<TenantRequest> {
    return this.load(
      unitOfWork.getRepository(TENANT_REQUEST_REPOSITORY_TOKEN),
      'TenantRequest',
      requestId,
    );
  }

  private saveRequest(unitOfWork: IUnitOfWork, request: TenantRequest): Promise<void> {
    return unitOfWork.getRepository(TENANT_REQUEST_REPOSITORY_TOKEN).update(request);
  }

  private async loadAssignedWorker(
    workers: IWorkerRepository,
    request: TenantRequest,
  ): Promise<Worker | null> {
    if (request.assignedWorkerId === null) {
      return null;
    }
    return this.load(workers, 'Worker', request.assignedWorkerId);
  }
}
