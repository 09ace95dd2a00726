/**
 * rental-repairs-core - TenantRequest Aggregate
 *
 * A maintenance request filed by a tenant against their property. Every status
 * change goes through {@link TenantRequestStatusPolicy} (graph legality first,
 * then authorization of the acting principal) and is recorded in
 * `statusHistory`.
 *
 * Invariant: `assignedWorkerId` is set exactly when the status is Assigned,
 * InProgress or Completed.
 *
 * @module domain/tenant-request/TenantRequest
 */

import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import {
  AuthorizationAction,
  AuthorizationResource,
  Principal,
  assertAuthorized,
} from '../authorization';
import { AggregateRoot } from '../events';
import { InvariantViolationException, TerminalRequestException } from '../exceptions';
import { WorkerSpecialization, determineSpecialization } from '../specialization';
import { NonEmptyTextSchema, validateInput } from '../validation';
import { RequestCreated, RequestStatusChanged, WorkerAssigned } from './events';
import { TenantRequestStatus, TenantRequestStatusPolicy } from './TenantRequestStatus';
import {
  DEFAULT_URGENCY,
  TenantRequestUrgency,
  expectedResolutionHours,
} from './TenantRequestUrgency';

const HOUR_MS = 60 * 60 * 1000;

/**
 * One entry of the request's audit trail.
 */
export interface StatusChange {
  readonly from: TenantRequestStatus | null;
  readonly to: TenantRequestStatus;
  readonly at: Date;
  readonly actorId: string;
  readonly reason: string | null;
}

/**
 * Persisted form. Field names match the aggregate's getters so specifications
 * address the same names in memory and in a store. `dueAt` is denormalized
 * for overdue queries.
 */
export interface TenantRequestSnapshot {
  id: string;
  propertyId: string;
  tenantId: string;
  unitNumber: string;
  title: string | null;
  description: string;
  categoryHint: string | null;
  requiredSpecialization: WorkerSpecialization;
  urgency: TenantRequestUrgency;
  status: TenantRequestStatus;
  assignedWorkerId: string | null;
  createdAt: Date;
  updatedAt: Date;
  dueAt: Date;
  assignedAt: Date | null;
  completedAt: Date | null;
  closedAt: Date | null;
  completionNotes: string | null;
  statusHistory: StatusChange[];
}

export const FileRequestSchema = z.object({
  tenantId: z.string().trim().min(1, 'is required'),
  title: z
    .string()
    .trim()
    .min(1, 'cannot be empty')
    .max(200, 'must be at most 200 characters')
    .optional(),
  description: NonEmptyTextSchema(1000),
  categoryHint: z.string().trim().max(50).optional(),
  urgency: z.nativeEnum(TenantRequestUrgency).default(DEFAULT_URGENCY),
});

export type FileRequestInput = z.input<typeof FileRequestSchema>;

const ReasonSchema = NonEmptyTextSchema(500);

/**
 * Values fixed by the owning property when it creates a request.
 */
export interface NewRequestOrigin {
  propertyId: string;
  unitNumber: string;
  filedBy: Principal;
}

export class TenantRequest extends AggregateRoot {
  private constructor(
    private props: TenantRequestSnapshot,
    version: number,
  ) {
    super(version);
  }

  /**
   * Create a request. Called by `Property.fileRequest`, which owns the
   * property-level checks.
   *
   * @internal
   */
  static create(origin: NewRequestOrigin, input: FileRequestInput, now: Date): TenantRequest {
    const data = validateInput(FileRequestSchema, input, 'Invalid maintenance request');
    const id = uuidv4();

    assertAuthorized(origin.filedBy, AuthorizationAction.SubmitRequest, {
      aggregate: 'TenantRequest',
      aggregateId: id,
      propertyId: origin.propertyId,
      tenantId: data.tenantId,
    });

    const request = new TenantRequest(
      {
        id,
        propertyId: origin.propertyId,
        tenantId: data.tenantId,
        unitNumber: origin.unitNumber,
        title: data.title ?? null,
        description: data.description,
        categoryHint: data.categoryHint ?? null,
        requiredSpecialization: determineSpecialization(
          data.title === undefined ? data.description : `${data.title} ${data.description}`,
          data.categoryHint,
        ),
        urgency: data.urgency,
        status: TenantRequestStatus.Submitted,
        assignedWorkerId: null,
        createdAt: now,
        updatedAt: now,
        dueAt: new Date(now.getTime() + expectedResolutionHours(data.urgency) * HOUR_MS),
        assignedAt: null,
        completedAt: null,
        closedAt: null,
        completionNotes: null,
        statusHistory: [
          {
            from: null,
            to: TenantRequestStatus.Submitted,
            at: now,
            actorId: origin.filedBy.userId,
            reason: null,
          },
        ],
      },
      0,
    );

    request.raiseEvent(
      new RequestCreated(
        {
          requestId: id,
          propertyId: origin.propertyId,
          tenantId: data.tenantId,
          unitNumber: origin.unitNumber,
          title: data.title ?? null,
          description: data.description,
          requiredSpecialization: request.requiredSpecialization,
          urgency: data.urgency,
        },
        now,
      ),
    );
    return request;
  }

  static fromSnapshot(snapshot: TenantRequestSnapshot, version: number): TenantRequest {
    return new TenantRequest(structuredClone(snapshot), version);
  }

  toSnapshot(): TenantRequestSnapshot {
    return structuredClone(this.props);
  }

  // ==================== Accessors ====================

  get id(): string {
    return this.props.id;
  }

  get propertyId(): string {
    return this.props.propertyId;
  }

  get tenantId(): string {
    return this.props.tenantId;
  }

  get unitNumber(): string {
    return this.props.unitNumber;
  }

  get title(): string | null {
    return this.props.title;
  }

  get description(): string {
    return this.props.description;
  }

  get categoryHint(): string | null {
    return this.props.categoryHint;
  }

  get requiredSpecialization(): WorkerSpecialization {
    return this.props.requiredSpecialization;
  }

  get urgency(): TenantRequestUrgency {
    return this.props.urgency;
  }

  get status(): TenantRequestStatus {
    return this.props.status;
  }

  get assignedWorkerId(): string | null {
    return this.props.assignedWorkerId;
  }

  get createdAt(): Date {
    return this.props.createdAt;
  }

  get updatedAt(): Date {
    return this.props.updatedAt;
  }

  get dueAt(): Date {
    return this.props.dueAt;
  }

  get assignedAt(): Date | null {
    return this.props.assignedAt;
  }

  get completedAt(): Date | null {
    return this.props.completedAt;
  }

  get closedAt(): Date | null {
    return this.props.closedAt;
  }

  get completionNotes(): string | null {
    return this.props.completionNotes;
  }

  get statusHistory(): readonly StatusChange[] {
    return this.props.statusHistory;
  }

  get isTerminal(): boolean {
    return TenantRequestStatusPolicy.isTerminal(this.props.status);
  }

  isOverdue(now: Date): boolean {
    return !this.isTerminal && this.props.dueAt.getTime() < now.getTime();
  }

  /**
   * Resource description for authorization checks.
   */
  authorizationResource(): AuthorizationResource {
    return {
      aggregate: 'TenantRequest',
      aggregateId: this.props.id,
      propertyId: this.props.propertyId,
      tenantId: this.props.tenantId,
      assignedWorkerId: this.props.assignedWorkerId,
    };
  }

  // ==================== Transitions ====================

  /**
   * Check that `principal` may move this request to `to`, without changing
   * anything.
   *
   * @throws TerminalRequestException | IllegalStatusTransitionException | AuthorizationException
   */
  ensureCanTransition(to: TenantRequestStatus, principal: Principal): void {
    const from = this.props.status;
    TenantRequestStatusPolicy.assertTransition(this.props.id, from, to);
    assertAuthorized(
      principal,
      TenantRequestStatusPolicy.actionFor(from, to),
      this.authorizationResource(),
    );
  }

  beginReview(principal: Principal, now: Date): void {
    this.transition(TenantRequestStatus.InReview, principal, now, null);
  }

  /**
   * Link a worker. Eligibility is decided by the caller (see
   * `WorkerAssignmentService`); this only enforces the status graph.
   */
  assignWorker(workerId: string, principal: Principal, now: Date): void {
    this.ensureCanTransition(TenantRequestStatus.Assigned, principal);
    this.props.assignedWorkerId = workerId;
    this.props.assignedAt = now;
    this.transition(TenantRequestStatus.Assigned, principal, now, null);
    this.raiseWorkerAssigned(workerId, null, now);
  }

  /**
   * Check that `principal` may hand this request to `workerId`, without
   * changing anything.
   *
   * @returns the currently assigned worker id
   */
  ensureCanReassign(workerId: string, principal: Principal): string {
    const previous = this.props.assignedWorkerId;
    if (this.isTerminal) {
      throw new TerminalRequestException(this.props.id, this.props.status);
    }
    if (this.props.status !== TenantRequestStatus.Assigned || previous === null) {
      throw new InvariantViolationException(
        'ReassignRequiresAssigned',
        'TenantRequest',
        this.props.id,
        `Request ${this.props.id} is ${this.props.status}; only Assigned requests can be reassigned`,
        'status',
      );
    }
    if (previous === workerId) {
      throw new InvariantViolationException(
        'ReassignToSameWorker',
        'TenantRequest',
        this.props.id,
        `Worker ${workerId} is already assigned to request ${this.props.id}`,
        'assignedWorkerId',
      );
    }
    assertAuthorized(principal, AuthorizationAction.AssignWorker, this.authorizationResource());
    return previous;
  }

  /**
   * Swap the assigned worker. Status stays Assigned.
   *
   * @returns the previously assigned worker id
   */
  reassignWorker(workerId: string, principal: Principal, now: Date): string {
    const previous = this.ensureCanReassign(workerId, principal);

    this.props.assignedWorkerId = workerId;
    this.props.assignedAt = now;
    this.props.updatedAt = now;
    this.props.statusHistory.push({
      from: TenantRequestStatus.Assigned,
      to: TenantRequestStatus.Assigned,
      at: now,
      actorId: principal.userId,
      reason: `reassigned from ${previous}`,
    });
    this.raiseWorkerAssigned(workerId, previous, now);
    return previous;
  }

  startWork(principal: Principal, now: Date): void {
    this.transition(TenantRequestStatus.InProgress, principal, now, null);
  }

  /**
   * Close the request as done. The worker reference is kept.
   *
   * @returns the worker whose active assignment ends
   */
  complete(principal: Principal, now: Date, notes?: string): string {
    const notesValue =
      notes === undefined ? null : validateInput(NonEmptyTextSchema(2000), notes, 'Invalid notes');
    this.ensureCanTransition(TenantRequestStatus.Completed, principal);
    const workerId = this.requireAssignedWorker();

    this.props.completedAt = now;
    this.props.closedAt = now;
    this.props.completionNotes = notesValue;
    this.transition(TenantRequestStatus.Completed, principal, now, null);
    return workerId;
  }

  /**
   * @returns the released worker id, or null when no worker was assigned
   */
  decline(reason: string, principal: Principal, now: Date): string | null {
    const reasonValue = validateInput(ReasonSchema, reason, 'Invalid decline reason');
    this.ensureCanTransition(TenantRequestStatus.Declined, principal);
    const released = this.props.assignedWorkerId;

    this.props.assignedWorkerId = null;
    this.props.closedAt = now;
    this.transition(TenantRequestStatus.Declined, principal, now, reasonValue);
    return released;
  }

  /**
   * @returns the released worker id, or null when no worker was assigned
   */
  escalate(reason: string, principal: Principal, now: Date): string | null {
    const reasonValue = validateInput(ReasonSchema, reason, 'Invalid escalation reason');
    this.ensureCanTransition(TenantRequestStatus.Escalated, principal);
    const released = this.props.assignedWorkerId;

    this.props.assignedWorkerId = null;
    this.transition(TenantRequestStatus.Escalated, principal, now, reasonValue);
    return released;
  }

  resolveEscalation(principal: Principal, now: Date): void {
    this.transition(TenantRequestStatus.InReview, principal, now, null);
  }

  // ==================== Internals ====================

  private transition(
    to: TenantRequestStatus,
    principal: Principal,
    now: Date,
    reason: string | null,
  ): void {
    const from = this.props.status;
    this.ensureCanTransition(to, principal);

    this.props.status = to;
    this.props.updatedAt = now;
    this.props.statusHistory.push({ from, to, at: now, actorId: principal.userId, reason });
    this.assertWorkerLinkConsistent();

    this.raiseEvent(
      new RequestStatusChanged(
        {
          requestId: this.props.id,
          propertyId: this.props.propertyId,
          tenantId: this.props.tenantId,
          from,
          to,
          actorId: principal.userId,
          reason,
          assignedWorkerId: this.props.assignedWorkerId,
        },
        now,
      ),
    );
  }

  private raiseWorkerAssigned(workerId: string, previousWorkerId: string | null, now: Date): void {
    this.raiseEvent(
      new WorkerAssigned(
        {
          requestId: this.props.id,
          propertyId: this.props.propertyId,
          workerId,
          previousWorkerId,
          requiredSpecialization: this.props.requiredSpecialization,
          assignedAt: now.toISOString(),
        },
        now,
      ),
    );
  }

  private requireAssignedWorker(): string {
    const workerId = this.props.assignedWorkerId;
    if (workerId === null) {
      throw new InvariantViolationException(
        'MissingAssignedWorker',
        'TenantRequest',
        this.props.id,
        `Request ${this.props.id} is ${this.props.status} but has no assigned worker`,
        'assignedWorkerId',
      );
    }
    return workerId;
  }

  private assertWorkerLinkConsistent(): void {
    const holds = TenantRequestStatusPolicy.holdsWorker(this.props.status);
    if (holds !== (this.props.assignedWorkerId !== null)) {
      throw new InvariantViolationException(
        'WorkerLinkMismatch',
        'TenantRequest',
        this.props.id,
        `Request ${this.props.id} is ${this.props.status} ` +
          `with assigned worker ${this.props.assignedWorkerId ?? 'none'}`,
        'assignedWorkerId',
      );
    }
  }
}
