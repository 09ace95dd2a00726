/**
 * rental-repairs-core - Worker Aggregate
 *
 * A tradesperson with exactly one specialization and a bounded number of
 * active assignments. `isAvailable` is recomputed after every change to the
 * assignment list or the active flag: active and below the concurrency cap.
 *
 * @module domain/worker/Worker
 */

import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import { AggregateRoot } from '../events';
import {
  AssignmentRejectedException,
  AssignmentRejectionReason,
  InvariantViolationException,
  ValidationException,
} from '../exceptions';
import { WorkerSpecialization, canHandle, specializationDisplayName } from '../specialization';
import { EmailSchema, NonEmptyTextSchema, validateInput } from '../validation';
import {
  AssignmentReleaseReason,
  WorkerActivated,
  WorkerDeactivated,
  WorkerRegistered,
  WorkerSpecializationChanged,
  WorkerUnassigned,
} from './events';

/**
 * Audit entry written by every specialization change.
 */
export interface SpecializationChange {
  readonly from: WorkerSpecialization;
  readonly to: WorkerSpecialization;
  readonly changedBy: string;
  readonly reason: string;
  readonly at: Date;
}

export interface WorkerSnapshot {
  id: string;
  email: string;
  fullName: string;
  specialization: WorkerSpecialization;
  isActive: boolean;
  isAvailable: boolean;
  activeAssignmentCount: number;
  assignedRequestIds: string[];
  specializationHistory: SpecializationChange[];
  deactivationReason: string | null;
  registeredAt: Date;
}

export const RegisterWorkerSchema = z.object({
  email: EmailSchema,
  fullName: NonEmptyTextSchema(120),
  specialization: z.nativeEnum(WorkerSpecialization),
});

export type RegisterWorkerInput = z.input<typeof RegisterWorkerSchema>;

export const SpecializationChangeAuditSchema = z.object({
  changedBy: z.string().trim().min(1, 'is required'),
  reason: NonEmptyTextSchema(500),
});

export type SpecializationChangeAudit = z.input<typeof SpecializationChangeAuditSchema>;

/**
 * What the worker needs to know about a request it holds.
 */
export interface HeldRequest {
  readonly id: string;
  readonly requiredSpecialization: WorkerSpecialization;
}

const CapacitySchema = z.number().int().positive();

/**
 * @throws ValidationException unless the cap is a positive integer
 */
export function validateCapacity(maxConcurrentAssignments: number): number {
  const result = CapacitySchema.safeParse(maxConcurrentAssignments);
  if (!result.success) {
    throw new ValidationException('Invalid assignment capacity', {
      maxConcurrentAssignments: ['must be a positive integer'],
    });
  }
  return result.data;
}

export class Worker extends AggregateRoot {
  private constructor(
    private props: WorkerSnapshot,
    version: number,
  ) {
    super(version);
  }

  static register(input: RegisterWorkerInput, now: Date): Worker {
    const data = validateInput(RegisterWorkerSchema, input, 'Invalid worker registration');
    const worker = new Worker(
      {
        id: uuidv4(),
        email: data.email,
        fullName: data.fullName,
        specialization: data.specialization,
        isActive: true,
        isAvailable: true,
        activeAssignmentCount: 0,
        assignedRequestIds: [],
        specializationHistory: [],
        deactivationReason: null,
        registeredAt: now,
      },
      0,
    );

    worker.raiseEvent(
      new WorkerRegistered(
        {
          workerId: worker.id,
          email: data.email,
          fullName: data.fullName,
          specialization: data.specialization,
        },
        now,
      ),
    );
    return worker;
  }

  static fromSnapshot(snapshot: WorkerSnapshot, version: number): Worker {
    return new Worker(structuredClone(snapshot), version);
  }

  toSnapshot(): WorkerSnapshot {
    return structuredClone(this.props);
  }

  get id(): string {
    return this.props.id;
  }

  get email(): string {
    return this.props.email;
  }

  get fullName(): string {
    return this.props.fullName;
  }

  get specialization(): WorkerSpecialization {
    return this.props.specialization;
  }

  get isActive(): boolean {
    return this.props.isActive;
  }

  get isAvailable(): boolean {
    return this.props.isAvailable;
  }

  get activeAssignmentCount(): number {
    return this.props.activeAssignmentCount;
  }

  get assignedRequestIds(): readonly string[] {
    return this.props.assignedRequestIds;
  }

  get specializationHistory(): readonly SpecializationChange[] {
    return this.props.specializationHistory;
  }

  get deactivationReason(): string | null {
    return this.props.deactivationReason;
  }

  get registeredAt(): Date {
    return this.props.registeredAt;
  }

  isAssignedTo(requestId: string): boolean {
    return this.props.assignedRequestIds.includes(requestId);
  }

  hasCapacity(maxConcurrentAssignments: number): boolean {
    return this.props.activeAssignmentCount < maxConcurrentAssignments;
  }

  // ==================== Assignments ====================

  /**
   * Take on a request. Specialization is the caller's check; the worker
   * enforces its own availability and capacity.
   *
   * @throws AssignmentRejectedException without changing state
   */
  acceptAssignment(requestId: string, maxConcurrentAssignments: number): void {
    const cap = validateCapacity(maxConcurrentAssignments);
    if (this.isAssignedTo(requestId)) {
      throw new AssignmentRejectedException(
        AssignmentRejectionReason.AlreadyAssigned,
        this.id,
        requestId,
        `Worker ${this.id} is already assigned to request ${requestId}`,
      );
    }
    if (!this.props.isActive) {
      throw new AssignmentRejectedException(
        AssignmentRejectionReason.Unavailable,
        this.id,
        requestId,
        `Worker ${this.id} is not active`,
      );
    }
    if (!this.hasCapacity(cap)) {
      throw new AssignmentRejectedException(
        AssignmentRejectionReason.AtCapacity,
        this.id,
        requestId,
        `Worker ${this.id} already holds ${this.props.activeAssignmentCount} of ${cap} assignments`,
      );
    }

    this.props.assignedRequestIds.push(requestId);
    this.recomputeAvailability(cap);
  }

  /**
   * End an active assignment.
   */
  releaseAssignment(
    requestId: string,
    reason: AssignmentReleaseReason,
    maxConcurrentAssignments: number,
    now: Date,
  ): void {
    const cap = validateCapacity(maxConcurrentAssignments);
    if (!this.isAssignedTo(requestId)) {
      throw new InvariantViolationException(
        'AssignmentNotHeld',
        'Worker',
        this.id,
        `Worker ${this.id} does not hold request ${requestId}`,
        'assignedRequestIds',
        { requestId },
      );
    }

    this.props.assignedRequestIds = this.props.assignedRequestIds.filter((id) => id !== requestId);
    this.recomputeAvailability(cap);

    this.raiseEvent(
      new WorkerUnassigned(
        {
          workerId: this.id,
          requestId,
          reason,
          activeAssignmentCount: this.props.activeAssignmentCount,
          isAvailable: this.props.isAvailable,
        },
        now,
      ),
    );
  }

  // ==================== Specialization ====================

  /**
   * Audited specialization change. `heldRequests` are the worker's active
   * assignments; each must still be coverable by the new value.
   *
   * Setting the current value again is a no-op.
   */
  changeSpecialization(
    next: WorkerSpecialization,
    heldRequests: readonly HeldRequest[],
    audit: SpecializationChangeAudit,
    fallbackAllowed: boolean,
    now: Date,
  ): void {
    const auditData = validateInput(SpecializationChangeAuditSchema, audit, 'Invalid audit data');
    const previous = this.props.specialization;
    if (next === previous) {
      return;
    }

    const heldIds = new Set(heldRequests.map((request) => request.id));
    const missing = this.props.assignedRequestIds.filter((id) => !heldIds.has(id));
    if (missing.length > 0) {
      throw new ValidationException('Incomplete assignment data', {
        heldRequests: [`missing active assignments: ${missing.join(', ')}`],
      });
    }

    const conflicts = heldRequests.filter(
      (request) =>
        this.isAssignedTo(request.id) &&
        !canHandle(next, request.requiredSpecialization, fallbackAllowed),
    );
    if (conflicts.length > 0) {
      throw new InvariantViolationException(
        'SpecializationConflictsWithAssignments',
        'Worker',
        this.id,
        `Worker ${this.id} cannot change to ${specializationDisplayName(next)} while holding ` +
          `requests that need another trade: ${conflicts.map((request) => request.id).join(', ')}`,
        'specialization',
        { conflictingRequestIds: conflicts.map((request) => request.id) },
      );
    }

    this.props.specialization = next;
    this.props.specializationHistory.push({
      from: previous,
      to: next,
      changedBy: auditData.changedBy,
      reason: auditData.reason,
      at: now,
    });

    this.raiseEvent(
      new WorkerSpecializationChanged(
        {
          workerId: this.id,
          from: previous,
          to: next,
          changedBy: auditData.changedBy,
          reason: auditData.reason,
        },
        now,
      ),
    );
  }

  // ==================== Activation ====================

  /**
   * Take the worker out of rotation. Requires no active assignments; an
   * already inactive worker is left unchanged.
   */
  deactivate(reason: string, now: Date): void {
    const reasonValue = validateInput(NonEmptyTextSchema(500), reason, 'Invalid deactivation reason');
    if (!this.props.isActive) {
      return;
    }
    if (this.props.assignedRequestIds.length > 0) {
      throw new InvariantViolationException(
        'WorkerHasActiveAssignments',
        'Worker',
        this.id,
        `Worker ${this.id} still holds ${this.props.assignedRequestIds.length} active assignment(s)`,
        'assignedRequestIds',
      );
    }

    this.props.isActive = false;
    this.props.isAvailable = false;
    this.props.deactivationReason = reasonValue;
    this.raiseEvent(new WorkerDeactivated({ workerId: this.id, reason: reasonValue }, now));
  }

  activate(maxConcurrentAssignments: number, now: Date): void {
    const cap = validateCapacity(maxConcurrentAssignments);
    if (this.props.isActive) {
      return;
    }

    this.props.isActive = true;
    this.props.deactivationReason = null;
    this.recomputeAvailability(cap);
    this.raiseEvent(new WorkerActivated({ workerId: this.id }, now));
  }

  private recomputeAvailability(cap: number): void {
    this.props.activeAssignmentCount = this.props.assignedRequestIds.length;
    this.props.isAvailable = this.props.isActive && this.props.activeAssignmentCount < cap;
  }
}
