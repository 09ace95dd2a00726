/**
 * rental-repairs-core - Domain Exceptions
 *
 * Every rejection raised by the core is a DomainException. The `category`
 * tells callers how to render it (invalid input, broken rule, forbidden,
 * stale write) without inspecting class names.
 */

/**
 * Error categories, one per failure family the core can report.
 */
export type ExceptionCategory =
  | 'validation'
  | 'invariant'
  | 'authorization'
  | 'concurrency'
  | 'not-found'
  | 'contract'
  | 'infrastructure';

/**
 * Names of the aggregates exceptions can refer to.
 */
export type AggregateName = 'Property' | 'Worker' | 'TenantRequest';

/**
 * Base class for all core exceptions
 */
export class DomainException extends Error {
  constructor(
    public readonly category: ExceptionCategory,
    public readonly code: string,
    message: string,
    public readonly details: Readonly<Record<string, unknown>> = {},
  ) {
    super(message);
    this.name = 'DomainException';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Type guard for callers that receive `unknown` from a catch clause.
 */
export function isDomainException(error: unknown): error is DomainException {
  return error instanceof DomainException;
}

// ==================== Validation ====================

/**
 * Malformed input to a constructor or command. Nothing was applied.
 */
export class ValidationException extends DomainException {
  constructor(
    message: string = 'Validation Failed',
    public readonly errors: Readonly<Record<string, string[]>> = {},
  ) {
    super('validation', 'ValidationFailed', message, { errors });
    this.name = 'ValidationException';
  }
}

// ==================== Invariants ====================

/**
 * An operation would break a domain rule.
 */
export class InvariantViolationException extends DomainException {
  constructor(
    public readonly rule: string,
    public readonly aggregate: AggregateName,
    public readonly aggregateId: string,
    message: string,
    public readonly field?: string,
    details: Record<string, unknown> = {},
  ) {
    super('invariant', rule, message, {
      aggregate,
      aggregateId,
      ...(field !== undefined && { field }),
      ...details,
    });
    this.name = 'InvariantViolationException';
  }
}

/**
 * The target status is not a successor of the current one.
 *
 * Valid input never reaches this; it signals a caller or data defect.
 */
export class IllegalStatusTransitionException extends InvariantViolationException {
  constructor(
    requestId: string,
    public readonly from: string,
    public readonly to: string,
    public readonly allowed: readonly string[],
  ) {
    super(
      'IllegalStatusTransition',
      'TenantRequest',
      requestId,
      `Cannot transition request ${requestId} from ${from} to ${to}. ` +
        `Allowed transitions: ${allowed.length > 0 ? allowed.join(', ') : 'none'}`,
      'status',
      { from, to, allowed },
    );
    this.name = 'IllegalStatusTransitionException';
  }
}

/**
 * The request is Completed or Declined and can no longer change.
 */
export class TerminalRequestException extends InvariantViolationException {
  constructor(
    requestId: string,
    public readonly status: string,
  ) {
    super(
      'TerminalRequest',
      'TenantRequest',
      requestId,
      `Request ${requestId} is ${status} and can no longer be modified`,
      'status',
      { status },
    );
    this.name = 'TerminalRequestException';
  }
}

/**
 * Why a worker could not take a request.
 */
export enum AssignmentRejectionReason {
  SpecializationMismatch = 'SpecializationMismatch',
  Unavailable = 'Unavailable',
  AtCapacity = 'AtCapacity',
  AlreadyAssigned = 'AlreadyAssigned',
}

/**
 * A worker failed the eligibility check. Neither aggregate was mutated.
 */
export class AssignmentRejectedException extends InvariantViolationException {
  constructor(
    public readonly reason: AssignmentRejectionReason,
    public readonly workerId: string,
    requestId: string,
    message: string,
  ) {
    super('AssignmentRejected', 'TenantRequest', requestId, message, 'assignedWorkerId', {
      reason,
      workerId,
    });
    this.name = 'AssignmentRejectedException';
  }
}

// ==================== Authorization ====================

/**
 * The acting principal lacks the role or relationship the action needs.
 */
export class AuthorizationException extends DomainException {
  constructor(
    public readonly action: string,
    public readonly principalId: string,
    public readonly aggregate?: AggregateName,
    public readonly aggregateId?: string,
    message: string = `Principal ${principalId} is not allowed to ${action}`,
  ) {
    super('authorization', 'Forbidden', message, {
      action,
      principalId,
      ...(aggregate !== undefined && { aggregate }),
      ...(aggregateId !== undefined && { aggregateId }),
    });
    this.name = 'AuthorizationException';
  }
}

// ==================== Persistence ====================

/**
 * A write was based on a stale read. Callers reload and retry.
 */
export class ConcurrencyException extends DomainException {
  constructor(
    public readonly aggregate: string,
    public readonly aggregateId: string,
    public readonly expectedVersion: number | null,
    public readonly actualVersion: number | null,
    message: string = `${aggregate} ${aggregateId} was modified concurrently ` +
      `(expected version ${expectedVersion ?? 'none'}, found ${actualVersion ?? 'none'})`,
    code: string = 'StaleVersion',
  ) {
    super('concurrency', code, message, { aggregate, aggregateId, expectedVersion, actualVersion });
    this.name = 'ConcurrencyException';
  }
}

/**
 * A concurrent write already stored a value that is unique per collection
 * (property code, worker email). Retrying the use case sees the winner.
 */
export class UniqueKeyConflictException extends ConcurrencyException {
  constructor(
    aggregate: AggregateName,
    aggregateId: string,
    public readonly field: string,
    public readonly value: string,
    public readonly existingId: string,
  ) {
    super(
      aggregate,
      aggregateId,
      null,
      null,
      `${aggregate} ${field} "${value}" is already held by ${existingId}`,
      'DuplicateKey',
    );
    this.name = 'UniqueKeyConflictException';
  }
}

/**
 * The referenced aggregate does not exist.
 */
export class NotFoundException extends DomainException {
  constructor(
    public readonly aggregate: AggregateName,
    public readonly aggregateId: string,
  ) {
    super('not-found', 'NotFound', `${aggregate} ${aggregateId} was not found`, {
      aggregate,
      aggregateId,
    });
    this.name = 'NotFoundException';
  }
}

/**
 * A specification uses something the target store adapter cannot express.
 * Raised while compiling, before any query runs.
 */
export class UnsupportedSpecificationException extends DomainException {
  constructor(
    public readonly adapter: string,
    public readonly reason: string,
  ) {
    super('contract', 'UnsupportedSpecification', `${adapter}: ${reason}`, { adapter, reason });
    this.name = 'UnsupportedSpecificationException';
  }
}

/**
 * A unit of work was used in a state that does not allow the call
 * (commit without start, unregistered repository).
 */
export class UnitOfWorkStateException extends DomainException {
  constructor(
    public readonly unitOfWorkId: string,
    public readonly state: string,
    message: string,
  ) {
    super('infrastructure', 'InvalidUnitOfWorkState', message, { unitOfWorkId, state });
    this.name = 'UnitOfWorkStateException';
  }
}

/**
 * One or more event handlers failed. All handlers were still invoked.
 */
export class EventDispatchException extends DomainException {
  constructor(
    public readonly failures: ReadonlyArray<{ eventName: string; eventId: string; error: Error }>,
  ) {
    super(
      'infrastructure',
      'EventDispatchFailed',
      `${failures.length} event handler(s) failed`,
      {
        failures: failures.map((f) => ({
          eventName: f.eventName,
          eventId: f.eventId,
          message: f.error.message,
        })),
      },
    );
    this.name = 'EventDispatchException';
  }
}
