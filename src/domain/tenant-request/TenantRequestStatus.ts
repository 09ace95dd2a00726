/**
 * rental-repairs-core - Request Status Policy
 *
 * The state machine governing TenantRequest transitions and which action
 * (and therefore which principals) each transition needs.
 *
 * ```
 * Submitted  -> InReview | Declined
 * InReview   -> Assigned | Declined | Escalated
 * Assigned   -> InProgress | Declined | Escalated
 * InProgress -> Completed | Escalated
 * Escalated  -> InReview
 * Completed, Declined: terminal
 * ```
 *
 * @module domain/tenant-request/TenantRequestStatus
 */

import { AuthorizationAction } from '../authorization';
import { IllegalStatusTransitionException, TerminalRequestException } from '../exceptions';

export enum TenantRequestStatus {
  Submitted = 'Submitted',
  InReview = 'InReview',
  Assigned = 'Assigned',
  InProgress = 'InProgress',
  Completed = 'Completed',
  Declined = 'Declined',
  Escalated = 'Escalated',
}

const TRANSITIONS: Readonly<Record<TenantRequestStatus, readonly TenantRequestStatus[]>> = {
  [TenantRequestStatus.Submitted]: [TenantRequestStatus.InReview, TenantRequestStatus.Declined],
  [TenantRequestStatus.InReview]: [
    TenantRequestStatus.Assigned,
    TenantRequestStatus.Declined,
    TenantRequestStatus.Escalated,
  ],
  [TenantRequestStatus.Assigned]: [
    TenantRequestStatus.InProgress,
    TenantRequestStatus.Declined,
    TenantRequestStatus.Escalated,
  ],
  [TenantRequestStatus.InProgress]: [TenantRequestStatus.Completed, TenantRequestStatus.Escalated],
  [TenantRequestStatus.Escalated]: [TenantRequestStatus.InReview],
  [TenantRequestStatus.Completed]: [],
  [TenantRequestStatus.Declined]: [],
};

const WORKER_HOLDING: readonly TenantRequestStatus[] = [
  TenantRequestStatus.Assigned,
  TenantRequestStatus.InProgress,
  TenantRequestStatus.Completed,
];

export const TERMINAL_STATUSES: readonly TenantRequestStatus[] = [
  TenantRequestStatus.Completed,
  TenantRequestStatus.Declined,
];

export const OPEN_STATUSES: readonly TenantRequestStatus[] = Object.values(
  TenantRequestStatus,
).filter((status) => !TERMINAL_STATUSES.includes(status));

export const TenantRequestStatusPolicy = {
  allowedTransitions(from: TenantRequestStatus): readonly TenantRequestStatus[] {
    return TRANSITIONS[from];
  },

  canTransition(from: TenantRequestStatus, to: TenantRequestStatus): boolean {
    return TRANSITIONS[from].includes(to);
  },

  isTerminal(status: TenantRequestStatus): boolean {
    return TERMINAL_STATUSES.includes(status);
  },

  /** Statuses in which the request references a worker */
  holdsWorker(status: TenantRequestStatus): boolean {
    return WORKER_HOLDING.includes(status);
  },

  /**
   * @throws TerminalRequestException when `from` is terminal
   * @throws IllegalStatusTransitionException when `to` is not a successor
   */
  assertTransition(requestId: string, from: TenantRequestStatus, to: TenantRequestStatus): void {
    if (TenantRequestStatusPolicy.isTerminal(from)) {
      throw new TerminalRequestException(requestId, from);
    }
    if (!TenantRequestStatusPolicy.canTransition(from, to)) {
      throw new IllegalStatusTransitionException(requestId, from, to, TRANSITIONS[from]);
    }
  },

  /**
   * The action a principal needs to move a request from `from` to `to`.
   */
  actionFor(from: TenantRequestStatus, to: TenantRequestStatus): AuthorizationAction {
    switch (to) {
      case TenantRequestStatus.InReview:
        return from === TenantRequestStatus.Escalated
          ? AuthorizationAction.ResolveEscalation
          : AuthorizationAction.BeginReview;
      case TenantRequestStatus.Assigned:
        return AuthorizationAction.AssignWorker;
      case TenantRequestStatus.InProgress:
        return AuthorizationAction.StartWork;
      case TenantRequestStatus.Completed:
        return AuthorizationAction.CompleteWork;
      case TenantRequestStatus.Declined:
        return AuthorizationAction.Decline;
      case TenantRequestStatus.Escalated:
        return AuthorizationAction.Escalate;
      case TenantRequestStatus.Submitted:
        return AuthorizationAction.SubmitRequest;
    }
  },
};
