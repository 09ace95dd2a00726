/**
 * @fileoverview Unit tests for the request status policy and urgency levels
 */

import {
  AuthorizationAction,
  IllegalStatusTransitionException,
  OPEN_STATUSES,
  TenantRequestStatus,
  TenantRequestStatusPolicy,
  TenantRequestUrgency,
  TerminalRequestException,
  ValidationException,
  expectedResolutionHours,
  parseUrgency,
  requiresImmediateAttention,
} from '../../../src';

const {
  Submitted,
  InReview,
  Assigned,
  InProgress,
  Completed,
  Declined,
  Escalated,
} = TenantRequestStatus;

describe('TenantRequestStatusPolicy', () => {
  describe('transition graph', () => {
    it.each([
      [Submitted, [InReview, Declined]],
      [InReview, [Assigned, Declined, Escalated]],
      [Assigned, [InProgress, Declined, Escalated]],
      [InProgress, [Completed, Escalated]],
      [Escalated, [InReview]],
      [Completed, []],
      [Declined, []],
    ])('should allow %s -> %p', (from, allowed) => {
      expect(TenantRequestStatusPolicy.allowedTransitions(from)).toEqual(allowed);
    });

    it('should reject skipping review', () => {
      expect(TenantRequestStatusPolicy.canTransition(Submitted, Assigned)).toBe(false);
    });

    it('should not allow completing from Assigned', () => {
      expect(TenantRequestStatusPolicy.canTransition(Assigned, Completed)).toBe(false);
    });

    it('should not allow declining work in progress', () => {
      expect(TenantRequestStatusPolicy.canTransition(InProgress, Declined)).toBe(false);
    });
  });

  describe('status classes', () => {
    it('should treat Completed and Declined as terminal', () => {
      expect(TenantRequestStatusPolicy.isTerminal(Completed)).toBe(true);
      expect(TenantRequestStatusPolicy.isTerminal(Declined)).toBe(true);
      expect(TenantRequestStatusPolicy.isTerminal(Escalated)).toBe(false);
    });

    it('should list every non-terminal status as open', () => {
      expect(OPEN_STATUSES).toEqual([Submitted, InReview, Assigned, InProgress, Escalated]);
    });

    it('should hold a worker while Assigned, InProgress or Completed', () => {
      expect(TenantRequestStatusPolicy.holdsWorker(Assigned)).toBe(true);
      expect(TenantRequestStatusPolicy.holdsWorker(InProgress)).toBe(true);
      expect(TenantRequestStatusPolicy.holdsWorker(Completed)).toBe(true);
      expect(TenantRequestStatusPolicy.holdsWorker(Escalated)).toBe(false);
      expect(TenantRequestStatusPolicy.holdsWorker(Declined)).toBe(false);
    });
  });

  describe('assertTransition', () => {
    it('should pass for a legal transition', () => {
      expect(() =>
        TenantRequestStatusPolicy.assertTransition('req-1', Submitted, InReview),
      ).not.toThrow();
    });

    it('should report the allowed successors of an illegal transition', () => {
      let caught: unknown;
      try {
        TenantRequestStatusPolicy.assertTransition('req-1', Submitted, Completed);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(IllegalStatusTransitionException);
      expect(caught).toMatchObject({
        code: 'IllegalStatusTransition',
        category: 'invariant',
        from: Submitted,
        to: Completed,
        allowed: [InReview, Declined],
        message:
          'Cannot transition request req-1 from Submitted to Completed. ' +
          'Allowed transitions: InReview, Declined',
      });
    });

    it('should report a terminal source separately', () => {
      expect(() =>
        TenantRequestStatusPolicy.assertTransition('req-1', Completed, InReview),
      ).toThrowErrorType(TerminalRequestException);
    });
  });

  describe('actionFor', () => {
    it('should map each target status to the action it needs', () => {
      expect(TenantRequestStatusPolicy.actionFor(Submitted, InReview)).toBe(
        AuthorizationAction.BeginReview,
      );
      expect(TenantRequestStatusPolicy.actionFor(Escalated, InReview)).toBe(
        AuthorizationAction.ResolveEscalation,
      );
      expect(TenantRequestStatusPolicy.actionFor(InReview, Assigned)).toBe(
        AuthorizationAction.AssignWorker,
      );
      expect(TenantRequestStatusPolicy.actionFor(Assigned, InProgress)).toBe(
        AuthorizationAction.StartWork,
      );
      expect(TenantRequestStatusPolicy.actionFor(InProgress, Completed)).toBe(
        AuthorizationAction.CompleteWork,
      );
      expect(TenantRequestStatusPolicy.actionFor(Assigned, Declined)).toBe(
        AuthorizationAction.Decline,
      );
      expect(TenantRequestStatusPolicy.actionFor(InProgress, Escalated)).toBe(
        AuthorizationAction.Escalate,
      );
    });
  });
});

describe('TenantRequestUrgency', () => {
  it.each([
    [TenantRequestUrgency.Low, 168],
    [TenantRequestUrgency.Normal, 72],
    [TenantRequestUrgency.High, 24],
    [TenantRequestUrgency.Critical, 4],
    [TenantRequestUrgency.Emergency, 2],
  ])('should give %s requests %i hours', (urgency, hours) => {
    expect(expectedResolutionHours(urgency)).toBe(hours);
  });

  it('should flag Critical and Emergency for immediate attention', () => {
    expect(requiresImmediateAttention(TenantRequestUrgency.Critical)).toBe(true);
    expect(requiresImmediateAttention(TenantRequestUrgency.Emergency)).toBe(true);
    expect(requiresImmediateAttention(TenantRequestUrgency.High)).toBe(false);
  });

  it('should parse levels case-insensitively', () => {
    expect(parseUrgency(' emergency ')).toBe(TenantRequestUrgency.Emergency);
    expect(() => parseUrgency('whenever')).toThrowErrorType(ValidationException);
  });
});
