/**
 * rental-repairs-core - Authorization Policy
 *
 * Decides whether a principal may perform an action on a resource. A denial
 * is an expected outcome, reported as {@link AuthorizationException} and kept
 * apart from invariant violations.
 */

import { AuthorizationException } from '../exceptions';
import {
  AuthorizationAction,
  AuthorizationResource,
  Principal,
  PrincipalRole,
} from './Principal';

function hasRole(principal: Principal, role: PrincipalRole): boolean {
  return principal.roles.includes(role);
}

function isSystem(principal: Principal): boolean {
  return hasRole(principal, PrincipalRole.System);
}

function managesProperty(principal: Principal, propertyId: string | undefined): boolean {
  return (
    propertyId !== undefined &&
    hasRole(principal, PrincipalRole.PropertyManager) &&
    principal.managedPropertyIds.includes(propertyId)
  );
}

function isOwningTenant(principal: Principal, tenantId: string | undefined): boolean {
  return (
    tenantId !== undefined &&
    hasRole(principal, PrincipalRole.Tenant) &&
    principal.tenantId === tenantId
  );
}

function isAssignedWorker(principal: Principal, workerId: string | null | undefined): boolean {
  return (
    typeof workerId === 'string' &&
    hasRole(principal, PrincipalRole.Worker) &&
    principal.workerId === workerId
  );
}

/**
 * Pure decision; no side effects.
 */
export function isAuthorized(
  principal: Principal,
  action: AuthorizationAction,
  resource: AuthorizationResource = {},
): boolean {
  switch (action) {
    case AuthorizationAction.SubmitRequest:
      return isOwningTenant(principal, resource.tenantId);

    case AuthorizationAction.ViewRequest:
      return (
        isSystem(principal) ||
        isOwningTenant(principal, resource.tenantId) ||
        managesProperty(principal, resource.propertyId) ||
        isAssignedWorker(principal, resource.assignedWorkerId)
      );

    case AuthorizationAction.BeginReview:
    case AuthorizationAction.AssignWorker:
    case AuthorizationAction.Decline:
    case AuthorizationAction.Escalate:
    case AuthorizationAction.ResolveEscalation:
    case AuthorizationAction.RegisterTenant:
    case AuthorizationAction.ViewProperty:
      return isSystem(principal) || managesProperty(principal, resource.propertyId);

    case AuthorizationAction.StartWork:
    case AuthorizationAction.CompleteWork:
      return (
        isSystem(principal) ||
        managesProperty(principal, resource.propertyId) ||
        isAssignedWorker(principal, resource.assignedWorkerId)
      );

    case AuthorizationAction.ListOverdueRequests:
      return isSystem(principal) || hasRole(principal, PrincipalRole.PropertyManager);

    case AuthorizationAction.RegisterProperty:
    case AuthorizationAction.ChangePropertyStatus:
    case AuthorizationAction.RegisterWorker:
    case AuthorizationAction.ChangeWorkerSpecialization:
    case AuthorizationAction.ChangeWorkerStatus:
      return isSystem(principal);
  }
}

/**
 * @throws AuthorizationException when the principal may not act
 */
export function assertAuthorized(
  principal: Principal,
  action: AuthorizationAction,
  resource: AuthorizationResource = {},
): void {
  if (!isAuthorized(principal, action, resource)) {
    throw new AuthorizationException(
      action,
      principal.userId,
      resource.aggregate,
      resource.aggregateId,
    );
  }
}
