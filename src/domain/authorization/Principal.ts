/**
 * rental-repairs-core - Principals and Actions
 *
 * Identity lives outside the core. The host supplies an
 * {@link IPrincipalRoleLookup}; the core only asks "who is this user and how
 * do they relate to properties, tenants and workers?".
 *
 * @module domain/authorization/Principal
 */

export enum PrincipalRole {
  Tenant = 'Tenant',
  PropertyManager = 'PropertyManager',
  Worker = 'Worker',
  System = 'System',
}

/**
 * Everything the core needs to know about the acting user.
 */
export interface Principal {
  readonly userId: string;
  readonly roles: readonly PrincipalRole[];

  /** Tenant record this user acts as, when they hold the Tenant role */
  readonly tenantId?: string;

  /** Worker record this user acts as, when they hold the Worker role */
  readonly workerId?: string;

  /** Properties this user manages */
  readonly managedPropertyIds: readonly string[];
}

/**
 * Resolves a user id to a principal.
 *
 * Returns undefined for an unknown user.
 */
export interface IPrincipalRoleLookup {
  resolve(userId: string): Promise<Principal | undefined>;
}

export enum AuthorizationAction {
  SubmitRequest = 'SubmitRequest',
  ViewRequest = 'ViewRequest',
  BeginReview = 'BeginReview',
  AssignWorker = 'AssignWorker',
  StartWork = 'StartWork',
  CompleteWork = 'CompleteWork',
  Decline = 'Decline',
  Escalate = 'Escalate',
  ResolveEscalation = 'ResolveEscalation',
  RegisterProperty = 'RegisterProperty',
  ViewProperty = 'ViewProperty',
  ChangePropertyStatus = 'ChangePropertyStatus',
  RegisterTenant = 'RegisterTenant',
  RegisterWorker = 'RegisterWorker',
  ChangeWorkerSpecialization = 'ChangeWorkerSpecialization',
  ChangeWorkerStatus = 'ChangeWorkerStatus',
  ListOverdueRequests = 'ListOverdueRequests',
}

/**
 * What an action is performed on. Fields are filled in as far as the action
 * needs them.
 */
export interface AuthorizationResource {
  readonly aggregate?: 'Property' | 'Worker' | 'TenantRequest';
  readonly aggregateId?: string;
  readonly propertyId?: string;
  readonly tenantId?: string;
  readonly assignedWorkerId?: string | null;
}

/**
 * Principal for trusted background processes.
 */
export function systemPrincipal(userId: string = 'system'): Principal {
  return { userId, roles: [PrincipalRole.System], managedPropertyIds: [] };
}
