/**
 * @fileoverview Shared builders for domain and integration tests
 */

import {
  FileRequestInput,
  IPrincipalRoleLookup,
  Principal,
  PrincipalRole,
  Property,
  TenantRequest,
  Tenant,
  Worker,
  WorkerSpecialization,
  systemPrincipal,
} from '../../src';

export const NOW = new Date('2026-03-02T09:00:00.000Z');

export const system: Principal = systemPrincipal();

export function managerOf(...propertyIds: string[]): Principal {
  return {
    userId: 'manager-1',
    roles: [PrincipalRole.PropertyManager],
    managedPropertyIds: propertyIds,
  };
}

export function tenantPrincipal(tenantId: string): Principal {
  return {
    userId: `user-${tenantId}`,
    roles: [PrincipalRole.Tenant],
    tenantId,
    managedPropertyIds: [],
  };
}

export function workerPrincipal(workerId: string): Principal {
  return {
    userId: `user-${workerId}`,
    roles: [PrincipalRole.Worker],
    workerId,
    managedPropertyIds: [],
  };
}

export function registerProperty(code: string = 'ELM-12'): Property {
  const property = Property.register(
    {
      code,
      name: 'Elm Court',
      address: { street: '12 Elm Street', city: 'Springfield', postalCode: '12345' },
      managerId: 'manager-1',
      units: ['1A', '1B', '2A'],
    },
    NOW,
  );
  property.clearEvents();
  return property;
}

export function registerTenant(property: Property, unitNumber: string = '1A'): Tenant {
  const tenant = property.registerTenant(
    { email: `tenant-${unitNumber.toLowerCase()}@example.com`, fullName: 'Test Tenant', unitNumber },
    NOW,
  );
  property.clearEvents();
  return tenant;
}

export function registerWorker(
  email: string,
  specialization: WorkerSpecialization,
): Worker {
  const worker = Worker.register({ email, fullName: 'Test Worker', specialization }, NOW);
  worker.clearEvents();
  return worker;
}

/**
 * Files a request as the tenant and clears creation events.
 */
export function fileRequest(
  property: Property,
  tenant: Tenant,
  input: Omit<FileRequestInput, 'tenantId'>,
): TenantRequest {
  const request = property.fileRequest(
    { ...input, tenantId: tenant.id },
    tenantPrincipal(tenant.id),
    NOW,
  );
  request.clearEvents();
  property.clearEvents();
  return request;
}

export class InMemoryPrincipalLookup implements IPrincipalRoleLookup {
  private readonly principals = new Map<string, Principal>();

  add(principal: Principal): Principal {
    this.principals.set(principal.userId, principal);
    return principal;
  }

  async resolve(userId: string): Promise<Principal | undefined> {
    return this.principals.get(userId);
  }
}

export function hoursAfter(start: Date, hours: number): Date {
  return new Date(start.getTime() + hours * 60 * 60 * 1000);
}

export function thrownBy(action: () => unknown): unknown {
  try {
    action();
  } catch (error) {
    return error;
  }
  throw new Error('expected the action to throw');
}
