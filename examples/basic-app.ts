/**
 * rental-repairs-core - Basic Example
 *
 * Walks one repair request through the workflow:
 * - settings and logger from the environment
 * - in-memory store, event bus and unit-of-work factory
 * - property, worker and request services
 * - an event handler reacting to committed events
 *
 * Run with LOG_LEVEL=debug to see unit-of-work logging.
 */

import {
  IPrincipalRoleLookup,
  InMemoryEventBus,
  InMemoryRecordStore,
  InMemoryUnitOfWorkFactory,
  Principal,
  PrincipalRole,
  PropertyService,
  TenantRequestService,
  WorkerService,
  WorkerSpecialization,
  createLogger,
  isDomainException,
  loadSettings,
  systemPrincipal,
} from '../src';

// ==================== Principals ====================
// Hosts resolve principals from their identity provider; a map is enough here.

class StaticPrincipals implements IPrincipalRoleLookup {
  private readonly byId = new Map<string, Principal>();

  add(principal: Principal): Principal {
    this.byId.set(principal.userId, principal);
    return principal;
  }

  async resolve(userId: string): Promise<Principal | undefined> {
    return this.byId.get(userId);
  }
}

async function main(): Promise<void> {
  const settings = loadSettings();
  const logger = createLogger({ level: settings.logLevel });

  const eventBus = new InMemoryEventBus(logger);
  eventBus.registerHandler('WorkerAssigned', {
    handle: async (event) => {
      logger.info('Notify worker', { eventId: event.metadata.eventId, payload: event.payload });
    },
  });

  const dependencies = {
    unitOfWorkFactory: new InMemoryUnitOfWorkFactory(new InMemoryRecordStore(), eventBus, logger),
    principals: new StaticPrincipals(),
    settings,
    logger,
  };
  dependencies.principals.add(systemPrincipal());

  const properties = new PropertyService(dependencies);
  const workers = new WorkerService(dependencies);
  const requests = new TenantRequestService(dependencies);

  // ==================== Setup ====================

  const property = await properties.registerProperty('system', {
    code: 'MAPLE-7',
    name: 'Maple Apartments',
    address: { street: '7 Maple Avenue', city: 'Riverside', postalCode: '54321' },
    managerId: 'manager-1',
    units: ['101', '102', '201'],
  });
  const manager = dependencies.principals.add({
    userId: 'manager-1',
    roles: [PrincipalRole.PropertyManager],
    managedPropertyIds: [property.id],
  });

  const tenant = await properties.registerTenant(manager.userId, property.id, {
    email: 'resident@example.com',
    fullName: 'Sample Resident',
    unitNumber: '101',
  });
  const resident = dependencies.principals.add({
    userId: 'resident-1',
    roles: [PrincipalRole.Tenant],
    tenantId: tenant.id,
    managedPropertyIds: [],
  });

  const plumber = await workers.registerWorker('system', {
    email: 'plumber@example.com',
    fullName: 'Sample Plumber',
    specialization: WorkerSpecialization.Plumbing,
  });
  const plumberLogin = dependencies.principals.add({
    userId: 'plumber-1',
    roles: [PrincipalRole.Worker],
    workerId: plumber.id,
    managedPropertyIds: [],
  });

  // ==================== Workflow ====================

  const request = await requests.fileRequest(resident.userId, property.id, {
    title: 'Kitchen sink',
    description: 'The kitchen tap has been dripping since Monday',
  });
  logger.info('Request filed', {
    requestId: request.id,
    requiredSpecialization: request.requiredSpecialization,
    dueAt: request.dueAt.toISOString(),
  });

  await requests.beginReview(manager.userId, request.id);
  const [candidate] = await workers.findEligibleWorkers(manager.userId, request.id);
  if (candidate === undefined) {
    logger.warn('No eligible worker', { requestId: request.id });
    return;
  }

  await requests.assignWorker(manager.userId, request.id, candidate.id);
  await requests.startWork(plumberLogin.userId, request.id);
  const done = await requests.completeWork(plumberLogin.userId, request.id, 'Replaced cartridge');

  logger.info('Request closed', {
    requestId: done.id,
    status: done.status,
    history: done.statusHistory.map((change) => change.to),
  });
}

main().catch((error: unknown) => {
  if (isDomainException(error)) {
    console.error(`${error.code}: ${error.message}`);
  } else {
    console.error(error);
  }
  process.exitCode = 1;
});
