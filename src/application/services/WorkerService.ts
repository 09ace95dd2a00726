/**
 * rental-repairs-core - Worker Use Cases
 *
 * @module application/services/WorkerService
 */

import { AuthorizationAction, assertAuthorized } from '../../domain/authorization';
import { ValidationException } from '../../domain/exceptions';
import {
  TENANT_REQUEST_REPOSITORY_TOKEN,
  WORKER_REPOSITORY_TOKEN,
} from '../../domain/repository';
import { WorkerSpecialization, parseSpecialization } from '../../domain/specialization';
import { HeldRequest, RegisterWorkerInput, Worker, WorkerSpecifications } from '../../domain/worker';
import { ApplicationService, ServiceDependencies } from './ApplicationService';

export class WorkerService extends ApplicationService {
  constructor(dependencies: ServiceDependencies) {
    super(dependencies);
  }

  /**
   * System only. Emails are unique across workers.
   */
  async registerWorker(actorId: string, input: RegisterWorkerInput): Promise<Worker> {
    return this.execute(
      {
        name: 'registerWorker',
        actorId,
        action: AuthorizationAction.RegisterWorker,
        describe: (worker) => ({ workerId: worker.id, specialization: worker.specialization }),
      },
      async ({ unitOfWork, principal, now }) => {
        assertAuthorized(principal, AuthorizationAction.RegisterWorker, { aggregate: 'Worker' });
        const worker = Worker.register(input, now);

        const workers = unitOfWork.getRepository(WORKER_REPOSITORY_TOKEN);
        if ((await workers.getByEmail(worker.email)) !== undefined) {
          throw new ValidationException('Invalid worker registration', {
            email: [`a worker with email ${worker.email} is already registered`],
          });
        }
        await workers.add(worker);
        return worker;
      },
    );
  }

  /**
   * `specialization` is parsed leniently (case, aliases). The worker's active
   * requests are loaded so the change can be checked against them.
   */
  async changeSpecialization(
    actorId: string,
    workerId: string,
    specialization: string,
    reason: string,
  ): Promise<Worker> {
    return this.execute(
      {
        name: 'changeSpecialization',
        actorId,
        action: AuthorizationAction.ChangeWorkerSpecialization,
        describe: (worker) => ({ workerId: worker.id, specialization: worker.specialization }),
      },
      async ({ unitOfWork, principal, now }) => {
        const next = parseSpecialization(specialization);
        const workers = unitOfWork.getRepository(WORKER_REPOSITORY_TOKEN);
        const requests = unitOfWork.getRepository(TENANT_REQUEST_REPOSITORY_TOKEN);
        const worker = await this.load(workers, 'Worker', workerId);
        assertAuthorized(principal, AuthorizationAction.ChangeWorkerSpecialization, {
          aggregate: 'Worker',
          aggregateId: worker.id,
        });

        const held: HeldRequest[] = [];
        for (const requestId of worker.assignedRequestIds) {
          const request = await this.load(requests, 'TenantRequest', requestId);
          held.push({ id: request.id, requiredSpecialization: request.requiredSpecialization });
        }

        // General only covers what the fallback policy lets it cover for every held trade
        let fallbackAllowed = next === WorkerSpecialization.General;
        for (const trade of new Set(held.map((request) => request.requiredSpecialization))) {
          if (!fallbackAllowed) {
            break;
          }
          fallbackAllowed = await this.generalFallbackAllowed(workers, trade, worker.id);
        }

        worker.changeSpecialization(
          next,
          held,
          { changedBy: principal.userId, reason },
          fallbackAllowed,
          now,
        );
        await workers.update(worker);
        return worker;
      },
    );
  }

  async deactivateWorker(actorId: string, workerId: string, reason: string): Promise<Worker> {
    return this.changeStatus('deactivateWorker', actorId, workerId, (worker, now) =>
      worker.deactivate(reason, now),
    );
  }

  async activateWorker(actorId: string, workerId: string): Promise<Worker> {
    return this.changeStatus('activateWorker', actorId, workerId, (worker, now) =>
      worker.activate(this.settings.maxConcurrentAssignments, now),
    );
  }

  /**
   * Workers who could take the request now: exact trade matches first (least
   * loaded first), then General workers when the fallback policy allows.
   * Workers already holding the request are left out.
   */
  async findEligibleWorkers(actorId: string, requestId: string): Promise<Worker[]> {
    return this.execute(
      {
        name: 'findEligibleWorkers',
        actorId,
        action: AuthorizationAction.AssignWorker,
        describe: (workers) => ({ requestId, candidates: workers.length }),
      },
      async ({ unitOfWork, principal }) => {
        const requests = unitOfWork.getRepository(TENANT_REQUEST_REPOSITORY_TOKEN);
        const workers = unitOfWork.getRepository(WORKER_REPOSITORY_TOKEN);
        const request = await this.load(requests, 'TenantRequest', requestId);
        assertAuthorized(principal, AuthorizationAction.AssignWorker, request.authorizationResource());

        const cap = this.settings.maxConcurrentAssignments;
        const required = request.requiredSpecialization;
        const candidates = await workers.find(
          WorkerSpecifications.eligibleFor(required, cap, false)
            .orderBy('activeAssignmentCount')
            .orderBy('email'),
        );

        if (await this.generalFallbackAllowed(workers, required)) {
          const generalists = await workers.find(
            WorkerSpecifications.active()
              .and(WorkerSpecifications.belowCapacity(cap))
              .and(WorkerSpecifications.bySpecialization(WorkerSpecialization.General))
              .orderBy('activeAssignmentCount')
              .orderBy('email'),
          );
          candidates.push(...generalists);
        }

        return candidates.filter((worker) => !worker.isAssignedTo(request.id));
      },
    );
  }

  private async changeStatus(
    name: string,
    actorId: string,
    workerId: string,
    change: (worker: Worker, now: Date) => void,
  ): Promise<Worker> {
    return this.execute(
      {
        name,
        actorId,
        action: AuthorizationAction.ChangeWorkerStatus,
        describe: (worker) => ({ workerId: worker.id, isActive: worker.isActive }),
      },
      async ({ unitOfWork, principal, now }) => {
        const workers = unitOfWork.getRepository(WORKER_REPOSITORY_TOKEN);
        const worker = await this.load(workers, 'Worker', workerId);
        assertAuthorized(principal, AuthorizationAction.ChangeWorkerStatus, {
          aggregate: 'Worker',
          aggregateId: worker.id,
        });

        change(worker, now);
        await workers.update(worker);
        return worker;
      },
    );
  }
}
