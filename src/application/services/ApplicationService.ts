/**
 * rental-repairs-core - Application Service Base
 *
 * Shared use-case plumbing: resolve the acting principal, run the work in a
 * fresh unit of work, retry the whole attempt on a concurrency conflict, and
 * log the outcome.
 *
 * @module application/services/ApplicationService
 */

import { v4 as uuidv4 } from 'uuid';
import { AuthorizationAction, IPrincipalRoleLookup, Principal } from '../../domain/authorization';
import { IClock, systemClock } from '../../domain/clock';
import { OperationContext } from '../../domain/context';
import {
  AggregateName,
  AuthorizationException,
  NotFoundException,
  isDomainException,
} from '../../domain/exceptions';
import type { IRepository, IUnitOfWork, IUnitOfWorkFactory, IWorkerRepository } from '../../domain/repository';
import { WorkerSpecialization, isGeneralFallbackAllowed } from '../../domain/specialization';
import { WorkerSpecifications } from '../../domain/worker';
import { DEFAULT_SETTINGS, MaintenanceSettings } from '../config';
import { ILogger, LogMetadata, noopLogger } from '../ports';
import { executeWithConflictRetry } from '../resilience';

export interface ServiceDependencies {
  readonly unitOfWorkFactory: IUnitOfWorkFactory;
  readonly principals: IPrincipalRoleLookup;
  readonly settings?: MaintenanceSettings;
  readonly clock?: IClock;
  readonly logger?: ILogger;
}

/**
 * What a use case body receives for one attempt.
 */
export interface UseCaseScope {
  readonly unitOfWork: IUnitOfWork;
  readonly principal: Principal;
  /** Read once per attempt */
  readonly now: Date;
}

export interface UseCaseDefinition<TResult> {
  /** Name used in log lines, e.g. `assignWorker` */
  readonly name: string;
  readonly actorId: string;
  /** Action reported when the actor cannot be resolved */
  readonly action: AuthorizationAction;
  /** Log fields describing the outcome */
  readonly describe?: (result: TResult) => LogMetadata;
}

export abstract class ApplicationService {
  protected readonly unitOfWorkFactory: IUnitOfWorkFactory;
  protected readonly principals: IPrincipalRoleLookup;
  protected readonly settings: MaintenanceSettings;
  protected readonly clock: IClock;
  protected readonly logger: ILogger;

  protected constructor(dependencies: ServiceDependencies) {
    this.unitOfWorkFactory = dependencies.unitOfWorkFactory;
    this.principals = dependencies.principals;
    this.settings = dependencies.settings ?? DEFAULT_SETTINGS;
    this.clock = dependencies.clock ?? systemClock;
    this.logger = dependencies.logger ?? noopLogger;
  }

  /**
   * Run `work` as one use case. Events raised inside carry the operation's
   * correlation id; a fresh one is generated when the caller has none.
   */
  protected async execute<TResult>(
    useCase: UseCaseDefinition<TResult>,
    work: (scope: UseCaseScope) => Promise<TResult>,
  ): Promise<TResult> {
    const attempt = (): Promise<TResult> =>
      executeWithConflictRetry(
        async () => {
          const principal = await this.resolvePrincipal(useCase.actorId, useCase.action);
          return this.unitOfWorkFactory
            .create()
            .executeInTransaction((unitOfWork) =>
              work({ unitOfWork, principal, now: this.clock.now() }),
            );
        },
        {
          maxAttempts: this.settings.conflictRetry.maxAttempts,
          delayMs: this.settings.conflictRetry.delayMs,
          onRetry: (error, attemptNumber, delayMs) =>
            this.logger.warn('Concurrency conflict, retrying', {
              useCase: useCase.name,
              attempt: attemptNumber,
              delayMs,
              aggregate: error.aggregate,
              aggregateId: error.aggregateId,
            }),
        },
      );

    try {
      const result = await (OperationContext.current() === undefined
        ? OperationContext.run({ correlationId: uuidv4(), actorId: useCase.actorId }, attempt)
        : attempt());
      this.logger.info(`${useCase.name} completed`, {
        useCase: useCase.name,
        actorId: useCase.actorId,
        ...useCase.describe?.(result),
      });
      return result;
    } catch (error) {
      if (isDomainException(error)) {
        this.logger.warn(`${useCase.name} rejected`, {
          useCase: useCase.name,
          actorId: useCase.actorId,
          category: error.category,
          code: error.code,
          message: error.message,
        });
      } else {
        this.logger.error(`${useCase.name} failed`, {
          useCase: useCase.name,
          actorId: useCase.actorId,
          error: error instanceof Error ? error.message : String(error),
        });
      }
      throw error;
    }
  }

  /**
   * @throws AuthorizationException for an unknown user
   */
  protected async resolvePrincipal(userId: string, action: AuthorizationAction): Promise<Principal> {
    const principal = await this.principals.resolve(userId);
    if (principal === undefined) {
      throw new AuthorizationException(
        action,
        userId,
        undefined,
        undefined,
        `Unknown principal ${userId} may not ${action}`,
      );
    }
    return principal;
  }

  /**
   * @throws NotFoundException
   */
  protected async load<T>(
    repository: IRepository<T>,
    aggregate: AggregateName,
    id: string,
  ): Promise<T> {
    const found = await repository.get(id);
    if (found === undefined) {
      throw new NotFoundException(aggregate, id);
    }
    return found;
  }

  /**
   * Whether a General worker may cover `required` right now, under the
   * configured policy. Counts exact-match workers who could take it, leaving
   * out `excludeWorkerId` (a worker whose own trade is being changed).
   */
  protected async generalFallbackAllowed(
    workers: IWorkerRepository,
    required: WorkerSpecialization,
    excludeWorkerId?: string,
  ): Promise<boolean> {
    const policy = this.settings.generalFallback;
    let exactMatches = 0;
    if (policy === 'when-no-exact-match' && required !== WorkerSpecialization.General) {
      let candidates = WorkerSpecifications.eligibleFor(
        required,
        this.settings.maxConcurrentAssignments,
        false,
      );
      if (excludeWorkerId !== undefined) {
        candidates = candidates.and(WorkerSpecifications.byId(excludeWorkerId).not());
      }
      exactMatches = await workers.count(candidates);
    }
    return isGeneralFallbackAllowed(policy, required, exactMatches);
  }
}
