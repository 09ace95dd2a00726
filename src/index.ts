/**
 * rental-repairs-core
 *
 * Maintenance workflow core for rental properties: tenants file repair
 * requests, managers review and assign them to workers of the right trade,
 * and workers carry them to completion.
 *
 * ## Architecture Layers
 *
 * - `domain`: aggregates (Property, Worker, TenantRequest), specifications,
 *   status and authorization policies, repository and unit-of-work ports
 * - `application`: use-case services, settings, conflict retry
 * - `infrastructure`: winston logger, in-memory store adapter
 *
 * @example
 * ```typescript
 * const settings = loadSettings();
 * const logger = createLogger({ level: settings.logLevel });
 * const factory = new InMemoryUnitOfWorkFactory(
 *   new InMemoryRecordStore(),
 *   new InMemoryEventBus(logger),
 *   logger,
 * );
 * const requests = new TenantRequestService({
 *   unitOfWorkFactory: factory,
 *   principals,
 *   settings,
 *   logger,
 * });
 * ```
 *
 * @packageDocumentation
 */

export * from './domain';
export * from './application';
export * from './infrastructure';
