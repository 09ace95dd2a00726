/**
 * @fileoverview In-memory evaluation and compiled store filters must agree
 *
 * Every named specification is checked both ways over aggregates that went
 * through the record store, so dates and arrays are the store's copies.
 */

import {
  AggregateMapping,
  AggregateName,
  ISpecification,
  InMemoryEventBus,
  InMemoryRecordStore,
  InMemoryUnitOfWorkFactory,
  PROPERTY_MAPPING,
  PROPERTY_REPOSITORY_TOKEN,
  Property,
  PropertySpecifications,
  SnapshotMap,
  SpecificationCompiler,
  TENANT_REQUEST_MAPPING,
  TENANT_REQUEST_REPOSITORY_TOKEN,
  TenantRequest,
  TenantRequestSpecifications,
  TenantRequestStatus,
  TenantRequestUrgency,
  WORKER_MAPPING,
  Worker,
  WorkerSpecialization,
  WorkerSpecifications,
  evaluateFilter,
} from '../../../src';
import {
  NOW,
  fileRequest,
  hoursAfter,
  registerProperty,
  registerTenant,
  registerWorker,
  system,
} from '../../helpers/fixtures';

interface Loaded<K extends AggregateName, T> {
  aggregate: T;
  record: SnapshotMap[K];
}

function throughStore<K extends AggregateName, T extends { readonly id: string }>(
  mapping: AggregateMapping<K, T>,
  aggregates: readonly T[],
): Loaded<K, T>[] {
  const store = new InMemoryRecordStore();
  return aggregates.map((aggregate) => {
    store.write(mapping.collection, aggregate.id, mapping.toSnapshot(aggregate), 0);
    const record = store.read(mapping.collection, aggregate.id);
    if (record === undefined) {
      throw new Error(`${mapping.collection} ${aggregate.id} was not stored`);
    }
    return { aggregate: mapping.fromSnapshot(record.data, record.version), record: record.data };
  });
}

function buildWorld() {
  const elm = registerProperty('ELM-12');
  const oak = registerProperty('OAK-3');
  oak.deactivate('renovation', NOW);
  const tenant = registerTenant(elm, '1A');

  const plumber = registerWorker('plumber@example.com', WorkerSpecialization.Plumbing);
  const electrician = registerWorker('electrician@example.com', WorkerSpecialization.Electrical);
  const handyman = registerWorker('handyman@example.com', WorkerSpecialization.General);
  handyman.deactivate('on leave', NOW);

  const tap = fileRequest(elm, tenant, {
    description: 'leaking kitchen tap',
    urgency: TenantRequestUrgency.Low,
  });

  const light = fileRequest(elm, tenant, {
    description: 'broken light switch',
    urgency: TenantRequestUrgency.Emergency,
  });
  light.beginReview(system, NOW);
  light.assignWorker(electrician.id, system, NOW);
  electrician.acceptAssignment(light.id, 3);

  const drain = fileRequest(elm, tenant, {
    description: 'clogged drain',
    urgency: TenantRequestUrgency.High,
  });
  drain.beginReview(system, NOW);
  drain.assignWorker(plumber.id, system, NOW);
  drain.startWork(system, NOW);
  plumber.acceptAssignment(drain.id, 3);

  const duplicate = fileRequest(elm, tenant, {
    description: 'dripping shower head',
    urgency: TenantRequestUrgency.Normal,
  });
  duplicate.beginReview(system, NOW);
  duplicate.decline('already reported', system, NOW);

  const outlet = fileRequest(elm, tenant, {
    description: 'sparking outlet',
    urgency: TenantRequestUrgency.Critical,
  });
  outlet.beginReview(system, NOW);
  outlet.assignWorker(electrician.id, system, NOW);
  outlet.startWork(system, NOW);
  outlet.complete(system, NOW, 'replaced the outlet');

  return {
    elm,
    oak,
    tenant,
    plumber,
    electrician,
    handyman,
    tap,
    light,
    drain,
    outlet,
    properties: throughStore(PROPERTY_MAPPING, [elm, oak]),
    workers: throughStore(WORKER_MAPPING, [plumber, electrician, handyman]),
    requests: throughStore(TENANT_REQUEST_MAPPING, [tap, light, drain, duplicate, outlet]),
  };
}

const world = buildWorld();

function agreement<K extends AggregateName, T>(
  compiler: SpecificationCompiler<T>,
  spec: ISpecification<T>,
  loaded: readonly Loaded<K, T>[],
): { inMemory: boolean[]; compiled: boolean[] } {
  const { filter } = compiler.compile(spec);
  return {
    inMemory: loaded.map(({ aggregate }) => spec.isSatisfiedBy(aggregate)),
    compiled: loaded.map(({ record }) => evaluateFilter(filter, record)),
  };
}

describe('specification agreement', () => {
  describe('Property', () => {
    const compiler = new SpecificationCompiler<Property>(PROPERTY_MAPPING.definition);

    it.each<[string, ISpecification<Property>]>([
      ['byId', PropertySpecifications.byId(world.oak.id)],
      ['byCode', PropertySpecifications.byCode(' elm-12 ')],
      ['inCity', PropertySpecifications.inCity('Springfield')],
      ['inCity with no match', PropertySpecifications.inCity('Riverside')],
      ['active', PropertySpecifications.active()],
      ['not active', PropertySpecifications.active().not()],
      ['managedBy', PropertySpecifications.managedBy('manager-1')],
    ])('should agree on %s', (_name, spec) => {
      const { inMemory, compiled } = agreement(compiler, spec, world.properties);

      expect(compiled).toEqual(inMemory);
    });
  });

  describe('Worker', () => {
    const compiler = new SpecificationCompiler<Worker>(WORKER_MAPPING.definition);

    it.each<[string, ISpecification<Worker>]>([
      ['byId', WorkerSpecifications.byId(world.electrician.id)],
      ['bySpecialization', WorkerSpecifications.bySpecialization(WorkerSpecialization.Plumbing)],
      ['available', WorkerSpecifications.available()],
      ['active', WorkerSpecifications.active()],
      ['byEmail', WorkerSpecifications.byEmail(' Plumber@Example.com ')],
      ['belowCapacity', WorkerSpecifications.belowCapacity(1)],
      ['holding', WorkerSpecifications.holding(world.drain.id)],
      [
        'eligibleFor with fallback',
        WorkerSpecifications.eligibleFor(WorkerSpecialization.Plumbing, 3, true),
      ],
      [
        'eligibleFor without fallback',
        WorkerSpecifications.eligibleFor(WorkerSpecialization.Electrical, 1, false),
      ],
    ])('should agree on %s', (_name, spec) => {
      const { inMemory, compiled } = agreement(compiler, spec, world.workers);

      expect(compiled).toEqual(inMemory);
    });
  });

  describe('TenantRequest', () => {
    const compiler = new SpecificationCompiler<TenantRequest>(TENANT_REQUEST_MAPPING.definition);

    it.each<[string, ISpecification<TenantRequest>]>([
      ['byId', TenantRequestSpecifications.byId(world.tap.id)],
      ['byStatus', TenantRequestSpecifications.byStatus(TenantRequestStatus.Submitted)],
      [
        'byStatuses',
        TenantRequestSpecifications.byStatuses([
          TenantRequestStatus.Assigned,
          TenantRequestStatus.InProgress,
        ]),
      ],
      ['forProperty', TenantRequestSpecifications.forProperty(world.elm.id)],
      ['filedBy', TenantRequestSpecifications.filedBy(world.tenant.id)],
      ['assignedTo', TenantRequestSpecifications.assignedTo(world.electrician.id)],
      ['byUrgency', TenantRequestSpecifications.byUrgency(TenantRequestUrgency.Emergency)],
      ['open', TenantRequestSpecifications.open()],
      [
        'requiringSpecialization',
        TenantRequestSpecifications.requiringSpecialization(WorkerSpecialization.Plumbing),
      ],
      ['overdue at filing time', TenantRequestSpecifications.overdue(NOW)],
      ['overdue a day later', TenantRequestSpecifications.overdue(hoursAfter(NOW, 30))],
      ['overdue a week later', TenantRequestSpecifications.overdue(hoursAfter(NOW, 200))],
      ['activeFor', TenantRequestSpecifications.activeFor(world.plumber.id)],
    ])('should agree on %s', (_name, spec) => {
      const { inMemory, compiled } = agreement(compiler, spec, world.requests);

      expect(compiled).toEqual(inMemory);
    });

    it('should find the same overdue requests both ways after a store round trip', () => {
      const overdue = TenantRequestSpecifications.overdue(hoursAfter(NOW, 30));
      const { filter } = compiler.compile(overdue);

      const inMemory = world.requests
        .filter(({ aggregate }) => overdue.isSatisfiedBy(aggregate))
        .map(({ aggregate }) => aggregate.id);
      const compiled = world.requests
        .filter(({ record }) => evaluateFilter(filter, record))
        .map(({ record }) => record.id);

      expect(inMemory).toEqual([world.light.id, world.drain.id]);
      expect(compiled).toEqual([world.light.id, world.drain.id]);
    });

    const a = TenantRequestSpecifications.open();
    const b = TenantRequestSpecifications.byUrgency(TenantRequestUrgency.Emergency);
    const c = TenantRequestSpecifications.assignedTo(world.electrician.id);
    const d = TenantRequestSpecifications.byStatus(TenantRequestStatus.Submitted);
    const e = TenantRequestSpecifications.overdue(hoursAfter(NOW, 30));
    const f = TenantRequestSpecifications.requiringSpecialization(WorkerSpecialization.Plumbing).not();

    it.each<[string, ISpecification<TenantRequest>, ISpecification<TenantRequest>]>([
      ['and over open, urgency, worker', a.and(b).and(c), a.and(b.and(c))],
      ['and over status, overdue, trade', d.and(e).and(f), d.and(e.and(f))],
      ['or over open, urgency, worker', a.or(b).or(c), a.or(b.or(c))],
      ['or over status, overdue, trade', d.or(e).or(f), d.or(e.or(f))],
      ['mixed grouping', a.and(d.or(e)).or(f), a.and(d.or(e).or(f.and(a))).or(f.and(a.not()))],
    ])('should group %s either way with the same result', (_name, left, right) => {
      const leftResult = agreement(compiler, left, world.requests);
      const rightResult = agreement(compiler, right, world.requests);

      expect(rightResult.inMemory).toEqual(leftResult.inMemory);
      expect(rightResult.compiled).toEqual(leftResult.compiled);
      expect(leftResult.compiled).toEqual(leftResult.inMemory);
    });
  });

  describe('ordering by date', () => {
    it('should sort stored requests by due time in both directions', async () => {
      const factory = new InMemoryUnitOfWorkFactory(new InMemoryRecordStore(), new InMemoryEventBus());
      await factory.create().executeInTransaction(async (uow) => {
        await uow
          .getRepository(PROPERTY_REPOSITORY_TOKEN)
          .add(Property.fromSnapshot(world.elm.toSnapshot(), 0));
        for (const { record } of world.requests) {
          await uow
            .getRepository(TENANT_REQUEST_REPOSITORY_TOKEN)
            .add(TenantRequest.fromSnapshot(record, 0));
        }
      });

      const [ascending, descending] = await factory.create().executeInTransaction(async (uow) => {
        const requests = uow.getRepository(TENANT_REQUEST_REPOSITORY_TOKEN);
        return Promise.all([
          requests.find(TenantRequestSpecifications.open().orderBy('dueAt')),
          requests.find(TenantRequestSpecifications.open().orderBy('dueAt', 'desc')),
        ]);
      });

      expect(ascending.map((request) => request.id)).toEqual([
        world.light.id,
        world.drain.id,
        world.tap.id,
      ]);
      expect(descending.map((request) => request.id)).toEqual([
        world.tap.id,
        world.drain.id,
        world.light.id,
      ]);
    });
  });
});
