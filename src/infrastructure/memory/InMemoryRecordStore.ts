/**
 * rental-repairs-core - In-Memory Record Store
 *
 * Versioned snapshot storage, one collection per aggregate type. Records are
 * cloned on the way in and out, so callers never share state with the store.
 *
 * The store is an explicit object handed to units of work; there is no
 * process-wide instance.
 *
 * @module infrastructure/memory/InMemoryRecordStore
 */

import {
  AggregateName,
  ConcurrencyException,
  UniqueKeyConflictException,
} from '../../domain/exceptions';
import type { PropertySnapshot } from '../../domain/property';
import type { TenantRequestSnapshot } from '../../domain/tenant-request';
import type { WorkerSnapshot } from '../../domain/worker';

export interface SnapshotMap {
  Property: PropertySnapshot;
  Worker: WorkerSnapshot;
  TenantRequest: TenantRequestSnapshot;
}

export interface StoredRecord<TData> {
  readonly id: string;
  /** Starts at 1 for the first write */
  readonly version: number;
  readonly data: TData;
}

type Collections = {
  [K in AggregateName]: Map<string, StoredRecord<SnapshotMap[K]>>;
};

type UniqueKeys = {
  readonly [K in AggregateName]: readonly (keyof SnapshotMap[K] & string)[];
};

/** Fields no two records of a collection may share */
const UNIQUE_KEYS: UniqueKeys = {
  Property: ['code'],
  Worker: ['email'],
  TenantRequest: [],
};

export class InMemoryRecordStore {
  private readonly collections: Collections = {
    Property: new Map(),
    Worker: new Map(),
    TenantRequest: new Map(),
  };

  read<K extends AggregateName>(
    collection: K,
    id: string,
  ): StoredRecord<SnapshotMap[K]> | undefined {
    const record = this.collections[collection].get(id);
    return record === undefined ? undefined : structuredClone(record);
  }

  scan<K extends AggregateName>(collection: K): StoredRecord<SnapshotMap[K]>[] {
    return [...this.collections[collection].values()].map((record) => structuredClone(record));
  }

  /**
   * Stored version, 0 when the record does not exist.
   */
  versionOf(collection: AggregateName, id: string): number {
    return this.collections[collection].get(id)?.version ?? 0;
  }

  /**
   * Whether `write` would accept this record now.
   *
   * @throws ConcurrencyException when the stored version differs
   * @throws UniqueKeyConflictException when another record holds one of the
   *   collection's unique values
   */
  check<K extends AggregateName>(
    collection: K,
    id: string,
    data: SnapshotMap[K],
    expectedVersion: number,
  ): void {
    const actual = this.versionOf(collection, id);
    if (actual !== expectedVersion) {
      throw new ConcurrencyException(
        collection,
        id,
        expectedVersion === 0 ? null : expectedVersion,
        actual === 0 ? null : actual,
      );
    }

    const records: Map<string, StoredRecord<SnapshotMap[K]>> = this.collections[collection];
    for (const field of UNIQUE_KEYS[collection]) {
      const value = data[field];
      for (const record of records.values()) {
        if (record.id !== id && record.data[field] === value) {
          throw new UniqueKeyConflictException(collection, id, field, String(value), record.id);
        }
      }
    }
  }

  /**
   * Write a record if its stored version still equals `expectedVersion`
   * (0 to insert) and its unique values are free.
   *
   * @returns the new version
   * @throws ConcurrencyException as `check` does
   */
  write<K extends AggregateName>(
    collection: K,
    id: string,
    data: SnapshotMap[K],
    expectedVersion: number,
  ): number {
    this.check(collection, id, data, expectedVersion);
    const version = expectedVersion + 1;
    this.collections[collection].set(id, { id, version, data: structuredClone(data) });
    return version;
  }

  /**
   * Put back a record as it was before a write; `undefined` removes it.
   * Used to compensate a partially applied commit.
   */
  restore<K extends AggregateName>(
    collection: K,
    id: string,
    previous: StoredRecord<SnapshotMap[K]> | undefined,
  ): void {
    if (previous === undefined) {
      this.collections[collection].delete(id);
      return;
    }
    this.collections[collection].set(id, structuredClone(previous));
  }

  size(collection: AggregateName): number {
    return this.collections[collection].size;
  }
}
