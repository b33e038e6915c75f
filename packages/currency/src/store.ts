/**
 * @mintage/currency — Keyed resource storage.
 *
 * The core never owns persistence. It reads and writes through a
 * ResourceStore: at most one resource per (address, kind, currency),
 * with exclusive create and exclusive remove.
 */

import type { Address, CurrencyCode } from "@mintage/types";
import type { MintCapability } from "./mint-capability.js";
import type { PreburnQueue } from "./preburn-queue.js";
import type { SupplyLedger } from "./supply-ledger.js";
import { AlreadyExistsError, NotFoundError } from "./types.js";

/** What each store slot kind holds. */
export interface StoredResources {
  "mint-capability": MintCapability;
  "supply-ledger": SupplyLedger;
  "preburn-queue": PreburnQueue;
}

export type StoredKind = keyof StoredResources;

export interface ResourceKey<K extends StoredKind = StoredKind> {
  readonly address: Address;
  readonly kind: K;
  readonly currency: CurrencyCode;
}

export interface ResourceStore {
  get<K extends StoredKind>(key: ResourceKey<K>): StoredResources[K] | undefined;

  has(key: ResourceKey): boolean;

  /**
   * Put a resource into an empty slot.
   * @throws AlreadyExistsError if the slot is occupied
   */
  insert<K extends StoredKind>(key: ResourceKey<K>, resource: StoredResources[K]): void;

  /**
   * Take a resource out of its slot, leaving the slot empty.
   * @throws NotFoundError if the slot is empty
   */
  remove<K extends StoredKind>(key: ResourceKey<K>): StoredResources[K];
}

export function describeKey(key: ResourceKey): string {
  return `${key.kind}<${key.currency}> at ${key.address}`;
}

type Tables = { [K in StoredKind]: Map<string, StoredResources[K]> };

/**
 * Map-backed ResourceStore, one table per kind.
 */
export class InMemoryResourceStore implements ResourceStore {
  private readonly _tables: Tables = {
    "mint-capability": new Map(),
    "supply-ledger": new Map(),
    "preburn-queue": new Map(),
  };

  get<K extends StoredKind>(key: ResourceKey<K>): StoredResources[K] | undefined {
    const table = this._tables[key.kind];
    return table.get(slot(key));
  }

  has(key: ResourceKey): boolean {
    return this._tables[key.kind].has(slot(key));
  }

  insert<K extends StoredKind>(key: ResourceKey<K>, resource: StoredResources[K]): void {
    const table = this._tables[key.kind];
    const id = slot(key);
    if (table.has(id)) {
      throw new AlreadyExistsError(`${describeKey(key)} already exists`);
    }
    table.set(id, resource);
  }

  remove<K extends StoredKind>(key: ResourceKey<K>): StoredResources[K] {
    const table = this._tables[key.kind];
    const id = slot(key);
    const resource = table.get(id);
    if (resource === undefined) {
      throw new NotFoundError(`${describeKey(key)} does not exist`);
    }
    table.delete(id);
    return resource;
  }

  /** Number of occupied slots of one kind. */
  count(kind: StoredKind): number {
    return this._tables[kind].size;
  }
}

function slot(key: ResourceKey): string {
  return `${key.address}/${key.currency}`;
}
