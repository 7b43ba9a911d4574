/**
 * In-memory durable store.
 *
 * Tables are opened by name; each opener owns its table. Values are
 * structurally cloned on write and on read, so a record handed out by
 * `get()` is a snapshot: mutating it never changes stored state.
 *
 * Suitable for tests and single-process deployments. All state is lost
 * on process exit.
 */

import { DomainError } from "@commitlock/types";
import type { DurableStore, StorageTier, StoreKey, StoreTable } from "@commitlock/types";

export class StoreError extends DomainError<"TABLE_ALREADY_OPEN"> {
  public readonly table: string;

  constructor(table: string) {
    super("TABLE_ALREADY_OPEN", `Table "${table}" is already open`);
    this.name = "StoreError";
    this.table = table;
  }
}

class InMemoryTable<K extends StoreKey, V> implements StoreTable<K, V> {
  public readonly name: string;
  public readonly tier: StorageTier;
  private readonly _rows = new Map<K, V>();

  constructor(name: string, tier: StorageTier) {
    this.name = name;
    this.tier = tier;
  }

  get(key: K): V | undefined {
    const value = this._rows.get(key);
    return value === undefined ? undefined : structuredClone(value);
  }

  set(key: K, value: V): void {
    this._rows.set(key, structuredClone(value));
  }

  has(key: K): boolean {
    return this._rows.has(key);
  }

  keys(): readonly K[] {
    return [...this._rows.keys()];
  }

  get size(): number {
    return this._rows.size;
  }
}

export class InMemoryDurableStore implements DurableStore {
  private readonly _tables = new Map<string, StorageTier>();

  open<K extends StoreKey, V>(name: string, tier: StorageTier): StoreTable<K, V> {
    if (this._tables.has(name)) {
      throw new StoreError(name);
    }
    this._tables.set(name, tier);
    return new InMemoryTable<K, V>(name, tier);
  }

  /** Names of every opened table, with their tier. */
  tables(): readonly { readonly name: string; readonly tier: StorageTier }[] {
    return [...this._tables.entries()].map(([name, tier]) => ({ name, tier }));
  }
}
