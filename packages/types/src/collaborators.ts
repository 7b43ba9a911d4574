/**
 * Collaborator interfaces.
 *
 * Components never reach for ambient host state. Authorization, storage,
 * notification, time and the violation oracle are injected at
 * construction through these interfaces.
 */

import type { Address, Timestamp } from "./primitives.js";

// =============================================================================
// Authorization
// =============================================================================

export interface AuthorizationProvider {
  /**
   * Throws AuthorizationError unless the ambient caller is authorized
   * as `principal`.
   */
  requireAuth(principal: Address): void;

  /**
   * Run `operation` with `principal` additionally authorized. Used when a
   * component calls another component on its own behalf.
   */
  invokeAs<T>(principal: Address, operation: () => T): T;
}

// =============================================================================
// Durable Store
// =============================================================================

/**
 * - instance: small singletons owned by one component (admin, counters)
 * - persistent: per-entity records
 */
export type StorageTier = "instance" | "persistent";

export type StoreKey = string | number;

export interface StoreTable<K extends StoreKey, V> {
  readonly name: string;
  readonly tier: StorageTier;
  get(key: K): V | undefined;
  set(key: K, value: V): void;
  has(key: K): boolean;
  /** Keys in insertion order. */
  keys(): readonly K[];
}

export interface DurableStore {
  /**
   * Open a named table. Each name may be opened once per store; the
   * opener owns the table.
   */
  open<K extends StoreKey, V>(name: string, tier: StorageTier): StoreTable<K, V>;
}

// =============================================================================
// Events
// =============================================================================

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue };

export type EventPayload = Readonly<Record<string, JsonValue>>;

/**
 * Fire-and-forget notification sink. No acknowledgement, no retry.
 */
export interface EventSink {
  publish(topic: string, payload: EventPayload): void;
}

// =============================================================================
// Time & Oracles
// =============================================================================

export interface Clock {
  now(): Timestamp;
}

export interface ViolationOracle {
  /** True while the commitment has an open violation. */
  getViolationFlag(commitmentId: string): boolean;
}

// =============================================================================
// Diagnostics
// =============================================================================

/**
 * The slice of a pino logger the components use.
 */
export interface DiagnosticLogger {
  warn(context: Record<string, unknown>, message: string): void;
}
