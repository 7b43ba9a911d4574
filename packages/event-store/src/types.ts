/**
 * Core types.
 *
 * Design principles:
 * - Published events are immutable
 * - The log is append-only (no UPDATE, no DELETE)
 * - Every event has a global sequence and a version within its topic
 * - Every event is hash-linked to its predecessor
 */

import type { Clock, EventPayload, Timestamp } from "@commitlock/types";

// =============================================================================
// Published Event
// =============================================================================

export interface PublishedEvent {
  readonly topic: string;
  readonly payload: EventPayload;

  /** Position across all topics (1-based, monotonically increasing) */
  readonly sequence: number;

  /** Position within this topic (1-based, monotonically increasing) */
  readonly topicVersion: number;

  /** Clock reading when the event was recorded */
  readonly publishedAt: Timestamp;

  /** SHA-256 of this event's canonical content plus `previousHash` */
  readonly hash: string;

  readonly previousHash: string;
}

export interface EventStoreOptions {
  /** Source of `publishedAt`; share it with the publishing components. */
  readonly clock?: Clock | undefined;
}

/** An event before it is linked into the chain. */
export type UnhashedEvent = Omit<PublishedEvent, "hash" | "previousHash">;

// =============================================================================
// Read Options
// =============================================================================

export type ReadDirection = "forward" | "backward";

export interface ReadOptions {
  /** Start from this sequence (inclusive). Default: 1 forward, last backward */
  readonly fromSequence?: number;
  /** Maximum number of events to return. Default: unlimited */
  readonly maxCount?: number;
  readonly direction?: ReadDirection;
}

// =============================================================================
// Subscription
// =============================================================================

export type EventHandler = (event: PublishedEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly sequence: number;
  readonly reason: string;
}

export interface IntegrityResult {
  readonly valid: boolean;
  readonly lastVerifiedSequence: number;
  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode = "INVALID_TOPIC" | "INVALID_SEQUENCE";

export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly topic?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
