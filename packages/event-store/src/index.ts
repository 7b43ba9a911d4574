/**
 * @commitlock/event-store: Hash-chained notification log.
 *
 * The EventSink implementation components publish to. Events are
 * immutable, ordered, hash-linked and replayable by topic or globally.
 */

export { InMemoryEventStore } from "./in-memory-store.js";
export { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";
export { EventStoreError } from "./types.js";
export type {
  EventHandler,
  EventStoreErrorCode,
  EventStoreOptions,
  IntegrityError,
  IntegrityResult,
  PublishedEvent,
  ReadDirection,
  ReadOptions,
  Subscription,
  UnhashedEvent,
} from "./types.js";
export * from "./topics.js";
