/**
 * In-memory event sink.
 *
 * Implements the fire-and-forget EventSink the components publish to,
 * and keeps every event in a hash-chained log that can be read back,
 * subscribed to and verified.
 *
 * Properties:
 * - O(1) publish (amortized)
 * - Synchronous subscription dispatch, topic subscribers first
 * - No durability guarantees
 * - Timestamps come from the injected Clock, so an event carries the same
 *   time as the state change that published it
 */

import { SystemClock } from "@commitlock/host";
import type { Clock, EventPayload, EventSink } from "@commitlock/types";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";
import type {
  EventHandler,
  EventStoreOptions,
  IntegrityResult,
  PublishedEvent,
  ReadOptions,
  Subscription,
  UnhashedEvent,
} from "./types.js";
import { EventStoreError } from "./types.js";

export class InMemoryEventStore implements EventSink {
  /** Global log, in publish order */
  private readonly _log: PublishedEvent[] = [];

  /** Per-topic views of the log */
  private readonly _topics = new Map<string, PublishedEvent[]>();

  private readonly _topicSubscribers = new Map<string, Set<EventHandler>>();
  private readonly _globalSubscribers = new Set<EventHandler>();

  private _lastHash: string = GENESIS_HASH;

  private readonly _clock: Clock;

  constructor(options: EventStoreOptions = {}) {
    this._clock = options.clock ?? new SystemClock();
  }

  // ─── Publish ────────────────────────────────────────────────────────

  publish(topic: string, payload: EventPayload): void {
    this._validateTopic(topic);

    let stream = this._topics.get(topic);
    if (stream === undefined) {
      stream = [];
      this._topics.set(topic, stream);
    }

    const base: UnhashedEvent = {
      topic,
      payload,
      sequence: this._log.length + 1,
      topicVersion: stream.length + 1,
      publishedAt: this._clock.now(),
    };
    const previousHash = this._lastHash;
    const event: PublishedEvent = {
      ...base,
      hash: computeEventHash(base, previousHash),
      previousHash,
    };
    this._lastHash = event.hash;

    this._log.push(event);
    stream.push(event);

    this._dispatch(event);
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(topic: string, options?: ReadOptions): readonly PublishedEvent[] {
    this._validateTopic(topic);
    return this._select(this._topics.get(topic) ?? [], options);
  }

  readAll(options?: ReadOptions): readonly PublishedEvent[] {
    return this._select(this._log, options);
  }

  topics(): readonly string[] {
    return [...this._topics.keys()];
  }

  /** Sequence of the last published event, or 0 when empty. */
  get sequence(): number {
    return this._log.length;
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(topic: string, handler: EventHandler): Subscription {
    this._validateTopic(topic);

    let subscribers = this._topicSubscribers.get(topic);
    if (subscribers === undefined) {
      subscribers = new Set();
      this._topicSubscribers.set(topic, subscribers);
    }
    subscribers.add(handler);

    return {
      unsubscribe: () => {
        subscribers.delete(handler);
        if (subscribers.size === 0) {
          this._topicSubscribers.delete(topic);
        }
      },
    };
  }

  subscribeAll(handler: EventHandler): Subscription {
    this._globalSubscribers.add(handler);

    return {
      unsubscribe: () => {
        this._globalSubscribers.delete(handler);
      },
    };
  }

  // ─── Integrity ──────────────────────────────────────────────────────

  verifyIntegrity(): IntegrityResult {
    return verifyHashChain(this._log);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _select(
    events: readonly PublishedEvent[],
    options: ReadOptions | undefined,
  ): readonly PublishedEvent[] {
    const direction = options?.direction ?? "forward";
    const fromSequence = options?.fromSequence;
    const maxCount = options?.maxCount;

    if (fromSequence !== undefined && fromSequence < 1) {
      throw new EventStoreError(
        "INVALID_SEQUENCE",
        `fromSequence must be >= 1, got ${fromSequence}`,
      );
    }

    let result: PublishedEvent[];
    if (direction === "forward") {
      const from = fromSequence ?? 1;
      result = events.filter((e) => e.sequence >= from);
    } else {
      const from = fromSequence ?? Number.POSITIVE_INFINITY;
      result = events.filter((e) => e.sequence <= from).reverse();
    }

    if (maxCount !== undefined && maxCount >= 0) {
      result = result.slice(0, maxCount);
    }

    return result;
  }

  private _validateTopic(topic: string): void {
    if (topic.length === 0) {
      throw new EventStoreError("INVALID_TOPIC", "Topic must be a non-empty string");
    }
  }

  private _dispatch(event: PublishedEvent): void {
    const topicSubs = this._topicSubscribers.get(event.topic);
    if (topicSubs !== undefined) {
      for (const handler of topicSubs) {
        handler(event);
      }
    }

    for (const handler of this._globalSubscribers) {
      handler(event);
    }
  }
}
