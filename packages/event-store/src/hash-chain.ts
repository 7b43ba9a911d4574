/**
 * Hash chain for a tamper-evident notification log.
 *
 * Each event is hashed using RFC 8785 (JCS) canonicalization + SHA-256.
 * The hash includes the previous event's hash:
 *
 *   event[1].hash = sha256(canonicalize(event[1]) + "genesis")
 *   event[n].hash = sha256(canonicalize(event[n]) + event[n-1].hash)
 *
 * Any modification to any event breaks the chain from that point forward.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  IntegrityError,
  IntegrityResult,
  PublishedEvent,
  UnhashedEvent,
} from "./types.js";

export const GENESIS_HASH = "genesis";

function canonicalEventContent(event: UnhashedEvent): string {
  return canonicalize({
    topic: event.topic,
    payload: event.payload,
    sequence: event.sequence,
    topicVersion: event.topicVersion,
    publishedAt: event.publishedAt,
  });
}

/**
 * Hex-encoded SHA-256 of an event given its predecessor's hash.
 */
export function computeEventHash(event: UnhashedEvent, previousHash: string): string {
  return createHash("sha256")
    .update(canonicalEventContent(event) + previousHash)
    .digest("hex");
}

/**
 * Verify the chain of a sequence of events in sequence order.
 */
export function verifyHashChain(events: readonly PublishedEvent[]): IntegrityResult {
  const errors: IntegrityError[] = [];
  let lastVerifiedSequence = 0;
  let previousHash = GENESIS_HASH;

  for (const event of events) {
    if (event.previousHash !== previousHash) {
      errors.push({
        sequence: event.sequence,
        reason: `previousHash mismatch at sequence ${event.sequence}: expected "${previousHash}", got "${event.previousHash}"`,
      });
    }

    const expectedHash = computeEventHash(event, event.previousHash);
    if (event.hash !== expectedHash) {
      errors.push({
        sequence: event.sequence,
        reason: `Hash mismatch at sequence ${event.sequence}: expected "${expectedHash}", got "${event.hash}"`,
      });
    }

    previousHash = event.hash;
    lastVerifiedSequence = event.sequence;
  }

  return {
    valid: errors.length === 0,
    lastVerifiedSequence,
    errors,
  };
}
