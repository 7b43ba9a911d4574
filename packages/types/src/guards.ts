/**
 * Runtime Type Guards
 *
 * Narrowing functions for values crossing a system boundary
 * (API inputs, attestation payloads, stored data).
 */

import { ATTESTATION_TYPES } from "./attestation.js";
import type { AttestationType } from "./attestation.js";
import { COMMITMENT_TYPES, MAX_DURATION_DAYS } from "./commitment.js";
import type { CommitmentType } from "./commitment.js";
import { DomainError } from "./errors.js";

const COMMITMENT_TYPE_SET: ReadonlySet<string> = new Set(COMMITMENT_TYPES);
const ATTESTATION_TYPE_SET: ReadonlySet<string> = new Set(ATTESTATION_TYPES);

export function isCommitmentType(value: unknown): value is CommitmentType {
  return typeof value === "string" && COMMITMENT_TYPE_SET.has(value);
}

export function isAttestationType(value: unknown): value is AttestationType {
  return typeof value === "string" && ATTESTATION_TYPE_SET.has(value);
}

/** Integer percentage in [0, 100]. */
export function isPercent(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= 100;
}

/** Whole number of days in [1, MAX_DURATION_DAYS]. */
export function isDurationDays(value: unknown): value is number {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 1 &&
    value <= MAX_DURATION_DAYS
  );
}

export function isDomainError(value: unknown): value is DomainError {
  return value instanceof DomainError;
}
