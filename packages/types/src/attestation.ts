/**
 * Attestation and health types.
 */

import type { Address, Timestamp } from "./primitives.js";

export const ATTESTATION_TYPES = [
  "health_check",
  "violation",
  "fee_generation",
  "drawdown",
  "other",
] as const;

export type AttestationType = (typeof ATTESTATION_TYPES)[number];

/**
 * A timestamped claim about a commitment's condition.
 * Immutable once stored.
 */
export interface Attestation {
  readonly commitmentId: string;
  readonly attestationType: AttestationType;
  readonly data: Readonly<Record<string, string>>;
  readonly isCompliant: boolean;
  readonly verifiedBy: Address;
  readonly timestamp: Timestamp;
}

/**
 * Merged view of a commitment's health. Values come from the commitment
 * ledger snapshot; fees, last attestation and score come from the
 * compliance engine's own records.
 */
export interface HealthMetrics {
  readonly commitmentId: string;
  readonly initialValue: bigint;
  readonly currentValue: bigint;
  readonly drawdownPercent: bigint;
  readonly feesGenerated: bigint;
  readonly volatilityExposure: bigint;
  /** 0 when no attestation has been recorded. */
  readonly lastAttestation: Timestamp;
  readonly complianceScore: number;
}
