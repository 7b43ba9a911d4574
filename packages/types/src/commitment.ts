/**
 * Commitment Types
 *
 * A commitment locks an amount of an asset for a fixed number of days
 * under a rule set. Its status is a closed three-state variant:
 *
 *   active ──► settled      (after expiry)
 *      └─────► early_exit   (any time while active, with a penalty)
 *
 * Both settled and early_exit are terminal.
 */

import type { Address, Timestamp } from "./primitives.js";

export const COMMITMENT_TYPES = ["safe", "balanced", "aggressive"] as const;

/** Risk profile of a commitment. */
export type CommitmentType = (typeof COMMITMENT_TYPES)[number];

/** Longest accepted duration: day counts are unsigned 32-bit. */
export const MAX_DURATION_DAYS = 4_294_967_295;

/**
 * Rules a commitment is created under. Immutable after creation.
 */
export interface CommitmentRules {
  readonly durationDays: number;
  /** Drawdown tolerated before the commitment is non-compliant (0-100). */
  readonly maxLossPercent: number;
  readonly commitmentType: CommitmentType;
  /** Share of the locked amount forfeited on early exit (0-100). */
  readonly earlyExitPenaltyPercent: number;
  readonly minFeeThreshold: bigint;
  readonly gracePeriodDays: number;
}

export type CommitmentStatus =
  | { readonly kind: "active" }
  | { readonly kind: "settled"; readonly settledAt: Timestamp }
  | {
      readonly kind: "early_exit";
      readonly exitedAt: Timestamp;
      readonly penalty: bigint;
    };

export type CommitmentStatusKind = CommitmentStatus["kind"];

export interface Commitment {
  readonly id: string;
  readonly owner: Address;
  readonly tokenId: number;
  readonly rules: CommitmentRules;
  /** Locked amount at creation. Always > 0. */
  readonly amount: bigint;
  readonly asset: Address;
  readonly createdAt: Timestamp;
  readonly expiresAt: Timestamp;
  /** Latest reported value of the position. Always >= 0. */
  readonly currentValue: bigint;
  readonly status: CommitmentStatus;
}
