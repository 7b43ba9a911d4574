/**
 * Ownership Token Types
 *
 * Every commitment is represented by exactly one token. The token records
 * who currently holds the rights over the commitment plus a snapshot of
 * the commitment's terms taken at mint time.
 */

import type { CommitmentType } from "./commitment.js";
import type { Address, Timestamp } from "./primitives.js";

export interface TokenMetadata {
  readonly commitmentId: string;
  readonly durationDays: number;
  readonly maxLossPercent: number;
  readonly commitmentType: CommitmentType;
  readonly earlyExitPenaltyPercent: number;
  readonly createdAt: Timestamp;
  readonly expiresAt: Timestamp;
  readonly initialAmount: bigint;
  readonly asset: Address;
}

/**
 * Terms supplied by the caller of mint. Timestamps are assigned by the
 * registry from its clock.
 */
export type MintRequest = Omit<TokenMetadata, "createdAt" | "expiresAt">;

export type TokenStatus =
  | { readonly kind: "active" }
  | { readonly kind: "settled"; readonly settledAt: Timestamp }
  | { readonly kind: "exited"; readonly exitedAt: Timestamp };

export interface OwnershipRecord {
  readonly tokenId: number;
  readonly owner: Address;
  readonly metadata: TokenMetadata;
  readonly status: TokenStatus;
}
