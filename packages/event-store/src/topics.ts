/**
 * Event topics and payloads.
 *
 * Naming convention: `<entity>.<action>`. Amounts travel as decimal
 * strings so every payload is plain JSON.
 */

// =============================================================================
// Commitment Ledger
// =============================================================================

export const COMMITMENT_CREATED = "commitment.created";
export const COMMITMENT_VALUE_UPDATED = "commitment.value_updated";
export const COMMITMENT_SETTLED = "commitment.settled";
export const COMMITMENT_EARLY_EXIT = "commitment.early_exit";

export type CommitmentCreatedPayload = {
  readonly commitmentId: string;
  readonly owner: string;
  readonly tokenId: number;
  readonly amount: string;
  readonly expiresAt: number;
};

export type CommitmentValueUpdatedPayload = {
  readonly commitmentId: string;
  readonly previousValue: string;
  readonly currentValue: string;
};

export type CommitmentSettledPayload = {
  readonly commitmentId: string;
  readonly tokenId: number;
  readonly settledAt: number;
  readonly finalValue: string;
};

export type CommitmentEarlyExitPayload = {
  readonly commitmentId: string;
  readonly owner: string;
  readonly penalty: string;
  readonly exitedAt: number;
};

// =============================================================================
// Ownership Registry
// =============================================================================

export const TOKEN_MINTED = "token.minted";
export const TOKEN_TRANSFERRED = "token.transferred";
export const TOKEN_SETTLED = "token.settled";
export const TOKEN_EXITED = "token.exited";

export type TokenMintedPayload = {
  readonly tokenId: number;
  readonly owner: string;
  readonly commitmentId: string;
};

export type TokenTransferredPayload = {
  readonly tokenId: number;
  readonly from: string;
  readonly to: string;
};

export type TokenStatusPayload = {
  readonly tokenId: number;
  readonly at: number;
};

// =============================================================================
// Compliance Engine
// =============================================================================

export const ATTESTATION_RECORDED = "attestation.recorded";
export const FEES_RECORDED = "compliance.fees_recorded";

export type AttestationRecordedPayload = {
  readonly commitmentId: string;
  readonly attestationType: string;
  readonly verifiedBy: string;
  readonly isCompliant: boolean;
  readonly complianceScore: number;
};

export type FeesRecordedPayload = {
  readonly commitmentId: string;
  readonly amount: string;
  readonly feesGenerated: string;
};
