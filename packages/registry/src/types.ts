/**
 * Types for the ownership registry.
 */

import { DomainError } from "@commitlock/types";
import type {
  Address,
  AuthorizationProvider,
  Clock,
  DiagnosticLogger,
  DurableStore,
  EventSink,
  OwnershipRecord,
} from "@commitlock/types";
import type { BatchFailure, BatchMode } from "@commitlock/primitives";

// ─── Errors ──────────────────────────────────────────────────────────────

export type RegistryErrorCode =
  | "NOT_INITIALIZED"
  | "ALREADY_INITIALIZED"
  | "TOKEN_NOT_FOUND"
  | "NOT_OWNER"
  | "SELF_TRANSFER"
  | "ALREADY_SETTLED"
  | "NOT_EXPIRED"
  | "INVALID_AMOUNT"
  | "INVALID_DURATION"
  | "INVALID_MAX_LOSS"
  | "INVALID_PENALTY"
  | "INVALID_COMMITMENT_TYPE";

export class RegistryError extends DomainError<RegistryErrorCode> {
  constructor(code: RegistryErrorCode, message: string) {
    super(code, message);
    this.name = "RegistryError";
  }
}

// ─── Options ─────────────────────────────────────────────────────────────

export interface OwnershipRegistryOptions {
  readonly auth: AuthorizationProvider;
  readonly store: DurableStore;
  readonly events: EventSink;
  readonly clock: Clock;
  readonly logger?: DiagnosticLogger | undefined;
  /** Ceiling on batch_transfer size. Default: DEFAULT_MAX_BATCH_SIZE */
  readonly maxBatchSize?: number | undefined;
}

// ─── Storage ─────────────────────────────────────────────────────────────

export interface RegistryConfig {
  readonly admin: Address;
  /** Highest token id minted so far; 0 before the first mint. */
  readonly lastTokenId: number;
}

// ─── Transfers ───────────────────────────────────────────────────────────

export interface TransferRequest {
  readonly from: Address;
  readonly to: Address;
  readonly tokenId: number;
}

export interface BatchTransferResult {
  readonly mode: BatchMode;
  /** Number of transfers applied. */
  readonly succeeded: number;
  /** Applied transfers, in batch order. */
  readonly transferred: readonly TransferRequest[];
  /** Skipped entries (best-effort mode only). */
  readonly failures: readonly BatchFailure[];
}

/**
 * Projected token records for the duration of one call, keyed by token id.
 */
export type TokenOverlay = Map<number, OwnershipRecord>;
