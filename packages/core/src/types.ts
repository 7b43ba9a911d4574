/**
 * Types for the commitment ledger.
 *
 * Rules:
 * - All types are readonly
 * - Commitments are never deleted
 * - Fail-closed: invalid operations throw, never silently succeed
 */

import { DomainError } from "@commitlock/types";
import type {
  Address,
  AuthorizationProvider,
  Clock,
  CommitmentRules,
  CommitmentStatusKind,
  DiagnosticLogger,
  DurableStore,
  EventSink,
  MintRequest,
  TokenMetadata,
} from "@commitlock/types";

// ─── Errors ──────────────────────────────────────────────────────────────

export type CommitmentErrorCode =
  | "NOT_INITIALIZED"
  | "ALREADY_INITIALIZED"
  | "NOT_FOUND"
  | "NOT_OWNER"
  | "INVALID_AMOUNT"
  | "INVALID_DURATION"
  | "INVALID_MAX_LOSS"
  | "INVALID_PENALTY"
  | "INVALID_COMMITMENT_TYPE"
  | "ALREADY_SETTLED"
  | "ALREADY_EXITED"
  | "NOT_EXPIRED";

export class CommitmentError extends DomainError<CommitmentErrorCode> {
  constructor(code: CommitmentErrorCode, message: string) {
    super(code, message);
    this.name = "CommitmentError";
  }
}

// ─── Collaborators ───────────────────────────────────────────────────────

/**
 * What the ledger needs from the ownership registry. Calls are made with
 * the ledger's own principal authorized.
 */
export interface OwnershipPort {
  mint(owner: Address, request: MintRequest): number;
  /** Terms recorded at mint; the token's timestamps are the commitment's. */
  getMetadata(tokenId: number): TokenMetadata;
  ownerOf(tokenId: number): Address;
  settle(tokenId: number): void;
  markExited(tokenId: number): void;
}

export interface CommitmentLedgerOptions {
  /** Principal the ledger acts as when calling the registry. */
  readonly address: Address;
  readonly auth: AuthorizationProvider;
  readonly store: DurableStore;
  readonly events: EventSink;
  readonly clock: Clock;
  readonly registry: OwnershipPort;
  readonly logger?: DiagnosticLogger | undefined;
}

// ─── Storage ─────────────────────────────────────────────────────────────

export interface LedgerConfig {
  readonly admin: Address;
  /** Number of commitments created so far. */
  readonly counter: number;
}

// ─── Queries ─────────────────────────────────────────────────────────────

export interface CommitmentFilter {
  readonly owner?: Address | undefined;
  readonly status?: CommitmentStatusKind | undefined;
}

export type { CommitmentRules };
