/**
 * Types for the compliance engine.
 */

import { DomainError } from "@commitlock/types";
import type {
  Address,
  AuthorizationProvider,
  Clock,
  Commitment,
  DiagnosticLogger,
  DurableStore,
  EventSink,
  Timestamp,
  ViolationOracle,
} from "@commitlock/types";

// ─── Errors ──────────────────────────────────────────────────────────────

export type ComplianceErrorCode =
  | "NOT_INITIALIZED"
  | "ALREADY_INITIALIZED"
  | "INVALID_AMOUNT"
  | "INVALID_ATTESTATION_TYPE"
  | "INVALID_PERCENT";

export class ComplianceError extends DomainError<ComplianceErrorCode> {
  constructor(code: ComplianceErrorCode, message: string) {
    super(code, message);
    this.name = "ComplianceError";
  }
}

// ─── Collaborators ───────────────────────────────────────────────────────

/**
 * Read access to the commitment ledger. Every read is a snapshot taken
 * at call time.
 */
export interface CommitmentReader {
  hasCommitment(id: string): boolean;
  getCommitment(id: string): Commitment;
}

export interface ComplianceEngineOptions {
  readonly auth: AuthorizationProvider;
  readonly store: DurableStore;
  readonly events: EventSink;
  readonly clock: Clock;
  readonly ledger: CommitmentReader;
  readonly violations: ViolationOracle;
  readonly logger?: DiagnosticLogger | undefined;
}

// ─── Storage ─────────────────────────────────────────────────────────────

export interface EngineConfig {
  readonly admin: Address;
}

/**
 * What the engine persists per commitment. Everything else in
 * HealthMetrics is read from the ledger at query time.
 */
export interface HealthRecord {
  readonly feesGenerated: bigint;
  /** 0 until the first attestation. */
  readonly lastAttestation: Timestamp;
  /** Running score, moved by attestations only. */
  readonly complianceScore: number;
  /** Display-only drawdown recorded by the admin. */
  readonly drawdownOverride?: number | undefined;
}
