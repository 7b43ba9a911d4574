/**
 * CommitlockService: Composition root for all domain packages.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. One store, one event log and one clock are shared
 * by the ledger, the registry and the compliance engine.
 *
 * Every mutating call runs with exactly the calling principal
 * authorized. The ledger adds its own principal when it calls the
 * registry.
 */

import { CommitmentLedger } from "@commitlock/core";
import type { CommitmentFilter } from "@commitlock/core";
import { OwnershipRegistry } from "@commitlock/registry";
import type { BatchTransferResult, TransferRequest } from "@commitlock/registry";
import { ComplianceEngine } from "@commitlock/attestation";
import { InMemoryEventStore } from "@commitlock/event-store";
import type { IntegrityResult } from "@commitlock/event-store";
import {
  ContextAuthorization,
  InMemoryDurableStore,
  StaticViolationOracle,
  SystemClock,
} from "@commitlock/host";
import type { BatchMode } from "@commitlock/primitives";
import type {
  Address,
  Attestation,
  AttestationType,
  Clock,
  Commitment,
  CommitmentRules,
  DiagnosticLogger,
  HealthMetrics,
  OwnershipRecord,
} from "@commitlock/types";

// =============================================================================
// Configuration
// =============================================================================

/** Principal the ledger acts as; the registry's admin. */
export const LEDGER_PRINCIPAL = "commitlock.ledger";

export interface ServiceLogger extends DiagnosticLogger {
  debug(context: Record<string, unknown>, message: string): void;
}

export interface CommitlockServiceConfig {
  /** Admin of the ledger and the compliance engine. */
  readonly adminPrincipal: Address;
  readonly maxBatchSize?: number | undefined;
  readonly clock?: Clock | undefined;
  readonly logger?: ServiceLogger | undefined;
}

export interface BatchTransferInput {
  readonly from?: Address | undefined;
  readonly to: Address;
  readonly tokenId: number;
}

// =============================================================================
// Service
// =============================================================================

export class CommitlockService {
  readonly events: InMemoryEventStore;
  readonly registry: OwnershipRegistry;
  readonly ledger: CommitmentLedger;
  readonly engine: ComplianceEngine;
  readonly violations: StaticViolationOracle;
  readonly adminPrincipal: Address;

  private readonly _auth = new ContextAuthorization();

  constructor(config: CommitlockServiceConfig) {
    const store = new InMemoryDurableStore();
    const clock = config.clock ?? new SystemClock();
    const logger = config.logger;

    this.adminPrincipal = config.adminPrincipal;
    this.events = new InMemoryEventStore({ clock });
    this.violations = new StaticViolationOracle();

    if (logger !== undefined) {
      this.events.subscribeAll((event) => {
        logger.debug({ topic: event.topic, sequence: event.sequence }, "Event published");
      });
    }

    this.registry = new OwnershipRegistry({
      auth: this._auth,
      store,
      events: this.events,
      clock,
      logger,
      maxBatchSize: config.maxBatchSize,
    });
    this.ledger = new CommitmentLedger({
      address: LEDGER_PRINCIPAL,
      auth: this._auth,
      store,
      events: this.events,
      clock,
      registry: this.registry,
      logger,
    });
    this.engine = new ComplianceEngine({
      auth: this._auth,
      store,
      events: this.events,
      clock,
      ledger: this.ledger,
      violations: this.violations,
      logger,
    });

    this.registry.initialize(LEDGER_PRINCIPAL);
    this.ledger.initialize(config.adminPrincipal);
    this.engine.initialize(config.adminPrincipal);
  }

  // ─── Commitments ───────────────────────────────────────────────────

  createCommitment(
    caller: Address,
    amount: bigint,
    asset: Address,
    rules: CommitmentRules,
  ): Commitment {
    return this._as(caller, () => {
      const id = this.ledger.createCommitment(caller, amount, asset, rules);
      return this.ledger.getCommitment(id);
    });
  }

  getCommitment(id: string): Commitment {
    return this.ledger.getCommitment(id);
  }

  listCommitments(filter?: CommitmentFilter): readonly Commitment[] {
    return this.ledger.listCommitments(filter);
  }

  updateValue(caller: Address, id: string, value: bigint): Commitment {
    return this._as(caller, () => this.ledger.updateValue(id, value));
  }

  settle(caller: Address, id: string): Commitment {
    return this._as(caller, () => this.ledger.settle(id));
  }

  earlyExit(caller: Address, id: string): { penalty: bigint; commitment: Commitment } {
    return this._as(caller, () => {
      const penalty = this.ledger.earlyExit(id, caller);
      return { penalty, commitment: this.ledger.getCommitment(id) };
    });
  }

  // ─── Tokens ────────────────────────────────────────────────────────

  getToken(tokenId: number): OwnershipRecord {
    return this.registry.getToken(tokenId);
  }

  tokensOf(owner: Address): { balance: number; tokenIds: readonly number[] } {
    return {
      balance: this.registry.balanceOf(owner),
      tokenIds: this.registry.tokensOf(owner),
    };
  }

  transfer(caller: Address, tokenId: number, to: Address): OwnershipRecord {
    return this._as(caller, () => {
      this.registry.transfer(caller, to, tokenId);
      return this.registry.getToken(tokenId);
    });
  }

  batchTransfer(
    caller: Address,
    mode: BatchMode,
    transfers: readonly BatchTransferInput[],
  ): BatchTransferResult {
    const requests: TransferRequest[] = transfers.map((t) => ({
      from: t.from ?? caller,
      to: t.to,
      tokenId: t.tokenId,
    }));
    return this._as(caller, () => this.registry.batchTransfer(requests, mode));
  }

  // ─── Compliance ────────────────────────────────────────────────────

  attest(
    caller: Address,
    commitmentId: string,
    attestationType: AttestationType,
    data: Readonly<Record<string, string>>,
    isCompliant: boolean,
  ): Attestation {
    return this._as(caller, () =>
      this.engine.attest(caller, commitmentId, attestationType, data, isCompliant),
    );
  }

  getAttestations(commitmentId: string, attestationType?: AttestationType): readonly Attestation[] {
    return this.engine.getAttestations(commitmentId, attestationType);
  }

  getHealthMetrics(commitmentId: string): HealthMetrics {
    return this.engine.getHealthMetrics(commitmentId);
  }

  calculateComplianceScore(commitmentId: string): number {
    return this.engine.calculateComplianceScore(commitmentId);
  }

  verifyCompliance(commitmentId: string): boolean {
    return this.engine.verifyCompliance(commitmentId);
  }

  recordFees(caller: Address, commitmentId: string, amount: bigint): bigint {
    return this._as(caller, () => this.engine.recordFees(commitmentId, amount));
  }

  recordDrawdown(caller: Address, commitmentId: string, percent: number): HealthMetrics {
    return this._as(caller, () => {
      this.engine.recordDrawdown(commitmentId, percent);
      return this.engine.getHealthMetrics(commitmentId);
    });
  }

  // ─── Health ────────────────────────────────────────────────────────

  verifyEventLog(): IntegrityResult {
    return this.events.verifyIntegrity();
  }

  private _as<T>(caller: Address, operation: () => T): T {
    return this._auth.runAs([caller], operation);
  }
}
