/**
 * Compliance engine.
 *
 * Stores attestations per commitment and keeps a running compliance
 * score next to the fees generated. Reads commitment snapshots from the
 * ledger to recompute a score, verify compliance and assemble health
 * metrics.
 *
 * An attestation for a commitment the ledger does not know is still
 * stored. Reads for such a commitment fall back to zero values.
 */

import { Notifier } from "@commitlock/primitives";
import { isAttestationType, isPercent } from "@commitlock/types";
import type {
  Address,
  Attestation,
  AttestationType,
  AuthorizationProvider,
  Clock,
  Commitment,
  HealthMetrics,
  StoreTable,
  ViolationOracle,
} from "@commitlock/types";
import { ATTESTATION_RECORDED, FEES_RECORDED } from "@commitlock/event-store";
import type { AttestationRecordedPayload, FeesRecordedPayload } from "@commitlock/event-store";
import {
  attestationDelta,
  clampScore,
  computeDrawdownPercent,
  INITIAL_SCORE,
  isWithinMaxLoss,
  MAX_SCORE,
  scoreSnapshot,
} from "./scoring.js";
import { ComplianceError } from "./types.js";
import type {
  CommitmentReader,
  ComplianceEngineOptions,
  EngineConfig,
  HealthRecord,
} from "./types.js";

const CONFIG_KEY = "config";

const EMPTY_RECORD: HealthRecord = {
  feesGenerated: 0n,
  lastAttestation: 0,
  complianceScore: INITIAL_SCORE,
};

export class ComplianceEngine {
  private readonly _auth: AuthorizationProvider;
  private readonly _clock: Clock;
  private readonly _ledger: CommitmentReader;
  private readonly _violations: ViolationOracle;
  private readonly _notifier: Notifier;
  private readonly _config: StoreTable<string, EngineConfig>;
  private readonly _attestations: StoreTable<string, Attestation[]>;
  private readonly _health: StoreTable<string, HealthRecord>;

  constructor(options: ComplianceEngineOptions) {
    this._auth = options.auth;
    this._clock = options.clock;
    this._ledger = options.ledger;
    this._violations = options.violations;
    this._notifier = new Notifier(options.events, "compliance", options.logger);
    this._config = options.store.open("compliance.config", "instance");
    this._attestations = options.store.open("compliance.attestations", "persistent");
    this._health = options.store.open("compliance.health", "persistent");
  }

  // ─── Setup ───────────────────────────────────────────────────────────

  initialize(admin: Address): void {
    if (this._config.has(CONFIG_KEY)) {
      throw new ComplianceError("ALREADY_INITIALIZED", "Compliance engine is already initialized");
    }
    this._config.set(CONFIG_KEY, { admin });
  }

  get admin(): Address {
    return this._requireConfig().admin;
  }

  // ─── Attestations ────────────────────────────────────────────────────

  /**
   * Record an attestation from `caller` and move the running score.
   *
   * - violation: minus the severity penalty (low 10, medium 20, high 30;
   *   20 when `data.severity` is missing or unknown)
   * - any other type: plus 1 when `isCompliant`
   *
   * The stored score is clamped to [0, 100] after every update.
   */
  attest(
    caller: Address,
    commitmentId: string,
    attestationType: AttestationType,
    data: Readonly<Record<string, string>>,
    isCompliant: boolean,
  ): Attestation {
    this._requireConfig();
    this._auth.requireAuth(caller);
    if (!isAttestationType(attestationType)) {
      throw new ComplianceError(
        "INVALID_ATTESTATION_TYPE",
        `Unknown attestation type "${String(attestationType)}"`,
      );
    }

    const now = this._clock.now();
    const attestation: Attestation = {
      commitmentId,
      attestationType,
      data: { ...data },
      isCompliant,
      verifiedBy: caller,
      timestamp: now,
    };
    this._attestations.set(commitmentId, [...this._storedAttestations(commitmentId), attestation]);

    const record = this._record(commitmentId);
    const complianceScore = clampScore(
      record.complianceScore + attestationDelta(attestationType, data, isCompliant),
    );
    this._health.set(commitmentId, { ...record, complianceScore, lastAttestation: now });

    const payload: AttestationRecordedPayload = {
      commitmentId,
      attestationType,
      verifiedBy: caller,
      isCompliant,
      complianceScore,
    };
    this._notifier.emit(ATTESTATION_RECORDED, payload);

    return attestation;
  }

  /** Stored attestations in insertion order, optionally of one type. */
  getAttestations(commitmentId: string, attestationType?: AttestationType): readonly Attestation[] {
    const all = this._storedAttestations(commitmentId);
    if (attestationType === undefined) return all;
    return all.filter((a) => a.attestationType === attestationType);
  }

  // ─── Admin records ───────────────────────────────────────────────────

  /**
   * Add `amount` to the fees generated by a commitment. Admin only.
   * Returns the new total.
   */
  recordFees(commitmentId: string, amount: bigint): bigint {
    const config = this._requireConfig();
    this._auth.requireAuth(config.admin);
    if (amount <= 0n) {
      throw new ComplianceError("INVALID_AMOUNT", `Fee amount must be positive, got ${amount}`);
    }

    const record = this._record(commitmentId);
    const feesGenerated = record.feesGenerated + amount;
    this._health.set(commitmentId, { ...record, feesGenerated });

    const payload: FeesRecordedPayload = {
      commitmentId,
      amount: amount.toString(),
      feesGenerated: feesGenerated.toString(),
    };
    this._notifier.emit(FEES_RECORDED, payload);

    return feesGenerated;
  }

  /**
   * Store a drawdown to display in health metrics. Admin only. Scoring
   * and verification keep using the drawdown computed from the ledger.
   */
  recordDrawdown(commitmentId: string, percent: number): void {
    const config = this._requireConfig();
    this._auth.requireAuth(config.admin);
    if (!isPercent(percent)) {
      throw new ComplianceError(
        "INVALID_PERCENT",
        `Drawdown must be a whole percent between 0 and 100, got ${percent}`,
      );
    }

    const record = this._record(commitmentId);
    this._health.set(commitmentId, { ...record, drawdownOverride: percent });
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  /**
   * Score recomputed from the ledger's current snapshot. Attestations
   * play no part. 100 for a commitment the ledger does not know.
   */
  calculateComplianceScore(commitmentId: string): number {
    const commitment = this._snapshot(commitmentId);
    if (commitment === undefined) return MAX_SCORE;
    return scoreSnapshot(commitment, this._clock.now());
  }

  /**
   * True when the drawdown is within the rule's max loss and the
   * violation oracle reports nothing open. Expiry and the fee threshold
   * are not considered.
   */
  verifyCompliance(commitmentId: string): boolean {
    if (this._violations.getViolationFlag(commitmentId)) return false;
    const commitment = this._snapshot(commitmentId);
    return commitment === undefined || isWithinMaxLoss(commitment);
  }

  getHealthMetrics(commitmentId: string): HealthMetrics {
    const commitment = this._snapshot(commitmentId);
    const record = this._record(commitmentId);

    const initialValue = commitment?.amount ?? 0n;
    const currentValue = commitment?.currentValue ?? 0n;
    const drawdownPercent =
      record.drawdownOverride !== undefined
        ? BigInt(record.drawdownOverride)
        : computeDrawdownPercent(initialValue, currentValue);

    return {
      commitmentId,
      initialValue,
      currentValue,
      drawdownPercent,
      feesGenerated: record.feesGenerated,
      volatilityExposure: 0n,
      lastAttestation: record.lastAttestation,
      complianceScore: record.complianceScore,
    };
  }

  /** Running score as stored; 100 before any attestation. */
  getStoredScore(commitmentId: string): number {
    return this._record(commitmentId).complianceScore;
  }

  // ─── Private ─────────────────────────────────────────────────────────

  private _requireConfig(): EngineConfig {
    const config = this._config.get(CONFIG_KEY);
    if (config === undefined) {
      throw new ComplianceError("NOT_INITIALIZED", "Compliance engine is not initialized");
    }
    return config;
  }

  private _record(commitmentId: string): HealthRecord {
    return this._health.get(commitmentId) ?? EMPTY_RECORD;
  }

  private _storedAttestations(commitmentId: string): Attestation[] {
    return this._attestations.get(commitmentId) ?? [];
  }

  private _snapshot(commitmentId: string): Commitment | undefined {
    if (!this._ledger.hasCommitment(commitmentId)) return undefined;
    return this._ledger.getCommitment(commitmentId);
  }
}
