/**
 * Commitment ledger.
 *
 * Owns the canonical commitment records and their lifecycle:
 *
 *   active ──settle()──────► settled     (terminal)
 *      └─────earlyExit()───► early_exit  (terminal)
 *
 * Creating a commitment mints its ownership token; settling or exiting
 * deactivates it. Registry calls are made with the ledger's own
 * principal authorized.
 *
 * Every mutating operation authorizes and validates before it writes.
 * There is no delete.
 */

import { Notifier } from "@commitlock/primitives";
import { assertNever } from "@commitlock/types";
import type {
  Address,
  AuthorizationProvider,
  Clock,
  Commitment,
  CommitmentRules,
  StoreTable,
} from "@commitlock/types";
import {
  COMMITMENT_CREATED,
  COMMITMENT_EARLY_EXIT,
  COMMITMENT_SETTLED,
  COMMITMENT_VALUE_UPDATED,
} from "@commitlock/event-store";
import type {
  CommitmentCreatedPayload,
  CommitmentEarlyExitPayload,
  CommitmentSettledPayload,
  CommitmentValueUpdatedPayload,
} from "@commitlock/event-store";
import { computeEarlyExitPenalty, validateCommitmentInput } from "./rules.js";
import { CommitmentError } from "./types.js";
import type {
  CommitmentFilter,
  CommitmentLedgerOptions,
  LedgerConfig,
  OwnershipPort,
} from "./types.js";

const CONFIG_KEY = "config";

export class CommitmentLedger {
  readonly address: Address;

  private readonly _auth: AuthorizationProvider;
  private readonly _clock: Clock;
  private readonly _registry: OwnershipPort;
  private readonly _notifier: Notifier;
  private readonly _config: StoreTable<string, LedgerConfig>;
  private readonly _commitments: StoreTable<string, Commitment>;

  constructor(options: CommitmentLedgerOptions) {
    this.address = options.address;
    this._auth = options.auth;
    this._clock = options.clock;
    this._registry = options.registry;
    this._notifier = new Notifier(options.events, "ledger", options.logger);
    this._config = options.store.open("ledger.config", "instance");
    this._commitments = options.store.open("ledger.commitments", "persistent");
  }

  // ─── Setup ───────────────────────────────────────────────────────────

  initialize(admin: Address): void {
    if (this._config.has(CONFIG_KEY)) {
      throw new CommitmentError("ALREADY_INITIALIZED", "Commitment ledger is already initialized");
    }
    this._config.set(CONFIG_KEY, { admin, counter: 0 });
  }

  get admin(): Address {
    return this._requireConfig().admin;
  }

  // ─── Lifecycle ───────────────────────────────────────────────────────

  /**
   * Lock `amount` of `asset` under `rules` and mint the ownership token.
   * Returns the new commitment's id.
   */
  createCommitment(
    owner: Address,
    amount: bigint,
    asset: Address,
    rules: CommitmentRules,
  ): string {
    const config = this._requireConfig();
    this._auth.requireAuth(owner);
    validateCommitmentInput(amount, rules);

    const counter = config.counter + 1;
    const id = `commitment-${counter}`;
    const tokenId = this._auth.invokeAs(this.address, () =>
      this._registry.mint(owner, {
        commitmentId: id,
        durationDays: rules.durationDays,
        maxLossPercent: rules.maxLossPercent,
        commitmentType: rules.commitmentType,
        earlyExitPenaltyPercent: rules.earlyExitPenaltyPercent,
        initialAmount: amount,
        asset,
      }),
    );
    const { createdAt, expiresAt } = this._registry.getMetadata(tokenId);

    const commitment: Commitment = {
      id,
      owner,
      tokenId,
      rules: { ...rules },
      amount,
      asset,
      createdAt,
      expiresAt,
      currentValue: amount,
      status: { kind: "active" },
    };
    this._commitments.set(id, commitment);
    this._config.set(CONFIG_KEY, { ...config, counter });

    const payload: CommitmentCreatedPayload = {
      commitmentId: id,
      owner,
      tokenId,
      amount: amount.toString(),
      expiresAt,
    };
    this._notifier.emit(COMMITMENT_CREATED, payload);

    return id;
  }

  /**
   * Record the latest value of a commitment. Admin only; the status is
   * left untouched.
   */
  updateValue(id: string, newValue: bigint): Commitment {
    const config = this._requireConfig();
    this._auth.requireAuth(config.admin);
    if (newValue < 0n) {
      throw new CommitmentError("INVALID_AMOUNT", `Value must not be negative, got ${newValue}`);
    }
    const commitment = this._requireCommitment(id);

    const updated: Commitment = { ...commitment, currentValue: newValue };
    this._commitments.set(id, updated);

    const payload: CommitmentValueUpdatedPayload = {
      commitmentId: id,
      previousValue: commitment.currentValue.toString(),
      currentValue: newValue.toString(),
    };
    this._notifier.emit(COMMITMENT_VALUE_UPDATED, payload);

    return updated;
  }

  /**
   * Settle an expired commitment and its token. Admin only.
   */
  settle(id: string): Commitment {
    const config = this._requireConfig();
    this._auth.requireAuth(config.admin);
    const commitment = this._requireCommitment(id);
    this._assertActive(commitment);

    const now = this._clock.now();
    if (now < commitment.expiresAt) {
      throw new CommitmentError(
        "NOT_EXPIRED",
        `Commitment "${id}" expires at ${commitment.expiresAt}, now is ${now}`,
      );
    }

    this._auth.invokeAs(this.address, () => this._registry.settle(commitment.tokenId));

    const settled: Commitment = { ...commitment, status: { kind: "settled", settledAt: now } };
    this._commitments.set(id, settled);

    const payload: CommitmentSettledPayload = {
      commitmentId: id,
      tokenId: commitment.tokenId,
      settledAt: now,
      finalValue: commitment.currentValue.toString(),
    };
    this._notifier.emit(COMMITMENT_SETTLED, payload);

    return settled;
  }

  /**
   * Exit an active commitment before (or after) expiry. `owner` must hold
   * the commitment's token. Returns the penalty owed; no funds move here.
   */
  earlyExit(id: string, owner: Address): bigint {
    this._requireConfig();
    this._auth.requireAuth(owner);
    const commitment = this._requireCommitment(id);
    this._assertActive(commitment);

    const holder = this._registry.ownerOf(commitment.tokenId);
    if (holder !== owner) {
      throw new CommitmentError(
        "NOT_OWNER",
        `"${owner}" does not hold commitment "${id}"`,
      );
    }

    const penalty = computeEarlyExitPenalty(
      commitment.amount,
      commitment.rules.earlyExitPenaltyPercent,
    );
    const now = this._clock.now();

    this._auth.invokeAs(this.address, () => this._registry.markExited(commitment.tokenId));

    this._commitments.set(id, {
      ...commitment,
      status: { kind: "early_exit", exitedAt: now, penalty },
    });

    const payload: CommitmentEarlyExitPayload = {
      commitmentId: id,
      owner,
      penalty: penalty.toString(),
      exitedAt: now,
    };
    this._notifier.emit(COMMITMENT_EARLY_EXIT, payload);

    return penalty;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  getCommitment(id: string): Commitment {
    return this._requireCommitment(id);
  }

  hasCommitment(id: string): boolean {
    return this._commitments.has(id);
  }

  /**
   * List commitments in creation order, optionally filtered by creator
   * or status.
   */
  listCommitments(filter?: CommitmentFilter): readonly Commitment[] {
    const result: Commitment[] = [];
    for (const id of this._commitments.keys()) {
      const commitment = this._commitments.get(id);
      if (commitment === undefined) continue;
      if (filter?.owner !== undefined && commitment.owner !== filter.owner) continue;
      if (filter?.status !== undefined && commitment.status.kind !== filter.status) continue;
      result.push(commitment);
    }
    return result;
  }

  get count(): number {
    return this._config.get(CONFIG_KEY)?.counter ?? 0;
  }

  // ─── Private ─────────────────────────────────────────────────────────

  private _requireConfig(): LedgerConfig {
    const config = this._config.get(CONFIG_KEY);
    if (config === undefined) {
      throw new CommitmentError("NOT_INITIALIZED", "Commitment ledger is not initialized");
    }
    return config;
  }

  private _requireCommitment(id: string): Commitment {
    const commitment = this._commitments.get(id);
    if (commitment === undefined) {
      throw new CommitmentError("NOT_FOUND", `Commitment "${id}" not found`);
    }
    return commitment;
  }

  /**
   * Only active commitments may transition. Terminal states refuse.
   */
  private _assertActive(commitment: Commitment): void {
    const status = commitment.status;
    switch (status.kind) {
      case "active":
        return;
      case "settled":
        throw new CommitmentError(
          "ALREADY_SETTLED",
          `Commitment "${commitment.id}" was settled at ${status.settledAt}`,
        );
      case "early_exit":
        throw new CommitmentError(
          "ALREADY_EXITED",
          `Commitment "${commitment.id}" was exited early at ${status.exitedAt}`,
        );
      default:
        assertNever(status);
    }
  }
}
