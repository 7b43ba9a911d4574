/**
 * Ownership registry.
 *
 * One token per commitment. Tracks the current owner of every token,
 * per-owner balances and token lists, and the global list of token ids.
 *
 * Invariants:
 * - Token ids start at 1 and increase by exactly 1 per mint
 * - Each token has exactly one current owner
 * - The sum of all balances equals the number of minted tokens
 * - A token's status only moves active → settled or active → exited
 *
 * mint, transfer, settle, markExited and batchTransfer run under the
 * instance's reentrancy guard. Transfers are allowed whatever the token
 * status is.
 */

import {
  DEFAULT_MAX_BATCH_SIZE,
  Notifier,
  processBatch,
  ReentrancyGuard,
} from "@commitlock/primitives";
import type { BatchMode } from "@commitlock/primitives";
import { assertNever, SECONDS_PER_DAY } from "@commitlock/types";
import type {
  Address,
  AuthorizationProvider,
  Clock,
  MintRequest,
  OwnershipRecord,
  StoreTable,
  TokenMetadata,
} from "@commitlock/types";
import {
  TOKEN_EXITED,
  TOKEN_MINTED,
  TOKEN_SETTLED,
  TOKEN_TRANSFERRED,
} from "@commitlock/event-store";
import type {
  TokenMintedPayload,
  TokenStatusPayload,
  TokenTransferredPayload,
} from "@commitlock/event-store";
import { RegistryError } from "./types.js";
import type {
  BatchTransferResult,
  OwnershipRegistryOptions,
  RegistryConfig,
  TokenOverlay,
  TransferRequest,
} from "./types.js";
import { validateMintRequest } from "./validation.js";

const CONFIG_KEY = "config";
const ALL_TOKENS_KEY = "all";

export class OwnershipRegistry {
  readonly maxBatchSize: number;

  private readonly _auth: AuthorizationProvider;
  private readonly _clock: Clock;
  private readonly _notifier: Notifier;
  private readonly _guard = new ReentrancyGuard();

  private readonly _config: StoreTable<string, RegistryConfig>;
  private readonly _tokens: StoreTable<number, OwnershipRecord>;
  private readonly _balances: StoreTable<Address, number>;
  private readonly _ownerTokens: StoreTable<Address, number[]>;
  private readonly _tokenIds: StoreTable<string, number[]>;

  constructor(options: OwnershipRegistryOptions) {
    this._auth = options.auth;
    this._clock = options.clock;
    this._notifier = new Notifier(options.events, "registry", options.logger);
    this.maxBatchSize = options.maxBatchSize ?? DEFAULT_MAX_BATCH_SIZE;

    this._config = options.store.open("registry.config", "instance");
    this._tokens = options.store.open("registry.tokens", "persistent");
    this._balances = options.store.open("registry.balances", "persistent");
    this._ownerTokens = options.store.open("registry.owner_tokens", "persistent");
    this._tokenIds = options.store.open("registry.token_ids", "persistent");
  }

  // ─── Setup ───────────────────────────────────────────────────────────

  initialize(admin: Address): void {
    if (this._config.has(CONFIG_KEY)) {
      throw new RegistryError("ALREADY_INITIALIZED", "Ownership registry is already initialized");
    }
    this._config.set(CONFIG_KEY, { admin, lastTokenId: 0 });
  }

  get admin(): Address {
    return this._requireConfig().admin;
  }

  /** True while a guarded operation is running. */
  get locked(): boolean {
    return this._guard.held;
  }

  // ─── Mint ────────────────────────────────────────────────────────────

  /**
   * Mint the token for a new commitment to `owner`. Admin only.
   * Returns the token id.
   */
  mint(owner: Address, request: MintRequest): number {
    return this._guard.run("mint", () => {
      const config = this._requireConfig();
      this._auth.requireAuth(config.admin);
      validateMintRequest(request);

      const tokenId = config.lastTokenId + 1;
      const createdAt = this._clock.now();
      const metadata: TokenMetadata = {
        ...request,
        createdAt,
        expiresAt: createdAt + request.durationDays * SECONDS_PER_DAY,
      };

      this._tokens.set(tokenId, {
        tokenId,
        owner,
        metadata,
        status: { kind: "active" },
      });
      this._balances.set(owner, this.balanceOf(owner) + 1);
      this._ownerTokens.set(owner, [...this.tokensOf(owner), tokenId]);
      this._tokenIds.set(ALL_TOKENS_KEY, [...this.allTokenIds(), tokenId]);
      this._config.set(CONFIG_KEY, { ...config, lastTokenId: tokenId });

      const payload: TokenMintedPayload = {
        tokenId,
        owner,
        commitmentId: request.commitmentId,
      };
      this._notifier.emit(TOKEN_MINTED, payload);

      return tokenId;
    });
  }

  // ─── Transfer ────────────────────────────────────────────────────────

  /**
   * Move `tokenId` from `from` to `to`. Requires `from`'s authorization.
   */
  transfer(from: Address, to: Address, tokenId: number): void {
    this._guard.run("transfer", () => {
      this._requireConfig();
      const overlay: TokenOverlay = new Map();
      const move = this._planTransfer({ from, to, tokenId }, overlay);
      this._applyTransfers([move], overlay);
    });
  }

  /**
   * Apply many transfers in one call.
   *
   * Every entry is checked against the state left by the entries before
   * it, exactly as if the transfers were made one at a time. Balance
   * changes are summed per address and each owner's token list is loaded
   * and written once, at the end.
   *
   * - atomic: the first failing entry aborts the call with no change
   * - best_effort: failing entries are reported by index and skipped
   */
  batchTransfer(transfers: readonly TransferRequest[], mode: BatchMode): BatchTransferResult {
    return this._guard.run("batch_transfer", () => {
      this._requireConfig();
      const overlay: TokenOverlay = new Map();

      const outcome = processBatch(
        transfers,
        { mode, context: "batch_transfer", maxSize: this.maxBatchSize },
        (request) => this._planTransfer(request, overlay),
      );

      const transferred = outcome.planned.map((item) => item.value);
      this._applyTransfers(transferred, overlay);

      return {
        mode,
        succeeded: transferred.length,
        transferred,
        failures: outcome.failures,
      };
    });
  }

  // ─── Status ──────────────────────────────────────────────────────────

  /**
   * Deactivate a token once its commitment has expired. Admin only.
   * A second call fails.
   */
  settle(tokenId: number): OwnershipRecord {
    return this._guard.run("settle", () => {
      const config = this._requireConfig();
      this._auth.requireAuth(config.admin);
      const token = this._requireToken(tokenId);
      this._assertActive(token);

      const now = this._clock.now();
      if (now < token.metadata.expiresAt) {
        throw new RegistryError(
          "NOT_EXPIRED",
          `Token ${tokenId} expires at ${token.metadata.expiresAt}, now is ${now}`,
        );
      }

      const settled: OwnershipRecord = { ...token, status: { kind: "settled", settledAt: now } };
      this._tokens.set(tokenId, settled);

      const payload: TokenStatusPayload = { tokenId, at: now };
      this._notifier.emit(TOKEN_SETTLED, payload);

      return settled;
    });
  }

  /**
   * Deactivate a token whose commitment was exited early. Admin only;
   * no expiry check.
   */
  markExited(tokenId: number): OwnershipRecord {
    return this._guard.run("mark_exited", () => {
      const config = this._requireConfig();
      this._auth.requireAuth(config.admin);
      const token = this._requireToken(tokenId);
      this._assertActive(token);

      const now = this._clock.now();
      const exited: OwnershipRecord = { ...token, status: { kind: "exited", exitedAt: now } };
      this._tokens.set(tokenId, exited);

      const payload: TokenStatusPayload = { tokenId, at: now };
      this._notifier.emit(TOKEN_EXITED, payload);

      return exited;
    });
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  ownerOf(tokenId: number): Address {
    return this._requireToken(tokenId).owner;
  }

  getToken(tokenId: number): OwnershipRecord {
    return this._requireToken(tokenId);
  }

  getMetadata(tokenId: number): TokenMetadata {
    return this._requireToken(tokenId).metadata;
  }

  /** False for unknown tokens. */
  isActive(tokenId: number): boolean {
    return this._tokens.get(tokenId)?.status.kind === "active";
  }

  balanceOf(owner: Address): number {
    return this._balances.get(owner) ?? 0;
  }

  tokensOf(owner: Address): readonly number[] {
    return this._ownerTokens.get(owner) ?? [];
  }

  allTokenIds(): readonly number[] {
    return this._tokenIds.get(ALL_TOKENS_KEY) ?? [];
  }

  totalSupply(): number {
    return this._config.get(CONFIG_KEY)?.lastTokenId ?? 0;
  }

  // ─── Private ─────────────────────────────────────────────────────────

  private _requireConfig(): RegistryConfig {
    const config = this._config.get(CONFIG_KEY);
    if (config === undefined) {
      throw new RegistryError("NOT_INITIALIZED", "Ownership registry is not initialized");
    }
    return config;
  }

  private _requireToken(tokenId: number): OwnershipRecord {
    const token = this._tokens.get(tokenId);
    if (token === undefined) {
      throw new RegistryError("TOKEN_NOT_FOUND", `Token ${tokenId} not found`);
    }
    return token;
  }

  private _assertActive(token: OwnershipRecord): void {
    const status = token.status;
    switch (status.kind) {
      case "active":
        return;
      case "settled":
        throw new RegistryError(
          "ALREADY_SETTLED",
          `Token ${token.tokenId} was settled at ${status.settledAt}`,
        );
      case "exited":
        throw new RegistryError(
          "ALREADY_SETTLED",
          `Token ${token.tokenId} was deactivated by early exit at ${status.exitedAt}`,
        );
      default:
        assertNever(status);
    }
  }

  /**
   * Check one transfer against the projected state and record its effect
   * in `overlay`. Writes nothing to storage.
   */
  private _planTransfer(request: TransferRequest, overlay: TokenOverlay): TransferRequest {
    this._auth.requireAuth(request.from);
    if (request.from === request.to) {
      throw new RegistryError(
        "SELF_TRANSFER",
        `Token ${request.tokenId} cannot be transferred to its current owner`,
      );
    }

    const token = overlay.get(request.tokenId) ?? this._requireToken(request.tokenId);
    if (token.owner !== request.from) {
      throw new RegistryError(
        "NOT_OWNER",
        `"${request.from}" does not own token ${request.tokenId}`,
      );
    }

    overlay.set(request.tokenId, { ...token, owner: request.to });
    return { from: request.from, to: request.to, tokenId: request.tokenId };
  }

  /**
   * Write planned transfers. Balance deltas are accumulated per address
   * and owner token lists are edited in a cache; each address is written
   * once. The edits are the same, in the same order, as applying the
   * transfers one by one.
   */
  private _applyTransfers(moves: readonly TransferRequest[], overlay: TokenOverlay): void {
    if (moves.length === 0) return;

    const deltas = new Map<Address, number>();
    const lists = new Map<Address, number[]>();
    const listOf = (owner: Address): number[] => {
      let list = lists.get(owner);
      if (list === undefined) {
        list = [...this.tokensOf(owner)];
        lists.set(owner, list);
      }
      return list;
    };

    for (const move of moves) {
      deltas.set(move.from, (deltas.get(move.from) ?? 0) - 1);
      deltas.set(move.to, (deltas.get(move.to) ?? 0) + 1);

      const fromList = listOf(move.from);
      const index = fromList.indexOf(move.tokenId);
      if (index !== -1) {
        fromList.splice(index, 1);
      }
      listOf(move.to).push(move.tokenId);
    }

    for (const [tokenId, record] of overlay) {
      this._tokens.set(tokenId, record);
    }
    for (const [owner, delta] of deltas) {
      if (delta !== 0) {
        this._balances.set(owner, Math.max(0, this.balanceOf(owner) + delta));
      }
    }
    for (const [owner, list] of lists) {
      this._ownerTokens.set(owner, list);
    }

    for (const move of moves) {
      const payload: TokenTransferredPayload = {
        tokenId: move.tokenId,
        from: move.from,
        to: move.to,
      };
      this._notifier.emit(TOKEN_TRANSFERRED, payload);
    }
  }
}
