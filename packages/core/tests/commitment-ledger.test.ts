/**
 * Tests for the commitment lifecycle, wired to a real ownership registry.
 */

import { describe, it, expect, vi } from "vitest";
import { ContextAuthorization } from "@commitlock/host";
import {
  COMMITMENT_CREATED,
  COMMITMENT_EARLY_EXIT,
  COMMITMENT_SETTLED,
  TOKEN_MINTED,
} from "@commitlock/event-store";
import { AuthorizationError, SECONDS_PER_DAY } from "@commitlock/types";
import type { EventSink } from "@commitlock/types";
import { CommitmentError } from "../src/types.js";
import { ADMIN, START, TickingClock, makeLedger, rules } from "./helpers.js";

const EXPIRY = START + 30 * SECONDS_PER_DAY;

describe("CommitmentLedger", () => {
  // ─── Setup ──────────────────────────────────────────────────────────

  describe("initialize", () => {
    it("refuses every operation before initialization", () => {
      const { ledger } = makeLedger({ initialize: false });

      expect(() => ledger.createCommitment("alice", 1_000n, "asset-usd", rules())).toThrow(
        expect.objectContaining({ code: "NOT_INITIALIZED" }),
      );
      expect(() => ledger.settle("commitment-1")).toThrow(
        expect.objectContaining({ code: "NOT_INITIALIZED" }),
      );
      expect(() => ledger.admin).toThrow(CommitmentError);
    });

    it("runs once", () => {
      const { ledger } = makeLedger();
      expect(ledger.admin).toBe(ADMIN);
      expect(() => ledger.initialize("other")).toThrow(
        expect.objectContaining({ code: "ALREADY_INITIALIZED" }),
      );
    });
  });

  // ─── Create ─────────────────────────────────────────────────────────

  describe("createCommitment", () => {
    it("stores an active commitment and mints its token", () => {
      const { ledger, registry } = makeLedger();

      const id = ledger.createCommitment("alice", 1_000n, "asset-usd", rules());

      expect(id).toBe("commitment-1");
      const commitment = ledger.getCommitment(id);
      expect(commitment).toMatchObject({
        owner: "alice",
        tokenId: 1,
        amount: 1_000n,
        currentValue: 1_000n,
        createdAt: START,
        expiresAt: EXPIRY,
        status: { kind: "active" },
      });
      expect(registry.ownerOf(1)).toBe("alice");
      expect(registry.getMetadata(1).commitmentId).toBe("commitment-1");
      expect(ledger.count).toBe(1);
    });

    it("numbers commitments sequentially", () => {
      const { ledger } = makeLedger();
      const ids = ["alice", "bob", "alice"].map((owner) =>
        ledger.createCommitment(owner, 10n, "asset-usd", rules()),
      );
      expect(ids).toEqual(["commitment-1", "commitment-2", "commitment-3"]);
    });

    it("publishes after minting", () => {
      const { ledger, events } = makeLedger();
      ledger.createCommitment("alice", 1_000n, "asset-usd", rules());

      expect(events.readAll().map((e) => [e.topic, e.publishedAt])).toEqual([
        [TOKEN_MINTED, START],
        [COMMITMENT_CREATED, START],
      ]);
      expect(events.read(COMMITMENT_CREATED)[0]?.payload).toEqual({
        commitmentId: "commitment-1",
        owner: "alice",
        tokenId: 1,
        amount: "1000",
        expiresAt: EXPIRY,
      });
    });

    it("writes nothing when validation fails", () => {
      const { ledger, registry } = makeLedger();

      expect(() =>
        ledger.createCommitment("alice", 1_000n, "asset-usd", rules({ maxLossPercent: 150 })),
      ).toThrow(expect.objectContaining({ code: "INVALID_MAX_LOSS" }));

      expect(ledger.count).toBe(0);
      expect(registry.totalSupply()).toBe(0);
    });

    it("requires the owner's authorization and mints as the ledger", () => {
      const auth = new ContextAuthorization();
      const { ledger, registry } = makeLedger({ auth });

      const id = auth.runAs(["alice"], () =>
        ledger.createCommitment("alice", 1_000n, "asset-usd", rules()),
      );

      expect(id).toBe("commitment-1");
      expect(registry.ownerOf(1)).toBe("alice");
      expect(() =>
        auth.runAs(["alice"], () => ledger.createCommitment("bob", 1n, "asset-usd", rules())),
      ).toThrow(AuthorizationError);
    });
  });

  // ─── Update ─────────────────────────────────────────────────────────

  describe("updateValue", () => {
    it("replaces the current value", () => {
      const { ledger } = makeLedger();
      const id = ledger.createCommitment("alice", 1_000n, "asset-usd", rules());

      const updated = ledger.updateValue(id, 700n);

      expect(updated.currentValue).toBe(700n);
      expect(ledger.getCommitment(id).amount).toBe(1_000n);
    });

    it("rejects a negative value", () => {
      const { ledger } = makeLedger();
      const id = ledger.createCommitment("alice", 1_000n, "asset-usd", rules());

      expect(() => ledger.updateValue(id, -1n)).toThrow(
        expect.objectContaining({ code: "INVALID_AMOUNT" }),
      );
      expect(ledger.updateValue(id, 0n).currentValue).toBe(0n);
    });

    it("rejects an unknown commitment", () => {
      const { ledger } = makeLedger();
      expect(() => ledger.updateValue("commitment-9", 1n)).toThrow(
        'Commitment "commitment-9" not found',
      );
    });

    it("is admin only", () => {
      const auth = new ContextAuthorization();
      const { ledger } = makeLedger({ auth });
      const id = auth.runAs(["alice"], () =>
        ledger.createCommitment("alice", 1_000n, "asset-usd", rules()),
      );

      expect(() => auth.runAs(["alice"], () => ledger.updateValue(id, 5n))).toThrow(
        AuthorizationError,
      );
      expect(auth.runAs([ADMIN], () => ledger.updateValue(id, 5n)).currentValue).toBe(5n);
    });
  });

  // ─── Settle ─────────────────────────────────────────────────────────

  describe("settle", () => {
    it("fails one second before expiry", () => {
      const { ledger, clock } = makeLedger();
      const id = ledger.createCommitment("alice", 1_000n, "asset-usd", rules());
      clock.set(EXPIRY - 1);

      expect(() => ledger.settle(id)).toThrow(expect.objectContaining({ code: "NOT_EXPIRED" }));
      expect(ledger.getCommitment(id).status.kind).toBe("active");
    });

    it("settles the commitment and its token at expiry", () => {
      const { ledger, registry, clock, events } = makeLedger();
      const id = ledger.createCommitment("alice", 1_000n, "asset-usd", rules());
      ledger.updateValue(id, 1_050n);
      clock.set(EXPIRY);

      const settled = ledger.settle(id);

      expect(settled.status).toEqual({ kind: "settled", settledAt: EXPIRY });
      expect(registry.isActive(1)).toBe(false);
      expect(events.read(COMMITMENT_SETTLED)[0]?.payload).toEqual({
        commitmentId: id,
        tokenId: 1,
        settledAt: EXPIRY,
        finalValue: "1050",
      });
    });

    it("settles in step with the token when the clock moves between reads", () => {
      const clock = new TickingClock(START);
      const { ledger, registry } = makeLedger({ clock });
      const id = ledger.createCommitment("alice", 1_000n, "asset-usd", rules());
      const commitment = ledger.getCommitment(id);
      const metadata = registry.getMetadata(commitment.tokenId);

      expect([commitment.createdAt, commitment.expiresAt]).toEqual([START, EXPIRY]);
      expect([metadata.createdAt, metadata.expiresAt]).toEqual([START, EXPIRY]);

      clock.set(EXPIRY);
      expect(ledger.settle(id).status).toEqual({ kind: "settled", settledAt: EXPIRY });
      expect(registry.isActive(commitment.tokenId)).toBe(false);
    });

    it("is terminal", () => {
      const { ledger, clock } = makeLedger();
      const id = ledger.createCommitment("alice", 1_000n, "asset-usd", rules());
      clock.set(EXPIRY);
      ledger.settle(id);

      expect(() => ledger.settle(id)).toThrow(
        expect.objectContaining({ code: "ALREADY_SETTLED" }),
      );
      expect(() => ledger.earlyExit(id, "alice")).toThrow(
        expect.objectContaining({ code: "ALREADY_SETTLED" }),
      );
    });

    it("still accepts value updates afterwards", () => {
      const { ledger, clock } = makeLedger();
      const id = ledger.createCommitment("alice", 1_000n, "asset-usd", rules());
      clock.set(EXPIRY);
      ledger.settle(id);

      expect(ledger.updateValue(id, 900n).status.kind).toBe("settled");
    });
  });

  // ─── Early exit ─────────────────────────────────────────────────────

  describe("earlyExit", () => {
    it("returns the penalty and deactivates the token", () => {
      const { ledger, registry, clock, events } = makeLedger();
      const id = ledger.createCommitment("alice", 1_000n, "asset-usd", rules());
      clock.advance(SECONDS_PER_DAY);

      const penalty = ledger.earlyExit(id, "alice");

      expect(penalty).toBe(50n);
      expect(ledger.getCommitment(id).status).toEqual({
        kind: "early_exit",
        exitedAt: START + SECONDS_PER_DAY,
        penalty: 50n,
      });
      expect(registry.isActive(1)).toBe(false);
      expect(events.read(COMMITMENT_EARLY_EXIT)[0]?.payload).toEqual({
        commitmentId: id,
        owner: "alice",
        penalty: "50",
        exitedAt: START + SECONDS_PER_DAY,
      });
    });

    it("is terminal", () => {
      const { ledger, clock } = makeLedger();
      const id = ledger.createCommitment("alice", 1_000n, "asset-usd", rules());
      ledger.earlyExit(id, "alice");
      clock.set(EXPIRY);

      expect(() => ledger.earlyExit(id, "alice")).toThrow(
        expect.objectContaining({ code: "ALREADY_EXITED" }),
      );
      expect(() => ledger.settle(id)).toThrow(
        expect.objectContaining({ code: "ALREADY_EXITED" }),
      );
    });

    it("follows the token after a transfer", () => {
      const { ledger, registry } = makeLedger();
      const id = ledger.createCommitment("alice", 1_000n, "asset-usd", rules());
      registry.transfer("alice", "bob", 1);

      expect(() => ledger.earlyExit(id, "alice")).toThrow(
        expect.objectContaining({ code: "NOT_OWNER" }),
      );
      expect(ledger.earlyExit(id, "bob")).toBe(50n);
      expect(ledger.getCommitment(id).owner).toBe("alice");
    });

    it("rounds the penalty toward zero", () => {
      const { ledger } = makeLedger();
      const id = ledger.createCommitment("alice", 999n, "asset-usd", rules());
      expect(ledger.earlyExit(id, "alice")).toBe(49n);
    });
  });

  // ─── Notification ───────────────────────────────────────────────────

  describe("event publishing", () => {
    it("keeps the change when the sink fails", () => {
      const sink: EventSink = {
        publish: () => {
          throw new Error("sink offline");
        },
      };
      const warn = vi.fn();
      const { ledger, registry } = makeLedger({ ledgerEvents: sink, logger: { warn } });

      const id = ledger.createCommitment("alice", 1_000n, "asset-usd", rules());

      expect(ledger.getCommitment(id).status.kind).toBe("active");
      expect(registry.ownerOf(1)).toBe("alice");
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith(
        expect.objectContaining({ topic: COMMITMENT_CREATED, source: "ledger" }),
        "Event publish failed after commit",
      );
    });
  });

  // ─── Queries ────────────────────────────────────────────────────────

  describe("listCommitments", () => {
    it("filters by owner and status", () => {
      const { ledger } = makeLedger();
      ledger.createCommitment("alice", 10n, "asset-usd", rules());
      ledger.createCommitment("bob", 10n, "asset-usd", rules());
      ledger.createCommitment("alice", 10n, "asset-usd", rules());
      ledger.earlyExit("commitment-3", "alice");

      expect(ledger.listCommitments().map((c) => c.id)).toEqual([
        "commitment-1",
        "commitment-2",
        "commitment-3",
      ]);
      expect(ledger.listCommitments({ owner: "alice" }).map((c) => c.id)).toEqual([
        "commitment-1",
        "commitment-3",
      ]);
      expect(ledger.listCommitments({ status: "active" }).map((c) => c.id)).toEqual([
        "commitment-1",
        "commitment-2",
      ]);
      expect(ledger.hasCommitment("commitment-4")).toBe(false);
    });
  });
});
