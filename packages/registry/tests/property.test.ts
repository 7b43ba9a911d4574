/**
 * Property-Based Tests for @commitlock/registry
 *
 * 1. An atomic batch of valid transfers leaves the same owners, balances
 *    and owner token lists as applying them one at a time
 * 2. A best-effort batch of arbitrary transfers matches one-at-a-time
 *    application where failing transfers are skipped, and fails at the
 *    same indices
 * 3. Balances always sum to the total supply
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { isDomainError } from "@commitlock/types";
import type { OwnershipRegistry } from "../src/ownership-registry.js";
import type { TransferRequest } from "../src/types.js";
import { makeRegistry, mintTo } from "./helpers.js";

// =============================================================================
// Arbitraries
// =============================================================================

const OWNERS = ["alice", "bob", "carol", "dave"] as const;

const arbOwner = fc.constantFrom(...OWNERS);

/** Initial owner of each token, token ids 1..n. */
const arbHoldings = fc.array(arbOwner, { minLength: 1, maxLength: 8 });

/**
 * Transfers that are each valid against the state left by the ones
 * before them.
 */
function arbValidTransfers(holdings: readonly string[]): fc.Arbitrary<TransferRequest[]> {
  const step = fc.tuple(
    fc.integer({ min: 1, max: holdings.length }),
    fc.integer({ min: 1, max: OWNERS.length - 1 }),
  );
  return fc.array(step, { minLength: 1, maxLength: 20 }).map((steps) => {
    const owners = [...holdings];
    return steps.map(([tokenId, offset]) => {
      const from = owners[tokenId - 1] ?? "";
      const fromIndex = OWNERS.findIndex((o) => o === from);
      const to = OWNERS[(fromIndex + offset) % OWNERS.length] ?? "";
      owners[tokenId - 1] = to;
      return { from, to, tokenId };
    });
  });
}

/** Transfers that may name the wrong sender, the receiver itself or a missing token. */
function arbAnyTransfers(holdings: readonly string[]): fc.Arbitrary<TransferRequest[]> {
  const transfer = fc.record({
    from: arbOwner,
    to: arbOwner,
    tokenId: fc.integer({ min: 1, max: holdings.length + 1 }),
  });
  return fc.array(transfer, { minLength: 1, maxLength: 20 });
}

// =============================================================================
// Helpers
// =============================================================================

interface Snapshot {
  readonly owners: readonly string[];
  readonly balances: readonly number[];
  readonly lists: readonly (readonly number[])[];
}

function snapshot(registry: OwnershipRegistry): Snapshot {
  return {
    owners: registry.allTokenIds().map((id) => registry.ownerOf(id)),
    balances: OWNERS.map((o) => registry.balanceOf(o)),
    lists: OWNERS.map((o) => registry.tokensOf(o)),
  };
}

/** Apply transfers one call at a time; returns the indices that failed. */
function applySequentially(
  registry: OwnershipRegistry,
  transfers: readonly TransferRequest[],
): number[] {
  const failed: number[] = [];
  transfers.forEach((t, index) => {
    try {
      registry.transfer(t.from, t.to, t.tokenId);
    } catch (err: unknown) {
      if (!isDomainError(err)) throw err;
      failed.push(index);
    }
  });
  return failed;
}

function sumOfBalances(registry: OwnershipRegistry): number {
  return OWNERS.reduce((sum, o) => sum + registry.balanceOf(o), 0);
}

// =============================================================================
// Properties
// =============================================================================

describe("batch equivalence", () => {
  it("atomic batch equals sequential transfers", () => {
    fc.assert(
      fc.property(
        arbHoldings.chain((h) => fc.tuple(fc.constant(h), arbValidTransfers(h))),
        ([holdings, transfers]) => {
          const sequential = makeRegistry().registry;
          const batched = makeRegistry().registry;
          mintTo(sequential, holdings);
          mintTo(batched, holdings);

          expect(applySequentially(sequential, transfers)).toEqual([]);
          const result = batched.batchTransfer(transfers, "atomic");

          expect(result.succeeded).toBe(transfers.length);
          expect(snapshot(batched)).toEqual(snapshot(sequential));
        },
      ),
    );
  });

  it("best-effort batch equals sequential transfers with failures skipped", () => {
    fc.assert(
      fc.property(
        arbHoldings.chain((h) => fc.tuple(fc.constant(h), arbAnyTransfers(h))),
        ([holdings, transfers]) => {
          const sequential = makeRegistry().registry;
          const batched = makeRegistry().registry;
          mintTo(sequential, holdings);
          mintTo(batched, holdings);

          const failed = applySequentially(sequential, transfers);
          const result = batched.batchTransfer(transfers, "best_effort");

          expect(result.failures.map((f) => f.index)).toEqual(failed);
          expect(result.succeeded).toBe(transfers.length - failed.length);
          expect(snapshot(batched)).toEqual(snapshot(sequential));
        },
      ),
    );
  });
});

describe("supply conservation", () => {
  it("balances sum to total supply after any batch", () => {
    fc.assert(
      fc.property(
        arbHoldings.chain((h) => fc.tuple(fc.constant(h), arbAnyTransfers(h))),
        ([holdings, transfers]) => {
          const { registry } = makeRegistry();
          mintTo(registry, holdings);

          registry.batchTransfer(transfers, "best_effort");

          expect(sumOfBalances(registry)).toBe(registry.totalSupply());
          expect(OWNERS.flatMap((o) => registry.tokensOf(o)).sort((a, b) => a - b)).toEqual(
            registry.allTokenIds(),
          );
        },
      ),
    );
  });
});
