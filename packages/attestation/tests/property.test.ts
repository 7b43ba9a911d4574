/**
 * Property-Based Tests for @commitlock/attestation
 *
 * 1. The running score stays in [0, 100] after any attestation sequence
 *    and equals the clamped fold of the per-attestation deltas
 * 2. The snapshot score never changes because of attestations
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { ATTESTATION_TYPES } from "@commitlock/types";
import { attestationDelta, clampScore, INITIAL_SCORE } from "../src/scoring.js";
import { makeEngine, seedCommitment } from "./helpers.js";

// =============================================================================
// Arbitraries
// =============================================================================

const arbAttestation = fc.record({
  attestationType: fc.constantFrom(...ATTESTATION_TYPES),
  data: fc.oneof(
    fc.constant<Readonly<Record<string, string>>>({}),
    fc.constantFrom("low", "medium", "high", "unknown").map((severity) => ({ severity })),
  ),
  isCompliant: fc.boolean(),
});

const arbAttestations = fc.array(arbAttestation, { minLength: 1, maxLength: 30 });

// =============================================================================
// Properties
// =============================================================================

describe("running score", () => {
  it("is the clamped fold of attestation deltas", () => {
    fc.assert(
      fc.property(arbAttestations, (attestations) => {
        const fixture = makeEngine();
        const id = seedCommitment(fixture, 1_000n);

        let expected = INITIAL_SCORE;
        for (const a of attestations) {
          fixture.engine.attest("auditor", id, a.attestationType, a.data, a.isCompliant);
          expected = clampScore(expected + attestationDelta(a.attestationType, a.data, a.isCompliant));

          const stored = fixture.engine.getStoredScore(id);
          expect(stored).toBeGreaterThanOrEqual(0);
          expect(stored).toBeLessThanOrEqual(100);
        }

        expect(fixture.engine.getStoredScore(id)).toBe(expected);
      }),
    );
  });
});

describe("snapshot score", () => {
  it("is unaffected by attestations", () => {
    fc.assert(
      fc.property(
        fc.bigInt({ min: 1n, max: 1_000_000n }),
        fc.bigInt({ min: 0n, max: 2_000_000n }),
        arbAttestations,
        (amount, currentValue, attestations) => {
          const fixture = makeEngine();
          const id = seedCommitment(fixture, amount, currentValue);
          const before = fixture.engine.calculateComplianceScore(id);

          for (const a of attestations) {
            fixture.engine.attest("auditor", id, a.attestationType, a.data, a.isCompliant);
          }

          expect(fixture.engine.calculateComplianceScore(id)).toBe(before);
        },
      ),
    );
  });
});
