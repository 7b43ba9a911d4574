/**
 * Scoring rules.
 *
 * Two independent views of compliance:
 *
 * - the running score, stored per commitment and moved by a fixed delta
 *   on each attestation
 * - the snapshot score, recomputed on demand from the ledger's current
 *   commitment and never touched by attestations
 *
 * They are expected to disagree whenever attestations exist.
 */

import type { AttestationType, Commitment, Timestamp } from "@commitlock/types";

export const MAX_SCORE = 100;
export const MIN_SCORE = 0;

/** Stored score of a commitment nobody has attested yet. */
export const INITIAL_SCORE = MAX_SCORE;

export const SEVERITY_PENALTIES: ReadonlyMap<string, number> = new Map([
  ["low", 10],
  ["medium", 20],
  ["high", 30],
]);

/** Penalty when the severity is missing or unrecognized. */
export const DEFAULT_SEVERITY_PENALTY = 20;

export const COMPLIANT_ATTESTATION_BONUS = 1;

/** Added by the snapshot score while the commitment has not expired. */
export const UNEXPIRED_BONUS = 10;

/** Points lost per percent of drawdown above the rule's max loss. */
export const EXCESS_DRAWDOWN_WEIGHT = 2;

export function clampScore(score: number): number {
  return Math.min(MAX_SCORE, Math.max(MIN_SCORE, score));
}

export function severityPenalty(data: Readonly<Record<string, string>>): number {
  const severity = data["severity"];
  if (severity === undefined) return DEFAULT_SEVERITY_PENALTY;
  return SEVERITY_PENALTIES.get(severity) ?? DEFAULT_SEVERITY_PENALTY;
}

/**
 * Change applied to the running score by one attestation.
 */
export function attestationDelta(
  attestationType: AttestationType,
  data: Readonly<Record<string, string>>,
  isCompliant: boolean,
): number {
  if (attestationType === "violation") {
    return -severityPenalty(data);
  }
  return isCompliant ? COMPLIANT_ATTESTATION_BONUS : 0;
}

/**
 * Percentage lost relative to the initial amount, rounded toward zero.
 * 0 when the amount is 0 or the value has grown.
 */
export function computeDrawdownPercent(initialValue: bigint, currentValue: bigint): bigint {
  if (initialValue === 0n) return 0n;
  const drawdown = ((initialValue - currentValue) * 100n) / initialValue;
  return drawdown > 0n ? drawdown : 0n;
}

export function isWithinMaxLoss(commitment: Commitment): boolean {
  const drawdown = computeDrawdownPercent(commitment.amount, commitment.currentValue);
  return drawdown <= BigInt(commitment.rules.maxLossPercent);
}

/**
 * Recompute a score from a commitment snapshot alone.
 */
export function scoreSnapshot(commitment: Commitment, now: Timestamp): number {
  let score = MAX_SCORE;
  if (now < commitment.expiresAt) {
    score += UNEXPIRED_BONUS;
  }

  const drawdown = computeDrawdownPercent(commitment.amount, commitment.currentValue);
  const maxLoss = BigInt(commitment.rules.maxLossPercent);
  if (drawdown > maxLoss) {
    score -= EXCESS_DRAWDOWN_WEIGHT * Number(drawdown - maxLoss);
  }

  return clampScore(score);
}
