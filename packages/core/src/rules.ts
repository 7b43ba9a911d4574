/**
 * Rule validation and lifecycle arithmetic.
 */

import { isCommitmentType, isDurationDays, MAX_DURATION_DAYS } from "@commitlock/types";
import type { CommitmentRules } from "@commitlock/types";
import { CommitmentError } from "./types.js";

/**
 * Validate the inputs of a new commitment. Throws on the first violation.
 *
 * 1. amount > 0
 * 2. duration_days is an integer in [1, 2^32 - 1]
 * 3. max_loss_percent is an integer in [0, 100]
 * 4. early_exit_penalty_percent is an integer in [0, 100]
 * 5. commitment_type is safe, balanced or aggressive
 */
export function validateCommitmentInput(amount: bigint, rules: CommitmentRules): void {
  if (amount <= 0n) {
    throw new CommitmentError("INVALID_AMOUNT", `Amount must be positive, got ${amount}`);
  }
  if (!isDurationDays(rules.durationDays)) {
    throw new CommitmentError(
      "INVALID_DURATION",
      `Duration must be between 1 and ${MAX_DURATION_DAYS} days, got ${rules.durationDays}`,
    );
  }
  if (!isWholePercent(rules.maxLossPercent)) {
    throw new CommitmentError(
      "INVALID_MAX_LOSS",
      `Max loss must be between 0 and 100 percent, got ${rules.maxLossPercent}`,
    );
  }
  if (!isWholePercent(rules.earlyExitPenaltyPercent)) {
    throw new CommitmentError(
      "INVALID_PENALTY",
      `Early exit penalty must be between 0 and 100 percent, got ${rules.earlyExitPenaltyPercent}`,
    );
  }
  if (!isCommitmentType(rules.commitmentType)) {
    throw new CommitmentError(
      "INVALID_COMMITMENT_TYPE",
      `Unknown commitment type "${String(rules.commitmentType)}"`,
    );
  }
}

/**
 * Penalty forfeited on early exit: `amount × percent / 100`, rounded
 * toward zero.
 */
export function computeEarlyExitPenalty(amount: bigint, penaltyPercent: number): bigint {
  return (amount * BigInt(penaltyPercent)) / 100n;
}

function isWholePercent(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 100;
}
