/**
 * Mint request validation.
 */

import { isCommitmentType, isDurationDays, MAX_DURATION_DAYS } from "@commitlock/types";
import type { MintRequest } from "@commitlock/types";
import { RegistryError } from "./types.js";

/**
 * Validate mint terms. Checks run in a fixed order and the first
 * violation throws:
 *
 * 1. duration_days is an integer in [1, 2^32 - 1]
 * 2. max_loss_percent is an integer in [0, 100]
 * 3. early_exit_penalty_percent is an integer in [0, 100]
 * 4. commitment_type is known
 * 5. initial_amount > 0
 */
export function validateMintRequest(request: MintRequest): void {
  if (!isDurationDays(request.durationDays)) {
    throw new RegistryError(
      "INVALID_DURATION",
      `Duration must be between 1 and ${MAX_DURATION_DAYS} days, got ${request.durationDays}`,
    );
  }
  if (!isPercentInRange(request.maxLossPercent)) {
    throw new RegistryError(
      "INVALID_MAX_LOSS",
      `Max loss must be between 0 and 100 percent, got ${request.maxLossPercent}`,
    );
  }
  if (!isPercentInRange(request.earlyExitPenaltyPercent)) {
    throw new RegistryError(
      "INVALID_PENALTY",
      `Early exit penalty must be between 0 and 100 percent, got ${request.earlyExitPenaltyPercent}`,
    );
  }
  if (!isCommitmentType(request.commitmentType)) {
    throw new RegistryError(
      "INVALID_COMMITMENT_TYPE",
      `Unknown commitment type "${String(request.commitmentType)}"`,
    );
  }
  if (request.initialAmount <= 0n) {
    throw new RegistryError(
      "INVALID_AMOUNT",
      `Initial amount must be positive, got ${request.initialAmount}`,
    );
  }
}

function isPercentInRange(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 100;
}
