/**
 * @commitlock/core: Commitment ledger.
 *
 * Canonical commitment records and their one-way lifecycle:
 * - active → settled (after expiry)
 * - active → early_exit (any time, with a penalty)
 *
 * Design rules:
 * - All types are readonly
 * - Commitments are never deleted
 * - Fail-closed: invalid operations throw, never silently succeed
 * - Authorization and validation happen before any write
 */

export { CommitmentLedger } from "./commitment-ledger.js";

export {
  computeEarlyExitPenalty,
  validateCommitmentInput,
} from "./rules.js";

export { CommitmentError } from "./types.js";
export type {
  CommitmentErrorCode,
  CommitmentFilter,
  CommitmentLedgerOptions,
  LedgerConfig,
  OwnershipPort,
} from "./types.js";
