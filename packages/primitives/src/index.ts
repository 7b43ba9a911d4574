/**
 * @commitlock/primitives: Building blocks shared by the components.
 *
 * - ReentrancyGuard: scoped per-instance lock for guarded entry points
 * - processBatch / enforceBatchLimits: size ceiling and atomic vs
 *   best-effort execution for bulk calls
 * - Notifier: post-commit event publishing
 */

export { ReentrancyGuard, ReentrancyError } from "./reentrancy-guard.js";

export {
  BATCH_MODES,
  BatchLimitError,
  DEFAULT_MAX_BATCH_SIZE,
  enforceBatchLimits,
  processBatch,
} from "./batch-processor.js";
export type {
  BatchFailure,
  BatchLimitErrorCode,
  BatchMode,
  BatchOutcome,
  PlannedItem,
  ProcessBatchOptions,
} from "./batch-processor.js";

export { Notifier } from "./notifier.js";
