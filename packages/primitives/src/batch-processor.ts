/**
 * Batch processor.
 *
 * Enforces the size ceiling on bulk calls and drives the two execution
 * policies:
 *
 * - atomic: the first failing item aborts the batch; its error is
 *   rethrown unchanged
 * - best_effort: domain failures are recorded per index and skipped
 *
 * Items are *planned* here, not committed. The caller applies the
 * returned plan only after `processBatch` returns, so an aborted atomic
 * batch leaves no mutation behind. Errors that are not DomainErrors, and
 * concurrency errors, are never treated as item failures; they propagate
 * in both modes.
 */

import { DomainError, isDomainError } from "@commitlock/types";

export const BATCH_MODES = ["atomic", "best_effort"] as const;

export type BatchMode = (typeof BATCH_MODES)[number];

export const DEFAULT_MAX_BATCH_SIZE = 50;

export type BatchLimitErrorCode = "EMPTY_BATCH" | "BATCH_TOO_LARGE";

export class BatchLimitError extends DomainError<BatchLimitErrorCode> {
  public readonly size: number;
  public readonly maxSize: number;

  constructor(code: BatchLimitErrorCode, message: string, size: number, maxSize: number) {
    super(code, message);
    this.name = "BatchLimitError";
    this.size = size;
    this.maxSize = maxSize;
  }
}

export interface BatchFailure {
  readonly index: number;
  readonly error: DomainError;
}

export interface PlannedItem<R> {
  readonly index: number;
  readonly value: R;
}

export interface BatchOutcome<R> {
  readonly mode: BatchMode;
  readonly planned: readonly PlannedItem<R>[];
  readonly failures: readonly BatchFailure[];
}

/**
 * Reject empty batches and batches above `maxSize`.
 */
export function enforceBatchLimits(size: number, context: string, maxSize: number): void {
  if (size === 0) {
    throw new BatchLimitError("EMPTY_BATCH", `${context}: batch must not be empty`, size, maxSize);
  }
  if (size > maxSize) {
    throw new BatchLimitError(
      "BATCH_TOO_LARGE",
      `${context}: batch of ${size} exceeds the maximum of ${maxSize}`,
      size,
      maxSize,
    );
  }
}

export interface ProcessBatchOptions {
  readonly mode: BatchMode;
  readonly context: string;
  readonly maxSize: number;
}

/**
 * Plan every item in order with `plan`. Limits are enforced before the
 * first item is looked at.
 */
export function processBatch<T, R>(
  items: readonly T[],
  options: ProcessBatchOptions,
  plan: (item: T, index: number) => R,
): BatchOutcome<R> {
  enforceBatchLimits(items.length, options.context, options.maxSize);

  const planned: PlannedItem<R>[] = [];
  const failures: BatchFailure[] = [];

  items.forEach((item, index) => {
    try {
      planned.push({ index, value: plan(item, index) });
    } catch (err: unknown) {
      if (options.mode === "atomic" || !isItemFailure(err)) {
        throw err;
      }
      failures.push({ index, error: err });
    }
  });

  return { mode: options.mode, planned, failures };
}

function isItemFailure(err: unknown): err is DomainError {
  return isDomainError(err) && err.category !== "concurrency";
}
