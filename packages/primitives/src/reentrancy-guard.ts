/**
 * Reentrancy guard.
 *
 * A held/not-held flag owned by one component instance. Guarded entry
 * points run through `run()`, which acquires the flag, runs the operation
 * and releases the flag on every exit path.
 *
 * A nested call made while the flag is held (for example from inside an
 * authorization callback) fails immediately with REENTRANCY_DETECTED and
 * leaves the outer holder's lock in place.
 */

import { DomainError } from "@commitlock/types";

export class ReentrancyError extends DomainError<"REENTRANCY_DETECTED"> {
  /** Operation that was refused. */
  public readonly operation: string;
  /** Operation holding the guard at the time. */
  public readonly heldBy: string;

  constructor(operation: string, heldBy: string) {
    super(
      "REENTRANCY_DETECTED",
      `Re-entrant call to "${operation}" while "${heldBy}" is in progress`,
    );
    this.name = "ReentrancyError";
    this.operation = operation;
    this.heldBy = heldBy;
  }
}

export class ReentrancyGuard {
  private _heldBy: string | undefined = undefined;

  get held(): boolean {
    return this._heldBy !== undefined;
  }

  /** Name of the operation currently holding the guard. */
  get heldBy(): string | undefined {
    return this._heldBy;
  }

  acquire(operation: string): void {
    if (this._heldBy !== undefined) {
      throw new ReentrancyError(operation, this._heldBy);
    }
    this._heldBy = operation;
  }

  release(): void {
    this._heldBy = undefined;
  }

  /**
   * Run `operation` under the guard. The guard is released whether
   * `fn` returns or throws. If acquisition itself fails nothing is
   * released.
   */
  run<T>(operation: string, fn: () => T): T {
    this.acquire(operation);
    try {
      return fn();
    } finally {
      this.release();
    }
  }
}
