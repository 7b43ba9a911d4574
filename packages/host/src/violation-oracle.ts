/**
 * Violation oracle stub.
 *
 * Holds the set of commitments with an open violation. Flags are raised
 * and cleared by whoever operates the oracle.
 */

import type { ViolationOracle } from "@commitlock/types";

export class StaticViolationOracle implements ViolationOracle {
  private readonly _open = new Set<string>();

  constructor(flagged: readonly string[] = []) {
    for (const id of flagged) {
      this._open.add(id);
    }
  }

  getViolationFlag(commitmentId: string): boolean {
    return this._open.has(commitmentId);
  }

  flag(commitmentId: string): void {
    this._open.add(commitmentId);
  }

  clear(commitmentId: string): void {
    this._open.delete(commitmentId);
  }

  flagged(): readonly string[] {
    return [...this._open];
  }
}
