/**
 * Clocks.
 */

import type { Clock, Timestamp } from "@commitlock/types";

export class SystemClock implements Clock {
  now(): Timestamp {
    return Math.floor(Date.now() / 1000);
  }
}

/**
 * A clock that only moves when told to.
 */
export class ManualClock implements Clock {
  private _now: Timestamp;

  constructor(start: Timestamp = 0) {
    this._now = start;
  }

  now(): Timestamp {
    return this._now;
  }

  set(timestamp: Timestamp): void {
    this._now = timestamp;
  }

  advance(seconds: number): Timestamp {
    this._now += seconds;
    return this._now;
  }
}
