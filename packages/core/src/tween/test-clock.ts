/**
 * TestClock — deterministic clock for frame-driven tests.
 *
 * Time only moves when `advance(ms)` is called, and every scheduled frame
 * callback fires synchronously with the new timestamp.
 */

import type { CancelHandle, Clock } from "./clock.js";

/**
 * A clock that advances time only when explicitly told to.
 * Frame callbacks fire synchronously during `advance()`.
 *
 * @example
 * ```ts
 * const clock = new TestClock();
 * const ticker = new Ticker({ clock, target: manager });
 *
 * ticker.start();
 * clock.advance(0);   // first frame, delta 0
 * clock.advance(500); // manager.update(0.5)
 * ```
 */
export class TestClock implements Clock {
  private currentTime = 0;
  private pending: Array<{ readonly callback: (timestamp: number) => void }> = [];
  private fired = 0;

  /** Current time in milliseconds. Starts at 0. */
  now(): number {
    return this.currentTime;
  }

  requestFrame(callback: (timestamp: number) => void): CancelHandle {
    const entry = { callback };
    this.pending.push(entry);
    return {
      cancel: () => {
        this.pending = this.pending.filter((candidate) => candidate !== entry);
      },
    };
  }

  /**
   * Advance time by `ms` milliseconds (negative or non-finite values count
   * as 0) and fire every pending frame.
   *
   * Callbacks scheduled while this runs wait for the next `advance()`.
   */
  advance(ms: number): void {
    if (Number.isFinite(ms) && ms > 0) {
      this.currentTime += ms;
    }
    const due = this.pending;
    this.pending = [];
    for (const entry of due) {
      this.fired++;
      entry.callback(this.currentTime);
    }
  }

  /** Run `count` frames of `frameMs` each. */
  step(count: number, frameMs: number): void {
    for (let i = 0; i < count; i++) {
      this.advance(frameMs);
    }
  }

  /** Number of currently pending frame callbacks. */
  get pendingCount(): number {
    return this.pending.length;
  }

  /** Total frame callbacks fired so far. */
  get frameCount(): number {
    return this.fired;
  }
}
