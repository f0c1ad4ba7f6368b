/**
 * TimerClock — real-time clock for running tweens under Node.js.
 *
 * Uses `performance.now()` for timestamps and `setTimeout` at a fixed
 * interval for frame scheduling. See `TestClock` for tests.
 */

import type { CancelHandle, Clock } from "./clock.js";

/** Options for a TimerClock. */
export interface TimerClockOptions {
  /** Milliseconds between frames. Defaults to 16 (~60fps). */
  readonly frameIntervalMs?: number;
}

const DEFAULT_FRAME_INTERVAL_MS = 16;

/**
 * A clock backed by `performance.now()` and `setTimeout`.
 *
 * @example
 * ```ts
 * const ticker = new Ticker({ clock: new TimerClock(), target: manager });
 * ticker.start(); // manager now updates ~60 times a second
 * ```
 */
export class TimerClock implements Clock {
  private readonly frameIntervalMs: number;

  constructor(options?: TimerClockOptions) {
    const interval = options?.frameIntervalMs ?? DEFAULT_FRAME_INTERVAL_MS;
    this.frameIntervalMs = Number.isFinite(interval) && interval > 0 ? interval : DEFAULT_FRAME_INTERVAL_MS;
  }

  /** Current monotonic time in milliseconds. */
  now(): number {
    return performance.now();
  }

  requestFrame(callback: (timestamp: number) => void): CancelHandle {
    const timer = setTimeout(() => {
      callback(this.now());
    }, this.frameIntervalMs);
    return { cancel: () => clearTimeout(timer) };
  }
}
