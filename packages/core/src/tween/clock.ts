/**
 * Frame source for a `Ticker`.
 *
 * Clocks speak milliseconds, tweens speak seconds: the `Ticker` takes the
 * difference between two frame timestamps, divides by 1000 and clamps it to
 * its `maxDeltaSeconds` before calling `update(dt)` on its target. Tweens and
 * sequences never see a clock. `TimerClock` runs on Node.js timers;
 * `TestClock` only moves when a test advances it.
 */

/** Returned by `requestFrame`. Cancelling an already fired frame does nothing. */
export interface CancelHandle {
  cancel(): void;
}

export interface Clock {
  /** Monotonic time in milliseconds. The origin is up to the clock. */
  now(): number;

  /**
   * Run `callback` once on the next frame. It receives that frame's
   * timestamp on the same scale as `now()`. A callback that wants another
   * frame requests it again.
   */
  requestFrame(callback: (timestamp: number) => void): CancelHandle;
}
