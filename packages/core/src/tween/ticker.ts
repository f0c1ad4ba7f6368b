/**
 * Ticker — the frame loop between a host clock and the tween engine.
 *
 * Clocks speak milliseconds; tweens speak seconds. The ticker requests a
 * frame from the clock, converts the time since the previous frame into a
 * delta in seconds, and hands it to its target.
 */

import type { CancelHandle, Clock } from "./clock.js";

/** Anything advanced once per frame: a tween, a sequence, a manager. */
export interface FrameTarget {
  update(deltaTime: number): void;
}

/** Options for creating a Ticker. */
export interface TickerOptions {
  /** The clock to use for timing. */
  readonly clock: Clock;
  /** Receives `update(deltaSeconds)` every frame. */
  readonly target: FrameTarget;
  /**
   * Upper bound for a single frame's delta, in seconds. A stalled host
   * (debugger, suspended tab, blocked event loop) would otherwise deliver
   * one huge step. Defaults to 0.25.
   */
  readonly maxDeltaSeconds?: number;
}

const DEFAULT_MAX_DELTA_SECONDS = 0.25;

/**
 * Drives a frame target from a clock until stopped.
 *
 * @example
 * ```ts
 * const manager = new TweenManager();
 * const ticker = new Ticker({ clock: new TimerClock(), target: manager });
 * ticker.start();
 * ```
 */
export class Ticker {
  private readonly clock: Clock;
  private readonly target: FrameTarget;
  private readonly maxDeltaSeconds: number;
  private frameHandle: CancelHandle | null = null;
  private lastTimestamp: number | null = null;
  private _running = false;

  constructor(options: TickerOptions) {
    this.clock = options.clock;
    this.target = options.target;
    const maxDelta = options.maxDeltaSeconds ?? DEFAULT_MAX_DELTA_SECONDS;
    this.maxDeltaSeconds = Number.isFinite(maxDelta) && maxDelta > 0 ? maxDelta : DEFAULT_MAX_DELTA_SECONDS;
  }

  get running(): boolean {
    return this._running;
  }

  /** Begin requesting frames. The first frame delivers a delta of 0. */
  start(): void {
    if (this._running) {
      return;
    }
    this._running = true;
    this.lastTimestamp = null;
    this.scheduleFrame();
  }

  /** Cancel the pending frame. Calling `start()` again resumes with a fresh delta. */
  stop(): void {
    this._running = false;
    this.lastTimestamp = null;
    if (this.frameHandle) {
      this.frameHandle.cancel();
      this.frameHandle = null;
    }
  }

  // ---------------------------------------------------------------------------
  // Frame loop
  // ---------------------------------------------------------------------------

  private scheduleFrame(): void {
    this.frameHandle = this.clock.requestFrame((timestamp) => {
      this.tick(timestamp);
    });
  }

  private tick(timestamp: number): void {
    this.frameHandle = null;
    const previous = this.lastTimestamp ?? timestamp;
    this.lastTimestamp = timestamp;

    const deltaSeconds = Math.min(Math.max(timestamp - previous, 0) / 1000, this.maxDeltaSeconds);
    this.target.update(deltaSeconds);

    // The target may have stopped (or stopped and restarted) the ticker.
    if (this._running && !this.frameHandle) {
      this.scheduleFrame();
    }
  }
}
