/**
 * Tween — the generic time-driven interpolation engine.
 *
 * A tween owns its timing state (delay, elapsed time, loops, time scale) and
 * turns it into a current value through an easing function and a
 * type-specific blend function. The host advances it with `update(dt)` once
 * per frame; everything happens synchronously inside that call.
 */

import { linear } from "./easing.js";
import type { EasingFn } from "./easing.js";
import { TweenConfigError } from "./errors.js";
import { ListenerList } from "./listeners.js";
import type { Listener } from "./listeners.js";
import { INFINITE_LOOPS } from "./playable.js";
import type { LoopType, Playable, PlaybackState, StopBehavior } from "./playable.js";

/**
 * Combines two values of type `T` at a shaped progress.
 *
 * Must be pure and must accept `t` outside [0, 1] (overshooting easings
 * extrapolate past either endpoint).
 */
export type BlendFn<T> = (start: T, end: T, t: number) => T;

/** Notification points of a tween and the arguments their observers receive. */
export interface TweenEvents<T> {
  /** Playback entered `running` from `start()`, `restart()` or the end of a delay. */
  start: [];
  /** A frame produced a value while running. */
  update: [value: T];
  /** One loop iteration was consumed. */
  loop: [];
  /** Terminal completion, natural or forced. */
  complete: [];
}

/** The values a started tween interpolates between. */
interface Endpoints<T> {
  start: T;
  end: T;
  current: T;
}

/**
 * A single interpolation from a start value to an end value.
 *
 * @example
 * ```ts
 * const tween = new Tween(lerpNumber)
 *   .setDelay(0.5)
 *   .setLoop("pingPong", 3)
 *   .onUpdate((value) => { sprite.alpha = value; })
 *   .onComplete(() => { sprite.visible = false; });
 *
 * tween.start(0, 1, 2, quadInOut);
 * // once per frame:
 * tween.update(deltaSeconds);
 * ```
 */
export class Tween<T> implements Playable {
  private readonly blend: BlendFn<T>;
  private easing: EasingFn = linear;
  private values: Endpoints<T> | null = null;

  private _state: PlaybackState = "stopped";
  private _duration = 0;
  private elapsed = 0;
  private _delay = 0;
  private pendingDelay = 0;
  private _timeScale = 1;
  private _loopType: LoopType = "none";
  private _loopCount = 0;
  private _loopsRemaining = 0;
  private reversedPhase = false;

  /**
   * Bumped by every `start()`/`restart()`. A notification that starts a new
   * run is detected through it, and the interrupted update stops there.
   */
  private generation = 0;

  private readonly listeners: { readonly [K in keyof TweenEvents<T>]: ListenerList<TweenEvents<T>[K]> } = {
    start: new ListenerList(),
    update: new ListenerList(),
    loop: new ListenerList(),
    complete: new ListenerList(),
  };

  constructor(blend: BlendFn<T>) {
    if (typeof blend !== "function") {
      throw new TweenConfigError("A tween requires a blend function");
    }
    this.blend = blend;
  }

  // ---------------------------------------------------------------------------
  // Accessors
  // ---------------------------------------------------------------------------

  get state(): PlaybackState {
    return this._state;
  }

  /** Value for the current time, or `undefined` before the first `start()`. */
  get currentValue(): T | undefined {
    return this.values?.current;
  }

  get startValue(): T | undefined {
    return this.values?.start;
  }

  get endValue(): T | undefined {
    return this.values?.end;
  }

  /** Duration of one iteration in seconds (0 before the first `start()`). */
  get duration(): number {
    return this._duration;
  }

  get elapsedTime(): number {
    return this.elapsed;
  }

  get delay(): number {
    return this._delay;
  }

  get delayRemaining(): number {
    return this.pendingDelay;
  }

  get loopType(): LoopType {
    return this._loopType;
  }

  get loopCount(): number {
    return this._loopCount;
  }

  get loopsRemaining(): number {
    return this._loopsRemaining;
  }

  /** True during the mirrored half of a yoyo or the swapped half of a ping-pong. */
  get isReversedPhase(): boolean {
    return this.reversedPhase;
  }

  get ease(): EasingFn {
    return this.easing;
  }

  get timeScale(): number {
    return this._timeScale;
  }

  set timeScale(scale: number) {
    this._timeScale = nonNegative(scale);
  }

  get progress(): number {
    return this._duration > 0 ? this.elapsed / this._duration : 0;
  }

  /** Seek: clamps to [0, 1] and recomputes the value. Does not change state. */
  set progress(value: number) {
    this.elapsed = clamp01(value) * this._duration;
    this.recompute();
  }

  /** Stopped at the end, as opposed to stopped early or never started. */
  get isComplete(): boolean {
    return this._state === "stopped" && this._duration > 0 && this.elapsed >= this._duration;
  }

  // ---------------------------------------------------------------------------
  // Configuration
  // ---------------------------------------------------------------------------

  /** Seconds to wait before playing. Applies from the next `start()`/`restart()`. */
  setDelay(seconds: number): this {
    this._delay = nonNegative(seconds);
    return this;
  }

  /**
   * Configure repetition. The current value follows immediately, since
   * leaving or entering yoyo changes whether progress is mirrored.
   *
   * @param count - Number of repeats after the first play. Any negative
   *   value means forever.
   */
  setLoop(type: LoopType, count: number = INFINITE_LOOPS): this {
    const repeats = Number.isFinite(count) ? Math.trunc(count) : INFINITE_LOOPS;
    this._loopType = type;
    this._loopCount = repeats < 0 ? INFINITE_LOOPS : repeats;
    this._loopsRemaining = this._loopCount;
    this.recompute();
    return this;
  }

  setTimeScale(scale: number): this {
    this.timeScale = scale;
    return this;
  }

  /** Replace the easing curve. The current value follows immediately. */
  setEase(ease: EasingFn): this {
    this.easing = ease;
    this.recompute();
    return this;
  }

  // ---------------------------------------------------------------------------
  // Notifications
  // ---------------------------------------------------------------------------

  on<K extends keyof TweenEvents<T>>(event: K, listener: Listener<TweenEvents<T>[K]>): this {
    this.listeners[event].add(listener);
    return this;
  }

  off<K extends keyof TweenEvents<T>>(event: K, listener: Listener<TweenEvents<T>[K]>): this {
    this.listeners[event].remove(listener);
    return this;
  }

  onStart(listener: () => void): this {
    return this.on("start", listener);
  }

  onUpdate(listener: (value: T) => void): this {
    return this.on("update", listener);
  }

  onLoop(listener: () => void): this {
    return this.on("loop", listener);
  }

  onComplete(listener: () => void): this {
    return this.on("complete", listener);
  }

  // ---------------------------------------------------------------------------
  // Playback
  // ---------------------------------------------------------------------------

  /**
   * Begin interpolating from `start` to `end` over `duration` seconds.
   *
   * @throws {TweenConfigError} if `duration` is not a positive finite number.
   *   Nothing is modified in that case.
   */
  start(start: T, end: T, duration: number, ease?: EasingFn): this {
    if (!Number.isFinite(duration) || duration <= 0) {
      throw new TweenConfigError(`Tween duration must be a positive number of seconds, got ${duration}`);
    }
    if (ease) {
      this.easing = ease;
    }
    this.values = { start, end, current: start };
    this._duration = duration;
    this.beginRun();
    return this;
  }

  update(deltaTime: number): number {
    if (this._state !== "delayed" && this._state !== "running") {
      return 0;
    }
    let available = sanitizeDelta(deltaTime) * this._timeScale;

    if (this._state === "delayed") {
      this.pendingDelay -= available;
      if (this.pendingDelay > 0) {
        return 0;
      }
      // The part of the frame past the end of the delay is played right away.
      available = -this.pendingDelay;
      this.pendingDelay = 0;
      this._state = "running";
      const generation = this.generation;
      this.listeners.start.emit();
      if (generation !== this.generation || this._state !== "running") {
        return 0;
      }
    }

    return this.advance(available);
  }

  pause(): void {
    if (this._state === "delayed" || this._state === "running") {
      this._state = "paused";
    }
  }

  resume(): void {
    if (this._state === "paused") {
      this._state = this.pendingDelay > 0 ? "delayed" : "running";
    }
  }

  stop(behavior: StopBehavior = "asIs"): void {
    if (behavior === "asIs") {
      this._state = "stopped";
      return;
    }
    if (this._state === "stopped") {
      return;
    }
    this.elapsed = this._duration;
    this.pendingDelay = 0;
    this._state = "stopped";
    this.recompute();
    this.listeners.complete.emit();
  }

  /** Replay from time zero with the current endpoints, duration, delay and loops. */
  restart(): void {
    if (!this.values) {
      return;
    }
    this.beginRun();
  }

  /** Swap the endpoints and mirror the elapsed time. State is unchanged. */
  reverse(): void {
    if (!this.values) {
      return;
    }
    this.swapEndpoints(this.values);
    this.elapsed = this._duration - this.elapsed;
    this.recompute();
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private beginRun(): void {
    this.generation++;
    this.elapsed = 0;
    this._loopsRemaining = this._loopCount;
    this.reversedPhase = false;
    this.pendingDelay = this._delay;
    this._state = this.pendingDelay > 0 ? "delayed" : "running";
    this.recompute();
    if (this._state === "running") {
      this.listeners.start.emit();
    }
  }

  private advance(amount: number): number {
    const generation = this.generation;
    this.elapsed += amount;

    const reachedEnd = this.elapsed >= this._duration;
    const overshoot = reachedEnd ? this.elapsed - this._duration : 0;
    if (reachedEnd) {
      this.elapsed = this._duration;
    }

    this.recompute();
    if (this.values) {
      this.listeners.update.emit(this.values.current);
    }

    if (!reachedEnd || generation !== this.generation || this._state !== "running") {
      return 0;
    }
    return this.finishIteration(overshoot);
  }

  /** Loop or complete. Bookkeeping is finished before the observers run. */
  private finishIteration(overshoot: number): number {
    const loops = this._loopCount === INFINITE_LOOPS || this._loopsRemaining > 0;

    if (this._loopType !== "none" && loops) {
      if (this._loopCount !== INFINITE_LOOPS) {
        this._loopsRemaining--;
      }
      this.elapsed = 0;
      switch (this._loopType) {
        case "restart":
          this.reversedPhase = false;
          break;
        case "pingPong":
          this.reversedPhase = !this.reversedPhase;
          if (this.values) {
            this.swapEndpoints(this.values);
          }
          break;
        case "yoyo":
          this.reversedPhase = !this.reversedPhase;
          break;
      }
      this.recompute();
      this.listeners.loop.emit();
      return 0;
    }

    this._state = "stopped";
    const unconsumed = this._timeScale > 0 ? overshoot / this._timeScale : 0;
    this.listeners.complete.emit();
    return unconsumed;
  }

  private swapEndpoints(values: Endpoints<T>): void {
    const start = values.start;
    values.start = values.end;
    values.end = start;
  }

  private recompute(): void {
    if (!this.values) {
      return;
    }
    let t = this._duration > 0 ? this.elapsed / this._duration : 0;
    if (this.reversedPhase && this._loopType === "yoyo") {
      t = 1 - t;
    }
    this.values.current = this.blend(this.values.start, this.values.end, this.easing(t));
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Clamp to [0, 1]; NaN becomes 0. */
export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  if (value < 0) return 0;
  if (value > 1) return 1;
  return value;
}

function nonNegative(value: number): number {
  return Number.isFinite(value) && value > 0 ? value : 0;
}

function sanitizeDelta(deltaTime: number): number {
  return Number.isFinite(deltaTime) && deltaTime > 0 ? deltaTime : 0;
}
