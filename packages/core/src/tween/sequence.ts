/**
 * Sequence — plays an ordered list of playable units one after another.
 *
 * Only the unit at `currentIndex` receives time. When it reports completion
 * the sequence moves on, handing the unused remainder of the frame to the
 * next unit. Sequences nest: a sequence is itself a `Playable`.
 */

import { EmptySequenceError, UnsupportedOperationError } from "./errors.js";
import { ListenerList } from "./listeners.js";
import type { Playable, PlaybackState, StopBehavior } from "./playable.js";
import { clamp01 } from "./tween.js";

/**
 * An ordered composition of playable units.
 *
 * @example
 * ```ts
 * const rise = new Tween(lerpNumber).start(0, 50, 1, quadIn);
 * const fall = new Tween(lerpNumber).start(50, 0, 1, bounceOut);
 *
 * const seq = new Sequence()
 *   .append(rise)
 *   .append(fall)
 *   .onComplete(() => console.log("done"));
 * seq.start();
 * // once per frame:
 * seq.update(deltaSeconds);
 * ```
 */
export class Sequence implements Playable {
  private readonly units: Playable[] = [];
  private index = 0;
  private _state: PlaybackState = "stopped";
  private _timeScale = 1;

  private readonly startListeners = new ListenerList<[]>();
  private readonly completeListeners = new ListenerList<[]>();

  // ---------------------------------------------------------------------------
  // Accessors
  // ---------------------------------------------------------------------------

  get state(): PlaybackState {
    return this._state;
  }

  /** Index of the unit currently receiving time. Equals `length` once complete. */
  get currentIndex(): number {
    return this.index;
  }

  get length(): number {
    return this.units.length;
  }

  get members(): readonly Playable[] {
    return this.units;
  }

  get isComplete(): boolean {
    return this._state === "stopped" && this.units.length > 0 && this.index >= this.units.length;
  }

  get timeScale(): number {
    return this._timeScale;
  }

  /** Propagates to every current member. Later appends inherit the value. */
  set timeScale(scale: number) {
    this._timeScale = Number.isFinite(scale) && scale > 0 ? scale : 0;
    for (const unit of this.units) {
      unit.timeScale = this._timeScale;
    }
  }

  /**
   * Approximate overall progress: whole members done plus the fraction of
   * the active one, divided by the member count.
   */
  get progress(): number {
    const count = this.units.length;
    if (count === 0) {
      return 0;
    }
    const active = this.units[this.index];
    if (!active) {
      return 1;
    }
    return (this.index + active.progress) / count;
  }

  /**
   * Seek to the member that owns `value` and set that member's progress.
   * Members before it keep whatever state they had; they are not
   * fast-forwarded.
   *
   * Only progress is set, never state. Seeking back into a member that has
   * already finished leaves it `stopped` part way through; the sequence then
   * waits on it without advancing until that member is `restart()`ed.
   */
  set progress(value: number) {
    const count = this.units.length;
    if (count === 0) {
      return;
    }
    const scaled = clamp01(value) * count;
    const target = Math.min(Math.floor(scaled), count - 1);
    const unit = this.units[target];
    if (!unit) {
      return;
    }
    this.index = target;
    unit.progress = scaled - target;
  }

  // ---------------------------------------------------------------------------
  // Composition
  // ---------------------------------------------------------------------------

  /** Add a unit to the end. It takes on the sequence's current time scale. */
  append(unit: Playable): this {
    unit.timeScale = this._timeScale;
    this.units.push(unit);
    return this;
  }

  onStart(listener: () => void): this {
    this.startListeners.add(listener);
    return this;
  }

  onComplete(listener: () => void): this {
    this.completeListeners.add(listener);
    return this;
  }

  // ---------------------------------------------------------------------------
  // Playback
  // ---------------------------------------------------------------------------

  /**
   * Start from the first member. Members are not restarted; each is expected
   * to have been started by its owner.
   *
   * @throws {EmptySequenceError} if nothing was appended.
   */
  start(): this {
    if (this.units.length === 0) {
      throw new EmptySequenceError();
    }
    this.index = 0;
    this._state = "running";
    this.startListeners.emit();
    return this;
  }

  update(deltaTime: number): number {
    if (this._state !== "running" || this.index >= this.units.length) {
      return 0;
    }

    let remaining = deltaTime;
    let handedOut = false;
    for (let unit = this.units[this.index]; unit; unit = this.units[this.index]) {
      // Members that were already complete when reached are skipped.
      if (!unit.isComplete) {
        // Once a member has had this frame, the next one only runs on leftover time.
        if (handedOut && remaining <= 0) {
          return 0;
        }
        remaining = unit.update(remaining);
        handedOut = true;
        if (!unit.isComplete || this._state !== "running") {
          return 0;
        }
      }
      this.index++;
    }

    this._state = "stopped";
    this.completeListeners.emit();
    return remaining;
  }

  stop(behavior: StopBehavior = "asIs"): void {
    if (behavior === "asIs") {
      this._state = "stopped";
      return;
    }
    if (this._state === "stopped") {
      return;
    }
    this.index = this.units.length;
    this._state = "stopped";
    for (const unit of this.units) {
      unit.stop("forceComplete");
    }
    this.completeListeners.emit();
  }

  /** Pauses only the active member; members not yet reached are untouched. */
  pause(): void {
    if (this._state !== "running") {
      return;
    }
    this._state = "paused";
    this.units[this.index]?.pause();
  }

  resume(): void {
    if (this._state !== "paused") {
      return;
    }
    this._state = "running";
    this.units[this.index]?.resume();
  }

  /** Restart every member, reached or not, and play again from the first. */
  restart(): void {
    if (this.units.length === 0) {
      return;
    }
    for (const unit of this.units) {
      unit.restart();
    }
    this.index = 0;
    this._state = "running";
    this.startListeners.emit();
  }

  /** @throws {UnsupportedOperationError} always. */
  reverse(): void {
    throw new UnsupportedOperationError("reverse", "Sequences cannot be reversed");
  }
}
