/**
 * TweenManager — drives a set of playable units from a single frame call.
 *
 * Built only on the public `Playable` contract: it updates every unit,
 * drops the ones that finished, and broadcasts control calls.
 */

import type { Playable, StopBehavior } from "./playable.js";

/**
 * Holds active units and advances them together.
 *
 * @example
 * ```ts
 * const manager = new TweenManager();
 * manager.add(fadeIn).add(slide);
 * // once per frame:
 * manager.update(deltaSeconds);
 * ```
 */
export class TweenManager {
  private readonly units = new Set<Playable>();
  private _timeScale = 1;

  /** Number of units still managed. */
  get size(): number {
    return this.units.size;
  }

  get timeScale(): number {
    return this._timeScale;
  }

  /** Broadcast a time scale to every current unit. */
  set timeScale(scale: number) {
    this._timeScale = scale;
    for (const unit of this.units) {
      unit.timeScale = scale;
    }
  }

  add(unit: Playable): this {
    this.units.add(unit);
    return this;
  }

  remove(unit: Playable): boolean {
    return this.units.delete(unit);
  }

  has(unit: Playable): boolean {
    return this.units.has(unit);
  }

  /**
   * Advance every unit by `deltaTime` seconds and evict completed ones.
   * Units added during this call are first updated on the next one.
   */
  update(deltaTime: number): void {
    for (const unit of [...this.units]) {
      if (!this.units.has(unit)) {
        continue;
      }
      unit.update(deltaTime);
      if (unit.isComplete) {
        this.units.delete(unit);
      }
    }
  }

  /** Stop every unit, then forget all of them. */
  stopAll(behavior: StopBehavior = "asIs"): void {
    for (const unit of [...this.units]) {
      unit.stop(behavior);
    }
    this.units.clear();
  }

  pauseAll(): void {
    for (const unit of this.units) {
      unit.pause();
    }
  }

  resumeAll(): void {
    for (const unit of this.units) {
      unit.resume();
    }
  }
}
