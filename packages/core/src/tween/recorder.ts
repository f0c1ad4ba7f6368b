/**
 * TweenRecorder — captures a tween's notifications for test assertions.
 */

import type { Tween } from "./tween.js";

/** Union of all notifications, tagged for easy filtering. */
export type RecordedEvent<T> =
  | { readonly kind: "start" }
  | { readonly kind: "update"; readonly value: T }
  | { readonly kind: "loop" }
  | { readonly kind: "complete" };

/**
 * Records every notification of the tweens it is attached to.
 *
 * @example
 * ```ts
 * const tween = numberTween();
 * const recorder = new TweenRecorder<number>().attach(tween);
 * tween.start(0, 100, 1);
 * tween.update(1);
 *
 * expect(recorder.kinds()).toEqual(["start", "update", "complete"]);
 * expect(recorder.updates).toEqual([100]);
 * ```
 */
export class TweenRecorder<T> {
  /** All notifications in emission order. */
  readonly all: RecordedEvent<T>[] = [];
  /** Values passed to update observers. */
  readonly updates: T[] = [];
  startCount = 0;
  loopCount = 0;
  completeCount = 0;

  private readonly onStart = (): void => {
    this.startCount++;
    this.all.push({ kind: "start" });
  };

  private readonly onUpdate = (value: T): void => {
    this.updates.push(value);
    this.all.push({ kind: "update", value });
  };

  private readonly onLoop = (): void => {
    this.loopCount++;
    this.all.push({ kind: "loop" });
  };

  private readonly onComplete = (): void => {
    this.completeCount++;
    this.all.push({ kind: "complete" });
  };

  attach(tween: Tween<T>): this {
    tween
      .on("start", this.onStart)
      .on("update", this.onUpdate)
      .on("loop", this.onLoop)
      .on("complete", this.onComplete);
    return this;
  }

  detach(tween: Tween<T>): this {
    tween
      .off("start", this.onStart)
      .off("update", this.onUpdate)
      .off("loop", this.onLoop)
      .off("complete", this.onComplete);
    return this;
  }

  /** Notification kinds in emission order. */
  kinds(): RecordedEvent<T>["kind"][] {
    return this.all.map((event) => event.kind);
  }

  /** Clear all recorded notifications. */
  clear(): void {
    this.all.length = 0;
    this.updates.length = 0;
    this.startCount = 0;
    this.loopCount = 0;
    this.completeCount = 0;
  }
}
