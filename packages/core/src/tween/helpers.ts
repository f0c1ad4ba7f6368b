/**
 * Shorthand constructors for common tween shapes.
 */

import {
  lerpColor,
  lerpNumber,
  lerpQuaternion,
  lerpVector2,
  lerpVector3,
} from "./blend.js";
import type { Color, Quaternion, Vector2, Vector3 } from "./blend.js";
import type { EasingFn } from "./easing.js";
import type { Playable } from "./playable.js";
import { Sequence } from "./sequence.js";
import { Tween } from "./tween.js";
import type { BlendFn } from "./tween.js";

export function numberTween(): Tween<number> {
  return new Tween(lerpNumber);
}

export function vector2Tween(): Tween<Vector2> {
  return new Tween(lerpVector2);
}

export function vector3Tween(): Tween<Vector3> {
  return new Tween(lerpVector3);
}

export function colorTween(): Tween<Color> {
  return new Tween(lerpColor);
}

export function quaternionTween(): Tween<Quaternion> {
  return new Tween(lerpQuaternion);
}

/**
 * Create, wire and start a tween in one call.
 *
 * @example
 * ```ts
 * const fade = tweenTo(lerpNumber, 1, 0, 0.3, (alpha) => { node.alpha = alpha; }, sineOut);
 * ```
 */
export function tweenTo<T>(
  blend: BlendFn<T>,
  from: T,
  to: T,
  duration: number,
  onUpdate: (value: T) => void,
  ease?: EasingFn,
): Tween<T> {
  return new Tween(blend).onUpdate(onUpdate).start(from, to, duration, ease);
}

/**
 * Like {@link tweenTo}, but `onUpdate` receives `from` before this returns,
 * so the target jumps to the start value instead of waiting for the first
 * frame. Use it to animate something in from elsewhere back to where it is.
 *
 * @example
 * ```ts
 * tweenFrom(lerpNumber, -200, node.x, 0.4, (x) => { node.x = x; }, backOut);
 * ```
 */
export function tweenFrom<T>(
  blend: BlendFn<T>,
  from: T,
  to: T,
  duration: number,
  onUpdate: (value: T) => void,
  ease?: EasingFn,
): Tween<T> {
  const tween = tweenTo(blend, from, to, duration, onUpdate, ease);
  onUpdate(from);
  return tween;
}

/** A sequence with `units` appended in order. Not started. */
export function sequence(...units: readonly Playable[]): Sequence {
  const result = new Sequence();
  for (const unit of units) {
    result.append(unit);
  }
  return result;
}
