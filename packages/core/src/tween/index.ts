/**
 * @tweenloom/core tween module — public API exports.
 */

// Engine
export { Tween, clamp01 } from "./tween.js";
export type { BlendFn, TweenEvents } from "./tween.js";
export { Sequence } from "./sequence.js";
export { INFINITE_LOOPS } from "./playable.js";
export type { Playable, PlaybackState, StopBehavior, LoopType } from "./playable.js";
export type { Listener } from "./listeners.js";

// Errors
export {
  TweenError,
  TweenConfigError,
  EmptySequenceError,
  UnsupportedOperationError,
} from "./errors.js";
export type { TweenErrorCode } from "./errors.js";

// Easing
export type { EasingFn, EasingName } from "./easing.js";
export {
  linear,
  quadIn,
  quadOut,
  quadInOut,
  cubicIn,
  cubicOut,
  cubicInOut,
  quartIn,
  quartOut,
  quartInOut,
  quintIn,
  quintOut,
  quintInOut,
  sineIn,
  sineOut,
  sineInOut,
  expoIn,
  expoOut,
  expoInOut,
  circIn,
  circOut,
  circInOut,
  elasticIn,
  elasticOut,
  elasticInOut,
  backIn,
  backOut,
  backInOut,
  bounceIn,
  bounceOut,
  bounceInOut,
  smoothstep,
  smootherstep,
  EASING_NAMES,
  EASING_FUNCTIONS,
  getEasing,
  isEasingName,
} from "./easing.js";

// Value blending
export {
  lerpNumber,
  lerpVector2,
  lerpVector3,
  lerpVector4,
  lerpColor,
  lerpArray,
  lerpQuaternion,
  lerpNumeric,
} from "./blend.js";
export type { Vector2, Vector3, Vector4, Color, Quaternion, NumericValue } from "./blend.js";

// Shorthands
export {
  numberTween,
  vector2Tween,
  vector3Tween,
  colorTween,
  quaternionTween,
  tweenFrom,
  tweenTo,
  sequence,
} from "./helpers.js";

// Bulk management and frame driving
export { TweenManager } from "./manager.js";
export { Ticker } from "./ticker.js";
export type { TickerOptions, FrameTarget } from "./ticker.js";
export type { Clock, CancelHandle } from "./clock.js";
export { TimerClock } from "./timer-clock.js";
export type { TimerClockOptions } from "./timer-clock.js";

// Test utilities
export { TestClock } from "./test-clock.js";
export { TweenRecorder } from "./recorder.js";
export type { RecordedEvent } from "./recorder.js";
