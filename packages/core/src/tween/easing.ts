/**
 * Easing functions for the tween timing system.
 *
 * An easing function maps a raw progress value t ∈ [0, 1] to an eased
 * output, typically also in [0, 1]. A tween computes raw progress from
 * elapsed time / duration, then applies the easing before blending values.
 *
 * Inputs are never clamped: callers may evaluate a curve outside [0, 1],
 * and the Back and Elastic families deliberately leave [0, 1] near the ends.
 */

/**
 * A pure function that maps linear progress to eased progress.
 *
 * @param t - Raw progress in [0, 1] where 0 = start, 1 = end.
 * @returns Eased progress, typically in [0, 1].
 */
export type EasingFn = (t: number) => number;

const BACK_OVERSHOOT = 1.70158;
const BACK_IN_OUT_OVERSHOOT = BACK_OVERSHOOT * 1.525;
const ELASTIC_PERIOD = 0.3;
const ELASTIC_IN_OUT_PERIOD = 0.45;

// ---------------------------------------------------------------------------
// Linear
// ---------------------------------------------------------------------------

/** Constant speed — no acceleration or deceleration. */
export function linear(t: number): number {
  return t;
}

// ---------------------------------------------------------------------------
// Polynomial
// ---------------------------------------------------------------------------

/** Accelerate from rest. Quadratic. */
export function quadIn(t: number): number {
  return t * t;
}

/** Decelerate to rest. Quadratic. */
export function quadOut(t: number): number {
  return t * (2 - t);
}

export function quadInOut(t: number): number {
  return t < 0.5 ? 2 * t * t : -1 + (4 - 2 * t) * t;
}

/** Accelerate from rest. Cubic. */
export function cubicIn(t: number): number {
  return t * t * t;
}

/** Decelerate to rest. Cubic. */
export function cubicOut(t: number): number {
  const shifted = t - 1;
  return shifted * shifted * shifted + 1;
}

export function cubicInOut(t: number): number {
  if (t < 0.5) return 4 * t * t * t;
  const shifted = 2 * t - 2;
  return 0.5 * shifted * shifted * shifted + 1;
}

/** Accelerate from rest. Quartic. */
export function quartIn(t: number): number {
  return t * t * t * t;
}

/** Decelerate to rest. Quartic. */
export function quartOut(t: number): number {
  const shifted = t - 1;
  return 1 - shifted * shifted * shifted * shifted;
}

export function quartInOut(t: number): number {
  if (t < 0.5) return 8 * t * t * t * t;
  const shifted = t - 1;
  return 1 - 8 * shifted * shifted * shifted * shifted;
}

/** Accelerate from rest. Quintic. */
export function quintIn(t: number): number {
  return t * t * t * t * t;
}

/** Decelerate to rest. Quintic. */
export function quintOut(t: number): number {
  const shifted = t - 1;
  return shifted * shifted * shifted * shifted * shifted + 1;
}

export function quintInOut(t: number): number {
  if (t < 0.5) return 16 * t * t * t * t * t;
  const shifted = 2 * t - 2;
  return 0.5 * shifted * shifted * shifted * shifted * shifted + 1;
}

// ---------------------------------------------------------------------------
// Sine
// ---------------------------------------------------------------------------

export function sineIn(t: number): number {
  return 1 - Math.cos((t * Math.PI) / 2);
}

export function sineOut(t: number): number {
  return Math.sin((t * Math.PI) / 2);
}

export function sineInOut(t: number): number {
  return 0.5 * (1 - Math.cos(t * Math.PI));
}

// ---------------------------------------------------------------------------
// Exponential
// ---------------------------------------------------------------------------

// The exponential curves only approach their end values asymptotically,
// so 0 and 1 are returned exactly at the boundaries.

export function expoIn(t: number): number {
  if (t === 0 || t === 1) return t;
  return 2 ** (10 * (t - 1));
}

export function expoOut(t: number): number {
  if (t === 0 || t === 1) return t;
  return 1 - 2 ** (-10 * t);
}

export function expoInOut(t: number): number {
  if (t === 0 || t === 1) return t;
  return t < 0.5
    ? 0.5 * 2 ** (20 * t - 10)
    : 1 - 0.5 * 2 ** (-20 * t + 10);
}

// ---------------------------------------------------------------------------
// Circular
// ---------------------------------------------------------------------------

export function circIn(t: number): number {
  return 1 - Math.sqrt(1 - t * t);
}

export function circOut(t: number): number {
  return Math.sqrt((2 - t) * t);
}

export function circInOut(t: number): number {
  if (t < 0.5) {
    return 0.5 * (1 - Math.sqrt(1 - 4 * t * t));
  }
  return 0.5 * (Math.sqrt(-(2 * t - 3) * (2 * t - 1)) + 1);
}

// ---------------------------------------------------------------------------
// Elastic
// ---------------------------------------------------------------------------

/** Wind-up oscillation that snaps toward the end. */
export function elasticIn(t: number): number {
  if (t === 0 || t === 1) return t;
  const phase = ELASTIC_PERIOD / 4;
  return -(2 ** (10 * (t - 1))) * Math.sin(((t - 1 - phase) * (2 * Math.PI)) / ELASTIC_PERIOD);
}

/** Overshoots the end and settles with decaying oscillation. */
export function elasticOut(t: number): number {
  if (t === 0 || t === 1) return t;
  const phase = ELASTIC_PERIOD / 4;
  return 2 ** (-10 * t) * Math.sin(((t - phase) * (2 * Math.PI)) / ELASTIC_PERIOD) + 1;
}

export function elasticInOut(t: number): number {
  if (t === 0 || t === 1) return t;
  const phase = ELASTIC_IN_OUT_PERIOD / 4;
  const scaled = 2 * t - 1;
  const wave = Math.sin(((scaled - phase) * (2 * Math.PI)) / ELASTIC_IN_OUT_PERIOD);
  if (scaled < 0) {
    return -0.5 * 2 ** (10 * scaled) * wave;
  }
  return 0.5 * 2 ** (-10 * scaled) * wave + 1;
}

// ---------------------------------------------------------------------------
// Back
// ---------------------------------------------------------------------------

/** Pulls back below 0 before accelerating to the end. */
export function backIn(t: number): number {
  return t * t * ((BACK_OVERSHOOT + 1) * t - BACK_OVERSHOOT);
}

/** Overshoots past 1 before settling on the end. */
export function backOut(t: number): number {
  const shifted = t - 1;
  return shifted * shifted * ((BACK_OVERSHOOT + 1) * shifted + BACK_OVERSHOOT) + 1;
}

export function backInOut(t: number): number {
  const scaled = t * 2;
  if (scaled < 1) {
    return 0.5 * (scaled * scaled * ((BACK_IN_OUT_OVERSHOOT + 1) * scaled - BACK_IN_OUT_OVERSHOOT));
  }
  const shifted = scaled - 2;
  return 0.5 * (shifted * shifted * ((BACK_IN_OUT_OVERSHOOT + 1) * shifted + BACK_IN_OUT_OVERSHOOT) + 2);
}

// ---------------------------------------------------------------------------
// Bounce
// ---------------------------------------------------------------------------

/** Decreasing-amplitude bounces against the end value. */
export function bounceOut(t: number): number {
  if (t < 1 / 2.75) {
    return 7.5625 * t * t;
  }
  if (t < 2 / 2.75) {
    const shifted = t - 1.5 / 2.75;
    return 7.5625 * shifted * shifted + 0.75;
  }
  if (t < 2.5 / 2.75) {
    const shifted = t - 2.25 / 2.75;
    return 7.5625 * shifted * shifted + 0.9375;
  }
  const shifted = t - 2.625 / 2.75;
  return 7.5625 * shifted * shifted + 0.984375;
}

export function bounceIn(t: number): number {
  return 1 - bounceOut(1 - t);
}

export function bounceInOut(t: number): number {
  return t < 0.5
    ? 0.5 * bounceIn(t * 2)
    : 0.5 * bounceOut(t * 2 - 1) + 0.5;
}

// ---------------------------------------------------------------------------
// Smoothstep
// ---------------------------------------------------------------------------

/** Hermite S-curve with zero slope at both ends. */
export function smoothstep(t: number): number {
  return t * t * (3 - 2 * t);
}

/** Ken Perlin's variant: zero first and second derivative at both ends. */
export function smootherstep(t: number): number {
  return t * t * t * (t * (t * 6 - 15) + 10);
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

/** Names of the built-in easing functions, in catalog order. */
export const EASING_NAMES = [
  "linear",
  "quadIn",
  "quadOut",
  "quadInOut",
  "cubicIn",
  "cubicOut",
  "cubicInOut",
  "quartIn",
  "quartOut",
  "quartInOut",
  "quintIn",
  "quintOut",
  "quintInOut",
  "sineIn",
  "sineOut",
  "sineInOut",
  "expoIn",
  "expoOut",
  "expoInOut",
  "circIn",
  "circOut",
  "circInOut",
  "elasticIn",
  "elasticOut",
  "elasticInOut",
  "backIn",
  "backOut",
  "backInOut",
  "bounceIn",
  "bounceOut",
  "bounceInOut",
  "smoothstep",
  "smootherstep",
] as const;

/** Name of a built-in easing function. */
export type EasingName = (typeof EASING_NAMES)[number];

/** Registry of built-in easing functions, keyed by name. */
export const EASING_FUNCTIONS: Readonly<Record<EasingName, EasingFn>> = Object.freeze({
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
});

/** Type guard for built-in easing names. */
export function isEasingName(name: string): name is EasingName {
  return Object.prototype.hasOwnProperty.call(EASING_FUNCTIONS, name);
}

/**
 * Look up an easing function by name.
 * Returns `undefined` if the name is not a built-in easing.
 */
export function getEasing(name: string): EasingFn | undefined {
  return isEasingName(name) ? EASING_FUNCTIONS[name] : undefined;
}
