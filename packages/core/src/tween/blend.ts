/**
 * Blend functions for common value types.
 *
 * Each one is a `BlendFn<T>` ready to hand to `new Tween(...)`. They are
 * plain linear combinations and extrapolate for `t` outside [0, 1].
 */

/** Two-component vector. */
export interface Vector2 {
  readonly x: number;
  readonly y: number;
}

/** Three-component vector. */
export interface Vector3 extends Vector2 {
  readonly z: number;
}

/** Four-component vector. */
export interface Vector4 extends Vector3 {
  readonly w: number;
}

/** RGBA color with channels in [0, 1]. */
export interface Color {
  readonly r: number;
  readonly g: number;
  readonly b: number;
  readonly a: number;
}

/** Rotation quaternion (x, y, z imaginary; w real). */
export interface Quaternion {
  readonly x: number;
  readonly y: number;
  readonly z: number;
  readonly w: number;
}

/** A scalar or a fixed-length list of scalars. */
export type NumericValue = number | readonly number[];

export function lerpNumber(a: number, b: number, t: number): number {
  return a + (b - a) * t;
}

export function lerpVector2(a: Vector2, b: Vector2, t: number): Vector2 {
  return {
    x: lerpNumber(a.x, b.x, t),
    y: lerpNumber(a.y, b.y, t),
  };
}

export function lerpVector3(a: Vector3, b: Vector3, t: number): Vector3 {
  return {
    x: lerpNumber(a.x, b.x, t),
    y: lerpNumber(a.y, b.y, t),
    z: lerpNumber(a.z, b.z, t),
  };
}

export function lerpVector4(a: Vector4, b: Vector4, t: number): Vector4 {
  return {
    x: lerpNumber(a.x, b.x, t),
    y: lerpNumber(a.y, b.y, t),
    z: lerpNumber(a.z, b.z, t),
    w: lerpNumber(a.w, b.w, t),
  };
}

/** Channel-wise; no clamping, so overshooting easings may leave [0, 1]. */
export function lerpColor(a: Color, b: Color, t: number): Color {
  return {
    r: lerpNumber(a.r, b.r, t),
    g: lerpNumber(a.g, b.g, t),
    b: lerpNumber(a.b, b.b, t),
    a: lerpNumber(a.a, b.a, t),
  };
}

/**
 * Component-wise over `a`'s length. Components missing from `b` hold `a`'s
 * value.
 */
export function lerpArray(a: readonly number[], b: readonly number[], t: number): number[] {
  return a.map((value, i) => lerpNumber(value, b[i] ?? value, t));
}

/**
 * Normalized linear interpolation along the shorter arc.
 * A degenerate result (both inputs zero) falls back to identity.
 */
export function lerpQuaternion(a: Quaternion, b: Quaternion, t: number): Quaternion {
  const dot = a.x * b.x + a.y * b.y + a.z * b.z + a.w * b.w;
  const sign = dot < 0 ? -1 : 1;
  const x = lerpNumber(a.x, b.x * sign, t);
  const y = lerpNumber(a.y, b.y * sign, t);
  const z = lerpNumber(a.z, b.z * sign, t);
  const w = lerpNumber(a.w, b.w * sign, t);
  const length = Math.hypot(x, y, z, w);
  if (length === 0) {
    return { x: 0, y: 0, z: 0, w: 1 };
  }
  return { x: x / length, y: y / length, z: z / length, w: w / length };
}

/**
 * Blend scalars or scalar lists. When the shapes differ, scalars are
 * treated as one-element lists.
 */
export function lerpNumeric(a: NumericValue, b: NumericValue, t: number): NumericValue {
  if (typeof a === "number" && typeof b === "number") {
    return lerpNumber(a, b, t);
  }
  return lerpArray(toArray(a), toArray(b), t);
}

function toArray(value: NumericValue): readonly number[] {
  return typeof value === "number" ? [value] : value;
}
