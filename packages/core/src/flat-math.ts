/**
 * Flat Array Math Utilities
 *
 * Zero-allocation Vec3 math that reads directly from flat numeric arrays
 * given a start index, without creating any vector objects.
 *
 * Inputs are `ArrayLike<number>` so plain `Vec3` tuples and `Float64Array`
 * slices can be mixed freely; outputs are always written into a
 * `Float64Array` at `outOffset`.
 */

import { InvalidRayError } from './errors.js';

/** An immutable 3-component vector, used for scene inputs. */
export type Vec3 = readonly [number, number, number];

/** Vectors shorter than this cannot be normalized. */
export const DEGENERATE_LENGTH = 1e-12;

/**
 * Compute the dot product of the Vec3 at `a[i]` and the Vec3 at `b[j]`.
 */
export function vec3Dot(a: ArrayLike<number>, i: number, b: ArrayLike<number>, j: number): number {
  return (a[i] ?? 0) * (b[j] ?? 0) +
    (a[i + 1] ?? 0) * (b[j + 1] ?? 0) +
    (a[i + 2] ?? 0) * (b[j + 2] ?? 0);
}

/** out = a + b */
export function vec3Add(
  out: Float64Array,
  outOffset: number,
  a: ArrayLike<number>,
  i: number,
  b: ArrayLike<number>,
  j: number,
): void {
  out[outOffset] = (a[i] ?? 0) + (b[j] ?? 0);
  out[outOffset + 1] = (a[i + 1] ?? 0) + (b[j + 1] ?? 0);
  out[outOffset + 2] = (a[i + 2] ?? 0) + (b[j + 2] ?? 0);
}

/** out = a - b */
export function vec3Sub(
  out: Float64Array,
  outOffset: number,
  a: ArrayLike<number>,
  i: number,
  b: ArrayLike<number>,
  j: number,
): void {
  out[outOffset] = (a[i] ?? 0) - (b[j] ?? 0);
  out[outOffset + 1] = (a[i + 1] ?? 0) - (b[j + 1] ?? 0);
  out[outOffset + 2] = (a[i + 2] ?? 0) - (b[j + 2] ?? 0);
}

/** out = a * s */
export function vec3Scale(
  out: Float64Array,
  outOffset: number,
  a: ArrayLike<number>,
  i: number,
  s: number,
): void {
  out[outOffset] = (a[i] ?? 0) * s;
  out[outOffset + 1] = (a[i + 1] ?? 0) * s;
  out[outOffset + 2] = (a[i + 2] ?? 0) * s;
}

/**
 * out = a + b * s
 *
 * Used to step along a ray: `point = origin + direction * t`.
 */
export function vec3AddScaled(
  out: Float64Array,
  outOffset: number,
  a: ArrayLike<number>,
  i: number,
  b: ArrayLike<number>,
  j: number,
  s: number,
): void {
  out[outOffset] = (a[i] ?? 0) + (b[j] ?? 0) * s;
  out[outOffset + 1] = (a[i + 1] ?? 0) + (b[j + 1] ?? 0) * s;
  out[outOffset + 2] = (a[i + 2] ?? 0) + (b[j + 2] ?? 0) * s;
}

/** Euclidean length of the Vec3 at `a[i]`. */
export function vec3Length(a: ArrayLike<number>, i: number): number {
  return Math.sqrt(vec3Dot(a, i, a, i));
}

/**
 * Write the unit vector of `a[i]` into `out` at `outOffset`.
 * `out` and `a` may be the same buffer (in-place normalization).
 *
 * @throws InvalidRayError when the length is below `DEGENERATE_LENGTH`.
 */
export function vec3Normalize(
  out: Float64Array,
  outOffset: number,
  a: ArrayLike<number>,
  i: number,
): void {
  const len = vec3Length(a, i);
  if (!(len >= DEGENERATE_LENGTH)) {
    throw new InvalidRayError(`vec3Normalize: cannot normalize a vector of length ${len}`);
  }
  out[outOffset] = (a[i] ?? 0) / len;
  out[outOffset + 1] = (a[i + 1] ?? 0) / len;
  out[outOffset + 2] = (a[i + 2] ?? 0) / len;
}
