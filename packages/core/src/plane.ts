/**
 * Plane stored as a point on the plane, its unit normal and a face color.
 * Layout: [px, py, pz, nx, ny, nz, r, g, b]
 */

import { vec3Dot, vec3AddScaled } from './flat-math.js';
import type { Vec3 } from './flat-math.js';
import { RAY_DIRECTION_OFFSET } from './ray.js';

export const PLANE_STRIDE = 9;
export const PLANE_NORMAL_OFFSET = 3;
export const PLANE_COLOR_OFFSET = 6;

/**
 * Rays whose direction makes `|dot(direction, normal)|` smaller than this are
 * treated as parallel to the plane and never hit it.
 */
export const PARALLEL_EPSILON = 1e-6;

/** Write a plane into `buf` starting at `offset`. */
export function writePlane(
  buf: Float64Array,
  offset: number,
  point: Vec3,
  normal: Vec3,
  color: Vec3,
): void {
  buf[offset] = point[0];
  buf[offset + 1] = point[1];
  buf[offset + 2] = point[2];
  buf[offset + 3] = normal[0];
  buf[offset + 4] = normal[1];
  buf[offset + 5] = normal[2];
  buf[offset + 6] = color[0];
  buf[offset + 7] = color[1];
  buf[offset + 8] = color[2];
}

/** Allocate a standalone single-plane buffer. */
export function createPlane(point: Vec3, normal: Vec3, color: Vec3): Float64Array {
  const buf = new Float64Array(PLANE_STRIDE);
  writePlane(buf, 0, point, normal, color);
  return buf;
}

/**
 * Ray–plane intersection.
 *
 * Returns the parametric hit distance `t` (>= 0), or -1 when the ray is
 * parallel to the plane or the plane lies behind the ray origin. When
 * `hitOut` is given, the hit point `origin + direction * t` is written there
 * on a hit (and left untouched on a miss).
 */
export function planeIntersect(
  planeBuf: ArrayLike<number>,
  planeOffset: number,
  rayBuf: ArrayLike<number>,
  rayOffset: number,
  hitOut?: Float64Array,
  hitOffset: number = 0,
): number {
  const normalOffset = planeOffset + PLANE_NORMAL_OFFSET;
  const denom = vec3Dot(rayBuf, rayOffset + RAY_DIRECTION_OFFSET, planeBuf, normalOffset);
  if (Math.abs(denom) < PARALLEL_EPSILON) return -1;

  const wx = (planeBuf[planeOffset] ?? 0) - (rayBuf[rayOffset] ?? 0);
  const wy = (planeBuf[planeOffset + 1] ?? 0) - (rayBuf[rayOffset + 1] ?? 0);
  const wz = (planeBuf[planeOffset + 2] ?? 0) - (rayBuf[rayOffset + 2] ?? 0);
  const t = (
    wx * (planeBuf[normalOffset] ?? 0) +
    wy * (planeBuf[normalOffset + 1] ?? 0) +
    wz * (planeBuf[normalOffset + 2] ?? 0)
  ) / denom;

  if (!(t >= 0)) return -1;
  if (hitOut !== undefined) {
    vec3AddScaled(hitOut, hitOffset, rayBuf, rayOffset, rayBuf, rayOffset + RAY_DIRECTION_OFFSET, t);
  }
  return t;
}
