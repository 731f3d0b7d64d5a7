import { assertFiniteVec3, InvalidConfigurationError } from './errors.js';
import { DEGENERATE_LENGTH } from './flat-math.js';
import type { Vec3 } from './flat-math.js';

/** A point light: position plus a scalar intensity. */
export interface PointLight {
  readonly position: Vec3;
  readonly intensity: number;
}

/** Create a frozen point light. */
export function createPointLight(position: Vec3, intensity: number): PointLight {
  assertFiniteVec3('createPointLight', 'position', position);
  if (!Number.isFinite(intensity) || intensity < 0) {
    throw new InvalidConfigurationError(
      `createPointLight: intensity must be a non-negative finite number, got ${intensity}`,
    );
  }
  return Object.freeze({
    position: Object.freeze([position[0], position[1], position[2]] as const),
    intensity,
  });
}

/**
 * Lambertian intensity at the point `point[pointOffset]` with unit surface
 * normal `normal[normalOffset]`:
 *
 *   max(dot(normalize(light.position - point), normal), 0) * light.intensity
 *
 * Surfaces facing away from the light get 0. There is no occlusion test.
 * A point coinciding with the light has no light direction and also gets 0.
 */
export function lambert(
  point: ArrayLike<number>,
  pointOffset: number,
  normal: ArrayLike<number>,
  normalOffset: number,
  light: PointLight,
): number {
  const lx = light.position[0] - (point[pointOffset] ?? 0);
  const ly = light.position[1] - (point[pointOffset + 1] ?? 0);
  const lz = light.position[2] - (point[pointOffset + 2] ?? 0);
  const len = Math.sqrt(lx * lx + ly * ly + lz * lz);
  if (len < DEGENERATE_LENGTH) return 0;

  const cos =
    (lx / len) * (normal[normalOffset] ?? 0) +
    (ly / len) * (normal[normalOffset + 1] ?? 0) +
    (lz / len) * (normal[normalOffset + 2] ?? 0);
  return Math.max(cos, 0) * light.intensity;
}

/** Lambertian intensity plus a constant ambient term. */
export function shade(
  point: ArrayLike<number>,
  pointOffset: number,
  normal: ArrayLike<number>,
  normalOffset: number,
  light: PointLight,
  ambient: number,
): number {
  return lambert(point, pointOffset, normal, normalOffset, light) + ambient;
}
