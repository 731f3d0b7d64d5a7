import { Box } from './box.js';
import type { Camera } from './camera.js';
import type { Vec3 } from './flat-math.js';
import { createPointLight } from './light.js';
import type { PointLight } from './light.js';

/** Distance along the ray and outward surface normal of a primitive hit. */
export interface SurfaceHit {
  t: number;
  normal: Vec3;
}

/** Anything a ray can be tested against. */
export interface Intersectable {
  /**
   * Intersect the ray stored at `rayBuf[rayOffset]` (RAY_STRIDE layout) and
   * return the nearest hit in front of the origin, or `null`.
   */
  intersect(rayBuf: ArrayLike<number>, rayOffset: number): SurfaceHit | null;
}

/** An intersectable primitive with a surface color (RGB in [0, 1]). */
export interface Renderable extends Intersectable {
  readonly color: Vec3;
}

/** The nearest primitive along a ray. */
export interface SceneHit<T extends Intersectable = Intersectable> extends SurfaceHit {
  object: T;
  /** Position of `object` in the scene array. */
  index: number;
}

/**
 * Find the nearest hit among `objects` for the ray at `rayBuf[rayOffset]`.
 *
 * Every object is tested (no acceleration structure). Ties keep the object
 * that comes first in `objects`.
 */
export function resolveNearest<T extends Intersectable>(
  objects: readonly T[],
  rayBuf: ArrayLike<number>,
  rayOffset: number,
): SceneHit<T> | null {
  let nearest: SceneHit<T> | null = null;
  for (const [index, object] of objects.entries()) {
    const hit = object.intersect(rayBuf, rayOffset);
    if (hit !== null && (nearest === null || hit.t < nearest.t)) {
      nearest = { object, index, t: hit.t, normal: hit.normal };
    }
  }
  return nearest;
}

// ── Scene description ────────────────────────────────────────────────────────

/** Plain-data box, as delivered by a scene loader or posted to a worker. */
export interface BoxDescription {
  center: Vec3;
  side: number;
  color: Vec3;
}

/** Plain-data scene: structured-cloneable, so it can cross a worker boundary. */
export interface SceneDescription {
  boxes: readonly BoxDescription[];
  light: { position: Vec3; intensity: number };
  camera: Camera;
  width: number;
  height: number;
}

/** Everything `render` needs. */
export interface RenderInput<T extends Renderable = Renderable> {
  objects: readonly T[];
  light: PointLight;
  camera: Camera;
  width: number;
  height: number;
}

/** Build boxes and the light from a scene description. */
export function createScene(description: SceneDescription): RenderInput<Box> {
  return {
    objects: description.boxes.map((b) => new Box(b.center, b.side, b.color)),
    light: createPointLight(description.light.position, description.light.intensity),
    camera: { position: description.camera.position, fov: description.camera.fov },
    width: description.width,
    height: description.height,
  };
}
