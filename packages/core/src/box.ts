import { assertFiniteVec3, InvalidConfigurationError } from './errors.js';
import type { Vec3 } from './flat-math.js';
import { planeIntersect, writePlane, PLANE_STRIDE } from './plane.js';
import type { Renderable, SurfaceHit } from './scene.js';

/**
 * Outward face normals, in the order the faces are stored. Frozen, since
 * `intersect` hands these arrays out as `SurfaceHit.normal`.
 */
export const BOX_FACE_NORMALS: readonly Vec3[] = Object.freeze([
  Object.freeze([1, 0, 0] as const),
  Object.freeze([-1, 0, 0] as const),
  Object.freeze([0, 1, 0] as const),
  Object.freeze([0, -1, 0] as const),
  Object.freeze([0, 0, 1] as const),
  Object.freeze([0, 0, -1] as const),
]);

export const BOX_FACE_COUNT = BOX_FACE_NORMALS.length;

/**
 * An axis-aligned box with a uniform side length on all three axes.
 *
 * The six face planes are owned by the box and stored inline in one flat
 * buffer (`BOX_FACE_COUNT * PLANE_STRIDE` floats, faces in
 * `BOX_FACE_NORMALS` order). They are written once in the constructor and
 * never change afterwards.
 */
export class Box implements Renderable {
  readonly center: Vec3;
  readonly side: number;
  readonly color: Vec3;
  /** Face planes, BOX_FACE_COUNT × PLANE_STRIDE floats. */
  private readonly planes: Float64Array;

  /** Scratch hit point reused across intersect calls. */
  private readonly _hit: Float64Array = new Float64Array(3);

  constructor(center: Vec3, side: number, color: Vec3) {
    assertFiniteVec3('Box', 'center', center);
    assertFiniteVec3('Box', 'color', color);
    if (!Number.isFinite(side) || side <= 0) {
      throw new InvalidConfigurationError(`Box: side must be a positive finite number, got ${side}`);
    }

    this.center = Object.freeze([center[0], center[1], center[2]] as const);
    this.side = side;
    this.color = Object.freeze([color[0], color[1], color[2]] as const);
    this.planes = new Float64Array(BOX_FACE_COUNT * PLANE_STRIDE);

    const half = side / 2;
    for (const [face, n] of BOX_FACE_NORMALS.entries()) {
      const point: Vec3 = [
        center[0] + half * n[0],
        center[1] + half * n[1],
        center[2] + half * n[2],
      ];
      writePlane(this.planes, face * PLANE_STRIDE, point, n, this.color);
    }
  }

  /**
   * Copy of the plane (PLANE_STRIDE layout) of face `face`, in
   * `BOX_FACE_NORMALS` order.
   *
   * @throws RangeError when `face` is not in [0, BOX_FACE_COUNT).
   */
  plane(face: number): Float64Array {
    if (!Number.isInteger(face) || face < 0 || face >= BOX_FACE_COUNT) {
      throw new RangeError(`Box.plane: face ${face} is out of range [0, ${BOX_FACE_COUNT})`);
    }
    const offset = face * PLANE_STRIDE;
    return this.planes.slice(offset, offset + PLANE_STRIDE);
  }

  /**
   * Intersect the ray at `rayBuf[rayOffset]` with every face and return the
   * nearest accepted face hit, or `null`.
   *
   * A face hit is accepted when the hit point lies within `side / 2` of the
   * face's reference corner `center + normal * side / 2` on every axis. Ties
   * keep the first face in storage order.
   */
  intersect(rayBuf: ArrayLike<number>, rayOffset: number): SurfaceHit | null {
    const half = this.side / 2;
    const hit = this._hit;
    let minT = Infinity;
    let normal: Vec3 | null = null;

    for (const [face, n] of BOX_FACE_NORMALS.entries()) {
      const t = planeIntersect(this.planes, face * PLANE_STRIDE, rayBuf, rayOffset, hit, 0);
      if (t < 0) continue;

      const rx = this.center[0] + n[0] * this.side / 2;
      const ry = this.center[1] + n[1] * this.side / 2;
      const rz = this.center[2] + n[2] * this.side / 2;
      const onFace =
        Math.abs((hit[0] ?? 0) - rx) <= half &&
        Math.abs((hit[1] ?? 0) - ry) <= half &&
        Math.abs((hit[2] ?? 0) - rz) <= half;

      if (onFace && t < minT) {
        minT = t;
        normal = n;
      }
    }

    return normal === null ? null : { t: minT, normal };
  }
}

