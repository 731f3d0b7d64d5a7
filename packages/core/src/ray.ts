import { vec3AddScaled, vec3Normalize } from './flat-math.js';

/**
 * Ray stored as origin + direction (unit vector).
 * Layout: [ox, oy, oz, dx, dy, dz]
 */
export const RAY_STRIDE = 6;

/** Offset of the direction within a ray slot. */
export const RAY_DIRECTION_OFFSET = 3;

/** A pool-backed, zero-GC Ray store.
 *
 * When a `SharedArrayBuffer` is provided, the pool's data is accessible from
 * multiple threads (e.g. a Web Worker) with no copying.
 */
export class RayPool {
  /** Flat ray data, RAY_STRIDE floats per slot. */
  readonly buffer: Float64Array;
  readonly capacity: number;
  private count: number = 0;

  constructor(capacity: number, sharedBuffer?: SharedArrayBuffer) {
    this.capacity = capacity;
    this.buffer = sharedBuffer
      ? new Float64Array(sharedBuffer, 0, capacity * RAY_STRIDE)
      : new Float64Array(capacity * RAY_STRIDE);
  }

  /**
   * Create a RayPool backed by a new `SharedArrayBuffer`.
   * Both the pool and the underlying `SharedArrayBuffer` are returned so the
   * caller can transfer the buffer to a `Worker` via `postMessage`.
   */
  static createShared(capacity: number): { pool: RayPool; sab: SharedArrayBuffer } {
    const sab = new SharedArrayBuffer(capacity * RAY_STRIDE * Float64Array.BYTES_PER_ELEMENT);
    return { pool: new RayPool(capacity, sab), sab };
  }

  /**
   * Allocate a new Ray slot and return its index.
   *
   * @throws RangeError when the pool is full.
   */
  allocate(): number {
    if (this.count >= this.capacity) {
      throw new RangeError(`RayPool.allocate: pool is full (capacity ${this.capacity})`);
    }
    const index = this.count;
    this.count += 1;
    return index;
  }

  /**
   * Set origin and direction of a ray at the given index. The direction is
   * normalized before it is stored.
   *
   * @throws InvalidRayError when the direction has zero length.
   */
  set(
    index: number,
    ox: number,
    oy: number,
    oz: number,
    dx: number,
    dy: number,
    dz: number,
  ): void {
    const offset = index * RAY_STRIDE;
    this.buffer[offset] = ox;
    this.buffer[offset + 1] = oy;
    this.buffer[offset + 2] = oz;
    this.buffer[offset + 3] = dx;
    this.buffer[offset + 4] = dy;
    this.buffer[offset + 5] = dz;
    vec3Normalize(this.buffer, offset + RAY_DIRECTION_OFFSET, this.buffer, offset + RAY_DIRECTION_OFFSET);
  }

  /** Read a single component value from the buffer. */
  get(index: number, component: number): number {
    return this.buffer[index * RAY_STRIDE + component] ?? 0;
  }

  /** Flat offset of the ray at `index`, for use with the intersection functions. */
  offsetOf(index: number): number {
    return index * RAY_STRIDE;
  }

  /** Returns the number of allocated Rays. */
  get size(): number {
    return this.count;
  }

  /** Reset the pool (all allocations freed, no GC). */
  reset(): void {
    this.count = 0;
  }
}

/**
 * Write the point at parametric distance `t` along the ray at
 * `rayBuf[rayOffset]` into `out` at `outOffset`: `origin + direction * t`.
 */
export function rayPointAt(
  out: Float64Array,
  outOffset: number,
  rayBuf: ArrayLike<number>,
  rayOffset: number,
  t: number,
): void {
  vec3AddScaled(out, outOffset, rayBuf, rayOffset, rayBuf, rayOffset + RAY_DIRECTION_OFFSET, t);
}
