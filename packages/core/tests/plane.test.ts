import { describe, it, expect } from 'vitest';
import {
  createPlane,
  planeIntersect,
  PLANE_STRIDE,
  PLANE_NORMAL_OFFSET,
  PLANE_COLOR_OFFSET,
} from '../src/plane.js';

/** Plane at z = -5 facing +z. */
const zPlane = createPlane([0, 0, -5], [0, 0, 1], [1, 0, 0]);

describe('createPlane', () => {
  it('lays out point, normal and color', () => {
    const plane = createPlane([1, 2, 3], [0, 1, 0], [0.1, 0.2, 0.3]);
    expect(plane.length).toBe(PLANE_STRIDE);
    expect(Array.from(plane.subarray(0, 3))).toEqual([1, 2, 3]);
    expect(Array.from(plane.subarray(PLANE_NORMAL_OFFSET, PLANE_NORMAL_OFFSET + 3))).toEqual([0, 1, 0]);
    expect(Array.from(plane.subarray(PLANE_COLOR_OFFSET, PLANE_COLOR_OFFSET + 3))).toEqual([0.1, 0.2, 0.3]);
  });
});

describe('planeIntersect', () => {
  it('returns the distance to a plane straight ahead', () => {
    const ray = new Float64Array([0, 0, 0, 0, 0, -1]);
    expect(planeIntersect(zPlane, 0, ray, 0)).toBe(5);
  });

  it('writes the hit point when an output buffer is given', () => {
    const ray = new Float64Array([2, 1, 0, 0, 0, -1]);
    const hit = new Float64Array(4);
    const t = planeIntersect(zPlane, 0, ray, 0, hit, 1);
    expect(t).toBe(5);
    expect(Array.from(hit)).toEqual([0, 2, 1, -5]);
  });

  it('hits a plane whose normal faces away from the ray', () => {
    const backFacing = createPlane([0, 0, -5], [0, 0, -1], [1, 0, 0]);
    const ray = new Float64Array([0, 0, 0, 0, 0, -1]);
    expect(planeIntersect(backFacing, 0, ray, 0)).toBe(5);
  });

  it('returns -1 for a plane behind the origin', () => {
    const ray = new Float64Array([0, 0, -10, 0, 0, -1]);
    expect(planeIntersect(zPlane, 0, ray, 0)).toBe(-1);
  });

  it('accepts a hit at t = 0', () => {
    const ray = new Float64Array([0, 0, -5, 0, 0, -1]);
    expect(planeIntersect(zPlane, 0, ray, 0)).toBeCloseTo(0, 12);
  });

  it('returns -1 for a ray parallel to the plane', () => {
    const ray = new Float64Array([0, 0, 0, 1, 0, 0]);
    expect(planeIntersect(zPlane, 0, ray, 0)).toBe(-1);
  });

  it('returns -1 when |denom| is below the parallel threshold', () => {
    const ray = new Float64Array([0, 0, 0, 1, 0, -1e-7]);
    expect(planeIntersect(zPlane, 0, ray, 0)).toBe(-1);
  });

  it('hits when |denom| equals the parallel threshold', () => {
    const ray = new Float64Array([0, 0, 0, 1, 0, -1e-6]);
    expect(planeIntersect(zPlane, 0, ray, 0)).toBeCloseTo(5e6, 0);
  });

  it('leaves the hit buffer untouched on a miss', () => {
    const ray = new Float64Array([0, 0, 0, 0, 0, 1]);
    const hit = new Float64Array([7, 7, 7]);
    expect(planeIntersect(zPlane, 0, ray, 0, hit)).toBe(-1);
    expect(Array.from(hit)).toEqual([7, 7, 7]);
  });

  it('respects non-zero plane and ray offsets', () => {
    const planes = new Float64Array(PLANE_STRIDE * 2);
    planes.set(zPlane, PLANE_STRIDE);
    const rays = new Float64Array([0, 0, 0, 0, 0, 0, 0, 0, 3, 0, 0, -1]);
    expect(planeIntersect(planes, PLANE_STRIDE, rays, 6)).toBe(8);
  });
});
