import { Box3, Color, DataTexture, FloatType, RGBAFormat, Vector3 } from 'three';
import type { Mesh, PerspectiveCamera, PointLight as ThreePointLight, Ray } from 'three';
import {
  Box,
  createPointLight,
  InvalidConfigurationError,
  RAY_STRIDE,
} from '@boxcast/core';
import type { Camera, ImageBuffer, PointLight, SurfaceHit, Vec3 } from '@boxcast/core';

/** Extents of a mesh's bounds may differ by this much and still count as a cube. */
export const CUBE_TOLERANCE = 1e-6;

const WHITE: Vec3 = [1, 1, 1];

// Scratch objects reused across calls to stay allocation-free.
const _box = new Box3();
const _center = new Vector3();
const _size = new Vector3();
const _position = new Vector3();

/** Linear RGB of the mesh material's `color`, or white when it has none. */
export function materialColor(mesh: Mesh): Vec3 {
  const material = Array.isArray(mesh.material) ? mesh.material[0] : mesh.material;
  if (material !== undefined && 'color' in material && material.color instanceof Color) {
    return [material.color.r, material.color.g, material.color.b];
  }
  return WHITE;
}

/**
 * Convert a mesh into a core Box using its world-space bounding box.
 *
 * @param color Overrides the material color.
 * @throws InvalidConfigurationError when the bounds are not a cube.
 */
export function boxFromMesh(mesh: Mesh, color: Vec3 = materialColor(mesh)): Box {
  // setFromObject only refreshes the mesh itself, not its ancestors.
  mesh.updateWorldMatrix(true, false);
  _box.setFromObject(mesh);
  _box.getCenter(_center);
  _box.getSize(_size);
  if (
    Math.abs(_size.x - _size.y) > CUBE_TOLERANCE ||
    Math.abs(_size.x - _size.z) > CUBE_TOLERANCE
  ) {
    throw new InvalidConfigurationError(
      `boxFromMesh: "${mesh.name}" is ${_size.x}x${_size.y}x${_size.z}; only cubes are supported`,
    );
  }
  return new Box([_center.x, _center.y, _center.z], _size.x, color);
}

/** Convert a Three.js PointLight (world position + intensity) into a core light. */
export function lightFromPointLight(light: ThreePointLight): PointLight {
  light.getWorldPosition(_position);
  return createPointLight([_position.x, _position.y, _position.z], light.intensity);
}

/**
 * Convert a PerspectiveCamera into a core camera. Only the world position and
 * the vertical `fov` carry over; the core camera always looks down −z.
 */
export function cameraFromPerspective(camera: PerspectiveCamera): Camera {
  camera.getWorldPosition(_position);
  return { position: [_position.x, _position.y, _position.z], fov: camera.fov };
}

/**
 * Copy a rendered image into an RGBA float `DataTexture` for display.
 * Rows are flipped so that image row 0 (the top) lands on the texture's top
 * row, since texture rows start at the bottom.
 */
export function imageToDataTexture(image: ImageBuffer): DataTexture {
  const { width, height } = image;
  const data = new Float32Array(width * height * 4);
  for (let y = 0; y < height; y++) {
    const row = (height - 1 - y) * width;
    for (let x = 0; x < width; x++) {
      const dst = (row + x) * 4;
      data[dst] = image.get(x, y, 0);
      data[dst + 1] = image.get(x, y, 1);
      data[dst + 2] = image.get(x, y, 2);
      data[dst + 3] = 1;
    }
  }
  const texture = new DataTexture(data, width, height, RGBAFormat, FloatType);
  texture.needsUpdate = true;
  return texture;
}

/**
 * Fill a pre-allocated (or newly created) Float64Array with the ray data in
 * the flat format `[ox, oy, oz, dx, dy, dz]` expected by the core.
 *
 * @param ray The Three.js Ray to convert. Its direction must be normalized.
 * @param buf Optional pre-allocated buffer of length RAY_STRIDE (6).
 * @returns The filled buffer (same reference as `buf` when provided).
 */
export function rayToFlatArray(ray: Ray, buf: Float64Array = new Float64Array(RAY_STRIDE)): Float64Array {
  buf[0] = ray.origin.x;
  buf[1] = ray.origin.y;
  buf[2] = ray.origin.z;
  buf[3] = ray.direction.x;
  buf[4] = ray.direction.y;
  buf[5] = ray.direction.z;
  return buf;
}

const _rayBuf = new Float64Array(RAY_STRIDE);

/** Intersect a Three.js Ray with a core Box, e.g. for picking. */
export function rayBoxIntersect(ray: Ray, box: Box): SurfaceHit | null {
  return box.intersect(rayToFlatArray(ray, _rayBuf), 0);
}
