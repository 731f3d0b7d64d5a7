import { vec3Normalize } from './flat-math.js';
import type { Vec3 } from './flat-math.js';
import { RayPool, RAY_DIRECTION_OFFSET } from './ray.js';

/**
 * Pinhole camera looking down the −z axis.
 * `fov` is the vertical field of view in degrees, 0 < fov < 180.
 */
export interface Camera {
  position: Vec3;
  fov: number;
}

/**
 * Write the primary ray for pixel (`x`, `y`) into `out` at `outOffset`
 * (RAY_STRIDE layout). The origin is the camera position; the direction goes
 * through the pixel center on the image plane at z = −1, with y flipped so
 * that row 0 is the top of the image.
 */
export function generateCameraRay(
  out: Float64Array,
  outOffset: number,
  cameraPosition: Vec3,
  x: number,
  y: number,
  width: number,
  height: number,
  fovDegrees: number,
): void {
  const aspect = width / height;
  const scale = Math.tan(fovDegrees * 0.5 * Math.PI / 180);
  const px = (2 * (x + 0.5) / width - 1) * aspect * scale;
  const py = (1 - 2 * (y + 0.5) / height) * scale;

  out[outOffset] = cameraPosition[0];
  out[outOffset + 1] = cameraPosition[1];
  out[outOffset + 2] = cameraPosition[2];
  const d = outOffset + RAY_DIRECTION_OFFSET;
  out[d] = px;
  out[d + 1] = py;
  out[d + 2] = -1;
  vec3Normalize(out, d, out, d);
}

/**
 * Generate every primary ray of a `width` × `height` image into a new
 * RayPool. Ray `y * width + x` belongs to pixel (`x`, `y`).
 */
export function generateCameraRays(camera: Camera, width: number, height: number): RayPool {
  const pool = new RayPool(width * height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const index = pool.allocate();
      generateCameraRay(pool.buffer, pool.offsetOf(index), camera.position, x, y, width, height, camera.fov);
    }
  }
  return pool;
}
