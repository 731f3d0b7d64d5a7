import { assertFiniteVec3, InvalidConfigurationError } from './errors.js';
import { generateCameraRay } from './camera.js';
import { ImageBuffer, assertImageSize } from './image.js';
import { shade } from './light.js';
import { RAY_STRIDE, rayPointAt } from './ray.js';
import { resolveNearest } from './scene.js';
import type { Renderable, RenderInput } from './scene.js';

/** Constant illumination added to every lit surface. */
export const AMBIENT_LIGHT = 0.1;

/** Counters filled in while rendering. */
export interface RenderStats {
  /** Primary rays generated. */
  raysCast: number;
  /** Rays that struck a primitive. */
  hits: number;
}

export function createRenderStats(): RenderStats {
  return { raysCast: 0, hits: 0 };
}

export interface RenderOptions {
  /** Ambient term added to the Lambertian intensity. Default: AMBIENT_LIGHT */
  ambient?: number;
  /** When given, incremented as rays are cast and hit. */
  stats?: RenderStats;
}

/**
 * Validate image size, camera and light before any pixel is written.
 *
 * @throws InvalidConfigurationError
 */
export function validateRenderInput(input: RenderInput): void {
  assertImageSize('render', input.width, input.height);
  const { fov, position } = input.camera;
  if (!(fov > 0 && fov < 180)) {
    throw new InvalidConfigurationError(`render: fov must be within (0, 180) degrees, got ${fov}`);
  }
  assertFiniteVec3('render', 'camera.position', position);
  assertFiniteVec3('render', 'light.position', input.light.position);
  if (!Number.isFinite(input.light.intensity) || input.light.intensity < 0) {
    throw new InvalidConfigurationError(
      `render: light.intensity must be a non-negative finite number, got ${input.light.intensity}`,
    );
  }
}

/** @throws InvalidConfigurationError when `ambient` is negative or not finite. */
export function assertAmbient(owner: string, ambient: number): void {
  if (!Number.isFinite(ambient) || ambient < 0) {
    throw new InvalidConfigurationError(`${owner}: ambient must be a non-negative finite number, got ${ambient}`);
  }
}

function clamp01(v: number): number {
  return Math.min(Math.max(v, 0), 1);
}

/**
 * Render rows [`startRow`, `endRow`) of the scene into `image`.
 *
 * Each pixel depends only on the scene and its own coordinates, so disjoint
 * row ranges may be rendered independently (e.g. by several workers sharing
 * one image buffer).
 */
export function renderRows<T extends Renderable>(
  input: RenderInput<T>,
  image: ImageBuffer,
  startRow: number,
  endRow: number,
  options: RenderOptions = {},
): void {
  validateRenderInput(input);
  const { objects, light, camera, width, height } = input;
  if (image.width !== width || image.height !== height) {
    throw new InvalidConfigurationError(
      `renderRows: image is ${image.width}x${image.height}, scene expects ${width}x${height}`,
    );
  }
  if (!Number.isInteger(startRow) || !Number.isInteger(endRow) || startRow < 0 || endRow > height || startRow > endRow) {
    throw new InvalidConfigurationError(`renderRows: invalid row range [${startRow}, ${endRow}) for height ${height}`);
  }

  const { ambient = AMBIENT_LIGHT, stats } = options;
  assertAmbient('renderRows', ambient);
  const ray = new Float64Array(RAY_STRIDE);
  const hitPoint = new Float64Array(3);

  for (let y = startRow; y < endRow; y++) {
    for (let x = 0; x < width; x++) {
      generateCameraRay(ray, 0, camera.position, x, y, width, height, camera.fov);
      if (stats) stats.raysCast += 1;

      const hit = resolveNearest(objects, ray, 0);
      if (hit === null) {
        image.setPixel(x, y, 0, 0, 0);
        continue;
      }
      if (stats) stats.hits += 1;

      rayPointAt(hitPoint, 0, ray, 0, hit.t);
      const intensity = shade(hitPoint, 0, hit.normal, 0, light, ambient);
      const color = hit.object.color;
      image.setPixel(
        x,
        y,
        clamp01(color[0] * intensity),
        clamp01(color[1] * intensity),
        clamp01(color[2] * intensity),
      );
    }
  }
}

/**
 * Render the whole image: one primary ray per pixel, nearest hit, Lambertian
 * plus ambient shading, channels clamped to [0, 1]. Pixels that hit nothing
 * are black. Deterministic for a given input.
 */
export function render<T extends Renderable>(input: RenderInput<T>, options: RenderOptions = {}): ImageBuffer {
  validateRenderInput(input);
  const image = new ImageBuffer(input.width, input.height);
  renderRows(input, image, 0, input.height, options);
  return image;
}

/** A contiguous range of image rows, `endRow` exclusive. */
export interface RowBand {
  startRow: number;
  endRow: number;
}

/**
 * Split `height` rows into at most `bands` contiguous, non-empty bands that
 * together cover every row exactly once. Earlier bands take the remainder
 * rows.
 */
export function partitionRows(height: number, bands: number): RowBand[] {
  if (!Number.isInteger(height) || height <= 0) {
    throw new InvalidConfigurationError(`partitionRows: height must be a positive integer, got ${height}`);
  }
  if (!Number.isInteger(bands) || bands <= 0) {
    throw new InvalidConfigurationError(`partitionRows: bands must be a positive integer, got ${bands}`);
  }
  const count = Math.min(bands, height);
  const base = Math.floor(height / count);
  const extra = height % count;
  const result: RowBand[] = [];
  let startRow = 0;
  for (let i = 0; i < count; i++) {
    const endRow = startRow + base + (i < extra ? 1 : 0);
    result.push({ startRow, endRow });
    startRow = endRow;
  }
  return result;
}
