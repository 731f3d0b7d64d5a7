import { InvalidConfigurationError } from './errors.js';
import type { Vec3 } from './flat-math.js';

/** Channels per pixel: R, G, B. */
export const PIXEL_CHANNELS = 3;

/** Throw unless `width` and `height` are positive integers. */
export function assertImageSize(owner: string, width: number, height: number): void {
  if (!Number.isInteger(width) || width <= 0) {
    throw new InvalidConfigurationError(`${owner}: width must be a positive integer, got ${width}`);
  }
  if (!Number.isInteger(height) || height <= 0) {
    throw new InvalidConfigurationError(`${owner}: height must be a positive integer, got ${height}`);
  }
}

/**
 * A height × width × 3 image of reals in [0, 1].
 * Layout: row-major, row 0 at the top, [r, g, b] per pixel.
 *
 * When a `SharedArrayBuffer` is provided, several workers can write disjoint
 * row ranges of the same image with no copying.
 */
export class ImageBuffer {
  readonly width: number;
  readonly height: number;
  readonly data: Float64Array;

  constructor(width: number, height: number, sharedBuffer?: SharedArrayBuffer) {
    assertImageSize('ImageBuffer', width, height);
    this.width = width;
    this.height = height;
    const length = width * height * PIXEL_CHANNELS;
    if (sharedBuffer !== undefined && sharedBuffer.byteLength < length * Float64Array.BYTES_PER_ELEMENT) {
      throw new InvalidConfigurationError(
        `ImageBuffer: shared buffer holds ${sharedBuffer.byteLength} bytes, ${width}x${height} needs ${length * Float64Array.BYTES_PER_ELEMENT}`,
      );
    }
    this.data = sharedBuffer
      ? new Float64Array(sharedBuffer, 0, length)
      : new Float64Array(length);
  }

  /**
   * Create an ImageBuffer backed by a new `SharedArrayBuffer`.
   * Both are returned so the buffer can be posted to workers.
   */
  static createShared(width: number, height: number): { image: ImageBuffer; sab: SharedArrayBuffer } {
    assertImageSize('ImageBuffer.createShared', width, height);
    const sab = new SharedArrayBuffer(width * height * PIXEL_CHANNELS * Float64Array.BYTES_PER_ELEMENT);
    return { image: new ImageBuffer(width, height, sab), sab };
  }

  /** Flat offset of pixel (`x`, `y`). */
  offsetOf(x: number, y: number): number {
    return (y * this.width + x) * PIXEL_CHANNELS;
  }

  /** Read one channel of pixel (`x`, `y`). */
  get(x: number, y: number, channel: number): number {
    return this.data[this.offsetOf(x, y) + channel] ?? 0;
  }

  getPixel(x: number, y: number): Vec3 {
    const o = this.offsetOf(x, y);
    return [this.data[o] ?? 0, this.data[o + 1] ?? 0, this.data[o + 2] ?? 0];
  }

  setPixel(x: number, y: number, r: number, g: number, b: number): void {
    const o = this.offsetOf(x, y);
    this.data[o] = r;
    this.data[o + 1] = g;
    this.data[o + 2] = b;
  }

  /**
   * Convert to 8-bit RGBA (alpha 255), the layout of a canvas `ImageData`.
   * Channels are scaled by 255 and rounded.
   */
  toRGBA8(out: Uint8ClampedArray = new Uint8ClampedArray(this.width * this.height * 4)): Uint8ClampedArray {
    const pixels = this.width * this.height;
    for (let p = 0; p < pixels; p++) {
      const src = p * PIXEL_CHANNELS;
      const dst = p * 4;
      out[dst] = Math.round((this.data[src] ?? 0) * 255);
      out[dst + 1] = Math.round((this.data[src + 1] ?? 0) * 255);
      out[dst + 2] = Math.round((this.data[src + 2] ?? 0) * 255);
      out[dst + 3] = 255;
    }
    return out;
  }
}
