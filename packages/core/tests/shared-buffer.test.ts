import { describe, it, expect } from 'vitest';
import { RayPool, RAY_STRIDE } from '../src/ray.js';
import { ImageBuffer, PIXEL_CHANNELS } from '../src/image.js';

describe('SharedArrayBuffer factories', () => {
  describe('RayPool.createShared', () => {
    it('returns a pool and a SharedArrayBuffer of the correct byte length', () => {
      const capacity = 16;
      const { pool, sab } = RayPool.createShared(capacity);

      expect(sab).toBeInstanceOf(SharedArrayBuffer);
      expect(sab.byteLength).toBe(capacity * RAY_STRIDE * Float64Array.BYTES_PER_ELEMENT);
      expect(pool).toBeInstanceOf(RayPool);
    });

    it('data written to the pool is visible via a second view of the same SAB', () => {
      const { pool, sab } = RayPool.createShared(2);
      const idx = pool.allocate();
      pool.set(idx, 1, 2, 3, 0, 2, 0);

      const view = new Float64Array(sab);
      expect(view[0]).toBe(1);
      expect(view[1]).toBe(2);
      expect(view[2]).toBe(3);
      expect(view[4]).toBe(1);
    });
  });

  describe('ImageBuffer.createShared', () => {
    it('returns an image and a SharedArrayBuffer of the correct byte length', () => {
      const { image, sab } = ImageBuffer.createShared(4, 3);
      expect(sab.byteLength).toBe(4 * 3 * PIXEL_CHANNELS * Float64Array.BYTES_PER_ELEMENT);
      expect(image.width).toBe(4);
      expect(image.height).toBe(3);
    });

    it('a second ImageBuffer constructed from the same SAB shares pixels', () => {
      const { image: a, sab } = ImageBuffer.createShared(2, 2);
      const b = new ImageBuffer(2, 2, sab);

      a.setPixel(1, 1, 0.25, 0.5, 0.75);
      expect(b.getPixel(1, 1)).toEqual([0.25, 0.5, 0.75]);
    });

    it('rejects a shared buffer that is too small', () => {
      const sab = new SharedArrayBuffer(8);
      expect(() => new ImageBuffer(2, 2, sab)).toThrow(RangeError);
    });
  });
});
