import { describe, it, expect } from 'vitest';
import { renderWithStats, useRender, useRgbaPixels, useScene } from '../src/index.js';
import { AMBIENT_LIGHT, Box, ImageBuffer, createScene } from '@boxcast/core';
import type { SceneDescription } from '@boxcast/core';

// Minimal React hook test without a DOM: the hooks only memoise
// renderWithStats / createScene / toRGBA8, so those are exercised directly.
const description: SceneDescription = {
  boxes: [{ center: [0, 0, -5], side: 4, color: [0, 1, 0] }],
  light: { position: [0, 0, -100], intensity: 1 },
  camera: { position: [0, 0, 0], fov: 90 },
  width: 4,
  height: 4,
};

describe('hook exports', () => {
  it('are functions', () => {
    expect(typeof useScene).toBe('function');
    expect(typeof useRender).toBe('function');
    expect(typeof useRgbaPixels).toBe('function');
  });
});

describe('renderWithStats (useRender logic)', () => {
  it('returns the image together with its stats', () => {
    const handle = renderWithStats(createScene(description));
    expect(handle.image).toBeInstanceOf(ImageBuffer);
    expect(handle.stats).toEqual({ raysCast: 16, hits: 4 });
  });

  it('uses the default ambient term', () => {
    // The light is behind the box, so lit pixels show only the ambient term.
    const { image } = renderWithStats(createScene(description));
    expect(image.getPixel(1, 1)).toEqual([0, AMBIENT_LIGHT, 0]);
  });

  it('honours an ambient override', () => {
    const { image } = renderWithStats(createScene(description), { ambient: 0.5 });
    expect(image.getPixel(2, 2)).toEqual([0, 0.5, 0]);
  });
});

describe('createScene (useScene logic)', () => {
  it('builds boxes from the description', () => {
    const scene = createScene(description);
    expect(scene.objects[0]).toBeInstanceOf(Box);
    expect(scene.objects[0]?.side).toBe(4);
  });
});

describe('toRGBA8 (useRgbaPixels logic)', () => {
  it('converts the rendered image to RGBA8', () => {
    const { image } = renderWithStats(createScene(description), { ambient: 1 });
    const pixels = image.toRGBA8();
    const offset = (1 * 4 + 1) * 4;
    expect(Array.from(pixels.subarray(offset, offset + 4))).toEqual([0, 255, 0, 255]);
    expect(Array.from(pixels.subarray(0, 4))).toEqual([0, 0, 0, 255]);
  });
});
