import { useMemo } from 'react';
import { AMBIENT_LIGHT, createRenderStats, createScene, render } from '@boxcast/core';
import type {
  Box,
  ImageBuffer,
  RenderInput,
  RenderStats,
  SceneDescription,
} from '@boxcast/core';

export interface RenderHookOptions {
  /** Ambient term added to every lit surface. Default: AMBIENT_LIGHT */
  ambient?: number;
}

export interface RenderHandle {
  image: ImageBuffer;
  /** Rays cast and hits counted while producing `image`. */
  stats: RenderStats;
}

/**
 * Render `input` and collect its stats. This is the work `useRender` memoises;
 * it is exported so viewers without React can share it.
 */
export function renderWithStats(input: RenderInput, options: RenderHookOptions = {}): RenderHandle {
  const { ambient = AMBIENT_LIGHT } = options;
  const stats = createRenderStats();
  const image = render(input, { ambient, stats });
  return { image, stats };
}

/**
 * React hook that builds the scene (boxes and light) from a plain
 * description. The result is stable for as long as `description` is the
 * same object.
 */
export function useScene(description: SceneDescription): RenderInput<Box> {
  return useMemo(() => createScene(description), [description]);
}

/**
 * React hook that renders the scene and keeps the image across renders.
 * The render re-runs only when `input` (by identity) or the ambient term
 * changes, so memoise the input (e.g. with `useScene`).
 */
export function useRender(input: RenderInput, options: RenderHookOptions = {}): RenderHandle {
  const { ambient = AMBIENT_LIGHT } = options;
  return useMemo(() => renderWithStats(input, { ambient }), [input, ambient]);
}

/**
 * React hook returning the image as 8-bit RGBA, ready for
 * `new ImageData(pixels, image.width, image.height)` and `putImageData`.
 */
export function useRgbaPixels(image: ImageBuffer): Uint8ClampedArray {
  return useMemo(() => image.toRGBA8(), [image]);
}
