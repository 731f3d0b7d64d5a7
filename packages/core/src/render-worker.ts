/**
 * Render Web Worker
 *
 * Renders row bands of an image off the main thread.
 *
 * Protocol
 * --------
 * 1. Main thread sends one `RenderInitMessage` carrying the plain-data scene
 *    description and the `SharedArrayBuffer` backing the image.  The worker
 *    builds its boxes and light once and replies with `{ type: 'ready' }`.
 *
 * 2. For each band the main thread sends a `RenderBandMessage` with the row
 *    range.  The worker renders those rows straight into the shared image and
 *    replies with `{ type: 'done', ... }`.
 *
 * Several workers may share one image: each pixel is written by exactly one
 * band, so the bands produced by `partitionRows` (renderer.ts) never alias and need no locking.
 *
 * SharedArrayBuffer layout
 * ------------------------
 * imageSab : Float64Array – height × width × PIXEL_CHANNELS (3) floats,
 *            row-major, row 0 at the top
 */

import { InvalidConfigurationError } from './errors.js';
import { ImageBuffer } from './image.js';
import { assertAmbient, renderRows, createRenderStats } from './renderer.js';
import type { RowBand } from './renderer.js';
import { createScene } from './scene.js';
import type { Box } from './box.js';
import type { RenderInput, SceneDescription } from './scene.js';

// ── Public message types ──────────────────────────────────────────────────────

/** Sent once from the main thread to set up the scene and shared image. */
export interface RenderInitMessage {
  type: 'init';
  scene: SceneDescription;
  /** SharedArrayBuffer for the image (height × width × 3 floats). Written by the worker. */
  imageSab: SharedArrayBuffer;
  /** Ambient term. Default: AMBIENT_LIGHT */
  ambient?: number;
}

/** Sent to render rows [`startRow`, `endRow`). */
export interface RenderBandMessage extends RowBand {
  type: 'band';
}

export type RenderWorkerInMessage = RenderInitMessage | RenderBandMessage;

/** Posted by the worker after initialisation succeeds. */
export interface RenderReadyMessage {
  type: 'ready';
}

/** Posted by the worker after a band finishes. */
export interface RenderDoneMessage extends RowBand {
  type: 'done';
  /** Primary rays cast for this band. */
  raysCast: number;
  /** Rays in this band that struck a box. */
  hits: number;
}

export type RenderWorkerOutMessage = RenderReadyMessage | RenderDoneMessage;

// ── Processor (pure logic, no worker-global bindings) ────────────────────────

/**
 * Stateful band renderer.
 *
 * Exported for direct use in tests and advanced integrations.  The bottom of
 * this module wires it to the Web Worker global scope automatically when the
 * script runs inside a worker.
 */
export function createRenderProcessor(): {
  init(msg: RenderInitMessage): RenderReadyMessage;
  renderBand(msg: RenderBandMessage): RenderDoneMessage;
} {
  let input: RenderInput<Box> | null = null;
  let image: ImageBuffer | null = null;
  let ambient: number | undefined;

  return {
    /** Build the scene and wrap the shared image. */
    init(msg: RenderInitMessage): RenderReadyMessage {
      if (msg.ambient !== undefined) assertAmbient('RenderProcessor.init', msg.ambient);
      const scene = createScene(msg.scene);
      image = new ImageBuffer(scene.width, scene.height, msg.imageSab);
      input = scene;
      ambient = msg.ambient;
      return { type: 'ready' };
    },

    /** Render one row band into the shared image. */
    renderBand(msg: RenderBandMessage): RenderDoneMessage {
      if (input === null || image === null) {
        throw new InvalidConfigurationError('RenderProcessor: renderBand called before init');
      }
      const stats = createRenderStats();
      renderRows(input, image, msg.startRow, msg.endRow, { ambient, stats });
      return {
        type: 'done',
        startRow: msg.startRow,
        endRow: msg.endRow,
        raysCast: stats.raysCast,
        hits: stats.hits,
      };
    },
  };
}

// ── Web Worker binding ────────────────────────────────────────────────────────
// Automatically wire the processor to the worker's global message handler when
// this script is loaded inside a Web Worker context.

type WorkerGlobalSelf = {
  onmessage: ((event: { data: RenderWorkerInMessage }) => void) | null;
  postMessage(data: RenderWorkerOutMessage): void;
};

// `postMessage` is available on the worker global but not in a regular Node.js
// module context, so check for it before binding.
const globalScope = globalThis as Record<string, unknown>;
if (typeof globalScope['postMessage'] === 'function' && typeof globalScope['onmessage'] !== 'undefined') {
  const workerSelf = globalThis as unknown as WorkerGlobalSelf;
  const processor = createRenderProcessor();

  workerSelf.onmessage = (event) => {
    const msg = event.data;
    if (msg.type === 'init') {
      workerSelf.postMessage(processor.init(msg));
    } else if (msg.type === 'band') {
      workerSelf.postMessage(processor.renderBand(msg));
    }
  };
}
