import type { Mesh } from 'three';
import type { Box, Vec3 } from '@boxcast/core';
import { boxFromMesh } from './convert.js';

/**
 * Keeps a list of core Boxes in step with a set of Three.js meshes.
 *
 * Boxes are immutable, so `sync()` rebuilds every box from its mesh's current
 * world-space bounds. Call it whenever meshes may have moved, then pass
 * `objects` to the renderer. Boxes keep the order in which meshes were added.
 */
export class SceneSynchronizer {
  private readonly meshes: Map<Mesh, Vec3 | undefined> = new Map();
  private _objects: Box[] = [];
  private _disposed: boolean = false;

  /** Start tracking `mesh`. `color` overrides the material color. */
  add(mesh: Mesh, color?: Vec3): void {
    if (this._disposed) return;
    this.meshes.set(mesh, color);
  }

  /** Stop tracking `mesh`. Returns false if it was not tracked. */
  remove(mesh: Mesh): boolean {
    return this.meshes.delete(mesh);
  }

  /** Number of tracked meshes. */
  get size(): number {
    return this.meshes.size;
  }

  /** Boxes built by the last `sync()`. */
  get objects(): readonly Box[] {
    return this._objects;
  }

  /**
   * Rebuild every box from its mesh's current world-space bounds.
   *
   * @throws InvalidConfigurationError when a tracked mesh is not a cube.
   */
  sync(): readonly Box[] {
    if (this._disposed) return this._objects;
    const next: Box[] = [];
    for (const [mesh, color] of this.meshes) {
      next.push(boxFromMesh(mesh, color));
    }
    this._objects = next;
    return next;
  }

  /**
   * Forget all meshes and boxes. After calling this, `add()` and `sync()`
   * are no-ops.
   */
  dispose(): void {
    if (this._disposed) return;
    this._disposed = true;
    this.meshes.clear();
    this._objects = [];
  }
}
