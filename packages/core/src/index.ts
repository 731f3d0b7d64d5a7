export { InvalidRayError, InvalidConfigurationError } from './errors.js';
export {
  vec3Dot,
  vec3Add,
  vec3Sub,
  vec3Scale,
  vec3AddScaled,
  vec3Length,
  vec3Normalize,
  DEGENERATE_LENGTH,
} from './flat-math.js';
export type { Vec3 } from './flat-math.js';
export { RayPool, rayPointAt, RAY_STRIDE, RAY_DIRECTION_OFFSET } from './ray.js';
export {
  createPlane,
  writePlane,
  planeIntersect,
  PLANE_STRIDE,
  PLANE_NORMAL_OFFSET,
  PLANE_COLOR_OFFSET,
  PARALLEL_EPSILON,
} from './plane.js';
export { Box, BOX_FACE_NORMALS, BOX_FACE_COUNT } from './box.js';
export { createPointLight, lambert, shade } from './light.js';
export type { PointLight } from './light.js';
export { generateCameraRay, generateCameraRays } from './camera.js';
export type { Camera } from './camera.js';
export { resolveNearest, createScene } from './scene.js';
export type {
  SurfaceHit,
  Intersectable,
  Renderable,
  SceneHit,
  BoxDescription,
  SceneDescription,
  RenderInput,
} from './scene.js';
export { ImageBuffer, PIXEL_CHANNELS } from './image.js';
export {
  render,
  renderRows,
  validateRenderInput,
  createRenderStats,
  partitionRows,
  AMBIENT_LIGHT,
} from './renderer.js';
export type { RenderOptions, RenderStats, RowBand } from './renderer.js';
