export {
  boxFromMesh,
  materialColor,
  lightFromPointLight,
  cameraFromPerspective,
  imageToDataTexture,
  rayToFlatArray,
  rayBoxIntersect,
  CUBE_TOLERANCE,
} from './convert.js';
export { SceneSynchronizer } from './synchronizer.js';
