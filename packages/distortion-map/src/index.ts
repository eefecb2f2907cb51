export { paramsFromCalibration, cameraMatrixFromIntrinsics, coefficientsFromOpenCv, type CalibrationData } from './calibration';
export { solveDistortedViewportUV, undistortViewportUV, viewportUVToView, viewToViewportUV } from './camera';
export {
  DistortionMapConfigSchema,
  parseDistortionMapConfig,
  parseDistortionMapConfigYaml,
  type DistortionMapConfig,
  type ResolvedDistortionMapConfig,
} from './config';
export { countUncovered, createDisplacementMap, emitDisplacement, generateDisplacementMap, type GenerateOptions } from './displacement';
export { decodeTexel, lookupDisplacement, measureApproximationError, type ApproximationError, type DecodedTexel } from './displacement-map';
export { distort, isIdentityDistortion, NO_DISTORTION } from './distortion';
export { buildGridMesh, computeGridVertex, gridVertexCount, type GridMesh, type GridVertex } from './grid';
export { SoftwareRasterizer, type FragmentFn } from './rasterizer';
export {
  DEFAULT_GRID_SUBDIVISION,
  IDENTITY_CAMERA_MATRIX,
  IDENTITY_OUTPUT_TRANSFORM,
  type CameraMatrix,
  type DisplacementMap,
  type DistortionCoefficients,
  type DistortionMapParams,
  type GridSubdivision,
  type OutputTransform,
  type Size,
} from './types';
