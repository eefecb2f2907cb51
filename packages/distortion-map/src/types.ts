import { Vector2 } from 'three';

export type ITuple2 = [number, number];
export type ITuple3 = [number, number, number];
export type ITuple4 = [number, number, number, number];

// Brown–Conrady coefficients, radial [k1, k2, k3] + tangential [p1, p2].
export interface DistortionCoefficients {
  radial: ITuple3;
  tangential: ITuple2;
}

// Affine intrinsics between the z=1 view plane and viewport UV.
export interface CameraMatrix {
  fx: number;
  fy: number;
  cx: number;
  cy: number;
}

export interface OutputTransform {
  multiply: number;
  add: number;
}

export interface GridSubdivision {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

/**
 * Everything a generation pass reads. Treated as read-only for the duration
 * of a pass.
 */
export interface DistortionMapParams {
  pixelUVSize: Vector2;
  coefficients: DistortionCoefficients;
  undistortedCameraMatrix: CameraMatrix;
  distortedCameraMatrix: CameraMatrix;
  output: OutputTransform;
}

export interface DisplacementMap {
  width: number;
  height: number;
  // RGBA, row-major, top row first.
  data: Float32Array;
  // 1 where a grid triangle covered the texel center.
  coverage: Uint8Array;
}

export const IDENTITY_CAMERA_MATRIX: Readonly<CameraMatrix> = { fx: 1, fy: 1, cx: 0, cy: 0 };
export const IDENTITY_OUTPUT_TRANSFORM: Readonly<OutputTransform> = { multiply: 1, add: 0 };
export const DEFAULT_GRID_SUBDIVISION: Readonly<GridSubdivision> = { x: 32, y: 32 };
