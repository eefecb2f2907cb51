import { Matrix3, Vector2 } from 'three';
import { CameraMatrix, DistortionCoefficients, DistortionMapParams, IDENTITY_OUTPUT_TRANSFORM, OutputTransform, Size } from './types';

// OpenCV-style calibration result, pixel units.
export interface CalibrationData {
  calibration_matrix: Matrix3;
  new_camera_matrix: Matrix3;
  // [k1, k2, p1, p2, k3], trailing terms optional
  distortion_coefficients: number[];
}

/**
 * Convert pixel intrinsics to viewport UV intrinsics. Texel (i, j) sits at
 * UV (i / W, j / H), which lines up with OpenCV's integer pixel centers.
 */
export function cameraMatrixFromIntrinsics(K: Matrix3, { width, height }: Size): CameraMatrix {
  return {
    fx: K.elements[0] / width,
    fy: K.elements[4] / height,
    cx: K.elements[6] / width,
    cy: K.elements[7] / height,
  };
}

export function coefficientsFromOpenCv(d: number[]): DistortionCoefficients {
  return {
    radial: [d[0] ?? 0, d[1] ?? 0, d[4] ?? 0],
    tangential: [d[2] ?? 0, d[3] ?? 0],
  };
}

/**
 * Build generation parameters for an image of `size` pixels from a camera
 * calibration. The raw sensor intrinsics are the distorted camera and the
 * new camera matrix is the undistorted one.
 */
export function paramsFromCalibration(
  calibration: CalibrationData,
  size: Size,
  output: OutputTransform = IDENTITY_OUTPUT_TRANSFORM
): DistortionMapParams {
  return {
    pixelUVSize: new Vector2(1 / size.width, 1 / size.height),
    coefficients: coefficientsFromOpenCv(calibration.distortion_coefficients),
    distortedCameraMatrix: cameraMatrixFromIntrinsics(calibration.calibration_matrix, size),
    undistortedCameraMatrix: cameraMatrixFromIntrinsics(calibration.new_camera_matrix, size),
    output: { ...output },
  };
}
