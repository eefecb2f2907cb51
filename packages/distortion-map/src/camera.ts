import { Vector2 } from 'three';
import { distort } from './distortion';
import { CameraMatrix, DistortionCoefficients, DistortionMapParams } from './types';

export function viewportUVToView(uv: Vector2, { fx, fy, cx, cy }: CameraMatrix): Vector2 {
  return new Vector2((uv.x - cx) / fx, (uv.y - cy) / fy);
}

export function viewToViewportUV(view: Vector2, { fx, fy, cx, cy }: CameraMatrix): Vector2 {
  return new Vector2(view.x * fx + cx, view.y * fy + cy);
}

type CameraPair = Pick<DistortionMapParams, 'coefficients' | 'distortedCameraMatrix' | 'undistortedCameraMatrix'>;

/**
 * Map a distorted viewport UV to the UV it corresponds to in the undistorted
 * viewport.
 *
 * Note this runs the *forward* lens model between the two cameras: the input
 * is normalized with the distorted camera, distorted, and projected again with
 * the undistorted camera. Which physical direction that is depends entirely
 * on the matrices the caller pairs up, so the pairing here must not be
 * swapped.
 */
export function undistortViewportUV(distortedUV: Vector2, params: CameraPair): Vector2 {
  const view = viewportUVToView(distortedUV, params.distortedCameraMatrix);
  return viewToViewportUV(distort(view, params.coefficients), params.undistortedCameraMatrix);
}

/**
 * Reference inverse of {@link undistortViewportUV}: finds the distorted
 * viewport UV whose undistorted image is `undistortedUV`.
 *
 * Uses fixed-point (Jacobi) iteration like OpenCV's undistortPoints. Only
 * locally convergent, so keep it to the region the calibration is valid for.
 * The generation pass never calls this; it exists to measure how far the grid
 * approximation is off.
 */
export function solveDistortedViewportUV(undistortedUV: Vector2, params: CameraPair, iterations = 20): Vector2 {
  const target = viewportUVToView(undistortedUV, params.undistortedCameraMatrix);
  const view = solveDistortedView(target, params.coefficients, iterations);
  return viewToViewportUV(view, params.distortedCameraMatrix);
}

function solveDistortedView(target: Vector2, coefficients: DistortionCoefficients, iterations: number): Vector2 {
  const [k1, k2, k3] = coefficients.radial;
  const [p1, p2] = coefficients.tangential;

  let x = target.x;
  let y = target.y;
  for (let i = 0; i < iterations; i++) {
    const r2 = x * x + y * y;
    const radialScale = 1 + r2 * (k1 + r2 * (k2 + r2 * k3));
    const deltaX = p2 * (r2 + 2 * x * x) + 2 * p1 * x * y;
    const deltaY = p1 * (r2 + 2 * y * y) + 2 * p2 * x * y;
    x = (target.x - deltaX) / radialScale;
    y = (target.y - deltaY) / radialScale;
  }
  return new Vector2(x, y);
}
