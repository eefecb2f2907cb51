import { Vector2 } from 'three';
import { DistortionCoefficients } from './types';

/**
 * Apply radial + tangential lens distortion to a normalized view position
 * (a point on the z=1 plane, before any intrinsics are applied).
 *
 * The radial polynomial is evaluated in Horner form,
 * `1 + r2 * (k1 + r2 * (k2 + r2 * k3))`, so results match GPU-side material
 * implementations bit for bit rather than only algebraically.
 *
 * No guarding for large radii: the polynomial diverges quickly outside the
 * range the coefficients were calibrated for.
 */
export function distort(view: Vector2, coefficients: DistortionCoefficients): Vector2 {
  const [k1, k2, k3] = coefficients.radial;
  const [p1, p2] = coefficients.tangential;
  const { x, y } = view;

  const r2 = x * x + y * y;
  const radialScale = 1 + r2 * (k1 + r2 * (k2 + r2 * k3));

  return new Vector2(
    x * radialScale + p2 * (r2 + 2 * x * x) + 2 * p1 * x * y,
    y * radialScale + p1 * (r2 + 2 * y * y) + 2 * p2 * x * y
  );
}

export function isIdentityDistortion({ radial, tangential }: DistortionCoefficients): boolean {
  return radial.every(k => k === 0) && tangential.every(p => p === 0);
}

export const NO_DISTORTION: Readonly<DistortionCoefficients> = {
  radial: [0, 0, 0],
  tangential: [0, 0],
};
