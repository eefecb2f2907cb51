import { Vector2 } from 'three';
import { describe, expect, it } from 'vitest';
import { distort, isIdentityDistortion, NO_DISTORTION } from './distortion';
import { DistortionCoefficients } from './types';

const barrel: DistortionCoefficients = { radial: [0.1, 0, 0], tangential: [0, 0] };
const mixed: DistortionCoefficients = { radial: [-0.25, 0.08, -0.01], tangential: [0.003, -0.002] };

describe('distort', () => {
  it('leaves the optical center in place', () => {
    const result = distort(new Vector2(0, 0), mixed);
    expect(result.x).toBe(0);
    expect(result.y).toBe(0);
  });

  it('is the identity without coefficients', () => {
    const result = distort(new Vector2(0.3, -0.7), NO_DISTORTION);
    expect(result.x).toBe(0.3);
    expect(result.y).toBe(-0.7);
  });

  it('scales radially with k1', () => {
    const result = distort(new Vector2(0.5, 0), barrel);
    expect(result.x).toBeCloseTo(0.5125, 12);
    expect(result.y).toBe(0);
  });

  it('applies tangential terms', () => {
    const result = distort(new Vector2(0.2, 0.1), { radial: [0, 0, 0], tangential: [0.01, 0.02] });
    expect(result.x).toBeCloseTo(0.203, 12);
    expect(result.y).toBeCloseTo(0.1015, 12);
  });

  it('evaluates the radial polynomial in nested form', () => {
    const [k1, k2, k3] = mixed.radial;
    const [p1, p2] = mixed.tangential;
    const x = 0.41;
    const y = -0.23;
    const r2 = x * x + y * y;
    const radialScale = 1 + r2 * (k1 + r2 * (k2 + r2 * k3));

    const result = distort(new Vector2(x, y), mixed);
    expect(result.x).toBe(x * radialScale + p2 * (r2 + 2 * x * x) + 2 * p1 * x * y);
    expect(result.y).toBe(y * radialScale + p1 * (r2 + 2 * y * y) + 2 * p2 * x * y);
  });

  it('is continuous around the origin', () => {
    const a = distort(new Vector2(0.1, 0.1), mixed);
    const b = distort(new Vector2(0.1 + 1e-9, 0.1 - 1e-9), mixed);
    expect(a.distanceTo(b)).toBeLessThan(1e-8);
  });
});

describe('isIdentityDistortion', () => {
  it('detects all-zero coefficients', () => {
    expect(isIdentityDistortion(NO_DISTORTION)).toBe(true);
    expect(isIdentityDistortion(barrel)).toBe(false);
    expect(isIdentityDistortion({ radial: [0, 0, 0], tangential: [0, 1e-6] })).toBe(false);
  });
});
