import { Vector2 } from 'three';
import { solveDistortedViewportUV } from './camera';
import { DisplacementMap, DistortionMapParams, OutputTransform } from './types';

export interface DecodedTexel {
  distortToUndistort: Vector2;
  undistortToDistort: Vector2;
}

export interface ApproximationError {
  max: number;
  mean: number;
  samples: number;
}

/**
 * Undo the output transform of texel (x, y) and return both displacement
 * vectors in viewport UV units.
 */
export function decodeTexel(map: DisplacementMap, x: number, y: number, { multiply, add }: OutputTransform): DecodedTexel {
  const i = (y * map.width + x) * 4;
  const channel = (c: number) => (map.data[i + c] - add) / multiply;
  return {
    distortToUndistort: new Vector2(channel(0), channel(1)),
    undistortToDistort: new Vector2(channel(2), channel(3)),
  };
}

/**
 * Nearest-texel lookup by viewport UV (texel (i, j) sits at UV (i / W, j / H)).
 * Returns `null` outside the map or on texels the grid never covered.
 */
export function lookupDisplacement(map: DisplacementMap, uv: Vector2, output: OutputTransform): DecodedTexel | null {
  const x = Math.round(uv.x * map.width);
  const y = Math.round(uv.y * map.height);

  if (x < 0 || x >= map.width || y < 0 || y >= map.height) {
    return null;
  }
  if (!map.coverage[y * map.width + x]) {
    return null;
  }
  return decodeTexel(map, x, y, output);
}

/**
 * Compare the interpolated undistorted→distorted channel against the
 * iterative reference inverse over every covered texel. Distances are in
 * viewport UV units.
 */
export function measureApproximationError(map: DisplacementMap, params: DistortionMapParams, iterations?: number): ApproximationError {
  const { pixelUVSize } = params;
  let max = 0;
  let sum = 0;
  let samples = 0;

  for (let y = 0; y < map.height; y++) {
    for (let x = 0; x < map.width; x++) {
      if (!map.coverage[y * map.width + x]) continue;

      const viewportUV = new Vector2(x * pixelUVSize.x, y * pixelUVSize.y);
      const { undistortToDistort } = decodeTexel(map, x, y, params.output);
      const approximate = viewportUV.clone().add(undistortToDistort);
      const exact = solveDistortedViewportUV(viewportUV, params, iterations);

      const error = approximate.distanceTo(exact);
      max = Math.max(max, error);
      sum += error;
      samples++;
    }
  }

  return { max, mean: samples > 0 ? sum / samples : 0, samples };
}
