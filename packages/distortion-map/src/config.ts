import { Vector2 } from 'three';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { DEFAULT_GRID_SUBDIVISION, DistortionMapParams, GridSubdivision, ITuple4, Size } from './types';

const finite = z.number().finite();
const nonZero = finite.refine(v => v !== 0, { message: 'must be non-zero' });
const positiveInt = z.number().int().positive();

const cameraMatrixSchema = z.object({
  fx: nonZero,
  fy: nonZero,
  cx: finite,
  cy: finite,
});

export const DistortionMapConfigSchema = z.object({
  resolution: z.object({ width: positiveInt, height: positiveInt }),
  // Defaults to one texel of `resolution`.
  pixelUVSize: z.tuple([finite, finite]).optional(),
  coefficients: z.object({
    radial: z.tuple([finite, finite, finite]),
    tangential: z.tuple([finite, finite]),
  }),
  undistortedCameraMatrix: cameraMatrixSchema,
  distortedCameraMatrix: cameraMatrixSchema,
  output: z.object({ multiply: nonZero, add: finite }).default({ multiply: 1, add: 0 }),
  grid: z.object({ x: positiveInt, y: positiveInt }).default({ ...DEFAULT_GRID_SUBDIVISION }),
  clearValue: z.tuple([finite, finite, finite, finite]).default([0, 0, 0, 0]),
});

export type DistortionMapConfig = z.input<typeof DistortionMapConfigSchema>;

/**
 * A validated generation request: the per-pass parameters plus the target
 * the pass renders into.
 */
export interface ResolvedDistortionMapConfig {
  params: DistortionMapParams;
  size: Size;
  grid: GridSubdivision;
  clearValue: ITuple4;
}

export function parseDistortionMapConfig(input: unknown): ResolvedDistortionMapConfig {
  const config = DistortionMapConfigSchema.parse(input);
  const { width, height } = config.resolution;
  const [sx, sy] = config.pixelUVSize ?? [1 / width, 1 / height];

  return {
    params: {
      pixelUVSize: new Vector2(sx, sy),
      coefficients: config.coefficients,
      undistortedCameraMatrix: config.undistortedCameraMatrix,
      distortedCameraMatrix: config.distortedCameraMatrix,
      output: config.output,
    },
    size: { width, height },
    grid: config.grid,
    clearValue: config.clearValue,
  };
}

export function parseDistortionMapConfigYaml(text: string): ResolvedDistortionMapConfig {
  return parseDistortionMapConfig(parseYaml(text));
}
