import log from 'loglevel';
import { Vector2, Vector4 } from 'three';
import { undistortViewportUV } from './camera';
import { buildGridMesh } from './grid';
import { SoftwareRasterizer } from './rasterizer';
import { DEFAULT_GRID_SUBDIVISION, DisplacementMap, DistortionMapParams, GridSubdivision, ITuple4, Size } from './types';

export interface GenerateOptions extends Size {
  grid?: GridSubdivision;
  // Texels no grid triangle reaches keep this value.
  clearValue?: ITuple4;
}

/**
 * Pixel stage. `pixelCenter` is the rasterizer position of the texel,
 * `interpolatedDistortedUV` the grid varying at that position.
 *
 * Channels 0,1 are exact (recomputed per pixel); channels 2,3 come from the
 * interpolated grid and carry its approximation error.
 */
export function emitDisplacement(pixelCenter: Vector2, interpolatedDistortedUV: Vector2, params: DistortionMapParams): Vector4 {
  const { pixelUVSize, output } = params;
  const viewportUV = pixelCenter.clone().multiply(pixelUVSize).sub(pixelUVSize.clone().multiplyScalar(0.5));

  const distortToUndistort = undistortViewportUV(viewportUV, params).sub(viewportUV);
  const undistortToDistort = interpolatedDistortedUV.clone().sub(viewportUV);

  return new Vector4(distortToUndistort.x, distortToUndistort.y, undistortToDistort.x, undistortToDistort.y)
    .multiplyScalar(output.multiply)
    .addScalar(output.add);
}

export function createDisplacementMap({ width, height }: Size, clearValue: ITuple4 = [0, 0, 0, 0]): DisplacementMap {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
    throw new Error(`invalid displacement map size ${width}x${height}`);
  }
  const data = new Float32Array(width * height * 4);
  for (let i = 0; i < data.length; i += 4) {
    data.set(clearValue, i);
  }
  return { width, height, data, coverage: new Uint8Array(width * height) };
}

/**
 * Run one generation pass: evaluate every grid vertex, then rasterize the
 * grid and run the pixel stage for every covered texel.
 */
export function generateDisplacementMap(params: DistortionMapParams, options: GenerateOptions): DisplacementMap {
  const grid = options.grid ?? DEFAULT_GRID_SUBDIVISION;
  const map = createDisplacementMap(options, options.clearValue);

  let startTime = performance.now();
  const mesh = buildGridMesh(params, grid);
  log.debug(`distortion grid ${grid.x}x${grid.y} (${mesh.vertexCount} vertices) took ${performance.now() - startTime} ms`);

  startTime = performance.now();
  const rasterizer = new SoftwareRasterizer(map);
  rasterizer.draw(mesh, (x, y, pixelCenter, varying) => {
    const texel = y * map.width + x;
    const color = emitDisplacement(pixelCenter, varying, params);
    map.data.set([color.x, color.y, color.z, color.w], texel * 4);
    map.coverage[texel] = 1;
  });
  log.debug(`displacement pixel stage ${map.width}x${map.height} took ${performance.now() - startTime} ms`);

  const uncovered = countUncovered(map);
  if (uncovered > 0) {
    log.warn(`displacement map: ${uncovered} of ${map.width * map.height} texels not covered by the distortion grid`);
  }
  return map;
}

export function countUncovered(map: DisplacementMap): number {
  let uncovered = 0;
  for (const covered of map.coverage) {
    if (!covered) uncovered++;
  }
  return uncovered;
}
