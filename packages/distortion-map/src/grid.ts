import { Vector2, Vector4 } from 'three';
import { undistortViewportUV } from './camera';
import { DistortionMapParams, GridSubdivision } from './types';

export const VERTICES_PER_CELL = 6;

type CellCorner = readonly [0 | 1, 0 | 1];

// Two triangles per cell sharing the (0,0)-(1,1) diagonal.
const CELL_CORNERS: readonly CellCorner[] = [
  [0, 0],
  [1, 0],
  [1, 1],
  [0, 0],
  [1, 1],
  [0, 1],
];

export interface GridVertex {
  // Clip space, w = 1.
  position: Vector4;
  // Distorted viewport UV of the grid point, interpolated across triangles.
  distortedUV: Vector2;
}

/**
 * Non-indexed triangle list: vertices `3i, 3i+1, 3i+2` form triangle `i`.
 */
export interface GridMesh {
  vertexCount: number;
  // xyzw per vertex
  positions: Float64Array;
  // uv per vertex
  distortedUVs: Float64Array;
}

export function assertValidGrid({ x, y }: GridSubdivision) {
  if (!Number.isInteger(x) || !Number.isInteger(y) || x < 1 || y < 1) {
    throw new Error(`grid subdivision must be positive integers, got ${x}x${y}`);
  }
}

export function gridVertexCount(grid: GridSubdivision): number {
  return VERTICES_PER_CELL * grid.x * grid.y;
}

/**
 * Evaluate one grid vertex. Cells are laid out column-major: consecutive cells
 * walk up a column of `grid.y` rows before moving to the next column.
 *
 * The grid point is flipped to a top-left origin and shifted by half a pixel,
 * pushed through the exact lens mapping, and placed in clip space where its
 * undistorted image lands. The pre-mapping UV rides along as the varying, so
 * interpolating it over the triangle approximates the inverse mapping.
 */
export function computeGridVertex(vertexIndex: number, params: DistortionMapParams, grid: GridSubdivision): GridVertex {
  const cellIndex = Math.floor(vertexIndex / VERTICES_PER_CELL);
  const column = Math.floor(cellIndex / grid.y);
  const row = cellIndex % grid.y;
  const [cornerX, cornerY] = CELL_CORNERS[vertexIndex % VERTICES_PER_CELL];

  const halfPixel = params.pixelUVSize.clone().multiplyScalar(0.5);

  const distortedUV = new Vector2((cornerX + column) * (1 / grid.x), (cornerY + row) * (1 / grid.y));
  distortedUV.y = 1 - distortedUV.y;
  distortedUV.sub(halfPixel);

  const undistortedUV = undistortViewportUV(distortedUV, params).add(halfPixel);
  undistortedUV.y = 1 - undistortedUV.y;

  return {
    position: new Vector4(undistortedUV.x * 2 - 1, undistortedUV.y * 2 - 1, 0, 1),
    distortedUV,
  };
}

export function buildGridMesh(params: DistortionMapParams, grid: GridSubdivision): GridMesh {
  assertValidGrid(grid);
  const vertexCount = gridVertexCount(grid);
  const positions = new Float64Array(vertexCount * 4);
  const distortedUVs = new Float64Array(vertexCount * 2);

  for (let i = 0; i < vertexCount; i++) {
    const { position, distortedUV } = computeGridVertex(i, params, grid);
    positions.set([position.x, position.y, position.z, position.w], i * 4);
    distortedUVs.set([distortedUV.x, distortedUV.y], i * 2);
  }

  return { vertexCount, positions, distortedUVs };
}
