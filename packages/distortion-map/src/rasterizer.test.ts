import { describe, expect, it } from 'vitest';
import { GridMesh } from './grid';
import { SoftwareRasterizer } from './rasterizer';

interface TestVertex {
  clip: [number, number];
  uv: [number, number];
}

function meshOf(vertices: TestVertex[]): GridMesh {
  return {
    vertexCount: vertices.length,
    positions: Float64Array.from(vertices.flatMap(v => [v.clip[0], v.clip[1], 0, 1])),
    distortedUVs: Float64Array.from(vertices.flatMap(v => v.uv)),
  };
}

// Full-screen quad whose varying is the normalized screen position.
const bottomLeft: TestVertex = { clip: [-1, -1], uv: [0, 1] };
const bottomRight: TestVertex = { clip: [1, -1], uv: [1, 1] };
const topRight: TestVertex = { clip: [1, 1], uv: [1, 0] };
const topLeft: TestVertex = { clip: [-1, 1], uv: [0, 0] };
const quad = meshOf([bottomLeft, bottomRight, topRight, bottomLeft, topRight, topLeft]);

describe('SoftwareRasterizer', () => {
  it('covers every texel of a full-screen quad', () => {
    const rasterizer = new SoftwareRasterizer({ width: 4, height: 4 });
    const covered = new Set<string>();

    const fragments = rasterizer.draw(quad, (x, y) => covered.add(`${x},${y}`));

    expect(covered.size).toBe(16);
    // the four texel centers on the shared diagonal are emitted by both triangles
    expect(fragments).toBe(20);
  });

  it('interpolates the varying at pixel centers', () => {
    const rasterizer = new SoftwareRasterizer({ width: 4, height: 4 });
    rasterizer.draw(quad, (x, y, pixelCenter, varying) => {
      expect(pixelCenter.toArray()).toEqual([x + 0.5, y + 0.5]);
      expect(varying.x).toBeCloseTo((x + 0.5) / 4, 12);
      expect(varying.y).toBeCloseTo((y + 0.5) / 4, 12);
    });
  });

  it('accepts both windings', () => {
    const reversed = meshOf([topRight, bottomRight, bottomLeft, topLeft, topRight, bottomLeft]);
    const rasterizer = new SoftwareRasterizer({ width: 4, height: 4 });
    expect(rasterizer.draw(reversed, () => {})).toBe(20);
  });

  it('skips degenerate and off-screen triangles', () => {
    const rasterizer = new SoftwareRasterizer({ width: 4, height: 4 });
    const degenerate = meshOf([bottomLeft, bottomLeft, bottomLeft]);
    const offscreen = meshOf([
      { clip: [2, 2], uv: [0, 0] },
      { clip: [3, 2], uv: [0, 0] },
      { clip: [3, 3], uv: [0, 0] },
    ]);
    expect(rasterizer.draw(degenerate, () => {})).toBe(0);
    expect(rasterizer.draw(offscreen, () => {})).toBe(0);
  });
});
