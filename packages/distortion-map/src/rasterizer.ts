import { Vector2 } from 'three';
import { GridMesh } from './grid';
import { Size } from './types';

interface ScreenPoint {
  x: number;
  y: number;
}

/**
 * Pixel stage callback. `x`, `y` are integer texel coordinates, `pixelCenter`
 * the rasterizer position `(x + 0.5, y + 0.5)` and `varying` the
 * barycentric interpolation of the per-vertex distorted UV.
 */
export type FragmentFn = (x: number, y: number, pixelCenter: Vector2, varying: Vector2) => void;

/**
 * Minimal rasterizer for triangle lists. Walks each triangle's
 * bounding box and tests pixel centers with edge functions, the way a GPU
 * would place the fragments of a draw call.
 */
export class SoftwareRasterizer {
  private readonly target: Size;

  constructor(target: Size) {
    this.target = target;
  }

  /**
   * Draw all triangles of `mesh`. Returns the number of fragments emitted,
   * counting texels on shared edges once per triangle that touches them.
   */
  draw(mesh: GridMesh, fragment: FragmentFn): number {
    let fragments = 0;
    for (let i = 0; i + 2 < mesh.vertexCount; i += 3) {
      fragments += this.drawTriangle(mesh, i, fragment);
    }
    return fragments;
  }

  private toScreen(mesh: GridMesh, vertex: number): ScreenPoint {
    const p = mesh.positions.subarray(vertex * 4, vertex * 4 + 4);
    return {
      x: ((p[0] / p[3]) * 0.5 + 0.5) * this.target.width,
      y: (0.5 - (p[1] / p[3]) * 0.5) * this.target.height, // clip y up, rows down
    };
  }

  private drawTriangle(mesh: GridMesh, first: number, fragment: FragmentFn): number {
    const s0 = this.toScreen(mesh, first);
    const s1 = this.toScreen(mesh, first + 1);
    const s2 = this.toScreen(mesh, first + 2);

    const area = edgeFunc(s0, s1, s2);
    if (!(Math.abs(area) >= 1e-9)) return 0; // degenerate or NaN

    const xStart = Math.max(0, Math.floor(Math.min(s0.x, s1.x, s2.x)));
    const xEnd = Math.min(this.target.width - 1, Math.ceil(Math.max(s0.x, s1.x, s2.x)));
    const yStart = Math.max(0, Math.floor(Math.min(s0.y, s1.y, s2.y)));
    const yEnd = Math.min(this.target.height - 1, Math.ceil(Math.max(s0.y, s1.y, s2.y)));

    const uv = mesh.distortedUVs;
    const a = first * 2;
    const b = a + 2;
    const c = a + 4;

    let emitted = 0;
    for (let y = yStart; y <= yEnd; y++) {
      for (let x = xStart; x <= xEnd; x++) {
        const p = { x: x + 0.5, y: y + 0.5 };

        const w = edgeFunc(s0, s1, p);
        const u = edgeFunc(s1, s2, p);
        const v = edgeFunc(s2, s0, p);

        // Accept either winding, edges inclusive.
        if (!((u >= 0 && v >= 0 && w >= 0) || (u <= 0 && v <= 0 && w <= 0))) continue;

        const bu = u / area;
        const bv = v / area;
        const bw = w / area;

        const varying = new Vector2(uv[a] * bu + uv[b] * bv + uv[c] * bw, uv[a + 1] * bu + uv[b + 1] * bv + uv[c + 1] * bw);
        fragment(x, y, new Vector2(p.x, p.y), varying);
        emitted++;
      }
    }
    return emitted;
  }
}

function edgeFunc(a: ScreenPoint, b: ScreenPoint, p: ScreenPoint) {
  return (p.x - a.x) * (b.y - a.y) - (p.y - a.y) * (b.x - a.x);
}
