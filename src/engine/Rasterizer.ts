import { Vector3 } from './math/Vector3.js';
import { edgeCoefficients, signedArea } from './math/MathUtils.js';
import type { Mesh } from './Mesh.js';
import { Framebuffer } from './Framebuffer.js';
import { DepthBuffer } from './DepthBuffer.js';
import type { PreparedLight } from './Light.js';
import { shadeFlat, shadePhong, type RGBTuple, type ScaledAmbient } from './Shading.js';

// Integer pixel position plus view-space depth; z = Infinity marks a vertex
// at or behind the near plane
export interface ScreenVertex {
  x: number;
  y: number;
  z: number;
}

export interface RasterStats {
  trianglesDrawn: number;
  trianglesSkipped: number;
}

export const WIREFRAME_COLOR: RGBTuple = [255, 255, 255];

export class Rasterizer {
  private framebuffer: Framebuffer;
  private depthBuffer: DepthBuffer;

  // Lighting for the mesh being drawn
  private ambient: ScaledAmbient = { r: 0, g: 0, b: 0 };
  private lights: readonly PreparedLight[] = [];

  constructor(framebuffer: Framebuffer, depthBuffer: DepthBuffer) {
    this.framebuffer = framebuffer;
    this.depthBuffer = depthBuffer;
  }

  setLighting(ambient: ScaledAmbient, lights: readonly PreparedLight[]): void {
    this.ambient = ambient;
    this.lights = lights;
  }

  /**
   * Draw every face of a mesh. worldVertices feed the shading, screen
   * holds the projected position of each vertex.
   */
  rasterizeMesh(mesh: Mesh, worldVertices: readonly Vector3[], screen: readonly ScreenVertex[]): RasterStats {
    const stats: RasterStats = { trianglesDrawn: 0, trianglesSkipped: 0 };

    for (const [i0, i1, i2] of mesh.faces) {
      const s0 = screen[i0];
      const s1 = screen[i1];
      const s2 = screen[i2];

      if (s0.z === Infinity || s1.z === Infinity || s2.z === Infinity) {
        stats.trianglesSkipped++;
        continue;
      }

      if (mesh.material === 'wireframe') {
        this.drawLine(s0, s1, WIREFRAME_COLOR);
        this.drawLine(s1, s2, WIREFRAME_COLOR);
        this.drawLine(s2, s0, WIREFRAME_COLOR);
        stats.trianglesDrawn++;
        continue;
      }

      const area = signedArea(s0.x, s0.y, s1.x, s1.y, s2.x, s2.y);
      if (area === 0) {
        stats.trianglesSkipped++;
        continue;
      }

      const w0 = worldVertices[i0];
      const w1 = worldVertices[i1];
      const w2 = worldVertices[i2];

      // Both sides are lit; the normal faces whichever side is on screen
      let normal = w1.sub(w0).cross(w2.sub(w0)).normalize();
      if (area < 0) {
        normal = normal.negate();
      }

      const c0 = mesh.colors[i0];
      const c1 = mesh.colors[i1];
      const c2 = mesh.colors[i2];
      const base: RGBTuple = [
        (c0.r + c1.r + c2.r) / 3,
        (c0.g + c1.g + c2.g) / 3,
        (c0.b + c1.b + c2.b) / 3,
      ];

      const centroid = w0.add(w1).add(w2).multiply(1 / 3);
      const rgb = mesh.material === 'phong'
        ? shadePhong(base, normal, centroid, centroid.negate().normalize(), this.lights, this.ambient)
        : shadeFlat(base, normal, centroid, this.lights, this.ambient);

      if (this.fillTriangle(s0, s1, s2, area, rgb) >= 0) {
        stats.trianglesDrawn++;
      } else {
        stats.trianglesSkipped++;
      }
    }

    return stats;
  }

  /**
   * Incremental edge-function fill over the clipped bounding box.
   * Returns the number of pixels written, or -1 when the box is empty.
   */
  fillTriangle(
    v0: ScreenVertex,
    v1: ScreenVertex,
    v2: ScreenVertex,
    area: number,
    rgb: RGBTuple
  ): number {
    const width = this.framebuffer.width;
    const height = this.framebuffer.height;

    const minX = Math.max(0, Math.min(v0.x, v1.x, v2.x));
    const maxX = Math.min(width - 1, Math.max(v0.x, v1.x, v2.x));
    const minY = Math.max(0, Math.min(v0.y, v1.y, v2.y));
    const maxY = Math.min(height - 1, Math.max(v0.y, v1.y, v2.y));

    if (minX > maxX || minY > maxY) {
      return -1;
    }

    const invArea = 1 / area;
    const [a0, b0, k0] = edgeCoefficients(v1.x, v1.y, v2.x, v2.y);
    const [a1, b1, k1] = edgeCoefficients(v2.x, v2.y, v0.x, v0.y);
    const [a2, b2, k2] = edgeCoefficients(v0.x, v0.y, v1.x, v1.y);

    // Weights at the top-left corner of the box
    let w0Row = a0 * minX + b0 * minY + k0;
    let w1Row = a1 * minX + b1 * minY + k1;
    let w2Row = a2 * minX + b2 * minY + k2;

    const depth = this.depthBuffer.data;
    const [r, g, b] = rgb;
    let written = 0;

    for (let py = minY; py <= maxY; py++) {
      let w0 = w0Row;
      let w1 = w1Row;
      let w2 = w2Row;
      let index = py * width + minX;

      for (let px = minX; px <= maxX; px++) {
        if ((w0 >= 0 && w1 >= 0 && w2 >= 0) || (w0 <= 0 && w1 <= 0 && w2 <= 0)) {
          const z = (w0 * invArea) * v0.z + (w1 * invArea) * v1.z + (w2 * invArea) * v2.z;
          if (z < depth[index]) {
            depth[index] = z;
            this.framebuffer.setPixel(px, py, r, g, b);
            written++;
          }
        }

        w0 += a0;
        w1 += a1;
        w2 += a2;
        index++;
      }

      w0Row += b0;
      w1Row += b1;
      w2Row += b2;
    }

    return written;
  }

  // Bresenham line with linearly interpolated, depth-tested z
  drawLine(from: ScreenVertex, to: ScreenVertex, rgb: RGBTuple): void {
    const width = this.framebuffer.width;
    const height = this.framebuffer.height;
    const x1 = to.x;
    const y1 = to.y;

    const dx = Math.abs(x1 - from.x);
    const dy = Math.abs(y1 - from.y);
    const sx = from.x < x1 ? 1 : -1;
    const sy = from.y < y1 ? 1 : -1;
    const steps = Math.max(dx, dy) > 0 ? Math.max(dx, dy) : 1;

    let err = dx - dy;
    let x = from.x;
    let y = from.y;

    for (let i = 0; i <= steps; i++) {
      const t = i / steps;
      const z = from.z * (1 - t) + to.z * t;

      if (x >= 0 && x < width && y >= 0 && y < height) {
        if (this.depthBuffer.testAndSet(x, y, z)) {
          this.framebuffer.setPixel(x, y, rgb[0], rgb[1], rgb[2]);
        }
      }

      if (x === x1 && y === y1) {
        break;
      }

      const e2 = 2 * err;
      if (e2 > -dy) {
        err -= dy;
        x += sx;
      }
      if (e2 < dx) {
        err += dx;
        y += sy;
      }
    }
  }
}
