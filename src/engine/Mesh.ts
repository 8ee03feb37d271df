import { Vector3 } from './math/Vector3.js';
import { TWO_PI } from './math/MathUtils.js';
import { Color } from '../utils/Colors.js';

// Vertex indices of one triangle
export type Face = [number, number, number];

export type MaterialKind = 'flat' | 'phong' | 'wireframe';

export interface Bounds {
  min: Vector3;
  max: Vector3;
}

export interface ShapeOptions {
  // Single colour for every vertex; each builder has its own gradient otherwise
  color?: Color;
  material?: MaterialKind;
}

/**
 * Triangle mesh with one colour per vertex.
 *
 * Construction throws when the colour count does not match the vertex count
 * or when a face refers to a vertex that does not exist.
 */
export class Mesh {
  public readonly vertices: Vector3[];
  public readonly faces: Face[];
  public readonly colors: Color[];
  public material: MaterialKind;

  private bounds: Bounds | null = null;

  constructor(vertices: Vector3[], faces: Face[], colors: Color[], material: MaterialKind = 'flat') {
    Mesh.validate(vertices, faces, colors);
    this.vertices = vertices;
    this.faces = faces;
    this.colors = colors;
    this.material = material;
  }

  static validate(vertices: readonly Vector3[], faces: readonly Face[], colors: readonly Color[]): void {
    if (colors.length !== vertices.length) {
      throw new Error(
        `Mesh has ${vertices.length} vertices but ${colors.length} colors; expected one color per vertex`
      );
    }
    for (let f = 0; f < faces.length; f++) {
      for (const index of faces[f]) {
        if (!Number.isInteger(index) || index < 0 || index >= vertices.length) {
          throw new Error(
            `Face ${f} references vertex ${index}, outside [0, ${vertices.length})`
          );
        }
      }
    }
  }

  setMaterial(material: MaterialKind): this {
    this.material = material;
    return this;
  }

  // Drop the cached bounds after editing vertices in place
  invalidateBounds(): void {
    this.bounds = null;
  }

  // Get bounding box
  getBounds(): Bounds {
    if (this.bounds) {
      return this.bounds;
    }

    if (this.vertices.length === 0) {
      this.bounds = { min: Vector3.zero(), max: Vector3.zero() };
      return this.bounds;
    }

    const min = this.vertices[0].clone();
    const max = this.vertices[0].clone();

    for (const p of this.vertices) {
      min.x = Math.min(min.x, p.x);
      min.y = Math.min(min.y, p.y);
      min.z = Math.min(min.z, p.z);
      max.x = Math.max(max.x, p.x);
      max.y = Math.max(max.y, p.y);
      max.z = Math.max(max.z, p.z);
    }

    this.bounds = { min, max };
    return this.bounds;
  }

  // Get center of bounding box
  getCenter(): Vector3 {
    const bounds = this.getBounds();
    return bounds.min.lerp(bounds.max, 0.5);
  }

  // The eight corners of the bounding box
  getBoundsCorners(): Vector3[] {
    const { min, max } = this.getBounds();
    return [
      new Vector3(min.x, min.y, min.z),
      new Vector3(max.x, min.y, min.z),
      new Vector3(min.x, max.y, min.z),
      new Vector3(max.x, max.y, min.z),
      new Vector3(min.x, min.y, max.z),
      new Vector3(max.x, min.y, max.z),
      new Vector3(min.x, max.y, max.z),
      new Vector3(max.x, max.y, max.z),
    ];
  }

  get vertexCount(): number {
    return this.vertices.length;
  }

  get faceCount(): number {
    return this.faces.length;
  }

  clone(): Mesh {
    return new Mesh(
      this.vertices.map(v => v.clone()),
      this.faces.map((f): Face => [f[0], f[1], f[2]]),
      this.colors.map(c => c.clone()),
      this.material
    );
  }

  // Create a cube centered on the origin
  static createCube(size: number = 1, options: ShapeOptions = {}): Mesh {
    const s = size / 2;
    const vertices = [
      new Vector3(-s, -s, -s), new Vector3(s, -s, -s), new Vector3(s, s, -s), new Vector3(-s, s, -s),
      new Vector3(-s, -s, s), new Vector3(s, -s, s), new Vector3(s, s, s), new Vector3(-s, s, s),
    ];
    const faces: Face[] = [
      [0, 1, 2], [0, 2, 3], // back
      [4, 6, 5], [4, 7, 6], // front
      [0, 4, 5], [0, 5, 1], // bottom
      [3, 2, 6], [3, 6, 7], // top
      [1, 5, 6], [1, 6, 2], // right
      [0, 3, 7], [0, 7, 4], // left
    ];

    // Pastel corners
    const palette: [number, number, number][] = [
      [255, 179, 186], [255, 223, 186], [255, 255, 186], [186, 255, 201],
      [186, 225, 255], [223, 186, 255], [255, 186, 255], [186, 255, 255],
    ];
    const colors = palette.map(rgb => Color.fromArray(rgb));

    return Mesh.finish(vertices, faces, colors, options);
  }

  // Create a plane mesh lying in the XZ plane
  static createPlane(
    width: number = 1,
    depth: number = 1,
    segmentsX: number = 1,
    segmentsZ: number = 1,
    options: ShapeOptions = {}
  ): Mesh {
    const sx = Math.max(1, Math.floor(segmentsX));
    const sz = Math.max(1, Math.floor(segmentsZ));
    const vertices: Vector3[] = [];
    const colors: Color[] = [];
    const faces: Face[] = [];

    for (let z = 0; z <= sz; z++) {
      for (let x = 0; x <= sx; x++) {
        vertices.push(new Vector3((x / sx - 0.5) * width, 0, (z / sz - 0.5) * depth));
        colors.push(Color.gray(200));
      }
    }

    const cols = sx + 1;
    for (let z = 0; z < sz; z++) {
      for (let x = 0; x < sx; x++) {
        const i0 = z * cols + x;
        const i1 = i0 + 1;
        const i2 = i0 + cols;
        const i3 = i2 + 1;
        faces.push([i0, i2, i1], [i1, i2, i3]);
      }
    }

    return Mesh.finish(vertices, faces, colors, options);
  }

  // Create a UV sphere; poles lie on the z axis
  static createUvSphere(
    radius: number = 1,
    segmentsX: number = 20,
    segmentsY: number = 10,
    options: ShapeOptions = {}
  ): Mesh {
    const sx = Math.max(3, Math.floor(segmentsX));
    const sy = Math.max(2, Math.floor(segmentsY));
    const vertices: Vector3[] = [];
    const colors: Color[] = [];
    const faces: Face[] = [];

    for (let y = 0; y <= sy; y++) {
      const phi = (y * Math.PI) / sy;
      for (let x = 0; x <= sx; x++) {
        const theta = (x * TWO_PI) / sx;
        const nx = Math.cos(theta) * Math.sin(phi);
        const ny = Math.sin(theta) * Math.sin(phi);
        const nz = Math.cos(phi);
        vertices.push(new Vector3(radius * nx, radius * ny, radius * nz));
        colors.push(new Color(
          Math.trunc((255 * (nx + 1)) / 2),
          Math.trunc((255 * (ny + 1)) / 2),
          Math.trunc((255 * (nz + 1)) / 2)
        ));
      }
    }

    for (let y = 0; y < sy; y++) {
      for (let x = 0; x < sx; x++) {
        const i0 = y * (sx + 1) + x;
        const i1 = i0 + 1;
        const i2 = (y + 1) * (sx + 1) + x;
        const i3 = i2 + 1;
        faces.push([i0, i2, i1], [i1, i2, i3]);
      }
    }

    return Mesh.finish(vertices, faces, colors, options);
  }

  // Create a torus around the z axis with major radius R and tube radius r
  static createTorus(
    majorRadius: number = 2,
    minorRadius: number = 0.7,
    segmentsMajor: number = 40,
    segmentsMinor: number = 20,
    options: ShapeOptions = {}
  ): Mesh {
    const sR = Math.max(3, Math.floor(segmentsMajor));
    const sr = Math.max(3, Math.floor(segmentsMinor));
    const vertices: Vector3[] = [];
    const colors: Color[] = [];
    const faces: Face[] = [];

    for (let i = 0; i < sR; i++) {
      const theta = (TWO_PI * i) / sR;
      const cosTheta = Math.cos(theta);
      const sinTheta = Math.sin(theta);
      for (let j = 0; j < sr; j++) {
        const phi = (TWO_PI * j) / sr;
        const cosPhi = Math.cos(phi);
        const sinPhi = Math.sin(phi);
        const ring = majorRadius + minorRadius * cosPhi;
        vertices.push(new Vector3(ring * cosTheta, ring * sinTheta, minorRadius * sinPhi));
        colors.push(new Color(
          Math.trunc(127 + 127 * cosPhi),
          Math.trunc(127 + 127 * sinTheta),
          Math.trunc(127 + 127 * sinPhi)
        ));
      }
    }

    for (let i = 0; i < sR; i++) {
      const next = (i + 1) % sR;
      for (let j = 0; j < sr; j++) {
        const jn = (j + 1) % sr;
        const i0 = i * sr + j;
        const i1 = i * sr + jn;
        const i2 = next * sr + j;
        const i3 = next * sr + jn;
        faces.push([i0, i2, i1], [i1, i2, i3]);
      }
    }

    return Mesh.finish(vertices, faces, colors, options);
  }

  // Create a capped cylinder along the y axis
  static createCylinder(
    radius: number = 1,
    height: number = 2,
    segments: number = 20,
    options: ShapeOptions = {}
  ): Mesh {
    const n = Math.max(3, Math.floor(segments));
    const hh = height / 2;
    const vertices: Vector3[] = [];
    const colors: Color[] = [];
    const faces: Face[] = [];

    for (const y of [-hh, hh]) {
      for (let i = 0; i < n; i++) {
        const theta = (TWO_PI * i) / n;
        vertices.push(new Vector3(radius * Math.cos(theta), y, radius * Math.sin(theta)));
        colors.push(new Color(
          Math.trunc(127 + 127 * Math.cos(theta)),
          Math.trunc(127 + 127 * Math.sin(theta)),
          200
        ));
      }
    }

    const top = vertices.length;
    vertices.push(new Vector3(0, hh, 0));
    colors.push(Color.white());
    const bottom = vertices.length;
    vertices.push(new Vector3(0, -hh, 0));
    colors.push(Color.gray(200));

    for (let i = 0; i < n; i++) {
      const i1 = (i + 1) % n;
      faces.push([i, n + i, i1], [i1, n + i, n + i1]);
      faces.push([top, n + i, n + i1]);
      faces.push([bottom, i1, i]);
    }

    return Mesh.finish(vertices, faces, colors, options);
  }

  // Create a square pyramid standing on the XZ plane
  static createPyramid(base: number = 1, height: number = 1, options: ShapeOptions = {}): Mesh {
    const s = base / 2;
    const vertices = [
      new Vector3(-s, 0, -s), new Vector3(s, 0, -s),
      new Vector3(s, 0, s), new Vector3(-s, 0, s),
      new Vector3(0, height, 0),
    ];
    const colors = [Color.gray(200), Color.gray(200), Color.gray(200), Color.gray(200), Color.white()];
    const faces: Face[] = [
      [0, 1, 4], [1, 2, 4], [2, 3, 4], [3, 0, 4], // sides
      [0, 3, 2], [0, 2, 1], // base
    ];
    return Mesh.finish(vertices, faces, colors, options);
  }

  private static finish(vertices: Vector3[], faces: Face[], colors: Color[], options: ShapeOptions): Mesh {
    const { color } = options;
    const vertexColors = color ? vertices.map(() => color.clone()) : colors;
    return new Mesh(vertices, faces, vertexColors, options.material ?? 'flat');
  }
}
