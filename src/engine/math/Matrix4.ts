import { Vector3 } from './Vector3.js';
import { degToRad } from './MathUtils.js';

/**
 * 4x4 matrix acting on column vectors. Elements are column-major:
 * elements[col * 4 + row].
 */
export class Matrix4 {
  public elements: Float64Array;

  constructor() {
    this.elements = new Float64Array(16);
    this.identity();
  }

  identity(): this {
    this.elements.fill(0);
    this.elements[0] = this.elements[5] = this.elements[10] = this.elements[15] = 1;
    return this;
  }

  static identity(): Matrix4 {
    return new Matrix4();
  }

  static fromArray(values: ArrayLike<number>): Matrix4 {
    if (values.length !== 16) {
      throw new Error(`Matrix4 needs 16 values, got ${values.length}`);
    }
    const m = new Matrix4();
    m.elements.set(values);
    return m;
  }

  // Row-major literal, easier to read at call sites
  private static fromRows(
    r0: readonly number[],
    r1: readonly number[],
    r2: readonly number[],
    r3: readonly number[] = [0, 0, 0, 1]
  ): Matrix4 {
    const m = new Matrix4();
    const rows = [r0, r1, r2, r3];
    for (let row = 0; row < 4; row++) {
      for (let col = 0; col < 4; col++) {
        m.elements[col * 4 + row] = rows[row][col];
      }
    }
    return m;
  }

  clone(): Matrix4 {
    return Matrix4.fromArray(this.elements);
  }

  copy(m: Matrix4): this {
    this.elements.set(m.elements);
    return this;
  }

  // this · m, as a new matrix (m is applied to a vector first)
  multiply(m: Matrix4): Matrix4 {
    return new Matrix4().multiplyMatrices(this, m);
  }

  // Safe when a or b is this
  multiplyMatrices(a: Matrix4, b: Matrix4): this {
    const ae = a.elements;
    const be = b.elements;
    const out = new Float64Array(16);

    for (let col = 0; col < 4; col++) {
      for (let row = 0; row < 4; row++) {
        let sum = 0;
        for (let k = 0; k < 4; k++) {
          sum += ae[k * 4 + row] * be[col * 4 + k];
        }
        out[col * 4 + row] = sum;
      }
    }

    this.elements.set(out);
    return this;
  }

  // Left-to-right product of any number of matrices
  static product(...matrices: Matrix4[]): Matrix4 {
    const result = new Matrix4();
    for (const m of matrices) {
      result.multiplyMatrices(result, m);
    }
    return result;
  }

  /**
   * Point with w = 1. The result is divided by the resulting w unless that
   * is 0, in which case the undivided point comes back.
   */
  transformPoint(v: Vector3): Vector3 {
    const e = this.elements;
    const x = e[0] * v.x + e[4] * v.y + e[8] * v.z + e[12];
    const y = e[1] * v.x + e[5] * v.y + e[9] * v.z + e[13];
    const z = e[2] * v.x + e[6] * v.y + e[10] * v.z + e[14];
    const w = e[3] * v.x + e[7] * v.y + e[11] * v.z + e[15];
    return w === 0 ? new Vector3(x, y, z) : new Vector3(x / w, y / w, z / w);
  }

  // Upper 3x3 only: no translation, no divide
  transformDirection(v: Vector3): Vector3 {
    const e = this.elements;
    return new Vector3(
      e[0] * v.x + e[4] * v.y + e[8] * v.z,
      e[1] * v.x + e[5] * v.y + e[9] * v.z,
      e[2] * v.x + e[6] * v.y + e[10] * v.z
    );
  }

  static translation(x: number, y: number, z: number): Matrix4 {
    return Matrix4.fromRows([1, 0, 0, x], [0, 1, 0, y], [0, 0, 1, z]);
  }

  static scaling(x: number, y: number, z: number): Matrix4 {
    return Matrix4.fromRows([x, 0, 0, 0], [0, y, 0, 0], [0, 0, z, 0]);
  }

  static rotationX(radians: number): Matrix4 {
    const c = Math.cos(radians);
    const s = Math.sin(radians);
    return Matrix4.fromRows([1, 0, 0, 0], [0, c, -s, 0], [0, s, c, 0]);
  }

  static rotationY(radians: number): Matrix4 {
    const c = Math.cos(radians);
    const s = Math.sin(radians);
    return Matrix4.fromRows([c, 0, s, 0], [0, 1, 0, 0], [-s, 0, c, 0]);
  }

  static rotationZ(radians: number): Matrix4 {
    const c = Math.cos(radians);
    const s = Math.sin(radians);
    return Matrix4.fromRows([c, -s, 0, 0], [s, c, 0, 0], [0, 0, 1, 0]);
  }

  // OpenGL-style perspective; the last row puts -z in w for the divide
  static perspective(fovDegrees: number, aspect: number, near: number, far: number): Matrix4 {
    const f = 1 / Math.tan(degToRad(fovDegrees) / 2);
    const nf = 1 / (near - far);
    return Matrix4.fromRows(
      [f / aspect, 0, 0, 0],
      [0, f, 0, 0],
      [0, 0, (far + near) * nf, 2 * far * near * nf],
      [0, 0, -1, 0]
    );
  }

  getPosition(): Vector3 {
    return new Vector3(this.elements[12], this.elements[13], this.elements[14]);
  }

  equals(m: Matrix4, tolerance: number = 1e-9): boolean {
    return this.elements.every((value, i) => Math.abs(value - m.elements[i]) <= tolerance);
  }

  toArray(): number[] {
    return Array.from(this.elements);
  }

  toString(): string {
    const rows: string[] = [];
    for (let row = 0; row < 4; row++) {
      const cells: string[] = [];
      for (let col = 0; col < 4; col++) {
        cells.push(this.elements[col * 4 + row].toFixed(3));
      }
      rows.push(`  ${cells.join(', ')}`);
    }
    return `Matrix4(\n${rows.join('\n')}\n)`;
  }
}
