// Divisors and squared lengths below this are treated as zero
export const EPSILON = 1e-9;

function guard(d: number): number {
  return Math.abs(d) > EPSILON ? d : EPSILON;
}

/**
 * 3-component vector. Operations return new vectors; the *InPlace variants
 * mutate and are meant for tight loops.
 */
export class Vector3 {
  constructor(
    public x: number = 0,
    public y: number = 0,
    public z: number = 0
  ) {}

  static zero(): Vector3 {
    return new Vector3(0, 0, 0);
  }

  static one(): Vector3 {
    return new Vector3(1, 1, 1);
  }

  static up(): Vector3 {
    return new Vector3(0, 1, 0);
  }

  static right(): Vector3 {
    return new Vector3(1, 0, 0);
  }

  static fromArray(arr: readonly [number, number, number]): Vector3 {
    return new Vector3(arr[0], arr[1], arr[2]);
  }

  clone(): Vector3 {
    return new Vector3(this.x, this.y, this.z);
  }

  copy(v: Vector3): this {
    this.x = v.x;
    this.y = v.y;
    this.z = v.z;
    return this;
  }

  set(x: number, y: number, z: number): this {
    this.x = x;
    this.y = y;
    this.z = z;
    return this;
  }

  add(v: Vector3): Vector3 {
    return new Vector3(this.x + v.x, this.y + v.y, this.z + v.z);
  }

  sub(v: Vector3): Vector3 {
    return new Vector3(this.x - v.x, this.y - v.y, this.z - v.z);
  }

  // Componentwise when given a vector
  multiply(s: number | Vector3): Vector3 {
    if (typeof s === 'number') {
      return new Vector3(this.x * s, this.y * s, this.z * s);
    }
    return new Vector3(this.x * s.x, this.y * s.y, this.z * s.z);
  }

  divide(s: number | Vector3): Vector3 {
    if (typeof s === 'number') {
      const d = guard(s);
      return new Vector3(this.x / d, this.y / d, this.z / d);
    }
    return new Vector3(this.x / guard(s.x), this.y / guard(s.y), this.z / guard(s.z));
  }

  negate(): Vector3 {
    return new Vector3(-this.x, -this.y, -this.z);
  }

  dot(v: Vector3): number {
    return this.x * v.x + this.y * v.y + this.z * v.z;
  }

  cross(v: Vector3): Vector3 {
    return new Vector3(
      this.y * v.z - this.z * v.y,
      this.z * v.x - this.x * v.z,
      this.x * v.y - this.y * v.x
    );
  }

  lengthSquared(): number {
    return this.x * this.x + this.y * this.y + this.z * this.z;
  }

  length(): number {
    return Math.sqrt(this.lengthSquared());
  }

  normalize(): Vector3 {
    const lenSq = this.lengthSquared();
    if (lenSq < EPSILON) {
      return Vector3.zero();
    }
    const inv = 1 / Math.sqrt(lenSq);
    return new Vector3(this.x * inv, this.y * inv, this.z * inv);
  }

  distanceTo(v: Vector3): number {
    const dx = this.x - v.x;
    const dy = this.y - v.y;
    const dz = this.z - v.z;
    return Math.sqrt(dx * dx + dy * dy + dz * dz);
  }

  // Angle in radians; 0 when either vector is degenerate
  angleTo(v: Vector3): number {
    const denom = this.length() * v.length();
    if (denom < EPSILON) {
      return 0;
    }
    const c = this.dot(v) / denom;
    return Math.acos(Math.max(-1, Math.min(1, c)));
  }

  projectOnto(v: Vector3): Vector3 {
    const lenSq = v.lengthSquared();
    if (lenSq < EPSILON) {
      return Vector3.zero();
    }
    return v.multiply(this.dot(v) / lenSq);
  }

  rejectFrom(v: Vector3): Vector3 {
    return this.sub(this.projectOnto(v));
  }

  reflect(normal: Vector3): Vector3 {
    const d = 2 * this.dot(normal);
    return new Vector3(this.x - normal.x * d, this.y - normal.y * d, this.z - normal.z * d);
  }

  lerp(v: Vector3, t: number): Vector3 {
    return new Vector3(
      this.x + (v.x - this.x) * t,
      this.y + (v.y - this.y) * t,
      this.z + (v.z - this.z) * t
    );
  }

  // this · (b × c)
  scalarTriple(b: Vector3, c: Vector3): number {
    return this.dot(b.cross(c));
  }

  // this × (b × c) = b(this·c) − c(this·b)
  vectorTriple(b: Vector3, c: Vector3): Vector3 {
    const ac = this.dot(c);
    const ab = this.dot(b);
    return new Vector3(b.x * ac - c.x * ab, b.y * ac - c.y * ab, b.z * ac - c.z * ab);
  }

  addInPlace(v: Vector3): this {
    this.x += v.x;
    this.y += v.y;
    this.z += v.z;
    return this;
  }

  subInPlace(v: Vector3): this {
    this.x -= v.x;
    this.y -= v.y;
    this.z -= v.z;
    return this;
  }

  scaleInPlace(s: number): this {
    this.x *= s;
    this.y *= s;
    this.z *= s;
    return this;
  }

  divideInPlace(s: number): this {
    const d = guard(s);
    this.x /= d;
    this.y /= d;
    this.z /= d;
    return this;
  }

  equals(v: Vector3, tolerance: number = 1e-9): boolean {
    return (
      Math.abs(this.x - v.x) <= tolerance &&
      Math.abs(this.y - v.y) <= tolerance &&
      Math.abs(this.z - v.z) <= tolerance
    );
  }

  toArray(): [number, number, number] {
    return [this.x, this.y, this.z];
  }

  toString(): string {
    return `(${this.x.toFixed(3)}, ${this.y.toFixed(3)}, ${this.z.toFixed(3)})`;
  }
}
