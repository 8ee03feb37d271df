import { describe, it, expect } from 'vitest';
import { Vector3 } from '../engine/math/Vector3.js';
import { Matrix4 } from '../engine/math/Matrix4.js';
import {
  TWO_PI,
  clampByte,
  degToRad,
  edgeCoefficients,
  signedArea,
  wrapAngle,
} from '../engine/math/MathUtils.js';

function expectVector(v: Vector3, x: number, y: number, z: number): void {
  expect(v.x).toBeCloseTo(x, 9);
  expect(v.y).toBeCloseTo(y, 9);
  expect(v.z).toBeCloseTo(z, 9);
}

describe('Vector3', () => {
  it('adds, subtracts and scales without mutating', () => {
    const a = new Vector3(1, 2, 3);
    const b = new Vector3(4, 5, 6);
    expectVector(a.add(b), 5, 7, 9);
    expectVector(b.sub(a), 3, 3, 3);
    expectVector(a.multiply(2), 2, 4, 6);
    expectVector(a, 1, 2, 3);
  });

  it('computes dot and cross products', () => {
    expect(new Vector3(1, 2, 3).dot(new Vector3(4, 5, 6))).toBe(32);
    expectVector(Vector3.right().cross(Vector3.up()), 0, 0, 1);
    expectVector(Vector3.up().cross(Vector3.right()), 0, 0, -1);
  });

  it('normalizes to unit length and leaves the zero vector at zero', () => {
    const n = new Vector3(3, 0, 4).normalize();
    expectVector(n, 0.6, 0, 0.8);
    expect(n.length()).toBeCloseTo(1, 12);
    expectVector(Vector3.zero().normalize(), 0, 0, 0);
  });

  it('reflects about a normal', () => {
    expectVector(new Vector3(1, -1, 0).reflect(Vector3.up()), 1, 1, 0);
  });

  it('measures distance and angle', () => {
    expect(new Vector3(1, 1, 1).distanceTo(new Vector3(1, 4, 5))).toBe(5);
    expect(Vector3.right().angleTo(Vector3.up())).toBeCloseTo(Math.PI / 2, 12);
    expect(Vector3.zero().angleTo(Vector3.up())).toBe(0);
  });

  it('interpolates linearly', () => {
    expectVector(new Vector3(0, 0, 0).lerp(new Vector3(2, 4, 6), 0.5), 1, 2, 3);
  });

  it('divides by EPSILON in place of a near-zero divisor', () => {
    expectVector(new Vector3(2, 4, 6).divide(2), 1, 2, 3);

    const scalar = new Vector3(1, 2, 3).divide(0);
    expect(scalar.x).toBeCloseTo(1e9, 0);
    expect(scalar.y).toBeCloseTo(2e9, 0);
    expect(scalar.z).toBeCloseTo(3e9, 0);

    const componentwise = new Vector3(4, 1, 1).divide(new Vector3(2, 0, -1e-12));
    expect(componentwise.x).toBe(2);
    expect(componentwise.y).toBeCloseTo(1e9, 0);
    expect(componentwise.z).toBeCloseTo(1e9, 0);
  });

  it('projects onto and rejects from another vector', () => {
    const v = new Vector3(3, 4, 0);
    expectVector(v.projectOnto(new Vector3(2, 0, 0)), 3, 0, 0);
    expectVector(v.rejectFrom(new Vector3(2, 0, 0)), 0, 4, 0);
    expectVector(v.projectOnto(new Vector3(0, 0, 1e-6)), 0, 0, 0);
    expectVector(v.rejectFrom(Vector3.zero()), 3, 4, 0);
  });

  it('computes scalar and vector triple products', () => {
    const a = new Vector3(1, 2, 3);
    const b = new Vector3(4, 5, 6);
    const c = new Vector3(7, 8, 10);
    expect(a.scalarTriple(b, c)).toBe(-3);
    expect(Vector3.right().scalarTriple(Vector3.up(), new Vector3(0, 0, 1))).toBe(1);
    expectVector(a.vectorTriple(b, c), -12, 9, -2);
    expectVector(a.vectorTriple(b, c), ...a.cross(b.cross(c)).toArray());
  });

  it('mutates and returns itself from the in-place variants', () => {
    const v = new Vector3(1, 2, 3);
    expect(v.addInPlace(new Vector3(1, 1, 1))).toBe(v);
    expectVector(v, 2, 3, 4);
    expect(v.subInPlace(new Vector3(2, 2, 2))).toBe(v);
    expectVector(v, 0, 1, 2);
    expect(v.scaleInPlace(3)).toBe(v);
    expectVector(v, 0, 3, 6);
    expect(v.divideInPlace(3)).toBe(v);
    expectVector(v, 0, 1, 2);

    v.divideInPlace(0);
    expect(v.x).toBe(0);
    expect(v.y).toBeCloseTo(1e9, 0);
    expect(v.z).toBeCloseTo(2e9, 0);
  });
});

describe('Matrix4', () => {
  it('translates points but not directions', () => {
    const m = Matrix4.translation(1, 2, 3);
    expectVector(m.transformPoint(new Vector3(1, 1, 1)), 2, 3, 4);
    expectVector(m.transformDirection(new Vector3(1, 1, 1)), 1, 1, 1);
    expectVector(m.getPosition(), 1, 2, 3);
  });

  it('rotates about each axis counter-clockwise', () => {
    const q = Math.PI / 2;
    expectVector(Matrix4.rotationX(q).transformPoint(new Vector3(0, 1, 0)), 0, 0, 1);
    expectVector(Matrix4.rotationY(q).transformPoint(new Vector3(1, 0, 0)), 0, 0, -1);
    expectVector(Matrix4.rotationZ(q).transformPoint(new Vector3(1, 0, 0)), 0, 1, 0);
  });

  it('leaves a matrix unchanged when multiplied by the identity', () => {
    const m = Matrix4.product(
      Matrix4.translation(1, 2, 3),
      Matrix4.rotationY(0.7),
      Matrix4.scaling(2, 3, 4)
    );
    expect(m.multiply(Matrix4.identity()).equals(m)).toBe(true);
    expect(Matrix4.identity().multiply(m).equals(m)).toBe(true);
  });

  it('cancels a translation with its opposite', () => {
    const there = Matrix4.translation(1, -2, 3);
    const back = Matrix4.translation(-1, 2, -3);
    expect(there.multiply(back).equals(Matrix4.identity())).toBe(true);
    expect(back.multiply(there).equals(Matrix4.identity())).toBe(true);
  });

  it('applies the rightmost matrix of a product first', () => {
    const m = Matrix4.product(Matrix4.translation(1, 0, 0), Matrix4.scaling(2, 2, 2));
    expectVector(m.transformPoint(new Vector3(1, 0, 0)), 3, 0, 0);

    const reversed = Matrix4.product(Matrix4.scaling(2, 2, 2), Matrix4.translation(1, 0, 0));
    expectVector(reversed.transformPoint(new Vector3(1, 0, 0)), 4, 0, 0);
  });

  it('multiply matches product of two matrices', () => {
    const a = Matrix4.rotationY(0.3);
    const b = Matrix4.translation(1, 2, 3);
    expect(a.multiply(b).equals(Matrix4.product(a, b))).toBe(true);
  });

  it('maps the near and far planes to -1 and 1 after the perspective divide', () => {
    const p = Matrix4.perspective(90, 1, 1, 10);
    expect(p.transformPoint(new Vector3(0, 0, -1)).z).toBeCloseTo(-1, 9);
    expect(p.transformPoint(new Vector3(0, 0, -10)).z).toBeCloseTo(1, 9);
    // 90 degree fov: x = -z lands on the right edge
    expect(p.transformPoint(new Vector3(2, 0, -2)).x).toBeCloseTo(1, 9);
  });

  it('returns the undivided point when w is zero', () => {
    const p = Matrix4.perspective(90, 1, 1, 10);
    const v = p.transformPoint(new Vector3(1, 0, 0));
    expect(v.x).toBeCloseTo(1, 9);
  });

  it('rejects arrays that are not 16 long', () => {
    expect(() => Matrix4.fromArray([1, 2, 3])).toThrow('Matrix4 needs 16 values, got 3');
  });
});

describe('MathUtils', () => {
  it('truncates before clamping channels', () => {
    expect(clampByte(12.9)).toBe(12);
    expect(clampByte(300)).toBe(255);
    expect(clampByte(-3.5)).toBe(0);
  });

  it('keeps the sign when wrapping angles', () => {
    expect(wrapAngle(7)).toBeCloseTo(7 - TWO_PI, 12);
    expect(wrapAngle(-7)).toBeCloseTo(-7 + TWO_PI, 12);
    expect(wrapAngle(1)).toBe(1);
  });

  it('computes twice the signed triangle area', () => {
    expect(signedArea(0, 0, 10, 0, 0, 10)).toBe(100);
    expect(signedArea(0, 0, 0, 10, 10, 0)).toBe(-100);
  });

  it('builds edge functions that vanish on the edge', () => {
    const [a, b, c] = edgeCoefficients(0, 0, 10, 0);
    expect(a * 5 + b * 0 + c).toBe(0);
    expect(a * 0 + b * 5 + c).toBe(50);
  });

  it('converts degrees to radians', () => {
    expect(degToRad(180)).toBeCloseTo(Math.PI, 12);
  });
});
