import { Vector3 } from './math/Vector3.js';
import { Matrix4 } from './math/Matrix4.js';

export interface TransformOptions {
  position?: Vector3;
  rotation?: Vector3; // pitch (x), yaw (y), roll (z), radians
  scale?: Vector3;
  pivot?: Vector3;
}

/**
 * Local placement of a scene node. Rotation and scale happen about the
 * pivot:
 *
 *   matrix = T(position) · T(pivot) · Ry · Rx · Rz · S(scale) · T(-pivot)
 */
export class Transform {
  public position: Vector3;
  public rotation: Vector3;
  public scale: Vector3;
  public pivot: Vector3;

  constructor(options: TransformOptions = {}) {
    this.position = options.position ?? Vector3.zero();
    this.rotation = options.rotation ?? Vector3.zero();
    this.scale = options.scale ?? Vector3.one();
    this.pivot = options.pivot ?? Vector3.zero();
  }

  clone(): Transform {
    return new Transform({
      position: this.position.clone(),
      rotation: this.rotation.clone(),
      scale: this.scale.clone(),
      pivot: this.pivot.clone(),
    });
  }

  setPosition(x: number, y: number, z: number): this {
    this.position.set(x, y, z);
    return this;
  }

  translate(dx: number, dy: number, dz: number): this {
    this.position.addInPlace(new Vector3(dx, dy, dz));
    return this;
  }

  setRotation(pitch: number, yaw: number, roll: number): this {
    this.rotation.set(pitch, yaw, roll);
    return this;
  }

  rotate(dPitch: number, dYaw: number, dRoll: number): this {
    this.rotation.addInPlace(new Vector3(dPitch, dYaw, dRoll));
    return this;
  }

  setScale(x: number, y: number, z: number): this {
    this.scale.set(x, y, z);
    return this;
  }

  setUniformScale(s: number): this {
    return this.setScale(s, s, s);
  }

  setPivot(x: number, y: number, z: number): this {
    this.pivot.set(x, y, z);
    return this;
  }

  // Built on every access; callers may edit the vectors directly
  get matrix(): Matrix4 {
    const { position: p, pivot: v, rotation: r, scale: s } = this;
    return Matrix4.product(
      Matrix4.translation(p.x, p.y, p.z),
      Matrix4.translation(v.x, v.y, v.z),
      Matrix4.rotationY(r.y),
      Matrix4.rotationX(r.x),
      Matrix4.rotationZ(r.z),
      Matrix4.scaling(s.x, s.y, s.z),
      Matrix4.translation(-v.x, -v.y, -v.z)
    );
  }

  // Local space to parent space
  transformPoint(point: Vector3): Vector3 {
    return this.matrix.transformPoint(point);
  }

  toString(): string {
    return `Transform(pos: ${this.position}, rot: ${this.rotation}, scale: ${this.scale}, pivot: ${this.pivot})`;
  }
}
