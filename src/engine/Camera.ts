import { Vector3 } from './math/Vector3.js';
import { Matrix4 } from './math/Matrix4.js';
import { clamp } from './math/MathUtils.js';

export const MIN_FOV = 10;
export const MAX_FOV = 160;

export interface CameraOptions {
  fov?: number;   // degrees
  near?: number;
  far?: number;
  zoom?: number;
}

export class Camera {
  public position: Vector3;
  public rotation: Vector3; // pitch (x), yaw (y), roll (z) in radians

  public fov: number;   // Vertical field of view in degrees
  public near: number;  // Near clipping plane
  public far: number;   // Far clipping plane
  public zoom: number;  // Added to view-space z before projection

  constructor(options: CameraOptions = {}) {
    this.position = Vector3.zero();
    this.rotation = Vector3.zero();
    this.fov = clamp(options.fov ?? 60, MIN_FOV, MAX_FOV);
    this.near = options.near ?? 0.1;
    this.far = options.far ?? 100;
    this.zoom = options.zoom ?? 1.0;
  }

  setPosition(x: number, y: number, z: number): this {
    this.position.set(x, y, z);
    return this;
  }

  setRotation(pitch: number, yaw: number, roll: number): this {
    this.rotation.set(pitch, yaw, roll);
    return this;
  }

  translate(dx: number, dy: number, dz: number): this {
    this.position.x += dx;
    this.position.y += dy;
    this.position.z += dz;
    return this;
  }

  rotate(dPitch: number, dYaw: number, dRoll: number): this {
    this.rotation.x += dPitch;
    this.rotation.y += dYaw;
    this.rotation.z += dRoll;
    return this;
  }

  setFov(degrees: number): this {
    this.fov = clamp(degrees, MIN_FOV, MAX_FOV);
    return this;
  }

  setZoom(zoom: number): this {
    this.zoom = zoom;
    return this;
  }

  // Rx(-pitch) · Ry(-yaw) · Rz(-roll) · T(-position)
  getViewMatrix(): Matrix4 {
    return Matrix4.product(
      Matrix4.rotationX(-this.rotation.x),
      Matrix4.rotationY(-this.rotation.y),
      Matrix4.rotationZ(-this.rotation.z),
      Matrix4.translation(-this.position.x, -this.position.y, -this.position.z)
    );
  }

  getProjectionMatrix(aspect: number): Matrix4 {
    return Matrix4.perspective(this.fov, aspect, this.near, this.far);
  }

  toString(): string {
    return `Camera(pos: ${this.position}, rot: ${this.rotation}, fov: ${this.fov.toFixed(1)}, zoom: ${this.zoom.toFixed(2)})`;
  }
}
