import { v4 as uuidv4 } from 'uuid';
import { Transform } from './Transform.js';
import { Matrix4 } from './math/Matrix4.js';
import { Vector3 } from './math/Vector3.js';
import { wrapAngle } from './math/MathUtils.js';
import type { Mesh } from './Mesh.js';
import type { Light } from './Light.js';

export interface SceneNodeOptions {
  name?: string;
  transform?: Transform;
  mesh?: Mesh | null;
  light?: Light | null;
  visible?: boolean;
  tags?: Iterable<string>;
}

// Return false to skip the node's children
export type NodeVisitor = (node: SceneNode, depth: number) => boolean | void;

/**
 * A node in the scene graph. Owns its children, knows its parent, and may
 * carry a mesh, a light or both.
 */
export class SceneNode {
  public readonly id: string;
  public transform: Transform;
  public mesh: Mesh | null;
  public light: Light | null;
  public visible: boolean;
  public readonly tags: Set<string>;

  private _name: string;
  private children: SceneNode[] = [];
  private parent: SceneNode | null = null;

  // Bumped on the root whenever the tree's shape or names change
  private revision: number = 0;

  constructor(options: SceneNodeOptions = {}) {
    this.id = uuidv4();
    this._name = options.name ?? 'node';
    this.transform = options.transform ?? new Transform();
    this.mesh = options.mesh ?? null;
    this.light = options.light ?? null;
    this.visible = options.visible ?? true;
    this.tags = new Set(options.tags ?? []);
  }

  get name(): string {
    return this._name;
  }

  set name(value: string) {
    if (value !== this._name) {
      this._name = value;
      this.touch();
    }
  }

  getParent(): SceneNode | null {
    return this.parent;
  }

  getChildren(): readonly SceneNode[] {
    return this.children;
  }

  getRoot(): SceneNode {
    let node: SceneNode = this;
    while (node.parent) {
      node = node.parent;
    }
    return node;
  }

  isAncestorOf(node: SceneNode): boolean {
    let current = node.parent;
    while (current) {
      if (current === this) return true;
      current = current.parent;
    }
    return false;
  }

  getStructureRevision(): number {
    return this.getRoot().revision;
  }

  /**
   * Attach a child, detaching it from its previous parent first.
   * Throws when the child is this node or one of its ancestors.
   */
  add(child: SceneNode): SceneNode {
    if (child === this || child.isAncestorOf(this)) {
      throw new Error(`Cannot add "${child.name}" under "${this.name}": it would create a cycle`);
    }
    if (child.parent === this) {
      return child;
    }
    child.detach();
    child.parent = this;
    this.children.push(child);
    this.touch();
    return child;
  }

  remove(child: SceneNode): boolean {
    const index = this.children.indexOf(child);
    if (index === -1) {
      return false;
    }
    this.touch();
    this.children.splice(index, 1);
    child.parent = null;
    return true;
  }

  detach(): this {
    if (this.parent) {
      this.parent.remove(this);
    }
    return this;
  }

  private touch(): void {
    this.getRoot().revision++;
  }

  localMatrix(): Matrix4 {
    return this.transform.matrix;
  }

  // Product of every ancestor's local matrix, root first
  worldMatrix(): Matrix4 {
    const chain: SceneNode[] = [];
    let node: SceneNode | null = this;
    while (node) {
      chain.push(node);
      node = node.parent;
    }
    chain.reverse();
    return Matrix4.product(...chain.map(n => n.localMatrix()));
  }

  getWorldPosition(): Vector3 {
    return this.worldMatrix().getPosition();
  }

  // Depth-first, pre-order, children in insertion order
  traverse(visitor: NodeVisitor, depth: number = 0): void {
    if (visitor(this, depth) === false) {
      return;
    }
    for (const child of this.children) {
      child.traverse(visitor, depth + 1);
    }
  }

  getAllDescendants(): SceneNode[] {
    const result: SceneNode[] = [];
    for (const child of this.children) {
      child.traverse(node => {
        result.push(node);
      });
    }
    return result;
  }

  // First descendant with this exact name
  find(name: string): SceneNode | null {
    for (const node of this.getAllDescendants()) {
      if (node.name === name) return node;
    }
    return null;
  }

  setPosition(x: number, y: number, z: number): this {
    this.transform.setPosition(x, y, z);
    return this;
  }

  setRotation(pitch: number, yaw: number, roll: number): this {
    this.transform.setRotation(pitch, yaw, roll);
    return this;
  }

  setScale(x: number, y: number, z: number): this {
    this.transform.setScale(x, y, z);
    return this;
  }

  setPivot(x: number, y: number, z: number): this {
    this.transform.setPivot(x, y, z);
    return this;
  }

  move(dx: number, dy: number, dz: number): this {
    this.transform.translate(dx, dy, dz);
    return this;
  }

  rotate(dPitch: number, dYaw: number, dRoll: number): this {
    this.transform.rotate(dPitch, dYaw, dRoll);
    return this;
  }

  // Keep Euler angles inside (-2π, 2π) so long-running spins stay precise
  wrapRotation(): this {
    const r = this.transform.rotation;
    r.set(wrapAngle(r.x), wrapAngle(r.y), wrapAngle(r.z));
    return this;
  }

  addTag(...tags: string[]): this {
    for (const tag of tags) this.tags.add(tag);
    return this;
  }

  removeTag(tag: string): boolean {
    return this.tags.delete(tag);
  }

  hasTag(tag: string): boolean {
    return this.tags.has(tag);
  }

  toString(): string {
    const parts = [`SceneNode(${this.name}`];
    if (this.mesh) parts.push(`mesh: ${this.mesh.vertexCount}v/${this.mesh.faceCount}f`);
    if (this.light) parts.push(`light: ${this.light.kind}`);
    parts.push(`children: ${this.children.length})`);
    return parts.join(', ');
  }
}
