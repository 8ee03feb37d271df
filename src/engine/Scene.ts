import { SceneNode, type NodeVisitor } from './SceneNode.js';
import { globToRegExp } from '../utils/glob.js';

export interface SceneStats {
  nodes: number;
  meshNodes: number;
  lightNodes: number;
  vertices: number;
  faces: number;
}

/**
 * Owns the root node and answers lookups over the whole graph. The name
 * index is rebuilt lazily whenever the graph's structure revision moves.
 */
export class Scene {
  public readonly root: SceneNode;

  private nameIndex: Map<string, SceneNode[]> = new Map();
  private ordered: SceneNode[] = [];
  private indexedRevision: number = -1;

  constructor(rootName: string = 'root') {
    this.root = new SceneNode({ name: rootName });
  }

  add(node: SceneNode, parent: SceneNode = this.root): SceneNode {
    if (parent !== this.root && !this.contains(parent)) {
      throw new Error(`Parent "${parent.name}" is not part of this scene`);
    }
    return parent.add(node);
  }

  // Removes the node and its subtree
  remove(node: SceneNode): boolean {
    if (node === this.root || !this.contains(node)) {
      return false;
    }
    node.detach();
    return true;
  }

  contains(node: SceneNode): boolean {
    return node.getRoot() === this.root;
  }

  clear(): void {
    for (const child of [...this.root.getChildren()]) {
      this.root.remove(child);
    }
  }

  traverse(visitor: NodeVisitor): void {
    this.root.traverse(visitor);
  }

  private ensureIndex(): void {
    const revision = this.root.getStructureRevision();
    if (revision === this.indexedRevision) {
      return;
    }

    this.nameIndex.clear();
    this.ordered = [];
    this.root.traverse(node => {
      this.ordered.push(node);
      const list = this.nameIndex.get(node.name);
      if (list) {
        list.push(node);
      } else {
        this.nameIndex.set(node.name, [node]);
      }
    });
    this.indexedRevision = revision;
  }

  // Every node in traversal order, root first
  allNodes(): readonly SceneNode[] {
    this.ensureIndex();
    return this.ordered;
  }

  // First node with this exact name
  getNode(name: string): SceneNode | null {
    this.ensureIndex();
    const list = this.nameIndex.get(name);
    return list ? list[0] : null;
  }

  getNodeById(id: string): SceneNode | null {
    return this.allNodes().find(node => node.id === id) ?? null;
  }

  // Shell-style match on node names (*, ?, [...])
  findByName(pattern: string): SceneNode[] {
    const regex = globToRegExp(pattern);
    return this.allNodes().filter(node => regex.test(node.name));
  }

  // Nodes carrying any of the tags
  findByTag(...tags: string[]): SceneNode[] {
    return this.allNodes().filter(node => tags.some(tag => node.tags.has(tag)));
  }

  // Nodes carrying all of the tags
  findByAllTags(...tags: string[]): SceneNode[] {
    if (tags.length === 0) return [];
    return this.allNodes().filter(node => tags.every(tag => node.tags.has(tag)));
  }

  meshNodes(): readonly SceneNode[] {
    return this.allNodes().filter(node => node.mesh !== null);
  }

  lightNodes(): readonly SceneNode[] {
    return this.allNodes().filter(node => node.light !== null);
  }

  getStats(): SceneStats {
    let vertices = 0;
    let faces = 0;
    let meshNodes = 0;
    let lightNodes = 0;
    const all = this.allNodes();

    for (const node of all) {
      if (node.mesh) {
        meshNodes++;
        vertices += node.mesh.vertexCount;
        faces += node.mesh.faceCount;
      }
      if (node.light) {
        lightNodes++;
      }
    }

    return { nodes: all.length, meshNodes, lightNodes, vertices, faces };
  }
}
