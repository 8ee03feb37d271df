import { describe, it, expect } from 'vitest';
import { Vector3 } from '../engine/math/Vector3.js';
import { Transform } from '../engine/Transform.js';
import { SceneNode } from '../engine/SceneNode.js';
import { Scene } from '../engine/Scene.js';
import { Mesh } from '../engine/Mesh.js';
import { createPointLight } from '../engine/Light.js';
import { globMatch } from '../utils/glob.js';

function expectVector(v: Vector3, x: number, y: number, z: number): void {
  expect(v.x).toBeCloseTo(x, 9);
  expect(v.y).toBeCloseTo(y, 9);
  expect(v.z).toBeCloseTo(z, 9);
}

describe('Transform', () => {
  it('is the identity by default', () => {
    expectVector(new Transform().transformPoint(new Vector3(1, 2, 3)), 1, 2, 3);
  });

  it('rotates and scales about the pivot', () => {
    const t = new Transform().setPivot(1, 0, 0).setRotation(0, Math.PI / 2, 0);
    expectVector(t.transformPoint(new Vector3(1, 0, 0)), 1, 0, 0);
    expectVector(t.transformPoint(new Vector3(2, 0, 0)), 1, 0, -1);

    const s = new Transform().setPivot(1, 0, 0).setUniformScale(2);
    expectVector(s.transformPoint(new Vector3(2, 0, 0)), 3, 0, 0);
  });

  it('sees edits made directly to its vectors', () => {
    const t = new Transform();
    t.position.x = 5;
    expectVector(t.transformPoint(Vector3.zero()), 5, 0, 0);
  });
});

describe('SceneNode', () => {
  it('composes world matrices from the root down', () => {
    const parent = new SceneNode({ name: 'parent' }).setPosition(1, 0, 0);
    const child = parent.add(new SceneNode({ name: 'child' })).setPosition(0, 2, 0);
    expectVector(child.getWorldPosition(), 1, 2, 0);

    parent.setRotation(0, Math.PI / 2, 0);
    child.setPosition(1, 0, 0);
    expectVector(child.getWorldPosition(), 1, 0, -1);
  });

  it('builds each world matrix as the parent world matrix times the local one', () => {
    const parent = new SceneNode({ name: 'parent' }).setPosition(1, 2, 3).setRotation(0.3, 0.5, 0);
    const child = parent.add(new SceneNode({ name: 'child' })).setPosition(0, 0, 4).setScale(2, 2, 2);
    const grandchild = child.add(new SceneNode({ name: 'grandchild' })).setRotation(0, 0, 1.2).setPivot(1, 0, 0);

    expect(parent.worldMatrix().equals(parent.localMatrix(), 1e-12)).toBe(true);
    expect(child.worldMatrix().equals(parent.worldMatrix().multiply(child.localMatrix()), 1e-12)).toBe(true);
    expect(grandchild.worldMatrix().equals(child.worldMatrix().multiply(grandchild.localMatrix()), 1e-12)).toBe(true);
  });

  it('adds and removes tags', () => {
    const node = new SceneNode({ name: 'tagged' }).addTag('red', 'round');
    expect(node.removeTag('red')).toBe(true);
    expect(node.removeTag('red')).toBe(false);
    expect(node.hasTag('red')).toBe(false);
    expect(node.hasTag('round')).toBe(true);
  });

  it('refuses to create cycles', () => {
    const a = new SceneNode({ name: 'a' });
    const b = a.add(new SceneNode({ name: 'b' }));
    expect(() => b.add(a)).toThrow('Cannot add "a" under "b": it would create a cycle');
    expect(() => a.add(a)).toThrow('Cannot add "a" under "a": it would create a cycle');
  });

  it('moves a child that is added to a new parent', () => {
    const first = new SceneNode({ name: 'first' });
    const second = new SceneNode({ name: 'second' });
    const child = first.add(new SceneNode({ name: 'child' }));
    second.add(child);
    expect(first.getChildren()).toHaveLength(0);
    expect(second.getChildren()).toEqual([child]);
    expect(child.getParent()).toBe(second);
  });

  it('traverses depth-first and can skip a subtree', () => {
    const root = new SceneNode({ name: 'root' });
    const a = root.add(new SceneNode({ name: 'a' }));
    a.add(new SceneNode({ name: 'a1' }));
    root.add(new SceneNode({ name: 'b' }));

    const all: string[] = [];
    root.traverse((node, depth) => {
      all.push(`${node.name}:${depth}`);
    });
    expect(all).toEqual(['root:0', 'a:1', 'a1:2', 'b:1']);

    const pruned: string[] = [];
    root.traverse(node => {
      pruned.push(node.name);
      return node !== a;
    });
    expect(pruned).toEqual(['root', 'a', 'b']);
  });

  it('lists descendants and finds them by name', () => {
    const root = new SceneNode({ name: 'root' });
    const a = root.add(new SceneNode({ name: 'a' }));
    const a1 = a.add(new SceneNode({ name: 'a1' }));
    expect(root.getAllDescendants()).toEqual([a, a1]);
    expect(root.find('a1')).toBe(a1);
    expect(root.find('missing')).toBeNull();
  });

  it('wraps rotation while keeping its sign', () => {
    const node = new SceneNode().setRotation(7, -7, 1);
    node.wrapRotation();
    expect(node.transform.rotation.x).toBeCloseTo(7 - 2 * Math.PI, 12);
    expect(node.transform.rotation.y).toBeCloseTo(-7 + 2 * Math.PI, 12);
    expect(node.transform.rotation.z).toBe(1);
  });

  it('gives every node a distinct id', () => {
    expect(new SceneNode().id).not.toBe(new SceneNode().id);
  });
});

describe('Scene', () => {
  function buildScene() {
    const scene = new Scene();
    const sun = scene.add(new SceneNode({ name: 'Sun', tags: ['star', 'body'] }));
    const earth = scene.add(new SceneNode({ name: 'Earth', tags: ['planet', 'body'] }), sun);
    const moon = scene.add(new SceneNode({ name: 'Moon', tags: ['body'] }), earth);
    const rover = scene.add(new SceneNode({ name: 'rover-1' }));
    return { scene, sun, earth, moon, rover };
  }

  it('finds nodes by exact name, id and glob', () => {
    const { scene, earth, moon, rover } = buildScene();
    expect(scene.getNode('Earth')).toBe(earth);
    expect(scene.getNode('Pluto')).toBeNull();
    expect(scene.getNodeById(moon.id)).toBe(moon);
    expect(scene.findByName('*o*').map(n => n.name)).toEqual(['root', 'Moon', 'rover-1']);
    expect(scene.findByName('rover-?')).toEqual([rover]);
    expect(scene.findByName('[EM]*').map(n => n.name)).toEqual(['Earth', 'Moon']);
  });

  it('finds nodes by any tag or by all tags', () => {
    const { scene, sun, earth } = buildScene();
    expect(scene.findByTag('star', 'planet')).toEqual([sun, earth]);
    expect(scene.findByAllTags('planet', 'body')).toEqual([earth]);
    expect(scene.findByAllTags()).toEqual([]);
  });

  it('keeps its name index current after renames and removals', () => {
    const { scene, earth, moon } = buildScene();
    expect(scene.getNode('Moon')).toBe(moon);
    moon.name = 'Luna';
    expect(scene.getNode('Moon')).toBeNull();
    expect(scene.getNode('Luna')).toBe(moon);

    expect(scene.remove(earth)).toBe(true);
    expect(scene.getNode('Luna')).toBeNull();
    expect(scene.contains(moon)).toBe(false);
    expect(scene.remove(earth)).toBe(false);
  });

  it('never removes the root', () => {
    const scene = new Scene();
    expect(scene.remove(scene.root)).toBe(false);
  });

  it('rejects parents outside the scene', () => {
    const scene = new Scene();
    const stray = new SceneNode({ name: 'stray' });
    expect(() => scene.add(new SceneNode(), stray)).toThrow('Parent "stray" is not part of this scene');
  });

  it('counts nodes, meshes, lights and geometry', () => {
    const scene = new Scene();
    scene.add(new SceneNode({ name: 'cube', mesh: Mesh.createCube() }));
    scene.add(new SceneNode({ name: 'lamp', light: createPointLight(new Vector3(0, 2, 0)) }));
    expect(scene.getStats()).toEqual({ nodes: 3, meshNodes: 1, lightNodes: 1, vertices: 8, faces: 12 });

    scene.clear();
    expect(scene.getStats()).toEqual({ nodes: 1, meshNodes: 0, lightNodes: 0, vertices: 0, faces: 0 });
  });
});

describe('globMatch', () => {
  it('supports wildcards and character classes', () => {
    expect(globMatch('*Sphere', 'Child Sphere')).toBe(true);
    expect(globMatch('*Sphere', 'Sphere 2')).toBe(false);
    expect(globMatch('node?', 'node7')).toBe(true);
    expect(globMatch('node?', 'node')).toBe(false);
    expect(globMatch('[a-c]x', 'bx')).toBe(true);
    expect(globMatch('[!a-c]x', 'bx')).toBe(false);
    expect(globMatch('[!a-c]x', 'dx')).toBe(true);
  });

  it('treats regular expression characters literally', () => {
    expect(globMatch('a.b', 'a.b')).toBe(true);
    expect(globMatch('a.b', 'axb')).toBe(false);
    expect(globMatch('(x)+', '(x)+')).toBe(true);
    expect(globMatch('[abc', '[abc')).toBe(true);
  });
});
