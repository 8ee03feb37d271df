import { describe, it, expect } from 'vitest';
import { Engine } from '../engine/Engine.js';
import { DEMO_NAMES, DEMO_SCENES, isDemoName } from '../demo/index.js';

function createEngine(): Engine {
  let now = 0;
  return new Engine({
    width: 60,
    height: 20,
    clock: () => {
      now += 33;
      return now;
    },
  });
}

describe('demo scenes', () => {
  it('recognises scene names', () => {
    expect(isDemoName('orbit')).toBe(true);
    expect(isDemoName('galaxy')).toBe(false);
  });

  for (const name of DEMO_NAMES) {
    it(`${name} builds and renders frames`, () => {
      const engine = createEngine();
      DEMO_SCENES[name].setup(engine);
      expect(engine.scene.meshNodes().length).toBeGreaterThan(0);
      expect(engine.scene.lightNodes().length).toBeGreaterThan(0);

      for (let i = 0; i < 3; i++) {
        expect(engine.renderFrame()).toHaveLength(20);
      }
    });
  }

  it('orbit hangs three shapes off the cube', () => {
    const engine = createEngine();
    DEMO_SCENES.orbit.setup(engine);
    const cube = engine.getNode('cube');
    expect(cube?.getChildren().map(n => n.name)).toEqual(['sphere', 'cylinder', 'torus']);
    expect(cube?.mesh?.material).toBe('wireframe');
    expect(engine.findByTag('orbiter')).toHaveLength(3);
  });

  it('solar tags every body', () => {
    const engine = createEngine();
    DEMO_SCENES.solar.setup(engine);
    expect(engine.findByAllTags('celestial_body').map(n => n.name)).toEqual([
      'Parent Sphere',
      'Child Sphere',
      'Grandchild Sphere',
    ]);
    expect(engine.findByName('*Sphere')).toHaveLength(3);
  });

  it('binds the camera keys', () => {
    const engine = createEngine();
    DEMO_SCENES.spotlight.setup(engine);
    const startZ = engine.camera.position.z;
    expect(engine.handleKey('w')).toBe(true);
    expect(engine.camera.position.z).toBeCloseTo(startZ + 0.5, 9);
    engine.handleKey('r');
    expect(engine.camera.position.z).toBe(-8);
  });
});
