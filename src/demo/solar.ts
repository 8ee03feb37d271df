import { Vector3 } from '../engine/math/Vector3.js';
import { Mesh } from '../engine/Mesh.js';
import { SceneNode } from '../engine/SceneNode.js';
import { Color } from '../utils/Colors.js';
import { logInfo } from '../utils/Log.js';
import { bindCameraKeys, type DemoScene } from './DemoScene.js';

/**
 * Parent, child and grandchild spheres. The parent swings along x and spins;
 * the child orbits it and carries the grandchild with it.
 */
export const solarScene: DemoScene = {
  name: 'solar',
  title: 'Solar',
  setup(engine) {
    engine.addDirectionalLight(new Vector3(0.5, 0.5, -0.5), Color.white(), 1.0, 'sun');
    engine.setCameraPosition(0, 0, -14);

    const parent = engine.addMeshNode(
      Mesh.createUvSphere(2.0, 20, 10, { color: new Color(100, 100, 255) }),
      'Parent Sphere'
    );
    parent.addTag('parent', 'celestial_body');

    const child = parent.add(new SceneNode({
      name: 'Child Sphere',
      mesh: Mesh.createUvSphere(1.0, 20, 10, { color: new Color(255, 100, 100) }),
      tags: ['child', 'celestial_body'],
    }));
    child.setPosition(0, 0, 6);

    const grandchild = child.add(new SceneNode({
      name: 'Grandchild Sphere',
      mesh: Mesh.createUvSphere(0.5, 20, 10, { color: new Color(255, 255, 0), material: 'phong' }),
      tags: ['grandchild', 'celestial_body'],
    }));
    grandchild.setPosition(0, 0, 2.5);

    const spheres = engine.findByName('*Sphere').map(n => n.name);
    logInfo(`Nodes matching '*Sphere': ${spheres.join(', ')}`);
    logInfo(`Descendants of ${parent.name}: ${parent.getAllDescendants().map(n => n.name).join(', ')}`);

    let elapsed = 0;
    engine.setOnUpdate(dt => {
      elapsed += dt;
      parent.setPosition(Math.sin(elapsed) * 5, 0, 0);
      parent.rotate(0, (Math.PI * dt) / 2, 0);
      child.rotate(0, Math.PI * dt, 0);
    });

    bindCameraKeys(engine, 1, -14);
  },
};
