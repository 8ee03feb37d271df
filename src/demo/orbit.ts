import { Vector3 } from '../engine/math/Vector3.js';
import { Mesh } from '../engine/Mesh.js';
import { Color } from '../utils/Colors.js';
import { bindCameraKeys, type DemoScene } from './DemoScene.js';

// A wireframe cube carrying three shapes around with it as it turns
export const orbitScene: DemoScene = {
  name: 'orbit',
  title: 'Orbit',
  setup(engine) {
    const cube = engine.addMeshNode(Mesh.createCube(2.5, { material: 'wireframe' }), 'cube');
    const sphere = engine.addMeshNode(Mesh.createUvSphere(0.5), 'sphere', cube);
    const cylinder = engine.addMeshNode(Mesh.createCylinder(0.4, 1.5), 'cylinder', cube);
    const torus = engine.addMeshNode(Mesh.createTorus(1.0, 0.5, 30, 10, { material: 'phong' }), 'torus', cube);

    sphere.setPosition(5, 0, 0);
    cylinder.setPosition(0, 0, 6.5);
    torus.setPosition(0, 2, 8);
    cube.addTag('parent');
    for (const child of [sphere, cylinder, torus]) {
      child.addTag('orbiter');
    }

    engine.resetCamera(-15);
    engine.setClearColor(20, 30, 40);
    engine.setAmbientLight(60, 60, 60);
    engine.addDirectionalLight(new Vector3(0.5, 0.7, -1.0), Color.white(), 0.4, 'sun');
    engine.addPointLight(new Vector3(0, -3.5, 0), Color.white(), 3.0, 'lamp');

    let orbitAngle = 0;
    engine.setOnUpdate(dt => {
      orbitAngle += 0.5 * dt;
      cube.setRotation(cube.transform.rotation.x + 0.5 * dt, orbitAngle, 0);
      sphere.rotate(0, 0.6 * dt, 0);
      cylinder.rotate(0, 0, 1.8 * dt);
      torus.rotate(1.2 * dt, 0.7 * dt, 0);
    });

    bindCameraKeys(engine, 0.5, -15);
  },
};
