import { Vector3 } from '../engine/math/Vector3.js';
import { degToRad } from '../engine/math/MathUtils.js';
import { Mesh } from '../engine/Mesh.js';
import { Color } from '../utils/Colors.js';
import { bindCameraKeys, type DemoScene } from './DemoScene.js';

// One sphere on a floor under a warm spotlight
export const spotlightScene: DemoScene = {
  name: 'spotlight',
  title: 'Spotlight',
  setup(engine) {
    engine.addSpotLight(
      new Vector3(0, -6, 0),
      new Vector3(0, -1, 0),
      new Color(255, 200, 150),
      5.0,
      degToRad(40),
      degToRad(60),
      'spot'
    );
    engine.setAmbientLight(60, 60, 70);

    const sphere = engine.addMeshNode(
      Mesh.createUvSphere(1.5, 32, 16, { color: new Color(200, 100, 100), material: 'phong' }),
      'sphere'
    );
    sphere.setPosition(0, -1.5, 0);
    engine.addMeshNode(Mesh.createPlane(20, 20, 25, 25), 'floor');

    engine.setCameraPosition(0, -5, -8);
    engine.setCameraFov(60);
    engine.rotateCamera(-0.6, 0, 0);

    engine.setOnUpdate(dt => {
      sphere.rotate(0.3 * dt, 0.5 * dt, 0);
    });

    bindCameraKeys(engine, 0.5, -8);
  },
};
