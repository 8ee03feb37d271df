import type { Engine } from '../engine/Engine.js';

export type DemoName = 'orbit' | 'spotlight' | 'solar';

export const DEMO_NAMES: readonly DemoName[] = ['orbit', 'spotlight', 'solar'];

export interface DemoScene {
  name: DemoName;
  title: string;
  // Populate the engine: nodes, lights, camera, key bindings and update hook
  setup(engine: Engine): void;
}

export function isDemoName(value: string): value is DemoName {
  return DEMO_NAMES.some(name => name === value);
}

/**
 * WASD moves, Q/E raises and lowers, IJKL looks around, +/- zoom, [ and ]
 * change the field of view, R puts the camera back at stepBack.
 */
export function bindCameraKeys(engine: Engine, step: number, stepBack: number): void {
  engine.setKeyBinding('w', () => engine.moveCamera(0, 0, step));
  engine.setKeyBinding('s', () => engine.moveCamera(0, 0, -step));
  engine.setKeyBinding('a', () => engine.moveCamera(-step, 0, 0));
  engine.setKeyBinding('d', () => engine.moveCamera(step, 0, 0));
  engine.setKeyBinding('q', () => engine.moveCamera(0, step, 0));
  engine.setKeyBinding('e', () => engine.moveCamera(0, -step, 0));
  engine.setKeyBinding('i', () => engine.rotateCamera(-0.1, 0, 0));
  engine.setKeyBinding('k', () => engine.rotateCamera(0.1, 0, 0));
  engine.setKeyBinding('j', () => engine.rotateCamera(0, 0.1, 0));
  engine.setKeyBinding('l', () => engine.rotateCamera(0, -0.1, 0));
  engine.setKeyBinding('+', () => engine.zoomCamera(0.25));
  engine.setKeyBinding('-', () => engine.zoomCamera(-0.25));
  engine.setKeyBinding('[', () => engine.changeFov(-5));
  engine.setKeyBinding(']', () => engine.changeFov(5));
  engine.setKeyBinding('r', () => engine.resetCamera(stepBack));
  engine.setKeyBinding('t', () => engine.setShowStatus(!engine.isShowingStatus()));
}
