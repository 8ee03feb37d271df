import { orbitScene } from './orbit.js';
import { spotlightScene } from './spotlight.js';
import { solarScene } from './solar.js';
import type { DemoName, DemoScene } from './DemoScene.js';

export { DEMO_NAMES, isDemoName, bindCameraKeys } from './DemoScene.js';
export type { DemoName, DemoScene } from './DemoScene.js';

export const DEMO_SCENES: Record<DemoName, DemoScene> = {
  orbit: orbitScene,
  spotlight: spotlightScene,
  solar: solarScene,
};
