import { Vector3 } from './math/Vector3.js';
import { clampByte } from './math/MathUtils.js';
import { attenuationAt, coneFalloff, type PreparedLight } from './Light.js';

export const SPECULAR_STRENGTH = 0.5;
export const SHININESS = 32;

// Ambient light with channels already scaled to 0-1
export interface ScaledAmbient {
  r: number;
  g: number;
  b: number;
}

export type RGBTuple = [number, number, number];

interface LightTerm {
  toLight: Vector3; // unit vector from the surface towards the light
  diffuse: number;  // max(0, n·L)
  factor: number;   // intensity · cone · attenuation
}

function lightTerm(light: PreparedLight, normal: Vector3, fragment: Vector3): LightTerm {
  switch (light.kind) {
    case 'directional': {
      const toLight = light.direction.negate();
      return {
        toLight,
        diffuse: Math.max(0, normal.dot(toLight)),
        factor: light.intensity,
      };
    }
    case 'point': {
      const toLight = light.position.sub(fragment).normalize();
      return {
        toLight,
        diffuse: Math.max(0, normal.dot(toLight)),
        factor: light.intensity * attenuationAt(fragment.distanceTo(light.position)),
      };
    }
    case 'spot': {
      const toLight = light.position.sub(fragment).normalize();
      const cosTheta = light.direction.dot(toLight.negate());
      const cone = coneFalloff(cosTheta, light.cosInner, light.cosOuter);
      return {
        toLight,
        diffuse: Math.max(0, normal.dot(toLight)),
        factor: light.intensity * cone * attenuationAt(fragment.distanceTo(light.position)),
      };
    }
    default: {
      const unreachable: never = light;
      throw new Error(`Unknown light kind: ${JSON.stringify(unreachable)}`);
    }
  }
}

/**
 * Ambient plus Lambert diffuse for every light. Channels are truncated and
 * clamped to 0-255.
 */
export function shadeFlat(
  base: RGBTuple,
  normal: Vector3,
  fragment: Vector3,
  lights: readonly PreparedLight[],
  ambient: ScaledAmbient
): RGBTuple {
  const [br, bg, bb] = base;
  let r = br * ambient.r;
  let g = bg * ambient.g;
  let b = bb * ambient.b;

  for (const light of lights) {
    const term = lightTerm(light, normal, fragment);
    const k = term.diffuse * term.factor;
    r += br * light.r * k;
    g += bg * light.g * k;
    b += bb * light.b * k;
  }

  return [clampByte(r), clampByte(g), clampByte(b)];
}

/**
 * Flat shading plus a specular highlight per light, seen from viewDir.
 */
export function shadePhong(
  base: RGBTuple,
  normal: Vector3,
  fragment: Vector3,
  viewDir: Vector3,
  lights: readonly PreparedLight[],
  ambient: ScaledAmbient
): RGBTuple {
  const [br, bg, bb] = base;
  let r = br * ambient.r;
  let g = bg * ambient.g;
  let b = bb * ambient.b;

  for (const light of lights) {
    const term = lightTerm(light, normal, fragment);
    const k = term.diffuse * term.factor;
    r += br * light.r * k;
    g += bg * light.g * k;
    b += bb * light.b * k;

    // Reflection of the incoming ray about the normal: 2n(n·L) - L
    const reflectDir = term.toLight.negate().reflect(normal).normalize();
    const spec = Math.pow(Math.max(0, viewDir.dot(reflectDir)), SHININESS);
    const s = 255 * SPECULAR_STRENGTH * spec * term.factor;
    r += light.r * s;
    g += light.g * s;
    b += light.b * s;
  }

  return [clampByte(r), clampByte(g), clampByte(b)];
}
