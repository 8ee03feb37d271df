import { Vector3, EPSILON } from './math/Vector3.js';
import { Matrix4 } from './math/Matrix4.js';
import { degToRad } from './math/MathUtils.js';
import { Color } from '../utils/Colors.js';

export interface DirectionalLight {
  kind: 'directional';
  direction: Vector3; // unit, the way the light travels
  color: Color;
  intensity: number;
}

export interface PointLight {
  kind: 'point';
  position: Vector3;
  color: Color;
  intensity: number;
}

export interface SpotLight {
  kind: 'spot';
  position: Vector3;
  direction: Vector3; // unit
  color: Color;
  intensity: number;
  innerAngle: number; // half-angle, radians
  outerAngle: number; // half-angle, radians
}

export type Light = DirectionalLight | PointLight | SpotLight;

export function createDirectionalLight(
  direction: Vector3,
  color: Color = Color.white(),
  intensity: number = 1
): DirectionalLight {
  return { kind: 'directional', direction: direction.normalize(), color, intensity };
}

export function createPointLight(
  position: Vector3,
  color: Color = Color.white(),
  intensity: number = 1
): PointLight {
  return { kind: 'point', position, color, intensity };
}

export function createSpotLight(
  position: Vector3,
  direction: Vector3,
  color: Color = Color.white(),
  intensity: number = 1,
  innerAngle: number = degToRad(15),
  outerAngle: number = degToRad(20)
): SpotLight {
  return {
    kind: 'spot',
    position,
    direction: direction.normalize(),
    color,
    intensity,
    innerAngle,
    outerAngle,
  };
}

// Falloff with distance for point and spot lights
export function attenuationAt(distance: number): number {
  return 1 / (1 + 0.1 * distance + 0.02 * distance * distance);
}

/**
 * Cone factor from the cosine of the angle between the spot axis and the
 * direction to the fragment: 0 outside the outer cone, 1 inside the inner
 * cone, linear in between.
 */
export function coneFalloff(cosTheta: number, cosInner: number, cosOuter: number): number {
  if (cosTheta < cosOuter) return 0;
  if (cosTheta > cosInner) return 1;
  const span = cosInner - cosOuter;
  if (span <= EPSILON) return 1;
  return (cosTheta - cosOuter) / span;
}

export function spotConeFactor(light: SpotLight, fragment: Vector3): number {
  const toFragment = fragment.sub(light.position).normalize();
  const cosTheta = light.direction.dot(toFragment);
  return coneFalloff(cosTheta, Math.cos(light.innerAngle), Math.cos(light.outerAngle));
}

// World-space light with its colour scaled to 0-1, ready for shading
export type PreparedLight =
  | {
      kind: 'directional';
      direction: Vector3;
      r: number; g: number; b: number;
      intensity: number;
    }
  | {
      kind: 'point';
      position: Vector3;
      r: number; g: number; b: number;
      intensity: number;
    }
  | {
      kind: 'spot';
      position: Vector3;
      direction: Vector3;
      r: number; g: number; b: number;
      intensity: number;
      cosInner: number;
      cosOuter: number;
    };

export const COLOR_SCALE = 1 / 255;

/**
 * Move a light into world space using the matrix of the node that carries it.
 */
export function prepareLight(light: Light, world: Matrix4): PreparedLight {
  const r = light.color.r * COLOR_SCALE;
  const g = light.color.g * COLOR_SCALE;
  const b = light.color.b * COLOR_SCALE;

  switch (light.kind) {
    case 'directional':
      return {
        kind: 'directional',
        direction: world.transformDirection(light.direction).normalize(),
        r, g, b,
        intensity: light.intensity,
      };
    case 'point':
      return {
        kind: 'point',
        position: world.transformPoint(light.position),
        r, g, b,
        intensity: light.intensity,
      };
    case 'spot':
      return {
        kind: 'spot',
        position: world.transformPoint(light.position),
        direction: world.transformDirection(light.direction).normalize(),
        r, g, b,
        intensity: light.intensity,
        cosInner: Math.cos(light.innerAngle),
        cosOuter: Math.cos(light.outerAngle),
      };
    default: {
      const unreachable: never = light;
      throw new Error(`Unknown light kind: ${JSON.stringify(unreachable)}`);
    }
  }
}

export function describeLight(light: Light): string {
  switch (light.kind) {
    case 'directional':
      return `directional dir=${light.direction} ${light.color} x${light.intensity}`;
    case 'point':
      return `point pos=${light.position} ${light.color} x${light.intensity}`;
    case 'spot':
      return `spot pos=${light.position} dir=${light.direction} ${light.color} x${light.intensity}`;
  }
}
