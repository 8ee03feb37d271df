export const DEG_TO_RAD = Math.PI / 180;
export const TWO_PI = Math.PI * 2;

export function degToRad(degrees: number): number {
  return degrees * DEG_TO_RAD;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

// Truncates toward zero before clamping, matching how channel sums are quantized
export function clampByte(value: number): number {
  return clamp(Math.trunc(value), 0, 255);
}

export function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * t;
}

// Keeps the sign, like C fmod
export function wrapAngle(angle: number): number {
  return angle % TWO_PI;
}

// Coefficients (A, B, C) of the line through (x0, y0) and (x1, y1):
// A*x + B*y + C is the signed edge function used by the rasterizer
export function edgeCoefficients(
  x0: number, y0: number,
  x1: number, y1: number
): [number, number, number] {
  return [y0 - y1, x1 - x0, x0 * y1 - y0 * x1];
}

// Twice the signed area of triangle (a, b, c); positive is a front face in screen space
export function signedArea(
  ax: number, ay: number,
  bx: number, by: number,
  cx: number, cy: number
): number {
  return (bx - ax) * (cy - ay) - (by - ay) * (cx - ax);
}
