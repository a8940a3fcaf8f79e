/**
 * Angle helpers
 */

import type { Vec3Tuple } from '../types';

export const TWO_PI = Math.PI * 2;

export function degToRad(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

export function radToDeg(radians: number): number {
  return (radians * 180) / Math.PI;
}

export function tupleToRadians(degrees: Readonly<Vec3Tuple>): Vec3Tuple {
  return [degToRad(degrees[0]), degToRad(degrees[1]), degToRad(degrees[2])];
}

export function tupleToDegrees(radians: Readonly<Vec3Tuple>): Vec3Tuple {
  return [radToDeg(radians[0]), radToDeg(radians[1]), radToDeg(radians[2])];
}
