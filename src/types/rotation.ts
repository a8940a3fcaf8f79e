import type { Vec3Tuple } from "./geometry";

/**
 * Every supported rotation order.
 * "ZXY" rotates about Z first, then X, then Y.
 */
export const ROTATION_ORDERS = ["XYZ", "XZY", "YXZ", "YZX", "ZXY", "ZYX"] as const;

export type RotationOrder = (typeof ROTATION_ORDERS)[number];

/**
 * Euler angles in degrees, indexed by axis (x, y, z) rather than by
 * position in the order. Only meaningful together with its order.
 */
export interface EulerTriple {
  angles: Vec3Tuple;
  order: RotationOrder;
}

/**
 * One EulerTriple per frame, all sharing one order
 */
export type RotationSequence = readonly EulerTriple[];

/**
 * Result of splitting an affine matrix into its components
 */
export interface DecomposedTransform {
  translation: Vec3Tuple;
  /** degrees */
  rotation: EulerTriple;
  /** rounded to 6 decimal digits */
  scale: Vec3Tuple;
}
