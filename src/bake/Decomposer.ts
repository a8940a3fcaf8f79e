/**
 * Decomposer - splits an affine matrix into translation, rotation and scale
 */

import { Vec3 } from '../core/math/Vec3';
import type { Mat4 } from '../core/math/Mat4';
import type { DecomposedTransform, RotationOrder } from '../types';

/** Decimal digits kept on scale, so 0.9999999999 reads back as 1 */
export const SCALE_DIGITS = 6;

/**
 * Decompose a column-major matrix into translation, Euler rotation (degrees)
 * and scale. A zero-scale axis gives undefined rotation angles.
 */
export function decompose(matrix: Mat4, order: RotationOrder): DecomposedTransform {
  const translation = matrix.translationOnly().getTranslation();
  const rotation = matrix.rotationOnly().toEuler(order);

  const scaleMatrix = matrix.scaleOnly();
  const scale = new Vec3(
    scaleMatrix.xAxis().length(),
    scaleMatrix.yAxis().length(),
    scaleMatrix.zAxis().length(),
  ).round(SCALE_DIGITS);

  return {
    translation: translation.toArray(),
    rotation: rotation.toTriple(),
    scale: scale.toArray(),
  };
}
