/**
 * Rotation order validation
 */

import { InvalidRotationOrderError } from '../core/errors';
import { ROTATION_ORDERS } from '../types';
import type { RotationOrder } from '../types';

/** Axis indices (x = 0, y = 1, z = 2) in application order */
const ORDER_AXES: Readonly<Record<RotationOrder, Readonly<[number, number, number]>>> = {
  XYZ: [0, 1, 2],
  XZY: [0, 2, 1],
  YXZ: [1, 0, 2],
  YZX: [1, 2, 0],
  ZXY: [2, 0, 1],
  ZYX: [2, 1, 0],
};

export function isRotationOrder(value: unknown): value is RotationOrder {
  return ROTATION_ORDERS.some((order) => order === value);
}

/**
 * Parse a rotation order token such as "zxy" or " ZXY ".
 * Unknown tokens throw instead of falling back to a default order.
 */
export function parseRotationOrder(token: string): RotationOrder {
  const normalized = token.trim().toUpperCase();
  if (!isRotationOrder(normalized)) {
    throw new InvalidRotationOrderError(token);
  }
  return normalized;
}

/**
 * Axis indices in application order, e.g. "ZXY" -> [2, 0, 1]
 */
export function axisIndices(order: RotationOrder): [number, number, number] {
  const axes = ORDER_AXES[order];
  if (axes === undefined) {
    throw new InvalidRotationOrderError(String(order));
  }
  return [axes[0], axes[1], axes[2]];
}
