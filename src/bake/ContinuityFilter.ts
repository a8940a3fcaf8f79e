/**
 * ContinuityFilter - Euler filter for a sequence of rotations
 *
 * Replaces each frame's Euler triple with the equivalent representation
 * (2π wraps per axis, or the flipped solution) closest to the previous
 * filtered frame. Orientations are unchanged; only the angle values move.
 */

import { Euler } from '../core/math/Euler';
import { MalformedSequenceError } from '../core/errors';
import { TWO_PI } from '../utils/angle';
import { isRotationOrder } from '../utils/rotationOrder';
import type { EulerTriple, RotationOrder, RotationSequence, Vec3Tuple } from '../types';

/**
 * Shift `current` by whole turns until it is within π of `previous`.
 * A difference of exactly π is left alone. Non-finite input gives NaN.
 */
export function unwindAngle(previous: number, current: number): number {
  const difference = previous - current;
  if (!Number.isFinite(difference)) {
    return NaN;
  }

  // Whole turns first, then at most one more step toward `previous`
  let unwound = current + Math.trunc(difference / TWO_PI) * TWO_PI;
  if (previous - unwound > Math.PI) {
    unwound += TWO_PI;
  } else if (unwound - previous > Math.PI) {
    unwound -= TWO_PI;
  }
  return unwound;
}

/**
 * Unwind each axis independently against the previous rotation
 */
export function unwindEuler(previous: Euler, current: Euler): Euler {
  return new Euler(
    unwindAngle(previous.x, current.x),
    unwindAngle(previous.y, current.y),
    unwindAngle(previous.z, current.z),
    current.order,
  );
}

export function flipEuler(euler: Euler): Euler {
  return euler.flip();
}

/**
 * Pick between the unwound rotation and its unwound flip, whichever lies
 * closer to `previous`
 */
export function resolveEuler(previous: Euler, current: Euler): Euler {
  const unwound = unwindEuler(previous, current);
  const flipped = unwindEuler(previous, current.flip());

  if (unwound.distanceSquared(previous) > flipped.distanceSquared(previous)) {
    return flipped;
  }
  return unwound;
}

function validateSequence(rotations: RotationSequence): RotationOrder {
  if (rotations.length === 0) {
    throw new MalformedSequenceError('Rotation sequence is empty');
  }

  const order = rotations[0].order;
  if (!isRotationOrder(order)) {
    throw new MalformedSequenceError(`Rotation sequence has an invalid order: "${String(order)}"`);
  }

  const mixed = rotations.findIndex((rotation) => rotation.order !== order);
  if (mixed !== -1) {
    throw new MalformedSequenceError(
      `Rotation sequence mixes orders: frame 0 is ${order}, frame ${mixed} is ${rotations[mixed].order}`,
    );
  }

  return order;
}

/**
 * Filter a whole rotation sequence (degrees in, degrees out).
 *
 * With more than two frames the forward pass starts at the second frame,
 * which is kept as given, and the first frame is resolved afterwards against
 * the filtered second frame. A spurious flip is most common on the first
 * frame, so it must not become the reference for the rest.
 */
export function filterRotations(rotations: RotationSequence): EulerTriple[] {
  const order = validateSequence(rotations);
  const start = rotations.length > 2 ? 1 : 0;

  const filtered: EulerTriple[] = [];
  let previous: Euler | null = null;

  for (let i = start; i < rotations.length; i++) {
    const current = Euler.fromTriple(rotations[i]);

    if (previous === null) {
      previous = current;
      const [x, y, z] = rotations[i].angles;
      filtered.push({ angles: [x, y, z], order });
      continue;
    }

    previous = resolveEuler(previous, current);
    filtered.push(previous.toTriple());
  }

  if (start === 1) {
    const first = resolveEuler(Euler.fromTriple(filtered[0]), Euler.fromTriple(rotations[0]));
    filtered.unshift(first.toTriple());
  }

  return filtered;
}

/**
 * Filter bare degree triples that share one rotation order
 */
export function filterRotationValues(values: readonly Vec3Tuple[], order: RotationOrder): Vec3Tuple[] {
  return filterRotations(values.map((angles) => ({ angles, order }))).map(
    (triple) => triple.angles,
  );
}
