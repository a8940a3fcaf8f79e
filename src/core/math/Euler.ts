import { axisIndices } from "../../utils/rotationOrder";
import { tupleToDegrees, tupleToRadians } from "../../utils/angle";
import type { EulerTriple, RotationOrder, Vec3Tuple } from "../../types";

/**
 * Euler - Euler angles in radians with their rotation order
 * Angles are stored per axis; the order decides how they compose
 */
export class Euler {
  x: number;
  y: number;
  z: number;
  readonly order: RotationOrder;

  constructor(x: number, y: number, z: number, order: RotationOrder) {
    this.x = x;
    this.y = y;
    this.z = z;
    this.order = order;
  }

  // Factory methods
  static fromArray(angles: Readonly<Vec3Tuple>, order: RotationOrder): Euler {
    return new Euler(angles[0], angles[1], angles[2], order);
  }

  static fromDegrees(angles: Readonly<Vec3Tuple>, order: RotationOrder): Euler {
    return Euler.fromArray(tupleToRadians(angles), order);
  }

  static fromTriple(triple: EulerTriple): Euler {
    return Euler.fromDegrees(triple.angles, triple.order);
  }

  /**
   * The other Euler solution for the same orientation:
   * first axis + pi, middle axis pi - angle, last axis + pi
   */
  flip(): Euler {
    const [first, middle, last] = axisIndices(this.order);
    const angles = this.toArray();

    angles[first] += Math.PI;
    angles[middle] = Math.PI - angles[middle];
    angles[last] += Math.PI;

    return Euler.fromArray(angles, this.order);
  }

  distanceSquared(e: Euler): number {
    const dx = this.x - e.x;
    const dy = this.y - e.y;
    const dz = this.z - e.z;
    return dx * dx + dy * dy + dz * dz;
  }

  // Utility
  toArray(): Vec3Tuple {
    return [this.x, this.y, this.z];
  }

  toDegrees(): Vec3Tuple {
    return tupleToDegrees(this.toArray());
  }

  toTriple(): EulerTriple {
    return { angles: this.toDegrees(), order: this.order };
  }
}
