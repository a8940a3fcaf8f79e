import type { Vec3Tuple } from "../../types";

/**
 * Vec3 - 3D Vector utility class
 * Used for matrix basis axes, translations and scales
 */
export class Vec3 {
  x: number;
  y: number;
  z: number;

  constructor(x: number = 0, y: number = 0, z: number = 0) {
    this.x = x;
    this.y = y;
    this.z = z;
  }

  // Factory methods
  static fromArray(arr: ArrayLike<number>, offset: number = 0): Vec3 {
    return new Vec3(arr[offset], arr[offset + 1], arr[offset + 2]);
  }

  // Basic operations (return new Vec3)
  divide(scalar: number): Vec3 {
    return new Vec3(this.x / scalar, this.y / scalar, this.z / scalar);
  }

  length(): number {
    return Math.sqrt(this.x * this.x + this.y * this.y + this.z * this.z);
  }

  /**
   * Round every component to a fixed number of decimal digits
   */
  round(digits: number): Vec3 {
    const factor = 10 ** digits;
    return new Vec3(
      Math.round(this.x * factor) / factor,
      Math.round(this.y * factor) / factor,
      Math.round(this.z * factor) / factor,
    );
  }

  // Utility
  toArray(): Vec3Tuple {
    return [this.x, this.y, this.z];
  }

  /**
   * Check if this vector approximately equals another vector
   */
  equalsApprox(v: Vec3, epsilon: number = 1e-6): boolean {
    return (
      Math.abs(this.x - v.x) < epsilon &&
      Math.abs(this.y - v.y) < epsilon &&
      Math.abs(this.z - v.z) < epsilon
    );
  }
}
