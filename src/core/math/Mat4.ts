import { Vec3 } from "./Vec3";
import { Euler } from "./Euler";
import { InvalidRotationOrderError } from "../errors";
import { axisIndices } from "../../utils/rotationOrder";
import type { MatrixLayout, RotationOrder } from "../../types";

/** Past this |sin| of the middle angle the first and last axes line up */
const GIMBAL_THRESHOLD = 0.9999999;

function clamp(value: number): number {
  return Math.min(Math.max(value, -1), 1);
}

/**
 * Mat4 - 4x4 Matrix utility class
 * Provides affine transform composition and decomposition
 * Storage is column-major order (translation in elements 12, 13, 14)
 */
export class Mat4 {
  elements: Float64Array; // 16 elements, column-major order

  constructor() {
    this.elements = new Float64Array(16);
  }

  // Factory methods
  static identity(): Mat4 {
    const m = new Mat4();
    m.elements[0] = 1;
    m.elements[5] = 1;
    m.elements[10] = 1;
    m.elements[15] = 1;
    return m;
  }

  /**
   * Build a matrix from 16 values
   * @param values - Flat matrix values
   * @param layout - Element order of `values`
   */
  static fromArray(values: ArrayLike<number>, layout: MatrixLayout = "column"): Mat4 {
    if (values.length !== 16) {
      throw new RangeError(`Mat4: expected 16 values, got ${values.length}`);
    }

    const m = new Mat4();
    for (let i = 0; i < 16; i++) {
      m.elements[i] = values[i];
    }
    return layout === "row" ? m.transpose() : m;
  }

  static fromTranslation(v: Vec3): Mat4 {
    const m = Mat4.identity();
    m.elements[12] = v.x;
    m.elements[13] = v.y;
    m.elements[14] = v.z;
    return m;
  }

  static fromScale(v: Vec3): Mat4 {
    const m = new Mat4();
    m.elements[0] = v.x;
    m.elements[5] = v.y;
    m.elements[10] = v.z;
    m.elements[15] = 1;
    return m;
  }

  /**
   * Rotation about a single axis
   * @param axis - 0 for X, 1 for Y, 2 for Z
   * @param angle - Rotation angle in radians
   */
  static fromAxisRotation(axis: number, angle: number): Mat4 {
    const m = Mat4.identity();
    const e = m.elements;
    const c = Math.cos(angle);
    const s = Math.sin(angle);

    switch (axis) {
      case 0:
        e[5] = c;
        e[6] = s;
        e[9] = -s;
        e[10] = c;
        break;
      case 1:
        e[0] = c;
        e[2] = -s;
        e[8] = s;
        e[10] = c;
        break;
      case 2:
        e[0] = c;
        e[1] = s;
        e[4] = -s;
        e[5] = c;
        break;
      default:
        throw new RangeError(`Mat4: invalid axis index ${axis}`);
    }

    return m;
  }

  /**
   * Rotation matrix for Euler angles; the first axis of the order is applied first
   */
  static fromEuler(euler: Euler): Mat4 {
    const [a0, a1, a2] = axisIndices(euler.order);
    const angles = euler.toArray();

    return Mat4.fromAxisRotation(a2, angles[a2])
      .multiply(Mat4.fromAxisRotation(a1, angles[a1]))
      .multiply(Mat4.fromAxisRotation(a0, angles[a0]));
  }

  static compose(position: Vec3, rotation: Euler, scale: Vec3): Mat4 {
    const m = Mat4.fromEuler(rotation);
    const e = m.elements;

    // Apply scale
    e[0] *= scale.x;
    e[1] *= scale.x;
    e[2] *= scale.x;
    e[4] *= scale.y;
    e[5] *= scale.y;
    e[6] *= scale.y;
    e[8] *= scale.z;
    e[9] *= scale.z;
    e[10] *= scale.z;

    // Apply translation
    e[12] = position.x;
    e[13] = position.y;
    e[14] = position.z;

    return m;
  }

  // Operations
  multiply(m: Mat4): Mat4 {
    const result = new Mat4();
    const a = this.elements;
    const b = m.elements;
    const r = result.elements;

    for (let i = 0; i < 4; i++) {
      for (let j = 0; j < 4; j++) {
        r[i * 4 + j] =
          a[j] * b[i * 4] +
          a[j + 4] * b[i * 4 + 1] +
          a[j + 8] * b[i * 4 + 2] +
          a[j + 12] * b[i * 4 + 3];
      }
    }

    return result;
  }

  transpose(): Mat4 {
    const m = new Mat4();
    const e = this.elements;
    const r = m.elements;

    for (let col = 0; col < 4; col++) {
      for (let row = 0; row < 4; row++) {
        r[row * 4 + col] = e[col * 4 + row];
      }
    }

    return m;
  }

  // Basis axes
  xAxis(): Vec3 {
    return Vec3.fromArray(this.elements, 0);
  }

  yAxis(): Vec3 {
    return Vec3.fromArray(this.elements, 4);
  }

  zAxis(): Vec3 {
    return Vec3.fromArray(this.elements, 8);
  }

  getTranslation(): Vec3 {
    return Vec3.fromArray(this.elements, 12);
  }

  // Decomposition
  /**
   * Translation part only; rotation and scale are reset to identity
   */
  translationOnly(): Mat4 {
    return Mat4.fromTranslation(this.getTranslation());
  }

  /**
   * Rotation part only: translation dropped and every basis axis normalized.
   * A zero-length axis yields NaN elements.
   */
  rotationOnly(): Mat4 {
    const m = Mat4.identity();
    const axes = [this.xAxis(), this.yAxis(), this.zAxis()];

    axes.forEach((axis, i) => {
      const unit = axis.divide(axis.length());
      m.elements[i * 4] = unit.x;
      m.elements[i * 4 + 1] = unit.y;
      m.elements[i * 4 + 2] = unit.z;
    });

    return m;
  }

  /**
   * Scale part only: a diagonal matrix of the basis axis lengths
   */
  scaleOnly(): Mat4 {
    return Mat4.fromScale(
      new Vec3(this.xAxis().length(), this.yAxis().length(), this.zAxis().length()),
    );
  }

  /**
   * Extract Euler angles from a pure rotation matrix.
   * Every order has its own closed form; near gimbal lock the first
   * applied angle is set to 0.
   */
  toEuler(order: RotationOrder): Euler {
    const e = this.elements;
    const m11 = e[0], m12 = e[4], m13 = e[8];
    const m21 = e[1], m22 = e[5], m23 = e[9];
    const m31 = e[2], m32 = e[6], m33 = e[10];

    let x: number;
    let y: number;
    let z: number;

    switch (order) {
      case "XYZ":
        y = Math.asin(-clamp(m31));
        if (Math.abs(m31) < GIMBAL_THRESHOLD) {
          x = Math.atan2(m32, m33);
          z = Math.atan2(m21, m11);
        } else {
          x = 0;
          z = Math.atan2(-m12, m22);
        }
        break;
      case "XZY":
        z = Math.asin(clamp(m21));
        if (Math.abs(m21) < GIMBAL_THRESHOLD) {
          x = Math.atan2(-m23, m22);
          y = Math.atan2(-m31, m11);
        } else {
          x = 0;
          y = Math.atan2(m13, m33);
        }
        break;
      case "YXZ":
        x = Math.asin(clamp(m32));
        if (Math.abs(m32) < GIMBAL_THRESHOLD) {
          y = Math.atan2(-m31, m33);
          z = Math.atan2(-m12, m22);
        } else {
          y = 0;
          z = Math.atan2(m21, m11);
        }
        break;
      case "YZX":
        z = Math.asin(-clamp(m12));
        if (Math.abs(m12) < GIMBAL_THRESHOLD) {
          x = Math.atan2(m32, m22);
          y = Math.atan2(m13, m11);
        } else {
          x = Math.atan2(-m23, m33);
          y = 0;
        }
        break;
      case "ZXY":
        x = Math.asin(-clamp(m23));
        if (Math.abs(m23) < GIMBAL_THRESHOLD) {
          y = Math.atan2(m13, m33);
          z = Math.atan2(m21, m22);
        } else {
          y = Math.atan2(-m31, m11);
          z = 0;
        }
        break;
      case "ZYX":
        y = Math.asin(clamp(m13));
        if (Math.abs(m13) < GIMBAL_THRESHOLD) {
          x = Math.atan2(-m23, m33);
          z = Math.atan2(-m12, m11);
        } else {
          x = Math.atan2(m32, m22);
          z = 0;
        }
        break;
      default: {
        const unknown: never = order;
        throw new InvalidRotationOrderError(String(unknown));
      }
    }

    return new Euler(x, y, z, order);
  }

  // Utility
  /**
   * Flat copy of the elements in the requested layout
   */
  toArray(layout: MatrixLayout = "column"): number[] {
    const source = layout === "row" ? this.transpose() : this;
    return Array.from(source.elements);
  }

  /**
   * Check if this matrix approximately equals another matrix
   */
  equalsApprox(m: Mat4, epsilon: number = 1e-6): boolean {
    for (let i = 0; i < 16; i++) {
      if (!(Math.abs(this.elements[i] - m.elements[i]) < epsilon)) {
        return false;
      }
    }
    return true;
  }
}
