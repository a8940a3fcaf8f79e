import { describe, it, expect } from 'vitest';
import { decompose } from './Decomposer';
import { Mat4 } from '../core/math/Mat4';
import { Vec3 } from '../core/math/Vec3';
import { Euler } from '../core/math/Euler';
import { ROTATION_ORDERS } from '../types';

describe('decompose', () => {
  describe('round trip', () => {
    for (const order of ROTATION_ORDERS) {
      it(`should recover translation, rotation and scale for ${order}`, () => {
        const m = Mat4.compose(
          new Vec3(1.5, -2, 30),
          Euler.fromDegrees([12, -34, 56], order),
          new Vec3(2, 0.5, 3),
        );
        const { translation, rotation, scale } = decompose(m, order);

        expect(translation).toEqual([1.5, -2, 30]);
        expect(scale).toEqual([2, 0.5, 3]);
        expect(rotation.order).toBe(order);
        expect(rotation.angles[0]).toBeCloseTo(12, 5);
        expect(rotation.angles[1]).toBeCloseTo(-34, 5);
        expect(rotation.angles[2]).toBeCloseTo(56, 5);
      });

      it(`should reproduce the rotation matrix for ${order} past the principal range`, () => {
        const source = Euler.fromDegrees([170, 100, -250], order);
        const m = Mat4.compose(new Vec3(0, 0, 0), source, new Vec3(1, 4, 1));
        const { rotation } = decompose(m, order);

        const recomposed = Mat4.fromEuler(Euler.fromTriple(rotation));
        expect(recomposed.equalsApprox(Mat4.fromEuler(source), 1e-5)).toBe(true);
      });
    }
  });

  it('should read translation from a row-major matrix', () => {
    const m = Mat4.fromArray([1, 0, 0, 5, 0, 1, 0, 6, 0, 0, 1, 7, 0, 0, 0, 1], 'row');
    expect(decompose(m, 'ZXY').translation).toEqual([5, 6, 7]);
  });

  it('should round scale to 6 decimal digits', () => {
    const m = Mat4.fromScale(new Vec3(0.9999999999, 1.0000004, 2.1234567));
    expect(decompose(m, 'ZXY').scale).toEqual([1, 1, 2.123457]);
  });

  it('should report degrees', () => {
    const m = Mat4.fromEuler(Euler.fromDegrees([0, 0, 90], 'ZXY'));
    expect(decompose(m, 'ZXY').rotation.angles[2]).toBeCloseTo(90, 9);
  });

  it('should give the same result for the same input', () => {
    const m = Mat4.compose(
      new Vec3(1, 2, 3),
      Euler.fromDegrees([40, 50, 60], 'YZX'),
      new Vec3(1, 1, 1),
    );
    expect(decompose(m, 'YZX')).toEqual(decompose(Mat4.fromArray(m.toArray()), 'YZX'));
  });

  it('should not flag a zero-scale axis', () => {
    const { rotation, scale } = decompose(Mat4.fromScale(new Vec3(0, 1, 1)), 'ZXY');
    expect(scale).toEqual([0, 1, 1]);
    expect(Number.isNaN(rotation.angles[2])).toBe(true);
  });
});
