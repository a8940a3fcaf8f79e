import { describe, it, expect } from 'vitest';
import { Euler } from './Euler';
import { Mat4 } from './Mat4';
import { ROTATION_ORDERS } from '../../types';

const TWO_PI = Math.PI * 2;

function isWholeTurn(angle: number): boolean {
  const turns = angle / TWO_PI;
  return Math.abs(turns - Math.round(turns)) < 1e-9;
}

describe('Euler', () => {
  it('should convert between degrees and radians', () => {
    const e = Euler.fromDegrees([180, 90, -45], 'ZXY');
    expect(e.x).toBeCloseTo(Math.PI, 12);
    expect(e.y).toBeCloseTo(Math.PI / 2, 12);
    expect(e.z).toBeCloseTo(-Math.PI / 4, 12);
    expect(e.order).toBe('ZXY');

    const triple = e.toTriple();
    expect(triple.order).toBe('ZXY');
    expect(triple.angles[0]).toBeCloseTo(180, 12);
    expect(triple.angles[1]).toBeCloseTo(90, 12);
    expect(triple.angles[2]).toBeCloseTo(-45, 12);
  });

  describe('flip', () => {
    it('should flip the axes in order position, not axis position', () => {
      // ZXY: Z first, X middle, Y last
      const [x, y, z] = Euler.fromDegrees([10, 20, 30], 'ZXY').flip().toDegrees();
      expect(x).toBeCloseTo(170, 9);
      expect(y).toBeCloseTo(200, 9);
      expect(z).toBeCloseTo(210, 9);
    });

    for (const order of ROTATION_ORDERS) {
      it(`should describe the same orientation for ${order}`, () => {
        const e = Euler.fromDegrees([25, -70, 140], order);
        const original = Mat4.fromEuler(e);
        expect(Mat4.fromEuler(e.flip()).equalsApprox(original, 1e-9)).toBe(true);
      });

      it(`should undo itself for ${order}`, () => {
        const e = Euler.fromDegrees([25, -70, 140], order);
        const twice = e.flip().flip();
        expect(isWholeTurn(twice.x - e.x)).toBe(true);
        expect(isWholeTurn(twice.y - e.y)).toBe(true);
        expect(isWholeTurn(twice.z - e.z)).toBe(true);
      });
    }

    it('should not modify the original', () => {
      const e = new Euler(0.1, 0.2, 0.3, 'XYZ');
      e.flip();
      expect(e.toArray()).toEqual([0.1, 0.2, 0.3]);
    });
  });

  it('should measure squared distance over all three axes', () => {
    const a = new Euler(0, 0, 0, 'XYZ');
    const b = new Euler(1, 2, 2, 'XYZ');
    expect(a.distanceSquared(b)).toBe(9);
  });
});
