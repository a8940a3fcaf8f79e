/**
 * Errors thrown while decomposing, filtering or baking transforms
 */

export class BakeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A rotation order token outside XYZ, XZY, YXZ, YZX, ZXY, ZYX
 */
export class InvalidRotationOrderError extends BakeError {
  readonly token: string;

  constructor(token: string) {
    super(`Invalid rotation order: "${token}" (expected one of XYZ, XZY, YXZ, YZX, ZXY, ZYX)`);
    this.token = token;
  }
}

/**
 * Empty rotation sequence, mixed rotation orders, or values that don't line
 * up with their frames
 */
export class MalformedSequenceError extends BakeError {}

export class InvalidFrameRangeError extends BakeError {
  readonly first: number;
  readonly last: number;

  constructor(first: number, last: number) {
    super(`Invalid frame range: ${first}-${last}`);
    this.first = first;
    this.last = last;
  }
}
