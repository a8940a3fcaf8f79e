/**
 * Keyframe types produced by a bake
 */

import type { Mat4 } from "../core/math/Mat4";
import type { RotationOrder } from "./rotation";

export interface AnimationKey {
  frame: number;
  value: number;
}

/**
 * A single scalar channel, either held at one value or keyed per frame
 */
export type AnimatedChannel =
  | { kind: "static"; value: number }
  | { kind: "animated"; keys: AnimationKey[] };

/**
 * Anything a world matrix can be sampled from
 */
export interface TransformSource {
  readonly name: string;
  /** The source's own rotation order token, used when baking with 'current' */
  readonly rotationOrder: string;
  /** World matrix at a frame, column-major */
  matrixAt(frame: number): Mat4;
}

/**
 * Baked channels for one source, ready to be written back by the host.
 * Either the TRS channels or the matrix channels are present.
 */
export interface BakedTransform {
  name: string;
  order: RotationOrder;
  frames: number[];
  /** x, y, z */
  translate?: AnimatedChannel[];
  /** x, y, z in degrees */
  rotate?: AnimatedChannel[];
  /** x, y, z */
  scale?: AnimatedChannel[];
  /** 16 channels, row-major */
  matrix?: AnimatedChannel[];
}
