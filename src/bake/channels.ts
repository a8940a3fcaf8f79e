/**
 * Per-frame values to keyframe channels
 */

import { MalformedSequenceError } from '../core/errors';
import type { AnimatedChannel, AnimationKey } from '../types';

function isConstant(keys: readonly AnimationKey[]): boolean {
  return keys.every((key) => key.value === keys[0].value);
}

/**
 * Split per-frame vectors into one channel per component.
 * @param values - One vector per frame
 * @param frames - Frame number of each vector
 * @param cleanup - Collapse channels that never change to a static value
 */
export function toChannels(
  values: readonly (readonly number[])[],
  frames: readonly number[],
  cleanup: boolean = false,
): AnimatedChannel[] {
  if (values.length === 0 || frames.length === 0) {
    return [];
  }

  // A single sample is not animation
  if (values.length === 1) {
    return values[0].map((value): AnimatedChannel => ({ kind: 'static', value }));
  }

  if (values.length !== frames.length) {
    throw new MalformedSequenceError(
      `Got ${values.length} values for ${frames.length} frames`,
    );
  }

  const width = values[0].length;
  const channels: AnimatedChannel[] = [];

  for (let component = 0; component < width; component++) {
    const keys = values.map((value, i) => ({ frame: frames[i], value: value[component] }));

    if (cleanup && isConstant(keys)) {
      channels.push({ kind: 'static', value: keys[0].value });
    } else {
      channels.push({ kind: 'animated', keys });
    }
  }

  return channels;
}
