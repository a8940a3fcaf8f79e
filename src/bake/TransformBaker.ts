/**
 * TransformBaker - samples a transform source over a frame range and bakes
 * its world matrix into translate/rotate/scale (or raw matrix) channels
 */

import { decompose } from './Decomposer';
import { filterRotations } from './ContinuityFilter';
import { toChannels } from './channels';
import { InvalidFrameRangeError, InvalidRotationOrderError } from '../core/errors';
import { parseRotationOrder } from '../utils/rotationOrder';
import type {
  BakedTransform,
  EulerTriple,
  RotationOrder,
  TransformSource,
  Vec3Tuple,
} from '../types';

/**
 * Bake options
 */
export interface BakeOptions {
  /** First frame, inclusive */
  first: number;
  /** Last frame, inclusive */
  last: number;
  /** Rotation order of the baked rotations; 'current' keeps the source's own */
  rotationOrder?: RotationOrder | 'current';
  /** Run the Euler filter over the baked rotations */
  eulerFilter?: boolean;
  /** Bake the row-major matrix instead of translate/rotate/scale (keeps skew) */
  useMatrix?: boolean;
  /** Collapse channels that never change to a static value */
  cleanup?: boolean;
  /** Log a summary per baked source */
  verbose?: boolean;
  /** Called after each sampled frame */
  onProgress?: (sampled: number, total: number) => void;
}

export const DEFAULT_BAKE_OPTIONS: Readonly<Required<Omit<BakeOptions, 'first' | 'last' | 'onProgress'>>> = {
  rotationOrder: 'current',
  eulerFilter: true,
  useMatrix: false,
  cleanup: false,
  verbose: false,
};

const BAKED_SUFFIX = '_BAKED';

/**
 * Every frame from `first` to `last`, inclusive
 */
export function frameRange(first: number, last: number): number[] {
  if (!Number.isInteger(first) || !Number.isInteger(last) || last < first) {
    throw new InvalidFrameRangeError(first, last);
  }
  return Array.from({ length: last - first + 1 }, (_, i) => first + i);
}

/**
 * Name of the baked copy, never stacking the suffix
 */
export function bakedName(name: string): string {
  return `${name.split(BAKED_SUFFIX).join('')}${BAKED_SUFFIX}`;
}

function resolveOrder(source: TransformSource, requested: RotationOrder | 'current'): RotationOrder {
  return parseRotationOrder(requested === 'current' ? source.rotationOrder : requested);
}

/**
 * Bake one source
 */
export function bakeTransform(source: TransformSource, options: BakeOptions): BakedTransform {
  const {
    first,
    last,
    rotationOrder = DEFAULT_BAKE_OPTIONS.rotationOrder,
    eulerFilter = DEFAULT_BAKE_OPTIONS.eulerFilter,
    useMatrix = DEFAULT_BAKE_OPTIONS.useMatrix,
    cleanup = DEFAULT_BAKE_OPTIONS.cleanup,
    verbose = DEFAULT_BAKE_OPTIONS.verbose,
    onProgress,
  } = options;

  const frames = frameRange(first, last);
  const order = resolveOrder(source, rotationOrder);

  const translations: Vec3Tuple[] = [];
  const rotations: EulerTriple[] = [];
  const scales: Vec3Tuple[] = [];
  const matrices: number[][] = [];

  frames.forEach((frame, i) => {
    const matrix = source.matrixAt(frame);

    if (useMatrix) {
      matrices.push(matrix.toArray('row'));
    } else {
      const { translation, rotation, scale } = decompose(matrix, order);
      translations.push(translation);
      rotations.push(rotation);
      scales.push(scale);
    }

    onProgress?.(i + 1, frames.length);
  });

  const name = bakedName(source.name);

  if (verbose) {
    console.log(
      `TransformBaker: ${name} baked ${frames.length} frames (${first}-${last}), ` +
        (useMatrix ? 'matrix' : `order=${order}, eulerFilter=${eulerFilter}`),
    );
  }

  if (useMatrix) {
    return { name, order, frames, matrix: toChannels(matrices, frames, cleanup) };
  }

  const rotate = eulerFilter ? filterRotations(rotations) : rotations;

  return {
    name,
    order,
    frames,
    translate: toChannels(translations, frames, cleanup),
    rotate: toChannels(
      rotate.map((rotation) => rotation.angles),
      frames,
      cleanup,
    ),
    scale: toChannels(scales, frames, cleanup),
  };
}

/**
 * Bake several sources with the same options.
 * Sources whose own rotation order can't be used with 'current' are skipped.
 */
export function bakeTransforms(
  sources: readonly TransformSource[],
  options: BakeOptions,
): BakedTransform[] {
  const { rotationOrder = DEFAULT_BAKE_OPTIONS.rotationOrder } = options;

  // An explicit order is the caller's mistake, not the source's
  if (rotationOrder !== 'current') {
    parseRotationOrder(rotationOrder);
  }

  const baked: BakedTransform[] = [];

  for (const source of sources) {
    try {
      baked.push(bakeTransform(source, options));
    } catch (error) {
      if (!(error instanceof InvalidRotationOrderError)) {
        throw error;
      }
      console.warn(`TransformBaker: skipping ${source.name}: ${error.message}`);
    }
  }

  return baked;
}
