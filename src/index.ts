/**
 * 变换烘焙库
 * 库入口文件 - 导出所有公共 API
 */

// ============================================
// 统一类型定义
// ============================================
export type {
  Vec3Tuple,
  MatrixLayout,
  RotationOrder,
  EulerTriple,
  RotationSequence,
  DecomposedTransform,
  AnimationKey,
  AnimatedChannel,
  TransformSource,
  BakedTransform,
} from './types';

export { ROTATION_ORDERS } from './types';

// ============================================
// 工具函数
// ============================================
export {
  TWO_PI,
  degToRad,
  radToDeg,
  tupleToRadians,
  tupleToDegrees,
  isRotationOrder,
  parseRotationOrder,
  axisIndices,
} from './utils';

// ============================================
// Core
// ============================================
export { Vec3 } from './core/math/Vec3';
export { Mat4 } from './core/math/Mat4';
export { Euler } from './core/math/Euler';
export {
  BakeError,
  InvalidRotationOrderError,
  MalformedSequenceError,
  InvalidFrameRangeError,
} from './core/errors';

// ============================================
// Bake
// ============================================
export { decompose, SCALE_DIGITS } from './bake/Decomposer';
export {
  unwindAngle,
  unwindEuler,
  flipEuler,
  resolveEuler,
  filterRotations,
  filterRotationValues,
} from './bake/ContinuityFilter';
export { toChannels } from './bake/channels';
export {
  bakeTransform,
  bakeTransforms,
  frameRange,
  bakedName,
  DEFAULT_BAKE_OPTIONS,
} from './bake/TransformBaker';
export type { BakeOptions } from './bake/TransformBaker';
