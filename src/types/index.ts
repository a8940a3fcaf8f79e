/**
 * 类型定义统一导出
 */

// 几何类型
export type { Vec3Tuple, MatrixLayout } from './geometry';

// 旋转类型
export { ROTATION_ORDERS } from './rotation';
export type {
  RotationOrder,
  EulerTriple,
  RotationSequence,
  DecomposedTransform,
} from './rotation';

// 动画类型
export type {
  AnimationKey,
  AnimatedChannel,
  TransformSource,
  BakedTransform,
} from './animation';
