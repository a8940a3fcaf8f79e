/**
 * 工具函数统一导出
 */

// 角度换算
export {
  TWO_PI,
  degToRad,
  radToDeg,
  tupleToRadians,
  tupleToDegrees,
} from './angle';

// 旋转顺序
export { isRotationOrder, parseRotationOrder, axisIndices } from './rotationOrder';
