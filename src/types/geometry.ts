/**
 * 统一的几何类型定义
 */

/**
 * 3D 向量类型（元组形式）
 */
export type Vec3Tuple = [number, number, number];

/**
 * 4x4 矩阵展平后的元素顺序
 * - `column`: 列主序，平移位于元素 12..14
 * - `row`: 行主序，平移位于元素 3, 7, 11
 */
export type MatrixLayout = "column" | "row";
