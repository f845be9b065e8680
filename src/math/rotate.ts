/**
 * Point rotation utilities for sprite geometry
 * 用于精灵几何的点旋转工具
 *
 * Angles are in degrees. A positive angle rotates counter-clockwise in a
 * y-up coordinate system:
 *   x' = dx * cos(a) - dy * sin(a)
 *   y' = dx * sin(a) + dy * cos(a)
 * 角度以度为单位。在y轴向上的坐标系中，正角度表示逆时针旋转。
 */

/**
 * Immutable 2D point
 * 不可变的2D点
 */
export interface Point2D {
  readonly x: number;
  readonly y: number;
}

const DEG_TO_RAD = Math.PI / 180;

/**
 * Convert degrees to radians
 * 角度转弧度
 */
export function toRadians(degrees: number): number {
  return degrees * DEG_TO_RAD;
}

/**
 * Convert radians to degrees
 * 弧度转角度
 */
export function toDegrees(radians: number): number {
  return radians / DEG_TO_RAD;
}

/**
 * Rotate a point about a pivot
 * 绕枢轴点旋转一个点
 *
 * @param px Point X 点X
 * @param py Point Y 点Y
 * @param pivotX Pivot X 枢轴X
 * @param pivotY Pivot Y 枢轴Y
 * @param angleDegrees Rotation angle in degrees 旋转角度（度）
 * @returns Rotated point 旋转后的点
 */
export function rotate(
  px: number,
  py: number,
  pivotX: number,
  pivotY: number,
  angleDegrees: number
): Point2D {
  const rad = toRadians(angleDegrees);
  const c = Math.cos(rad);
  const s = Math.sin(rad);

  const dx = px - pivotX;
  const dy = py - pivotY;

  return {
    x: dx * c - dy * s + pivotX,
    y: dx * s + dy * c + pivotY,
  };
}
