/**
 * Sprite that turns to face the direction it travels
 * 朝向移动方向的精灵
 *
 * After moving, the angle is set from the velocity heading minus 90 degrees,
 * so art drawn pointing up faces forward.
 * 移动后角度设为速度方向减去90度，因此朝上绘制的图像会面向前方。
 */

import { Sprite } from './Sprite';
import { toDegrees } from '../math/rotate';
import type { SpriteKind } from './types';

/** Angle offset between the heading and the drawn art 航向与图像之间的角度偏移 */
export const HEADING_OFFSET_DEGREES = 90;

export class TurningSprite extends Sprite {
  get kind(): SpriteKind {
    return 'turning';
  }

  update(): void {
    super.update();
    this.angle = toDegrees(Math.atan2(this.changeY, this.changeX)) - HEADING_OFFSET_DEGREES;
  }
}
