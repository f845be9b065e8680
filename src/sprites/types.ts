/**
 * Shared sprite type definitions
 * 精灵共享类型定义
 */

import type { Point2D } from '../math/rotate';
import type { Sprite } from './Sprite';

/**
 * Sprite variant discriminant
 * 精灵变体判别值
 */
export type SpriteKind = 'sprite' | 'turning' | 'platformer';

/**
 * Corner points of a sprite rectangle, in rotation order:
 * (-w/2, -h/2), (+w/2, -h/2), (+w/2, +h/2), (-w/2, +h/2) relative to the center
 * 精灵矩形的角点，按旋转顺序排列
 */
export type SpritePoints = readonly [Point2D, Point2D, Point2D, Point2D];

/**
 * Capability set every sprite variant provides
 * 所有精灵变体提供的能力集合
 */
export interface ISprite {
  readonly kind: SpriteKind;
  update(): void;
  draw(): void;
  getPoints(): SpritePoints;
  kill(): void;
}

/**
 * Collection side of the sprite membership relation
 * 精灵成员关系中的集合一方
 */
export interface SpriteContainer {
  /** Unique container id 容器唯一ID */
  readonly id: number;
  includes(sprite: Sprite): boolean;
  remove(sprite: Sprite): void;
}
