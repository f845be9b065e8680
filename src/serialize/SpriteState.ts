/**
 * Plain-data sprite state for save games and replays
 * 用于存档和回放的纯数据精灵状态
 *
 * Textures are external resources and are not captured; only the index of
 * the active frame is. Restoring needs a sprite whose frame list was rebuilt
 * by the caller.
 * 纹理属于外部资源，不会被捕获，只记录当前帧的索引。
 * 恢复时需要调用方已重建帧列表的精灵。
 */

import { Sprite } from '../sprites/Sprite';
import { PlatformerSprite } from '../sprites/PlatformerSprite';
import type { Facing } from '../sprites/PlatformerSprite';
import type { SpriteKind } from '../sprites/types';
import { IndexOutOfRangeError, TypeMismatchError } from '../errors/SpriteErrors';

export interface SpriteState {
  kind: SpriteKind;
  centerX: number;
  centerY: number;
  angle: number;
  scale: number;
  changeX: number;
  changeY: number;
  changeAngle: number;
  alpha: number;
  transparent: boolean;
  applyGravity: boolean;
  width: number;
  height: number;
  textureIndex: number;
  /** Platformer only 仅平台精灵 */
  facing?: Facing;
  /** Platformer only 仅平台精灵 */
  lastSwapX?: number;
}

const NUMBER_FIELDS = [
  'centerX',
  'centerY',
  'angle',
  'scale',
  'changeX',
  'changeY',
  'changeAngle',
  'alpha',
  'width',
  'height',
  'textureIndex',
] as const;

const KINDS: readonly string[] = ['sprite', 'turning', 'platformer'];

/**
 * Capture the state of a sprite
 * 捕获精灵状态
 */
export function captureState(sprite: Sprite): SpriteState {
  const state: SpriteState = {
    kind: sprite.kind,
    centerX: sprite.centerX,
    centerY: sprite.centerY,
    angle: sprite.angle,
    scale: sprite.scale,
    changeX: sprite.changeX,
    changeY: sprite.changeY,
    changeAngle: sprite.changeAngle,
    alpha: sprite.alpha,
    transparent: sprite.transparent,
    applyGravity: sprite.applyGravity,
    width: sprite.width,
    height: sprite.height,
    textureIndex: sprite.currentTextureIndex,
  };

  if (sprite instanceof PlatformerSprite) {
    state.facing = sprite.facing;
    state.lastSwapX = sprite.lastSwapX;
  }

  return state;
}

/**
 * Restore a captured state onto a sprite of the same kind
 * 将捕获的状态恢复到同类精灵上
 *
 * @throws TypeMismatchError when the kinds differ
 * @throws IndexOutOfRangeError when the sprite has frames and the index is not one of them
 */
export function applyState(sprite: Sprite, state: SpriteState): void {
  if (sprite.kind !== state.kind) {
    throw new TypeMismatchError(
      `Cannot apply '${state.kind}' state to a '${sprite.kind}' sprite`,
      { expected: sprite.kind, received: state.kind }
    );
  }

  const frameCount = sprite.textures.length;
  if (frameCount > 0) {
    // Selects the frame before anything else changes; throws on a bad index.
    sprite.setTexture(state.textureIndex);
  } else if (state.textureIndex !== 0) {
    throw new IndexOutOfRangeError(state.textureIndex, 0);
  }

  sprite.centerX = state.centerX;
  sprite.centerY = state.centerY;
  sprite.angle = state.angle;
  sprite.scale = state.scale;
  sprite.changeX = state.changeX;
  sprite.changeY = state.changeY;
  sprite.changeAngle = state.changeAngle;
  sprite.alpha = state.alpha;
  sprite.transparent = state.transparent;
  sprite.applyGravity = state.applyGravity;
  sprite.width = state.width;
  sprite.height = state.height;

  if (sprite instanceof PlatformerSprite) {
    if (state.facing !== undefined) {
      sprite.facing = state.facing;
    }
    if (state.lastSwapX !== undefined) {
      sprite.lastSwapX = state.lastSwapX;
    }
  }
}

/**
 * Check that a decoded value has the shape of a SpriteState
 * 检查解码后的值是否符合 SpriteState 结构
 */
export function isSpriteState(value: unknown): value is SpriteState {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const record: Record<string, unknown> = { ...value };

  if (typeof record.kind !== 'string' || !KINDS.includes(record.kind)) {
    return false;
  }
  for (const field of NUMBER_FIELDS) {
    if (typeof record[field] !== 'number') {
      return false;
    }
  }
  if (typeof record.transparent !== 'boolean' || typeof record.applyGravity !== 'boolean') {
    return false;
  }
  if (record.facing !== undefined && record.facing !== 'left' && record.facing !== 'right') {
    return false;
  }
  if (record.lastSwapX !== undefined && typeof record.lastSwapX !== 'number') {
    return false;
  }
  return true;
}
