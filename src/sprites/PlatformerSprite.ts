/**
 * Platformer sprite with directional walk, stand and jump frames
 * 带方向性行走、站立和跳跃帧的平台跳跃精灵
 *
 * Frame tables hold indices into the sprite's frame list. Each update moves
 * the sprite, then picks a frame:
 *   - on the ground and moving: advance through the walk table for the
 *     direction of travel once it has moved far enough since the last swap
 *   - on the ground and still: first stand frame for the facing direction
 *   - in the air: first jump frame for the facing direction
 * The up/down walk and stand tables are stored for callers that animate
 * vertical movement themselves; update never selects from them.
 * 帧表保存精灵帧列表中的索引。每次更新先移动精灵，再选择帧：
 *   - 在地面上移动：移动距离足够后，沿移动方向的行走帧表前进一帧
 *   - 在地面上静止：当前朝向的第一个站立帧
 *   - 在空中：当前朝向的第一个跳跃帧
 * 上/下方向的行走与站立帧表供自行处理垂直移动动画的调用方使用，update 不会从中选择。
 *
 * @example
 * ```typescript
 * const player = new PlatformerSprite(undefined, 1, { speed: 2 });
 * frames.forEach((t) => player.appendTexture(t));
 * player.setRightWalkTextures([0, 1, 2]);
 * player.setRightStandTextures([3]);
 * player.setRightJumpTextures([4]);
 * player.goRight();
 * player.update();
 * ```
 */

import { Sprite } from './Sprite';
import { PlatformerConfig, createPlatformerConfig } from '../resources/PlatformerConfig';
import type { Texture } from '../resources/Texture';
import type { SpriteKind } from './types';

/**
 * Horizontal facing
 * 水平朝向
 */
export type Facing = 'left' | 'right';

/**
 * Names of the per-direction frame tables
 * 各方向帧表的名称
 */
export type FrameTableName =
  | 'leftWalk'
  | 'rightWalk'
  | 'upWalk'
  | 'downWalk'
  | 'leftStand'
  | 'rightStand'
  | 'upStand'
  | 'downStand'
  | 'leftJump'
  | 'rightJump';

export class PlatformerSprite extends Sprite {
  /** Current facing 当前朝向 */
  facing: Facing = 'right';

  /**
   * X position at the last walk frame swap
   * 上一次切换行走帧时的X位置
   */
  lastSwapX: number;

  /** Movement tuning 移动参数 */
  readonly config: PlatformerConfig;

  private readonly _frameTables: Record<FrameTableName, number[]> = {
    leftWalk: [],
    rightWalk: [],
    upWalk: [],
    downWalk: [],
    leftStand: [],
    rightStand: [],
    upStand: [],
    downStand: [],
    leftJump: [],
    rightJump: [],
  };
  private readonly _warnedTables = new Set<FrameTableName>();

  constructor(
    frameSource?: string | Texture,
    scale = 0,
    config: Partial<PlatformerConfig> = {}
  ) {
    super(frameSource, scale);
    this.config = createPlatformerConfig(config);
    this.lastSwapX = this.centerX;
  }

  get kind(): SpriteKind {
    return 'platformer';
  }

  /**
   * Frame indices of a table
   * 帧表中的帧索引
   */
  getFrameTable(name: FrameTableName): readonly number[] {
    return this._frameTables[name];
  }

  /**
   * Replace a frame table
   * 替换帧表
   */
  setFrameTable(name: FrameTableName, indices: readonly number[]): void {
    this._frameTables[name] = [...indices];
    this._warnedTables.delete(name);
  }

  setLeftWalkTextures(indices: readonly number[]): void {
    this.setFrameTable('leftWalk', indices);
  }

  setRightWalkTextures(indices: readonly number[]): void {
    this.setFrameTable('rightWalk', indices);
  }

  setUpWalkTextures(indices: readonly number[]): void {
    this.setFrameTable('upWalk', indices);
  }

  setDownWalkTextures(indices: readonly number[]): void {
    this.setFrameTable('downWalk', indices);
  }

  setLeftStandTextures(indices: readonly number[]): void {
    this.setFrameTable('leftStand', indices);
  }

  setRightStandTextures(indices: readonly number[]): void {
    this.setFrameTable('rightStand', indices);
  }

  setUpStandTextures(indices: readonly number[]): void {
    this.setFrameTable('upStand', indices);
  }

  setDownStandTextures(indices: readonly number[]): void {
    this.setFrameTable('downStand', indices);
  }

  setLeftJumpTextures(indices: readonly number[]): void {
    this.setFrameTable('leftJump', indices);
  }

  setRightJumpTextures(indices: readonly number[]): void {
    this.setFrameTable('rightJump', indices);
  }

  /**
   * Start moving left unless already doing so
   * 开始向左移动（若尚未向左移动）
   */
  goLeft(): void {
    if (this.changeX >= 0) {
      this.changeX = -this.config.speed;
    }
  }

  /**
   * Stop leftward motion; rightward motion is left alone
   * 停止向左移动，不影响向右的移动
   */
  stopLeft(): void {
    if (this.changeX < 0) {
      this.changeX = 0;
    }
  }

  /**
   * Start moving right unless already doing so
   * 开始向右移动（若尚未向右移动）
   */
  goRight(): void {
    if (this.changeX <= 0) {
      this.changeX = this.config.speed;
    }
  }

  /**
   * Stop rightward motion; leftward motion is left alone
   * 停止向右移动，不影响向左的移动
   */
  stopRight(): void {
    if (this.changeX > 0) {
      this.changeX = 0;
    }
  }

  faceLeft(): void {
    this.facing = 'left';
  }

  faceRight(): void {
    this.facing = 'right';
  }

  jump(): void {
    this.changeY = this.config.jumpSpeed;
  }

  /**
   * Move, then select the frame for the current motion.
   * A table entry outside the frame list throws and undoes the move.
   * 先移动，再为当前运动选择帧。
   * 帧表项超出帧列表时抛出错误并撤销本次移动。
   *
   * @throws IndexOutOfRangeError when the selected table entry is not a frame
   */
  update(): void {
    const { centerX, centerY, angle } = this;
    super.update();

    try {
      this.selectFrame();
    } catch (error) {
      this.centerX = centerX;
      this.centerY = centerY;
      this.angle = angle;
      throw error;
    }
  }

  private selectFrame(): void {
    if (this.changeY !== 0) {
      this.showFirstFrame(this.facing === 'left' ? 'leftJump' : 'rightJump');
      return;
    }

    if (this.changeX < 0) {
      this.advanceWalkFrame('leftWalk');
    } else if (this.changeX > 0) {
      this.advanceWalkFrame('rightWalk');
    } else {
      this.showFirstFrame(this.facing === 'left' ? 'leftStand' : 'rightStand');
    }
  }

  private advanceWalkFrame(name: FrameTableName): void {
    if (Math.abs(this.lastSwapX - this.centerX) <= this.config.textureChangeDistance) {
      return;
    }
    const table = this.requireTable(name);
    if (table === null) {
      return;
    }

    const pos = table.indexOf(this.currentTextureIndex);
    const next = pos === -1 || pos + 1 >= table.length ? 0 : pos + 1;
    this.setTexture(table[next]);
    this.lastSwapX = this.centerX;
  }

  private showFirstFrame(name: FrameTableName): void {
    const table = this.requireTable(name);
    if (table !== null) {
      this.setTexture(table[0]);
    }
  }

  private requireTable(name: FrameTableName): readonly number[] | null {
    const table = this._frameTables[name];
    if (table.length > 0) {
      return table;
    }
    if (!this._warnedTables.has(name)) {
      this._warnedTables.add(name);
      console.warn(`[PlatformerSprite] No frames configured for '${name}', keeping current frame`);
    }
    return null;
  }
}
