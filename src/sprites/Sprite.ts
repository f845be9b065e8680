/**
 * Sprite: positioned, rotatable, scalable textured rectangle
 * 精灵：可定位、可旋转、可缩放的纹理矩形
 *
 * Geometry is derived on demand from the center, size and angle, so corner
 * points and edges always reflect the current state. The edge setters move
 * the sprite without touching its size or angle.
 * 几何信息根据中心、尺寸和角度按需计算，因此角点和边缘总是反映当前状态。
 * 边缘设置器只移动精灵，不改变尺寸或角度。
 *
 * @example
 * ```typescript
 * setTextureLoader(loader);
 * const ship = new Sprite('images/ship.png', 0.5);
 * ship.setPosition(100, 100);
 * ship.angle = 30;
 * ship.bottom = 0; // rest the rotated ship on y = 0
 * ```
 */

import { rotate } from '../math/rotate';
import { isTexture } from '../resources/Texture';
import type { Texture } from '../resources/Texture';
import { renderContext } from '../render/RenderContext';
import {
  IndexOutOfRangeError,
  InvalidArgumentError,
  TypeMismatchError,
} from '../errors/SpriteErrors';
import type { ISprite, SpriteContainer, SpriteKind, SpritePoints } from './types';

export class Sprite implements ISprite {
  /** Center X 中心X */
  centerX = 0;
  /** Center Y 中心Y */
  centerY = 0;
  /** Rotation in degrees, counter-clockwise positive 旋转角度（度），逆时针为正 */
  angle = 0;
  /** Uniform scale applied to frame pixel size 应用于帧像素尺寸的统一缩放 */
  scale: number;

  /** Velocity X per update 每次更新的X速度 */
  changeX = 0;
  /** Velocity Y per update 每次更新的Y速度 */
  changeY = 0;
  /** Angular velocity in degrees per update 每次更新的角速度（度） */
  changeAngle = 0;

  /** Opacity in [0, 1] 不透明度 */
  alpha = 1.0;
  /** Whether to blend when drawn 绘制时是否混合 */
  transparent = true;
  /** Hint for physics helpers that the sprite falls 提示物理辅助逻辑该精灵受重力影响 */
  applyGravity = false;

  /** Drawn width (frame width * scale) 绘制宽度 */
  width: number;
  /** Drawn height (frame height * scale) 绘制高度 */
  height: number;

  private readonly _textures: Texture[] = [];
  private _texture: Texture | undefined = undefined;
  private _currentTextureIndex = 0;
  private readonly _lists = new Map<number, WeakRef<SpriteContainer>>();

  /**
   * @param frameSource Image path loaded through the texture loader, or a loaded texture
   * @param scale Scale applied to the frame size
   * @param x Region X inside the image
   * @param y Region Y inside the image
   * @param width Region width, 0 together with height for the whole image
   * @param height Region height
   * @throws InvalidArgumentError for negative or half-zero region sizes
   */
  constructor(
    frameSource?: string | Texture,
    scale = 0,
    x = 0,
    y = 0,
    width = 0,
    height = 0
  ) {
    if (width < 0) {
      throw new InvalidArgumentError(`Width of image can't be less than zero, got ${width}`, { width });
    }
    if (height < 0) {
      throw new InvalidArgumentError(`Height of image can't be less than zero, got ${height}`, { height });
    }
    if (width === 0 && height !== 0) {
      throw new InvalidArgumentError(`Width can't be zero when height is ${height}`, { width, height });
    }
    if (height === 0 && width !== 0) {
      throw new InvalidArgumentError(`Height can't be zero when width is ${width}`, { width, height });
    }

    this.scale = scale;

    if (frameSource === undefined) {
      this.width = 0;
      this.height = 0;
      return;
    }

    const texture = isTexture(frameSource)
      ? frameSource
      : renderContext.loadTexture(frameSource, x, y, width, height);

    this._texture = texture;
    this._textures.push(texture);
    this.width = texture.width * scale;
    this.height = texture.height * scale;
  }

  /**
   * Variant discriminant
   * 变体判别值
   */
  get kind(): SpriteKind {
    return 'sprite';
  }

  /**
   * Frame list
   * 帧列表
   */
  get textures(): readonly Texture[] {
    return this._textures;
  }

  /**
   * Index of the frame last selected with setTexture
   * 最近一次通过 setTexture 选择的帧索引
   */
  get currentTextureIndex(): number {
    return this._currentTextureIndex;
  }

  /**
   * Active texture
   * 当前纹理
   */
  get texture(): Texture | undefined {
    return this._texture;
  }

  /**
   * Assign the active texture directly. Frame list, index and size are left as they are.
   * 直接设置当前纹理，帧列表、索引和尺寸保持不变。
   *
   * @throws TypeMismatchError when the value is not a Texture
   */
  set texture(value: unknown) {
    if (!isTexture(value)) {
      throw new TypeMismatchError(
        "Can't set the texture to something that is not an instance of the Texture class",
        { received: typeof value }
      );
    }
    this._texture = value;
  }

  /**
   * Append a frame. Frame sizes are not checked against each other.
   * The first frame appended to a sprite without a texture becomes active.
   * 追加一帧，不检查帧之间的尺寸是否一致。
   * 向无纹理精灵追加的第一帧会成为当前帧。
   */
  appendTexture(texture: Texture): void {
    this._textures.push(texture);
    if (this._textures.length === 1 && this._texture === undefined) {
      this.setTexture(0);
    }
  }

  /**
   * Select a frame and resize to it
   * 选择一帧并按其调整尺寸
   *
   * @throws IndexOutOfRangeError when index is not in [0, frame count)
   */
  setTexture(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this._textures.length) {
      throw new IndexOutOfRangeError(index, this._textures.length);
    }
    const texture = this._textures[index];
    this._texture = texture;
    this._currentTextureIndex = index;
    this.width = texture.width * this.scale;
    this.height = texture.height * this.scale;
  }

  setPosition(centerX: number, centerY: number): void {
    this.centerX = centerX;
    this.centerY = centerY;
  }

  /**
   * Corner points of the rotated rectangle
   * 旋转后矩形的角点
   */
  getPoints(): SpritePoints {
    const cx = this.centerX;
    const cy = this.centerY;
    const hw = this.width / 2;
    const hh = this.height / 2;

    return [
      rotate(cx - hw, cy - hh, cx, cy, this.angle),
      rotate(cx + hw, cy - hh, cx, cy, this.angle),
      rotate(cx + hw, cy + hh, cx, cy, this.angle),
      rotate(cx - hw, cy + hh, cx, cy, this.angle),
    ];
  }

  get points(): SpritePoints {
    return this.getPoints();
  }

  /**
   * Lowest y coordinate
   * 最低的y坐标
   */
  get bottom(): number {
    const [a, b, c, d] = this.getPoints();
    return Math.min(a.y, b.y, c.y, d.y);
  }

  set bottom(amount: number) {
    const diff = this.bottom - amount;
    this.centerY -= diff;
  }

  /**
   * Highest y coordinate
   * 最高的y坐标
   */
  get top(): number {
    const [a, b, c, d] = this.getPoints();
    return Math.max(a.y, b.y, c.y, d.y);
  }

  set top(amount: number) {
    const diff = this.top - amount;
    this.centerY -= diff;
  }

  /**
   * Left-most x coordinate
   * 最左的x坐标
   */
  get left(): number {
    const [a, b, c, d] = this.getPoints();
    return Math.min(a.x, b.x, c.x, d.x);
  }

  set left(amount: number) {
    const diff = amount - this.left;
    this.centerX += diff;
  }

  /**
   * Right-most x coordinate
   * 最右的x坐标
   */
  get right(): number {
    const [a, b, c, d] = this.getPoints();
    return Math.max(a.x, b.x, c.x, d.x);
  }

  set right(amount: number) {
    const diff = this.right - amount;
    this.centerX -= diff;
  }

  /**
   * Lists that currently hold a membership entry for this sprite
   * 当前持有该精灵成员关系的列表
   */
  get spriteLists(): SpriteContainer[] {
    const lists: SpriteContainer[] = [];
    for (const [id, ref] of this._lists) {
      const list = ref.deref();
      if (list === undefined) {
        this._lists.delete(id);
        continue;
      }
      lists.push(list);
    }
    return lists;
  }

  /**
   * Record membership in a list. Called by SpriteList.
   * 记录在列表中的成员关系，由 SpriteList 调用。
   */
  registerSpriteList(list: SpriteContainer): void {
    if (!this._lists.has(list.id)) {
      this._lists.set(list.id, new WeakRef(list));
    }
  }

  /**
   * Forget membership in a list. Called by SpriteList.
   * 移除在列表中的成员关系，由 SpriteList 调用。
   */
  unregisterSpriteList(list: SpriteContainer): void {
    this._lists.delete(list.id);
  }

  /**
   * Draw through the registered render backend. A sprite with no texture draws nothing.
   * 通过已注册的渲染后端绘制，没有纹理的精灵不绘制。
   */
  draw(): void {
    if (this._texture === undefined) {
      return;
    }
    renderContext.getBackend().drawTexturedRect(
      this.centerX,
      this.centerY,
      this.width,
      this.height,
      this._texture,
      this.angle,
      this.alpha,
      this.transparent
    );
  }

  /**
   * Integrate velocity and angular velocity
   * 积分速度和角速度
   */
  update(): void {
    this.centerX += this.changeX;
    this.centerY += this.changeY;
    this.angle += this.changeAngle;
  }

  /**
   * Remove this sprite from every list that holds it. Safe to call repeatedly.
   * 从所有持有该精灵的列表中移除它，可重复调用。
   */
  kill(): void {
    for (const list of this.spriteLists) {
      while (list.includes(this)) {
        list.remove(this);
      }
      this.unregisterSpriteList(list);
    }
  }
}
