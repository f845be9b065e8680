/**
 * Configuration for platformer sprite movement and walk animation
 *
 * Speeds are in world units per update. The defaults suit a normalized
 * [-1, 1] viewport.
 *
 * 平台跳跃精灵移动与行走动画的配置
 *
 * 速度单位为每次更新的世界单位，默认值适用于归一化的 [-1, 1] 视口。
 */

export class PlatformerConfig {
  /**
   * Horizontal speed set by goLeft/goRight
   * goLeft/goRight 设置的水平速度
   */
  speed = 0.003;

  /**
   * Vertical speed set by jump
   * jump 设置的垂直速度
   */
  jumpSpeed = 0.01;

  /**
   * Horizontal distance to travel before the next walk frame
   * Frames advance when the distance since the last swap exceeds this value
   * 切换到下一行走帧前需移动的水平距离
   * 自上次切换以来的距离超过该值时前进一帧
   */
  textureChangeDistance = 0;
}

/**
 * Build a config from partial overrides. Overrides left undefined keep the default.
 * 根据部分覆盖值创建配置，值为 undefined 的覆盖项保留默认值。
 */
export function createPlatformerConfig(overrides: Partial<PlatformerConfig> = {}): PlatformerConfig {
  const config = new PlatformerConfig();
  if (overrides.speed !== undefined) config.speed = overrides.speed;
  if (overrides.jumpSpeed !== undefined) config.jumpSpeed = overrides.jumpSpeed;
  if (overrides.textureChangeDistance !== undefined) {
    config.textureChangeDistance = overrides.textureChangeDistance;
  }
  return config;
}
