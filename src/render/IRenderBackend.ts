/**
 * Render Backend and Texture Loader Interfaces
 * 渲染后端与纹理加载器接口
 *
 * The sprite layer does not rasterize or decode images itself. A host
 * application plugs in a backend (WebGL, canvas, headless recorder, ...) and
 * a loader that turns image paths into Texture handles.
 * 精灵层本身不进行光栅化或图像解码。宿主应用需接入一个渲染后端
 * （WebGL、画布、无头记录器等）以及将图像路径转换为纹理句柄的加载器。
 */

import type { Texture } from '../resources/Texture';

/**
 * Draws textured rectangles
 * 绘制带纹理的矩形
 */
export interface IRenderBackend {
  /**
   * Draw a rotated textured rectangle centered at (centerX, centerY)
   * 绘制以 (centerX, centerY) 为中心的旋转纹理矩形
   *
   * Throws RenderError when no frame or context is active.
   * 没有活动帧或上下文时抛出 RenderError。
   *
   * @param angleDegrees Rotation, counter-clockwise positive 旋转角度，逆时针为正
   * @param alpha Opacity in [0, 1] 不透明度
   * @param transparent Whether to blend with what is already drawn 是否与已有内容混合
   */
  drawTexturedRect(
    centerX: number,
    centerY: number,
    width: number,
    height: number,
    texture: Texture,
    angleDegrees: number,
    alpha: number,
    transparent: boolean
  ): void;
}

/**
 * Loads image regions as textures
 * 将图像区域加载为纹理
 */
export interface ITextureLoader {
  /**
   * Load a region of an image. (0, 0, 0, 0) selects the whole image.
   * 加载图像的一个区域。(0, 0, 0, 0) 表示整张图像。
   *
   * Throws TextureIOError for unreadable paths and TextureDecodeError for
   * unsupported formats.
   */
  loadTexture(path: string, x: number, y: number, width: number, height: number): Texture;
}
