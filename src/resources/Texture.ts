/**
 * Texture Handle for Sprite Frames
 * 精灵帧的纹理句柄
 *
 * A loaded image region with a fixed pixel size. Textures are created by a
 * texture loader and shared by reference between sprites; a sprite never
 * copies or owns one.
 * 已加载的图像区域，像素尺寸固定。纹理由纹理加载器创建，
 * 并在精灵之间按引用共享；精灵不会复制或独占纹理。
 */

/**
 * Source region inside the image [x, y, width, height], in pixels
 * 图像内的源区域 [x, y, 宽, 高]（像素）
 * (0, 0, 0, 0) selects the whole image.
 */
export type TextureRegion = readonly [number, number, number, number];

/**
 * Whole-image region selector
 * 整图区域选择器
 */
export const WHOLE_IMAGE: TextureRegion = [0, 0, 0, 0];

/**
 * Immutable texture reference
 * 不可变纹理引用
 */
export class Texture {
  /**
   * Brand that keeps look-alike objects from type-checking as textures
   * 防止结构相同的对象通过类型检查的品牌字段
   */
  private readonly _isTexture = true;

  /**
   * Texture identifier (usually the source path)
   * 纹理标识符（通常为源路径）
   */
  readonly id: string;

  /**
   * Width in pixels
   * 宽度（像素）
   */
  readonly width: number;

  /**
   * Height in pixels
   * 高度（像素）
   */
  readonly height: number;

  /**
   * Region of the source image this texture covers
   * 此纹理覆盖的源图像区域
   */
  readonly region: TextureRegion;

  /**
   * Backend-specific handle (GPU texture, canvas image, ...). Opaque to sprites.
   * 后端特定句柄（GPU纹理、画布图像等），对精灵不透明。
   */
  readonly handle: unknown;

  constructor(
    id: string,
    width: number,
    height: number,
    region: TextureRegion = WHOLE_IMAGE,
    handle: unknown = null
  ) {
    this.id = id;
    this.width = width;
    this.height = height;
    this.region = region;
    this.handle = handle;
    Object.freeze(this);
  }

  /**
   * Check whether a value was created by this class
   * 检查值是否由此类创建
   */
  static is(value: unknown): value is Texture {
    return value instanceof Texture && value._isTexture;
  }
}

/**
 * Create a texture for a whole image
 * 为整张图像创建纹理
 *
 * @param id Texture identifier
 * @param width Width in pixels
 * @param height Height in pixels
 * @param handle Optional backend handle
 * @returns Texture instance
 */
export const createTexture = (
  id: string,
  width: number,
  height: number,
  handle: unknown = null
): Texture => {
  return new Texture(id, width, height, WHOLE_IMAGE, handle);
};

/**
 * Check whether a value is a Texture
 * 检查值是否为纹理
 */
export const isTexture = (value: unknown): value is Texture => {
  return Texture.is(value);
};
