/**
 * Sprite layer error types
 * 精灵层错误类型
 *
 * Every error is thrown at the call site that detects it and is never retried
 * internally. Operations that throw leave sprites and lists as they were.
 * 所有错误都在检测到问题的调用处抛出，内部不会重试。
 * 抛出错误的操作不会修改精灵和列表的状态。
 *
 * Hierarchy:
 *   SpriteError
 *   ├── InvalidArgumentError   bad construction dimensions
 *   ├── IndexOutOfRangeError   invalid frame index
 *   ├── TypeMismatchError      value of the wrong type
 *   ├── NotFoundError          removing a sprite that is not in a list
 *   ├── EmptyCollectionError   popping an empty list
 *   ├── TextureIOError         texture source could not be read
 *   ├── TextureDecodeError     texture source could not be decoded
 *   └── RenderError            backend could not draw
 */

/**
 * Error codes
 * 错误码
 */
export enum SpriteErrorCode {
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  INDEX_OUT_OF_RANGE = 'INDEX_OUT_OF_RANGE',
  TYPE_MISMATCH = 'TYPE_MISMATCH',
  NOT_FOUND = 'NOT_FOUND',
  EMPTY_COLLECTION = 'EMPTY_COLLECTION',
  TEXTURE_IO = 'TEXTURE_IO',
  TEXTURE_DECODE = 'TEXTURE_DECODE',
  RENDER = 'RENDER',
}

/**
 * Extra data attached to an error
 * 错误附带的上下文数据
 */
export type SpriteErrorContext = Record<string, unknown>;

/**
 * Base class for all sprite layer errors
 * 所有精灵层错误的基类
 */
export class SpriteError extends Error {
  readonly code: SpriteErrorCode;
  readonly context: SpriteErrorContext;

  constructor(code: SpriteErrorCode, message: string, context: SpriteErrorContext = {}, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'SpriteError';
    this.code = code;
    this.context = context;
  }
}

/**
 * Invalid constructor or method argument
 * 无效的构造参数或方法参数
 */
export class InvalidArgumentError extends SpriteError {
  constructor(message: string, context: SpriteErrorContext = {}) {
    super(SpriteErrorCode.INVALID_ARGUMENT, message, context);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Frame index outside the frame list
 * 帧索引超出帧列表范围
 */
export class IndexOutOfRangeError extends SpriteError {
  readonly index: number;
  readonly length: number;

  constructor(index: number, length: number) {
    super(
      SpriteErrorCode.INDEX_OUT_OF_RANGE,
      `Texture index ${index} is out of range for ${length} frame(s)`,
      { index, length }
    );
    this.name = 'IndexOutOfRangeError';
    this.index = index;
    this.length = length;
  }
}

/**
 * Value of the wrong type
 * 值类型不匹配
 */
export class TypeMismatchError extends SpriteError {
  constructor(message: string, context: SpriteErrorContext = {}, cause?: unknown) {
    super(SpriteErrorCode.TYPE_MISMATCH, message, context, cause);
    this.name = 'TypeMismatchError';
  }
}

/**
 * Item is not a member of the collection
 * 元素不在集合中
 */
export class NotFoundError extends SpriteError {
  constructor(message: string, context: SpriteErrorContext = {}) {
    super(SpriteErrorCode.NOT_FOUND, message, context);
    this.name = 'NotFoundError';
  }
}

/**
 * Collection has no items to take
 * 集合为空
 */
export class EmptyCollectionError extends SpriteError {
  constructor(message: string, context: SpriteErrorContext = {}) {
    super(SpriteErrorCode.EMPTY_COLLECTION, message, context);
    this.name = 'EmptyCollectionError';
  }
}

/**
 * Texture source could not be read (missing file, no loader)
 * 无法读取纹理源（文件缺失、没有加载器）
 */
export class TextureIOError extends SpriteError {
  constructor(message: string, context: SpriteErrorContext = {}, cause?: unknown) {
    super(SpriteErrorCode.TEXTURE_IO, message, context, cause);
    this.name = 'TextureIOError';
  }
}

/**
 * Texture source could not be decoded
 * 无法解码纹理源
 */
export class TextureDecodeError extends SpriteError {
  constructor(message: string, context: SpriteErrorContext = {}, cause?: unknown) {
    super(SpriteErrorCode.TEXTURE_DECODE, message, context, cause);
    this.name = 'TextureDecodeError';
  }
}

/**
 * Render backend failure (no backend, no active context)
 * 渲染后端失败（无后端、无活动上下文）
 */
export class RenderError extends SpriteError {
  constructor(message: string, context: SpriteErrorContext = {}, cause?: unknown) {
    super(SpriteErrorCode.RENDER, message, context, cause);
    this.name = 'RenderError';
  }
}

/**
 * Type guard for sprite layer errors
 * 精灵层错误的类型守卫
 */
export function isSpriteError(error: unknown): error is SpriteError {
  return error instanceof SpriteError;
}
