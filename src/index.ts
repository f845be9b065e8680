/**
 * sprite2d - 2D sprites with rotated bounds, frame switching and self-removing lists
 * 带旋转包围、帧切换和自移除列表的2D精灵库
 *
 * @packageDocumentation
 */

// Geometry
export { rotate, toRadians, toDegrees } from './math/rotate';
export type { Point2D } from './math/rotate';

// Textures
export { Texture, createTexture, isTexture, WHOLE_IMAGE } from './resources/Texture';
export type { TextureRegion } from './resources/Texture';

// Render collaborators
export type { IRenderBackend, ITextureLoader } from './render/IRenderBackend';
export {
  RenderContext,
  renderContext,
  setRenderBackend,
  setTextureLoader,
  loadTexture
} from './render/RenderContext';

// Sprites
export { Sprite } from './sprites/Sprite';
export { SpriteList } from './sprites/SpriteList';
export { TurningSprite, HEADING_OFFSET_DEGREES } from './sprites/TurningSprite';
export { PlatformerSprite } from './sprites/PlatformerSprite';
export type { Facing, FrameTableName } from './sprites/PlatformerSprite';
export type { ISprite, SpriteContainer, SpriteKind, SpritePoints } from './sprites/types';

// Configuration
export { PlatformerConfig, createPlatformerConfig } from './resources/PlatformerConfig';

// Errors
export {
  SpriteError,
  SpriteErrorCode,
  InvalidArgumentError,
  IndexOutOfRangeError,
  TypeMismatchError,
  NotFoundError,
  EmptyCollectionError,
  TextureIOError,
  TextureDecodeError,
  RenderError,
  isSpriteError
} from './errors/SpriteErrors';
export type { SpriteErrorContext } from './errors/SpriteErrors';

// Snapshots
export { captureState, applyState, isSpriteState } from './serialize/SpriteState';
export type { SpriteState } from './serialize/SpriteState';
export { SpriteSerializer, spriteSerializer } from './serialize/SpriteSerializer';
export {
  SerializationFormat,
  CURRENT_SERIALIZATION_VERSION,
  DEFAULT_SERIALIZATION_OPTIONS,
  DEFAULT_DESERIALIZATION_OPTIONS
} from './utils/SerializationTypes';
export type {
  SerializationVersion,
  SerializationOptions,
  DeserializationOptions,
  SerializationResult,
  DeserializationResult
} from './utils/SerializationTypes';
