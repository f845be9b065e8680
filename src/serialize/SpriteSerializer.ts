import superjson from 'superjson';
import { encode as msgpackEncode, decode as msgpackDecode } from '@msgpack/msgpack';
import type {
  SerializationOptions,
  DeserializationOptions,
  SerializationResult,
  DeserializationResult,
  SerializationVersion
} from '../utils/SerializationTypes';
import {
  CURRENT_SERIALIZATION_VERSION,
  DEFAULT_DESERIALIZATION_OPTIONS,
  DEFAULT_SERIALIZATION_OPTIONS,
  SerializationFormat
} from '../utils/SerializationTypes';
import { captureState, isSpriteState } from './SpriteState';
import type { SpriteState } from './SpriteState';
import type { Sprite } from '../sprites/Sprite';
import { TypeMismatchError } from '../errors/SpriteErrors';

type SuperJSONPayload = Parameters<typeof superjson.deserialize>[0];

interface SnapshotEnvelope {
  version: SerializationVersion;
  timestamp: number;
  states: SpriteState[];
}

/**
 * Sprite snapshot serializer using Superjson and MessagePack
 * 使用Superjson和MessagePack的精灵快照序列化器
 *
 * @example
 * ```typescript
 * const serializer = new SpriteSerializer();
 *
 * // JSON serialization (human-readable)
 * const jsonResult = serializer.serializeSprites(enemies);
 * const { object: states } = serializer.deserialize(jsonResult.data);
 *
 * // MessagePack serialization (binary, compact)
 * const binaryResult = serializer.serializeSprites(enemies, { format: SerializationFormat.Binary });
 * ```
 */
export class SpriteSerializer {
  /**
   * Serialize sprite states to the specified format
   * 将精灵状态序列化为指定格式
   */
  serialize(states: readonly SpriteState[], options: SerializationOptions = {}): SerializationResult {
    const startTime = performance.now();
    const { format, prettyPrint } = { ...DEFAULT_SERIALIZATION_OPTIONS, ...options };

    const envelope: SnapshotEnvelope = {
      version: CURRENT_SERIALIZATION_VERSION,
      timestamp: Date.now(),
      states: [...states]
    };

    let data: string | Uint8Array;
    let size: number;

    switch (format) {
      case SerializationFormat.JSON: {
        const jsonString = superjson.stringify(envelope);
        data = prettyPrint ? JSON.stringify(JSON.parse(jsonString), null, 2) : jsonString;
        size = new TextEncoder().encode(data).length;
        break;
      }

      case SerializationFormat.Binary: {
        // Superjson keeps the payload self-describing; MessagePack packs it.
        const serialized = superjson.serialize(envelope);
        data = msgpackEncode(serialized, { ignoreUndefined: true });
        size = data.length;
        break;
      }

      default:
        throw new TypeMismatchError(`Unsupported serialization format: ${String(format)}`, { format });
    }

    return {
      data,
      format,
      size,
      time: performance.now() - startTime
    };
  }

  /**
   * Capture and serialize every sprite in a collection
   * 捕获并序列化集合中的所有精灵
   */
  serializeSprites(sprites: Iterable<Sprite>, options: SerializationOptions = {}): SerializationResult {
    return this.serialize(Array.from(sprites, captureState), options);
  }

  /**
   * Deserialize sprite states. Strings are read as JSON, byte arrays as MessagePack.
   * 反序列化精灵状态。字符串按JSON读取，字节数组按MessagePack读取。
   *
   * @throws TypeMismatchError for undecodable data, malformed states, or an
   *   incompatible version in strict mode
   */
  deserialize(
    data: string | Uint8Array,
    options: DeserializationOptions = {}
  ): DeserializationResult<SpriteState[]> {
    const startTime = performance.now();
    const { strict } = { ...DEFAULT_DESERIALIZATION_OPTIONS, ...options };

    const envelope = this._decode(data);
    const warnings: string[] = [];

    if (!this._isVersionCompatible(envelope.version)) {
      const message =
        `Incompatible version. Source: ${formatVersion(envelope.version)}, ` +
        `Current: ${formatVersion(CURRENT_SERIALIZATION_VERSION)}`;
      if (strict) {
        throw new TypeMismatchError(message, { sourceVersion: envelope.version });
      }
      warnings.push(message);
    }

    return {
      object: envelope.states,
      sourceVersion: envelope.version,
      time: performance.now() - startTime,
      warnings
    };
  }

  private _decode(data: string | Uint8Array): SnapshotEnvelope {
    let decoded: unknown;
    try {
      if (typeof data === 'string') {
        decoded = superjson.parse(data);
      } else {
        const unpacked = msgpackDecode(data);
        if (!isSuperJSONPayload(unpacked)) {
          throw new Error('MessagePack data does not hold a superjson payload');
        }
        decoded = superjson.deserialize(unpacked);
      }
    } catch (error) {
      throw new TypeMismatchError(
        `Deserialization failed: ${error instanceof Error ? error.message : String(error)}`,
        {},
        error
      );
    }

    if (!isEnvelope(decoded)) {
      throw new TypeMismatchError('Snapshot is missing its version or states');
    }

    const states: SpriteState[] = [];
    decoded.states.forEach((state, index) => {
      if (!isSpriteState(state)) {
        throw new TypeMismatchError(`Malformed sprite state at index ${index}`, { index });
      }
      states.push(state);
    });

    return { version: decoded.version, timestamp: decoded.timestamp, states };
  }

  /**
   * Check if version is compatible
   * 检查版本是否兼容
   */
  private _isVersionCompatible(sourceVersion: SerializationVersion): boolean {
    const current = CURRENT_SERIALIZATION_VERSION;

    // Major version must match
    if (sourceVersion.major !== current.major) {
      return false;
    }

    // Source version should not be newer than current
    if (sourceVersion.minor > current.minor) {
      return false;
    }

    if (sourceVersion.minor === current.minor && sourceVersion.patch > current.patch) {
      return false;
    }

    return true;
  }
}

function formatVersion(version: SerializationVersion): string {
  return `${version.major}.${version.minor}.${version.patch}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSuperJSONPayload(value: unknown): value is SuperJSONPayload {
  return isRecord(value) && 'json' in value;
}

function isVersion(value: unknown): value is SerializationVersion {
  return (
    isRecord(value) &&
    typeof value.major === 'number' &&
    typeof value.minor === 'number' &&
    typeof value.patch === 'number'
  );
}

function isEnvelope(value: unknown): value is { version: SerializationVersion; timestamp: number; states: unknown[] } {
  return (
    isRecord(value) &&
    isVersion(value.version) &&
    typeof value.timestamp === 'number' &&
    Array.isArray(value.states)
  );
}

/**
 * Global serializer instance
 * 全局序列化器实例
 */
export const spriteSerializer = new SpriteSerializer();
