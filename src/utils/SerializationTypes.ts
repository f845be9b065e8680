/**
 * Snapshot serialization type definitions
 * 快照序列化类型定义
 */

/**
 * Serialization format types
 * 序列化格式类型
 */
export enum SerializationFormat {
  /** Superjson text, human-readable Superjson文本，便于阅读 */
  JSON = 'json',
  /** Superjson payload packed with MessagePack 使用MessagePack打包的Superjson负载 */
  Binary = 'binary'
}

/**
 * Serialization version information
 * 序列化版本信息
 */
export interface SerializationVersion {
  /** Major version 主版本号 */
  major: number;
  /** Minor version 次版本号 */
  minor: number;
  /** Patch version 补丁版本号 */
  patch: number;
}

/**
 * Serialization options
 * 序列化选项
 */
export interface SerializationOptions {
  /** Serialization format 序列化格式 */
  format?: SerializationFormat;
  /** Pretty print JSON 格式化JSON */
  prettyPrint?: boolean;
}

/**
 * Deserialization options
 * 反序列化选项
 */
export interface DeserializationOptions {
  /** Reject snapshots written by an incompatible version 拒绝不兼容版本写入的快照 */
  strict?: boolean;
}

/**
 * Serialization result
 * 序列化结果
 */
export interface SerializationResult {
  /** Serialized data 序列化数据 */
  data: string | Uint8Array;
  /** Serialization format 序列化格式 */
  format: SerializationFormat;
  /** Data size in bytes 数据大小（字节） */
  size: number;
  /** Serialization time in milliseconds 序列化时间（毫秒） */
  time: number;
}

/**
 * Deserialization result
 * 反序列化结果
 */
export interface DeserializationResult<T = unknown> {
  /** Deserialized object 反序列化对象 */
  object: T;
  /** Source version 源版本 */
  sourceVersion: SerializationVersion;
  /** Deserialization time in milliseconds 反序列化时间（毫秒） */
  time: number;
  /** Warnings during deserialization 反序列化过程中的警告 */
  warnings: string[];
}

/**
 * Current serialization version
 * 当前序列化版本
 */
export const CURRENT_SERIALIZATION_VERSION: SerializationVersion = {
  major: 1,
  minor: 0,
  patch: 0
};

/**
 * Default serialization options
 * 默认序列化选项
 */
export const DEFAULT_SERIALIZATION_OPTIONS: Required<SerializationOptions> = {
  format: SerializationFormat.JSON,
  prettyPrint: false
};

/**
 * Default deserialization options
 * 默认反序列化选项
 */
export const DEFAULT_DESERIALIZATION_OPTIONS: Required<DeserializationOptions> = {
  strict: false
};
