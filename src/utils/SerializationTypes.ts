/**
 * History serialization type definitions
 * 历史序列化类型定义
 */

/**
 * Serialization format types
 * 序列化格式类型
 */
export enum SerializationFormat {
  /** JSON format for human-readable output JSON格式，便于阅读 */
  JSON = 'json',
  /** Binary format, MessagePack 二进制格式（MessagePack） */
  Binary = 'binary'
}

/**
 * Serialization version information
 * 序列化版本信息
 */
export interface SerializationVersion {
  major: number;
  minor: number;
  patch: number;
}

export const CURRENT_SERIALIZATION_VERSION: SerializationVersion = {
  major: 1,
  minor: 0,
  patch: 0
};

/**
 * Serialization options
 * 序列化选项
 */
export interface SerializationOptions {
  /** Serialization format, default JSON 序列化格式，默认JSON */
  format?: SerializationFormat;
  /** Include metadata 包含元数据 */
  includeMetadata?: boolean;
  /** Pretty print JSON 格式化JSON */
  prettyPrint?: boolean;
}

/**
 * Deserialization options
 * 反序列化选项
 */
export interface DeserializationOptions {
  /** Reject dumps written by an incompatible version 拒绝不兼容版本的数据 */
  strict?: boolean;
}

export interface SerializationResult {
  data: string | Uint8Array;
  format: SerializationFormat;
  /** Size in bytes 字节大小 */
  size: number;
  /** Time taken in ms 耗时（毫秒） */
  time: number;
  metadata?: {
    version: SerializationVersion;
    timestamp: number;
    format: SerializationFormat;
    recordCount: number;
  };
}

export interface DeserializationResult<T> {
  object: T;
  sourceVersion: SerializationVersion;
  /** Time taken in ms 耗时（毫秒） */
  time: number;
  warnings: string[];
}
