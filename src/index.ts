/**
 * bsonkit - BSON 编解码库：类型化值、零拷贝原始视图与基于访问者的序列化
 * EN: bsonkit - BSON codec library: typed values, zero-copy raw views and visitor-based serialization
 */

// 核心层
// EN: Core layer
export {
    ErrorCode,
    getErrorCodeName,
    CodecError,
    asCodecError,
    formatPath,
    MAX_BSON_DEPTH,
    LogLevel,
    Logger,
    LoggerImpl,
    logger,
    consoleSink,
} from './core';
export type { PathSegment, LogEntry, LogSink } from './core';

// 类型化值模型
// EN: Typed value model
export * from './bson';

// 原始视图与构建器
// EN: Raw views and builders
export * from './raw';

// 序列化
// EN: Serialization
export * from './serde';
