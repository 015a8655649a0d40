/**
 * 从官方 bson 库重新导出扩展类型
 * EN: Re-export extended types from the bson library
 */

import {
    ObjectId as OfficialObjectId,
    Timestamp as OfficialTimestamp,
    Decimal128 as OfficialDecimal128,
    UUID as OfficialUUID,
} from 'bson';

// 重新导出官方类型并使用别名
// EN: Re-export official types under local aliases
export const ObjectId = OfficialObjectId;
export type ObjectId = OfficialObjectId;

export const Timestamp = OfficialTimestamp;
export type Timestamp = OfficialTimestamp;

export const Decimal128 = OfficialDecimal128;
export type Decimal128 = OfficialDecimal128;

export const UUID = OfficialUUID;
export type UUID = OfficialUUID;

/**
 * BSON 元素类型标记（与 BSON 规范对齐）
 * EN: BSON element type tags (as listed at bsonspec.org)
 */
export enum BSONType {
    /** 双精度浮点数 EN: Double precision float */
    Double = 0x01,
    /** 字符串 EN: String */
    String = 0x02,
    /** 文档 EN: Document */
    Document = 0x03,
    /** 数组 EN: Array */
    Array = 0x04,
    /** 二进制数据 EN: Binary data */
    Binary = 0x05,
    /** 未定义（已废弃）EN: Undefined (Deprecated) */
    Undefined = 0x06,
    /** 对象ID EN: Object ID */
    ObjectId = 0x07,
    /** 布尔值 EN: Boolean */
    Boolean = 0x08,
    /** 日期时间 EN: DateTime */
    DateTime = 0x09,
    /** 空值 EN: Null */
    Null = 0x0A,
    /** 正则表达式 EN: Regular expression */
    Regex = 0x0B,
    /** 数据库指针（已废弃）EN: DB Pointer (Deprecated) */
    DBPointer = 0x0C,
    /** JavaScript 代码 EN: JavaScript code */
    JavaScript = 0x0D,
    /** 符号（已废弃）EN: Symbol (Deprecated) */
    Symbol = 0x0E,
    /** 带作用域的 JavaScript（已废弃）EN: JavaScript with scope (Deprecated) */
    JavaScriptWithScope = 0x0F,
    /** 32位整数 EN: 32-bit integer */
    Int32 = 0x10,
    /** 时间戳 EN: Timestamp */
    Timestamp = 0x11,
    /** 64位整数 EN: 64-bit integer */
    Int64 = 0x12,
    /** 128位十进制数 EN: 128-bit decimal */
    Decimal128 = 0x13,
    /** 最小键 EN: Min key */
    MinKey = 0xFF,
    /** 最大键 EN: Max key */
    MaxKey = 0x7F,
}

/**
 * 二进制子类型
 * EN: Binary subtypes
 */
export enum BinarySubtype {
    /** 通用二进制 EN: Generic binary */
    Generic = 0x00,
    /** 函数 EN: Function */
    Function = 0x01,
    /** 旧版二进制 EN: Binary (old) */
    BinaryOld = 0x02,
    /** 旧版 UUID EN: UUID (old) */
    UuidOld = 0x03,
    /** UUID EN: UUID */
    Uuid = 0x04,
    /** MD5 哈希 EN: MD5 hash */
    Md5 = 0x05,
    /** 加密数据 EN: Encrypted data */
    Encrypted = 0x06,
    /** 压缩时间序列列 EN: Compressed time-series column */
    Column = 0x07,
    /** 敏感数据 EN: Sensitive data */
    Sensitive = 0x08,
    /** 用户自定义起点 EN: First user-defined subtype */
    UserDefined = 0x80,
}

/**
 * 判断字节是否为已知元素类型
 * EN: Whether a byte is a known element type tag
 */
export function isBSONType(tag: number): tag is BSONType {
    return (tag >= BSONType.Double && tag <= BSONType.Decimal128) ||
        tag === BSONType.MinKey ||
        tag === BSONType.MaxKey;
}

const TYPE_NAMES: ReadonlyMap<BSONType, string> = new Map([
    [BSONType.Double, 'double'],
    [BSONType.String, 'string'],
    [BSONType.Document, 'document'],
    [BSONType.Array, 'array'],
    [BSONType.Binary, 'binary'],
    [BSONType.Undefined, 'undefined'],
    [BSONType.ObjectId, 'objectId'],
    [BSONType.Boolean, 'bool'],
    [BSONType.DateTime, 'date'],
    [BSONType.Null, 'null'],
    [BSONType.Regex, 'regex'],
    [BSONType.DBPointer, 'dbPointer'],
    [BSONType.JavaScript, 'javascript'],
    [BSONType.Symbol, 'symbol'],
    [BSONType.JavaScriptWithScope, 'javascriptWithScope'],
    [BSONType.Int32, 'int'],
    [BSONType.Timestamp, 'timestamp'],
    [BSONType.Int64, 'long'],
    [BSONType.Decimal128, 'decimal'],
    [BSONType.MinKey, 'minKey'],
    [BSONType.MaxKey, 'maxKey'],
]);

/**
 * 类型的可读名称（用于错误消息）
 * EN: Readable type name, used in error messages
 */
export function bsonTypeName(type: BSONType): string {
    return TYPE_NAMES.get(type) ?? `0x${Number(type).toString(16)}`;
}
