/**
 * 字段级转换辅助：以另一种 BSON 表示存储字段
 * EN: Field-level conversion helpers that store a field in another BSON form
 *
 * 每个辅助都是一个 `Codec`，可直接放入结构体字段表。
 * EN: Every helper is a `Codec` and drops straight into a struct field table.
 */

import { CodecError, MAX_INT32, MAX_UINT32, MAX_UINT64, isInt64 } from '../core';
import { Binary, UuidRepresentation } from '../bson/binary';
import { DateTime } from '../bson/datetime';
import { BSONType, Timestamp } from '../bson/types';
import type { ObjectId, UUID } from '../bson/types';
import { Bson } from '../bson/value';
import { codec, expectBson, parseObjectIdHex } from './codecs';
import type { Codec, Deserializer, Serializer } from './dataModel';

const TWO_POW_64 = 2 ** 64;

// ==================== 无符号整数 EN: Unsigned integers ====================

/**
 * u32 写为 Int32；无法精确转换时失败
 * EN: Write a u32 as Int32; fails when the conversion is not exact
 */
export function serializeU32AsI32<Ok>(value: number, serializer: Serializer<Ok>): Ok {
    if (!Number.isInteger(value) || value < 0 || value > MAX_INT32) {
        throw CodecError.lossyConversion(`cannot convert ${value} to i32`);
    }
    return serializer.serializeI32(value);
}

export function serializeU32AsI64<Ok>(value: number, serializer: Serializer<Ok>): Ok {
    if (!Number.isInteger(value) || value < 0 || value > MAX_UINT32) {
        throw CodecError.lossyConversion(`${value} is not an unsigned 32-bit integer`);
    }
    return serializer.serializeI64(BigInt(value));
}

export function serializeU64AsI32<Ok>(value: bigint, serializer: Serializer<Ok>): Ok {
    if (value < 0n || value > BigInt(MAX_INT32)) {
        throw CodecError.lossyConversion(`cannot convert ${value} to i32`);
    }
    return serializer.serializeI32(Number(value));
}

export function serializeU64AsI64<Ok>(value: bigint, serializer: Serializer<Ok>): Ok {
    if (value < 0n || !isInt64(value)) {
        throw CodecError.lossyConversion(`cannot convert ${value} to i64`);
    }
    return serializer.serializeI64(value);
}

function toU32(value: bigint): number {
    if (value < 0n || value > BigInt(MAX_UINT32)) {
        throw CodecError.lossyConversion(`cannot convert ${value} to u32`);
    }
    return Number(value);
}

function toU64(value: bigint): bigint {
    if (value < 0n) {
        throw CodecError.lossyConversion(`cannot convert ${value} to u64`);
    }
    return value;
}

export const u32AsI32: Codec<number> = {
    serialize: serializeU32AsI32,
    deserialize: (de) => toU32(BigInt(codec.i32.deserialize(de))),
};

export const u32AsI64: Codec<number> = {
    serialize: serializeU32AsI64,
    deserialize: (de) => toU32(codec.i64.deserialize(de)),
};

export const u64AsI32: Codec<bigint> = {
    serialize: serializeU64AsI32,
    deserialize: (de) => toU64(BigInt(codec.i32.deserialize(de))),
};

export const u64AsI64: Codec<bigint> = {
    serialize: serializeU64AsI64,
    deserialize: (de) => toU64(codec.i64.deserialize(de)),
};

// 饱和截断：NaN 为 0，越界取端点
// EN: Saturating truncation; NaN becomes 0 and out-of-range values clamp
function saturate(value: number, max: number): number {
    if (Number.isNaN(value) || value <= 0) {
        return 0;
    }
    return Math.min(Math.trunc(value), max);
}

/**
 * u32 写为 Double；读取时只接受与整数相差不超过 EPSILON 的值
 * EN: Write a u32 as Double; reading accepts only values within EPSILON of an integer
 */
export const u32AsF64: Codec<number> = {
    serialize: (value, serializer) => {
        if (!Number.isInteger(value) || value < 0 || value > MAX_UINT32) {
            throw CodecError.lossyConversion(`${value} is not an unsigned 32-bit integer`);
        }
        return serializer.serializeF64(value);
    },
    deserialize: (de) => {
        const f = codec.f64.deserialize(de);
        const truncated = saturate(f, MAX_UINT32);
        if (!(Math.abs(f - truncated) <= Number.EPSILON)) {
            throw CodecError.lossyConversion(`cannot convert f64 (value ${f}) to u32`);
        }
        return truncated;
    },
};

/**
 * u64 写为 Double；只有能被 f64 精确表示的值可以写出
 * EN: Write a u64 as Double; only values an f64 represents exactly can be written
 *
 * 读取时拒绝 2^64 及以上的值，因为它超出 u64。
 * EN: Reading rejects 2^64 and above, which lie outside u64.
 */
export const u64AsF64: Codec<bigint> = {
    serialize: (value, serializer) => {
        const f = Number(value);
        if (value < 0n || value >= MAX_UINT64 || BigInt(f) !== value) {
            throw CodecError.lossyConversion(`cannot represent ${value} as f64`);
        }
        return serializer.serializeF64(f);
    },
    deserialize: (de) => {
        const f = codec.f64.deserialize(de);
        if (!(f >= 0 && f < TWO_POW_64)) {
            throw CodecError.lossyConversion(`cannot convert f64 (value ${f}) to u64`);
        }
        const truncated = Math.trunc(f);
        if (!(Math.abs(f - truncated) <= Number.EPSILON)) {
            throw CodecError.lossyConversion(`cannot convert f64 (value ${f}) to u64`);
        }
        return BigInt(truncated);
    },
};

// ==================== ObjectId 与日期 EN: ObjectId and dates ====================

/**
 * ObjectId 存为十六进制字符串
 * EN: Store an ObjectId as a hex string
 */
export const objectIdAsHexString: Codec<ObjectId> = {
    serialize: (value, serializer) => serializer.serializeStr(value.toHexString()),
    deserialize: (de) => parseObjectIdHex(codec.string.deserialize(de)),
};

/**
 * 十六进制字符串存为 ObjectId
 * EN: Store a hex string as an ObjectId
 */
export const hexStringAsObjectId: Codec<string> = {
    serialize: (value, serializer) => serializer.serializeBson(Bson.objectId(parseObjectIdHex(value))),
    deserialize: (de) =>
        de.deserializeAny<string>({
            expecting: 'an ObjectId',
            visitBson: (v) => expectBson(v, BSONType.ObjectId, 'an ObjectId').value.toHexString(),
        }),
};

function readDateTime(de: Deserializer): DateTime {
    return de.deserializeAny<DateTime>({
        expecting: 'a DateTime',
        visitBson: (v) => expectBson(v, BSONType.DateTime, 'a DateTime').value,
    });
}

export const dateTimeAsRfc3339String: Codec<DateTime> = {
    serialize: (value, serializer) => serializer.serializeStr(value.tryToRfc3339String()),
    deserialize: (de) => DateTime.parseRfc3339Str(codec.string.deserialize(de)),
};

export const rfc3339StringAsDateTime: Codec<string> = {
    serialize: (value, serializer) => serializer.serializeBson(Bson.dateTime(DateTime.parseRfc3339Str(value))),
    deserialize: (de) => readDateTime(de).tryToRfc3339String(),
};

/**
 * 毫秒数存为 DateTime
 * EN: Store milliseconds as a DateTime
 */
export const i64AsDateTime: Codec<bigint> = {
    serialize: (value, serializer) => serializer.serializeBson(Bson.dateTime(DateTime.fromMillis(value))),
    deserialize: (de) => readDateTime(de).timestampMillis,
};

// ==================== 时间戳 EN: Timestamps ====================

/**
 * u32 存为递增序号为 0 的 Timestamp；读取时忽略递增序号
 * EN: Store a u32 as a Timestamp with increment 0; reading ignores the increment
 */
export const u32AsTimestamp: Codec<number> = {
    serialize: (value, serializer) => {
        if (!Number.isInteger(value) || value < 0 || value > MAX_UINT32) {
            throw CodecError.lossyConversion(`${value} is not an unsigned 32-bit integer`);
        }
        return serializer.serializeBson(Bson.timestamp(value, 0));
    },
    deserialize: (de) => codec.timestamp.deserialize(de).t,
};

/**
 * Timestamp 存为 u32；递增序号非 0 时失败
 * EN: Store a Timestamp as a u32; fails when the increment is non-zero
 */
export const timestampAsU32: Codec<Timestamp> = {
    serialize: (value, serializer) => {
        if (value.i !== 0) {
            throw CodecError.lossyConversion('cannot convert a Timestamp with a non-zero increment to u32');
        }
        return serializer.serializeU32(value.t);
    },
    deserialize: (de) => new Timestamp({ t: codec.u32.deserialize(de), i: 0 }),
};

// ==================== UUID ====================

function uuidAs(rep: UuidRepresentation): Codec<UUID> {
    const expecting = `a ${rep} UUID`;
    return {
        serialize: (value, serializer) =>
            serializer.serializeBson(Bson.binary(Binary.fromUuidWithRepresentation(value, rep))),
        deserialize: (de) =>
            de.deserializeAny<UUID>({
                expecting,
                visitBson: (v) => expectBson(v, BSONType.Binary, expecting).value.toUuidWithRepresentation(rep),
            }),
    };
}

/** 总是写为子类型 4，不受人类可读模式影响 EN: Always subtype 4, whatever the human-readable mode */
export const uuidAsBinary = uuidAs(UuidRepresentation.Standard);
export const uuidAsJavaLegacyBinary = uuidAs(UuidRepresentation.JavaLegacy);
export const uuidAsPythonLegacyBinary = uuidAs(UuidRepresentation.PythonLegacy);
export const uuidAsCSharpLegacyBinary = uuidAs(UuidRepresentation.CSharpLegacy);
