import { CodecError, MAX_INT64, isUint32 } from '../core';
import { BSONType, bsonTypeName } from '../bson/types';
import type { Bson } from '../bson/value';
import type { RawBsonRef } from '../raw/element';
import type { Visitor } from './dataModel';

/**
 * 用于错误消息的值描述
 * EN: Describe a value for error messages
 */
export function describeValue(value: Bson | RawBsonRef): string {
    switch (value.type) {
        case BSONType.Double:
            return `floating point \`${value.value}\``;
        case BSONType.String:
            return `string ${JSON.stringify(value.value)}`;
        case BSONType.Int32:
        case BSONType.Int64:
            return `integer \`${value.value}\``;
        case BSONType.Boolean:
            return `boolean \`${value.value}\``;
        case BSONType.Document:
            return 'map';
        case BSONType.Array:
            return 'sequence';
        default:
            return bsonTypeName(value.type);
    }
}

export function invalidType(value: Bson | RawBsonRef, visitor: Visitor<unknown>): CodecError {
    return CodecError.invalidType(describeValue(value), visitor.expecting);
}

/**
 * 把非容器值交给访问者；容器由调用方先处理
 * EN: Hand a non-container value to the visitor; callers handle containers first
 *
 * Int32 在访问者只接受 i64 时提升。其余情况落到 `visitBson`。
 * EN: Int32 widens when the visitor only takes i64. Everything else falls
 * back to `visitBson`.
 */
export function visitScalar<T>(visitor: Visitor<T>, value: Bson | RawBsonRef, toBson: () => Bson): T {
    switch (value.type) {
        case BSONType.Double:
            if (visitor.visitF64) return visitor.visitF64(value.value);
            break;
        case BSONType.String:
            if (visitor.visitStr) return visitor.visitStr(value.value);
            break;
        case BSONType.Boolean:
            if (visitor.visitBool) return visitor.visitBool(value.value);
            break;
        case BSONType.Int32:
            if (visitor.visitI32) return visitor.visitI32(value.value);
            if (visitor.visitI64) return visitor.visitI64(BigInt(value.value));
            break;
        case BSONType.Int64:
            if (visitor.visitI64) return visitor.visitI64(value.value);
            break;
        case BSONType.Null:
            if (visitor.visitNull) return visitor.visitNull();
            break;
        default:
            break;
    }
    if (visitor.visitBson) {
        return visitor.visitBson(toBson());
    }
    throw invalidType(value, visitor);
}

/**
 * 无符号整数写为 Int64 前的检查
 * EN: Checks made before unsigned integers are written as Int64
 */
export function checkU32(value: number): bigint {
    if (!isUint32(value)) {
        throw CodecError.lossyConversion(`${value} is not an unsigned 32-bit integer`);
    }
    return BigInt(value);
}

export function checkU64(value: bigint): bigint {
    if (value < 0n) {
        throw CodecError.lossyConversion(`${value} is not an unsigned 64-bit integer`);
    }
    if (value > MAX_INT64) {
        throw CodecError.lossyConversion(`u64 ${value} does not fit in a signed 64-bit integer`);
    }
    return value;
}
