import { CodecError, isInt32, isInt64 } from '../core';
import { Binary } from '../bson/binary';
import { DateTime } from '../bson/datetime';
import { DbPointer, Regex } from '../bson/extended';
import { BSONType, Decimal128, ObjectId, Timestamp } from '../bson/types';
import type { RawBsonConvertible, RawBsonRef } from './element';

/**
 * 可以追加到原始构建器中的值
 * EN: Values a raw builder accepts
 *
 * 数字在 int32 范围内的整数编码为 Int32，否则为 Double；bigint 编码为 Int64。
 * EN: Integral numbers within int32 range encode as Int32, other numbers as
 * Double; a bigint encodes as Int64.
 */
export type RawBsonInput =
    | RawBsonRef
    | RawBsonConvertible
    | string
    | boolean
    | null
    | number
    | bigint
    | ObjectId
    | DateTime
    | Binary
    | Regex
    | Timestamp
    | Decimal128
    | DbPointer;

function isConvertible(value: object): value is RawBsonConvertible {
    return 'toRawBsonRef' in value && typeof value.toRawBsonRef === 'function';
}

/**
 * 将输入值规范化为原始引用
 * EN: Normalize an input value into a raw reference
 */
export function toRawBsonRef(value: RawBsonInput): RawBsonRef {
    if (value === null) {
        return { type: BSONType.Null };
    }
    if (typeof value === 'string') {
        return { type: BSONType.String, value };
    }
    if (typeof value === 'boolean') {
        return { type: BSONType.Boolean, value };
    }
    if (typeof value === 'number') {
        return isInt32(value) && !Object.is(value, -0)
            ? { type: BSONType.Int32, value }
            : { type: BSONType.Double, value };
    }
    if (typeof value === 'bigint') {
        if (!isInt64(value)) {
            throw CodecError.lossyConversion(`${value} is out of the signed 64-bit range`);
        }
        return { type: BSONType.Int64, value };
    }
    if (isConvertible(value)) {
        return value.toRawBsonRef();
    }
    if (value instanceof ObjectId) {
        return { type: BSONType.ObjectId, value };
    }
    if (value instanceof DateTime) {
        return { type: BSONType.DateTime, value };
    }
    if (value instanceof Binary) {
        return { type: BSONType.Binary, value };
    }
    if (value instanceof Regex) {
        return { type: BSONType.Regex, value };
    }
    if (value instanceof Timestamp) {
        return { type: BSONType.Timestamp, value };
    }
    if (value instanceof Decimal128) {
        return { type: BSONType.Decimal128, value };
    }
    if (value instanceof DbPointer) {
        return { type: BSONType.DBPointer, value };
    }
    return value;
}
