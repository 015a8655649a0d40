import { CodecError, isInt32, isInt64, isUint32 } from '../core';
import type { Binary } from './binary';
import type { DateTime } from './datetime';
import type { Document } from './document';
import type { DbPointer, JavaScriptCodeWithScope, Regex } from './extended';
import { BSONType, Timestamp } from './types';
import type { Decimal128, ObjectId } from './types';

/**
 * BSON 值：以元素类型为判别字段的联合类型
 * EN: A BSON value: a union discriminated by element type
 *
 * 文档和数组独占其子值；值不能引用自身所在的容器。
 * EN: Documents and arrays own their children; a value never refers to its
 * own container.
 */
export type Bson =
    | { readonly type: BSONType.Double; readonly value: number }
    | { readonly type: BSONType.String; readonly value: string }
    | { readonly type: BSONType.Document; readonly value: Document }
    | { readonly type: BSONType.Array; readonly value: Bson[] }
    | { readonly type: BSONType.Binary; readonly value: Binary }
    | { readonly type: BSONType.Undefined }
    | { readonly type: BSONType.ObjectId; readonly value: ObjectId }
    | { readonly type: BSONType.Boolean; readonly value: boolean }
    | { readonly type: BSONType.DateTime; readonly value: DateTime }
    | { readonly type: BSONType.Null }
    | { readonly type: BSONType.Regex; readonly value: Regex }
    | { readonly type: BSONType.DBPointer; readonly value: DbPointer }
    | { readonly type: BSONType.JavaScript; readonly value: string }
    | { readonly type: BSONType.Symbol; readonly value: string }
    | { readonly type: BSONType.JavaScriptWithScope; readonly value: JavaScriptCodeWithScope }
    | { readonly type: BSONType.Int32; readonly value: number }
    | { readonly type: BSONType.Timestamp; readonly value: Timestamp }
    | { readonly type: BSONType.Int64; readonly value: bigint }
    | { readonly type: BSONType.Decimal128; readonly value: Decimal128 }
    | { readonly type: BSONType.MinKey }
    | { readonly type: BSONType.MaxKey };

/**
 * 指定类型的 BSON 值
 * EN: The BSON value variant for one element type
 */
export type BsonOf<K extends BSONType> = Extract<Bson, { type: K }>;

/**
 * 类型守卫：值是否为指定元素类型
 * EN: Type guard: whether a value has the given element type
 */
export function isBsonOf<K extends BSONType>(value: Bson, type: K): value is BsonOf<K> {
    return value.type === type;
}

/**
 * BSON 值工厂（校验数值范围）
 * EN: BSON value factories (numeric ranges are validated)
 */
export const Bson = {
    double: (value: number): Bson => ({ type: BSONType.Double, value }),
    string: (value: string): Bson => ({ type: BSONType.String, value }),
    document: (value: Document): Bson => ({ type: BSONType.Document, value }),
    array: (value: Bson[]): Bson => ({ type: BSONType.Array, value }),
    binary: (value: Binary): Bson => ({ type: BSONType.Binary, value }),
    undefined: (): Bson => ({ type: BSONType.Undefined }),
    objectId: (value: ObjectId): Bson => ({ type: BSONType.ObjectId, value }),
    boolean: (value: boolean): Bson => ({ type: BSONType.Boolean, value }),
    dateTime: (value: DateTime): Bson => ({ type: BSONType.DateTime, value }),
    null: (): Bson => ({ type: BSONType.Null }),
    regex: (value: Regex): Bson => ({ type: BSONType.Regex, value }),
    dbPointer: (value: DbPointer): Bson => ({ type: BSONType.DBPointer, value }),
    javascript: (value: string): Bson => ({ type: BSONType.JavaScript, value }),
    symbol: (value: string): Bson => ({ type: BSONType.Symbol, value }),
    javascriptWithScope: (value: JavaScriptCodeWithScope): Bson => ({ type: BSONType.JavaScriptWithScope, value }),
    int32: (value: number): Bson => {
        if (!isInt32(value)) {
            throw CodecError.lossyConversion(`${value} is not a 32-bit integer`);
        }
        return { type: BSONType.Int32, value };
    },
    /**
     * 时间戳（秒 + 递增序号）
     * EN: Timestamp from seconds and an increment
     */
    timestamp: (time: number, increment: number): Bson => {
        if (!isUint32(time) || !isUint32(increment)) {
            throw CodecError.lossyConversion(`timestamp (${time}, ${increment}) does not fit two u32 values`);
        }
        return { type: BSONType.Timestamp, value: new Timestamp({ t: time, i: increment }) };
    },
    int64: (value: bigint | number): Bson => {
        const big = typeof value === 'number' ? toBigIntExact(value) : value;
        if (!isInt64(big)) {
            throw CodecError.lossyConversion(`${value} is not a 64-bit integer`);
        }
        return { type: BSONType.Int64, value: big };
    },
    decimal128: (value: Decimal128): Bson => ({ type: BSONType.Decimal128, value }),
    minKey: (): Bson => ({ type: BSONType.MinKey }),
    maxKey: (): Bson => ({ type: BSONType.MaxKey }),
};

function toBigIntExact(value: number): bigint {
    if (!Number.isSafeInteger(value)) {
        throw CodecError.lossyConversion(`${value} is not a safe integer`);
    }
    return BigInt(value);
}
