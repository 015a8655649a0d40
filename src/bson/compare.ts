/**
 * BSON 值的结构相等与时间戳排序
 * EN: Structural equality of BSON values and timestamp ordering
 */

import type { Document } from './document';
import { BSONType } from './types';
import type { Timestamp } from './types';
import type { Bson } from './value';

function sign(n: number): number {
    return n < 0 ? -1 : n > 0 ? 1 : 0;
}

function compareBytes(a: Uint8Array, b: Uint8Array): number {
    return sign(Buffer.compare(a, b));
}

/**
 * 比较两个时间戳：先比较秒，再比较递增序号
 * EN: Compare two timestamps by time, then by increment
 */
export function compareTimestamps(a: Timestamp, b: Timestamp): number {
    if (a.t !== b.t) {
        return a.t < b.t ? -1 : 1;
    }
    return a.i < b.i ? -1 : a.i > b.i ? 1 : 0;
}

function documentsEqual(a: Document, b: Document): boolean {
    if (a.size !== b.size) {
        return false;
    }
    const right = b.entries();
    for (const [key, value] of a) {
        const next = right.next();
        if (next.done || next.value[0] !== key || !bsonEquals(value, next.value[1])) {
            return false;
        }
    }
    return true;
}

function arraysEqual(a: readonly Bson[], b: readonly Bson[]): boolean {
    return a.length === b.length && a.every((item, i) => bsonEquals(item, b[i]));
}

/**
 * 严格的结构相等：类型、键顺序和值都必须一致
 * EN: Strict structural equality: types, key order and values must all match
 *
 * 浮点数按 `Object.is` 比较，因此 NaN 等于自身，0 与 -0 不同。
 * EN: Doubles compare with `Object.is`, so NaN equals itself and 0 differs from -0.
 */
export function bsonEquals(a: Bson, b: Bson): boolean {
    switch (a.type) {
        case BSONType.Double:
            return b.type === BSONType.Double && Object.is(a.value, b.value);
        case BSONType.String:
            return b.type === BSONType.String && a.value === b.value;
        case BSONType.JavaScript:
            return b.type === BSONType.JavaScript && a.value === b.value;
        case BSONType.Symbol:
            return b.type === BSONType.Symbol && a.value === b.value;
        case BSONType.Int32:
            return b.type === BSONType.Int32 && a.value === b.value;
        case BSONType.Int64:
            return b.type === BSONType.Int64 && a.value === b.value;
        case BSONType.Boolean:
            return b.type === BSONType.Boolean && a.value === b.value;
        case BSONType.Document:
            return b.type === BSONType.Document && documentsEqual(a.value, b.value);
        case BSONType.Array:
            return b.type === BSONType.Array && arraysEqual(a.value, b.value);
        case BSONType.Binary:
            return b.type === BSONType.Binary && a.value.equals(b.value);
        case BSONType.ObjectId:
            return b.type === BSONType.ObjectId && a.value.equals(b.value);
        case BSONType.DateTime:
            return b.type === BSONType.DateTime && a.value.equals(b.value);
        case BSONType.Regex:
            return b.type === BSONType.Regex && a.value.equals(b.value);
        case BSONType.DBPointer:
            return b.type === BSONType.DBPointer && a.value.equals(b.value);
        case BSONType.JavaScriptWithScope:
            return b.type === BSONType.JavaScriptWithScope &&
                a.value.code === b.value.code &&
                documentsEqual(a.value.scope, b.value.scope);
        case BSONType.Timestamp:
            return b.type === BSONType.Timestamp && compareTimestamps(a.value, b.value) === 0;
        case BSONType.Decimal128:
            return b.type === BSONType.Decimal128 &&
                compareBytes(a.value.bytes, b.value.bytes) === 0;
        case BSONType.Undefined:
        case BSONType.Null:
        case BSONType.MinKey:
        case BSONType.MaxKey:
            return b.type === a.type;
    }
}
