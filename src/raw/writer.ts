/**
 * 元素编码：原始引用与类型化值写入 BufferWriter
 * EN: Element encoding of raw references and typed values into a BufferWriter
 */

import { CodecError, MAX_BSON_DEPTH, MAX_INT32, isInt32, isInt64 } from '../core';
import type { Document } from '../bson/document';
import { BSONType, BinarySubtype } from '../bson/types';
import type { Decimal128, ObjectId, Timestamp } from '../bson/types';
import type { Bson } from '../bson/value';
import { BufferWriter } from './bufferWriter';
import type { RawBinaryRef, RawBsonRef } from './element';

function writeBinary(w: BufferWriter, value: RawBinaryRef): void {
    if (value.subtype === BinarySubtype.BinaryOld) {
        w.writeInt32LE(value.bytes.length + 4);
        w.writeUInt8(value.subtype);
        w.writeInt32LE(value.bytes.length);
    } else {
        w.writeInt32LE(value.bytes.length);
        w.writeUInt8(value.subtype);
    }
    w.writeBytes(value.bytes);
}

function writeObjectId(w: BufferWriter, id: ObjectId): void {
    w.writeBytes(id.id);
}

function writeTimestamp(w: BufferWriter, ts: Timestamp): void {
    w.writeUInt32LE(ts.i);
    w.writeUInt32LE(ts.t);
}

function writeDecimal128(w: BufferWriter, value: Decimal128): void {
    w.writeBytes(value.bytes);
}

function writeInt32(w: BufferWriter, value: number): void {
    if (!isInt32(value)) {
        throw CodecError.lossyConversion(`${value} is not a 32-bit integer`);
    }
    w.writeInt32LE(value);
}

function writeInt64(w: BufferWriter, value: bigint): void {
    if (!isInt64(value)) {
        throw CodecError.lossyConversion(`${value} is out of the signed 64-bit range`);
    }
    w.writeInt64LE(value);
}

// 带作用域代码：int32 总长度 + 字符串 + 作用域文档
// EN: Code with scope: int32 total length, string code, scope document
function writeCodeWithScope(w: BufferWriter, code: string, writeScope: () => void): void {
    const start = w.length;
    w.writeInt32LE(0);
    w.writeString(code);
    writeScope();
    w.patchInt32LE(start, w.length - start);
}

/**
 * 写入原始值的负载（不含标记和键）
 * EN: Write a raw value's payload, without tag and key
 */
export function writeRawValue(w: BufferWriter, ref: RawBsonRef): void {
    switch (ref.type) {
        case BSONType.Double:
            w.writeDoubleLE(ref.value);
            return;
        case BSONType.String:
        case BSONType.JavaScript:
        case BSONType.Symbol:
            w.writeString(ref.value);
            return;
        case BSONType.Document:
        case BSONType.Array:
            w.writeBytes(ref.value.asBytes());
            return;
        case BSONType.Binary:
            writeBinary(w, ref.value);
            return;
        case BSONType.ObjectId:
            writeObjectId(w, ref.value);
            return;
        case BSONType.Boolean:
            w.writeUInt8(ref.value ? 1 : 0);
            return;
        case BSONType.DateTime:
            w.writeInt64LE(ref.value.timestampMillis);
            return;
        case BSONType.Regex:
            w.writeCString(ref.value.pattern);
            w.writeCString(ref.value.options);
            return;
        case BSONType.DBPointer:
            w.writeString(ref.value.namespace);
            writeObjectId(w, ref.value.id);
            return;
        case BSONType.JavaScriptWithScope: {
            const scope = ref.value.scope;
            writeCodeWithScope(w, ref.value.code, () => w.writeBytes(scope.asBytes()));
            return;
        }
        case BSONType.Int32:
            writeInt32(w, ref.value);
            return;
        case BSONType.Timestamp:
            writeTimestamp(w, ref.value);
            return;
        case BSONType.Int64:
            writeInt64(w, ref.value);
            return;
        case BSONType.Decimal128:
            writeDecimal128(w, ref.value);
            return;
        case BSONType.Undefined:
        case BSONType.Null:
        case BSONType.MinKey:
        case BSONType.MaxKey:
            return;
    }
}

/**
 * 写入完整元素：类型标记 + 键 + 负载
 * EN: Write a whole element: type tag, key, payload
 */
export function writeRawElement(w: BufferWriter, key: string, ref: RawBsonRef): void {
    w.writeUInt8(ref.type);
    w.writeCString(key);
    writeRawValue(w, ref);
}

function checkLength(length: number): void {
    if (length > MAX_INT32) {
        throw CodecError.invalidLength(`document of ${length} bytes exceeds the int32 length prefix`);
    }
}

/**
 * 写入类型化文档；嵌套深度受 MAX_BSON_DEPTH 限制
 * EN: Write a typed document; nesting is capped at MAX_BSON_DEPTH
 */
export function writeBsonDocument(w: BufferWriter, doc: Document, depth: number = 1): void {
    writeBsonEntries(w, doc.entries(), depth);
}

function writeBsonArray(w: BufferWriter, items: readonly Bson[], depth: number): void {
    writeBsonEntries(w, items.map((item, i): [string, Bson] => [String(i), item]), depth);
}

function writeBsonEntries(w: BufferWriter, entries: Iterable<[string, Bson]>, depth: number): void {
    if (depth > MAX_BSON_DEPTH) {
        throw CodecError.depthLimitExceeded(MAX_BSON_DEPTH);
    }
    const start = w.length;
    w.writeInt32LE(0);
    for (const [key, value] of entries) {
        writeBsonElement(w, key, value, depth);
    }
    w.writeUInt8(0);
    const length = w.length - start;
    checkLength(length);
    w.patchInt32LE(start, length);
}

/**
 * 写入类型化值的元素；depth 为所在文档的嵌套层级
 * EN: Write the element for a typed value; depth is the nesting level of the
 * enclosing document
 */
export function writeBsonElement(w: BufferWriter, key: string, value: Bson, depth: number = 1): void {
    w.writeUInt8(value.type);
    w.writeCString(key);
    switch (value.type) {
        case BSONType.Document:
            writeBsonDocument(w, value.value, depth + 1);
            return;
        case BSONType.Array:
            writeBsonArray(w, value.value, depth + 1);
            return;
        case BSONType.JavaScriptWithScope: {
            const scope = value.value.scope;
            writeCodeWithScope(w, value.value.code, () => writeBsonDocument(w, scope, depth + 1));
            return;
        }
        case BSONType.Double:
            w.writeDoubleLE(value.value);
            return;
        case BSONType.String:
        case BSONType.JavaScript:
        case BSONType.Symbol:
            w.writeString(value.value);
            return;
        case BSONType.Binary:
            writeBinary(w, value.value);
            return;
        case BSONType.ObjectId:
            writeObjectId(w, value.value);
            return;
        case BSONType.Boolean:
            w.writeUInt8(value.value ? 1 : 0);
            return;
        case BSONType.DateTime:
            w.writeInt64LE(value.value.timestampMillis);
            return;
        case BSONType.Regex:
            w.writeCString(value.value.pattern);
            w.writeCString(value.value.options);
            return;
        case BSONType.DBPointer:
            w.writeString(value.value.namespace);
            writeObjectId(w, value.value.id);
            return;
        case BSONType.Int32:
            writeInt32(w, value.value);
            return;
        case BSONType.Timestamp:
            writeTimestamp(w, value.value);
            return;
        case BSONType.Int64:
            writeInt64(w, value.value);
            return;
        case BSONType.Decimal128:
            writeDecimal128(w, value.value);
            return;
        case BSONType.Undefined:
        case BSONType.Null:
        case BSONType.MinKey:
        case BSONType.MaxKey:
            return;
    }
}

/**
 * 将类型化文档编码为新的 Buffer
 * EN: Encode a typed document into a fresh Buffer
 */
export function encodeBsonDocument(doc: Document): Buffer {
    const w = new BufferWriter();
    writeBsonDocument(w, doc);
    return Buffer.from(w.bytes());
}

/**
 * 将类型化数组编码为新的 Buffer
 * EN: Encode a typed array into a fresh Buffer
 */
export function encodeBsonArray(items: readonly Bson[]): Buffer {
    const w = new BufferWriter();
    writeBsonArray(w, items, 1);
    return Buffer.from(w.bytes());
}
