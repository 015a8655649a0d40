/**
 * 原始表示与类型化值模型之间的转换
 * EN: Conversions between the raw representation and the typed value model
 *
 * 转换总是复制，从不与源共享字节。
 * EN: Conversions always copy; they never alias the source bytes.
 */

import { CodecError, MAX_BSON_DEPTH } from '../core';
import { Binary } from '../bson/binary';
import { Document } from '../bson/document';
import { DbPointer, JavaScriptCodeWithScope, Regex } from '../bson/extended';
import { BSONType } from '../bson/types';
import type { Bson } from '../bson/value';
import { RawArray, RawDocument } from './document';
import type { RawIterOptions } from './document';
import { RawDocumentBuf } from './documentBuf';
import type { RawBsonRef } from './element';
import { encodeBsonArray, encodeBsonDocument } from './writer';

function enter(depth: number): number {
    const next = depth + 1;
    if (next > MAX_BSON_DEPTH) {
        throw CodecError.depthLimitExceeded(MAX_BSON_DEPTH);
    }
    return next;
}

/**
 * 原始文档转换为类型化文档；重复键保留最后一个值
 * EN: Convert a raw document into a typed document; a duplicated key keeps its last value
 */
export function rawDocumentToDocument(raw: RawDocument, options: RawIterOptions = {}, depth: number = 0): Document {
    const level = enter(depth);
    const doc = new Document();
    for (const [key, value] of raw.iter(options)) {
        doc.insert(key, rawToBsonAt(value, options, level));
    }
    return doc;
}

export function rawArrayToBsonArray(raw: RawArray, options: RawIterOptions = {}, depth: number = 0): Bson[] {
    const level = enter(depth);
    const items: Bson[] = [];
    for (const [, value] of raw.iter(options)) {
        items.push(rawToBsonAt(value, options, level));
    }
    return items;
}

/**
 * 原始值转换为类型化值
 * EN: Convert a raw value into a typed value
 */
export function rawToBson(ref: RawBsonRef, options: RawIterOptions = {}): Bson {
    return rawToBsonAt(ref, options, 0);
}

function rawToBsonAt(ref: RawBsonRef, options: RawIterOptions, depth: number): Bson {
    switch (ref.type) {
        case BSONType.Document:
            return { type: BSONType.Document, value: rawDocumentToDocument(ref.value, options, depth) };
        case BSONType.Array:
            return { type: BSONType.Array, value: rawArrayToBsonArray(ref.value, options, depth) };
        case BSONType.Binary:
            return {
                type: BSONType.Binary,
                value: new Binary(ref.value.subtype, Uint8Array.from(ref.value.bytes)),
            };
        case BSONType.Regex:
            return { type: BSONType.Regex, value: new Regex(ref.value.pattern, ref.value.options) };
        case BSONType.DBPointer:
            return { type: BSONType.DBPointer, value: new DbPointer(ref.value.namespace, ref.value.id) };
        case BSONType.JavaScriptWithScope:
            return {
                type: BSONType.JavaScriptWithScope,
                value: new JavaScriptCodeWithScope(
                    ref.value.code,
                    rawDocumentToDocument(ref.value.scope, options, depth)
                ),
            };
        case BSONType.Double:
        case BSONType.String:
        case BSONType.Undefined:
        case BSONType.ObjectId:
        case BSONType.Boolean:
        case BSONType.DateTime:
        case BSONType.Null:
        case BSONType.JavaScript:
        case BSONType.Symbol:
        case BSONType.Int32:
        case BSONType.Timestamp:
        case BSONType.Int64:
        case BSONType.Decimal128:
        case BSONType.MinKey:
        case BSONType.MaxKey:
            return ref;
    }
}

/**
 * 类型化值转换为原始引用（文档和数组会被编码）
 * EN: Convert a typed value into a raw reference; documents and arrays are encoded
 */
export function bsonToRawRef(value: Bson): RawBsonRef {
    switch (value.type) {
        case BSONType.Document:
            return { type: BSONType.Document, value: RawDocument.fromBytes(encodeBsonDocument(value.value)) };
        case BSONType.Array:
            return { type: BSONType.Array, value: RawArray.fromBytes(encodeBsonArray(value.value)) };
        case BSONType.JavaScriptWithScope:
            return {
                type: BSONType.JavaScriptWithScope,
                value: {
                    code: value.value.code,
                    scope: RawDocument.fromBytes(encodeBsonDocument(value.value.scope)),
                },
            };
        case BSONType.Double:
        case BSONType.String:
        case BSONType.Binary:
        case BSONType.Undefined:
        case BSONType.ObjectId:
        case BSONType.Boolean:
        case BSONType.DateTime:
        case BSONType.Null:
        case BSONType.Regex:
        case BSONType.DBPointer:
        case BSONType.JavaScript:
        case BSONType.Symbol:
        case BSONType.Int32:
        case BSONType.Timestamp:
        case BSONType.Int64:
        case BSONType.Decimal128:
        case BSONType.MinKey:
        case BSONType.MaxKey:
            return value;
    }
}

export function documentToRawDocumentBuf(doc: Document): RawDocumentBuf {
    const buf = new RawDocumentBuf();
    for (const [key, value] of doc) {
        buf.appendBson(key, value);
    }
    return buf;
}

/**
 * 编码类型化文档
 * EN: Encode a typed document
 */
export function encodeDocument(doc: Document): Buffer {
    return encodeBsonDocument(doc);
}

/**
 * 解码为类型化文档
 * EN: Decode bytes into a typed document
 */
export function decodeDocument(bytes: Uint8Array, options: RawIterOptions = {}): Document {
    return rawDocumentToDocument(RawDocument.fromBytes(bytes), options);
}
