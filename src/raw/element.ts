import type { DateTime } from '../bson/datetime';
import type { BSONType, Decimal128, ObjectId, Timestamp } from '../bson/types';
import type { RawArray, RawDocument } from './document';

/**
 * 二进制值引用（字节借用自底层缓冲区）
 * EN: Binary value reference; the bytes borrow from the underlying buffer
 */
export interface RawBinaryRef {
    readonly subtype: number;
    readonly bytes: Uint8Array;
}

export interface RawRegexRef {
    readonly pattern: string;
    readonly options: string;
}

export interface RawDbPointerRef {
    readonly namespace: string;
    readonly id: ObjectId;
}

export interface RawJavaScriptCodeWithScopeRef {
    readonly code: string;
    readonly scope: RawDocument;
}

/**
 * 原始 BSON 值引用
 * EN: Reference to a raw BSON value
 *
 * 文档、数组和二进制借用底层字节；定长标量按值复制。
 * EN: Documents, arrays and binary payloads borrow the underlying bytes;
 * fixed-width scalars are copied.
 */
export type RawBsonRef =
    | { readonly type: BSONType.Double; readonly value: number }
    | { readonly type: BSONType.String; readonly value: string }
    | { readonly type: BSONType.Document; readonly value: RawDocument }
    | { readonly type: BSONType.Array; readonly value: RawArray }
    | { readonly type: BSONType.Binary; readonly value: RawBinaryRef }
    | { readonly type: BSONType.Undefined }
    | { readonly type: BSONType.ObjectId; readonly value: ObjectId }
    | { readonly type: BSONType.Boolean; readonly value: boolean }
    | { readonly type: BSONType.DateTime; readonly value: DateTime }
    | { readonly type: BSONType.Null }
    | { readonly type: BSONType.Regex; readonly value: RawRegexRef }
    | { readonly type: BSONType.DBPointer; readonly value: RawDbPointerRef }
    | { readonly type: BSONType.JavaScript; readonly value: string }
    | { readonly type: BSONType.Symbol; readonly value: string }
    | { readonly type: BSONType.JavaScriptWithScope; readonly value: RawJavaScriptCodeWithScopeRef }
    | { readonly type: BSONType.Int32; readonly value: number }
    | { readonly type: BSONType.Timestamp; readonly value: Timestamp }
    | { readonly type: BSONType.Int64; readonly value: bigint }
    | { readonly type: BSONType.Decimal128; readonly value: Decimal128 }
    | { readonly type: BSONType.MinKey }
    | { readonly type: BSONType.MaxKey };

export type RawBsonRefOf<K extends BSONType> = Extract<RawBsonRef, { type: K }>;

export function isRawBsonRefOf<K extends BSONType>(value: RawBsonRef, type: K): value is RawBsonRefOf<K> {
    return value.type === type;
}

/**
 * 可以转换为原始值引用的对象（原始视图和构建器）
 * EN: Objects that convert to a raw value reference (raw views and builders)
 */
export interface RawBsonConvertible {
    toRawBsonRef(): RawBsonRef;
}
