/**
 * 基于访问者的通用序列化数据模型
 * EN: Generic visitor-based serialization data model
 *
 * `Codec` 描述一个类型如何驱动 `Serializer`，以及如何通过 `Visitor`
 * 从 `Deserializer` 取回自身。类型化值和原始字节各有一对实现。
 * EN: A `Codec` describes how a type drives a `Serializer` and how it reads
 * itself back from a `Deserializer` through a `Visitor`. Typed values and
 * raw bytes each have one implementation pair.
 */

import type { Bson } from '../bson/value';
import type { RawArray, RawDocument } from '../raw/document';

/**
 * 类型的编解码器
 * EN: Codec for one type
 */
export interface Codec<T> {
    serialize<Ok>(value: T, serializer: Serializer<Ok>): Ok;
    deserialize(deserializer: Deserializer): T;
    /**
     * 文档中缺少该字段时使用的值；未定义时缺失字段报错
     * EN: Value used when a document lacks the field; without it a missing field is an error
     */
    missing?(): T;
}

export interface Serializer<Ok> {
    /** 是否使用人类可读表示 EN: Whether the human-readable form is in effect */
    readonly humanReadable: boolean;

    serializeBool(value: boolean): Ok;
    serializeI32(value: number): Ok;
    serializeI64(value: bigint): Ok;
    /** 编码为 Int64 EN: Encoded as Int64 */
    serializeU32(value: number): Ok;
    /** 编码为 Int64，超过 int64 上限时失败 EN: Encoded as Int64; fails above the int64 maximum */
    serializeU64(value: bigint): Ok;
    serializeF64(value: number): Ok;
    serializeStr(value: string): Ok;
    /** 编码为通用子类型的二进制 EN: Encoded as generic binary */
    serializeBytes(value: Uint8Array): Ok;
    serializeNone(): Ok;
    /**
     * 带名称的包装值；保留名称用于切换模式
     * EN: A named wrapper; reserved names switch modes
     */
    serializeNewtype<T>(name: string, value: T, inner: Codec<T>): Ok;
    serializeSeq(): SerializeSeq<Ok>;
    serializeMap(): SerializeMap<Ok>;
    /** 直接写入类型化值 EN: Pass a typed value through */
    serializeBson(value: Bson): Ok;
    serializeRawDocument(value: RawDocument): Ok;
    serializeRawArray(value: RawArray): Ok;
}

export interface SerializeSeq<Ok> {
    element<T>(value: T, codec: Codec<T>): void;
    end(): Ok;
}

export interface SerializeMap<Ok> {
    entry<T>(key: string, value: T, codec: Codec<T>): void;
    end(): Ok;
}

/**
 * 访问者：只实现能接受的值种类，其余视为类型不匹配
 * EN: Visitor; implement only the kinds of value you accept, anything else is an invalid type
 */
export interface Visitor<T> {
    /** 用于错误消息的期望描述 EN: What the visitor expects, for error messages */
    readonly expecting: string;

    visitBool?(value: boolean): T;
    visitI32?(value: number): T;
    visitI64?(value: bigint): T;
    visitF64?(value: number): T;
    visitStr?(value: string): T;
    visitNull?(): T;
    visitMap?(map: MapAccess): T;
    visitSeq?(seq: SeqAccess): T;
    /** 其余所有值（扩展类型等）EN: Every other value, such as the extended types */
    visitBson?(value: Bson): T;
    visitRawDocument?(value: RawDocument): T;
    visitRawArray?(value: RawArray): T;
}

export interface MapAccess {
    /** 下一个键；结束时返回 undefined EN: Next key, or undefined at the end */
    nextKey(): string | undefined;
    nextValue<T>(codec: Codec<T>): T;
    skipValue(): void;
}

export interface SeqAccess {
    nextElement<T>(codec: Codec<T>): IteratorResult<T, undefined>;
}

export interface Deserializer {
    readonly humanReadable: boolean;

    deserializeAny<T>(visitor: Visitor<T>): T;
    /** Null 映射为 undefined EN: Null maps to undefined */
    deserializeOption<T>(inner: Codec<T>): T | undefined;
    deserializeNewtype<T>(name: string, inner: Codec<T>): T;
}
