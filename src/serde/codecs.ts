/**
 * 内置编解码器
 * EN: Built-in codecs
 *
 * 标量、容器、结构体以及 BSON 扩展类型。扩展类型在人类可读模式下
 * 使用字符串表示，反序列化时两种形式都接受。
 * EN: Scalars, containers, structs and the BSON extended types. Extended
 * types use a string form in human-readable mode; deserialization accepts
 * either form.
 */

import { CodecError, MAX_UINT32, isInt32 } from '../core';
import { Binary } from '../bson/binary';
import { DateTime } from '../bson/datetime';
import type { Document } from '../bson/document';
import type { Regex } from '../bson/extended';
import { BSONType, BinarySubtype, Decimal128, ObjectId, UUID } from '../bson/types';
import type { Timestamp } from '../bson/types';
import { Bson, isBsonOf } from '../bson/value';
import type { BsonOf } from '../bson/value';
import { RawArrayBuf } from '../raw/arrayBuf';
import { RawArray, RawDocument } from '../raw/document';
import { RawDocumentBuf } from '../raw/documentBuf';
import { documentToRawDocumentBuf } from '../raw/convert';
import { encodeBsonArray, encodeBsonDocument } from '../raw/writer';
import type { Codec, Deserializer, MapAccess, Serializer } from './dataModel';
import { describeValue } from './dispatch';

const OBJECT_ID_HEX = /^[0-9a-fA-F]{24}$/;

/**
 * 取出指定类型的值，否则报类型错误
 * EN: Take the value of the given type, or fail with an invalid type error
 */
export function expectBson<K extends BSONType>(value: Bson, type: K, expecting: string): BsonOf<K> {
    if (!isBsonOf(value, type)) {
        throw CodecError.invalidType(describeValue(value), expecting);
    }
    return value;
}

// ==================== 标量 EN: Scalars ====================

const boolCodec: Codec<boolean> = {
    serialize: (value, serializer) => serializer.serializeBool(value),
    deserialize: (de) => de.deserializeAny<boolean>({ expecting: 'a boolean', visitBool: (v) => v }),
};

const i32Codec: Codec<number> = {
    serialize: (value, serializer) => serializer.serializeI32(value),
    deserialize: (de) =>
        de.deserializeAny<number>({
            expecting: 'i32',
            visitI32: (v) => v,
            visitI64: (v) => {
                const n = Number(v);
                if (!isInt32(n) || BigInt(n) !== v) {
                    throw CodecError.invalidValue(`integer \`${v}\``, 'i32');
                }
                return n;
            },
        }),
};

const i64Codec: Codec<bigint> = {
    serialize: (value, serializer) => serializer.serializeI64(value),
    deserialize: (de) => de.deserializeAny<bigint>({ expecting: 'i64', visitI64: (v) => v }),
};

const u32Codec: Codec<number> = {
    serialize: (value, serializer) => serializer.serializeU32(value),
    deserialize: (de) =>
        de.deserializeAny<number>({
            expecting: 'u32',
            visitI32: (v) => {
                if (v < 0) {
                    throw CodecError.invalidValue(`integer \`${v}\``, 'u32');
                }
                return v;
            },
            visitI64: (v) => {
                if (v < 0n || v > BigInt(MAX_UINT32)) {
                    throw CodecError.invalidValue(`integer \`${v}\``, 'u32');
                }
                return Number(v);
            },
        }),
};

const u64Codec: Codec<bigint> = {
    serialize: (value, serializer) => serializer.serializeU64(value),
    deserialize: (de) =>
        de.deserializeAny<bigint>({
            expecting: 'u64',
            visitI64: (v) => {
                if (v < 0n) {
                    throw CodecError.invalidValue(`integer \`${v}\``, 'u64');
                }
                return v;
            },
        }),
};

const f64Codec: Codec<number> = {
    serialize: (value, serializer) => serializer.serializeF64(value),
    deserialize: (de) =>
        de.deserializeAny<number>({
            expecting: 'f64',
            visitF64: (v) => v,
            visitI32: (v) => v,
            visitI64: (v) => Number(v),
        }),
};

const stringCodec: Codec<string> = {
    serialize: (value, serializer) => serializer.serializeStr(value),
    deserialize: (de) => de.deserializeAny<string>({ expecting: 'a string', visitStr: (v) => v }),
};

/**
 * 字节串：通用子类型（也接受旧版子类型 0x02）
 * EN: Byte string; generic subtype, the old 0x02 subtype is accepted too
 */
const bytesCodec: Codec<Uint8Array> = {
    serialize: (value, serializer) => serializer.serializeBytes(value),
    deserialize: (de) =>
        de.deserializeAny<Uint8Array>({
            expecting: 'a byte array',
            visitBson: (v) => {
                const binary = expectBson(v, BSONType.Binary, 'a byte array').value;
                if (binary.subtype !== BinarySubtype.Generic && binary.subtype !== BinarySubtype.BinaryOld) {
                    throw CodecError.binarySubtypeMismatch(BinarySubtype.Generic, binary.subtype);
                }
                return Uint8Array.from(binary.bytes);
            },
        }),
};

// ==================== 容器 EN: Containers ====================

/**
 * 可选值：undefined 写为 Null；文档中缺失时为 undefined
 * EN: Optional value; undefined is written as Null and a missing field reads as undefined
 */
function option<T>(inner: Codec<T>): Codec<T | undefined> {
    return {
        serialize: (value, serializer) =>
            value === undefined ? serializer.serializeNone() : inner.serialize(value, serializer),
        deserialize: (de) => de.deserializeOption(inner),
        missing: () => undefined,
    };
}

function array<T>(inner: Codec<T>): Codec<T[]> {
    return {
        serialize: (value, serializer) => {
            const seq = serializer.serializeSeq();
            for (const item of value) {
                seq.element(item, inner);
            }
            return seq.end();
        },
        deserialize: (de) =>
            de.deserializeAny<T[]>({
                expecting: 'a sequence',
                visitSeq: (seq) => {
                    const out: T[] = [];
                    for (let next = seq.nextElement(inner); !next.done; next = seq.nextElement(inner)) {
                        out.push(next.value);
                    }
                    return out;
                },
            }),
    };
}

function readEntries<T>(map: MapAccess, inner: Codec<T>, put: (key: string, value: T) => void): void {
    for (let key = map.nextKey(); key !== undefined; key = map.nextKey()) {
        put(key, map.nextValue(inner));
    }
}

/**
 * 以普通对象表示的字符串键映射
 * EN: String-keyed map held in a plain object
 */
function record<T>(inner: Codec<T>): Codec<Record<string, T>> {
    return {
        serialize: (value, serializer) => {
            const out = serializer.serializeMap();
            for (const [key, item] of Object.entries(value)) {
                out.entry(key, item, inner);
            }
            return out.end();
        },
        deserialize: (de) =>
            de.deserializeAny<Record<string, T>>({
                expecting: 'a map',
                visitMap: (map) => {
                    const out: Record<string, T> = {};
                    // defineProperty 使 "__proto__" 之类的键成为普通属性
                    // EN: defineProperty keeps keys such as "__proto__" ordinary properties
                    readEntries(map, inner, (key, item) => {
                        Object.defineProperty(out, key, { value: item, enumerable: true, writable: true, configurable: true });
                    });
                    return out;
                },
            }),
    };
}

function map<T>(inner: Codec<T>): Codec<Map<string, T>> {
    return {
        serialize: (value, serializer) => {
            const out = serializer.serializeMap();
            for (const [key, item] of value) {
                out.entry(key, item, inner);
            }
            return out.end();
        },
        deserialize: (de) =>
            de.deserializeAny<Map<string, T>>({
                expecting: 'a map',
                visitMap: (access) => {
                    const out = new Map<string, T>();
                    readEntries(access, inner, (key, item) => out.set(key, item));
                    return out;
                },
            }),
    };
}

// ==================== 结构体 EN: Structs ====================

/**
 * 结构体的字段编解码器表
 * EN: Field codec table of a struct
 */
export type StructFields<T> = { [K in keyof T]-?: Codec<T[K]> };

function findField<T>(fields: StructFields<T>, name: string): Extract<keyof T, string> | undefined {
    for (const key in fields) {
        if (key === name) {
            return key;
        }
    }
    return undefined;
}

function assignField<T, K extends keyof T>(target: Partial<T>, key: K, value: T[K]): void {
    target[key] = value;
}

function hasAllFields<T>(partial: Partial<T>, assigned: ReadonlySet<string>, fields: StructFields<T>): partial is T {
    for (const key in fields) {
        if (!assigned.has(key)) {
            return false;
        }
    }
    return true;
}

/**
 * 具名字段的对象；未知字段被忽略，重复字段报错
 * EN: Object with named fields; unknown fields are skipped and duplicates are an error
 *
 * 字段按 `fields` 的声明顺序写出。
 * EN: Fields are written in the declaration order of `fields`.
 */
function struct<T extends object>(name: string, fields: StructFields<T>): Codec<T> {
    const expecting = `struct ${name}`;
    return {
        serialize: (value, serializer) => {
            const out = serializer.serializeMap();
            for (const key in fields) {
                out.entry(key, value[key], fields[key]);
            }
            return out.end();
        },
        deserialize: (de) =>
            de.deserializeAny<T>({
                expecting,
                visitMap: (access) => {
                    const partial: Partial<T> = {};
                    const seen = new Set<string>();
                    for (let key = access.nextKey(); key !== undefined; key = access.nextKey()) {
                        const field = findField<T>(fields, key);
                        if (field === undefined) {
                            access.skipValue();
                            continue;
                        }
                        if (seen.has(field)) {
                            throw CodecError.duplicateField(field);
                        }
                        seen.add(field);
                        assignField<T, Extract<keyof T, string>>(partial, field, access.nextValue(fields[field]));
                    }
                    for (const key in fields) {
                        if (seen.has(key)) {
                            continue;
                        }
                        const fieldCodec = fields[key];
                        if (!fieldCodec.missing) {
                            throw CodecError.missingField(key);
                        }
                        assignField<T, Extract<keyof T, string>>(partial, key, fieldCodec.missing());
                        seen.add(key);
                    }
                    if (!hasAllFields<T>(partial, seen, fields)) {
                        throw CodecError.internalError(`${expecting} is incomplete after deserialization`);
                    }
                    return partial;
                },
            }),
    };
}

// ==================== BSON 值 EN: BSON values ====================

const bsonCodec: Codec<Bson> = {
    serialize: (value, serializer) => serializer.serializeBson(value),
    deserialize: (de) => de.deserializeAny<Bson>({ expecting: 'any BSON value', visitBson: (v) => v }),
};

const documentCodec: Codec<Document> = {
    serialize: (value, serializer) => serializer.serializeBson(Bson.document(value)),
    deserialize: (de) =>
        de.deserializeAny<Document>({
            expecting: 'a document',
            visitBson: (v) => expectBson(v, BSONType.Document, 'a document').value,
        }),
};

const objectIdCodec: Codec<ObjectId> = {
    serialize: (value, serializer) =>
        serializer.humanReadable
            ? serializer.serializeStr(value.toHexString())
            : serializer.serializeBson(Bson.objectId(value)),
    deserialize: (de) =>
        de.deserializeAny<ObjectId>({
            expecting: 'an ObjectId',
            visitStr: parseObjectIdHex,
            visitBson: (v) => expectBson(v, BSONType.ObjectId, 'an ObjectId').value,
        }),
};

export function parseObjectIdHex(hex: string): ObjectId {
    if (!OBJECT_ID_HEX.test(hex)) {
        throw CodecError.invalidObjectId(`${JSON.stringify(hex)} is not a 24-digit hex string`);
    }
    return ObjectId.createFromHexString(hex);
}

const dateTimeCodec: Codec<DateTime> = {
    serialize: (value, serializer) =>
        serializer.humanReadable
            ? serializer.serializeStr(value.tryToRfc3339String())
            : serializer.serializeBson(Bson.dateTime(value)),
    deserialize: (de) =>
        de.deserializeAny<DateTime>({
            expecting: 'a DateTime',
            visitStr: (v) => DateTime.parseRfc3339Str(v),
            visitBson: (v) => expectBson(v, BSONType.DateTime, 'a DateTime').value,
        }),
};

const timestampCodec: Codec<Timestamp> = {
    serialize: (value, serializer) => serializer.serializeBson({ type: BSONType.Timestamp, value }),
    deserialize: (de) =>
        de.deserializeAny<Timestamp>({
            expecting: 'a Timestamp',
            visitBson: (v) => expectBson(v, BSONType.Timestamp, 'a Timestamp').value,
        }),
};

const binaryCodec: Codec<Binary> = {
    serialize: (value, serializer) => serializer.serializeBson(Bson.binary(value)),
    deserialize: (de) =>
        de.deserializeAny<Binary>({
            expecting: 'a Binary',
            visitBson: (v) => expectBson(v, BSONType.Binary, 'a Binary').value,
        }),
};

const regexCodec: Codec<Regex> = {
    serialize: (value, serializer) => serializer.serializeBson(Bson.regex(value)),
    deserialize: (de) =>
        de.deserializeAny<Regex>({
            expecting: 'a Regex',
            visitBson: (v) => expectBson(v, BSONType.Regex, 'a Regex').value,
        }),
};

const decimal128Codec: Codec<Decimal128> = {
    serialize: (value, serializer) =>
        serializer.humanReadable
            ? serializer.serializeStr(value.toString())
            : serializer.serializeBson(Bson.decimal128(value)),
    deserialize: (de) =>
        de.deserializeAny<Decimal128>({
            expecting: 'a Decimal128',
            visitStr: (v) => {
                try {
                    return Decimal128.fromString(v);
                } catch (err) {
                    throw CodecError.custom(`invalid value: string ${JSON.stringify(v)}, expected a Decimal128`, err);
                }
            },
            visitBson: (v) => expectBson(v, BSONType.Decimal128, 'a Decimal128').value,
        }),
};

/**
 * UUID：二进制子类型 4，人类可读模式下为带连字符的字符串
 * EN: UUID as binary subtype 4, or a hyphenated string in human-readable mode
 */
const uuidCodec: Codec<UUID> = {
    serialize: (value, serializer) =>
        serializer.humanReadable
            ? serializer.serializeStr(value.toHexString(true))
            : serializer.serializeBson(Bson.binary(Binary.fromUuid(value))),
    deserialize: (de) =>
        de.deserializeAny<UUID>({
            expecting: 'a UUID',
            visitStr: parseUuid,
            visitBson: (v) => expectBson(v, BSONType.Binary, 'a UUID').value.toUuid(),
        }),
};

export function parseUuid(text: string): UUID {
    if (!UUID.isValid(text)) {
        throw CodecError.invalidUuid(`${JSON.stringify(text)} is not a UUID string`);
    }
    return new UUID(text);
}

// ==================== 原始类型 EN: Raw types ====================

/**
 * 原始文档视图；从字节读取时零拷贝
 * EN: Raw document view; zero-copy when read from bytes
 */
const rawDocumentCodec: Codec<RawDocument> = {
    serialize: (value, serializer) => serializer.serializeRawDocument(value),
    deserialize: (de) =>
        de.deserializeAny<RawDocument>({
            expecting: 'a raw document',
            visitRawDocument: (v) => v,
            visitBson: (v) =>
                RawDocument.fromBytes(encodeBsonDocument(expectBson(v, BSONType.Document, 'a raw document').value)),
        }),
};

const rawArrayCodec: Codec<RawArray> = {
    serialize: (value, serializer) => serializer.serializeRawArray(value),
    deserialize: (de) =>
        de.deserializeAny<RawArray>({
            expecting: 'a raw array',
            visitRawArray: (v) => v,
            visitBson: (v) => RawArray.fromBytes(encodeBsonArray(expectBson(v, BSONType.Array, 'a raw array').value)),
        }),
};

const rawDocumentBufCodec: Codec<RawDocumentBuf> = {
    serialize: (value, serializer) => serializer.serializeRawDocument(value.asRawDocument()),
    deserialize: (de) =>
        de.deserializeAny<RawDocumentBuf>({
            expecting: 'a raw document',
            visitRawDocument: (v) => RawDocumentBuf.fromBytes(v.asBytes()),
            visitBson: (v) => documentToRawDocumentBuf(expectBson(v, BSONType.Document, 'a raw document').value),
        }),
};

const rawArrayBufCodec: Codec<RawArrayBuf> = {
    serialize: (value, serializer) => serializer.serializeRawArray(value.asRawArray()),
    deserialize: (de) =>
        de.deserializeAny<RawArrayBuf>({
            expecting: 'a raw array',
            visitRawArray: (v) => RawArrayBuf.fromBytes(v.asBytes()),
            visitBson: (v) => {
                const buf = new RawArrayBuf();
                for (const item of expectBson(v, BSONType.Array, 'a raw array').value) {
                    buf.pushBson(item);
                }
                return buf;
            },
        }),
};

// ==================== 元组与枚举 EN: Tuples and enums ====================

/**
 * 定长元组，编码为数组；读取时元素个数必须与声明一致
 * EN: Fixed-length tuple encoded as an array; on read the element count must match
 */
function tuple<A>(a: Codec<A>): Codec<[A]>;
function tuple<A, B>(a: Codec<A>, b: Codec<B>): Codec<[A, B]>;
function tuple<A, B, C>(a: Codec<A>, b: Codec<B>, c: Codec<C>): Codec<[A, B, C]>;
function tuple<A, B, C, D>(a: Codec<A>, b: Codec<B>, c: Codec<C>, d: Codec<D>): Codec<[A, B, C, D]>;
function tuple(...items: Codec<unknown>[]): Codec<unknown[]> {
    const expecting = `a tuple of ${items.length} elements`;
    return {
        serialize: (value, serializer) => {
            if (value.length !== items.length) {
                throw CodecError.invalidSequenceLength(value.length, expecting);
            }
            const seq = serializer.serializeSeq();
            items.forEach((item, i) => seq.element(value[i], item));
            return seq.end();
        },
        deserialize: (de) =>
            de.deserializeAny<unknown[]>({
                expecting,
                visitSeq: (seq) => {
                    const out: unknown[] = [];
                    for (const item of items) {
                        const next = seq.nextElement(item);
                        if (next.done) {
                            throw CodecError.invalidSequenceLength(out.length, expecting);
                        }
                        out.push(next.value);
                    }
                    let extra = 0;
                    while (!seq.nextElement(bsonCodec).done) {
                        extra++;
                    }
                    if (extra > 0) {
                        throw CodecError.invalidSequenceLength(items.length + extra, expecting);
                    }
                    return out;
                },
            }),
    };
}

/**
 * 无内容的变体
 * EN: Variant without content
 */
export interface UnitVariant<T> {
    readonly kind: 'unit';
    readonly name: string;
    make(): T;
}

export interface ContentVariant<T> {
    readonly kind: 'content';
    readonly name: string;
    serializeContent<Ok>(value: T, serializer: Serializer<Ok>): Ok;
    deserializeContent(deserializer: Deserializer): T;
}

export type VariantCase<T> = UnitVariant<T> | ContentVariant<T>;

/**
 * 枚举的标记方式
 * EN: How an enum names its variant
 *
 * - external：`{ "名称": 内容 }`，无内容的变体写为字符串
 *   EN: `{ "Name": content }`; a unit variant is written as a string
 * - adjacent：`{ [tag]: "名称", [content]: 内容 }`
 *   EN: `{ [tag]: "Name", [content]: content }`
 */
export type EnumTagging =
    | { readonly style: 'external' }
    | { readonly style: 'adjacent'; readonly tag: string; readonly content: string };

const EXTERNAL: EnumTagging = { style: 'external' };

/**
 * 带内容的变体，值的形状为 `{ type, value }`
 * EN: Variant with content; its values are shaped `{ type, value }`
 */
function variant<K extends string, P>(name: K, content: Codec<P>): ContentVariant<{ readonly type: K; readonly value: P }> {
    return {
        kind: 'content',
        name,
        serializeContent: (value, serializer) => content.serialize(value.value, serializer),
        deserializeContent: (de) => ({ type: name, value: content.deserialize(de) }),
    };
}

function unitVariant<K extends string>(name: K): UnitVariant<{ readonly type: K }> {
    return { kind: 'unit', name, make: () => ({ type: name }) };
}

function contentCodec<T>(found: ContentVariant<T>): Codec<T> {
    return {
        serialize: (value, serializer) => found.serializeContent(value, serializer),
        deserialize: (de) => found.deserializeContent(de),
    };
}

/**
 * 以 `type` 字段区分的联合类型
 * EN: Union discriminated by its `type` field
 */
function enumeration<T extends { readonly type: string }>(
    name: string,
    cases: readonly VariantCase<T>[],
    tagging: EnumTagging = EXTERNAL
): Codec<T> {
    const expecting = `enum ${name}`;
    const names = cases.map((c) => c.name);
    const adjacent = tagging.style === 'adjacent' ? tagging : undefined;
    const findCase = (variantName: string): VariantCase<T> => {
        const found = cases.find((c) => c.name === variantName);
        if (!found) {
            throw CodecError.unknownVariant(variantName, names);
        }
        return found;
    };

    const readExternal = (access: MapAccess): T => {
        const key = access.nextKey();
        if (key === undefined) {
            throw CodecError.invalidValue('an empty map', `a single-key map naming a variant of ${expecting}`);
        }
        const found = findCase(key);
        if (found.kind === 'unit') {
            throw CodecError.invalidType('map', `unit variant \`${found.name}\` as a string`);
        }
        const value = access.nextValue(contentCodec(found));
        if (access.nextKey() !== undefined) {
            throw CodecError.invalidValue('a map with more than one key', `a single-key map naming a variant of ${expecting}`);
        }
        return value;
    };

    const readAdjacent = (access: MapAccess, tag: string, content: string): T => {
        let found: VariantCase<T> | undefined;
        let result: T | undefined;
        for (let key = access.nextKey(); key !== undefined; key = access.nextKey()) {
            if (key === tag) {
                if (found) {
                    throw CodecError.duplicateField(tag);
                }
                found = findCase(access.nextValue(stringCodec));
            } else if (key === content) {
                if (result !== undefined) {
                    throw CodecError.duplicateField(content);
                }
                if (!found) {
                    throw CodecError.custom(`field \`${tag}\` must precede \`${content}\` in ${expecting}`);
                }
                if (found.kind === 'unit') {
                    access.skipValue();
                    result = found.make();
                } else {
                    result = access.nextValue(contentCodec(found));
                }
            } else {
                access.skipValue();
            }
        }
        if (!found) {
            throw CodecError.missingField(tag);
        }
        if (result !== undefined) {
            return result;
        }
        if (found.kind === 'unit') {
            return found.make();
        }
        throw CodecError.missingField(content);
    };

    return {
        serialize: (value, serializer) => {
            const found = findCase(value.type);
            if (!adjacent) {
                if (found.kind === 'unit') {
                    return serializer.serializeStr(found.name);
                }
                const out = serializer.serializeMap();
                out.entry(found.name, value, contentCodec(found));
                return out.end();
            }
            const out = serializer.serializeMap();
            out.entry(adjacent.tag, found.name, stringCodec);
            if (found.kind === 'content') {
                out.entry(adjacent.content, value, contentCodec(found));
            }
            return out.end();
        },
        deserialize: (de) =>
            adjacent
                ? de.deserializeAny<T>({
                      expecting,
                      visitMap: (access) => readAdjacent(access, adjacent.tag, adjacent.content),
                  })
                : de.deserializeAny<T>({
                      expecting,
                      visitStr: (v) => {
                          const found = findCase(v);
                          if (found.kind !== 'unit') {
                              throw CodecError.invalidType('unit variant', `variant \`${found.name}\` with content`);
                          }
                          return found.make();
                      },
                      visitMap: readExternal,
                  }),
    };
}

/**
 * 内置编解码器集合
 * EN: The built-in codecs
 */
export const codec = {
    bool: boolCodec,
    i32: i32Codec,
    i64: i64Codec,
    u32: u32Codec,
    u64: u64Codec,
    f64: f64Codec,
    string: stringCodec,
    bytes: bytesCodec,
    option,
    array,
    record,
    map,
    struct,
    bson: bsonCodec,
    document: documentCodec,
    objectId: objectIdCodec,
    dateTime: dateTimeCodec,
    timestamp: timestampCodec,
    binary: binaryCodec,
    regex: regexCodec,
    decimal128: decimal128Codec,
    uuid: uuidCodec,
    rawDocument: rawDocumentCodec,
    rawArray: rawArrayCodec,
    rawDocumentBuf: rawDocumentBufCodec,
    rawArrayBuf: rawArrayBufCodec,
    tuple,
    variant,
    unitVariant,
    enumeration,
};
