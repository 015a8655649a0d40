import { CodecError } from '../core';
import type { Binary } from './binary';
import type { DateTime } from './datetime';
import type { Regex } from './extended';
import { BSONType, bsonTypeName } from './types';
import type { Decimal128, ObjectId, Timestamp } from './types';
import { isBsonOf } from './value';
import type { Bson, BsonOf } from './value';

/**
 * 有序 BSON 文档（保持插入顺序）
 * EN: Ordered BSON document (insertion order is preserved)
 *
 * 以 `Map` 为底层存储，因此整数形式的键不会像普通对象那样被重新排序。
 * EN: Backed by a `Map`, so integer-like keys keep their position, unlike
 * plain object properties.
 */
export class Document implements Iterable<[string, Bson]> {
    private readonly fields = new Map<string, Bson>();

    constructor(entries?: Iterable<readonly [string, Bson]>) {
        if (entries) {
            for (const [key, value] of entries) {
                this.fields.set(key, value);
            }
        }
    }

    get size(): number {
        return this.fields.size;
    }

    get(key: string): Bson | undefined {
        return this.fields.get(key);
    }

    has(key: string): boolean {
        return this.fields.has(key);
    }

    /**
     * 插入或替换；替换时保持原位置，返回旧值
     * EN: Insert or replace; a replaced key keeps its position. Returns the old value.
     */
    insert(key: string, value: Bson): Bson | undefined {
        const previous = this.fields.get(key);
        this.fields.set(key, value);
        return previous;
    }

    remove(key: string): Bson | undefined {
        const previous = this.fields.get(key);
        this.fields.delete(key);
        return previous;
    }

    keys(): IterableIterator<string> {
        return this.fields.keys();
    }

    values(): IterableIterator<Bson> {
        return this.fields.values();
    }

    entries(): IterableIterator<[string, Bson]> {
        return this.fields.entries();
    }

    [Symbol.iterator](): IterableIterator<[string, Bson]> {
        return this.fields.entries();
    }

    // 类型化取值
    // EN: Typed getters

    private getOf<K extends BSONType>(key: string, type: K): BsonOf<K> {
        const value = this.fields.get(key);
        if (value === undefined) {
            throw CodecError.valueNotPresent(key);
        }
        if (!isBsonOf(value, type)) {
            throw CodecError.unexpectedType(key, bsonTypeName(type), bsonTypeName(value.type));
        }
        return value;
    }

    getF64(key: string): number {
        return this.getOf(key, BSONType.Double).value;
    }

    getStr(key: string): string {
        return this.getOf(key, BSONType.String).value;
    }

    getDocument(key: string): Document {
        return this.getOf(key, BSONType.Document).value;
    }

    getArray(key: string): Bson[] {
        return this.getOf(key, BSONType.Array).value;
    }

    getBinary(key: string): Binary {
        return this.getOf(key, BSONType.Binary).value;
    }

    getObjectId(key: string): ObjectId {
        return this.getOf(key, BSONType.ObjectId).value;
    }

    getBool(key: string): boolean {
        return this.getOf(key, BSONType.Boolean).value;
    }

    getDateTime(key: string): DateTime {
        return this.getOf(key, BSONType.DateTime).value;
    }

    getRegex(key: string): Regex {
        return this.getOf(key, BSONType.Regex).value;
    }

    getI32(key: string): number {
        return this.getOf(key, BSONType.Int32).value;
    }

    getTimestamp(key: string): Timestamp {
        return this.getOf(key, BSONType.Timestamp).value;
    }

    getI64(key: string): bigint {
        return this.getOf(key, BSONType.Int64).value;
    }

    getDecimal128(key: string): Decimal128 {
        return this.getOf(key, BSONType.Decimal128).value;
    }

    isNull(key: string): boolean {
        return this.fields.get(key)?.type === BSONType.Null;
    }
}

/**
 * 由对象字面量构建文档
 * EN: Build a document from an object literal
 *
 * 对象会把整数形式的键排到前面；需要精确顺序时请使用 `new Document(entries)`。
 * EN: Objects move integer-like keys first; use `new Document(entries)` when
 * the exact order matters.
 */
export function doc(fields: Record<string, Bson>): Document {
    return new Document(Object.entries(fields));
}
