import { CodecError, isInt32, isInt64 } from '../core';
import { BSONType, BinarySubtype } from '../bson/types';
import type { Bson } from '../bson/value';
import { RawArrayBuf } from '../raw/arrayBuf';
import { bsonToRawRef } from '../raw/convert';
import type { RawArray, RawDocument } from '../raw/document';
import { RawDocumentBuf } from '../raw/documentBuf';
import type { RawBsonRef } from '../raw/element';
import { HUMAN_READABLE_NEWTYPE_NAME, atField, atIndex, nested } from './context';
import type { SerContext } from './context';
import type { Codec, SerializeMap, SerializeSeq, Serializer } from './dataModel';
import { checkU32, checkU64 } from './dispatch';

/**
 * 直接生成原始字节的序列化器；文档和数组写入构建器
 * EN: Serializer writing raw bytes directly; documents and arrays go into builders
 */
export class RawSerializer implements Serializer<RawBsonRef> {
    constructor(private readonly ctx: SerContext) {}

    get humanReadable(): boolean {
        return this.ctx.humanReadable;
    }

    serializeBool(value: boolean): RawBsonRef {
        return { type: BSONType.Boolean, value };
    }

    serializeI32(value: number): RawBsonRef {
        if (!isInt32(value)) {
            throw CodecError.lossyConversion(`${value} is not a 32-bit integer`);
        }
        return { type: BSONType.Int32, value };
    }

    serializeI64(value: bigint): RawBsonRef {
        if (!isInt64(value)) {
            throw CodecError.lossyConversion(`${value} is not a 64-bit integer`);
        }
        return { type: BSONType.Int64, value };
    }

    serializeU32(value: number): RawBsonRef {
        return { type: BSONType.Int64, value: checkU32(value) };
    }

    serializeU64(value: bigint): RawBsonRef {
        return { type: BSONType.Int64, value: checkU64(value) };
    }

    serializeF64(value: number): RawBsonRef {
        return { type: BSONType.Double, value };
    }

    serializeStr(value: string): RawBsonRef {
        return { type: BSONType.String, value };
    }

    serializeBytes(value: Uint8Array): RawBsonRef {
        return { type: BSONType.Binary, value: { subtype: BinarySubtype.Generic, bytes: Uint8Array.from(value) } };
    }

    serializeNone(): RawBsonRef {
        return { type: BSONType.Null };
    }

    serializeNewtype<T>(name: string, value: T, inner: Codec<T>): RawBsonRef {
        if (name === HUMAN_READABLE_NEWTYPE_NAME && !this.ctx.humanReadable) {
            return inner.serialize(value, new RawSerializer({ ...this.ctx, humanReadable: true }));
        }
        return inner.serialize(value, this);
    }

    serializeSeq(): SerializeSeq<RawBsonRef> {
        return new RawSeqSerializer(nested(this.ctx));
    }

    serializeMap(): SerializeMap<RawBsonRef> {
        return new RawMapSerializer(nested(this.ctx));
    }

    serializeBson(value: Bson): RawBsonRef {
        return bsonToRawRef(value);
    }

    serializeRawDocument(value: RawDocument): RawBsonRef {
        return { type: BSONType.Document, value };
    }

    serializeRawArray(value: RawArray): RawBsonRef {
        return { type: BSONType.Array, value };
    }
}

class RawSeqSerializer implements SerializeSeq<RawBsonRef> {
    private readonly buf = new RawArrayBuf();

    constructor(private readonly ctx: SerContext) {}

    element<T>(value: T, codec: Codec<T>): void {
        atIndex(this.ctx, this.buf.length, () => {
            this.buf.push(codec.serialize(value, new RawSerializer(this.ctx)));
        });
    }

    end(): RawBsonRef {
        return this.buf.toRawBsonRef();
    }
}

class RawMapSerializer implements SerializeMap<RawBsonRef> {
    private readonly buf = new RawDocumentBuf();

    constructor(private readonly ctx: SerContext) {}

    entry<T>(key: string, value: T, codec: Codec<T>): void {
        atField(this.ctx, key, () => {
            this.buf.append(key, codec.serialize(value, new RawSerializer(this.ctx)));
        });
    }

    end(): RawBsonRef {
        return this.buf.toRawBsonRef();
    }
}
