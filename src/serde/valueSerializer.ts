import { Binary } from '../bson/binary';
import { Document } from '../bson/document';
import { BSONType, BinarySubtype } from '../bson/types';
import { Bson } from '../bson/value';
import { rawArrayToBsonArray, rawDocumentToDocument } from '../raw/convert';
import type { RawArray, RawDocument } from '../raw/document';
import { HUMAN_READABLE_NEWTYPE_NAME, atField, atIndex, nested } from './context';
import type { SerContext } from './context';
import type { Codec, SerializeMap, SerializeSeq, Serializer } from './dataModel';
import { checkU32, checkU64 } from './dispatch';

/**
 * 生成类型化 `Bson` 值的序列化器
 * EN: Serializer producing typed `Bson` values
 */
export class ValueSerializer implements Serializer<Bson> {
    constructor(private readonly ctx: SerContext) {}

    get humanReadable(): boolean {
        return this.ctx.humanReadable;
    }

    serializeBool(value: boolean): Bson {
        return Bson.boolean(value);
    }

    serializeI32(value: number): Bson {
        return Bson.int32(value);
    }

    serializeI64(value: bigint): Bson {
        return Bson.int64(value);
    }

    serializeU32(value: number): Bson {
        return { type: BSONType.Int64, value: checkU32(value) };
    }

    serializeU64(value: bigint): Bson {
        return { type: BSONType.Int64, value: checkU64(value) };
    }

    serializeF64(value: number): Bson {
        return Bson.double(value);
    }

    serializeStr(value: string): Bson {
        return Bson.string(value);
    }

    serializeBytes(value: Uint8Array): Bson {
        return Bson.binary(new Binary(BinarySubtype.Generic, Uint8Array.from(value)));
    }

    serializeNone(): Bson {
        return Bson.null();
    }

    serializeNewtype<T>(name: string, value: T, inner: Codec<T>): Bson {
        if (name === HUMAN_READABLE_NEWTYPE_NAME && !this.ctx.humanReadable) {
            return inner.serialize(value, new ValueSerializer({ ...this.ctx, humanReadable: true }));
        }
        return inner.serialize(value, this);
    }

    serializeSeq(): SerializeSeq<Bson> {
        return new ValueSeqSerializer(nested(this.ctx));
    }

    serializeMap(): SerializeMap<Bson> {
        return new ValueMapSerializer(nested(this.ctx));
    }

    serializeBson(value: Bson): Bson {
        return value;
    }

    serializeRawDocument(value: RawDocument): Bson {
        return Bson.document(rawDocumentToDocument(value, {}, this.ctx.depth));
    }

    serializeRawArray(value: RawArray): Bson {
        return Bson.array(rawArrayToBsonArray(value, {}, this.ctx.depth));
    }
}

class ValueSeqSerializer implements SerializeSeq<Bson> {
    private readonly items: Bson[] = [];

    constructor(private readonly ctx: SerContext) {}

    element<T>(value: T, codec: Codec<T>): void {
        const index = this.items.length;
        this.items.push(atIndex(this.ctx, index, () => codec.serialize(value, new ValueSerializer(this.ctx))));
    }

    end(): Bson {
        return Bson.array(this.items);
    }
}

class ValueMapSerializer implements SerializeMap<Bson> {
    private readonly doc = new Document();

    constructor(private readonly ctx: SerContext) {}

    entry<T>(key: string, value: T, codec: Codec<T>): void {
        this.doc.insert(key, atField(this.ctx, key, () => codec.serialize(value, new ValueSerializer(this.ctx))));
    }

    end(): Bson {
        return Bson.document(this.doc);
    }
}
