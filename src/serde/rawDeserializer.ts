import { CodecError } from '../core';
import { BSONType } from '../bson/types';
import { rawToBson } from '../raw/convert';
import type { RawDocument, RawElement, RawIter } from '../raw/document';
import type { RawBsonRef } from '../raw/element';
import { HUMAN_READABLE_NEWTYPE_NAME, UTF8_LOSSY_NEWTYPE_NAME, atField, atIndex, nested } from './context';
import type { DeContext } from './context';
import type { Codec, Deserializer, MapAccess, SeqAccess, Visitor } from './dataModel';
import { visitScalar } from './dispatch';

/**
 * 尚未解码的值：类型已知，值按需读取
 * EN: A value not yet decoded; the type is known and the value is read on demand
 */
interface RawSource {
    readonly type: BSONType;
    value(utf8Lossy: boolean): RawBsonRef;
}

/**
 * 直接从原始字节读取，不经过类型化值模型
 * EN: Deserializer reading raw bytes directly, without the typed value model
 *
 * 访问者接受原始文档时零拷贝交出视图；否则逐个元素读取。
 * 访问者返回后，未读取的剩余元素仍会被校验。
 * EN: A visitor that accepts raw documents gets a zero-copy view; otherwise
 * elements are read one at a time. Elements the visitor left unread are
 * still validated once it returns.
 */
export class RawDeserializer implements Deserializer {
    constructor(private readonly source: RawSource, private readonly ctx: DeContext) {}

    static forDocument(doc: RawDocument, ctx: DeContext): RawDeserializer {
        return new RawDeserializer({ type: BSONType.Document, value: () => doc.toRawBsonRef() }, ctx);
    }

    get humanReadable(): boolean {
        return this.ctx.humanReadable;
    }

    deserializeAny<T>(visitor: Visitor<T>): T {
        const ctx = this.ctx;
        const ref = this.source.value(ctx.utf8Lossy);
        const options = { utf8Lossy: ctx.utf8Lossy };

        if (ref.type === BSONType.Document) {
            if (visitor.visitRawDocument) {
                return visitor.visitRawDocument(ref.value);
            }
            if (visitor.visitMap) {
                const access = new RawMapAccess(ref.value.iter(options), nested(ctx));
                const out = visitor.visitMap(access);
                access.drain();
                return out;
            }
        } else if (ref.type === BSONType.Array) {
            if (visitor.visitRawArray) {
                return visitor.visitRawArray(ref.value);
            }
            if (visitor.visitSeq) {
                const access = new RawSeqAccess(ref.value.iter(options), nested(ctx));
                const out = visitor.visitSeq(access);
                access.drain();
                return out;
            }
        }
        return visitScalar(visitor, ref, () => rawToBson(ref, options));
    }

    deserializeOption<T>(inner: Codec<T>): T | undefined {
        if (this.source.type === BSONType.Null) {
            return undefined;
        }
        return inner.deserialize(this);
    }

    deserializeNewtype<T>(name: string, inner: Codec<T>): T {
        if (name === HUMAN_READABLE_NEWTYPE_NAME && !this.ctx.humanReadable) {
            return inner.deserialize(new RawDeserializer(this.source, { ...this.ctx, humanReadable: true }));
        }
        if (name === UTF8_LOSSY_NEWTYPE_NAME && !this.ctx.utf8Lossy) {
            return inner.deserialize(new RawDeserializer(this.source, { ...this.ctx, utf8Lossy: true }));
        }
        return inner.deserialize(this);
    }
}

class RawMapAccess implements MapAccess {
    private current: RawElement | undefined;

    constructor(private readonly it: RawIter, private readonly ctx: DeContext) {}

    nextKey(): string | undefined {
        if (this.current) {
            this.skipValue();
        }
        this.current = this.it.nextElement();
        return this.current?.key;
    }

    nextValue<T>(codec: Codec<T>): T {
        const element = this.current;
        if (!element) {
            throw CodecError.internalError('nextValue called without a pending key');
        }
        this.current = undefined;
        return atField(this.ctx, element.key, () => codec.deserialize(new RawDeserializer(element, this.ctx)));
    }

    skipValue(): void {
        const element = this.current;
        this.current = undefined;
        if (element) {
            atField(this.ctx, element.key, () => element.value(this.ctx.utf8Lossy));
        }
    }

    drain(): void {
        this.skipValue();
        for (let el = this.it.nextElement(); el; el = this.it.nextElement()) {
            this.current = el;
            this.skipValue();
        }
    }
}

class RawSeqAccess implements SeqAccess {
    private index = 0;

    constructor(private readonly it: RawIter, private readonly ctx: DeContext) {}

    nextElement<T>(codec: Codec<T>): IteratorResult<T, undefined> {
        const element = this.it.nextElement();
        if (!element) {
            return { done: true, value: undefined };
        }
        const index = this.index++;
        return {
            done: false,
            value: atIndex(this.ctx, index, () => codec.deserialize(new RawDeserializer(element, this.ctx))),
        };
    }

    drain(): void {
        for (let el = this.it.nextElement(); el; el = this.it.nextElement()) {
            const element = el;
            atIndex(this.ctx, this.index++, () => element.value(this.ctx.utf8Lossy));
        }
    }
}
