import { CodecError } from '../core';
import type { Document } from '../bson/document';
import { BSONType } from '../bson/types';
import type { Bson } from '../bson/value';
import { HUMAN_READABLE_NEWTYPE_NAME, atField, atIndex, nested } from './context';
import type { DeContext } from './context';
import type { Codec, Deserializer, MapAccess, SeqAccess, Visitor } from './dataModel';
import { visitScalar } from './dispatch';

/**
 * 从类型化 `Bson` 值读取
 * EN: Deserializer reading from a typed `Bson` value
 */
export class ValueDeserializer implements Deserializer {
    constructor(private readonly value: Bson, private readonly ctx: DeContext) {}

    get humanReadable(): boolean {
        return this.ctx.humanReadable;
    }

    deserializeAny<T>(visitor: Visitor<T>): T {
        const value = this.value;
        if (value.type === BSONType.Document && visitor.visitMap) {
            return visitor.visitMap(new ValueMapAccess(value.value, nested(this.ctx)));
        }
        if (value.type === BSONType.Array && visitor.visitSeq) {
            return visitor.visitSeq(new ValueSeqAccess(value.value, nested(this.ctx)));
        }
        return visitScalar(visitor, value, () => value);
    }

    deserializeOption<T>(inner: Codec<T>): T | undefined {
        if (this.value.type === BSONType.Null) {
            return undefined;
        }
        return inner.deserialize(this);
    }

    deserializeNewtype<T>(name: string, inner: Codec<T>): T {
        if (name === HUMAN_READABLE_NEWTYPE_NAME && !this.ctx.humanReadable) {
            return inner.deserialize(new ValueDeserializer(this.value, { ...this.ctx, humanReadable: true }));
        }
        // 类型化值已经是合法字符串，宽松 UTF-8 模式在此无效
        // EN: Typed strings are already valid, so lossy UTF-8 has nothing to do here
        return inner.deserialize(this);
    }
}

class ValueMapAccess implements MapAccess {
    private readonly entries: Iterator<[string, Bson]>;
    private current: [string, Bson] | undefined;

    constructor(doc: Document, private readonly ctx: DeContext) {
        this.entries = doc[Symbol.iterator]();
    }

    nextKey(): string | undefined {
        const next = this.entries.next();
        if (next.done) {
            this.current = undefined;
            return undefined;
        }
        this.current = next.value;
        return next.value[0];
    }

    nextValue<T>(codec: Codec<T>): T {
        const current = this.current;
        if (!current) {
            throw CodecError.internalError('nextValue called without a pending key');
        }
        this.current = undefined;
        const [key, value] = current;
        return atField(this.ctx, key, () => codec.deserialize(new ValueDeserializer(value, this.ctx)));
    }

    skipValue(): void {
        this.current = undefined;
    }
}

class ValueSeqAccess implements SeqAccess {
    private index = 0;

    constructor(private readonly items: readonly Bson[], private readonly ctx: DeContext) {}

    nextElement<T>(codec: Codec<T>): IteratorResult<T, undefined> {
        const index = this.index;
        if (index >= this.items.length) {
            return { done: true, value: undefined };
        }
        this.index++;
        const item = this.items[index];
        return {
            done: false,
            value: atIndex(this.ctx, index, () => codec.deserialize(new ValueDeserializer(item, this.ctx))),
        };
    }
}
