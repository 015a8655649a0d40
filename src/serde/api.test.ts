import { describe, it, expect } from 'vitest';
import { CodecError, ErrorCode, MAX_BSON_DEPTH } from '../core';
import { Document, doc } from '../bson/document';
import { BSONType } from '../bson/types';
import { Bson } from '../bson/value';
import { encodeDocument } from '../raw/convert';
import { RawDocument } from '../raw/document';
import {
    deserializeFromBson,
    deserializeFromDocument,
    deserializeFromRawDocument,
    deserializeFromSlice,
    serializeToBson,
    serializeToBuffer,
    serializeToDocument,
    serializeToRawDocumentBuf,
} from './api';
import { codec } from './codecs';
import type { Codec } from './dataModel';

interface Bar {
    value: bigint;
}

interface Foo {
    one: Bar;
    two: Bar;
}

interface Person {
    name: string;
    age: number;
    nickname?: string;
}

type Nested = Nested[];

const barCodec = codec.struct<Bar>('Bar', { value: codec.u64 });
const fooCodec = codec.struct<Foo>('Foo', { one: barCodec, two: barCodec });
const personCodec = codec.struct<Person>('Person', {
    name: codec.string,
    age: codec.i32,
    nickname: codec.option(codec.string),
});
const nestedCodec: Codec<Nested> = {
    serialize: (value, serializer) => codec.array(nestedCodec).serialize(value, serializer),
    deserialize: (de) => codec.array(nestedCodec).deserialize(de),
};

function captureError(fn: () => unknown): CodecError {
    try {
        fn();
    } catch (err) {
        if (err instanceof CodecError) {
            return err;
        }
        throw err;
    }
    throw new Error('expected a CodecError');
}

function fooDocument(twoValue: Bson): Document {
    return doc({
        one: Bson.document(doc({ value: Bson.int64(1n) })),
        two: Bson.document(doc({ value: twoValue })),
    });
}

function nestedValue(levels: number): Nested {
    let value: Nested = [];
    for (let i = 1; i < levels; i++) {
        value = [value];
    }
    return value;
}

// {"name": "x", "age": 1, "nickname": null}
const PERSON_BYTES = [
    36, 0, 0, 0,
    0x02, 0x6e, 0x61, 0x6d, 0x65, 0, 2, 0, 0, 0, 0x78, 0,
    0x10, 0x61, 0x67, 0x65, 0, 1, 0, 0, 0,
    0x0a, 0x6e, 0x69, 0x63, 0x6b, 0x6e, 0x61, 0x6d, 0x65, 0,
    0,
];

describe('serialization entry points', () => {
    it('writes struct fields in declaration order', () => {
        const bytes = serializeToBuffer<Person>({ name: 'x', age: 1 }, personCodec);
        expect([...bytes]).toEqual(PERSON_BYTES);
    });

    it('agrees between the typed and raw paths', () => {
        const person: Person = { name: 'x', age: 1, nickname: 'y' };
        const typed = encodeDocument(serializeToDocument(person, personCodec));
        expect(serializeToRawDocumentBuf(person, personCodec).toBuffer().equals(typed)).toBe(true);
    });

    it('round-trips through bytes', () => {
        const person = deserializeFromSlice(Buffer.from(PERSON_BYTES), personCodec);
        expect(person).toEqual({ name: 'x', age: 1, nickname: undefined });
    });

    it('rejects a top level that is not a document', () => {
        const err = captureError(() => serializeToBuffer(5, codec.i32));
        expect(err.code).toBe(ErrorCode.UnsupportedTopLevel);
        expect(err.message).toBe('top-level value must be a document, got int');
        expect(captureError(() => serializeToDocument(['a'], codec.array(codec.string))).code)
            .toBe(ErrorCode.UnsupportedTopLevel);
        expect(serializeToBson(5, codec.i32)).toEqual({ type: BSONType.Int32, value: 5 });
    });

    it('reports the field path of a value that cannot be written', () => {
        const foo: Foo = { one: { value: 1n }, two: { value: 2n ** 64n - 1n } };
        for (const run of [() => serializeToDocument(foo, fooCodec), () => serializeToBuffer(foo, fooCodec)]) {
            const err = captureError(run);
            expect(err.code).toBe(ErrorCode.LossyConversion);
            expect(err.pathString).toBe('two.value');
        }
    });

    it('leaves the path empty when paths are disabled', () => {
        const foo: Foo = { one: { value: 1n }, two: { value: -1n } };
        const err = captureError(() => serializeToDocument(foo, fooCodec, { errorPath: false }));
        expect(err.code).toBe(ErrorCode.LossyConversion);
        expect(err.pathString).toBe('');
    });

    it('enforces the nesting limit', () => {
        expect(() => serializeToBson(nestedValue(MAX_BSON_DEPTH), nestedCodec)).not.toThrow();
        expect(captureError(() => serializeToBson(nestedValue(MAX_BSON_DEPTH + 1), nestedCodec)).code)
            .toBe(ErrorCode.DepthLimitExceeded);
    });
});

describe('deserialization entry points', () => {
    it('reports the field path of a value of the wrong type', () => {
        const source = fooDocument(Bson.string('hello'));
        const fromDocument = captureError(() => deserializeFromDocument(source, fooCodec));
        const fromBytes = captureError(() => deserializeFromSlice(encodeDocument(source), fooCodec));
        for (const err of [fromDocument, fromBytes]) {
            expect(err.code).toBe(ErrorCode.InvalidType);
            expect(err.message).toBe('invalid type: string "hello", expected u64');
            expect(err.pathString).toBe('two.value');
        }
    });

    it('leaves the path empty when paths are disabled', () => {
        const err = captureError(() =>
            deserializeFromDocument(fooDocument(Bson.string('hello')), fooCodec, { errorPath: false })
        );
        expect(err.pathString).toBe('');
    });

    it('includes array indexes in the path', () => {
        const basket = codec.struct<{ items: Bar[] }>('Basket', { items: codec.array(barCodec) });
        const source = doc({
            items: Bson.array([
                Bson.document(doc({ value: Bson.int64(1n) })),
                Bson.document(doc({ value: Bson.boolean(true) })),
            ]),
        });
        expect(captureError(() => deserializeFromDocument(source, basket)).pathString).toBe('items[1].value');
        expect(captureError(() => deserializeFromSlice(encodeDocument(source), basket)).pathString)
            .toBe('items[1].value');
    });

    it('reads a Foo from typed values and bytes alike', () => {
        const source = fooDocument(Bson.int32(2));
        const expected: Foo = { one: { value: 1n }, two: { value: 2n } };
        expect(deserializeFromBson(Bson.document(source), fooCodec)).toEqual(expected);
        expect(deserializeFromRawDocument(RawDocument.fromBytes(encodeDocument(source)), fooCodec)).toEqual(expected);
    });

    it('validates elements a visitor leaves unread', () => {
        // {"a": 1, "b": <boolean byte 2>}
        const bytes = Buffer.from([16, 0, 0, 0, 0x10, 0x61, 0, 1, 0, 0, 0, 0x08, 0x62, 0, 2, 0]);
        const ignoreAll: Codec<number> = {
            serialize: (value, serializer) => serializer.serializeI32(value),
            deserialize: (de) => de.deserializeAny<number>({ expecting: 'a map', visitMap: () => 0 }),
        };
        const err = captureError(() => deserializeFromSlice(bytes, ignoreAll));
        expect(err.code).toBe(ErrorCode.MalformedValue);
        expect(err.pathString).toBe('b');
    });

    it('rejects malformed bytes before reading any field', () => {
        const bytes = Buffer.from([227, 0, 35, 4, 2, 0, 255, 255, 255, 127, 255, 255, 255, 47]);
        expect(captureError(() => deserializeFromSlice(bytes, personCodec)).code).toBe(ErrorCode.InvalidLength);
    });

    it('enforces the nesting limit on typed input', () => {
        let deep: Bson = Bson.array([]);
        for (let i = 1; i <= MAX_BSON_DEPTH; i++) {
            deep = Bson.array([deep]);
        }
        expect(captureError(() => deserializeFromBson(deep, nestedCodec)).code).toBe(ErrorCode.DepthLimitExceeded);
    });
});
