import { describe, it, expect } from 'vitest';
import { CodecError, ErrorCode, MAX_BSON_DEPTH } from '../core';
import { Binary } from '../bson/binary';
import { DateTime } from '../bson/datetime';
import { Document, doc } from '../bson/document';
import { DbPointer, JavaScriptCodeWithScope, Regex } from '../bson/extended';
import { BSONType, Decimal128, ObjectId } from '../bson/types';
import { Bson } from '../bson/value';
import {
    bsonToRawRef,
    decodeDocument,
    documentToRawDocumentBuf,
    encodeDocument,
    rawToBson,
} from './convert';
import { RawDocument } from './document';

const OID = ObjectId.createFromHexString('0102030405060708090a0b0c');

function sampleDocument(): Document {
    return doc({
        double: Bson.double(1.25),
        string: Bson.string('text'),
        nested: Bson.document(doc({ flag: Bson.boolean(false) })),
        list: Bson.array([Bson.int32(1), Bson.null()]),
        binary: Bson.binary(new Binary(0x80, Uint8Array.from([1, 2, 3]))),
        old: Bson.binary(new Binary(0x02, Uint8Array.from([4]))),
        undef: Bson.undefined(),
        oid: Bson.objectId(OID),
        date: Bson.dateTime(DateTime.fromMillis(-1)),
        regex: Bson.regex(new Regex('^a', 'xi')),
        pointer: Bson.dbPointer(new DbPointer('db.coll', OID)),
        code: Bson.javascript('f()'),
        symbol: Bson.symbol('sym'),
        scoped: Bson.javascriptWithScope(new JavaScriptCodeWithScope('g()', doc({ y: Bson.int64(2n) }))),
        int: Bson.int32(-5),
        ts: Bson.timestamp(10, 3),
        long: Bson.int64(2n ** 40n),
        decimal: Bson.decimal128(Decimal128.fromString('3.14')),
        min: Bson.minKey(),
        max: Bson.maxKey(),
    });
}

function nestedDocument(levels: number): Document {
    let d = new Document();
    for (let i = 1; i < levels; i++) {
        d = doc({ x: Bson.document(d) });
    }
    return d;
}

// 在已编码文档外再包一层 {"x": inner}
// EN: Wrap encoded bytes one level deeper as {"x": inner}
function wrapBytes(inner: Buffer): Buffer {
    const header = Buffer.alloc(4);
    header.writeInt32LE(inner.length + 8);
    return Buffer.concat([header, Buffer.from([0x03, 0x78, 0]), inner, Buffer.from([0])]);
}

function codeOf(fn: () => unknown): ErrorCode | undefined {
    try {
        fn();
    } catch (err) {
        return err instanceof CodecError ? err.code : undefined;
    }
    return undefined;
}

describe('raw and typed conversion', () => {
    it('re-encodes every element type byte for byte', () => {
        const bytes = encodeDocument(sampleDocument());
        const decoded = decodeDocument(bytes);
        expect([...decoded.keys()]).toEqual([...sampleDocument().keys()]);
        expect(encodeDocument(decoded).equals(bytes)).toBe(true);
    });

    it('writes the same bytes through the raw builder', () => {
        const d = sampleDocument();
        expect(documentToRawDocumentBuf(d).asBytes().equals(encodeDocument(d))).toBe(true);
    });

    it('keeps regex options as written', () => {
        const decoded = decodeDocument(encodeDocument(doc({ r: Bson.regex(new Regex('a', 'xi')) })));
        expect(decoded.getRegex('r').options).toBe('xi');
    });

    it('keeps the last value of a duplicated key', () => {
        const bytes = Buffer.from([19, 0, 0, 0, 0x10, 0x61, 0, 1, 0, 0, 0, 0x10, 0x61, 0, 2, 0, 0, 0, 0]);
        const decoded = decodeDocument(bytes);
        expect(decoded.size).toBe(1);
        expect(decoded.getI32('a')).toBe(2);
        expect([...RawDocument.fromBytes(bytes).keys()]).toEqual(['a', 'a']);
    });

    it('copies binary payloads out of the source bytes', () => {
        const bytes = encodeDocument(doc({ b: Bson.binary(new Binary(0, Uint8Array.from([7]))) }));
        const ref = RawDocument.fromBytes(bytes).get('b');
        expect(ref?.type).toBe(BSONType.Binary);
        const value = ref === undefined ? Bson.null() : rawToBson(ref);
        bytes[bytes.length - 2] = 9;
        expect(value.type === BSONType.Binary && [...value.value.bytes]).toEqual([7]);
    });

    it('encodes nested typed documents into raw references', () => {
        const ref = bsonToRawRef(Bson.document(doc({ x: Bson.int32(1) })));
        expect(ref.type === BSONType.Document && ref.value.getI32('x')).toBe(1);
    });

    it('decodes invalid UTF-8 with replacement characters in lossy mode', () => {
        const bytes = Buffer.from([15, 0, 0, 0, 0x02, 0x73, 0, 3, 0, 0, 0, 0x61, 0xff, 0, 0]);
        expect(codeOf(() => decodeDocument(bytes))).toBe(ErrorCode.InvalidUtf8);
        expect(decodeDocument(bytes, { utf8Lossy: true }).getStr('s')).toBe('a\uFFFD');
    });

    it('encodes up to the nesting limit and no further', () => {
        expect(() => encodeDocument(nestedDocument(MAX_BSON_DEPTH))).not.toThrow();
        expect(codeOf(() => encodeDocument(nestedDocument(MAX_BSON_DEPTH + 1)))).toBe(ErrorCode.DepthLimitExceeded);
    });

    it('decodes up to the nesting limit and no further', () => {
        const deepest = encodeDocument(nestedDocument(MAX_BSON_DEPTH));
        expect(() => decodeDocument(deepest)).not.toThrow();
        expect(codeOf(() => decodeDocument(wrapBytes(deepest)))).toBe(ErrorCode.DepthLimitExceeded);
    });
});
