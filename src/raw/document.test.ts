import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { CodecError, ErrorCode, LogLevel, consoleSink, logger } from '../core';
import type { LogEntry } from '../core';
import { BSONType } from '../bson/types';
import { RawArray, RawDocument } from './document';

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

// {"hello": "world"}
const HELLO = Buffer.from([
    0x16, 0x00, 0x00, 0x00,
    0x02, 0x68, 0x65, 0x6c, 0x6c, 0x6f, 0x00,
    0x06, 0x00, 0x00, 0x00, 0x77, 0x6f, 0x72, 0x6c, 0x64, 0x00,
    0x00,
]);

// {"a": 1, "b": <boolean byte 2>}
const BAD_BOOL = Buffer.from([
    16, 0, 0, 0,
    0x10, 0x61, 0, 1, 0, 0, 0,
    0x08, 0x62, 0, 2,
    0,
]);

describe('RawDocument', () => {
    it('reads values without copying the document', () => {
        const doc = RawDocument.fromBytes(HELLO);
        expect(doc.get('hello')).toEqual({ type: BSONType.String, value: 'world' });
        expect(doc.getStr('hello')).toBe('world');
        expect(doc.get('missing')).toBeUndefined();
        expect(doc.asBytes().buffer).toBe(HELLO.buffer);
        expect(doc.byteLength).toBe(22);
    });

    it('accepts a plain Uint8Array', () => {
        const doc = RawDocument.fromBytes(new Uint8Array(HELLO));
        expect([...doc.keys()]).toEqual(['hello']);
    });

    it('recognises the empty document', () => {
        expect(RawDocument.fromBytes(Buffer.from([5, 0, 0, 0, 0])).isEmpty()).toBe(true);
        expect(RawDocument.fromBytes(HELLO).isEmpty()).toBe(false);
    });

    it('rejects frames that are too short', () => {
        const err = captureError(() => RawDocument.fromBytes(Buffer.from([4, 0, 0, 0])));
        expect(err.code).toBe(ErrorCode.InvalidLength);
    });

    it('rejects a length prefix that disagrees with the slice', () => {
        const err = captureError(() => RawDocument.fromBytes(HELLO.subarray(0, 21)));
        expect(err.code).toBe(ErrorCode.InvalidLength);
        expect(err.message).toBe('declared length 22 does not match buffer length 21');
    });

    it('rejects a missing terminator', () => {
        const err = captureError(() => RawDocument.fromBytes(Buffer.from([5, 0, 0, 0, 1])));
        expect(err.code).toBe(ErrorCode.MalformedValue);
    });

    it('rejects arbitrary bytes with an error', () => {
        const bytes = Buffer.from([227, 0, 35, 4, 2, 0, 255, 255, 255, 127, 255, 255, 255, 47]);
        expect(() => RawDocument.fromBytes(bytes)).toThrow(CodecError);
    });

    it('yields valid elements before the first malformed one, then stops', () => {
        const it = RawDocument.fromBytes(BAD_BOOL).iter();
        expect(it.next()).toEqual({ done: false, value: ['a', { type: BSONType.Int32, value: 1 }] });
        const err = captureError(() => it.next());
        expect(err.code).toBe(ErrorCode.MalformedValue);
        expect(err.message).toBe('boolean byte must be 0 or 1, got 2');
        expect(it.next()).toEqual({ done: true, value: undefined });
    });

    it('reports malformed elements reached before the requested key', () => {
        const doc = RawDocument.fromBytes(BAD_BOOL);
        expect(doc.getI32('a')).toBe(1);
        expect(() => doc.get('z')).not.toThrow();
        expect(() => doc.getBool('b')).toThrow(CodecError);
    });

    it('rejects an unknown element type', () => {
        const bytes = Buffer.from([8, 0, 0, 0, 0x42, 0x61, 0, 0]);
        const err = captureError(() => [...RawDocument.fromBytes(bytes)]);
        expect(err.code).toBe(ErrorCode.UnknownElementType);
        expect(err.offset).toBe(4);
    });

    it('rejects a string whose length overruns the document', () => {
        // {"s": string declaring 100 bytes}
        const bytes = Buffer.from([14, 0, 0, 0, 0x02, 0x73, 0, 100, 0, 0, 0, 0x61, 0, 0]);
        const err = captureError(() => RawDocument.fromBytes(bytes).get('s'));
        expect(err.code).toBe(ErrorCode.UnexpectedEndOfBuffer);
    });

    it('decodes invalid UTF-8 only in lossy mode', () => {
        // {"s": "a\xff"}
        const bytes = Buffer.from([15, 0, 0, 0, 0x02, 0x73, 0, 3, 0, 0, 0, 0x61, 0xff, 0, 0]);
        const doc = RawDocument.fromBytes(bytes);
        expect(captureError(() => doc.get('s')).code).toBe(ErrorCode.InvalidUtf8);
        expect([...doc.iter({ utf8Lossy: true })]).toEqual([['s', { type: BSONType.String, value: 'a\uFFFD' }]]);
    });

    it('reads the timestamp increment first', () => {
        // {"t": Timestamp(time 2, increment 1)}
        const bytes = Buffer.from([16, 0, 0, 0, 0x11, 0x74, 0, 1, 0, 0, 0, 2, 0, 0, 0, 0]);
        const ts = RawDocument.fromBytes(bytes).getTimestamp('t');
        expect(ts.t).toBe(2);
        expect(ts.i).toBe(1);
    });

    it('checks the inner length of old binary', () => {
        // {"b": binary subtype 2, outer 6, inner 2, payload [7, 8]}
        const good = Buffer.from([19, 0, 0, 0, 0x05, 0x62, 0, 6, 0, 0, 0, 2, 2, 0, 0, 0, 7, 8, 0]);
        expect([...RawDocument.fromBytes(good).getBinary('b').bytes]).toEqual([7, 8]);

        const bad = Buffer.from(good);
        bad[12] = 3;
        expect(captureError(() => RawDocument.fromBytes(bad).get('b')).code).toBe(ErrorCode.InvalidLength);
    });
});

describe('malformed input logging', () => {
    const entries: LogEntry[] = [];

    beforeEach(() => {
        entries.length = 0;
        logger.setLevel(LogLevel.Debug);
        logger.setSink((entry) => entries.push(entry));
    });

    afterEach(() => {
        logger.setLevel(LogLevel.Info);
        logger.setSink(consoleSink);
    });

    it('logs each rejected buffer at debug level', () => {
        expect(() => RawDocument.fromBytes(Buffer.from([4, 0, 0, 0]))).toThrow(CodecError);
        expect(entries).toHaveLength(1);
        expect(entries[0].name).toBe('bsonkit.raw');
        expect(entries[0].message).toBe('rejected malformed BSON');
        expect(entries[0].context).toEqual({
            code: 'InvalidLength',
            offset: 0,
            reason: 'document must be at least 5 bytes, got 4',
        });
    });
});

describe('RawArray', () => {
    // ["x", 7]
    const ARRAY = Buffer.from([
        21, 0, 0, 0,
        0x02, 0x30, 0, 2, 0, 0, 0, 0x78, 0,
        0x10, 0x31, 0, 7, 0, 0, 0,
        0,
    ]);

    it('indexes by iterating and counting', () => {
        const arr = RawArray.fromBytes(ARRAY);
        expect(arr.length()).toBe(2);
        expect(arr.getStr(0)).toBe('x');
        expect(arr.getI32(1)).toBe(7);
        expect(arr.get(2)).toBeUndefined();
        expect([...arr]).toEqual([
            { type: BSONType.String, value: 'x' },
            { type: BSONType.Int32, value: 7 },
        ]);
    });

    it('names the index in type errors', () => {
        const err = captureError(() => RawArray.fromBytes(ARRAY).getBool(1));
        expect(err.message).toBe("expected bool for key '1', found int");
    });
});
