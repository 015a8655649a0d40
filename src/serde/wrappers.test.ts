import { describe, it, expect } from 'vitest';
import { CodecError, ErrorCode } from '../core';
import { DateTime } from '../bson/datetime';
import { doc } from '../bson/document';
import { BSONType } from '../bson/types';
import { Bson } from '../bson/value';
import {
    deserializeFromDocument,
    deserializeFromSlice,
    serializeToBuffer,
    serializeToDocument,
} from './api';
import { codec } from './codecs';
import { HumanReadable, Utf8LossyDeserialization, humanReadable, utf8Lossy } from './wrappers';

interface Meeting {
    when: DateTime;
}

interface Note {
    s: string;
}

const meetingCodec = codec.struct<Meeting>('Meeting', { when: codec.dateTime });
const noteCodec = codec.struct<Note>('Note', { s: codec.string });

// {"s": "a\xff"}
const INVALID_UTF8 = Buffer.from([15, 0, 0, 0, 0x02, 0x73, 0, 3, 0, 0, 0, 0x61, 0xff, 0, 0]);

describe('HumanReadable', () => {
    it('switches its contents to the string forms', () => {
        const wrapped = new HumanReadable<Meeting>({ when: DateTime.fromMillis(0) });
        const written = serializeToDocument(wrapped, humanReadable(meetingCodec));
        expect(written.get('when')).toEqual({ type: BSONType.String, value: '1970-01-01T00:00:00Z' });
    });

    it('round-trips through bytes', () => {
        const wrapperCodec = humanReadable(meetingCodec);
        const bytes = serializeToBuffer(new HumanReadable<Meeting>({ when: DateTime.fromMillis(1500) }), wrapperCodec);
        const read = deserializeFromSlice(bytes, wrapperCodec);
        expect(read).toBeInstanceOf(HumanReadable);
        expect(read.value.when.timestampMillis).toBe(1500n);
        expect(serializeToBuffer(read, wrapperCodec).equals(bytes)).toBe(true);
    });

    it('applies to nested values as well', () => {
        const outer = codec.struct<{ inner: Meeting[] }>('Outer', { inner: codec.array(meetingCodec) });
        const written = serializeToDocument(
            new HumanReadable({ inner: [{ when: DateTime.fromMillis(0) }] }),
            humanReadable(outer)
        );
        const first = written.getArray('inner')[0];
        expect(first.type === BSONType.Document && first.value.getStr('when')).toBe('1970-01-01T00:00:00Z');
    });

    it('leaves the mode on when the serializer already has it', () => {
        const written = serializeToDocument(
            new HumanReadable<Meeting>({ when: DateTime.fromMillis(0) }),
            humanReadable(meetingCodec),
            { humanReadable: true }
        );
        expect(written.getStr('when')).toBe('1970-01-01T00:00:00Z');
    });

    it('is not needed to read the string forms', () => {
        const source = doc({ when: Bson.string('1970-01-01T00:00:00Z') });
        expect(deserializeFromDocument(source, meetingCodec).when.timestampMillis).toBe(0n);
    });
});

describe('Utf8LossyDeserialization', () => {
    it('replaces invalid UTF-8 in its contents', () => {
        const read = deserializeFromSlice(INVALID_UTF8, utf8Lossy(noteCodec));
        expect(read).toBeInstanceOf(Utf8LossyDeserialization);
        expect(read.value.s).toBe('a\uFFFD');
    });

    it('leaves strict decoding in place without the wrapper', () => {
        try {
            deserializeFromSlice(INVALID_UTF8, noteCodec);
            expect.unreachable();
        } catch (err) {
            expect(err instanceof CodecError && err.code).toBe(ErrorCode.InvalidUtf8);
            expect(err instanceof CodecError && err.pathString).toBe('s');
        }
    });

    it('matches the deserializer option', () => {
        expect(deserializeFromSlice(INVALID_UTF8, noteCodec, { utf8Lossy: true }).s).toBe('a\uFFFD');
    });

    it('has no effect when serializing or reading typed values', () => {
        const written = serializeToDocument(new Utf8LossyDeserialization<Note>({ s: 'ok' }), utf8Lossy(noteCodec));
        expect(written.getStr('s')).toBe('ok');
        expect(deserializeFromDocument(written, utf8Lossy(noteCodec)).value.s).toBe('ok');
    });
});
