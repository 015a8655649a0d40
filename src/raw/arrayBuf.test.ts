import { describe, it, expect } from 'vitest';
import { BSONType } from '../bson/types';
import { Bson } from '../bson/value';
import { RawArrayBuf } from './arrayBuf';
import { RawDocumentBuf } from './documentBuf';

describe('RawArrayBuf', () => {
    it('keys elements by their position', () => {
        const arr = RawArrayBuf.from(['x', 7]);
        expect([...arr.asBytes()]).toEqual([
            21, 0, 0, 0,
            0x02, 0x30, 0, 2, 0, 0, 0, 0x78, 0,
            0x10, 0x31, 0, 7, 0, 0, 0,
            0,
        ]);
        expect(arr.length).toBe(2);
        expect(arr.get(1)).toEqual({ type: BSONType.Int32, value: 7 });
        expect([...arr.iter()].map(([key]) => key)).toEqual(['0', '1']);
    });

    it('continues numbering after typed pushes', () => {
        const arr = new RawArrayBuf().push(true).pushBson(Bson.string('y'));
        expect(arr.length).toBe(2);
        expect([...arr]).toEqual([
            { type: BSONType.Boolean, value: true },
            { type: BSONType.String, value: 'y' },
        ]);
    });

    it('counts the elements of an adopted document buffer', () => {
        const source = new RawDocumentBuf().append('0', 1).append('1', 2).append('2', 3);
        const arr = RawArrayBuf.fromRawDocumentBuf(source);
        expect(arr.length).toBe(3);
        arr.push(4);
        expect(arr.asRawArray().getI32(3)).toBe(4);
    });

    it('copies the source buffer instead of sharing it', () => {
        const source = new RawDocumentBuf().append('0', 1);
        const arr = RawArrayBuf.fromRawDocumentBuf(source);
        source.append('1', 2);
        arr.push(3);
        expect([...arr.iter()].map(([key]) => key)).toEqual(['0', '1']);
        expect(arr.length).toBe(2);
        expect(arr.get(1)).toEqual({ type: BSONType.Int32, value: 3 });
        expect(source.elementCount()).toBe(2);
    });

    it('validates and copies encoded arrays', () => {
        const bytes = RawArrayBuf.from(['x', 7]).toBuffer();
        const arr = RawArrayBuf.fromBytes(bytes);
        expect(arr.length).toBe(2);
        arr.push(false);
        expect(bytes.length).toBe(21);
        expect(arr.get(2)).toEqual({ type: BSONType.Boolean, value: false });
    });

    it('nests inside a document as an array', () => {
        const doc = new RawDocumentBuf().append('list', RawArrayBuf.from([1, 2]));
        expect(doc.get('list')?.type).toBe(BSONType.Array);
        expect(doc.asRawDocument().getArray('list').length()).toBe(2);
    });
});
