import { describe, it, expect } from 'vitest';
import { CodecError, ErrorCode } from '../core';
import { Binary, UuidRepresentation } from './binary';
import { BinarySubtype, UUID } from './types';

const SAMPLE_UUID = '00112233-4455-6677-8899-aabbccddeeff';

function hex(bytes: Uint8Array): string {
    return Buffer.from(bytes).toString('hex');
}

describe('Binary', () => {
    it('wraps a UUID as subtype 4 in standard order', () => {
        const binary = Binary.fromUuid(new UUID(SAMPLE_UUID));
        expect(binary.subtype).toBe(BinarySubtype.Uuid);
        expect(hex(binary.bytes)).toBe('00112233445566778899aabbccddeeff');
    });

    it.each([
        [UuidRepresentation.JavaLegacy, '7766554433221100ffeeddccbbaa9988'],
        [UuidRepresentation.PythonLegacy, '00112233445566778899aabbccddeeff'],
        [UuidRepresentation.CSharpLegacy, '33221100554477668899aabbccddeeff'],
    ])('stores %s UUIDs as subtype 3', (rep, expected) => {
        const binary = Binary.fromUuidWithRepresentation(new UUID(SAMPLE_UUID), rep);
        expect(binary.subtype).toBe(BinarySubtype.UuidOld);
        expect(hex(binary.bytes)).toBe(expected);
        expect(binary.toUuidWithRepresentation(rep).toHexString(true)).toBe(SAMPLE_UUID);
    });

    it('requires the matching subtype to read a UUID', () => {
        const legacy = Binary.fromUuidWithRepresentation(new UUID(SAMPLE_UUID), UuidRepresentation.JavaLegacy);
        try {
            legacy.toUuid();
            expect.unreachable();
        } catch (err) {
            expect(err instanceof CodecError && err.code).toBe(ErrorCode.BinarySubtypeMismatch);
        }
    });

    it('requires 16 bytes for a UUID', () => {
        const short = new Binary(BinarySubtype.Uuid, new Uint8Array(4));
        expect(() => short.toUuid()).toThrow(CodecError);
    });

    it('rejects subtypes outside a byte', () => {
        expect(() => new Binary(256, new Uint8Array(0))).toThrow(CodecError);
    });

    it('compares by subtype and bytes', () => {
        const a = new Binary(BinarySubtype.Generic, Uint8Array.from([1, 2]));
        expect(a.equals(new Binary(BinarySubtype.Generic, Uint8Array.from([1, 2])))).toBe(true);
        expect(a.equals(new Binary(BinarySubtype.Md5, Uint8Array.from([1, 2])))).toBe(false);
        expect(new Binary(0x80, new Uint8Array(0)).isUserDefined).toBe(true);
    });
});
