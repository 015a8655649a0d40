import { CodecError } from '../core';
import { BinarySubtype, UUID } from './types';

/**
 * UUID 的二进制表示方式
 * EN: Binary representations of a UUID
 *
 * 旧版驱动使用子类型 3，并以各自的字节顺序存储。
 * EN: Legacy drivers store subtype 3 with their own byte orders.
 */
export enum UuidRepresentation {
    /** 标准（子类型 4，原始顺序）EN: Standard (subtype 4, bytes as-is) */
    Standard = 'standard',
    /** C# 旧版：前三组按小端存储 EN: C# legacy: first three groups little-endian */
    CSharpLegacy = 'csharpLegacy',
    /** Java 旧版：两个 8 字节半段各自反转 EN: Java legacy: each 8-byte half reversed */
    JavaLegacy = 'javaLegacy',
    /** Python 旧版：原始顺序 EN: Python legacy: bytes as-is */
    PythonLegacy = 'pythonLegacy',
}

function reverseRange(bytes: Uint8Array, start: number, end: number): void {
    for (let i = start, j = end - 1; i < j; i++, j--) {
        const tmp = bytes[i];
        bytes[i] = bytes[j];
        bytes[j] = tmp;
    }
}

// 每种旧版顺序都是自逆的：同一函数用于编码和解码
// EN: Every legacy order is its own inverse, so one function encodes and decodes
function reorderUuidBytes(bytes: Uint8Array, rep: UuidRepresentation): Uint8Array {
    const out = Uint8Array.from(bytes);
    switch (rep) {
        case UuidRepresentation.CSharpLegacy:
            reverseRange(out, 0, 4);
            reverseRange(out, 4, 6);
            reverseRange(out, 6, 8);
            break;
        case UuidRepresentation.JavaLegacy:
            reverseRange(out, 0, 8);
            reverseRange(out, 8, 16);
            break;
        case UuidRepresentation.Standard:
        case UuidRepresentation.PythonLegacy:
            break;
    }
    return out;
}

function uuidToBytes(uuid: UUID): Uint8Array {
    return Uint8Array.from(Buffer.from(uuid.toHexString(false), 'hex'));
}

/**
 * BSON 二进制值：子类型 + 字节
 * EN: BSON binary value: subtype plus payload
 */
export class Binary {
    /** 子类型 EN: Subtype byte */
    readonly subtype: number;
    /** 负载 EN: Payload */
    readonly bytes: Uint8Array;

    constructor(subtype: number, bytes: Uint8Array) {
        if (!Number.isInteger(subtype) || subtype < 0 || subtype > 0xff) {
            throw CodecError.malformedValue(`binary subtype ${subtype} is not a byte`);
        }
        this.subtype = subtype;
        this.bytes = bytes;
    }

    /**
     * 以标准表示（子类型 4）包装 UUID
     * EN: Wrap a UUID using the standard representation (subtype 4)
     */
    static fromUuid(uuid: UUID): Binary {
        return new Binary(BinarySubtype.Uuid, uuidToBytes(uuid));
    }

    /**
     * 按指定表示方式包装 UUID
     * EN: Wrap a UUID using the given representation
     */
    static fromUuidWithRepresentation(uuid: UUID, rep: UuidRepresentation): Binary {
        if (rep === UuidRepresentation.Standard) {
            return Binary.fromUuid(uuid);
        }
        return new Binary(BinarySubtype.UuidOld, reorderUuidBytes(uuidToBytes(uuid), rep));
    }

    toUuid(): UUID {
        return this.toUuidWithRepresentation(UuidRepresentation.Standard);
    }

    /**
     * 按指定表示方式解读为 UUID；子类型必须匹配
     * EN: Interpret as a UUID in the given representation; the subtype must match
     */
    toUuidWithRepresentation(rep: UuidRepresentation): UUID {
        const expected = rep === UuidRepresentation.Standard ? BinarySubtype.Uuid : BinarySubtype.UuidOld;
        if (this.subtype !== expected) {
            throw CodecError.binarySubtypeMismatch(expected, this.subtype);
        }
        if (this.bytes.length !== 16) {
            throw CodecError.invalidUuid(`expected 16 bytes for a UUID, got ${this.bytes.length}`);
        }
        return new UUID(reorderUuidBytes(this.bytes, rep));
    }

    get isUserDefined(): boolean {
        return this.subtype >= BinarySubtype.UserDefined;
    }

    equals(other: Binary): boolean {
        return this.subtype === other.subtype && Buffer.compare(this.bytes, other.bytes) === 0;
    }

    toString(): string {
        return `Binary(0x${this.subtype.toString(16).padStart(2, '0')}, ${Buffer.from(this.bytes).toString('base64')})`;
    }
}
